import type { JsonObject, LiveMap } from "@liveblocks/client";

// Room storage layout: one map of document path → document per room.
declare global {
  interface Liveblocks {
    Storage: {
      documents: LiveMap<string, JsonObject>;
    };
  }
}

export {};
