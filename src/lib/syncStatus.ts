export type SyncMode = "local" | "liveblocks";
export type SyncHealth = "healthy" | "degraded";

export type SyncStatus = {
  roomId: string;
  mode: SyncMode;
  health: SyncHealth;
  reason: string;
  updatedAt: number;
};

type SyncStatusListener = (status: SyncStatus) => void;

export interface SyncStatusRegistry {
  get(roomId: string): SyncStatus;
  set(roomId: string, mode: SyncMode, health: SyncHealth, reason: string): void;
  subscribe(roomId: string, listener: SyncStatusListener): () => void;
}

export function createSyncStatusRegistry(now: () => number = Date.now): SyncStatusRegistry {
  const statusMap = new Map<string, SyncStatus>();
  const listeners = new Map<string, Set<SyncStatusListener>>();

  function defaultStatus(roomId: string): SyncStatus {
    return {
      roomId,
      mode: "local",
      health: "healthy",
      reason: "default_local",
      updatedAt: now(),
    };
  }

  const registry: SyncStatusRegistry = {
    get(roomId) {
      return statusMap.get(roomId) ?? defaultStatus(roomId);
    },
    set(roomId, mode, health, reason) {
      const next: SyncStatus = { roomId, mode, health, reason, updatedAt: now() };
      statusMap.set(roomId, next);
      const roomListeners = listeners.get(roomId);
      if (!roomListeners) return;
      for (const listener of roomListeners) listener(next);
    },
    subscribe(roomId, listener) {
      const set = listeners.get(roomId) ?? new Set<SyncStatusListener>();
      set.add(listener);
      listeners.set(roomId, set);
      listener(registry.get(roomId));
      return () => {
        const current = listeners.get(roomId);
        if (!current) return;
        current.delete(listener);
        if (current.size === 0) listeners.delete(roomId);
      };
    },
  };
  return registry;
}
