export * from "./lib/types";
export * from "./lib/errors";
export * from "./lib/calendar";
export * from "./lib/categories";
export * from "./lib/deck";
export * from "./lib/turn";
export * from "./lib/validation";
export * from "./lib/config";
export * from "./lib/documentStore";
export * from "./lib/localStore";
export * from "./lib/liveblocksStore";
export * from "./lib/syncStatus";
export * from "./lib/telemetry";
export * from "./lib/session";
export * from "./lib/notifications";
export * from "./lib/partnerNotifications";
export * from "./lib/partnerships";
export * from "./lib/settings";
export * from "./lib/drafts";
export * from "./lib/dailyPrompt";
export * from "./lib/stories";
export * from "./lib/remoteConfig";
export * from "./lib/accountData";
export * from "./lib/app";
