import { AccountDataService } from "./accountData";
import { systemClock, type Clock } from "./calendar";
import { loadConfig, type DaydreamsConfig } from "./config";
import { DailyPromptCoordinator } from "./dailyPrompt";
import type { RandomSource } from "./deck";
import type { DocumentStore } from "./documentStore";
import { DraftService } from "./drafts";
import { createLiveblocksDocumentStore } from "./liveblocksStore";
import { createLocalDocumentStore, openLocalDocumentStore } from "./localStore";
import {
  consoleNotifier,
  createWebhookPushGateway,
  disabledPushGateway,
  scheduleDailyReminder,
  type LocalNotifier,
  type PushGateway,
} from "./notifications";
import { NotificationService } from "./partnerNotifications";
import { PartnershipService } from "./partnerships";
import { createRemoteConfig, type RemoteConfig, type RemoteConfigFetcher } from "./remoteConfig";
import type { IdentityProvider } from "./session";
import { SettingsService } from "./settings";
import { StoryService } from "./stories";
import { createSyncStatusRegistry, type SyncStatusRegistry } from "./syncStatus";
import { createTelemetryReporter, type TelemetryReporter } from "./telemetry";

export type DaydreamsAppOptions = {
  identity: IdentityProvider;
  config?: DaydreamsConfig;
  /** Replaces the store the config would pick. */
  store?: DocumentStore;
  push?: PushGateway;
  notifier?: LocalNotifier;
  remoteConfigFetcher?: RemoteConfigFetcher;
  clock?: Clock;
  random?: RandomSource;
};

export type DaydreamsApp = {
  config: DaydreamsConfig;
  store: DocumentStore;
  syncStatus: SyncStatusRegistry;
  telemetry: TelemetryReporter;
  partnerships: PartnershipService;
  settings: SettingsService;
  drafts: DraftService;
  notifications: NotificationService;
  dailyPrompt: DailyPromptCoordinator;
  stories: StoryService;
  accountData: AccountDataService;
  remoteConfig: RemoteConfig;
  /** Arm the daily reminder at the configured time; returns its cancel function. */
  startDailyReminder(): () => void;
  close(): void;
};

const emptyRemoteConfig: RemoteConfigFetcher = async () => ({});

async function openStore(
  config: DaydreamsConfig,
  syncStatus: SyncStatusRegistry,
  telemetry: TelemetryReporter,
): Promise<{ store: DocumentStore; close: () => void }> {
  const local = config.storeFile ? await openLocalDocumentStore(config.storeFile) : createLocalDocumentStore();
  if (!config.liveblocks.publicKey && !config.liveblocks.authEndpoint) {
    return { store: local, close: () => undefined };
  }
  const shared = createLiveblocksDocumentStore({ config: config.liveblocks, fallback: local, syncStatus, telemetry });
  return { store: shared, close: () => shared.close() };
}

/** Wire every service against one store, identity and clock. */
export async function createDaydreamsApp(options: DaydreamsAppOptions): Promise<DaydreamsApp> {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? systemClock;
  const now = () => clock().getTime();
  const syncStatus = createSyncStatusRegistry(now);
  const telemetry = createTelemetryReporter({ endpoint: config.telemetryEndpoint, debug: config.debug, now: clock });

  const opened = options.store
    ? { store: options.store, close: () => undefined }
    : await openStore(config, syncStatus, telemetry);
  const { store } = opened;

  const push = options.push ?? (config.pushEndpoint ? createWebhookPushGateway(config.pushEndpoint) : disabledPushGateway);
  const notifier = options.notifier ?? consoleNotifier;
  const identity = options.identity;

  const partnerships = new PartnershipService({ store, identity, now });
  const drafts = new DraftService(store, now);
  const notifications = new NotificationService({ store, push, local: notifier, telemetry });
  const dailyPrompt = new DailyPromptCoordinator({
    store,
    partnerships,
    notifications,
    clock,
    random: options.random,
    telemetry,
  });
  const stories = new StoryService({ store, identity, partnerships, drafts, notifications, clock, telemetry });
  const remoteConfig = createRemoteConfig(options.remoteConfigFetcher ?? emptyRemoteConfig, {
    minimumFetchIntervalMs: config.remoteConfigIntervalMs,
    now,
  });

  const reminders = new Set<() => void>();

  return {
    config,
    store,
    syncStatus,
    telemetry,
    partnerships,
    settings: new SettingsService({ store, identity }),
    drafts,
    notifications,
    dailyPrompt,
    stories,
    accountData: new AccountDataService({ store, identity, partnerships, clock }),
    remoteConfig,
    startDailyReminder() {
      const cancel = scheduleDailyReminder({ ...config.reminder, notifier, now: clock });
      reminders.add(cancel);
      return () => {
        reminders.delete(cancel);
        cancel();
      };
    },
    close() {
      for (const cancel of reminders) cancel();
      reminders.clear();
      opened.close();
    },
  };
}
