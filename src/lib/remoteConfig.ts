import type { CallOptions } from "./types";

export const WEATHER_API_KEY = "weather_api_key";

export type RemoteConfigFetcher = (options?: CallOptions) => Promise<Record<string, string>>;

export type RemoteConfigOptions = {
  minimumFetchIntervalMs: number;
  now?: () => number;
  defaults?: Record<string, string>;
};

export interface RemoteConfig {
  /** Fetch unless the last successful fetch is younger than the interval. */
  refresh(options?: CallOptions): Promise<void>;
  getString(key: string, options?: CallOptions): Promise<string>;
}

/**
 * String-valued remote settings with a minimum refetch interval. A failed
 * fetch keeps serving the last values that arrived.
 */
export function createRemoteConfig(fetchValues: RemoteConfigFetcher, options: RemoteConfigOptions): RemoteConfig {
  const now = options.now ?? Date.now;
  let values: Record<string, string> = { ...options.defaults };
  let fetchedAt: number | null = null;
  let inFlight: Promise<void> | null = null;

  async function fetchNow(callOptions?: CallOptions) {
    try {
      const fetched = await fetchValues(callOptions);
      values = { ...options.defaults, ...fetched };
      fetchedAt = now();
    } catch (error) {
      if (callOptions?.signal?.aborted) throw error;
      console.warn("[Daydreams] Remote config fetch failed, keeping previous values", error);
    }
  }

  const remoteConfig: RemoteConfig = {
    async refresh(callOptions) {
      if (fetchedAt !== null && now() - fetchedAt < options.minimumFetchIntervalMs) return;
      inFlight ??= fetchNow(callOptions).finally(() => {
        inFlight = null;
      });
      await inFlight;
    },
    async getString(key, callOptions) {
      await remoteConfig.refresh(callOptions);
      return values[key] ?? "";
    },
  };
  return remoteConfig;
}
