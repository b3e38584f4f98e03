import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ValidationError } from "./errors";

describe("loadConfig", () => {
  it("falls back to local-only defaults", () => {
    expect(loadConfig({})).toEqual({
      liveblocks: { publicKey: undefined, authEndpoint: undefined },
      telemetryEndpoint: undefined,
      pushEndpoint: undefined,
      storeFile: undefined,
      reminder: { hour: 20, minute: 0 },
      remoteConfigIntervalMs: 3_600_000,
      debug: false,
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      LIVEBLOCKS_PUBLIC_KEY: "pk_test",
      LIVEBLOCKS_AUTH_ENDPOINT: "https://auth.example.test/liveblocks",
      DAYDREAMS_TELEMETRY_ENDPOINT: "https://telemetry.example.test",
      DAYDREAMS_PUSH_ENDPOINT: "https://push.example.test/send",
      DAYDREAMS_STORE_FILE: "./daydreams.json",
      DAYDREAMS_REMINDER_TIME: "07:45",
      DAYDREAMS_REMOTE_CONFIG_INTERVAL_MS: "60000",
      DAYDREAMS_DEBUG: "true",
    });

    expect(config.liveblocks).toEqual({
      publicKey: "pk_test",
      authEndpoint: "https://auth.example.test/liveblocks",
    });
    expect(config.storeFile).toBe("./daydreams.json");
    expect(config.reminder).toEqual({ hour: 7, minute: 45 });
    expect(config.remoteConfigIntervalMs).toBe(60_000);
    expect(config.debug).toBe(true);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ LIVEBLOCKS_PUBLIC_KEY: "  ", DAYDREAMS_PUSH_ENDPOINT: "" });

    expect(config.liveblocks.publicKey).toBeUndefined();
    expect(config.pushEndpoint).toBeUndefined();
  });

  it("reports invalid values as a configuration error", () => {
    expect(() => loadConfig({ DAYDREAMS_REMINDER_TIME: "25:00" })).toThrow(ValidationError);
    expect(() => loadConfig({ DAYDREAMS_REMINDER_TIME: "25:00" })).toThrow(
      "Configuration is invalid: DAYDREAMS_REMINDER_TIME: expected HH:MM",
    );
    expect(() => loadConfig({ LIVEBLOCKS_AUTH_ENDPOINT: "not a url" })).toThrow(ValidationError);
  });
});
