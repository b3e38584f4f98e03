import { z } from "zod";
import { ValidationError } from "./errors";

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const optionalUrl = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .pipe(z.string().url().optional())
  .optional();

const envSchema = z.object({
  LIVEBLOCKS_PUBLIC_KEY: optionalString,
  LIVEBLOCKS_AUTH_ENDPOINT: optionalUrl,
  DAYDREAMS_TELEMETRY_ENDPOINT: optionalUrl,
  DAYDREAMS_PUSH_ENDPOINT: optionalUrl,
  DAYDREAMS_STORE_FILE: optionalString,
  DAYDREAMS_REMINDER_TIME: z.string().regex(TIME_PATTERN, "expected HH:MM").default("20:00"),
  DAYDREAMS_REMOTE_CONFIG_INTERVAL_MS: z.coerce.number().int().nonnegative().default(3_600_000),
  DAYDREAMS_DEBUG: z
    .enum(["0", "1", "true", "false", ""])
    .default("0")
    .transform((value) => value === "1" || value === "true"),
});

export type ReminderTime = {
  hour: number;
  minute: number;
};

export type DaydreamsConfig = {
  liveblocks: {
    publicKey?: string;
    authEndpoint?: string;
  };
  telemetryEndpoint?: string;
  pushEndpoint?: string;
  storeFile?: string;
  reminder: ReminderTime;
  remoteConfigIntervalMs: number;
  debug: boolean;
};

function parseReminderTime(value: string): ReminderTime {
  const [hour, minute] = value.split(":").map((part) => Number.parseInt(part, 10));
  return { hour, minute };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): DaydreamsConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ValidationError("invalidConfig", details);
  }
  const parsed = result.data;
  return {
    liveblocks: {
      publicKey: parsed.LIVEBLOCKS_PUBLIC_KEY,
      authEndpoint: parsed.LIVEBLOCKS_AUTH_ENDPOINT,
    },
    telemetryEndpoint: parsed.DAYDREAMS_TELEMETRY_ENDPOINT,
    pushEndpoint: parsed.DAYDREAMS_PUSH_ENDPOINT,
    storeFile: parsed.DAYDREAMS_STORE_FILE,
    reminder: parseReminderTime(parsed.DAYDREAMS_REMINDER_TIME),
    remoteConfigIntervalMs: parsed.DAYDREAMS_REMOTE_CONFIG_INTERVAL_MS,
    debug: parsed.DAYDREAMS_DEBUG,
  };
}
