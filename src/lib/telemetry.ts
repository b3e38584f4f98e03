export type TelemetryEvent = {
  category: "auth" | "sync" | "prompt" | "mirror" | "notify";
  code: string;
  reason: string;
  scope?: string;
  source: "daydreams";
  timestamp: string;
};

export type TelemetryReporter = (event: Omit<TelemetryEvent, "timestamp" | "source">) => void;

export type TelemetryOptions = {
  endpoint?: string;
  debug?: boolean;
  now?: () => Date;
};

function canSendTelemetry(endpoint: string | undefined): endpoint is string {
  return typeof endpoint === "string" && endpoint.trim().length > 0;
}

export function createTelemetryReporter(options: TelemetryOptions = {}): TelemetryReporter {
  const now = options.now ?? (() => new Date());

  return (event) => {
    const payload: TelemetryEvent = {
      ...event,
      source: "daydreams",
      timestamp: now().toISOString(),
    };

    if (options.debug) {
      console.warn("[Daydreams][telemetry]", payload);
    }

    if (!canSendTelemetry(options.endpoint)) return;

    fetch(options.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: JSON.stringify(payload),
    }).catch((error: unknown) => {
      // Telemetry failures never reach the caller.
      if (options.debug) console.warn("[Daydreams][telemetry] send failed", error);
    });
  };
}

export const noopTelemetry: TelemetryReporter = () => undefined;
