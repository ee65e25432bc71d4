import { Effect, Exit, Layer, Schema } from "effect";
import { logger } from "./logger.js";

export type TelemetryAttributes = Record<string, unknown>;

export interface TelemetryService {
  span: <A, E, R>(
    name: string,
    attributes: TelemetryAttributes,
    effect: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, R>;
  log: (
    message: string,
    attributes?: TelemetryAttributes
  ) => Effect.Effect<void, never>;
  metric: (
    name: string,
    value: number,
    attributes?: TelemetryAttributes
  ) => Effect.Effect<void, never>;
}

const TelemetryNoop: TelemetryService = {
  span: (_name, _attributes, effect) => effect,
  log: () => Effect.void,
  metric: () => Effect.void,
};

export class Telemetry extends Effect.Service<Telemetry>()(
  "@reviewdiff/Telemetry",
  {
    sync: () => TelemetryNoop,
  }
) {}

export type TelemetryExporter = "console" | "otlp-http";

export interface TelemetryOptions {
  enabled: boolean;
  exporter: TelemetryExporter;
  endpoint?: string | undefined;
  slowThresholdMs?: number;
}

export const DEFAULT_SLOW_THRESHOLD_MS = 1000;

type OTelAttributeValue =
  | { stringValue: string }
  | { boolValue: boolean }
  | { intValue: string }
  | { doubleValue: number };

interface OTelAttribute {
  key: string;
  value: OTelAttributeValue;
}

type SignalKind = "traces" | "logs" | "metrics";

const JsonUnknown = Schema.parseJson(Schema.Unknown);
const encodeJson = (value: unknown) =>
  Schema.encode(JsonUnknown)(value).pipe(Effect.orDie);
const encodeJsonSync = (value: unknown) => {
  try {
    return Schema.encodeSync(JsonUnknown)(value);
  } catch (error) {
    return String(error);
  }
};

function toAttributeValue(value: unknown): OTelAttributeValue {
  switch (typeof value) {
    case "string":
      return { stringValue: value };
    case "boolean":
      return { boolValue: value };
    case "number":
      return Number.isInteger(value)
        ? { intValue: String(value) }
        : { doubleValue: value };
    default:
      return { stringValue: encodeJsonSync(value) };
  }
}

export function toOtelAttributes(
  attributes: TelemetryAttributes
): OTelAttribute[] {
  return Object.entries(attributes)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ({ key, value: toAttributeValue(value) }));
}

const resource = {
  attributes: [{ key: "service.name", value: { stringValue: "reviewdiff" } }],
};
const scope = { name: "reviewdiff" };

function spanPayload(params: {
  name: string;
  startMs: number;
  endMs: number;
  attributes: TelemetryAttributes;
  status: "ok" | "error";
}) {
  return {
    resourceSpans: [
      {
        resource,
        scopeSpans: [
          {
            scope,
            spans: [
              {
                name: params.name,
                startTimeUnixNano: toUnixNano(params.startMs),
                endTimeUnixNano: toUnixNano(params.endMs),
                attributes: [
                  {
                    key: "reviewdiff.status",
                    value: { stringValue: params.status },
                  },
                  ...toOtelAttributes(params.attributes),
                ],
              },
            ],
          },
        ],
      },
    ],
  };
}

function logPayload(message: string, timeMs: number, attributes: TelemetryAttributes) {
  return {
    resourceLogs: [
      {
        resource,
        scopeLogs: [
          {
            scope,
            logRecords: [
              {
                timeUnixNano: toUnixNano(timeMs),
                body: { stringValue: message },
                attributes: toOtelAttributes(attributes),
              },
            ],
          },
        ],
      },
    ],
  };
}

function metricPayload(
  name: string,
  value: number,
  timeMs: number,
  attributes: TelemetryAttributes
) {
  return {
    resourceMetrics: [
      {
        resource,
        scopeMetrics: [
          {
            scope,
            metrics: [
              {
                name,
                gauge: {
                  dataPoints: [
                    {
                      timeUnixNano: toUnixNano(timeMs),
                      attributes: toOtelAttributes(attributes),
                      asDouble: value,
                    },
                  ],
                },
              },
            ],
          },
        ],
      },
    ],
  };
}

function toUnixNano(ms: number) {
  return `${ms}000000`;
}

export function deriveEndpoint(base: string, kind: SignalKind) {
  const match = /\/v1\/(traces|logs|metrics)$/.exec(base);
  if (match) {
    return `${base.slice(0, match.index)}/v1/${kind}`;
  }
  return base.endsWith("/") ? `${base}v1/${kind}` : `${base}/v1/${kind}`;
}

export function TelemetryLive(options: TelemetryOptions) {
  const slowThresholdMs = options.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS;
  let warnedEndpoint = false;

  const post = (kind: SignalKind, payload: unknown) => {
    if (!options.endpoint) {
      if (!warnedEndpoint) {
        warnedEndpoint = true;
        logger.warn(
          "Telemetry exporter enabled without endpoint; skipping OTLP export."
        );
      }
      return Effect.void;
    }
    const url = deriveEndpoint(options.endpoint, kind);
    return encodeJson(payload).pipe(
      Effect.flatMap((body) =>
        Effect.tryPromise((signal) =>
          fetch(url, {
            method: "POST",
            headers: { "content-type": "application/json" },
            body,
            signal,
          })
        )
      ),
      Effect.ignore
    );
  };

  const printLine = (record: Record<string, unknown>) =>
    encodeJson(record).pipe(
      Effect.flatMap((json) => Effect.sync(() => console.log(json)))
    );

  const reportSlow = (name: string, durationMs: number) =>
    Effect.sync(() => {
      if (durationMs > slowThresholdMs) {
        logger.warn(
          `Operation '${name}' took ${durationMs}ms (threshold: ${slowThresholdMs}ms)`
        );
      }
    });

  return Layer.succeed(
    Telemetry,
    Telemetry.make({
      span: <A, E, R>(
        name: string,
        attributes: TelemetryAttributes,
        effect: Effect.Effect<A, E, R>
      ) =>
        Effect.suspend(() => {
          const startMs = Date.now();
          const handleExit = (exit: Exit.Exit<A, E>) => {
            const endMs = Date.now();
            const durationMs = endMs - startMs;
            const status = Exit.isFailure(exit) ? "error" : "ok";
            const exported = !options.enabled
              ? Effect.void
              : options.exporter === "console"
                ? printLine({ span: name, durationMs, status, attributes })
                : post(
                    "traces",
                    spanPayload({ name, startMs, endMs, attributes, status })
                  );
            return Effect.zipRight(reportSlow(name, durationMs), exported);
          };
          return effect.pipe(Effect.onExit(handleExit));
        }),
      log: (message: string, attributes: TelemetryAttributes = {}) =>
        Effect.suspend(() => {
          if (!options.enabled) {
            return Effect.void;
          }
          const now = Date.now();
          return options.exporter === "console"
            ? printLine({ log: message, timestamp: now, attributes })
            : post("logs", logPayload(message, now, attributes));
        }),
      metric: (
        name: string,
        value: number,
        attributes: TelemetryAttributes = {}
      ) =>
        Effect.suspend(() => {
          if (!options.enabled) {
            return Effect.void;
          }
          const now = Date.now();
          return options.exporter === "console"
            ? printLine({ metric: name, value, timestamp: now, attributes })
            : post("metrics", metricPayload(name, value, now, attributes));
        }),
    })
  );
}
