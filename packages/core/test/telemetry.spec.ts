import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { type LogLevel, setLoggerSink, setLogLevel } from "../src/logger.js";
import {
  deriveEndpoint,
  Telemetry,
  TelemetryLive,
  type TelemetryOptions,
} from "../src/telemetry.js";

interface CapturedRequest {
  url: string;
  body: string;
}

interface OTelAttributePayload {
  key?: string;
  value?: {
    stringValue?: string;
    boolValue?: boolean;
    intValue?: string;
    doubleValue?: number;
  };
}

interface OTelSpanPayload {
  resourceSpans?: Array<{
    scopeSpans?: Array<{
      spans?: Array<{ name?: string; attributes?: OTelAttributePayload[] }>;
    }>;
  }>;
}

let requests: CapturedRequest[] = [];
let warnings: string[] = [];

beforeEach(() => {
  setLogLevel("info");
  requests = [];
  warnings = [];
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      requests.push({
        url: String(input),
        body: typeof init?.body === "string" ? init.body : "",
      });
      return new Response("ok");
    })
  );
  setLoggerSink((level: LogLevel, args) => {
    if (level === "warn") {
      warnings.push(args.map(String).join(" "));
    }
  });
});

afterEach(() => {
  setLoggerSink(null);
  vi.unstubAllGlobals();
  vi.useRealTimers();
  vi.restoreAllMocks();
});

const runWith = <A, E>(
  options: TelemetryOptions,
  program: Effect.Effect<A, E, Telemetry>
) => Effect.runPromise(program.pipe(Effect.provide(TelemetryLive(options))));

function spanAttributes(body: string) {
  const payload: OTelSpanPayload = JSON.parse(body);
  return payload.resourceSpans?.[0]?.scopeSpans?.[0]?.spans?.[0]?.attributes ?? [];
}

describe("deriveEndpoint", () => {
  test("swaps the signal path of a signal endpoint", () => {
    expect(deriveEndpoint("http://collector.test/v1/traces", "logs")).toBe(
      "http://collector.test/v1/logs"
    );
  });

  test("appends the signal path to a base endpoint", () => {
    expect(deriveEndpoint("http://collector.test/otel", "metrics")).toBe(
      "http://collector.test/otel/v1/metrics"
    );
    expect(deriveEndpoint("http://collector.test/", "traces")).toBe(
      "http://collector.test/v1/traces"
    );
  });
});

describe("telemetry exporter", () => {
  test("the default service passes effects through", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const telemetry = yield* Telemetry;
        return yield* telemetry.span("run", {}, Effect.succeed("ok"));
      }).pipe(Effect.provide(Telemetry.Default))
    );
    expect(result).toBe("ok");
    expect(requests).toHaveLength(0);
  });

  test("disabled telemetry does not call fetch", async () => {
    const result = await runWith(
      {
        enabled: false,
        exporter: "otlp-http",
        endpoint: "http://collector.test/v1/traces",
      },
      Effect.gen(function* () {
        const telemetry = yield* Telemetry;
        yield* telemetry.log("hello");
        return yield* telemetry.span("run", {}, Effect.succeed("ok"));
      })
    );
    expect(result).toBe("ok");
    expect(requests).toHaveLength(0);
  });

  test("console exporter prints one JSON line per span", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await runWith(
      { enabled: true, exporter: "console" },
      Effect.gen(function* () {
        const telemetry = yield* Telemetry;
        return yield* telemetry.span(
          "diff",
          { command: "diff" },
          Effect.succeed("ok")
        );
      })
    );
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      span: "diff",
      durationMs: 0,
      status: "ok",
      attributes: { command: "diff" },
    });
  });

  test("otlp spans carry their status", async () => {
    await runWith(
      {
        enabled: true,
        exporter: "otlp-http",
        endpoint: "http://collector.test/v1/traces",
      },
      Effect.gen(function* () {
        const telemetry = yield* Telemetry;
        return yield* Effect.either(
          telemetry.span("run", { command: "diff" }, Effect.fail("boom"))
        );
      })
    );
    expect(requests).toHaveLength(1);
    const request = requests[0];
    expect(request?.url).toBe("http://collector.test/v1/traces");
    const status = spanAttributes(request?.body ?? "{}").find(
      (attribute) => attribute.key === "reviewdiff.status"
    );
    expect(status?.value?.stringValue).toBe("error");
  });

  test("log and metric exports derive their endpoints", async () => {
    await runWith(
      {
        enabled: true,
        exporter: "otlp-http",
        endpoint: "http://collector.test/otel",
      },
      Effect.gen(function* () {
        const telemetry = yield* Telemetry;
        yield* telemetry.log("hello", { scope: "test" });
        yield* telemetry.metric("reviewdiff.chars", 12, { scope: "test" });
      })
    );
    expect(requests.map((request) => request.url)).toEqual([
      "http://collector.test/otel/v1/logs",
      "http://collector.test/otel/v1/metrics",
    ]);
  });

  test("encodes mixed attribute types", async () => {
    await runWith(
      {
        enabled: true,
        exporter: "otlp-http",
        endpoint: "http://collector.test/v1/traces",
      },
      Effect.gen(function* () {
        const telemetry = yield* Telemetry;
        yield* telemetry.span(
          "mixed",
          {
            command: "diff",
            ok: true,
            count: 3,
            ratio: 1.5,
            nested: { key: "value" },
            skip: undefined,
          },
          Effect.succeed("ok")
        );
      })
    );
    const byKey = new Map(
      spanAttributes(requests[0]?.body ?? "{}").map((attribute) => [
        attribute.key,
        attribute.value,
      ])
    );
    expect(byKey.get("command")?.stringValue).toBe("diff");
    expect(byKey.get("ok")?.boolValue).toBe(true);
    expect(byKey.get("count")?.intValue).toBe("3");
    expect(byKey.get("ratio")?.doubleValue).toBe(1.5);
    expect(byKey.get("nested")?.stringValue).toBe('{"key":"value"}');
    expect(byKey.has("skip")).toBe(false);
  });

  test("missing endpoint warns once and skips otlp exports", async () => {
    await runWith(
      { enabled: true, exporter: "otlp-http" },
      Effect.gen(function* () {
        const telemetry = yield* Telemetry;
        yield* telemetry.span("run", {}, Effect.succeed("ok"));
        yield* telemetry.log("hello");
        yield* telemetry.metric("metric", 1);
      })
    );
    expect(requests).toHaveLength(0);
    expect(warnings).toEqual([
      "Telemetry exporter enabled without endpoint; skipping OTLP export.",
    ]);
  });

  test("warns about slow spans even when export is disabled", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    await runWith(
      { enabled: false, exporter: "console", slowThresholdMs: 10 },
      Effect.gen(function* () {
        const telemetry = yield* Telemetry;
        yield* telemetry.span(
          "slow",
          {},
          Effect.sync(() => {
            vi.advanceTimersByTime(50);
          })
        );
        yield* telemetry.span("fast", {}, Effect.void);
      })
    );
    expect(warnings).toEqual([
      "Operation 'slow' took 50ms (threshold: 10ms)",
    ]);
  });
});
