import { Schema } from "effect";
import { LOG_LEVELS } from "./logger.js";

export class ConfigValidationError extends Schema.TaggedError<ConfigValidationError>()(
  "ConfigValidationError",
  {
    source: Schema.String,
    message: Schema.String,
  }
) {}

const EngineConfigSchema = Schema.Struct({
  maxInputLength: Schema.Int.pipe(Schema.positive()),
  suppressWhitespace: Schema.Boolean,
});

const RendererConfigSchema = Schema.Struct({
  format: Schema.Literal("tagged", "json"),
});

const TelemetryConfigSchema = Schema.Struct({
  enabled: Schema.Boolean,
  exporter: Schema.Literal("console", "otlp-http"),
  endpoint: Schema.optional(Schema.String),
  slowThresholdMs: Schema.NonNegative,
  logLevel: Schema.Literal(...LOG_LEVELS),
});

export const ConfigSchema = Schema.Struct({
  engine: EngineConfigSchema,
  renderer: RendererConfigSchema,
  telemetry: TelemetryConfigSchema,
});

export const ConfigInputSchema = Schema.Struct({
  engine: Schema.optional(Schema.partial(EngineConfigSchema)),
  renderer: Schema.optional(Schema.partial(RendererConfigSchema)),
  telemetry: Schema.optional(Schema.partial(TelemetryConfigSchema)),
});
const ConfigInputJsonSchema = Schema.parseJson(ConfigInputSchema);

export type Config = Schema.Schema.Type<typeof ConfigSchema>;
export type ConfigInput = Schema.Schema.Type<typeof ConfigInputSchema>;
export type EngineConfig = Schema.Schema.Type<typeof EngineConfigSchema>;

export type ConfigSource = "default" | "project" | "user" | "env";

type SourcesOf<T> = { [K in keyof T]-?: ConfigSource };

export interface ConfigSources {
  engine: SourcesOf<Config["engine"]>;
  renderer: SourcesOf<Config["renderer"]>;
  telemetry: SourcesOf<Config["telemetry"]>;
}

export interface ConfigResolution {
  value: Config;
  sources: ConfigSources;
}

type Mutable<T> = { -readonly [K in keyof T]: Mutable<T[K]> };

export const defaultConfig: Config = {
  engine: {
    maxInputLength: 100_000,
    suppressWhitespace: true,
  },
  renderer: {
    format: "tagged",
  },
  telemetry: {
    enabled: false,
    exporter: "console",
    slowThresholdMs: 1000,
    logLevel: "info",
  },
};

export const defaultSources: ConfigSources = {
  engine: {
    maxInputLength: "default",
    suppressWhitespace: "default",
  },
  renderer: {
    format: "default",
  },
  telemetry: {
    enabled: "default",
    exporter: "default",
    endpoint: "default",
    slowThresholdMs: "default",
    logLevel: "default",
  },
};

function toValidationError(source: string, error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return new ConfigValidationError({ source, message });
}

export function decodeConfigInput(source: string, input: unknown): ConfigInput {
  try {
    return Schema.decodeUnknownSync(ConfigInputSchema)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    throw toValidationError(source, error);
  }
}

export function decodeConfigInputJson(
  source: string,
  input: string
): ConfigInput {
  try {
    return Schema.decodeUnknownSync(ConfigInputJsonSchema)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    throw toValidationError(source, error);
  }
}

export function mergeConfig(
  current: ConfigResolution,
  overrides: ConfigInput,
  source: ConfigSource
): ConfigResolution {
  const next: Mutable<ConfigResolution> = {
    value: {
      engine: { ...current.value.engine },
      renderer: { ...current.value.renderer },
      telemetry: { ...current.value.telemetry },
    },
    sources: {
      engine: { ...current.sources.engine },
      renderer: { ...current.sources.renderer },
      telemetry: { ...current.sources.telemetry },
    },
  };

  const applyEngine = <K extends keyof Config["engine"]>(
    key: K,
    value: Config["engine"][K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.engine[key] = value;
      next.sources.engine[key] = source;
    }
  };
  const applyRenderer = <K extends keyof Config["renderer"]>(
    key: K,
    value: Config["renderer"][K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.renderer[key] = value;
      next.sources.renderer[key] = source;
    }
  };
  const applyTelemetry = <K extends keyof Config["telemetry"]>(
    key: K,
    value: Config["telemetry"][K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.telemetry[key] = value;
      next.sources.telemetry[key] = source;
    }
  };

  if (overrides.engine) {
    applyEngine("maxInputLength", overrides.engine.maxInputLength);
    applyEngine("suppressWhitespace", overrides.engine.suppressWhitespace);
  }

  if (overrides.renderer) {
    applyRenderer("format", overrides.renderer.format);
  }

  if (overrides.telemetry) {
    applyTelemetry("enabled", overrides.telemetry.enabled);
    applyTelemetry("exporter", overrides.telemetry.exporter);
    applyTelemetry("endpoint", overrides.telemetry.endpoint);
    applyTelemetry("slowThresholdMs", overrides.telemetry.slowThresholdMs);
    applyTelemetry("logLevel", overrides.telemetry.logLevel);
  }

  return next;
}
