import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import {
  type Config,
  type ConfigInput,
  type ConfigResolution,
  type ConfigSources,
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "@reviewdiff/core";
import { Effect } from "effect";

const truthyValues = new Set(["1", "true", "yes", "on"]);
const falsyValues = new Set(["0", "false", "no", "off"]);

type Env = Record<string, string | undefined>;

function invalidEnv(key: string, value: string, expected: string) {
  return new ConfigValidationError({
    source: "env",
    message: `Invalid ${expected} for ${key}: ${value}`,
  });
}

function parseBooleanEnv(env: Env, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (truthyValues.has(normalized)) {
    return true;
  }
  if (falsyValues.has(normalized)) {
    return false;
  }
  throw invalidEnv(key, value, "boolean");
}

function parseNumberEnv(env: Env, key: string): number | undefined {
  const value = env[key]?.trim();
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw invalidEnv(key, value, "number");
  }
  return parsed;
}

function parseTextEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function definedEntries(input: Record<string, unknown>) {
  return Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined)
  );
}

export function readEnvConfig(env: Env): ConfigInput {
  const engine = definedEntries({
    maxInputLength: parseNumberEnv(env, "REVIEWDIFF_MAX_INPUT_LENGTH"),
    suppressWhitespace: parseBooleanEnv(env, "REVIEWDIFF_SUPPRESS_WHITESPACE"),
  });
  const renderer = definedEntries({
    format: parseTextEnv(env, "REVIEWDIFF_RENDERER_FORMAT")?.toLowerCase(),
  });
  const telemetry = definedEntries({
    enabled: parseBooleanEnv(env, "REVIEWDIFF_TELEMETRY_ENABLED"),
    exporter: parseTextEnv(env, "REVIEWDIFF_TELEMETRY_EXPORTER")?.toLowerCase(),
    endpoint: parseTextEnv(env, "REVIEWDIFF_TELEMETRY_ENDPOINT"),
    slowThresholdMs: parseNumberEnv(env, "REVIEWDIFF_TELEMETRY_SLOW_MS"),
    logLevel: parseTextEnv(env, "REVIEWDIFF_LOG_LEVEL")?.toLowerCase(),
  });

  const raw: Record<string, unknown> = {};
  if (Object.keys(engine).length > 0) {
    raw.engine = engine;
  }
  if (Object.keys(renderer).length > 0) {
    raw.renderer = renderer;
  }
  if (Object.keys(telemetry).length > 0) {
    raw.telemetry = telemetry;
  }
  // Schema decoding checks literals and ranges, same as for files.
  return decodeConfigInput("env", raw);
}

function readConfigFile(path: string, source: "project" | "user") {
  if (!existsSync(path)) {
    return null;
  }
  return decodeConfigInputJson(source, readFileSync(path, "utf8"));
}

export interface ResolvedConfigOutput {
  config: Config;
  sources: ConfigSources;
  paths: {
    project: string;
    user: string;
  };
}

export interface ConfigLocations {
  cwd: string;
  home: string;
  env: Env;
}

export function configPaths(locations: Pick<ConfigLocations, "cwd" | "home">) {
  return {
    project: join(locations.cwd, "reviewdiff.config.json"),
    user: join(locations.home, ".config", "reviewdiff", "config.json"),
  };
}

/**
 * Layers defaults, the project file, the user file and the environment, in
 * that order, keeping the source of every field.
 */
export function resolveConfigFrom(
  locations: ConfigLocations
): ResolvedConfigOutput {
  const paths = configPaths(locations);
  let resolution: ConfigResolution = {
    value: defaultConfig,
    sources: defaultSources,
  };

  const projectConfig = readConfigFile(paths.project, "project");
  if (projectConfig) {
    resolution = mergeConfig(resolution, projectConfig, "project");
  }

  const userConfig = readConfigFile(paths.user, "user");
  if (userConfig) {
    resolution = mergeConfig(resolution, userConfig, "user");
  }

  resolution = mergeConfig(resolution, readEnvConfig(locations.env), "env");

  return {
    config: resolution.value,
    sources: resolution.sources,
    paths,
  };
}

export const resolveConfig = Effect.try({
  try: () =>
    resolveConfigFrom({
      cwd: process.cwd(),
      home: homedir(),
      env: process.env,
    }),
  catch: (error) =>
    error instanceof ConfigValidationError
      ? error
      : new ConfigValidationError({
          source: "config",
          message: error instanceof Error ? error.message : String(error),
        }),
});
