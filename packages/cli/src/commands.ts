import { readFileSync } from "node:fs";
import {
  type Config,
  ConfigSchema,
  ConfigValidationError,
  Correction,
  computeDiffEffect,
  extractFinal,
  InputTooLargeError,
  renderCorrectionJson,
  repairTags,
  stripTags,
  summarizeAnnotations,
  tagBalanceIssues,
  Telemetry,
} from "@reviewdiff/core";
import { Console, Effect, Schema } from "effect";
import type { ResolvedConfigOutput } from "./config/resolve.js";

export type OutputFormat = Config["renderer"]["format"];

export class CliSystemError extends Schema.TaggedError<CliSystemError>()(
  "CliSystemError",
  {
    operation: Schema.String,
    error: Schema.Defect,
  }
) {}

export function readInput(path: string) {
  return Effect.try({
    try: () => readFileSync(path === "-" ? 0 : path, "utf8"),
    catch: (error) =>
      new CliSystemError({ operation: `read ${path}`, error }),
  });
}

function describeDefect(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

const failWithExitCode = (message: string) =>
  Console.error(message).pipe(
    Effect.zipRight(
      Effect.sync(() => {
        process.exitCode = 1;
      })
    )
  );

/**
 * Prints failures to stderr and marks the process as failed instead of
 * letting the runtime dump a cause.
 */
export function reportFailures<A, R>(
  effect: Effect.Effect<
    A,
    InputTooLargeError | ConfigValidationError | CliSystemError,
    R
  >
) {
  return effect.pipe(
    Effect.asVoid,
    Effect.catchTags({
      InputTooLargeError: (error: InputTooLargeError) =>
        failWithExitCode(error.message),
      ConfigValidationError: (error: ConfigValidationError) =>
        failWithExitCode(`Invalid ${error.source} config: ${error.message}`),
      CliSystemError: (error: CliSystemError) =>
        failWithExitCode(
          `Failed to ${error.operation}: ${describeDefect(error.error)}`
        ),
    })
  );
}

export function runDiff(params: {
  originalPath: string;
  modifiedPath: string;
  format: OutputFormat;
  config: Config;
}) {
  return Effect.gen(function* () {
    const telemetry = yield* Telemetry;
    const original = yield* readInput(params.originalPath);
    const modified = yield* readInput(params.modifiedPath);
    const annotated = yield* telemetry.span(
      "diff",
      {
        originalLength: original.length,
        modifiedLength: modified.length,
        format: params.format,
      },
      computeDiffEffect(original, modified, params.config.engine)
    );
    const summary = summarizeAnnotations(annotated);
    yield* telemetry.metric("reviewdiff.diff.deletions", summary.deletions);
    yield* telemetry.metric("reviewdiff.diff.insertions", summary.insertions);
    yield* telemetry.log("diff_complete", { ...summary });
    if (params.format === "json") {
      yield* Console.log(
        renderCorrectionJson(new Correction({ original, annotated }))
      );
      return;
    }
    yield* Console.log(annotated);
  });
}

export function runExtract(path: string) {
  return readInput(path).pipe(
    Effect.flatMap((text) => Console.log(extractFinal(text)))
  );
}

export function runStrip(path: string) {
  return readInput(path).pipe(
    Effect.flatMap((text) => Console.log(stripTags(text)))
  );
}

export function runRepair(path: string) {
  return readInput(path).pipe(
    Effect.flatMap((text) => Console.log(repairTags(text)))
  );
}

export function runValidate(path: string) {
  return Effect.gen(function* () {
    const text = yield* readInput(path);
    const issues = tagBalanceIssues(text);
    if (issues.length === 0) {
      yield* Console.log("Markers are balanced.");
      return;
    }
    for (const issue of issues) {
      yield* Console.error(issue.message);
    }
    yield* Effect.sync(() => {
      process.exitCode = 1;
    });
  });
}

const ConfigSourceSchema = Schema.Literal("default", "project", "user", "env");
const ResolvedConfigOutputSchema = Schema.Struct({
  config: ConfigSchema,
  sources: Schema.Struct({
    engine: Schema.Struct({
      maxInputLength: ConfigSourceSchema,
      suppressWhitespace: ConfigSourceSchema,
    }),
    renderer: Schema.Struct({
      format: ConfigSourceSchema,
    }),
    telemetry: Schema.Struct({
      enabled: ConfigSourceSchema,
      exporter: ConfigSourceSchema,
      endpoint: ConfigSourceSchema,
      slowThresholdMs: ConfigSourceSchema,
    }),
  }),
  paths: Schema.Struct({
    project: Schema.String,
    user: Schema.String,
  }),
});
const ResolvedConfigOutputJson = Schema.parseJson(ResolvedConfigOutputSchema, {
  space: 2,
});

export function renderResolvedConfig(resolved: ResolvedConfigOutput) {
  return Schema.encodeSync(ResolvedConfigOutputJson)(resolved);
}
