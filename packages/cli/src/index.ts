import { Args, Command, Options } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { setLogLevel, TelemetryLive } from "@reviewdiff/core";
import { Console, Effect, Option } from "effect";
import { normalizeArgv } from "./argv.js";
import {
  renderResolvedConfig,
  reportFailures,
  runDiff,
  runExtract,
  runRepair,
  runStrip,
  runValidate,
} from "./commands.js";
import { resolveConfig } from "./config/resolve.js";

const inputArg = (name: string) =>
  Args.text({ name }).pipe(
    Args.withDescription(`Path to the ${name} text, or - for stdin.`)
  );

const formatOption = Options.choice("format", ["tagged", "json"] as const).pipe(
  Options.optional,
  Options.withDescription(
    "Output format (defaults to renderer.format from config)."
  )
);

const diffCommand = Command.make(
  "diff",
  {
    original: inputArg("original"),
    modified: inputArg("modified"),
    format: formatOption,
  },
  ({ original, modified, format }) =>
    reportFailures(
      Effect.gen(function* () {
        const resolved = yield* resolveConfig;
        yield* Effect.sync(() => setLogLevel(resolved.config.telemetry.logLevel));
        yield* runDiff({
          originalPath: original,
          modifiedPath: modified,
          format: Option.getOrElse(format, () => resolved.config.renderer.format),
          config: resolved.config,
        }).pipe(Effect.provide(TelemetryLive(resolved.config.telemetry)));
      })
    )
).pipe(
  Command.withDescription(
    "Annotate the edit between two texts with <false>/<true> markers."
  )
);

const extractCommand = Command.make(
  "extract",
  { file: inputArg("annotated") },
  ({ file }) => reportFailures(runExtract(file))
).pipe(Command.withDescription("Print the accepted text of an annotation."));

const stripCommand = Command.make(
  "strip",
  { file: inputArg("annotated") },
  ({ file }) => reportFailures(runStrip(file))
).pipe(Command.withDescription("Remove all markers, keeping both versions."));

const validateCommand = Command.make(
  "validate",
  { file: inputArg("annotated") },
  ({ file }) => reportFailures(runValidate(file))
).pipe(Command.withDescription("Check that markers are balanced."));

const repairCommand = Command.make(
  "repair",
  { file: inputArg("annotated") },
  ({ file }) => reportFailures(runRepair(file))
).pipe(Command.withDescription("Balance markers in a hand-edited annotation."));

const configCommand = Command.make("config", {}, () =>
  reportFailures(
    resolveConfig.pipe(
      Effect.flatMap((resolved) => Console.log(renderResolvedConfig(resolved)))
    )
  )
).pipe(Command.withDescription("Print resolved config with provenance."));

const app = Command.make("reviewdiff", {}, () => Effect.void).pipe(
  Command.withSubcommands([
    diffCommand,
    extractCommand,
    stripCommand,
    validateCommand,
    repairCommand,
    configCommand,
  ])
);

const cli = Command.run(app, {
  name: "reviewdiff",
  version: "0.1.0",
});

cli(normalizeArgv(process.argv)).pipe(
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain
);
