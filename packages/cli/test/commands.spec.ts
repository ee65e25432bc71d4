import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  type Config,
  defaultConfig,
  defaultSources,
  Telemetry,
} from "@reviewdiff/core";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  renderResolvedConfig,
  reportFailures,
  runDiff,
  runExtract,
  runRepair,
  runStrip,
  runValidate,
} from "../src/commands.js";

let dir = "";
let stdout: string[] = [];
let stderr: string[] = [];

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "reviewdiff-cli-"));
  stdout = [];
  stderr = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    stdout.push(args.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    stderr.push(args.map(String).join(" "));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
  process.exitCode = undefined;
});

function writeInput(name: string, contents: string) {
  const path = join(dir, name);
  writeFileSync(path, contents);
  return path;
}

const run = <E>(effect: Effect.Effect<void, E, Telemetry>) =>
  Effect.runPromise(effect.pipe(Effect.provide(Telemetry.Default)));

describe("diff command", () => {
  test("prints tagged output", async () => {
    await run(
      reportFailures(
        runDiff({
          originalPath: writeInput("a.txt", "The cat sat"),
          modifiedPath: writeInput("b.txt", "The dog sat"),
          format: "tagged",
          config: defaultConfig,
        })
      )
    );
    expect(stdout).toEqual(["The <false>cat</false><true>dog</true> sat"]);
    expect(process.exitCode).toBeUndefined();
  });

  test("prints a JSON report", async () => {
    await run(
      reportFailures(
        runDiff({
          originalPath: writeInput("a.txt", "Hello world"),
          modifiedPath: writeInput("b.txt", "Hello"),
          format: "json",
          config: defaultConfig,
        })
      )
    );
    expect(JSON.parse(stdout[0] ?? "{}")).toEqual({
      original: "Hello world",
      annotated: "Hello<false> world</false>",
      accepted: "Hello",
      summary: {
        deletions: 1,
        insertions: 0,
        deletedChars: 6,
        insertedChars: 0,
        balanced: true,
      },
    });
  });

  test("reports oversized input and fails the process", async () => {
    const config: Config = {
      ...defaultConfig,
      engine: { maxInputLength: 5, suppressWhitespace: true },
    };
    await run(
      reportFailures(
        runDiff({
          originalPath: writeInput("a.txt", "The cat sat"),
          modifiedPath: writeInput("b.txt", "x"),
          format: "tagged",
          config,
        })
      )
    );
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      "The original text has 11 characters; split it into parts of at most 5 characters.",
    ]);
    expect(process.exitCode).toBe(1);
  });

  test("reports unreadable input", async () => {
    const missing = join(dir, "missing.txt");
    await run(
      reportFailures(
        runDiff({
          originalPath: missing,
          modifiedPath: missing,
          format: "tagged",
          config: defaultConfig,
        })
      )
    );
    expect(stderr).toHaveLength(1);
    expect(stderr[0]?.startsWith(`Failed to read ${missing}: `)).toBe(true);
    expect(process.exitCode).toBe(1);
  });
});

describe("annotation commands", () => {
  const annotated = "keep <false>old</false><true>new";

  test("extract prints the accepted text", async () => {
    await Effect.runPromise(
      reportFailures(runExtract(writeInput("in.txt", annotated)))
    );
    expect(stdout).toEqual(["keep new"]);
  });

  test("strip keeps both versions", async () => {
    await Effect.runPromise(
      reportFailures(runStrip(writeInput("in.txt", annotated)))
    );
    expect(stdout).toEqual(["keep oldnew"]);
  });

  test("repair closes open markers", async () => {
    await Effect.runPromise(
      reportFailures(runRepair(writeInput("in.txt", annotated)))
    );
    expect(stdout).toEqual(["keep <false>old</false><true>new</true>"]);
  });

  test("validate reports imbalance with a failing exit code", async () => {
    await Effect.runPromise(
      reportFailures(runValidate(writeInput("in.txt", annotated)))
    );
    expect(stderr).toEqual([
      "<true> markers are unbalanced: 1 opening, 0 closing",
    ]);
    expect(process.exitCode).toBe(1);
  });

  test("validate accepts balanced markers", async () => {
    await Effect.runPromise(
      reportFailures(
        runValidate(writeInput("in.txt", "<false>a</false><true>b</true>"))
      )
    );
    expect(stdout).toEqual(["Markers are balanced."]);
    expect(process.exitCode).toBeUndefined();
  });
});

describe("config output", () => {
  test("renders config with provenance as JSON", () => {
    const json = renderResolvedConfig({
      config: defaultConfig,
      sources: defaultSources,
      paths: { project: "/work/reviewdiff.config.json", user: "/home/config.json" },
    });
    expect(JSON.parse(json)).toEqual({
      config: {
        engine: { maxInputLength: 100_000, suppressWhitespace: true },
        renderer: { format: "tagged" },
        telemetry: {
          enabled: false,
          exporter: "console",
          slowThresholdMs: 1000,
          logLevel: "info",
        },
      },
      sources: defaultSources,
      paths: { project: "/work/reviewdiff.config.json", user: "/home/config.json" },
    });
  });
});
