import { existsSync, readFileSync } from "node:fs";
import {
  computeDiff,
  extractFinal,
  stripTags,
  validateTags,
} from "@reviewdiff/core";
import { describe, expect, test } from "vitest";
import { listFixtures } from "../src/index.js";

const read = (path: string) => readFileSync(path, "utf8");

describe("test corpus fixtures", () => {
  test("fixtures resolve to files with content", () => {
    const fixtures = listFixtures();
    expect(fixtures.map((fixture) => fixture.id)).toEqual([
      "cjk",
      "formula-units",
      "prose",
      "spacing",
    ]);
    for (const fixture of fixtures) {
      for (const path of [
        fixture.originalPath,
        fixture.modifiedPath,
        fixture.annotatedPath,
      ]) {
        expect(existsSync(path)).toBe(true);
        expect(read(path).length).toBeGreaterThan(0);
      }
    }
  });

  test.each(listFixtures().map((fixture) => [fixture.id, fixture] as const))(
    "%s annotates as recorded",
    (_id, fixture) => {
      const original = read(fixture.originalPath);
      const modified = read(fixture.modifiedPath);
      const annotated = computeDiff(original, modified);
      expect(annotated).toBe(read(fixture.annotatedPath));
      expect(validateTags(annotated)).toBe(true);
      expect(extractFinal(annotated)).toBe(modified);
    }
  );

  test("stripping a recorded annotation keeps every word", () => {
    const prose = listFixtures().find((fixture) => fixture.id === "prose");
    expect(prose).toBeDefined();
    if (prose) {
      expect(stripTags(read(prose.annotatedPath))).toBe(
        "The quick brownred fox jumpsleaps over the lazy dog.\n"
      );
    }
  });
});
