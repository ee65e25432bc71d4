import { describe, expect, test } from "vitest";
import {
  countTags,
  repairTags,
  tagBalanceIssues,
  validateTags,
} from "../src/tag-balance.js";

describe("validateTags", () => {
  test("accepts balanced markers and plain text", () => {
    expect(validateTags("<false>a</false><true>b</true>")).toBe(true);
    expect(validateTags("no markers")).toBe(true);
  });

  test("rejects a missing closing marker", () => {
    expect(validateTags("<false>a")).toBe(false);
    expect(validateTags("a</true>")).toBe(false);
  });

  test("countTags counts each marker literal", () => {
    expect(countTags("<false><false></false><true>")).toEqual({
      falseOpen: 2,
      falseClose: 1,
      trueOpen: 1,
      trueClose: 0,
    });
  });
});

describe("tagBalanceIssues", () => {
  test("reports each unbalanced kind with its counts", () => {
    expect(tagBalanceIssues("<false>a<true>b</true></true>")).toEqual([
      {
        kind: "false",
        opens: 1,
        closes: 0,
        message: "<false> markers are unbalanced: 1 opening, 0 closing",
      },
      {
        kind: "true",
        opens: 1,
        closes: 2,
        message: "<true> markers are unbalanced: 1 opening, 2 closing",
      },
    ]);
  });

  test("is empty for balanced text", () => {
    expect(tagBalanceIssues("<true>x</true>")).toEqual([]);
  });
});

describe("repairTags", () => {
  test("appends a missing closing marker at the end", () => {
    expect(repairTags("<false>a")).toBe("<false>a</false>");
  });

  test("closes the last opened marker first", () => {
    expect(repairTags("<false>a<true>b")).toBe("<false>a<true>b</true></false>");
  });

  test("drops closing markers that close nothing", () => {
    expect(repairTags("a</false>b<true>c")).toBe("ab<true>c</true>");
  });

  test("rescans when dropping a marker forms a new one", () => {
    expect(repairTags("<fal</true>se>x")).toBe("<false>x</false>");
  });

  test("leaves balanced text untouched", () => {
    const text = "keep <false>old</false><true>new</true> text";
    expect(repairTags(text)).toBe(text);
  });

  test("leaves a kind with matching counts as it is", () => {
    expect(repairTags("</false>x<false>")).toBe("</false>x<false>");
    expect(repairTags("</false>x<false><true>y")).toBe(
      "</false>x<false><true>y</true>"
    );
  });

  test("appends only as many closers as a kind is missing", () => {
    expect(repairTags("</false>a<false><false>b")).toBe(
      "</false>a<false><false>b</false>"
    );
  });

  test("drops only the closers without an opener before them", () => {
    expect(repairTags("</true>a<true>b</true></true>")).toBe(
      "a<true>b</true>"
    );
  });

  test("is idempotent and always balanced", () => {
    const samples = [
      "<false>a<true>b",
      "</true></false><true>",
      "<true><true>x</false>",
      "<fal</true>se>x<tr</false>ue>",
      "",
    ];
    for (const sample of samples) {
      const repaired = repairTags(sample);
      expect(repairTags(repaired)).toBe(repaired);
      expect(validateTags(repaired)).toBe(true);
    }
  });
});
