import { fileURLToPath } from "node:url";

export const packageName = "@reviewdiff/test-corpus";

export interface Fixture {
  id: string;
  language: string;
  description: string;
  originalPath: string;
  modifiedPath: string;
  annotatedPath: string;
}

const baseUrl = new URL("../fixtures/", import.meta.url);

function resolveFixture(path: string) {
  return fileURLToPath(new URL(path, baseUrl));
}

function fixture(id: string, language: string, description: string): Fixture {
  return {
    id,
    language,
    description,
    originalPath: resolveFixture(`${id}/original.txt`),
    modifiedPath: resolveFixture(`${id}/modified.txt`),
    annotatedPath: resolveFixture(`${id}/annotated.txt`),
  };
}

const fixtures: Fixture[] = [
  fixture("cjk", "zh", "One character replaced by two inside a CJK sentence."),
  fixture(
    "formula-units",
    "en",
    "Formula and unit-suffixed number each replaced as a whole."
  ),
  fixture("prose", "en", "Two single-word substitutions in one sentence."),
  fixture("spacing", "en", "Respacing alone produces no markers."),
];

export function listFixtures() {
  return fixtures.slice();
}
