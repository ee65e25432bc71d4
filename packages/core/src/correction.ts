import { Schema } from "effect";
import { computeDiff, type DiffOptions } from "./diff.js";
import { repairTags, validateTags } from "./tag-balance.js";
import { extractFinal, stripTags } from "./tag-extract.js";
import { scanTags } from "./tag-scan.js";

export interface AnnotationSummary {
  deletions: number;
  insertions: number;
  deletedChars: number;
  insertedChars: number;
  balanced: boolean;
}

export function summarizeAnnotations(annotated: string): AnnotationSummary {
  const summary: AnnotationSummary = {
    deletions: 0,
    insertions: 0,
    deletedChars: 0,
    insertedChars: 0,
    balanced: validateTags(annotated),
  };
  let falseDepth = 0;
  let trueDepth = 0;
  for (const token of scanTags(annotated)) {
    switch (token.type) {
      case "false-open":
        if (falseDepth === 0) {
          summary.deletions += 1;
        }
        falseDepth += 1;
        break;
      case "false-close":
        falseDepth = Math.max(0, falseDepth - 1);
        break;
      case "true-open":
        if (trueDepth === 0) {
          summary.insertions += 1;
        }
        trueDepth += 1;
        break;
      case "true-close":
        trueDepth = Math.max(0, trueDepth - 1);
        break;
      default:
        if (falseDepth > 0) {
          summary.deletedChars += token.text.length;
        } else if (trueDepth > 0) {
          summary.insertedChars += token.text.length;
        }
    }
  }
  return summary;
}

/**
 * One reviewed text: the baseline and its annotated edit. The accepted text
 * is always read back from `annotated`.
 */
export class Correction extends Schema.Class<Correction>("Correction")({
  original: Schema.String,
  annotated: Schema.String,
}) {
  get accepted(): string {
    return extractFinal(this.annotated);
  }

  get stripped(): string {
    return stripTags(this.annotated);
  }

  get summary(): AnnotationSummary {
    return summarizeAnnotations(this.annotated);
  }
}

export function createCorrection(
  original: string,
  modified: string,
  options: DiffOptions = {}
) {
  return new Correction({
    original,
    annotated: computeDiff(original, modified, options),
  });
}

export function reviseCorrection(correction: Correction, annotated: string) {
  return new Correction({
    original: correction.original,
    annotated: repairTags(annotated),
  });
}
