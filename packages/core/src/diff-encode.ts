import type { EditOp } from "./diff-align.js";
import { textForTokens, type TokenSpan } from "./diff-tokenize.js";
import { FALSE_CLOSE, FALSE_OPEN, TRUE_CLOSE, TRUE_OPEN } from "./tag-scan.js";

export type SegmentKind = "plain" | "deleted" | "inserted";

export interface Segment {
  kind: SegmentKind;
  text: string;
}

export interface EncodeOptions {
  suppressWhitespace?: boolean;
}

const WHITESPACE_ONLY_RE = /^\s+$/u;

function isWhitespaceOnly(text: string) {
  return WHITESPACE_ONLY_RE.test(text);
}

export function segmentsForOps(
  original: readonly TokenSpan[],
  modified: readonly TokenSpan[],
  ops: readonly EditOp[]
): Segment[] {
  const segments: Segment[] = [];
  const deleted = (op: EditOp) => ({
    kind: "deleted" as const,
    text: textForTokens(original, op.original.start, op.original.end),
  });
  const inserted = (op: EditOp) => ({
    kind: "inserted" as const,
    text: textForTokens(modified, op.modified.start, op.modified.end),
  });
  for (const op of ops) {
    switch (op.kind) {
      case "equal":
        segments.push({
          kind: "plain",
          text: textForTokens(original, op.original.start, op.original.end),
        });
        break;
      case "delete":
        segments.push(deleted(op));
        break;
      case "insert":
        segments.push(inserted(op));
        break;
      case "replace":
        segments.push(deleted(op), inserted(op));
        break;
      default:
        break;
    }
  }
  return segments;
}

export function mergeSegments(segments: readonly Segment[]): Segment[] {
  const merged: Segment[] = [];
  for (const segment of segments) {
    if (segment.text.length === 0) {
      continue;
    }
    const last = merged.at(-1);
    if (last && last.kind === segment.kind) {
      last.text += segment.text;
      continue;
    }
    merged.push({ ...segment });
  }
  return merged;
}

// Spacing-only edits render as plain text. A deleted gap that is re-spaced
// right away keeps only the new spacing.
export function suppressWhitespaceSegments(
  segments: readonly Segment[]
): Segment[] {
  const result: Segment[] = [];
  for (let i = 0; i < segments.length; i += 1) {
    const segment = segments[i];
    if (!segment) {
      continue;
    }
    if (segment.kind === "plain" || !isWhitespaceOnly(segment.text)) {
      result.push(segment);
      continue;
    }
    const next = segments[i + 1];
    if (
      segment.kind === "deleted" &&
      next?.kind === "inserted" &&
      isWhitespaceOnly(next.text)
    ) {
      continue;
    }
    result.push({ kind: "plain", text: segment.text });
  }
  return mergeSegments(result);
}

export function renderSegments(segments: readonly Segment[]) {
  return segments
    .map((segment) => {
      switch (segment.kind) {
        case "deleted":
          return `${FALSE_OPEN}${segment.text}${FALSE_CLOSE}`;
        case "inserted":
          return `${TRUE_OPEN}${segment.text}${TRUE_CLOSE}`;
        default:
          return segment.text;
      }
    })
    .join("");
}

export function encode(
  original: readonly TokenSpan[],
  modified: readonly TokenSpan[],
  ops: readonly EditOp[],
  options: EncodeOptions = {}
) {
  const merged = mergeSegments(segmentsForOps(original, modified, ops));
  const segments =
    options.suppressWhitespace === false
      ? merged
      : suppressWhitespaceSegments(merged);
  return renderSegments(segments);
}
