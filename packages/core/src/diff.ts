import { Effect } from "effect";
import { align } from "./diff-align.js";
import { encode } from "./diff-encode.js";
import { tokenize } from "./diff-tokenize.js";
import { InputTooLargeError } from "./errors.js";
import { FALSE_CLOSE, FALSE_OPEN, TRUE_CLOSE, TRUE_OPEN } from "./tag-scan.js";
import { stripTags } from "./tag-extract.js";

export const DEFAULT_MAX_INPUT_LENGTH = 100_000;

export interface DiffOptions {
  maxInputLength?: number;
  suppressWhitespace?: boolean;
}

export function checkInputSize(
  original: string,
  modified: string,
  limit = DEFAULT_MAX_INPUT_LENGTH
): InputTooLargeError | null {
  if (original.length > limit) {
    return new InputTooLargeError({
      side: "original",
      length: original.length,
      limit,
    });
  }
  if (modified.length > limit) {
    return new InputTooLargeError({
      side: "modified",
      length: modified.length,
      limit,
    });
  }
  return null;
}

function annotate(original: string, modified: string, options: DiffOptions) {
  // Inputs are plain text; marker literals inside them would break the grammar.
  const oldText = stripTags(original);
  const newText = stripTags(modified);
  if (oldText === newText) {
    return oldText;
  }
  if (oldText.length === 0) {
    return `${TRUE_OPEN}${newText}${TRUE_CLOSE}`;
  }
  if (newText.length === 0) {
    return `${FALSE_OPEN}${oldText}${FALSE_CLOSE}`;
  }
  const oldTokens = tokenize(oldText);
  const newTokens = tokenize(newText);
  const ops = align(oldTokens, newTokens);
  return encode(
    oldTokens,
    newTokens,
    ops,
    options.suppressWhitespace === undefined
      ? {}
      : { suppressWhitespace: options.suppressWhitespace }
  );
}

/**
 * Annotates the edit from `original` to `modified` with `<false>` (removed)
 * and `<true>` (added) markers. Throws {@link InputTooLargeError} when either
 * side exceeds the configured length.
 */
export function computeDiff(
  original: string,
  modified: string,
  options: DiffOptions = {}
): string {
  const tooLarge = checkInputSize(original, modified, options.maxInputLength);
  if (tooLarge) {
    throw tooLarge;
  }
  return annotate(original, modified, options);
}

export function computeDiffEffect(
  original: string,
  modified: string,
  options: DiffOptions = {}
): Effect.Effect<string, InputTooLargeError> {
  return Effect.suspend(() => {
    const tooLarge = checkInputSize(original, modified, options.maxInputLength);
    if (tooLarge) {
      return Effect.fail(tooLarge);
    }
    return Effect.sync(() => annotate(original, modified, options));
  });
}
