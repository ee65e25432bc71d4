export const FALSE_OPEN = "<false>";
export const FALSE_CLOSE = "</false>";
export const TRUE_OPEN = "<true>";
export const TRUE_CLOSE = "</true>";

export type MarkerType = "false-open" | "false-close" | "true-open" | "true-close";

export type TagToken =
  | { type: "plain"; text: string }
  | { type: MarkerType };

const MARKERS: ReadonlyArray<readonly [string, MarkerType]> = [
  [FALSE_OPEN, "false-open"],
  [FALSE_CLOSE, "false-close"],
  [TRUE_OPEN, "true-open"],
  [TRUE_CLOSE, "true-close"],
];

const markerText: Record<MarkerType, string> = {
  "false-open": FALSE_OPEN,
  "false-close": FALSE_CLOSE,
  "true-open": TRUE_OPEN,
  "true-close": TRUE_CLOSE,
};

function markerAt(text: string, index: number) {
  for (const [literal, type] of MARKERS) {
    if (text.startsWith(literal, index)) {
      return { literal, type };
    }
  }
  return null;
}

/**
 * Splits annotated text into plain runs and marker tokens in one pass.
 * Anything that is not exactly one of the four markers stays plain, so a
 * stray `<` or an unknown tag never fails the scan.
 */
export function scanTags(text: string): TagToken[] {
  const tokens: TagToken[] = [];
  let plainStart = 0;
  let cursor = text.indexOf("<");
  while (cursor !== -1) {
    const marker = markerAt(text, cursor);
    if (!marker) {
      cursor = text.indexOf("<", cursor + 1);
      continue;
    }
    if (cursor > plainStart) {
      tokens.push({ type: "plain", text: text.slice(plainStart, cursor) });
    }
    tokens.push({ type: marker.type });
    plainStart = cursor + marker.literal.length;
    cursor = text.indexOf("<", plainStart);
  }
  if (plainStart < text.length) {
    tokens.push({ type: "plain", text: text.slice(plainStart) });
  }
  return tokens;
}

export function renderTagTokens(tokens: readonly TagToken[]) {
  return tokens
    .map((token) =>
      token.type === "plain" ? token.text : markerText[token.type]
    )
    .join("");
}
