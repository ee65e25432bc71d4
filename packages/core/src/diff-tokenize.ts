export type TokenClass =
  | "cjk"
  | "latin-word"
  | "number"
  | "whitespace"
  | "formula"
  | "punctuation"
  | "other";

export interface TokenSpan {
  text: string;
  class: TokenClass;
  startIndex: number;
  endIndex: number;
}

const CJK_START = 0x4e_00;
const CJK_END = 0x9f_ff;
const LETTER_RE = /\p{L}/u;
const DIGIT_RE = /\p{Nd}/u;
const WHITESPACE_RE = /\s/u;
const PUNCTUATION_RE = /\p{P}/u;
const WORD_JOINERS = new Set(["-", "'", "’"]);

function charAt(text: string, index: number) {
  const code = text.codePointAt(index);
  return code === undefined ? "" : String.fromCodePoint(code);
}

function isCjk(char: string) {
  const code = char.codePointAt(0) ?? 0;
  return code >= CJK_START && code <= CJK_END;
}

function isWordLetter(char: string) {
  return char !== "" && LETTER_RE.test(char) && !isCjk(char);
}

function isDigit(char: string) {
  return char !== "" && DIGIT_RE.test(char);
}

function isWhitespace(char: string) {
  return char !== "" && WHITESPACE_RE.test(char);
}

function scanFormula(text: string, start: number): number | null {
  if (text.startsWith("$$", start)) {
    const close = text.indexOf("$$", start + 2);
    if (close !== -1) {
      return close + 2;
    }
  }
  let cursor = start + 1;
  while (cursor < text.length) {
    const char = text[cursor];
    if (char === "\n") {
      return null;
    }
    if (char === "$") {
      return cursor > start + 1 ? cursor + 1 : null;
    }
    cursor += 1;
  }
  return null;
}

function scanLetters(text: string, start: number, allowJoiners: boolean) {
  let cursor = start;
  while (cursor < text.length) {
    const char = charAt(text, cursor);
    if (isWordLetter(char)) {
      cursor += char.length;
      continue;
    }
    if (
      allowJoiners &&
      cursor > start &&
      WORD_JOINERS.has(char) &&
      isWordLetter(charAt(text, cursor + char.length))
    ) {
      cursor += char.length;
      continue;
    }
    break;
  }
  return cursor;
}

function scanNumber(text: string, start: number) {
  let cursor = start;
  while (cursor < text.length) {
    const char = charAt(text, cursor);
    if (isDigit(char)) {
      cursor += char.length;
      continue;
    }
    if (char === "." && isDigit(charAt(text, cursor + 1))) {
      cursor += 1;
      continue;
    }
    break;
  }
  return scanLetters(text, cursor, false);
}

function scanWhitespace(text: string, start: number) {
  let cursor = start;
  while (cursor < text.length) {
    const char = charAt(text, cursor);
    if (!isWhitespace(char)) {
      break;
    }
    cursor += char.length;
  }
  return cursor;
}

function nextSpan(
  text: string,
  start: number
): { end: number; class: TokenClass } {
  const char = charAt(text, start);
  if (char === "$") {
    const end = scanFormula(text, start);
    if (end !== null) {
      return { end, class: "formula" };
    }
  }
  if (isCjk(char)) {
    return { end: start + char.length, class: "cjk" };
  }
  if (isWordLetter(char)) {
    return { end: scanLetters(text, start, true), class: "latin-word" };
  }
  if (isDigit(char)) {
    return { end: scanNumber(text, start), class: "number" };
  }
  if (isWhitespace(char)) {
    return { end: scanWhitespace(text, start), class: "whitespace" };
  }
  return {
    end: start + char.length,
    class: PUNCTUATION_RE.test(char) ? "punctuation" : "other",
  };
}

export function tokenize(text: string): TokenSpan[] {
  const tokens: TokenSpan[] = [];
  let cursor = 0;
  while (cursor < text.length) {
    const span = nextSpan(text, cursor);
    tokens.push({
      text: text.slice(cursor, span.end),
      class: span.class,
      startIndex: cursor,
      endIndex: span.end,
    });
    cursor = span.end;
  }
  return tokens;
}

export function textForTokens(
  tokens: readonly TokenSpan[],
  startIndex: number,
  endIndex: number
) {
  let text = "";
  for (let i = Math.max(0, startIndex); i < endIndex; i += 1) {
    text += tokens[i]?.text ?? "";
  }
  return text;
}
