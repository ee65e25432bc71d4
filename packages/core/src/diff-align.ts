import type { TokenSpan } from "./diff-tokenize.js";

export type EditKind = "equal" | "delete" | "insert" | "replace";

export interface IndexRange {
  start: number;
  end: number;
}

export interface EditOp {
  kind: EditKind;
  original: IndexRange;
  modified: IndexRange;
}

export interface MatchingBlock {
  originalStart: number;
  modifiedStart: number;
  size: number;
}

interface Window {
  originalStart: number;
  originalEnd: number;
  modifiedStart: number;
  modifiedEnd: number;
}

interface TokenIndex {
  positions: ReadonlyMap<number, readonly number[]>;
  popular: ReadonlySet<number>;
}

interface Run {
  end: number;
  size: number;
}

// Frequent tokens (spaces, common words) in long texts cannot start a match,
// which keeps every window close to linear. Matches still run through them.
const POPULAR_MIN_LENGTH = 200;
// Windows at most this many cells are searched exactly, frequent tokens included.
const EXACT_SEARCH_CELLS = 40_000;

function internValues(original: readonly string[], modified: readonly string[]) {
  const ids = new Map<string, number>();
  const intern = (value: string) => {
    const existing = ids.get(value);
    if (existing !== undefined) {
      return existing;
    }
    ids.set(value, ids.size);
    return ids.size - 1;
  };
  return { a: original.map(intern), b: modified.map(intern) };
}

function buildIndex(
  b: readonly number[],
  start: number,
  end: number,
  dropPopular: boolean
): TokenIndex {
  const positions = new Map<number, number[]>();
  for (let j = start; j < end; j += 1) {
    const value = b[j] ?? -1;
    const existing = positions.get(value);
    if (existing) {
      existing.push(j);
    } else {
      positions.set(value, [j]);
    }
  }
  const popular = new Set<number>();
  const length = end - start;
  if (dropPopular && length >= POPULAR_MIN_LENGTH) {
    const limit = Math.floor(length / 100) + 1;
    for (const [value, list] of positions) {
      if (list.length > limit) {
        popular.add(value);
      }
    }
    for (const value of popular) {
      positions.delete(value);
    }
  }
  return { positions, popular };
}

function lowerBound(list: readonly number[], value: number) {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    if ((list[middle] ?? value) < value) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  return low;
}

function extendRuns(
  live: readonly Run[],
  list: readonly number[],
  window: Window
): Run[] {
  const next: Run[] = [];
  let cursor = 0;
  for (let k = lowerBound(list, window.modifiedStart); k < list.length; k += 1) {
    const j = list[k] ?? window.modifiedEnd;
    if (j >= window.modifiedEnd) {
      break;
    }
    while (cursor < live.length && (live[cursor]?.end ?? j) < j - 1) {
      cursor += 1;
    }
    const previous = live[cursor];
    const size = previous && previous.end === j - 1 ? previous.size + 1 : 1;
    next.push({ end: j, size });
  }
  return next;
}

function continueRuns(
  live: readonly Run[],
  b: readonly number[],
  value: number,
  window: Window
): Run[] {
  const next: Run[] = [];
  for (const run of live) {
    const j = run.end + 1;
    if (j < window.modifiedEnd && b[j] === value) {
      next.push({ end: j, size: run.size + 1 });
    }
  }
  return next;
}

function commonAffix(a: readonly number[], b: readonly number[], window: Window) {
  const limit = Math.min(
    window.originalEnd - window.originalStart,
    window.modifiedEnd - window.modifiedStart
  );
  let prefix = 0;
  while (
    prefix < limit &&
    a[window.originalStart + prefix] === b[window.modifiedStart + prefix]
  ) {
    prefix += 1;
  }
  if (prefix > 0) {
    return {
      originalStart: window.originalStart,
      modifiedStart: window.modifiedStart,
      size: prefix,
    };
  }
  let suffix = 0;
  while (
    suffix < limit &&
    a[window.originalEnd - suffix - 1] === b[window.modifiedEnd - suffix - 1]
  ) {
    suffix += 1;
  }
  return {
    originalStart: window.originalEnd - suffix,
    modifiedStart: window.modifiedEnd - suffix,
    size: suffix,
  };
}

// Blocks of equal size are resolved in favour of the smallest original start,
// then the smallest modified start: rows are scanned in ascending order and a
// block only replaces the best on a strictly longer run.
function findLongestMatch(
  a: readonly number[],
  b: readonly number[],
  index: TokenIndex,
  window: Window
): MatchingBlock {
  let best: MatchingBlock = {
    originalStart: window.originalStart,
    modifiedStart: window.modifiedStart,
    size: 0,
  };
  let live: Run[] = [];
  for (let i = window.originalStart; i < window.originalEnd; i += 1) {
    const value = a[i] ?? -1;
    const list = index.positions.get(value);
    if (list) {
      live = extendRuns(live, list, window);
    } else if (index.popular.has(value)) {
      live = continueRuns(live, b, value, window);
    } else {
      live = [];
    }
    for (const run of live) {
      if (run.size > best.size) {
        best = {
          originalStart: i - run.size + 1,
          modifiedStart: run.end - run.size + 1,
          size: run.size,
        };
      }
    }
  }
  if (best.size === 0) {
    return commonAffix(a, b, window);
  }
  // Runs cannot start on a frequent token; take in the ones just before.
  while (
    best.originalStart > window.originalStart &&
    best.modifiedStart > window.modifiedStart &&
    a[best.originalStart - 1] === b[best.modifiedStart - 1]
  ) {
    best = {
      originalStart: best.originalStart - 1,
      modifiedStart: best.modifiedStart - 1,
      size: best.size + 1,
    };
  }
  return best;
}

export function matchingBlocks(
  original: readonly string[],
  modified: readonly string[]
): MatchingBlock[] {
  const { a, b } = internValues(original, modified);
  const globalIndex = buildIndex(b, 0, b.length, true);
  const pending: Window[] = [
    {
      originalStart: 0,
      originalEnd: a.length,
      modifiedStart: 0,
      modifiedEnd: b.length,
    },
  ];
  const found: MatchingBlock[] = [];
  while (pending.length > 0) {
    const window = pending.pop();
    if (!window) {
      break;
    }
    const cells =
      (window.originalEnd - window.originalStart) *
      (window.modifiedEnd - window.modifiedStart);
    const index =
      globalIndex.popular.size > 0 && cells <= EXACT_SEARCH_CELLS
        ? buildIndex(b, window.modifiedStart, window.modifiedEnd, false)
        : globalIndex;
    const block = findLongestMatch(a, b, index, window);
    if (block.size === 0) {
      continue;
    }
    found.push(block);
    if (
      window.originalStart < block.originalStart &&
      window.modifiedStart < block.modifiedStart
    ) {
      pending.push({
        originalStart: window.originalStart,
        originalEnd: block.originalStart,
        modifiedStart: window.modifiedStart,
        modifiedEnd: block.modifiedStart,
      });
    }
    const originalAfter = block.originalStart + block.size;
    const modifiedAfter = block.modifiedStart + block.size;
    if (
      originalAfter < window.originalEnd &&
      modifiedAfter < window.modifiedEnd
    ) {
      pending.push({
        originalStart: originalAfter,
        originalEnd: window.originalEnd,
        modifiedStart: modifiedAfter,
        modifiedEnd: window.modifiedEnd,
      });
    }
  }
  found.sort(
    (x, y) =>
      x.originalStart - y.originalStart || x.modifiedStart - y.modifiedStart
  );

  const coalesced: MatchingBlock[] = [];
  for (const block of found) {
    const last = coalesced.at(-1);
    if (
      last &&
      last.originalStart + last.size === block.originalStart &&
      last.modifiedStart + last.size === block.modifiedStart
    ) {
      last.size += block.size;
      continue;
    }
    coalesced.push({ ...block });
  }
  return coalesced;
}

function gapKind(originalGap: boolean, modifiedGap: boolean): EditKind | null {
  if (originalGap && modifiedGap) {
    return "replace";
  }
  if (originalGap) {
    return "delete";
  }
  if (modifiedGap) {
    return "insert";
  }
  return null;
}

export function alignValues(
  original: readonly string[],
  modified: readonly string[]
): EditOp[] {
  const ops: EditOp[] = [];
  let i = 0;
  let j = 0;
  const sentinel: MatchingBlock = {
    originalStart: original.length,
    modifiedStart: modified.length,
    size: 0,
  };
  for (const block of [...matchingBlocks(original, modified), sentinel]) {
    const kind = gapKind(i < block.originalStart, j < block.modifiedStart);
    if (kind) {
      ops.push({
        kind,
        original: { start: i, end: block.originalStart },
        modified: { start: j, end: block.modifiedStart },
      });
    }
    i = block.originalStart + block.size;
    j = block.modifiedStart + block.size;
    if (block.size > 0) {
      ops.push({
        kind: "equal",
        original: { start: block.originalStart, end: i },
        modified: { start: block.modifiedStart, end: j },
      });
    }
  }
  return ops;
}

export function align(
  original: readonly TokenSpan[],
  modified: readonly TokenSpan[]
): EditOp[] {
  return alignValues(
    original.map((token) => token.text),
    modified.map((token) => token.text)
  );
}
