import {
  FALSE_CLOSE,
  renderTagTokens,
  scanTags,
  type TagToken,
  TRUE_CLOSE,
} from "./tag-scan.js";

export type MarkerKind = "false" | "true";

export interface TagCounts {
  falseOpen: number;
  falseClose: number;
  trueOpen: number;
  trueClose: number;
}

export interface TagBalanceIssue {
  kind: MarkerKind;
  opens: number;
  closes: number;
  message: string;
}

export function countTags(text: string): TagCounts {
  const counts: TagCounts = {
    falseOpen: 0,
    falseClose: 0,
    trueOpen: 0,
    trueClose: 0,
  };
  for (const token of scanTags(text)) {
    switch (token.type) {
      case "false-open":
        counts.falseOpen += 1;
        break;
      case "false-close":
        counts.falseClose += 1;
        break;
      case "true-open":
        counts.trueOpen += 1;
        break;
      case "true-close":
        counts.trueClose += 1;
        break;
      default:
        break;
    }
  }
  return counts;
}

export function validateTags(text: string) {
  const counts = countTags(text);
  return (
    counts.falseOpen === counts.falseClose &&
    counts.trueOpen === counts.trueClose
  );
}

export function tagBalanceIssues(text: string): TagBalanceIssue[] {
  const counts = countTags(text);
  const issues: TagBalanceIssue[] = [];
  const check = (kind: MarkerKind, opens: number, closes: number) => {
    if (opens !== closes) {
      issues.push({
        kind,
        opens,
        closes,
        message: `<${kind}> markers are unbalanced: ${opens} opening, ${closes} closing`,
      });
    }
  };
  check("false", counts.falseOpen, counts.falseClose);
  check("true", counts.trueOpen, counts.trueClose);
  return issues;
}

function markerKind(token: TagToken): MarkerKind | null {
  switch (token.type) {
    case "false-open":
    case "false-close":
      return "false";
    case "true-open":
    case "true-close":
      return "true";
    default:
      return null;
  }
}

function isCloser(token: TagToken) {
  return token.type === "false-close" || token.type === "true-close";
}

function surplusClosers(counts: TagCounts) {
  const kinds = new Set<MarkerKind>();
  if (counts.falseClose > counts.falseOpen) {
    kinds.add("false");
  }
  if (counts.trueClose > counts.trueOpen) {
    kinds.add("true");
  }
  return kinds;
}

// Drops the closers of the given kinds that have no opener before them.
function dropUnmatchedClosers(text: string, kinds: ReadonlySet<MarkerKind>) {
  const kept: TagToken[] = [];
  const open = { false: 0, true: 0 };
  for (const token of scanTags(text)) {
    const kind = markerKind(token);
    if (kind !== null && kinds.has(kind)) {
      if (!isCloser(token)) {
        open[kind] += 1;
      } else if (open[kind] === 0) {
        continue;
      } else {
        open[kind] -= 1;
      }
    }
    kept.push(token);
  }
  return renderTagTokens(kept);
}

function closersFor(text: string, counts: TagCounts) {
  const missing = {
    false: counts.falseOpen - counts.falseClose,
    true: counts.trueOpen - counts.trueClose,
  };
  const open: MarkerKind[] = [];
  for (const token of scanTags(text)) {
    const kind = markerKind(token);
    if (kind === null) {
      continue;
    }
    if (!isCloser(token)) {
      open.push(kind);
      continue;
    }
    const index = open.lastIndexOf(kind);
    if (index !== -1) {
      open.splice(index, 1);
    }
  }
  let closers = "";
  for (const kind of open.reverse()) {
    if (missing[kind] > 0) {
      missing[kind] -= 1;
      closers += kind === "false" ? FALSE_CLOSE : TRUE_CLOSE;
    }
  }
  return closers;
}

/**
 * Makes marker counts balance and leaves a kind whose counts already match
 * untouched. For a kind with more closers than openers, closers with no
 * opener of their kind before them are dropped; for a kind with more openers,
 * the missing closers are appended to the end of the text, last opened first.
 */
export function repairTags(text: string): string {
  let body = text;
  let counts = countTags(body);
  let surplus = surplusClosers(counts);
  // Dropping a marker can join its neighbours into a new one.
  while (surplus.size > 0) {
    body = dropUnmatchedClosers(body, surplus);
    counts = countTags(body);
    surplus = surplusClosers(counts);
  }
  return body + closersFor(body, counts);
}
