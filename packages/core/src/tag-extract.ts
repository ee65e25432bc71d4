import { scanTags } from "./tag-scan.js";

function dropMarkers(text: string) {
  let output = "";
  let changed = false;
  for (const token of scanTags(text)) {
    if (token.type === "plain") {
      output += token.text;
    } else {
      changed = true;
    }
  }
  return { output, changed };
}

/**
 * Removes every marker and keeps the content of both kinds. Removal can join
 * fragments such as `<tr` + `ue>` into a new marker, so it repeats until the
 * text is marker free.
 */
export function stripTags(text: string): string {
  let current = text;
  let pass = dropMarkers(current);
  while (pass.changed) {
    current = pass.output;
    pass = dropMarkers(current);
  }
  return current;
}

/**
 * Collapses annotated text to the accepted plain text: untagged text and
 * inserted content stay, deleted content goes. Deletion regions nest by
 * depth and an unmatched `</false>` is ignored. Inserted content is kept
 * even inside an open deletion; the deletion resumes after `</true>`, and an
 * insertion left open keeps the rest of the text.
 */
export function extractFinal(text: string): string {
  let falseDepth = 0;
  const suspended: number[] = [];
  let output = "";
  for (const token of scanTags(text)) {
    switch (token.type) {
      case "false-open":
        falseDepth += 1;
        break;
      case "false-close":
        falseDepth = Math.max(0, falseDepth - 1);
        break;
      case "true-open":
        suspended.push(falseDepth);
        falseDepth = 0;
        break;
      case "true-close":
        falseDepth = suspended.pop() ?? falseDepth;
        break;
      default:
        if (falseDepth === 0) {
          output += token.text;
        }
    }
  }
  return stripTags(output);
}
