const COMMANDS_WITH_ARGS = ["diff", "extract", "strip", "validate", "repair"];

/**
 * Moves options ahead of positionals after the subcommand, so
 * `reviewdiff diff a.txt b.txt --format json` parses like the canonical
 * `reviewdiff diff --format json a.txt b.txt`. A lone `-` is a positional
 * (stdin), and everything after `--` is kept as positionals.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  if (argv.length <= 2) {
    return [...argv];
  }
  const head = argv.slice(0, 2);
  const rest = argv.slice(2);

  const normalizeTail = (tokens: readonly string[]) => {
    const options: string[] = [];
    const positionals: string[] = [];
    for (let i = 0; i < tokens.length; i += 1) {
      const token = tokens[i] ?? "";
      if (token === "--") {
        positionals.push(...tokens.slice(i + 1));
        break;
      }
      if (token.startsWith("-") && token !== "-") {
        options.push(token);
        if (!token.includes("=")) {
          const next = tokens[i + 1];
          if (next && !next.startsWith("-")) {
            options.push(next);
            i += 1;
          }
        }
        continue;
      }
      positionals.push(token);
    }
    return [...options, ...positionals];
  };

  const index = rest.findIndex((token) => COMMANDS_WITH_ARGS.includes(token));
  if (index === -1) {
    return [...argv];
  }
  const before = rest.slice(0, index + 1);
  const after = rest.slice(index + 1);
  return [...head, ...before, ...normalizeTail(after)];
}
