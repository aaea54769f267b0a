import pc from "picocolors";

interface ErrorWithSuggestion {
  message: string;
  suggestion?: string;
}

/**
 * Common error patterns and their suggestions
 */
const ERROR_PATTERNS: Array<{
  pattern: RegExp;
  suggestion: (match: RegExpMatchArray) => string;
}> = [
  {
    pattern: /Library ID required/i,
    suggestion: () =>
      "Find your user ID at https://www.zotero.org/settings/keys, then either:\n  • pass -i/--library-id\n  • export ZOTERO_LIBRARY_ID\n  • write it to .keysync/library",
  },
  {
    pattern: /API key required/i,
    suggestion: () =>
      "Create a key with write access at https://www.zotero.org/settings/keys, then either:\n  • pass -k/--api-key\n  • export ZOTERO_API_KEY\n  • write it to .keysync/api-key",
  },
  {
    pattern: /BetterBibTeX database (?:path required|not found)/i,
    suggestion: () =>
      "The database is better-bibtex.sqlite in your Zotero data directory.\nPass it with -b/--better-bibtex, or run 'keysync config' to see what was detected.",
  },
  {
    pattern: /Cannot determine input format/i,
    suggestion: () => "Pass -f/--from-format, or give the file a known extension (.bib, .csv, .tsv, .yaml, .json, .txt, .md).",
  },
  {
    pattern: /Collection '(.+)' already exists/i,
    suggestion: (match) =>
      `Choose how to handle the existing collection '${match[1]}':\n  --on-conflict add | replace | skip | disambiguate`,
  },
  {
    pattern: /Collection not found: (.+)/i,
    suggestion: (match) =>
      `Run 'keysync collection list' to see existing paths, or 'keysync collection create ${match[1]} ...' to make it.`,
  },
  {
    pattern: /Zotero API error 403/i,
    suggestion: () => "Check the API key is valid and has write access to this library.",
  },
  {
    pattern: /Zotero API error 412/i,
    suggestion: () => "The library changed while this command ran. Run it again.",
  },
  {
    pattern: /Request timed out/i,
    suggestion: () => "Raise the limit with --timeout <ms> or $KEYSYNC_TIMEOUT.",
  },
  {
    pattern: /Invalid YAML/i,
    suggestion: () =>
      "Common YAML issues:\n  • Check indentation (use spaces, not tabs)\n  • Ensure colons have spaces after them\n  • Quote strings with special characters",
  },
  {
    pattern: /Field '(.+)' not found/i,
    suggestion: (match) => `Name the column holding citation keys with --read-citation-key-field (looked for '${match[1]}').`,
  },
];

/**
 * Format an error with a helpful suggestion
 */
export function formatError(error: unknown): ErrorWithSuggestion {
  const message = error instanceof Error ? error.message : String(error);

  for (const { pattern, suggestion } of ERROR_PATTERNS) {
    const match = message.match(pattern);
    if (match) {
      return {
        message,
        suggestion: suggestion(match),
      };
    }
  }

  return { message };
}

/**
 * Print a formatted error to stderr
 */
export function printError(error: unknown, write: (line: string) => void = (line) => console.error(line)): void {
  const formatted = formatError(error);

  write(`${pc.red(pc.bold("Error:"))} ${formatted.message}`);

  if (formatted.suggestion) {
    write(pc.dim("Try this:"));
    for (const line of formatted.suggestion.split("\n")) {
      write(pc.dim(`  ${line}`));
    }
  }
}
