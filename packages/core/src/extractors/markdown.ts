// Obsidian wiki link: [[path/to/@key]] or [[path/to/@key.md]]
const WIKI_LINK = /\[\[[^\]]*?@([A-Za-z0-9_:.-]+?)(?:\.md)?\]\]/g;

// Markdown link: [text](path/to/@key.md)
const MARKDOWN_LINK = /\[[^\]]*\]\([^)]*?@([A-Za-z0-9_:.-]+?)(?:\.md)?\)/g;

// Pandoc citation: @key, [@a; @b], [-@key]. Must end on a letter or digit
// so trailing punctuation is not swallowed.
const PANDOC_CITATION = /(?<![A-Za-z0-9_/])@([A-Za-z][A-Za-z0-9_:.-]*[A-Za-z0-9])/g;

/**
 * Extract citation keys from Quarto, Pandoc or Obsidian markdown.
 *
 * The three idioms are matched independently and merged as a set, so the
 * returned order carries no meaning. Sort if you need a stable order.
 */
export function extractMarkdown(text: string): string[] {
  const keys = new Set<string>();
  for (const pattern of [WIKI_LINK, MARKDOWN_LINK, PANDOC_CITATION]) {
    for (const match of text.matchAll(pattern)) {
      keys.add(match[1]);
    }
  }
  return [...keys];
}
