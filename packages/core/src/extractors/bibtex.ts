import { silentLogger } from "../logger.js";
import type { ExtractOptions } from "./types.js";

const ENTRY_PATTERN = /@(\w+)\s*\{\s*([^,\s]+)\s*,/g;

/** Block types that carry no citation key */
const NON_ENTRY_TYPES = new Set(["string", "preamble", "comment"]);

/**
 * Pull citation keys out of `@type{key,` headers. Field bodies are never
 * parsed, so malformed entries further down do not affect the result.
 */
export function extractBibtex(text: string, options: ExtractOptions = {}): string[] {
  const logger = options.logger ?? silentLogger;
  const keys: string[] = [];

  for (const match of text.matchAll(ENTRY_PATTERN)) {
    if (NON_ENTRY_TYPES.has(match[1].toLowerCase())) continue;
    keys.push(match[2]);
  }

  if (!keys.length) {
    logger.warn("No BibTeX entries found. Ensure entries follow the format: @type{citationKey, ...}");
  }
  return keys;
}
