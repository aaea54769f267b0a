import path from "path";
import { FormatError } from "../errors.js";
import { INPUT_FORMATS, type InputFormat } from "../types.js";
import { extractBibtex } from "./bibtex.js";
import { extractDelimited, extractTsv } from "./delimited.js";
import { extractMarkdown } from "./markdown.js";
import { extractPlaintext } from "./plaintext.js";
import { extractJson, extractYaml } from "./records.js";
import type { ExtractOptions, Extractor } from "./types.js";

export type { ExtractOptions, Extractor } from "./types.js";
export { extractFromRecords } from "./records.js";

const EXTRACTORS: Record<InputFormat, Extractor> = {
  bibtex: extractBibtex,
  csv: extractDelimited,
  tsv: extractTsv,
  yaml: extractYaml,
  json: extractJson,
  plaintext: extractPlaintext,
  markdown: extractMarkdown,
};

export const EXTENSION_FORMAT_MAP: Readonly<Record<string, InputFormat>> = {
  ".bib": "bibtex",
  ".bibtex": "bibtex",
  ".csv": "csv",
  ".tsv": "tsv",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".json": "json",
  ".txt": "plaintext",
  ".text": "plaintext",
  ".md": "markdown",
  ".qmd": "markdown",
  ".rmd": "markdown",
};

const SUPPORTED = INPUT_FORMATS.join(", ");

function isInputFormat(value: string): value is InputFormat {
  return INPUT_FORMATS.some((format) => format === value);
}

export function parseInputFormat(value: string): InputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isInputFormat(normalized)) {
    throw new FormatError(`Unsupported format: '${value}'. Supported: ${SUPPORTED}`);
  }
  return normalized;
}

/** Guess the input format from a file extension, or undefined if unknown. */
export function guessInputFormat(filePath: string): InputFormat | undefined {
  return EXTENSION_FORMAT_MAP[path.extname(filePath).toLowerCase()];
}

/**
 * Pick the format for one input source. An explicit format always wins;
 * otherwise the extension decides. Stdin (`-`) has no extension to go on.
 */
export function detectInputFormat(filePath: string | undefined, explicit?: string): InputFormat {
  if (explicit) {
    return parseInputFormat(explicit);
  }
  if (filePath && filePath !== "-") {
    const guessed = guessInputFormat(filePath);
    if (guessed) return guessed;
  }
  throw new FormatError(`Cannot determine input format. Use -f/--from-format to specify. Supported: ${SUPPORTED}`);
}

/** Raw, un-normalized keys in document order (set order for markdown). */
export function extractCitationKeys(text: string, format: InputFormat, options: ExtractOptions = {}): string[] {
  return EXTRACTORS[format](text, options);
}
