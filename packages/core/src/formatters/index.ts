import path from "path";
import { FormatError } from "../errors.js";
import { COLLECTION_FORMATS, OUTPUT_FORMATS, type CollectionFormat, type OutputFormat } from "../types.js";

export { formatKeyMappings, formatPlainKeys, formatRecords, toJson, toYaml } from "./keys.js";
export type { KeyFormatOptions } from "./keys.js";
export { formatCollections } from "./collections.js";
export type { CollectionFormatOptions, CollectionSort } from "./collections.js";
export { formatDiff } from "./diff.js";

export const OUTPUT_EXTENSION_MAP: Readonly<Record<string, OutputFormat>> = {
  ".csv": "csv",
  ".tsv": "tsv",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".json": "json",
  ".txt": "plaintext",
  ".text": "plaintext",
};

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function isCollectionFormat(value: string): value is CollectionFormat {
  return COLLECTION_FORMATS.some((format) => format === value);
}

export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new FormatError(`Unsupported output format: '${value}'. Supported: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return normalized;
}

export function parseCollectionFormat(value: string): CollectionFormat {
  const normalized = value.trim().toLowerCase();
  if (!isCollectionFormat(normalized)) {
    throw new FormatError(`Unsupported output format: '${value}'. Supported: ${COLLECTION_FORMATS.join(", ")}`);
  }
  return normalized;
}

export function guessOutputFormat(filePath: string): OutputFormat | undefined {
  return OUTPUT_EXTENSION_MAP[path.extname(filePath).toLowerCase()];
}

/** Explicit flag first, then the output file's extension, then `fallback`. */
export function resolveOutputFormat(
  outfile?: string,
  explicit?: string,
  fallback: OutputFormat = "plaintext"
): OutputFormat {
  if (explicit) {
    return parseOutputFormat(explicit);
  }
  if (outfile) {
    const guessed = guessOutputFormat(outfile);
    if (guessed) return guessed;
  }
  return fallback;
}
