import { DEFAULT_CITATION_KEY_FIELD, DEFAULT_DELIMITER } from "../constants.js";
import { parseDelimited } from "../delimited.js";
import { FormatError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { matchField } from "./records.js";
import type { ExtractOptions } from "./types.js";

export function extractDelimited(text: string, options: ExtractOptions = {}): string[] {
  const logger = options.logger ?? silentLogger;
  const field = options.citationKeyField ?? DEFAULT_CITATION_KEY_FIELD;
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;

  const [header, ...rows] = parseDelimited(text, delimiter);
  if (!header) {
    throw new FormatError("Delimited data has no header row.");
  }

  const actual = matchField(header.fields, field);
  if (actual === undefined) {
    throw new FormatError(
      `Field '${field}' not found in delimited data. Available fields: ${header.fields.join(", ")}. Use --read-citation-key-field to specify.`
    );
  }
  const column = header.fields.indexOf(actual);

  const keys: string[] = [];
  for (const row of rows) {
    const value = (row.fields[column] ?? "").trim();
    if (value) {
      keys.push(value);
    } else {
      logger.warn(`Empty citation key at row ${row.line}`);
    }
  }
  return keys;
}

export function extractTsv(text: string, options: ExtractOptions = {}): string[] {
  return extractDelimited(text, { ...options, delimiter: "\t" });
}
