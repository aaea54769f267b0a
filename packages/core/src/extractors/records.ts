import { load } from "js-yaml";
import { DEFAULT_CITATION_KEY_FIELD } from "../constants.js";
import { FormatError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { ExtractOptions } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Find the actual property name for `field`, ignoring case and padding. */
export function matchField(available: string[], field: string): string | undefined {
  const target = field.trim().toLowerCase();
  return available.find((name) => name.trim().toLowerCase() === target);
}

/**
 * Read the citation key field from every record of a parsed JSON/YAML
 * document. A record without the field is fatal; an empty value is not.
 */
export function extractFromRecords(data: unknown, options: ExtractOptions = {}): string[] {
  const logger = options.logger ?? silentLogger;
  const field = options.citationKeyField ?? DEFAULT_CITATION_KEY_FIELD;

  if (!Array.isArray(data)) {
    throw new FormatError("Expected a list of records (objects/mappings).");
  }

  const keys: string[] = [];
  data.forEach((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new FormatError(`Record at index ${index} is not a mapping/object.`);
    }
    const actual = matchField(Object.keys(item), field);
    if (actual === undefined) {
      const available = Object.keys(item).join(", ");
      throw new FormatError(
        `Field '${field}' not found in record ${index}. Available: ${available}. Use --read-citation-key-field to specify.`
      );
    }
    const raw = item[actual];
    const value = raw === null || raw === undefined ? "" : String(raw).trim();
    if (value) {
      keys.push(value);
    } else {
      logger.warn(`Empty citation key in record ${index}`);
    }
  });
  return keys;
}

export function extractJson(text: string, options: ExtractOptions = {}): string[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new FormatError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return extractFromRecords(data, options);
}

export function extractYaml(text: string, options: ExtractOptions = {}): string[] {
  let data: unknown;
  try {
    data = load(text);
  } catch (error) {
    throw new FormatError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }
  return extractFromRecords(data ?? [], options);
}
