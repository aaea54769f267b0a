import { dump } from "js-yaml";
import { DEFAULT_CITATION_KEY_FIELD, DEFAULT_DELIMITER } from "../constants.js";
import { stringifyDelimited } from "../delimited.js";
import type { CitationKeyRecord, KeyMapping, OutputFormat } from "../types.js";

export interface KeyFormatOptions {
  /** CSV delimiter; TSV always uses a tab */
  delimiter?: string;
  /** Column/field name for the citation key */
  citationKeyField?: string;
}

type Formatter<T> = (values: readonly T[], options: Required<KeyFormatOptions>) => string;

function withDefaults(options: KeyFormatOptions): Required<KeyFormatOptions> {
  return {
    delimiter: options.delimiter ?? DEFAULT_DELIMITER,
    citationKeyField: options.citationKeyField ?? DEFAULT_CITATION_KEY_FIELD,
  };
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function toYaml(value: unknown): string {
  return dump(value, { lineWidth: -1 }).trimEnd();
}

// ─── Key mappings (keys extract) ─────────────────────────────────────────────

function mappingObjects(mappings: readonly KeyMapping[], field: string) {
  return mappings.map((mapping) => ({
    [field]: mapping.citationKey,
    itemKey: mapping.itemKey,
    found: mapping.found,
  }));
}

function mappingRows(mappings: readonly KeyMapping[], field: string) {
  return [[field, "itemKey", "found"], ...mappings.map((m) => [m.citationKey, m.itemKey ?? "", m.found])];
}

const MAPPING_FORMATTERS: Record<OutputFormat, Formatter<KeyMapping>> = {
  plaintext: (mappings) =>
    mappings.map((m) => `${m.citationKey}\t${m.found && m.itemKey ? m.itemKey : "NOT_FOUND"}`).join("\n"),
  csv: (mappings, { delimiter, citationKeyField }) =>
    stringifyDelimited(mappingRows(mappings, citationKeyField), delimiter),
  tsv: (mappings, { citationKeyField }) => stringifyDelimited(mappingRows(mappings, citationKeyField), "\t"),
  json: (mappings, { citationKeyField }) => toJson(mappingObjects(mappings, citationKeyField)),
  yaml: (mappings, { citationKeyField }) => toYaml(mappingObjects(mappings, citationKeyField)),
};

export function formatKeyMappings(
  mappings: readonly KeyMapping[],
  format: OutputFormat,
  options: KeyFormatOptions = {}
): string {
  return MAPPING_FORMATTERS[format](mappings, withDefaults(options));
}

// ─── Bare keys (keys extract --keys-only) ────────────────────────────────────

function keyRows(keys: readonly string[], field: string) {
  return [[field], ...keys.map((key) => [key])];
}

const PLAIN_KEY_FORMATTERS: Record<OutputFormat, Formatter<string>> = {
  plaintext: (keys) => keys.join("\n"),
  csv: (keys, { delimiter, citationKeyField }) => stringifyDelimited(keyRows(keys, citationKeyField), delimiter),
  tsv: (keys, { citationKeyField }) => stringifyDelimited(keyRows(keys, citationKeyField), "\t"),
  json: (keys, { citationKeyField }) => toJson(keys.map((key) => ({ [citationKeyField]: key }))),
  yaml: (keys, { citationKeyField }) => toYaml(keys.map((key) => ({ [citationKeyField]: key }))),
};

export function formatPlainKeys(keys: readonly string[], format: OutputFormat, options: KeyFormatOptions = {}): string {
  return PLAIN_KEY_FORMATTERS[format](keys, withDefaults(options));
}

// ─── Full records (keys list) ────────────────────────────────────────────────

const RECORD_HEADER = ["citationKey", "itemKey", "itemID", "libraryID", "pinned"];

function recordRows(records: readonly CitationKeyRecord[]) {
  return [
    RECORD_HEADER,
    ...records.map((r) => [r.citationKey, r.itemKey, r.itemId, r.libraryId, r.pinned]),
  ];
}

const RECORD_FORMATTERS: Record<OutputFormat, Formatter<CitationKeyRecord>> = {
  plaintext: (records) => records.map((r) => `${r.citationKey}\t${r.itemKey}`).join("\n"),
  csv: (records, { delimiter }) => stringifyDelimited(recordRows(records), delimiter),
  tsv: (records) => stringifyDelimited(recordRows(records), "\t"),
  json: (records) =>
    toJson(
      records.map((r) => ({
        itemID: r.itemId,
        itemKey: r.itemKey,
        libraryID: r.libraryId,
        citationKey: r.citationKey,
        pinned: r.pinned,
        lastPinned: r.lastPinned,
      }))
    ),
  yaml: (records) =>
    toYaml(
      records.map((r) => ({
        citationKey: r.citationKey,
        itemKey: r.itemKey,
        itemID: r.itemId,
        libraryID: r.libraryId,
        pinned: r.pinned,
      }))
    ),
};

export function formatRecords(
  records: readonly CitationKeyRecord[],
  format: OutputFormat,
  options: Pick<KeyFormatOptions, "delimiter"> = {}
): string {
  return RECORD_FORMATTERS[format](records, withDefaults(options));
}
