/**
 * Read-only access to the Better BibTeX citation key database.
 *
 * Maps user-facing citation keys to the item keys the Zotero Web API uses.
 * A connection is opened per call and closed before returning; nothing is
 * cached between calls and nothing is ever written.
 */

import fs from "fs";
import Database from "better-sqlite3";
import { UNRESOLVED_PREVIEW_LIMIT } from "./constants.js";
import { FormatError, NotFoundError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { CitationKeyRecord, KeyCollision, KeyMapping } from "./types.js";

export interface ResolveOptions {
  /** Only consider records from this library */
  libraryId?: number;
}

export interface CitationKeyIndex {
  byKey: Map<string, CitationKeyRecord>;
  collisions: KeyCollision[];
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function rowToRecord(row: unknown): CitationKeyRecord {
  if (!isRow(row)) {
    throw new FormatError("Unexpected row in citationkey table");
  }
  const { itemID, itemKey, libraryID, citationKey, pinned, lastPinned } = row;
  if (typeof itemID !== "number" || typeof itemKey !== "string" || typeof libraryID !== "number" || typeof citationKey !== "string") {
    throw new FormatError(`Malformed citationkey row: ${JSON.stringify(row)}`);
  }
  return {
    itemId: itemID,
    itemKey,
    libraryId: libraryID,
    citationKey,
    pinned: Boolean(pinned),
    lastPinned: typeof lastPinned === "string" && lastPinned ? lastPinned : null,
  };
}

/**
 * Index records by citation key. Without a library filter a key defined in
 * several libraries resolves to the lowest library ID (the personal library
 * is 1), and the clash is reported in `collisions`.
 */
export function buildCitationKeyIndex(records: CitationKeyRecord[], libraryId?: number): CitationKeyIndex {
  const byKey = new Map<string, CitationKeyRecord>();
  const libraries = new Map<string, Set<number>>();

  for (const record of records) {
    if (libraryId !== undefined && record.libraryId !== libraryId) continue;

    const seen = libraries.get(record.citationKey) ?? new Set<number>();
    seen.add(record.libraryId);
    libraries.set(record.citationKey, seen);

    const existing = byKey.get(record.citationKey);
    if (!existing || record.libraryId < existing.libraryId) {
      byKey.set(record.citationKey, record);
    }
  }

  const collisions: KeyCollision[] = [];
  for (const [citationKey, ids] of libraries) {
    if (ids.size < 2) continue;
    const chosen = byKey.get(citationKey);
    collisions.push({
      citationKey,
      libraryIds: [...ids].sort((a, b) => a - b),
      chosenLibraryId: chosen ? chosen.libraryId : Math.min(...ids),
    });
  }

  return { byKey, collisions };
}

export class CitationKeyStore {
  private readonly dbPath: string;
  private readonly logger: Logger;

  constructor(dbPath: string, logger: Logger = silentLogger) {
    this.dbPath = dbPath;
    this.logger = logger;
  }

  readAllRecords(): CitationKeyRecord[] {
    if (!fs.existsSync(this.dbPath)) {
      throw new NotFoundError(`BetterBibTeX database not found: ${this.dbPath}`);
    }

    this.logger.debug(`Opening BetterBibTeX database: ${this.dbPath}`);
    const db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
    let rows: unknown[];
    try {
      rows = db.prepare("SELECT * FROM citationkey").all();
    } finally {
      db.close();
    }

    this.logger.debug(`Read ${rows.length} records from BetterBibTeX database`);
    return rows.map(rowToRecord);
  }

  /**
   * One mapping per requested key, in request order. Duplicates in the
   * request stay duplicated. Unresolved keys come back with `found: false`;
   * reporting them is up to the caller.
   */
  resolve(citationKeys: string[], options: ResolveOptions = {}): KeyMapping[] {
    const { byKey, collisions } = buildCitationKeyIndex(this.readAllRecords(), options.libraryId);

    for (const collision of collisions) {
      this.logger.warn(
        `Citation key '${collision.citationKey}' exists in libraries ${collision.libraryIds.join(", ")}; using library ${collision.chosenLibraryId}`
      );
    }

    return citationKeys.map((citationKey) => {
      const record = byKey.get(citationKey);
      if (!record) {
        return { citationKey, itemKey: null, itemId: null, libraryId: null, found: false };
      }
      this.logger.debug(`Resolved: ${citationKey} -> ${record.itemKey}`);
      return {
        citationKey,
        itemKey: record.itemKey,
        itemId: record.itemId,
        libraryId: record.libraryId,
        found: true,
      };
    });
  }
}

/** Split mappings into remote item keys (deduplicated) and unresolved citation keys. */
export function partitionMappings(mappings: KeyMapping[]): { itemKeys: string[]; unresolved: string[] } {
  const itemKeys = new Set<string>();
  const unresolved: string[] = [];
  for (const mapping of mappings) {
    if (mapping.found && mapping.itemKey) {
      itemKeys.add(mapping.itemKey);
    } else {
      unresolved.push(mapping.citationKey);
    }
  }
  return { itemKeys: [...itemKeys], unresolved };
}

/** "a, b, c..." capped at `limit` entries. */
export function previewKeys(keys: string[], limit = UNRESOLVED_PREVIEW_LIMIT): string {
  const preview = keys.slice(0, limit).join(", ");
  return keys.length > limit ? `${preview}...` : preview;
}
