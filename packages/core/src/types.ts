// ─── Formats ─────────────────────────────────────────────────────────────────

export const INPUT_FORMATS = ["bibtex", "csv", "tsv", "yaml", "json", "plaintext", "markdown"] as const;
export type InputFormat = (typeof INPUT_FORMATS)[number];

export const OUTPUT_FORMATS = ["plaintext", "csv", "tsv", "json", "yaml"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const COLLECTION_FORMATS = ["tree", "plaintext", "json", "csv"] as const;
export type CollectionFormat = (typeof COLLECTION_FORMATS)[number];

export const CONFLICT_POLICIES = ["abort", "add", "replace", "skip", "disambiguate"] as const;
export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number];

export const LIBRARY_TYPES = ["user", "group"] as const;
export type LibraryType = (typeof LIBRARY_TYPES)[number];

// ─── Local key store ─────────────────────────────────────────────────────────

/** One row of the Better BibTeX `citationkey` table. */
export interface CitationKeyRecord {
  readonly itemId: number;
  readonly itemKey: string;
  readonly libraryId: number;
  readonly citationKey: string;
  readonly pinned: boolean;
  readonly lastPinned: string | null;
}

/** Outcome of looking up one citation key. */
export interface KeyMapping {
  citationKey: string;
  itemKey: string | null;
  itemId: number | null;
  libraryId: number | null;
  found: boolean;
}

/** A citation key defined in more than one library. */
export interface KeyCollision {
  citationKey: string;
  libraryIds: number[];
  chosenLibraryId: number;
}

// ─── Remote collections ──────────────────────────────────────────────────────

export interface ZoteroCollection {
  readonly key: string;
  readonly name: string;
  readonly parentKey: string | null;
  readonly version: number;
  readonly numItems: number;
}

/**
 * Result of a write against the remote store. Dry runs come back as
 * `planned` with a human-readable description; executed writes as `applied`.
 */
export type MutationOutcome<T> =
  | { kind: "planned"; description: string }
  | { kind: "applied"; value: T };

export interface MembershipChange {
  /** Items the server returned for the requested keys */
  processed: number;
  /** Items whose `collections` list was actually rewritten */
  changed: number;
}
