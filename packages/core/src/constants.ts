/**
 * Shared constants and configuration defaults for keysync.
 *
 * Environment variables:
 * - ZOTERO_LIBRARY_ID: Zotero library (user or group) ID
 * - ZOTERO_API_KEY: Zotero Web API key
 * - ZOTERO_LIBRARY_TYPE: "user" (default) or "group"
 * - BETTERBIBTEX_DB: Path to the Better BibTeX SQLite database
 * - KEYSYNC_TIMEOUT: Remote request timeout in ms (default: 30000)
 * - DEBUG: Print stack traces for unexpected errors
 */

// ─────────────────────────────────────────────────────────────────────────────
// Zotero Web API
// ─────────────────────────────────────────────────────────────────────────────

export const ZOTERO_API_BASE_URL = "https://api.zotero.org";

export const ZOTERO_API_VERSION = "3";

/** Page size for paginated reads */
export const COLLECTION_PAGE_SIZE = 100;

/** Items fetched and updated per write batch */
export const ITEM_BATCH_SIZE = 50;

export const DEFAULT_TIMEOUT_MS = 30000;

/** Request/response bodies longer than this are cut in debug logs */
export const DEBUG_BODY_PREVIEW = 500;

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export const CONFIG_DIR_NAME = ".keysync";

export const ENV_LIBRARY_ID = "ZOTERO_LIBRARY_ID";
export const ENV_API_KEY = "ZOTERO_API_KEY";
export const ENV_LIBRARY_TYPE = "ZOTERO_LIBRARY_TYPE";
export const ENV_BETTERBIBTEX_DB = "BETTERBIBTEX_DB";
export const ENV_TIMEOUT = "KEYSYNC_TIMEOUT";

export const BETTERBIBTEX_DB_FILE = "better-bibtex.sqlite";
export const ZOTERO_DB_FILE = "zotero.sqlite";

// ─────────────────────────────────────────────────────────────────────────────
// Extraction & reporting
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_CITATION_KEY_FIELD = "citation-key";

export const DEFAULT_DELIMITER = ",";

/** Unresolved keys listed in a warning before it is cut with "..." */
export const UNRESOLVED_PREVIEW_LIMIT = 10;

/** Highest suffix tried when disambiguating an existing collection path */
export const MAX_DISAMBIGUATION_SUFFIX = 99;
