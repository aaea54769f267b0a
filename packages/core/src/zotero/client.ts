import {
  COLLECTION_PAGE_SIZE,
  DEBUG_BODY_PREVIEW,
  DEFAULT_TIMEOUT_MS,
  ITEM_BATCH_SIZE,
  ZOTERO_API_BASE_URL,
  ZOTERO_API_VERSION,
} from "../constants.js";
import { ConnectionError, FormatError, RemoteAPIError, RequestTimeoutError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { LibraryType, MembershipChange, MutationOutcome, ZoteroCollection } from "../types.js";
import { splitCollectionPath, type CollectionTree } from "./tree.js";
import type { EnsurePathResult, FetchLike, WriteOptions, ZoteroClientOptions, ZoteroItemMembership } from "./types.js";

interface RequestOptions {
  params?: Record<string, string>;
  body?: unknown;
}

interface RawResponse {
  text: string;
  headers: Headers;
}

// ─── Wire parsing ────────────────────────────────────────────────────────────

function asObject(value: unknown): Record<string, unknown> | undefined {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : undefined;
}

function unexpected(raw: unknown): RemoteAPIError {
  return new RemoteAPIError(0, "Unexpected response", JSON.stringify(raw) ?? String(raw));
}

/** Collections arrive either wrapped (`{ key, meta, data }`) or bare. */
export function collectionFromApi(raw: unknown): ZoteroCollection {
  const outer = asObject(raw);
  const data = asObject(outer?.data) ?? outer;
  const meta = asObject(outer?.meta);
  if (!data || typeof data.key !== "string" || typeof data.name !== "string") {
    throw unexpected(raw);
  }
  const version = typeof data.version === "number" ? data.version : outer?.version;
  return {
    key: data.key,
    name: data.name,
    parentKey: typeof data.parentCollection === "string" && data.parentCollection ? data.parentCollection : null,
    version: typeof version === "number" ? version : 0,
    numItems: typeof meta?.numItems === "number" ? meta.numItems : 0,
  };
}

export function itemFromApi(raw: unknown): ZoteroItemMembership {
  const outer = asObject(raw);
  const data = asObject(outer?.data) ?? outer;
  if (!data || typeof data.key !== "string") {
    throw unexpected(raw);
  }
  const version = typeof data.version === "number" ? data.version : outer?.version;
  const collections = Array.isArray(data.collections)
    ? data.collections.filter((c): c is string => typeof c === "string")
    : [];
  return { key: data.key, version: typeof version === "number" ? version : 0, collections };
}

/** A 200 to a multi-object write can still carry per-object failures. */
function assertWriteSucceeded(raw: unknown): Record<string, unknown> {
  const body = asObject(raw);
  if (!body) throw unexpected(raw);
  const failed = asObject(body.failed);
  if (failed) {
    const first = Object.values(failed).map(asObject).find((entry) => entry !== undefined);
    if (first) {
      const code = typeof first.code === "number" ? first.code : 0;
      const message = typeof first.message === "string" ? first.message : "Write failed";
      throw new RemoteAPIError(code, message, JSON.stringify(failed));
    }
  }
  return body;
}

function libraryPrefix(libraryType: LibraryType, libraryId: string): string {
  return `/${libraryType}s/${encodeURIComponent(libraryId)}`;
}

// ─── Client ──────────────────────────────────────────────────────────────────

/**
 * Zotero Web API client for collection management.
 *
 * Reads page through results transparently. Every write is a dry run unless
 * called with `{ execute: true }`; dry runs come back as `planned` outcomes
 * and touch nothing remote.
 */
export class ZoteroClient {
  private readonly base: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: ZoteroClientOptions) {
    const baseUrl = (options.baseUrl ?? ZOTERO_API_BASE_URL).replace(/\/+$/, "");
    this.base = `${baseUrl}${libraryPrefix(options.libraryType ?? "user", options.libraryId)}`;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  get libraryUrl(): string {
    return this.base;
  }

  // ─── Transport ───────────────────────────────────────────────────────────

  private async request(method: string, pathname: string, options: RequestOptions = {}): Promise<RawResponse> {
    let url = `${this.base}${pathname}`;
    if (options.params) {
      url += `?${new URLSearchParams(options.params)}`;
    }

    const headers: Record<string, string> = {
      "Zotero-API-Key": this.apiKey,
      "Zotero-API-Version": ZOTERO_API_VERSION,
    };
    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers["Content-Type"] = "application/json";
    }

    this.logger.debug(`${method} ${url}`);
    if (body) {
      this.logger.debug(`Request body: ${body.slice(0, DEBUG_BODY_PREVIEW)}`);
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // The timeout signal also covers the body stream
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new RequestTimeoutError(url, this.timeoutMs);
      }
      throw new ConnectionError(url, error);
    }

    this.logger.debug(`Response (${response.status}): ${text.slice(0, DEBUG_BODY_PREVIEW)}`);

    if (!response.ok) {
      this.logger.debug(`API error ${response.status} ${response.statusText}`);
      throw new RemoteAPIError(response.status, response.statusText, text);
    }
    return { text, headers: response.headers };
  }

  private async requestJson(method: string, pathname: string, options: RequestOptions = {}) {
    const { text, headers } = await this.request(method, pathname, options);
    if (!text) {
      return { data: undefined, headers };
    }
    try {
      const data: unknown = JSON.parse(text);
      return { data, headers };
    } catch {
      throw new RemoteAPIError(0, "Invalid JSON response", text);
    }
  }

  // ─── Reads ───────────────────────────────────────────────────────────────

  /** Every collection in the library, across as many pages as needed. */
  async getCollections(): Promise<ZoteroCollection[]> {
    const collections: ZoteroCollection[] = [];
    let start = 0;

    for (;;) {
      const { data, headers } = await this.requestJson("GET", "/collections", {
        params: { start: String(start), limit: String(COLLECTION_PAGE_SIZE) },
      });
      if (!Array.isArray(data) || !data.length) break;

      collections.push(...data.map(collectionFromApi));
      const reported = Number.parseInt(headers.get("Total-Results") ?? "", 10);
      const total = Number.isNaN(reported) ? data.length : reported;
      start += COLLECTION_PAGE_SIZE;
      if (start >= total) break;
    }

    this.logger.info(`Fetched ${collections.length} collections`);
    return collections;
  }

  /**
   * Keys of the top-level items in a collection. Child notes and
   * attachments carry no collection membership of their own.
   */
  async getCollectionItemKeys(collectionKey: string): Promise<Set<string>> {
    const { text } = await this.request("GET", `/collections/${encodeURIComponent(collectionKey)}/items/top`, {
      params: { format: "keys" },
    });
    const keys = text
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return new Set(keys);
  }

  // ─── Writes ──────────────────────────────────────────────────────────────

  async createCollection(
    name: string,
    parentKey: string | null = null,
    options: WriteOptions = {}
  ): Promise<MutationOutcome<ZoteroCollection>> {
    if (!options.execute) {
      const description = `Would create collection: ${name} (parent=${parentKey ?? "root"})`;
      this.logger.info(`[DRY RUN] ${description}`);
      return { kind: "planned", description };
    }

    const payload: Record<string, string> = { name };
    if (parentKey) {
      payload.parentCollection = parentKey;
    }

    const { data } = await this.requestJson("POST", "/collections", { body: [payload] });
    const body = assertWriteSucceeded(data);
    const created = asObject(body.successful)?.["0"];
    if (created === undefined) {
      throw new RemoteAPIError(0, "Creation failed", `Could not create collection: ${name}`);
    }
    const collection = collectionFromApi(created);
    this.logger.info(`Created collection ${collection.name} (${collection.key})`);
    return { kind: "applied", value: collection };
  }

  addItemsToCollection(
    collectionKey: string,
    itemKeys: string[],
    options: WriteOptions = {}
  ): Promise<MutationOutcome<MembershipChange>> {
    return this.updateMembership("add", collectionKey, itemKeys, options);
  }

  removeItemsFromCollection(
    collectionKey: string,
    itemKeys: string[],
    options: WriteOptions = {}
  ): Promise<MutationOutcome<MembershipChange>> {
    return this.updateMembership("remove", collectionKey, itemKeys, options);
  }

  /**
   * Rewrite the `collections` array of each item, one batch at a time. Each
   * update carries the item's current version, so a concurrent edit makes
   * the server reject the batch (412) and the error propagates.
   */
  private async updateMembership(
    mode: "add" | "remove",
    collectionKey: string,
    itemKeys: string[],
    options: WriteOptions
  ): Promise<MutationOutcome<MembershipChange>> {
    if (!itemKeys.length) {
      return { kind: "applied", value: { processed: 0, changed: 0 } };
    }

    if (!options.execute) {
      const description = mode === "add"
        ? `Would add ${itemKeys.length} items to collection ${collectionKey}`
        : `Would remove ${itemKeys.length} items from collection ${collectionKey}`;
      this.logger.info(`[DRY RUN] ${description}`);
      return { kind: "planned", description };
    }

    let processed = 0;
    let changed = 0;

    for (let i = 0; i < itemKeys.length; i += ITEM_BATCH_SIZE) {
      const batch = itemKeys.slice(i, i + ITEM_BATCH_SIZE);
      const { data } = await this.requestJson("GET", "/items", {
        params: { itemKey: batch.join(","), format: "json", limit: String(batch.length) },
      });
      const items = Array.isArray(data) ? data.map(itemFromApi) : [];
      if (items.length < batch.length) {
        this.logger.warn(`${batch.length - items.length} of ${batch.length} items were not found in the library`);
      }
      processed += items.length;

      const updates: ZoteroItemMembership[] = [];
      for (const item of items) {
        const isMember = item.collections.includes(collectionKey);
        if (mode === "add" && !isMember) {
          updates.push({ key: item.key, version: item.version, collections: [...item.collections, collectionKey] });
        } else if (mode === "remove" && isMember) {
          updates.push({
            key: item.key,
            version: item.version,
            collections: item.collections.filter((key) => key !== collectionKey),
          });
        }
      }

      if (updates.length) {
        const { data: written } = await this.requestJson("POST", "/items", { body: updates });
        assertWriteSucceeded(written);
        changed += updates.length;
      }
    }

    this.logger.info(
      `${mode === "add" ? "Added" : "Removed"} ${changed} of ${processed} items ${mode === "add" ? "to" : "from"} collection ${collectionKey}`
    );
    return { kind: "applied", value: { processed, changed } };
  }

  /**
   * Make sure every collection along `collectionPath` exists, creating the
   * missing ones from the root down. Returns the leaf together with a new
   * tree that includes anything created. A dry run stops at the first
   * missing segment, since there is no real key to nest further collections
   * under.
   */
  async ensureCollectionPath(
    collectionPath: string,
    tree: CollectionTree,
    options: WriteOptions = {}
  ): Promise<EnsurePathResult> {
    const segments = splitCollectionPath(collectionPath);
    if (!segments.length) {
      throw new FormatError("Empty collection path.");
    }

    let current = tree;
    let parentKey: string | null = null;
    let leaf: ZoteroCollection | undefined;
    const created: ZoteroCollection[] = [];

    for (const [index, segment] of segments.entries()) {
      const existing = current.findChild(parentKey, segment);
      if (existing) {
        leaf = existing;
        parentKey = existing.key;
        continue;
      }

      const outcome = await this.createCollection(segment, parentKey, options);
      if (outcome.kind === "planned") {
        const missing = segments.slice(index).join("/");
        const under = parentKey ? current.pathOf(parentKey) ?? parentKey : "root";
        return { kind: "planned", description: `Would create '${missing}' under ${under}`, tree: current };
      }

      leaf = outcome.value;
      parentKey = leaf.key;
      created.push(leaf);
      current = current.withCollection(leaf);
    }

    if (!leaf) {
      throw new FormatError("Empty collection path.");
    }
    return { kind: "resolved", collection: leaf, created, tree: current };
  }
}
