import type { FetchLike } from "../../src/zotero/types.js";

/**
 * In-process stand-in for the parts of the Zotero Web API v3 the client uses.
 * It keeps collections and items in memory, records every request and
 * enforces item versions the way the real server does.
 */

export interface FakeCollection {
  key: string;
  name: string;
  parentCollection: string | false;
  version: number;
}

export interface FakeItem {
  key: string;
  version: number;
  collections: string[];
}

export interface RecordedRequest {
  method: string;
  path: string;
  params: URLSearchParams;
  body?: unknown;
}

const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  412: "Precondition Failed",
  500: "Internal Server Error",
};

const DEFAULT_ITEM_LIMIT = 25;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class FakeZotero {
  readonly apiKey: string;
  readonly collections = new Map<string, FakeCollection>();
  readonly items = new Map<string, FakeItem>();
  readonly requests: RecordedRequest[] = [];
  /** Served instead of the next response, then cleared */
  failNext?: { status: number; body: string };
  private counter = 0;

  constructor(apiKey = "test-secret") {
    this.apiKey = apiKey;
  }

  readonly fetch: FetchLike = async (input, init) => this.handle(input, init);

  addCollection(name: string, parentKey: string | null = null, key = this.nextKey("C")): FakeCollection {
    const collection: FakeCollection = { key, name, parentCollection: parentKey ?? false, version: 1 };
    this.collections.set(key, collection);
    return collection;
  }

  addItem(key: string, collections: string[] = []): FakeItem {
    const item: FakeItem = { key, version: 1, collections: [...collections] };
    this.items.set(key, item);
    return item;
  }

  /** Keys of the items in a collection, sorted. */
  membersOf(collectionKey: string): string[] {
    return [...this.items.values()]
      .filter((item) => item.collections.includes(collectionKey))
      .map((item) => item.key)
      .sort();
  }

  writes(): RecordedRequest[] {
    return this.requests.filter((request) => request.method !== "GET");
  }

  private nextKey(prefix: string): string {
    this.counter += 1;
    return `${prefix}${String(this.counter).padStart(7, "0")}`;
  }

  private respond(status: number, body: unknown, headers: Record<string, string> = {}): Response {
    const text = typeof body === "string" ? body : JSON.stringify(body);
    return new Response(text, { status, statusText: STATUS_TEXT[status] ?? "", headers });
  }

  private async handle(input: string, init: RequestInit = {}): Promise<Response> {
    const url = new URL(input);
    const method = init.method ?? "GET";
    const path = url.pathname.replace(/^\/(users|groups)\/[^/]+/, "");
    const body: unknown = typeof init.body === "string" ? JSON.parse(init.body) : undefined;
    this.requests.push({ method, path, params: url.searchParams, body });

    if (this.failNext) {
      const { status, body: failure } = this.failNext;
      this.failNext = undefined;
      return this.respond(status, failure);
    }

    const headers = new Headers(init.headers);
    if (headers.get("Zotero-API-Key") !== this.apiKey) {
      return this.respond(403, "Invalid key");
    }

    if (method === "GET" && path === "/collections") {
      return this.listCollections(url.searchParams);
    }
    if (method === "POST" && path === "/collections") {
      return this.createCollections(body);
    }
    const itemsTop = /^\/collections\/([^/]+)\/items\/top$/.exec(path);
    if (method === "GET" && itemsTop) {
      if (!this.collections.has(itemsTop[1])) {
        return this.respond(404, "Collection not found");
      }
      return this.respond(200, this.membersOf(itemsTop[1]).join("\n"));
    }
    if (method === "GET" && path === "/items") {
      return this.listItems(url.searchParams);
    }
    if (method === "POST" && path === "/items") {
      return this.updateItems(body);
    }
    return this.respond(404, "Not found");
  }

  private listCollections(params: URLSearchParams): Response {
    const start = Number(params.get("start") ?? 0);
    const limit = Number(params.get("limit") ?? DEFAULT_ITEM_LIMIT);
    const all = [...this.collections.values()];
    const page = all.slice(start, start + limit).map((collection) => ({
      key: collection.key,
      version: collection.version,
      meta: { numItems: this.membersOf(collection.key).length },
      data: { ...collection },
    }));
    return this.respond(200, page, { "Total-Results": String(all.length) });
  }

  private createCollections(body: unknown): Response {
    if (!Array.isArray(body)) {
      return this.respond(400, "Expected an array");
    }
    const successful: Record<string, unknown> = {};
    const failed: Record<string, unknown> = {};
    body.forEach((entry: unknown, index) => {
      if (!isRecord(entry) || typeof entry.name !== "string") {
        failed[index] = { key: "", code: 400, message: "Collection name not provided" };
        return;
      }
      const parent = typeof entry.parentCollection === "string" ? entry.parentCollection : null;
      if (parent && !this.collections.has(parent)) {
        failed[index] = { key: "", code: 409, message: `Parent collection ${parent} doesn't exist` };
        return;
      }
      const created = this.addCollection(entry.name, parent);
      successful[index] = { key: created.key, version: created.version, data: { ...created } };
    });
    return this.respond(200, { successful, unchanged: {}, failed });
  }

  private listItems(params: URLSearchParams): Response {
    const keys = (params.get("itemKey") ?? "").split(",").filter(Boolean);
    const limit = Number(params.get("limit") ?? DEFAULT_ITEM_LIMIT);
    const found = keys
      .map((key) => this.items.get(key))
      .filter((item): item is FakeItem => item !== undefined)
      .slice(0, limit)
      .map((item) => ({ key: item.key, version: item.version, data: { ...item, collections: [...item.collections] } }));
    return this.respond(200, found);
  }

  private updateItems(body: unknown): Response {
    if (!Array.isArray(body)) {
      return this.respond(400, "Expected an array");
    }
    const successful: Record<string, unknown> = {};
    const failed: Record<string, unknown> = {};
    body.forEach((entry: unknown, index) => {
      if (!isRecord(entry) || typeof entry.key !== "string") {
        failed[index] = { key: "", code: 400, message: "Item key not provided" };
        return;
      }
      const item = this.items.get(entry.key);
      if (!item) {
        failed[index] = { key: entry.key, code: 404, message: "Item doesn't exist" };
        return;
      }
      if (entry.version !== item.version) {
        failed[index] = { key: item.key, code: 412, message: "Item has been modified since specified version" };
        return;
      }
      if (Array.isArray(entry.collections)) {
        item.collections = entry.collections.filter((c): c is string => typeof c === "string");
      }
      item.version += 1;
      successful[index] = { key: item.key, version: item.version };
    });
    return this.respond(200, { successful, unchanged: {}, failed });
  }
}
