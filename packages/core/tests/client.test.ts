import { ReadableStream } from "stream/web";
import { describe, expect, it } from "vitest";
import { ConnectionError, RemoteAPIError, RequestTimeoutError } from "../src/errors.js";
import { ZoteroClient, collectionFromApi } from "../src/zotero/client.js";
import { CollectionTree } from "../src/zotero/tree.js";
import type { FetchLike } from "../src/zotero/types.js";
import { FakeZotero } from "./support/fakeZotero.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function clientFor(fake: FakeZotero, fetch: FetchLike = fake.fetch): ZoteroClient {
  return new ZoteroClient({ libraryId: "123", apiKey: "test-secret", fetch });
}

// ─── Wire parsing Tests ───────────────────────────────────────────────────────

describe("collectionFromApi", () => {
  it("reads wrapped collections with item counts", () => {
    const collection = collectionFromApi({
      key: "ABCD1234",
      version: 7,
      meta: { numItems: 4 },
      data: { key: "ABCD1234", version: 7, name: "Papers", parentCollection: "PARENT01" },
    });
    expect(collection).toEqual({ key: "ABCD1234", name: "Papers", parentKey: "PARENT01", version: 7, numItems: 4 });
  });

  it("treats parentCollection false as top level", () => {
    const collection = collectionFromApi({ key: "TOP00001", name: "Top", parentCollection: false, version: 3 });
    expect(collection.parentKey).toBe(null);
    expect(collection.numItems).toBe(0);
  });

  it("rejects entries without a key or name", () => {
    expect(() => collectionFromApi({ data: { name: "No key" } })).toThrow(RemoteAPIError);
  });
});

// ─── Transport Tests ──────────────────────────────────────────────────────────

describe("ZoteroClient transport", () => {
  it("addresses user and group libraries", () => {
    const fake = new FakeZotero();
    expect(clientFor(fake).libraryUrl).toBe("https://api.zotero.org/users/123");
    const group = new ZoteroClient({ libraryId: "42", apiKey: "test-secret", libraryType: "group", fetch: fake.fetch });
    expect(group.libraryUrl).toBe("https://api.zotero.org/groups/42");
  });

  it("sends the API key and version, and no content type on reads", async () => {
    const seen: Headers[] = [];
    const fake = new FakeZotero();
    const client = clientFor(fake, async (input, init) => {
      seen.push(new Headers(init?.headers));
      return fake.fetch(input, init);
    });

    await client.getCollections();

    expect(seen).toHaveLength(1);
    expect(seen[0].get("Zotero-API-Key")).toBe("test-secret");
    expect(seen[0].get("Zotero-API-Version")).toBe("3");
    expect(seen[0].get("Content-Type")).toBe(null);
  });

  it("maps non-2xx responses to RemoteAPIError", async () => {
    const fake = new FakeZotero("another-secret");
    const error = await clientFor(fake).getCollections().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteAPIError);
    expect(error).toMatchObject({ status: 403, reason: "Forbidden", body: "Invalid key" });
  });

  it("maps a timeout to RequestTimeoutError", async () => {
    const client = new ZoteroClient({
      libraryId: "123",
      apiKey: "test-secret",
      timeoutMs: 5000,
      fetch: async () => {
        throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
      },
    });
    const error = await client.getCollections().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RequestTimeoutError);
    expect(error).toMatchObject({
      timeoutMs: 5000,
      message: "Request timed out after 5000ms: https://api.zotero.org/users/123/collections?start=0&limit=100",
    });
  });

  it("maps a timeout while reading the body to RequestTimeoutError", async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new DOMException("The operation was aborted due to timeout", "TimeoutError"));
      },
    });
    const client = new ZoteroClient({
      libraryId: "123",
      apiKey: "test-secret",
      timeoutMs: 5000,
      fetch: async () => new Response(stalled, { status: 200 }),
    });
    const error = await client.getCollections().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RequestTimeoutError);
    expect(error).toMatchObject({ timeoutMs: 5000 });
  });

  it("maps a network failure to ConnectionError", async () => {
    const client = new ZoteroClient({
      libraryId: "123",
      apiKey: "test-secret",
      fetch: async () => {
        throw new TypeError("fetch failed");
      },
    });
    const error = await client.getCollectionItemKeys("COLL0001").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      message: "Could not connect to https://api.zotero.org/users/123/collections/COLL0001/items/top?format=keys: fetch failed",
    });
  });
});

// ─── Read Tests ───────────────────────────────────────────────────────────────

describe("ZoteroClient reads", () => {
  it("pages through every collection", async () => {
    const fake = new FakeZotero();
    for (let i = 0; i < 150; i++) {
      fake.addCollection(`Collection ${i}`);
    }

    const collections = await clientFor(fake).getCollections();

    expect(collections).toHaveLength(150);
    const starts = fake.requests.filter((r) => r.path === "/collections").map((r) => r.params.get("start"));
    expect(starts).toEqual(["0", "100"]);
  });

  it("returns the top-level item keys of a collection", async () => {
    const fake = new FakeZotero();
    const papers = fake.addCollection("Papers");
    fake.addItem("ITEMAAAA", [papers.key]);
    fake.addItem("ITEMBBBB", [papers.key]);
    fake.addItem("ITEMCCCC");

    const keys = await clientFor(fake).getCollectionItemKeys(papers.key);

    expect([...keys].sort()).toEqual(["ITEMAAAA", "ITEMBBBB"]);
  });

  it("returns an empty set for an empty collection", async () => {
    const fake = new FakeZotero();
    const empty = fake.addCollection("Empty");
    expect((await clientFor(fake).getCollectionItemKeys(empty.key)).size).toBe(0);
  });
});

// ─── Write Tests ──────────────────────────────────────────────────────────────

describe("ZoteroClient writes", () => {
  it("plans a collection without writing when not executing", async () => {
    const fake = new FakeZotero();
    const outcome = await clientFor(fake).createCollection("Papers");
    expect(outcome).toEqual({ kind: "planned", description: "Would create collection: Papers (parent=root)" });
    expect(fake.writes()).toHaveLength(0);
  });

  it("creates a nested collection", async () => {
    const fake = new FakeZotero();
    const parent = fake.addCollection("ml");
    const outcome = await clientFor(fake).createCollection("papers", parent.key, { execute: true });

    expect(outcome.kind).toBe("applied");
    if (outcome.kind !== "applied") return;
    expect(outcome.value.name).toBe("papers");
    expect(outcome.value.parentKey).toBe(parent.key);
    expect(fake.writes()[0].body).toEqual([{ name: "papers", parentCollection: parent.key }]);
  });

  it("raises on a failed creation inside a 200 response", async () => {
    const fake = new FakeZotero();
    const error = await clientFor(fake)
      .createCollection("orphan", "MISSING1", { execute: true })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteAPIError);
    expect(error).toMatchObject({ status: 409, reason: "Parent collection MISSING1 doesn't exist" });
  });

  it("adds only the items that are not members yet", async () => {
    const fake = new FakeZotero();
    const papers = fake.addCollection("Papers");
    fake.addItem("ITEMAAAA");
    fake.addItem("ITEMBBBB", [papers.key]);

    const outcome = await clientFor(fake).addItemsToCollection(papers.key, ["ITEMAAAA", "ITEMBBBB", "ITEMZZZZ"], {
      execute: true,
    });

    expect(outcome).toEqual({ kind: "applied", value: { processed: 2, changed: 1 } });
    expect(fake.membersOf(papers.key)).toEqual(["ITEMAAAA", "ITEMBBBB"]);
    const posted = fake.writes().filter((r) => r.path === "/items");
    expect(posted).toHaveLength(1);
    expect(posted[0].body).toEqual([{ key: "ITEMAAAA", version: 1, collections: [papers.key] }]);
  });

  it("keeps other memberships when removing", async () => {
    const fake = new FakeZotero();
    const papers = fake.addCollection("Papers");
    const other = fake.addCollection("Other");
    fake.addItem("ITEMAAAA", [other.key, papers.key]);

    const outcome = await clientFor(fake).removeItemsFromCollection(papers.key, ["ITEMAAAA"], { execute: true });

    expect(outcome).toEqual({ kind: "applied", value: { processed: 1, changed: 1 } });
    expect(fake.items.get("ITEMAAAA")?.collections).toEqual([other.key]);
  });

  it("works in batches of 50", async () => {
    const fake = new FakeZotero();
    const papers = fake.addCollection("Papers");
    const keys: string[] = [];
    for (let i = 0; i < 120; i++) {
      const key = `ITEM${String(i).padStart(4, "0")}`;
      fake.addItem(key);
      keys.push(key);
    }

    const outcome = await clientFor(fake).addItemsToCollection(papers.key, keys, { execute: true });

    expect(outcome).toEqual({ kind: "applied", value: { processed: 120, changed: 120 } });
    const reads = fake.requests.filter((r) => r.method === "GET" && r.path === "/items");
    expect(reads.map((r) => r.params.get("limit"))).toEqual(["50", "50", "20"]);
    expect(fake.membersOf(papers.key)).toHaveLength(120);
  });

  it("describes membership changes on a dry run", async () => {
    const fake = new FakeZotero();
    const outcome = await clientFor(fake).removeItemsFromCollection("COLL0001", ["ITEMAAAA", "ITEMBBBB"]);
    expect(outcome).toEqual({ kind: "planned", description: "Would remove 2 items from collection COLL0001" });
    expect(fake.requests).toHaveLength(0);
  });

  it("treats an empty key list as a no-op", async () => {
    const fake = new FakeZotero();
    const outcome = await clientFor(fake).addItemsToCollection("COLL0001", [], { execute: true });
    expect(outcome).toEqual({ kind: "applied", value: { processed: 0, changed: 0 } });
    expect(fake.requests).toHaveLength(0);
  });

  it("surfaces a version conflict", async () => {
    const fake = new FakeZotero();
    const papers = fake.addCollection("Papers");
    const item = fake.addItem("ITEMAAAA");
    const racing: FetchLike = async (input, init) => {
      if (init?.method === "POST") {
        item.version += 1;
      }
      return fake.fetch(input, init);
    };

    const error = await clientFor(fake, racing)
      .addItemsToCollection(papers.key, ["ITEMAAAA"], { execute: true })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteAPIError);
    expect(error).toMatchObject({ status: 412 });
    expect(item.collections).toEqual([]);
  });
});

// ─── ensureCollectionPath Tests ───────────────────────────────────────────────

describe("ensureCollectionPath", () => {
  it("creates the missing segments under an existing parent", async () => {
    const fake = new FakeZotero();
    const ml = fake.addCollection("ml");
    const client = clientFor(fake);
    const tree = CollectionTree.build(await client.getCollections());

    const result = await client.ensureCollectionPath("ml/papers/2024", tree, { execute: true });

    expect(result.kind).toBe("resolved");
    if (result.kind !== "resolved") return;
    expect(result.created.map((c) => c.name)).toEqual(["papers", "2024"]);
    expect(result.tree.findByPath("ml/papers/2024")?.key).toBe(result.collection.key);
    expect(tree.findByPath("ml/papers")).toBeUndefined();
    const creates = fake.writes().map((r) => r.body);
    expect(creates).toEqual([
      [{ name: "papers", parentCollection: ml.key }],
      [{ name: "2024", parentCollection: result.created[0].key }],
    ]);
  });

  it("returns an existing path without writing", async () => {
    const fake = new FakeZotero();
    const ml = fake.addCollection("ML");
    const papers = fake.addCollection("Papers", ml.key);
    const client = clientFor(fake);
    const tree = CollectionTree.build(await client.getCollections());

    const result = await client.ensureCollectionPath("ml/papers", tree, { execute: true });

    expect(result).toMatchObject({ kind: "resolved", created: [] });
    expect(result.kind === "resolved" && result.collection.key).toBe(papers.key);
    expect(fake.writes()).toHaveLength(0);
  });

  it("stops at the first missing segment on a dry run", async () => {
    const fake = new FakeZotero();
    fake.addCollection("ml");
    const client = clientFor(fake);
    const tree = CollectionTree.build(await client.getCollections());

    const result = await client.ensureCollectionPath("ml/papers/2024", tree);

    expect(result).toEqual({ kind: "planned", description: "Would create 'papers/2024' under ml", tree });
    expect(fake.writes()).toHaveLength(0);
  });
});
