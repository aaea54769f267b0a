import type { Logger } from "../logger.js";
import type { LibraryType, ZoteroCollection } from "../types.js";
import type { CollectionTree } from "./tree.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ZoteroClientOptions {
  libraryId: string;
  apiKey: string;
  libraryType?: LibraryType;
  /** Defaults to https://api.zotero.org */
  baseUrl?: string;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: FetchLike;
  logger?: Logger;
}

export interface WriteOptions {
  /** Perform the mutation. Without it every write is a dry run. */
  execute?: boolean;
}

/** Item fields needed to rewrite collection membership */
export interface ZoteroItemMembership {
  key: string;
  version: number;
  collections: string[];
}

export type EnsurePathResult =
  | {
      kind: "resolved";
      collection: ZoteroCollection;
      /** Collections created along the way, root first */
      created: ZoteroCollection[];
      tree: CollectionTree;
    }
  | {
      kind: "planned";
      description: string;
      tree: CollectionTree;
    };
