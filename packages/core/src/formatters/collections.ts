import { FormatError } from "../errors.js";
import { stringifyDelimited } from "../delimited.js";
import type { CollectionFormat, ZoteroCollection } from "../types.js";
import type { CollectionTree } from "../zotero/tree.js";
import { toJson } from "./keys.js";

export type CollectionSort = "name" | "items";

export interface CollectionFormatOptions {
  /** Case-insensitive regex on the name (or on the full path for `tree`) */
  pattern?: string;
  sort?: CollectionSort;
}

function compileFilter(pattern: string | undefined): RegExp | undefined {
  if (!pattern) return undefined;
  try {
    return new RegExp(pattern, "i");
  } catch (error) {
    throw new FormatError(`Invalid filter pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`);
  }
}

function byName(a: ZoteroCollection, b: ZoteroCollection): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  return left < right ? -1 : left > right ? 1 : a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function selectCollections(tree: CollectionTree, options: CollectionFormatOptions): ZoteroCollection[] {
  const filter = compileFilter(options.pattern);
  const selected = tree.collections.filter((collection) => !filter || filter.test(collection.name));
  if (options.sort === "items") {
    return selected.sort((a, b) => b.numItems - a.numItems || byName(a, b));
  }
  return selected.sort(byName);
}

/** Render a library's collections for `collection list`. */
export function formatCollections(
  tree: CollectionTree,
  format: CollectionFormat,
  options: CollectionFormatOptions = {}
): string {
  if (format === "tree") {
    return tree.formatTree(options.pattern);
  }

  const collections = selectCollections(tree, options);
  switch (format) {
    case "plaintext":
      return collections.map((c) => `${c.key}\t${tree.pathOf(c.key) ?? c.name}`).join("\n");
    case "json":
      return toJson(
        collections.map((c) => ({
          key: c.key,
          name: c.name,
          parentKey: c.parentKey,
          path: tree.pathOf(c.key) ?? c.name,
          numItems: c.numItems,
        }))
      );
    case "csv":
      return stringifyDelimited([
        ["key", "name", "parentKey", "numItems"],
        ...collections.map((c) => [c.key, c.name, c.parentKey ?? "", c.numItems]),
      ]);
  }
}
