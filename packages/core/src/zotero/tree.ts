import { FormatError } from "../errors.js";
import type { ZoteroCollection } from "../types.js";

/** Split a slash path into trimmed, non-empty segments. */
export function splitCollectionPath(collectionPath: string): string[] {
  return collectionPath
    .split("/")
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function compareNames(a: ZoteroCollection, b: ZoteroCollection): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Hierarchical index over a library's flat collection list.
 *
 * Values are immutable: `withCollection` returns a new tree, so a tree handed
 * to one caller never changes under it.
 */
export class CollectionTree {
  readonly collections: readonly ZoteroCollection[];
  private readonly children: ReadonlyMap<string | null, readonly ZoteroCollection[]>;
  private readonly byKey: ReadonlyMap<string, ZoteroCollection>;

  private constructor(collections: readonly ZoteroCollection[]) {
    const children = new Map<string | null, ZoteroCollection[]>();
    const byKey = new Map<string, ZoteroCollection>();
    for (const collection of collections) {
      const siblings = children.get(collection.parentKey) ?? [];
      siblings.push(collection);
      children.set(collection.parentKey, siblings);
      byKey.set(collection.key, collection);
    }
    for (const siblings of children.values()) {
      siblings.sort(compareNames);
    }
    this.collections = collections;
    this.children = children;
    this.byKey = byKey;
  }

  static build(collections: readonly ZoteroCollection[]): CollectionTree {
    return new CollectionTree([...collections]);
  }

  get size(): number {
    return this.collections.length;
  }

  /** Children of `parentKey` (null for top level), sorted by name. */
  childrenOf(parentKey: string | null): readonly ZoteroCollection[] {
    return this.children.get(parentKey) ?? [];
  }

  get(key: string): ZoteroCollection | undefined {
    return this.byKey.get(key);
  }

  hasChildren(key: string): boolean {
    return this.childrenOf(key).length > 0;
  }

  /** Case-insensitive match of `name` among the children of `parentKey`. */
  findChild(parentKey: string | null, name: string): ZoteroCollection | undefined {
    return this.childrenOf(parentKey).find((collection) => sameName(collection.name, name));
  }

  /** Resolve a slash path ("topic/subtopic") to its leaf collection. */
  findByPath(collectionPath: string): ZoteroCollection | undefined {
    const segments = splitCollectionPath(collectionPath);
    if (!segments.length) return undefined;

    let parentKey: string | null = null;
    let found: ZoteroCollection | undefined;
    for (const segment of segments) {
      found = this.findChild(parentKey, segment);
      if (!found) return undefined;
      parentKey = found.key;
    }
    return found;
  }

  /** Full slash path of a collection, root first. */
  pathOf(key: string): string | undefined {
    const names: string[] = [];
    const visited = new Set<string>();
    let current = this.byKey.get(key);
    while (current && !visited.has(current.key)) {
      visited.add(current.key);
      names.unshift(current.name);
      current = current.parentKey ? this.byKey.get(current.parentKey) : undefined;
    }
    return names.length ? names.join("/") : undefined;
  }

  withCollection(collection: ZoteroCollection): CollectionTree {
    return new CollectionTree([...this.collections, collection]);
  }

  /**
   * Render the tree as one full path per line, parents before children,
   * with a trailing slash on collections that have children. The filter
   * only decides which lines are printed; children of a non-matching parent
   * are still visited.
   */
  formatTree(filterPattern?: string): string {
    let filter: RegExp | undefined;
    if (filterPattern) {
      try {
        filter = new RegExp(filterPattern, "i");
      } catch (error) {
        throw new FormatError(`Invalid filter pattern '${filterPattern}': ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const lines: string[] = [];
    const walk = (parentKey: string | null, prefix: string) => {
      for (const collection of this.childrenOf(parentKey)) {
        const fullPath = `${prefix}${collection.name}`;
        const display = this.hasChildren(collection.key) ? `${fullPath}/` : fullPath;
        if (!filter || filter.test(display)) {
          lines.push(display);
        }
        walk(collection.key, `${fullPath}/`);
      }
    };
    walk(null, "");
    return lines.join("\n");
  }
}
