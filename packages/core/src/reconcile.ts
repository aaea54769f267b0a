/**
 * Reconciliation of a set of resolved item keys against a remote collection.
 *
 * The planners are pure. The runners read the remote state, plan, and then
 * either describe the plan (dry run) or apply it through the client.
 */

import { MAX_DISAMBIGUATION_SUFFIX } from "./constants.js";
import { NotFoundError, ReconcileError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ConflictPolicy, ZoteroCollection } from "./types.js";
import type { ZoteroClient } from "./zotero/client.js";
import { CollectionTree, splitCollectionPath } from "./zotero/tree.js";

export interface ReconcileContext {
  client: ZoteroClient;
  logger?: Logger;
  /** Apply writes; without it every runner is a dry run */
  execute?: boolean;
}

export type ReconcileAction = "created" | "added" | "replaced" | "skipped" | "diffed";

export interface ReplacementPlan {
  toAdd: string[];
  toRemove: string[];
  unchanged: string[];
}

export interface MembershipDiff {
  inBoth: string[];
  onlyInInput: string[];
  onlyInCollection: string[];
  /** Citation keys that never resolved to an item */
  unresolved: string[];
}

export interface ReconcileReport {
  action: ReconcileAction;
  /** Final collection path, after any disambiguation */
  path: string;
  executed: boolean;
  added: number;
  removed: number;
  diff?: MembershipDiff;
  message: string;
}

// ─── Planners ────────────────────────────────────────────────────────────────

/** A∖B to add, B∖A to remove, A∩B untouched. */
export function planReplacement(input: readonly string[], current: Iterable<string>): ReplacementPlan {
  const inputSet = new Set(input);
  const currentList = [...new Set(current)];
  const currentSet = new Set(currentList);

  const toAdd: string[] = [];
  const unchanged: string[] = [];
  for (const key of inputSet) {
    (currentSet.has(key) ? unchanged : toAdd).push(key);
  }
  const toRemove = currentList.filter((key) => !inputSet.has(key));

  return { toAdd, toRemove, unchanged };
}

export function diffMembership(
  input: readonly string[],
  current: Iterable<string>,
  unresolved: readonly string[] = []
): MembershipDiff {
  const plan = planReplacement(input, current);
  return {
    inBoth: [...plan.unchanged].sort(),
    onlyInInput: [...plan.toAdd].sort(),
    onlyInCollection: [...plan.toRemove].sort(),
    unresolved: [...unresolved],
  };
}

/** First free `path (n)` for n in 2..99. */
export function disambiguatePath(collectionPath: string, tree: CollectionTree): string {
  const normalized = normalizePath(collectionPath);
  for (let suffix = 2; suffix <= MAX_DISAMBIGUATION_SUFFIX; suffix++) {
    const candidate = `${normalized} (${suffix})`;
    if (!tree.findByPath(candidate)) {
      return candidate;
    }
  }
  throw new ReconcileError(
    `Could not find a free name for '${normalized}' (tried suffixes up to (${MAX_DISAMBIGUATION_SUFFIX})).`
  );
}

function normalizePath(collectionPath: string): string {
  return splitCollectionPath(collectionPath).join("/");
}

// ─── Runners ─────────────────────────────────────────────────────────────────

function requireItems(itemKeys: readonly string[]): void {
  if (!itemKeys.length) {
    throw new ReconcileError("No resolvable items found. Aborting.");
  }
}

function label(executed: boolean, text: string): string {
  return executed ? text : `[DRY RUN] ${text}`;
}

async function loadTree(ctx: ReconcileContext): Promise<CollectionTree> {
  return CollectionTree.build(await ctx.client.getCollections());
}

async function requireCollection(ctx: ReconcileContext, collectionPath: string) {
  const tree = await loadTree(ctx);
  const collection = tree.findByPath(collectionPath);
  if (!collection) {
    throw new NotFoundError(`Collection not found: ${collectionPath}`);
  }
  return { tree, collection };
}

async function addInto(
  ctx: ReconcileContext,
  collectionPath: string,
  collection: ZoteroCollection,
  itemKeys: string[]
): Promise<ReconcileReport> {
  const execute = Boolean(ctx.execute);
  const current = await ctx.client.getCollectionItemKeys(collection.key);
  const toAdd = itemKeys.filter((key) => !current.has(key));
  const present = itemKeys.length - toAdd.length;

  const outcome = await ctx.client.addItemsToCollection(collection.key, toAdd, { execute });
  const added = outcome.kind === "applied" ? outcome.value.changed : toAdd.length;
  const message = execute
    ? `Added ${added} items to '${collectionPath}' (${present} already present)`
    : `Would add ${added} items to '${collectionPath}' (${present} already present)`;

  return { action: "added", path: collectionPath, executed: execute, added, removed: 0, message: label(execute, message) };
}

async function replaceIn(
  ctx: ReconcileContext,
  collectionPath: string,
  collection: ZoteroCollection,
  itemKeys: string[]
): Promise<ReconcileReport> {
  const execute = Boolean(ctx.execute);
  const logger = ctx.logger ?? silentLogger;
  const current = await ctx.client.getCollectionItemKeys(collection.key);
  const plan = planReplacement(itemKeys, current);
  logger.info(
    `Plan for '${collectionPath}': ${plan.toAdd.length} to add, ${plan.toRemove.length} to remove, ${plan.unchanged.length} unchanged`
  );

  const removal = await ctx.client.removeItemsFromCollection(collection.key, plan.toRemove, { execute });
  const addition = await ctx.client.addItemsToCollection(collection.key, plan.toAdd, { execute });

  const removed = removal.kind === "applied" ? removal.value.changed : plan.toRemove.length;
  const added = addition.kind === "applied" ? addition.value.changed : plan.toAdd.length;
  const summary = `+${added} -${removed}, ${plan.unchanged.length} unchanged`;
  const message = execute
    ? `Replaced contents of '${collectionPath}': ${summary}`
    : `Would replace contents of '${collectionPath}': ${summary}`;

  return { action: "replaced", path: collectionPath, executed: execute, added, removed, message: label(execute, message) };
}

/**
 * Create the collection at `collectionPath` (and any missing parents) and
 * fill it. An existing path is handled by `onConflict`.
 */
export async function createCollection(
  ctx: ReconcileContext,
  collectionPath: string,
  itemKeys: string[],
  onConflict: ConflictPolicy = "abort"
): Promise<ReconcileReport> {
  requireItems(itemKeys);
  const execute = Boolean(ctx.execute);
  const logger = ctx.logger ?? silentLogger;
  let targetPath = normalizePath(collectionPath);

  const tree = await loadTree(ctx);
  const existing = tree.findByPath(targetPath);

  if (existing) {
    switch (onConflict) {
      case "abort":
        throw new ReconcileError(
          `Collection '${targetPath}' already exists. Use --on-conflict add, replace, skip or disambiguate.`
        );
      case "skip":
        return {
          action: "skipped",
          path: targetPath,
          executed: execute,
          added: 0,
          removed: 0,
          message: label(execute, `Collection '${targetPath}' already exists; skipped`),
        };
      case "add":
        return addInto(ctx, targetPath, existing, itemKeys);
      case "replace":
        return replaceIn(ctx, targetPath, existing, itemKeys);
      case "disambiguate":
        targetPath = disambiguatePath(targetPath, tree);
        logger.info(`Collection '${collectionPath}' exists; creating '${targetPath}' instead`);
        break;
    }
  }

  const ensured = await ctx.client.ensureCollectionPath(targetPath, tree, { execute });
  if (ensured.kind === "planned") {
    logger.debug(ensured.description);
    return {
      action: "created",
      path: targetPath,
      executed: false,
      added: itemKeys.length,
      removed: 0,
      message: label(false, `Would create '${targetPath}' with ${itemKeys.length} items`),
    };
  }

  const outcome = await ctx.client.addItemsToCollection(ensured.collection.key, itemKeys, { execute });
  const added = outcome.kind === "applied" ? outcome.value.changed : itemKeys.length;
  return {
    action: "created",
    path: targetPath,
    executed: execute,
    added,
    removed: 0,
    message: label(execute, `Created '${targetPath}' with ${added} items`),
  };
}

/** Union `itemKeys` into an existing collection. */
export async function addToCollection(
  ctx: ReconcileContext,
  collectionPath: string,
  itemKeys: string[]
): Promise<ReconcileReport> {
  requireItems(itemKeys);
  const targetPath = normalizePath(collectionPath);
  const { collection } = await requireCollection(ctx, targetPath);
  return addInto(ctx, targetPath, collection, itemKeys);
}

/** Make an existing collection contain exactly `itemKeys`. */
export async function replaceCollection(
  ctx: ReconcileContext,
  collectionPath: string,
  itemKeys: string[]
): Promise<ReconcileReport> {
  requireItems(itemKeys);
  const targetPath = normalizePath(collectionPath);
  const { collection } = await requireCollection(ctx, targetPath);
  return replaceIn(ctx, targetPath, collection, itemKeys);
}

/** Compare `itemKeys` with a collection's members. Never writes. */
export async function diffCollection(
  ctx: ReconcileContext,
  collectionPath: string,
  itemKeys: string[],
  unresolved: string[] = []
): Promise<ReconcileReport> {
  const targetPath = normalizePath(collectionPath);
  const { collection } = await requireCollection(ctx, targetPath);
  const current = await ctx.client.getCollectionItemKeys(collection.key);
  const diff = diffMembership(itemKeys, current, unresolved);

  return {
    action: "diffed",
    path: targetPath,
    executed: true,
    added: 0,
    removed: 0,
    diff,
    message:
      `'${targetPath}': ${diff.inBoth.length} in both, ${diff.onlyInInput.length} only in input, ` +
      `${diff.onlyInCollection.length} only in collection, ${diff.unresolved.length} unresolved`,
  };
}
