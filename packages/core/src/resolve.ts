import { collectKeysFromFiles, type CollectOptions } from "./extractors/collect.js";
import { partitionMappings, previewKeys, type CitationKeyStore } from "./keystore.js";
import { silentLogger } from "./logger.js";
import type { KeyMapping } from "./types.js";

export interface ResolveInputOptions extends CollectOptions {
  /** Restrict resolution to one local library */
  libraryId?: number;
}

export interface ResolvedInput {
  citationKeys: string[];
  mappings: KeyMapping[];
  /** Deduplicated item keys, in input order */
  itemKeys: string[];
  unresolved: string[];
}

/**
 * Inputs to item keys: expand globs, extract and normalize citation keys,
 * then resolve them against the local store. Unresolved keys are a warning,
 * never an error.
 */
export async function resolveInputKeys(
  inputs: string[],
  store: CitationKeyStore,
  options: ResolveInputOptions = {}
): Promise<ResolvedInput> {
  const logger = options.logger ?? silentLogger;
  const citationKeys = await collectKeysFromFiles(inputs, options);
  if (!citationKeys.length) {
    logger.warn("No citation keys found in input.");
  }

  const mappings = store.resolve(citationKeys, { libraryId: options.libraryId });
  const { itemKeys, unresolved } = partitionMappings(mappings);
  if (unresolved.length) {
    logger.warn(`${unresolved.length} citation keys not found in BetterBibTeX: ${previewKeys(unresolved)}`);
  }
  logger.info(`Resolved ${citationKeys.length - unresolved.length}/${citationKeys.length} citation keys`);

  return { citationKeys, mappings, itemKeys, unresolved };
}
