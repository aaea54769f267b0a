import fs from "fs/promises";
import path from "path";
import fg from "fast-glob";
import { DEFAULT_CITATION_KEY_FIELD, DEFAULT_DELIMITER } from "../constants.js";
import { NotFoundError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { detectInputFormat, extractCitationKeys } from "./index.js";

export interface CollectOptions {
  /** Explicit input format; otherwise inferred per file */
  format?: string;
  delimiter?: string;
  citationKeyField?: string;
  /** Base directory for relative paths and glob patterns */
  cwd?: string;
  /** Source for `-`; defaults to process.stdin */
  readStdin?: () => Promise<string>;
  logger?: Logger;
}

/** Trim and drop a single leading `@`. */
export function normalizeKey(key: string): string {
  const trimmed = key.trim();
  return trimmed.startsWith("@") ? trimmed.slice(1) : trimmed;
}

/** Normalize, drop empties and deduplicate, keeping first-seen order. */
export function dedupeKeys(keys: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const key of keys) {
    const normalized = normalizeKey(key);
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Expand the command-line inputs: `-` passes through, glob patterns are
 * expanded (sorted, must match something), literal paths must exist.
 */
export async function expandInputs(inputs: string[], cwd: string): Promise<string[]> {
  const expanded: string[] = [];
  for (const input of inputs) {
    if (input === "-") {
      expanded.push(input);
      continue;
    }
    if (fg.isDynamicPattern(input)) {
      const matches = await fg(input, { cwd, onlyFiles: true });
      if (!matches.length) {
        throw new NotFoundError(`No input files match pattern: ${input}`);
      }
      expanded.push(...matches.sort());
      continue;
    }
    expanded.push(input);
  }
  return expanded;
}

/**
 * Read and extract citation keys from one or more files, in order.
 * The result is normalized and deduplicated; running it twice on the same
 * inputs gives the same sequence.
 */
export async function collectKeysFromFiles(files: string[], options: CollectOptions = {}): Promise<string[]> {
  const logger = options.logger ?? silentLogger;
  const cwd = options.cwd ?? process.cwd();
  const all: string[] = [];

  for (const file of await expandInputs(files, cwd)) {
    const format = detectInputFormat(file === "-" ? undefined : file, options.format);
    logger.info(`Reading ${file} (format: ${format})`);

    let text: string;
    if (file === "-") {
      text = await (options.readStdin ?? readStdin)();
    } else {
      const resolved = path.resolve(cwd, file);
      try {
        text = await fs.readFile(resolved, "utf8");
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === "ENOENT") {
          throw new NotFoundError(`Input file not found: ${file}`);
        }
        throw error;
      }
    }

    all.push(
      ...extractCitationKeys(text, format, {
        delimiter: options.delimiter ?? DEFAULT_DELIMITER,
        citationKeyField: options.citationKeyField ?? DEFAULT_CITATION_KEY_FIELD,
        logger,
      })
    );
  }

  const keys = dedupeKeys(all);
  logger.info(`Collected ${keys.length} unique citation keys`);
  return keys;
}
