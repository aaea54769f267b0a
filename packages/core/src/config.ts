import fs from "fs/promises";
import { existsSync } from "fs";
import os from "os";
import path from "path";
import dotenv from "dotenv";
import {
  CONFIG_DIR_NAME,
  DEFAULT_TIMEOUT_MS,
  ENV_API_KEY,
  ENV_BETTERBIBTEX_DB,
  ENV_LIBRARY_ID,
  ENV_LIBRARY_TYPE,
  ENV_TIMEOUT,
} from "./constants.js";
import { detectDefaults, type DetectedDefaults } from "./detect.js";
import { ConfigurationError, NotFoundError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { LIBRARY_TYPES, type LibraryType } from "./types.js";

/** Values given on the command line; highest precedence. */
export interface ConfigOverrides {
  libraryId?: string;
  apiKey?: string;
  libraryType?: string;
  betterBibtex?: string;
  timeout?: string | number;
}

export interface ResolveConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Auto-detection hook; defaults to probing the local Zotero install */
  detect?: () => DetectedDefaults;
  logger?: Logger;
}

export type ConfigSource = "flag" | "env" | "dotenv" | "file" | "detected" | "default";

export type Setting = "libraryId" | "apiKey" | "libraryType" | "betterBibtexDb" | "timeoutMs";

interface ConfigValues {
  libraryId?: string;
  apiKey?: string;
  libraryType: LibraryType;
  betterBibtexDb?: string;
  timeoutMs: number;
}

export class Config {
  readonly libraryId?: string;
  readonly apiKey?: string;
  readonly libraryType: LibraryType;
  readonly betterBibtexDb?: string;
  readonly timeoutMs: number;
  /** Where each value came from; absent when unset */
  readonly sources: Readonly<Partial<Record<Setting, ConfigSource>>>;

  constructor(values: ConfigValues, sources: Partial<Record<Setting, ConfigSource>> = {}) {
    this.libraryId = values.libraryId;
    this.apiKey = values.apiKey;
    this.libraryType = values.libraryType;
    this.betterBibtexDb = values.betterBibtexDb;
    this.timeoutMs = values.timeoutMs;
    this.sources = sources;
  }

  requireLibraryId(): string {
    if (!this.libraryId) {
      throw new ConfigurationError(
        `Library ID required. Provide via -i/--library-id, $${ENV_LIBRARY_ID}, or ${CONFIG_DIR_NAME}/library file.`
      );
    }
    return this.libraryId;
  }

  requireApiKey(): string {
    if (!this.apiKey) {
      throw new ConfigurationError(
        `API key required. Provide via -k/--api-key, $${ENV_API_KEY}, or ${CONFIG_DIR_NAME}/api-key file.`
      );
    }
    return this.apiKey;
  }

  requireDatabasePath(): string {
    if (!this.betterBibtexDb) {
      throw new ConfigurationError(
        `BetterBibTeX database path required. Provide via -b/--better-bibtex, $${ENV_BETTERBIBTEX_DB}, or ${CONFIG_DIR_NAME}/better-bibtex file.`
      );
    }
    if (!existsSync(this.betterBibtexDb)) {
      throw new NotFoundError(`BetterBibTeX database not found: ${this.betterBibtexDb}`);
    }
    return this.betterBibtexDb;
  }
}

// ─── Layers ──────────────────────────────────────────────────────────────────

async function readOptionalFile(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || code === "EISDIR") {
      return undefined;
    }
    throw error;
  }
}

/** `.env` then `.env.local`, the latter winning; nothing is written to process.env. */
async function loadDotenv(cwd: string): Promise<Record<string, string>> {
  const merged: Record<string, string> = {};
  for (const name of [".env", ".env.local"]) {
    const text = await readOptionalFile(path.resolve(cwd, name));
    if (text !== undefined) {
      Object.assign(merged, dotenv.parse(text));
    }
  }
  return merged;
}

/** Single-line value from `./.keysync/<name>`, else `~/.keysync/<name>`. */
async function readConfigFile(name: string, cwd: string, homeDir: string): Promise<string | undefined> {
  for (const dir of [cwd, homeDir]) {
    const text = await readOptionalFile(path.join(dir, CONFIG_DIR_NAME, name));
    const value = text?.trim();
    if (value) return value;
  }
  return undefined;
}

function expandPath(value: string, cwd: string, homeDir: string): string {
  const expanded = value === "~" || value.startsWith("~/") ? path.join(homeDir, value.slice(1)) : value;
  return path.resolve(cwd, expanded);
}

export function parseLibraryType(value: string): LibraryType {
  const normalized = value.trim().toLowerCase();
  const match = LIBRARY_TYPES.find((type) => type === normalized);
  if (!match) {
    throw new ConfigurationError(`Invalid library type '${value}'. Expected one of: ${LIBRARY_TYPES.join(", ")}`);
  }
  return match;
}

export function parseTimeout(value: string | number): number {
  const parsed = typeof value === "number" ? value : Number(value.trim());
  const rounded = Math.round(parsed);
  if (!Number.isFinite(parsed) || rounded < 1) {
    throw new ConfigurationError(`Invalid timeout '${value}': expected a positive number of milliseconds.`);
  }
  return rounded;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve settings from, highest first: flags, environment, .env files,
 * .keysync files (cwd, then home), auto-detection, defaults.
 */
export async function resolveConfig(overrides: ConfigOverrides = {}, options: ResolveConfigOptions = {}): Promise<Config> {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;
  const logger = options.logger ?? silentLogger;
  const detect = options.detect ?? (() => detectDefaults({ home: homeDir, logger }));

  const dotenvValues = await loadDotenv(cwd);
  const sources: Partial<Record<Setting, ConfigSource>> = {};

  type Layer = [ConfigSource, () => Promise<string | undefined> | string | undefined];
  const pick = async (setting: Setting, layers: Layer[]): Promise<string | undefined> => {
    for (const [source, read] of layers) {
      const value = nonEmpty(await read());
      if (value !== undefined) {
        sources[setting] = source;
        logger.debug(`${setting} from ${source}`);
        return value;
      }
    }
    return undefined;
  };

  const standard = (flag: string | undefined, envName: string, fileName?: string): Layer[] => {
    const layers: Layer[] = [
      ["flag", () => flag],
      ["env", () => env[envName]],
      ["dotenv", () => dotenvValues[envName]],
    ];
    if (fileName) {
      layers.push(["file", () => readConfigFile(fileName, cwd, homeDir)]);
    }
    return layers;
  };

  let detected: DetectedDefaults | undefined;
  const detectedValue = (key: keyof DetectedDefaults) => () => {
    detected ??= detect();
    return detected[key];
  };

  const libraryId = await pick("libraryId", [
    ...standard(overrides.libraryId, ENV_LIBRARY_ID, "library"),
    ["detected", detectedValue("libraryId")],
  ]);
  const apiKey = await pick("apiKey", standard(overrides.apiKey, ENV_API_KEY, "api-key"));
  const libraryType = await pick("libraryType", standard(overrides.libraryType, ENV_LIBRARY_TYPE, "library-type"));
  const betterBibtexDb = await pick("betterBibtexDb", [
    ...standard(overrides.betterBibtex, ENV_BETTERBIBTEX_DB, "better-bibtex"),
    ["detected", detectedValue("betterBibtexDb")],
  ]);
  const timeout = await pick(
    "timeoutMs",
    standard(overrides.timeout === undefined ? undefined : String(overrides.timeout), ENV_TIMEOUT)
  );

  sources.libraryType ??= "default";
  sources.timeoutMs ??= "default";

  return new Config(
    {
      libraryId,
      apiKey,
      libraryType: libraryType ? parseLibraryType(libraryType) : "user",
      betterBibtexDb: betterBibtexDb ? expandPath(betterBibtexDb, cwd, homeDir) : undefined,
      timeoutMs: timeout ? parseTimeout(timeout) : DEFAULT_TIMEOUT_MS,
    },
    sources
  );
}
