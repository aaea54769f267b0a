/**
 * Best-effort discovery of local Zotero settings.
 *
 * Finds the Zotero data directory, the Better BibTeX database inside it and
 * the web user ID recorded by the last sync. Nothing here writes, and
 * nothing here throws: a value that cannot be found is undefined.
 * The API key is never detectable.
 */

import fs from "fs";
import os from "os";
import path from "path";
import Database from "better-sqlite3";
import { BETTERBIBTEX_DB_FILE, ZOTERO_DB_FILE } from "./constants.js";
import { silentLogger, type Logger } from "./logger.js";

export interface DetectedDefaults {
  dataDir?: string;
  betterBibtexDb?: string;
  libraryId?: string;
}

function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

export interface IniSection {
  name: string;
  values: Record<string, string>;
}

/** Just enough of the INI format for Zotero's Firefox-style profiles.ini. */
export function parseIni(text: string): IniSection[] {
  const sections: IniSection[] = [];
  let current: IniSection | undefined;
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith(";") || line.startsWith("#")) continue;
    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      current = { name: header[1].trim(), values: {} };
      sections.push(current);
      continue;
    }
    const eq = line.indexOf("=");
    if (current && eq > 0) {
      current.values[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
    }
  }
  return sections;
}

/** Path of the `Default=1` profile, else the first profile with a path. */
export function pickProfilePath(sections: IniSection[]): string | undefined {
  let first: string | undefined;
  for (const section of sections) {
    if (!section.name.toLowerCase().startsWith("profile")) continue;
    const profilePath = section.values.Path;
    if (!profilePath) continue;
    if (section.values.Default === "1") return profilePath;
    first ??= profilePath;
  }
  return first;
}

/** A single string pref from a Firefox prefs.js. */
export function readPref(prefsText: string, key: string): string | undefined {
  const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const match = new RegExp(`user_pref\\("${escaped}",\\s*"([^"]+)"\\)`).exec(prefsText);
  return match?.[1];
}

function findLinuxDataDir(home: string): string | undefined {
  const profilesRoot = path.join(home, ".zotero", "zotero");
  let iniText: string;
  try {
    iniText = fs.readFileSync(path.join(profilesRoot, "profiles.ini"), "utf8");
  } catch {
    return undefined;
  }

  const chosen = pickProfilePath(parseIni(iniText));
  if (!chosen) return undefined;
  const profileDir = path.isAbsolute(chosen) ? chosen : path.join(profilesRoot, chosen);

  const prefsPath = path.join(profileDir, "prefs.js");
  if (fs.existsSync(prefsPath)) {
    const custom = readPref(fs.readFileSync(prefsPath, "utf8"), "extensions.zotero.dataDir");
    if (custom && isDirectory(custom)) return custom;
  }

  // Without a custom pref the data lives in the profile directory
  return isDirectory(profileDir) ? profileDir : undefined;
}

export function findZoteroDataDir(platform: NodeJS.Platform = process.platform, home = os.homedir()): string | undefined {
  if (platform === "darwin") {
    const candidate = path.join(home, "Library", "Application Support", "Zotero");
    return isDirectory(candidate) ? candidate : undefined;
  }
  if (platform === "win32") {
    const candidate = path.join(home, "AppData", "Roaming", "Zotero", "Zotero");
    return isDirectory(candidate) ? candidate : undefined;
  }
  return findLinuxDataDir(home);
}

export function findBetterBibtexDb(dataDir: string | undefined): string | undefined {
  if (!dataDir) return undefined;
  const candidate = path.join(dataDir, BETTERBIBTEX_DB_FILE);
  return fs.existsSync(candidate) ? candidate : undefined;
}

/** Web user ID from zotero.sqlite; only present once the client has synced. */
export function findLibraryId(dataDir: string | undefined, logger: Logger = silentLogger): string | undefined {
  if (!dataDir) return undefined;
  const dbPath = path.join(dataDir, ZOTERO_DB_FILE);
  if (!fs.existsSync(dbPath)) return undefined;

  try {
    const db = new Database(dbPath, { readonly: true, fileMustExist: true });
    try {
      const row: unknown = db
        .prepare("SELECT value FROM settings WHERE setting = 'account' AND key = 'userID'")
        .get();
      if (typeof row === "object" && row !== null && "value" in row && row.value !== null && row.value !== undefined) {
        return String(row.value);
      }
      return undefined;
    } finally {
      db.close();
    }
  } catch (error) {
    // Zotero holds an exclusive lock while running
    logger.debug(`Could not read ${dbPath}: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

export function detectDefaults(
  options: { platform?: NodeJS.Platform; home?: string; logger?: Logger } = {}
): DetectedDefaults {
  const dataDir = findZoteroDataDir(options.platform, options.home);
  return {
    dataDir,
    betterBibtexDb: findBetterBibtexDb(dataDir),
    libraryId: findLibraryId(dataDir, options.logger),
  };
}
