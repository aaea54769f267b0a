import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseLibraryType, parseTimeout, resolveConfig, type ResolveConfigOptions } from "../src/config.js";
import { ConfigurationError, NotFoundError } from "../src/errors.js";

let root: string;
let cwd: string;
let home: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "keysync-config-"));
  cwd = path.join(root, "project");
  home = path.join(root, "home");
  fs.mkdirSync(cwd);
  fs.mkdirSync(home);
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function write(dir: string, name: string, content: string) {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
}

function options(env: NodeJS.ProcessEnv = {}, detected: ResolveConfigOptions["detect"] = () => ({})): ResolveConfigOptions {
  return { cwd, homeDir: home, env, detect: detected };
}

// ─── Defaults Tests ───────────────────────────────────────────────────────────

describe("resolveConfig defaults", () => {
  it("falls back to a user library and a 30s timeout", async () => {
    const config = await resolveConfig({}, options());

    expect(config.libraryType).toBe("user");
    expect(config.timeoutMs).toBe(30000);
    expect(config.libraryId).toBeUndefined();
    expect(config.sources).toEqual({ libraryType: "default", timeoutMs: "default" });
  });

  it("explains how to provide missing values", async () => {
    const config = await resolveConfig({}, options());

    expect(() => config.requireLibraryId()).toThrow(
      "Library ID required. Provide via -i/--library-id, $ZOTERO_LIBRARY_ID, or .keysync/library file."
    );
    expect(() => config.requireApiKey()).toThrow(ConfigurationError);
    expect(() => config.requireDatabasePath()).toThrow(ConfigurationError);
  });
});

// ─── Precedence Tests ─────────────────────────────────────────────────────────

describe("resolveConfig precedence", () => {
  beforeEach(() => {
    write(cwd, ".env", "ZOTERO_LIBRARY_ID=333\n");
    write(cwd, ".keysync/library", "444\n");
    write(home, ".keysync/library", "445\n");
  });

  const detected = () => ({ libraryId: "555" });

  it("takes the flag first", async () => {
    const config = await resolveConfig({ libraryId: "111" }, options({ ZOTERO_LIBRARY_ID: "222" }, detected));
    expect(config.libraryId).toBe("111");
    expect(config.sources.libraryId).toBe("flag");
  });

  it("then the environment", async () => {
    const config = await resolveConfig({}, options({ ZOTERO_LIBRARY_ID: "222" }, detected));
    expect(config.libraryId).toBe("222");
    expect(config.sources.libraryId).toBe("env");
  });

  it("then .env.local over .env", async () => {
    write(cwd, ".env.local", "ZOTERO_LIBRARY_ID=334\n");
    const config = await resolveConfig({}, options({}, detected));
    expect(config.libraryId).toBe("334");
    expect(config.sources.libraryId).toBe("dotenv");
  });

  it("then the project config file over the home one", async () => {
    fs.rmSync(path.join(cwd, ".env"));
    const config = await resolveConfig({}, options({}, detected));
    expect(config.libraryId).toBe("444");
    expect(config.sources.libraryId).toBe("file");
  });

  it("then the home config file", async () => {
    fs.rmSync(path.join(cwd, ".env"));
    fs.rmSync(path.join(cwd, ".keysync"), { recursive: true });
    const config = await resolveConfig({}, options({}, detected));
    expect(config.libraryId).toBe("445");
  });

  it("then auto-detection", async () => {
    fs.rmSync(path.join(cwd, ".env"));
    fs.rmSync(path.join(cwd, ".keysync"), { recursive: true });
    fs.rmSync(path.join(home, ".keysync"), { recursive: true });
    const config = await resolveConfig({}, options({}, detected));
    expect(config.libraryId).toBe("555");
    expect(config.sources.libraryId).toBe("detected");
  });

  it("ignores blank values", async () => {
    const config = await resolveConfig({ libraryId: "  " }, options({ ZOTERO_LIBRARY_ID: "" }, detected));
    expect(config.libraryId).toBe("333");
  });

  it("does not touch the environment it was given", async () => {
    const env: NodeJS.ProcessEnv = {};
    await resolveConfig({}, options(env, detected));
    expect(env).toEqual({});
  });
});

describe("auto-detection", () => {
  it("is skipped when every detectable value is given", async () => {
    const detect = vi.fn(() => ({}));
    await resolveConfig({ libraryId: "1", betterBibtex: "bbt.sqlite" }, options({}, detect));
    expect(detect).not.toHaveBeenCalled();
  });

  it("runs once for both detectable values", async () => {
    const detect = vi.fn(() => ({ libraryId: "9", betterBibtexDb: "/data/better-bibtex.sqlite" }));
    const config = await resolveConfig({}, options({}, detect));
    expect(detect).toHaveBeenCalledTimes(1);
    expect(config.betterBibtexDb).toBe("/data/better-bibtex.sqlite");
    expect(config.sources.betterBibtexDb).toBe("detected");
  });
});

// ─── Database path Tests ──────────────────────────────────────────────────────

describe("database path", () => {
  it("resolves relative and home paths", async () => {
    const relative = await resolveConfig({ betterBibtex: "db/bbt.sqlite" }, options());
    expect(relative.betterBibtexDb).toBe(path.join(cwd, "db", "bbt.sqlite"));

    const homePath = await resolveConfig({ betterBibtex: "~/bbt.sqlite" }, options());
    expect(homePath.betterBibtexDb).toBe(path.join(home, "bbt.sqlite"));
  });

  it("requires the file to exist", async () => {
    const missing = await resolveConfig({ betterBibtex: "bbt.sqlite" }, options());
    expect(() => missing.requireDatabasePath()).toThrow(NotFoundError);

    write(cwd, "bbt.sqlite", "");
    const present = await resolveConfig({ betterBibtex: "bbt.sqlite" }, options());
    expect(present.requireDatabasePath()).toBe(path.join(cwd, "bbt.sqlite"));
  });
});

// ─── Validation Tests ─────────────────────────────────────────────────────────

describe("value validation", () => {
  it("accepts library types in any case", () => {
    expect(parseLibraryType(" Group ")).toBe("group");
    expect(() => parseLibraryType("team")).toThrow("Invalid library type 'team'. Expected one of: user, group");
  });

  it("parses timeouts from flags and the environment", async () => {
    expect(parseTimeout("1500")).toBe(1500);
    expect(parseTimeout(2500.4)).toBe(2500);
    expect(() => parseTimeout("0")).toThrow(ConfigurationError);
    expect(() => parseTimeout("0.4")).toThrow("Invalid timeout '0.4': expected a positive number of milliseconds.");
    expect(parseTimeout("0.6")).toBe(1);

    const config = await resolveConfig({}, options({ KEYSYNC_TIMEOUT: "1500" }));
    expect(config.timeoutMs).toBe(1500);
    expect(config.sources.timeoutMs).toBe("env");
  });

  it("rejects a bad value from any layer", async () => {
    await expect(resolveConfig({}, options({ ZOTERO_LIBRARY_TYPE: "team" }))).rejects.toThrow(ConfigurationError);
    await expect(resolveConfig({ timeout: "abc" }, options())).rejects.toThrow(
      "Invalid timeout 'abc': expected a positive number of milliseconds."
    );
  });
});
