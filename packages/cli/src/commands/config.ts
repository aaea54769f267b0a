import os from "os";
import { Command } from "commander";
import pc from "picocolors";
import { detectDefaults, type Config, type ConfigSource, type DetectedDefaults } from "@keysync/core";
import { cliContext, withAction } from "./utils.js";

export function maskSecret(secret: string): string {
  return secret.length <= 4 ? "****" : `****${secret.slice(-4)}`;
}

function describe(value: string | undefined, source: ConfigSource | undefined): string {
  if (value === undefined) return "(not set)";
  return source === "detected" ? `${value}  [auto-detected]` : value;
}

/** Rows of `label  value` for the resolved configuration. */
export function describeConfig(config: Config, detected: DetectedDefaults): Array<[string, string]> {
  return [
    ["Library ID", describe(config.libraryId, config.sources.libraryId)],
    ["API key", config.apiKey ? maskSecret(config.apiKey) : "(not set)"],
    ["Library type", config.libraryType],
    ["BetterBibTeX DB", describe(config.betterBibtexDb, config.sources.betterBibtexDb)],
    ["Timeout", `${config.timeoutMs}ms`],
    ["Zotero data dir", detected.dataDir ?? "(not found)"],
  ];
}

export function registerConfigCommand(program: Command) {
  program
    .command("config")
    .description("Show the resolved configuration and auto-detected Zotero values")
    .action(
      withAction(async (_options: Record<string, never>, command: Command) => {
        const ctx = cliContext(command);
        const config = await ctx.loadConfig();
        const detected = detectDefaults({ home: os.homedir(), logger: ctx.logger });

        const rows = describeConfig(config, detected);
        const width = Math.max(...rows.map(([label]) => label.length));
        for (const [label, value] of rows) {
          console.log(`  ${pc.bold(label.padEnd(width))}  ${value}`);
        }
      })
    );
}
