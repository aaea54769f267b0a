import { Command } from "commander";
import { registerAllCommands } from "./commands/index.js";

export function createProgram(): Command {
  const program = new Command();
  program
    .name("keysync")
    .description("Sync Zotero collections with the citation keys your documents use")
    .option("--cwd <path>", "Working directory", process.cwd())
    .option("-i, --library-id <id>", "Zotero library ID")
    .option("-k, --api-key <key>", "Zotero API key")
    .option("--library-type <type>", "Library type: user or group")
    .option("-b, --better-bibtex <path>", "Path to better-bibtex.sqlite")
    .option("--timeout <ms>", "Remote request timeout in milliseconds")
    .option("-q, --quiet", "Suppress all log output")
    .option("-v, --verbose", "More output; repeat for more (-v warnings, -vv info, -vvv debug)", (_value: string, previous: number) => previous + 1, 0);

  registerAllCommands(program);
  return program;
}
