import fs from "fs/promises";
import path from "path";
import { Command, InvalidArgumentError } from "commander";
import pc from "picocolors";
import {
  CitationKeyStore,
  createLogger,
  KeysyncError,
  resolveConfig,
  verbosityToLevel,
  ZoteroClient,
  type Config,
  type Logger,
  type ReconcileReport,
} from "@keysync/core";
import { printError } from "../errors.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INCOMPLETE = 2;
export const EXIT_INTERRUPTED = 130;

export interface GlobalOptions {
  cwd: string;
  libraryId?: string;
  apiKey?: string;
  libraryType?: string;
  betterBibtex?: string;
  timeout?: string;
  quiet?: boolean;
  verbose: number;
}

export interface CliContext {
  cwd: string;
  logger: Logger;
  loadConfig(): Promise<Config>;
}

function rootOf(command: Command): Command {
  let root = command;
  while (root.parent) {
    root = root.parent;
  }
  return root;
}

export function cliContext(command: Command): CliContext {
  const options = rootOf(command).opts<GlobalOptions>();
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const logger = createLogger({ level: verbosityToLevel(options.verbose ?? 0, options.quiet) });

  return {
    cwd,
    logger,
    loadConfig: () =>
      resolveConfig(
        {
          libraryId: options.libraryId,
          apiKey: options.apiKey,
          libraryType: options.libraryType,
          betterBibtex: options.betterBibtex,
          timeout: options.timeout,
        },
        { cwd, logger }
      ),
  };
}

export function openClient(config: Config, logger: Logger): ZoteroClient {
  return new ZoteroClient({
    libraryId: config.requireLibraryId(),
    apiKey: config.requireApiKey(),
    libraryType: config.libraryType,
    timeoutMs: config.timeoutMs,
    logger,
  });
}

export function openStore(config: Config, logger: Logger): CitationKeyStore {
  return new CitationKeyStore(config.requireDatabasePath(), logger);
}

/**
 * Print a failed action and pick its exit code. Expected failures get one
 * line (plus a suggestion); the stack is shown only when debugging.
 */
export function reportFailure(
  error: unknown,
  options: { debug?: boolean; write?: (line: string) => void } = {}
): number {
  const write = options.write ?? ((line: string) => console.error(line));
  printError(error, write);
  const showStack = options.debug || Boolean(process.env.DEBUG);
  if (showStack && error instanceof Error && error.stack) {
    write(pc.dim(error.stack));
  } else if (!(error instanceof KeysyncError) && error instanceof Error && error.stack) {
    write(pc.dim("Unexpected error. Set DEBUG=1 or pass -vvv for a stack trace."));
  }
  return EXIT_FAILURE;
}

/**
 * Wrap a command action. The action may return an exit code; a thrown
 * error is printed and exits 1.
 */
export function withAction<T extends unknown[]>(fn: (...args: T) => Promise<number | void>) {
  return async (...args: T) => {
    try {
      const code = await fn(...args);
      if (typeof code === "number") {
        process.exitCode = code;
      }
    } catch (error) {
      const command = args.find((arg): arg is Command => arg instanceof Command);
      const debug = command ? cliContext(command).logger.level === "debug" : false;
      process.exitCode = reportFailure(error, { debug });
    }
  };
}

/** Write to `outfile` (relative to cwd) or stdout, newline-terminated. */
export async function writeOutput(text: string, outfile: string | undefined, cwd: string): Promise<void> {
  const body = text ? `${text}\n` : "";
  if (outfile) {
    await fs.writeFile(path.resolve(cwd, outfile), body, "utf8");
    return;
  }
  process.stdout.write(body);
}

/** Reports of remote changes go to stderr, away from any piped output. */
export function printReport(report: ReconcileReport, logger: Logger): void {
  if (logger.level === "silent") return;
  const color = report.executed ? pc.green : pc.yellow;
  console.error(color(report.message));
  if (!report.executed && report.action !== "skipped") {
    console.error(pc.dim("Nothing was changed. Re-run with --execute to apply."));
  }
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}
