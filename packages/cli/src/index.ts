#!/usr/bin/env -S node --import tsx
import pc from "picocolors";
import { createLogger, verbosityToLevel } from "@keysync/core";
import { EXIT_FAILURE, EXIT_INTERRUPTED, type GlobalOptions } from "./commands/utils.js";
import { createProgram } from "./program.js";

const program = createProgram();

process.on("SIGINT", () => {
  const options = program.opts<GlobalOptions>();
  createLogger({ level: verbosityToLevel(options.verbose, options.quiet) }).info("Interrupted.");
  process.exit(EXIT_INTERRUPTED);
});

program.parseAsync().catch((error: unknown) => {
  console.error(pc.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = EXIT_FAILURE;
});
