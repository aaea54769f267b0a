import { Command, Option } from "commander";
import {
  collectKeysFromFiles,
  DEFAULT_CITATION_KEY_FIELD,
  DEFAULT_DELIMITER,
  formatKeyMappings,
  formatPlainKeys,
  formatRecords,
  INPUT_FORMATS,
  OUTPUT_FORMATS,
  partitionMappings,
  previewKeys,
  resolveOutputFormat,
  type CitationKeyRecord,
} from "@keysync/core";
import { cliContext, EXIT_FAILURE, EXIT_INCOMPLETE, openStore, parseInteger, withAction, writeOutput } from "./utils.js";

interface ExtractOptions {
  fromFormat?: string;
  toFormat?: string;
  output?: string;
  delimiter: string;
  readCitationKeyField: string;
  writeCitationKeyField: string;
  keysOnly?: boolean;
  sort: "alpha" | "none";
  libraryFilter?: number;
}

type RecordSort = "citation-key" | "item-key" | "item-id";

interface ListOptions {
  toFormat?: string;
  output?: string;
  delimiter: string;
  sort: RecordSort;
}

export function compareKeys(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

const RECORD_ORDER: Record<RecordSort, (a: CitationKeyRecord, b: CitationKeyRecord) => number> = {
  "citation-key": (a, b) => compareKeys(a.citationKey, b.citationKey),
  "item-key": (a, b) => (a.itemKey < b.itemKey ? -1 : a.itemKey > b.itemKey ? 1 : 0),
  "item-id": (a, b) => a.itemId - b.itemId,
};

export function registerKeysCommand(program: Command) {
  const keys = program.command("keys").description("Extract and inspect citation keys");

  keys
    .command("extract")
    .description("Extract citation keys from files and resolve them to Zotero item keys")
    .argument("<files...>", "Input files or glob patterns ('-' for stdin)")
    .addOption(new Option("-f, --from-format <format>", "Input format (guessed from extension)").choices(INPUT_FORMATS))
    .addOption(new Option("-t, --to-format <format>", "Output format (default: from -o, else plaintext)").choices(OUTPUT_FORMATS))
    .option("-o, --output <file>", "Write to a file instead of stdout")
    .option("--delimiter <char>", "Delimiter for CSV input and output", DEFAULT_DELIMITER)
    .option("--read-citation-key-field <name>", "Citation key field in structured input", DEFAULT_CITATION_KEY_FIELD)
    .option("--write-citation-key-field <name>", "Citation key field in structured output", DEFAULT_CITATION_KEY_FIELD)
    .option("--keys-only", "Output citation keys without resolving them")
    .addOption(new Option("--sort <order>", "Key order").choices(["alpha", "none"]).default("alpha"))
    .option("--library-filter <id>", "Only resolve keys from this local library ID", parseInteger)
    .action(
      withAction(async (files: string[], options: ExtractOptions, command: Command) => {
        const ctx = cliContext(command);
        const { logger } = ctx;

        const citationKeys = await collectKeysFromFiles(files, {
          format: options.fromFormat,
          delimiter: options.delimiter,
          citationKeyField: options.readCitationKeyField,
          cwd: ctx.cwd,
          logger,
        });
        if (!citationKeys.length) {
          logger.warn("No citation keys found in input.");
          return EXIT_FAILURE;
        }
        if (options.sort === "alpha") {
          citationKeys.sort(compareKeys);
        }

        const format = resolveOutputFormat(options.output, options.toFormat);
        const formatOptions = { delimiter: options.delimiter, citationKeyField: options.writeCitationKeyField };

        if (options.keysOnly) {
          await writeOutput(formatPlainKeys(citationKeys, format, formatOptions), options.output, ctx.cwd);
          logger.info(`Extracted ${citationKeys.length} citation keys (keys-only mode)`);
          return;
        }

        const config = await ctx.loadConfig();
        const mappings = openStore(config, logger).resolve(citationKeys, { libraryId: options.libraryFilter });
        const { unresolved } = partitionMappings(mappings);
        logger.info(
          `Resolved ${mappings.length - unresolved.length}/${mappings.length} keys (${unresolved.length} unresolved)`
        );

        await writeOutput(formatKeyMappings(mappings, format, formatOptions), options.output, ctx.cwd);

        if (unresolved.length) {
          logger.warn(`${unresolved.length} citation keys not found in BetterBibTeX: ${previewKeys(unresolved)}`);
          return EXIT_INCOMPLETE;
        }
      })
    );

  keys
    .command("list")
    .description("List every citation key in the BetterBibTeX database")
    .addOption(new Option("-t, --to-format <format>", "Output format (default: from -o, else plaintext)").choices(OUTPUT_FORMATS))
    .option("-o, --output <file>", "Write to a file instead of stdout")
    .option("--delimiter <char>", "Delimiter for CSV output", DEFAULT_DELIMITER)
    .addOption(
      new Option("--sort <order>", "Record order").choices(["citation-key", "item-key", "item-id"]).default("citation-key")
    )
    .action(
      withAction(async (options: ListOptions, command: Command) => {
        const ctx = cliContext(command);
        const config = await ctx.loadConfig();
        const records = openStore(config, ctx.logger).readAllRecords().sort(RECORD_ORDER[options.sort]);

        const format = resolveOutputFormat(options.output, options.toFormat);
        await writeOutput(formatRecords(records, format, { delimiter: options.delimiter }), options.output, ctx.cwd);
        ctx.logger.info(`Listed ${records.length} citation keys`);
      })
    );
}
