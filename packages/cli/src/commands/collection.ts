import { Command, Option } from "commander";
import {
  addToCollection,
  CollectionTree,
  COLLECTION_FORMATS,
  CONFLICT_POLICIES,
  createCollection,
  DEFAULT_CITATION_KEY_FIELD,
  DEFAULT_DELIMITER,
  diffCollection,
  formatCollections,
  formatDiff,
  INPUT_FORMATS,
  replaceCollection,
  resolveInputKeys,
  type CollectionFormat,
  type CollectionSort,
  type ConflictPolicy,
  type ReconcileContext,
  type ReconcileReport,
} from "@keysync/core";
import {
  cliContext,
  EXIT_OK,
  openClient,
  openStore,
  parseInteger,
  printReport,
  withAction,
  writeOutput,
  type CliContext,
} from "./utils.js";

interface ListOptions {
  sort: CollectionSort;
  toFormat: CollectionFormat;
}

interface MutationOptions {
  fromFormat?: string;
  delimiter: string;
  readCitationKeyField: string;
  libraryFilter?: number;
  execute?: boolean;
  onConflict?: ConflictPolicy;
}

type Mutation = "create" | "add" | "replace" | "diff";

const MUTATIONS: Record<Mutation, string> = {
  create: "Create a collection (and missing parents) holding the items cited in the input",
  add: "Add the items cited in the input to an existing collection",
  replace: "Make an existing collection hold exactly the items cited in the input",
  diff: "Compare the items cited in the input with an existing collection",
};

type Runner = (
  reconcile: ReconcileContext,
  collectionPath: string,
  input: { itemKeys: string[]; unresolved: string[] },
  options: MutationOptions
) => Promise<ReconcileReport>;

const RUNNERS: Record<Mutation, Runner> = {
  create: (reconcile, collectionPath, input, options) =>
    createCollection(reconcile, collectionPath, input.itemKeys, options.onConflict),
  add: (reconcile, collectionPath, input) => addToCollection(reconcile, collectionPath, input.itemKeys),
  replace: (reconcile, collectionPath, input) => replaceCollection(reconcile, collectionPath, input.itemKeys),
  diff: (reconcile, collectionPath, input) => diffCollection(reconcile, collectionPath, input.itemKeys, input.unresolved),
};

async function runMutation(
  mutation: Mutation,
  ctx: CliContext,
  collectionPath: string,
  files: string[],
  options: MutationOptions
): Promise<number> {
  const config = await ctx.loadConfig();
  const client = openClient(config, ctx.logger);
  const store = openStore(config, ctx.logger);

  const { itemKeys, unresolved } = await resolveInputKeys(files, store, {
    format: options.fromFormat,
    delimiter: options.delimiter,
    citationKeyField: options.readCitationKeyField,
    libraryId: options.libraryFilter,
    cwd: ctx.cwd,
    logger: ctx.logger,
  });

  const reconcile: ReconcileContext = { client, logger: ctx.logger, execute: options.execute };
  const report = await RUNNERS[mutation](reconcile, collectionPath, { itemKeys, unresolved }, options);

  if (report.diff) {
    await writeOutput(formatDiff(report.path, report.diff), undefined, ctx.cwd);
    ctx.logger.info(report.message);
  } else {
    printReport(report, ctx.logger);
  }
  return EXIT_OK;
}

function registerMutation(collection: Command, mutation: Mutation) {
  const command = collection
    .command(mutation)
    .description(MUTATIONS[mutation])
    .argument("<path>", "Collection path, e.g. 'topic/subtopic'")
    .argument("<files...>", "Input files or glob patterns ('-' for stdin)")
    .addOption(new Option("-f, --from-format <format>", "Input format (guessed from extension)").choices(INPUT_FORMATS))
    .option("--delimiter <char>", "Delimiter for CSV input", DEFAULT_DELIMITER)
    .option("--read-citation-key-field <name>", "Citation key field in structured input", DEFAULT_CITATION_KEY_FIELD)
    .option("--library-filter <id>", "Only resolve keys from this local library ID", parseInteger);

  if (mutation !== "diff") {
    command.option("--execute", "Apply the changes (default is a dry run)");
  }
  if (mutation === "create") {
    command.addOption(
      new Option("--on-conflict <policy>", "What to do when the collection already exists")
        .choices(CONFLICT_POLICIES)
        .default("abort")
    );
  }

  command.action(
    withAction(async (collectionPath: string, files: string[], options: MutationOptions, cmd: Command) =>
      runMutation(mutation, cliContext(cmd), collectionPath, files, options)
    )
  );
}

export function registerCollectionCommand(program: Command) {
  const collection = program.command("collection").description("List, create, modify or diff Zotero collections");

  collection
    .command("list")
    .description("List all collections in the library")
    .argument("[pattern]", "Only show collections matching this regex (case-insensitive)")
    .addOption(new Option("--sort <order>", "Sort by name or item count").choices(["name", "items"]).default("name"))
    .addOption(new Option("-t, --to-format <format>", "Output format").choices(COLLECTION_FORMATS).default("tree"))
    .action(
      withAction(async (pattern: string | undefined, options: ListOptions, command: Command) => {
        const ctx = cliContext(command);
        const config = await ctx.loadConfig();
        const client = openClient(config, ctx.logger);

        const collections = await client.getCollections();
        if (!collections.length) {
          ctx.logger.info("No collections found.");
          return;
        }

        const tree = CollectionTree.build(collections);
        await writeOutput(formatCollections(tree, options.toFormat, { pattern, sort: options.sort }), undefined, ctx.cwd);
      })
    );

  for (const mutation of ["create", "add", "replace", "diff"] as const) {
    registerMutation(collection, mutation);
  }
}
