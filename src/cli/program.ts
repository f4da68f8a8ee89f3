/**
 * program.ts - Command definitions for the weaviate-bridge CLI
 *
 * What this file does:
 * Builds the commander program. Each command opens a store, runs one
 * operation, prints the outcome and closes the store. Command output goes
 * through `io.out`; diagnostics go to the logger, which the entry point
 * points at stderr.
 *
 * Commands:
 *   endpoint                       Resolved base URL, path prefix, API version
 *   collections                    Every collection either surface reports
 *   ensure <name>                  Create the collection if needed, wait until ready
 *   ingest <name> <file>           Insert a JSON array of documents
 *   search <name> <query>          Tiered search; --hybrid to set alpha explicitly
 *   delete <name>                  Drop the collection
 *
 * A failed operation throws CliError; the entry point prints it and exits 1.
 */

import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { formatSearchResults } from "../search/format-results";
import type { DocumentStore, IngestionReport } from "../vectorstore/types";

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

export interface GlobalOptions {
  url?: string;
  logLevel?: string;
}

export interface CliDependencies {
  openStore(options: GlobalOptions): Promise<DocumentStore>;
  readFile(path: string): Promise<string>;
  io: { out(text: string): void };
}

const scalar = z.union([z.string(), z.number(), z.boolean()]);

/** One Document Record as it appears in an ingest file. */
export const documentSchema = z.object({
  content: z.string().min(1),
  source: z.string().optional(),
  sourceType: z.string().optional(),
  page: z.number().int().optional(),
  section: z.string().optional(),
  vector: z.array(z.number()).optional(),
  vectors: z.record(z.array(z.number())).optional(),
  metadata: z.record(scalar).optional(),
  properties: z.record(scalar).optional(),
});

export const documentsFileSchema = z.array(documentSchema);

export type DocumentsFile = z.infer<typeof documentsFileSchema>;

/** Parses and validates an ingest file's contents. */
export function parseDocumentsFile(text: string, path: string): DocumentsFile {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError(`${path} is not valid JSON: ${reason}`);
  }

  const parsed = documentsFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new CliError(`Invalid documents in ${path}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

function unitInterval(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError("must be a number between 0 and 1");
  }
  return parsed;
}

/**
 * Summary lines for an ingestion report.
 *
 * Example:
 *   Inserted 3 of 3 documents into "Board Minutes" (typed)
 *   Count: 12 -> 15
 */
export function formatIngestionReport(report: IngestionReport): string {
  const lines = [
    `Inserted ${report.processed} of ${report.attempted} documents into "${report.collection}" (${report.path})`,
  ];
  if (report.preCount !== null && report.postCount !== null) {
    lines.push(`Count: ${report.preCount} -> ${report.postCount}`);
  }
  for (const warning of report.warnings) {
    lines.push(`Warning: ${warning}`);
  }
  return lines.join("\n");
}

export function buildProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name("weaviate-bridge")
    .description("Manage and search Weaviate collections through a resilient access layer")
    .version("0.1.0")
    .option("--url <url>", "Weaviate base URL (default: WEAVIATE_URL or http://localhost:8080)")
    .option("--log-level <level>", "Log level for diagnostics on stderr (default: WEAVIATE_LOG_LEVEL or info)");

  /** Opens a store with the global options, runs `fn`, always closes. */
  const withStore = async (fn: (store: DocumentStore) => Promise<void>): Promise<void> => {
    const store = await deps.openStore(program.opts<GlobalOptions>());
    try {
      await fn(store);
    } finally {
      await store.close();
    }
  };

  program
    .command("endpoint")
    .description("Show the resolved base URL, path prefix and API version")
    .action(() =>
      withStore(async (store) => {
        const endpoint = await store.describeEndpoint();
        deps.io.out(
          [
            `Base URL:    ${endpoint.baseUrl}`,
            `Path prefix: ${endpoint.prefix || "/"}`,
            `API version: ${endpoint.apiVersion}`,
          ].join("\n")
        );
      })
    );

  program
    .command("collections")
    .description("List collections")
    .action(() =>
      withStore(async (store) => {
        const names = await store.listCollections();
        deps.io.out(names.length > 0 ? names.join("\n") : "No collections found.");
      })
    );

  program
    .command("ensure")
    .description("Create a collection if it does not exist and wait until it is ready")
    .argument("<name>", "Collection name (sanitized for storage)")
    .option("--description <text>", "Collection description")
    .action((name: string, options: { description?: string }) =>
      withStore(async (store) => {
        const result = await store.ensureCollection(name, { description: options.description });
        if (!result.ok) throw new CliError(result.message);
        deps.io.out(result.message);
      })
    );

  program
    .command("ingest")
    .description("Insert documents from a JSON file (an array of document records)")
    .argument("<name>", "Collection name")
    .argument("<file>", "Path to the JSON file")
    .action((name: string, file: string) =>
      withStore(async (store) => {
        const documents = parseDocumentsFile(await deps.readFile(file), file);
        const report = await store.insert(name, documents);
        deps.io.out(formatIngestionReport(report));
        if (!report.success) throw new CliError(report.error ?? "ingestion failed");
      })
    );

  program
    .command("search")
    .description("Search a collection, falling back through hybrid, vector and keyword strategies")
    .argument("<name>", "Collection name")
    .argument("<query>", "Search text")
    .option("-l, --limit <n>", "Maximum results", positiveInt, 10)
    .option("--hybrid", "Use an explicit hybrid weight (see --alpha)")
    .option("--alpha <alpha>", "Vector weight for --hybrid, 0 (keyword) to 1 (vector)", unitInterval)
    .action((name: string, query: string, options: { limit: number; hybrid?: boolean; alpha?: number }) =>
      withStore(async (store) => {
        const results = options.hybrid
          ? await store.hybridSearch(name, query, { limit: options.limit, alpha: options.alpha })
          : await store.search(name, query, { limit: options.limit });
        deps.io.out(formatSearchResults(results, name));
      })
    );

  program
    .command("delete")
    .description("Delete a collection")
    .argument("<name>", "Collection name")
    .action((name: string) =>
      withStore(async (store) => {
        const result = await store.deleteCollection(name);
        if (!result.ok) throw new CliError(result.message);
        deps.io.out(result.message);
      })
    );

  return program;
}
