import { describe, it, expect, vi } from "vitest";
import { buildProgram, CliError, formatIngestionReport, parseDocumentsFile } from "./program";
import type { DocumentStore, IngestionReport, SearchResult } from "../vectorstore/types";

const REPORT: IngestionReport = {
  collection: "Board Minutes",
  storageName: "BoardMinutes",
  success: true,
  path: "typed",
  attempted: 2,
  processed: 2,
  preCount: 5,
  postCount: 7,
  insertedDelta: 2,
  durationMs: 12,
  warnings: [],
  error: null,
};

const HIT: SearchResult = {
  id: "1",
  content: "Library hours extended",
  source: "a.pdf",
  sourceType: "pdf",
  metadata: {},
  score: 0.75,
  strategy: "hybrid",
};

function fakeStore(): DocumentStore {
  return {
    describeEndpoint: vi.fn(async () => ({ baseUrl: "http://localhost:8080", prefix: "", apiVersion: "v1" as const })),
    listCollections: vi.fn(async () => ["Board Minutes", "Docs"]),
    ensureCollection: vi.fn(async () => ({ ok: true, storageName: "Docs", message: "Docs is ready" })),
    ready: vi.fn(async () => ({ ok: true, storageName: "Docs", message: "Docs is ready" })),
    deleteCollection: vi.fn(async () => ({ ok: false, storageName: "Docs", message: "could not delete Docs" })),
    count: vi.fn(async () => 0),
    insert: vi.fn(async () => REPORT),
    search: vi.fn(async () => [HIT]),
    hybridSearch: vi.fn(async () => [HIT]),
    close: vi.fn(async () => undefined),
  };
}

function setup(files: Record<string, string> = {}) {
  const store = fakeStore();
  const output: string[] = [];
  const openStore = vi.fn(async () => store);
  const program = buildProgram({
    openStore,
    readFile: async (path) => {
      const text = files[path];
      if (text === undefined) throw new Error(`ENOENT: ${path}`);
      return text;
    },
    io: { out: (text) => output.push(text) },
  });
  program.exitOverride();
  const run = (...args: string[]) => program.parseAsync(args, { from: "user" });
  return { store, output, openStore, run };
}

describe("weaviate-bridge CLI", () => {
  it("prints the resolved endpoint and passes --url to the store", async () => {
    const { output, openStore, store, run } = setup();

    await run("--url", "http://db:8080", "endpoint");

    expect(openStore).toHaveBeenCalledWith({ url: "http://db:8080" });
    expect(output).toEqual(["Base URL:    http://localhost:8080\nPath prefix: /\nAPI version: v1"]);
    expect(store.close).toHaveBeenCalledOnce();
  });

  it("lists collections one per line", async () => {
    const { output, run } = setup();

    await run("collections");

    expect(output).toEqual(["Board Minutes\nDocs"]);
  });

  it("ingests a validated documents file", async () => {
    const { output, store, run } = setup({
      "docs.json": JSON.stringify([{ content: "Budget approved", source: "a.pdf", page: 2 }, { content: "Roads" }]),
    });

    await run("ingest", "Board Minutes", "docs.json");

    expect(store.insert).toHaveBeenCalledWith("Board Minutes", [
      { content: "Budget approved", source: "a.pdf", page: 2 },
      { content: "Roads" },
    ]);
    expect(output).toEqual(['Inserted 2 of 2 documents into "Board Minutes" (typed)\nCount: 5 -> 7']);
  });

  it("rejects an invalid documents file and still closes the store", async () => {
    const { store, run } = setup({ "bad.json": JSON.stringify([{ source: "a.pdf" }]) });

    await expect(run("ingest", "Docs", "bad.json")).rejects.toThrow(
      "Invalid documents in bad.json: 0.content: Required"
    );
    expect(store.insert).not.toHaveBeenCalled();
    expect(store.close).toHaveBeenCalledOnce();
  });

  it("searches with a limit", async () => {
    const { store, output, run } = setup();

    await run("search", "Docs", "library", "--limit", "3");

    expect(store.search).toHaveBeenCalledWith("Docs", "library", { limit: 3 });
    expect(output).toEqual([
      'Found 1 result in "Docs":\n\n1. a.pdf (score: 0.75, hybrid)\n   Library hours extended',
    ]);
  });

  it("runs a hybrid search with an explicit alpha", async () => {
    const { store, run } = setup();

    await run("search", "Docs", "library", "--hybrid", "--alpha", "0.2");

    expect(store.hybridSearch).toHaveBeenCalledWith("Docs", "library", { limit: 10, alpha: 0.2 });
    expect(store.search).not.toHaveBeenCalled();
  });

  it("rejects an alpha outside [0,1]", async () => {
    const { store, run } = setup();

    await expect(run("search", "Docs", "library", "--hybrid", "--alpha", "1.5")).rejects.toThrow();
    expect(store.hybridSearch).not.toHaveBeenCalled();
  });

  it("fails when an operation reports failure", async () => {
    const { output, run } = setup();

    await expect(run("delete", "Docs")).rejects.toBeInstanceOf(CliError);
    expect(output).toEqual([]);
  });
});

describe("parseDocumentsFile", () => {
  it("reports malformed JSON", () => {
    expect(() => parseDocumentsFile("[{", "docs.json")).toThrow(/^docs\.json is not valid JSON: /);
  });

  it("accepts metadata and named vectors", () => {
    const documents = parseDocumentsFile(
      JSON.stringify([{ content: "x", metadata: { year: 2024 }, vectors: { content: [0.1, 0.2] } }]),
      "docs.json"
    );

    expect(documents[0].metadata).toEqual({ year: 2024 });
    expect(documents[0].vectors).toEqual({ content: [0.1, 0.2] });
  });
});

describe("formatIngestionReport", () => {
  it("adds warnings and omits counts that are unknown", () => {
    expect(
      formatIngestionReport({
        ...REPORT,
        path: "rest",
        processed: 1,
        preCount: null,
        warnings: ["typed batch failed: timeout"],
      })
    ).toBe('Inserted 1 of 2 documents into "Board Minutes" (rest)\nWarning: typed batch failed: timeout');
  });
});
