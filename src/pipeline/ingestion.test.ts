/**
 * ingestion.test.ts - Unit tests for the ingestion pipeline
 *
 * Uses the in-memory typed client and the in-process REST server, so both
 * insertion paths and the count bookkeeping run end to end without a
 * Weaviate instance.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { IngestionPipeline, type IngestionOptions } from "./ingestion";
import { CollectionManager } from "../vectorstore/collection-manager";
import { SchemaReconciler } from "../vectorstore/reconciler";
import { FakeTypedClient } from "../testing/fake-typed-client";
import { FakeRestServer, createFakeRestSurface } from "../testing/fake-rest-server";
import { silentLogger } from "../logger";
import type { CollectionSchema, DocumentRecord } from "../vectorstore/types";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

const STANDARD_SCHEMA: CollectionSchema = {
  name: "Docs",
  properties: { content: "text", source: "text", source_type: "text", created_at: "date" },
  namedVectors: [],
};

const RECORDS: DocumentRecord[] = [
  { content: "Budget approved", source: "minutes-1.pdf" },
  { content: "Road repairs scheduled", source: "minutes-2.pdf" },
  { content: "Library hours extended", source: "minutes-3.pdf" },
];

function setup(
  typed: FakeTypedClient | null,
  overrides: Partial<IngestionOptions> = {}
) {
  const server = new FakeRestServer();
  const rest = createFakeRestSurface(server);
  const logger = silentLogger();
  const reconciler = new SchemaReconciler(typed, rest, logger);
  const manager = new CollectionManager(typed, rest, reconciler, {
    logger,
    useClientVectors: false,
    readyTimeoutMs: 0,
    readyIntervalMs: 0,
  });
  const pipeline = new IngestionPipeline(typed, rest, manager, reconciler, {
    logger,
    batchChunkSize: 2,
    insertLogEvery: 1,
    insertMaxSec: 180,
    postCountRetries: 0,
    postCountDelayMs: 0,
    includeMetadata: false,
    forceRestBatch: false,
    visibilityRetries: 1,
    visibilityDelayMs: 0,
    ...overrides,
  });
  return { server, pipeline };
}

function seededTyped(): FakeTypedClient {
  const typed = new FakeTypedClient();
  typed.seed(STANDARD_SCHEMA);
  return typed;
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Typed path
// ---------------------------------------------------------------------------

describe("typed path", () => {
  it("inserts in chunks and reports the count delta", async () => {
    const typed = seededTyped();
    const { pipeline } = setup(typed);

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report).toMatchObject({
      collection: "docs",
      storageName: "Docs",
      success: true,
      path: "typed",
      attempted: 3,
      processed: 3,
      preCount: 0,
      postCount: 3,
      insertedDelta: 3,
      warnings: [],
      error: null,
    });
    expect(typed.calls.filter((call) => call === "insertMany")).toHaveLength(2);
  });

  it("reports per-object errors as warnings", async () => {
    const typed = seededTyped();
    typed.insertMany = async () => ({ inserted: 1, errors: ["invalid date"] });
    const { pipeline } = setup(typed);

    const report = await pipeline.insert("docs", "Docs", RECORDS.slice(0, 2));

    expect(report.success).toBe(true);
    expect(report.processed).toBe(1);
    expect(report.warnings).toContain("invalid date");
  });

  it("switches to REST when a typed batch fails", async () => {
    const typed = seededTyped();
    typed.failures.set("insertMany", new Error("gRPC unavailable"));
    const { server, pipeline } = setup(typed);
    server.seedClass("Docs", STANDARD_SCHEMA.properties);

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report.path).toBe("rest");
    expect(report.processed).toBe(3);
    expect(report.warnings).toContain("typed batch failed: gRPC unavailable");
    expect(server.classes.get("Docs")?.objects).toHaveLength(3);
  });

  it("stops once the time budget is spent", async () => {
    let now = 0;
    vi.spyOn(Date, "now").mockImplementation(() => now);
    const typed = seededTyped();
    const insertMany = typed.insertMany.bind(typed);
    typed.insertMany = async (name, objects) => {
      now += 2_000;
      return insertMany(name, objects);
    };
    const { pipeline } = setup(typed, { batchChunkSize: 1, insertMaxSec: 1 });

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report.processed).toBe(1);
    expect(report.success).toBe(true);
    expect(report.warnings).toContain("stopped after 2s with 1 of 3 objects submitted");
  });
});

// ---------------------------------------------------------------------------
// REST path
// ---------------------------------------------------------------------------

describe("REST path", () => {
  it("inserts over REST when the typed client cannot see the collection", async () => {
    const typed = new FakeTypedClient();
    typed.blind = true;
    const { server, pipeline } = setup(typed);
    server.seedClass("Docs");

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report).toMatchObject({
      success: true,
      path: "rest",
      processed: 3,
      preCount: 0,
      postCount: 3,
      insertedDelta: 3,
    });
    expect(report.warnings).toEqual(["dropped properties not in the schema: created_at"]);
  });

  it("uses REST when forced", async () => {
    const typed = seededTyped();
    const { server, pipeline } = setup(typed, { forceRestBatch: true });
    server.seedClass("Docs", STANDARD_SCHEMA.properties);

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report.path).toBe("rest");
    expect(typed.calls).not.toContain("insertMany");
  });

  it("works without a typed client", async () => {
    const { server, pipeline } = setup(null);
    server.seedClass("Docs", STANDARD_SCHEMA.properties);

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report.insertedDelta).toBe(3);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe("failures", () => {
  it("sets error when the collection is visible nowhere", async () => {
    const { pipeline } = setup(new FakeTypedClient());

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report).toMatchObject({
      success: false,
      path: "none",
      processed: 0,
      error: "collection Docs is not visible on any surface",
    });
  });

  it("sets error when nothing was accepted", async () => {
    const typed = seededTyped();
    typed.failures.set("insertMany", new Error("gRPC unavailable"));
    const { server, pipeline } = setup(typed, { batchChunkSize: 10 });
    server.unreachable = true;

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report.success).toBe(false);
    expect(report.error).toBe("connect ECONNREFUSED http://localhost:8080/v1/batch/objects");
  });

  it("warns when the count grew by less than attempted", async () => {
    const typed = seededTyped();
    typed.insertMany = async (_name, objects) => ({ inserted: objects.length, errors: [] });
    const { pipeline } = setup(typed);

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report.success).toBe(true);
    expect(report.insertedDelta).toBe(0);
    expect(report.warnings).toEqual(["count grew by 0 for 3 attempted objects"]);
  });

  it("caps the delta at attempted when another writer grows the count", async () => {
    const typed = seededTyped();
    const insertMany = typed.insertMany.bind(typed);
    const count = typed.count.bind(typed);
    let otherWrites = 0;
    typed.insertMany = async (name, objects) => {
      otherWrites = 2;
      return insertMany(name, objects);
    };
    typed.count = async (name) => (await count(name)) + otherWrites;
    const { pipeline } = setup(typed);

    const report = await pipeline.insert("docs", "Docs", RECORDS);

    expect(report).toMatchObject({ preCount: 0, postCount: 5, insertedDelta: 3 });
    expect(report.warnings).toEqual([
      "count grew by 5 for 3 attempted objects; another writer may be active",
    ]);
  });

  it("accepts an empty batch", async () => {
    const { pipeline } = setup(seededTyped());

    const report = await pipeline.insert("docs", "Docs", []);

    expect(report).toMatchObject({ success: true, attempted: 0, processed: 0, preCount: null });
  });
});
