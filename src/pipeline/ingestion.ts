/**
 * ingestion.ts - Batch insertion of Document Records
 *
 * What this file does:
 * Inserts records into one collection and reports what actually landed.
 * The flow:
 *
 * 1. Pick a path: typed client when it can see the collection, REST when
 *    only REST can, readiness once when neither can
 * 2. Count objects before inserting (best effort)
 * 3. Map records to storage objects filtered to the collection's schema
 * 4. Submit in sequential chunks, logging progress and stopping early once
 *    the time budget is spent
 * 5. Count again, briefly retried, and compare
 *
 * Nothing here throws for a partial failure. Per-object errors, early
 * stops and count shortfalls become warnings; only a run where no object
 * was accepted sets `error`.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logger";
import { describeError } from "../errors";
import type { CollectionManager } from "../vectorstore/collection-manager";
import type { SchemaReconciler } from "../vectorstore/reconciler";
import type { RestSurface } from "../vectorstore/rest-surface";
import type { TypedStoreClient } from "../vectorstore/typed-client";
import type {
  DocumentRecord,
  IngestionPath,
  IngestionReport,
  StorageObject,
} from "../vectorstore/types";
import { toStorageObjects } from "./documents";

export interface IngestionOptions {
  logger: Logger;
  batchChunkSize: number;
  insertLogEvery: number;
  insertMaxSec: number;
  postCountRetries: number;
  postCountDelayMs: number;
  includeMetadata: boolean;
  forceRestBatch: boolean;
  /** Typed-visibility refreshes before settling for REST */
  visibilityRetries?: number;
  visibilityDelayMs?: number;
}

interface ChunkOutcome {
  accepted: number;
  errors: string[];
}

export class IngestionPipeline {
  private readonly log: Logger;

  constructor(
    private readonly typed: TypedStoreClient | null,
    private readonly rest: RestSurface,
    private readonly manager: CollectionManager,
    private readonly reconciler: SchemaReconciler,
    private readonly options: IngestionOptions
  ) {
    this.log = options.logger.child({ component: "ingestion" });
  }

  async insert(
    callerName: string,
    storageName: string,
    records: DocumentRecord[]
  ): Promise<IngestionReport> {
    const started = Date.now();
    const report: IngestionReport = {
      collection: callerName,
      storageName,
      success: false,
      path: "none",
      attempted: records.length,
      processed: 0,
      preCount: null,
      postCount: null,
      insertedDelta: null,
      durationMs: 0,
      warnings: [],
      error: null,
    };
    const finish = (): IngestionReport => {
      report.durationMs = Date.now() - started;
      report.success = report.error === null;
      return report;
    };

    report.path = await this.choosePath(storageName);
    if (report.path === "none") {
      report.error = `collection ${storageName} is not visible on any surface`;
      this.log.error({ collection: storageName }, report.error);
      return finish();
    }
    if (records.length === 0) return finish();

    report.preCount = await this.manager.count(storageName);

    const schema = await this.manager.schemaFor(storageName);
    const { objects, dropped } = toStorageObjects(records, schema, {
      includeMetadata: this.options.includeMetadata,
      now: new Date(),
    });
    if (dropped.length > 0) {
      report.warnings.push(`dropped properties not in the schema: ${dropped.join(", ")}`);
    }

    await this.submit(storageName, objects, report, started);

    if (report.processed === 0) {
      report.error = report.warnings.at(-1) ?? "no objects were accepted";
    }

    report.postCount = await this.postCount(storageName, report.preCount, report.processed);
    if (report.preCount !== null && report.postCount !== null) {
      const grew = Math.max(0, report.postCount - report.preCount);
      // Other writers can grow the count too; the delta never exceeds this call's objects
      report.insertedDelta = Math.min(grew, report.attempted);
      if (grew > report.attempted) {
        report.warnings.push(
          `count grew by ${grew} for ${report.attempted} attempted objects; another writer may be active`
        );
      } else if (report.insertedDelta < report.attempted) {
        report.warnings.push(
          `count grew by ${report.insertedDelta} for ${report.attempted} attempted objects`
        );
      }
    }

    this.log.info(
      {
        collection: storageName,
        path: report.path,
        attempted: report.attempted,
        processed: report.processed,
        insertedDelta: report.insertedDelta,
      },
      "insert finished"
    );
    return finish();
  }

  // -------------------------------------------------------------------------
  // Path selection
  // -------------------------------------------------------------------------

  private async choosePath(storageName: string): Promise<IngestionPath> {
    const path = await this.visiblePath(storageName);
    if (path !== "none") return path;

    this.log.warn({ collection: storageName }, "collection not visible; waiting for readiness");
    await this.manager.ready(storageName);
    return this.visiblePath(storageName);
  }

  private async visiblePath(storageName: string): Promise<IngestionPath> {
    if (this.typed && !this.options.forceRestBatch) {
      if (await this.reconciler.typedVisible(storageName)) return "typed";
      const retries = this.options.visibilityRetries ?? 2;
      const delayMs = this.options.visibilityDelayMs ?? 500;
      if (await this.reconciler.waitForVisibility(storageName, retries, delayMs)) return "typed";
    }

    const rest = await this.reconciler.restVisibility(storageName);
    if (rest.v1 || rest.v2) {
      if (this.typed && !this.options.forceRestBatch) {
        this.log.warn({ collection: storageName }, "typed client cannot see collection; inserting over REST");
      }
      return "rest";
    }

    if (this.options.forceRestBatch && (await this.reconciler.typedVisible(storageName))) {
      return "rest";
    }
    return "none";
  }

  // -------------------------------------------------------------------------
  // Submission
  // -------------------------------------------------------------------------

  private async submit(
    storageName: string,
    objects: StorageObject[],
    report: IngestionReport,
    started: number
  ): Promise<void> {
    const { batchChunkSize, insertLogEvery, insertMaxSec } = this.options;
    let submitted = 0;

    for (let offset = 0; offset < objects.length; offset += batchChunkSize) {
      const elapsedSec = (Date.now() - started) / 1000;
      if (elapsedSec > insertMaxSec) {
        report.warnings.push(
          `stopped after ${Math.round(elapsedSec)}s with ${offset} of ${objects.length} objects submitted`
        );
        this.log.warn({ collection: storageName, submitted: offset }, "insert time budget spent");
        return;
      }

      const chunk = objects.slice(offset, offset + batchChunkSize);
      const outcome = await this.submitChunk(storageName, chunk, report);
      report.processed += outcome.accepted;
      report.warnings.push(...outcome.errors);

      const before = submitted;
      submitted += chunk.length;
      if (Math.floor(submitted / insertLogEvery) > Math.floor(before / insertLogEvery)) {
        this.log.info(
          { collection: storageName, submitted, total: objects.length },
          "insert progress"
        );
      }
    }
  }

  /** Sends one chunk; a typed failure switches the rest of the run to REST. */
  private async submitChunk(
    storageName: string,
    chunk: StorageObject[],
    report: IngestionReport
  ): Promise<ChunkOutcome> {
    if (report.path === "typed" && this.typed) {
      try {
        const result = await this.typed.insertMany(storageName, chunk);
        return { accepted: result.inserted, errors: result.errors };
      } catch (error) {
        const message = describeError(error);
        this.log.warn({ collection: storageName, err: message }, "typed batch failed; switching to REST");
        report.warnings.push(`typed batch failed: ${message}`);
        report.path = "rest";
      }
    }

    const result = await this.rest.batchInsert(storageName, chunk);
    return { accepted: result.succeeded, errors: result.errors };
  }

  // -------------------------------------------------------------------------
  // Counting
  // -------------------------------------------------------------------------

  /** Re-counts until the growth covers what was accepted, or retries run out. */
  private async postCount(
    storageName: string,
    preCount: number | null,
    processed: number
  ): Promise<number | null> {
    let count = await this.manager.count(storageName);
    for (let attempt = 0; attempt < this.options.postCountRetries; attempt++) {
      const settled = count !== null && (preCount === null || count - preCount >= processed);
      if (settled) break;
      await sleep(this.options.postCountDelayMs);
      count = await this.manager.count(storageName);
    }
    return count;
  }
}
