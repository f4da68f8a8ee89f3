/**
 * collection-manager.ts - Create, ready, delete and count collections
 *
 * What this file does:
 * Gets a collection into a usable state through whichever surface accepts
 * it. Creation goes typed client first, then REST v2, then REST v1 with its
 * 405/422 workarounds; "already exists" counts as success everywhere. A
 * created collection is then polled until at least one surface lists it.
 *
 * All methods here take storage names. The store maps caller names before
 * calling in.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logger";
import { describeError } from "../errors";
import type { RestSurface } from "./rest-surface";
import type { SchemaReconciler } from "./reconciler";
import { buildCollectionDefinition, chooseVectorMode } from "./schema";
import type { TypedStoreClient } from "./typed-client";
import type {
  CollectionSchema,
  OperationResult,
  SchemaHint,
  VectorMode,
} from "./types";

export interface CollectionManagerOptions {
  logger: Logger;
  openaiApiKey?: string;
  useClientVectors: boolean;
  readyTimeoutMs: number;
  readyIntervalMs: number;
}

function isAlreadyExists(error: unknown): boolean {
  return /already (exists|used)/i.test(describeError(error));
}

/** Vector modes to try on typed create, most capable first. */
function vectorModeAttempts(preferred: VectorMode): VectorMode[] {
  return preferred === "named" ? ["named", "none"] : [preferred];
}

export class CollectionManager {
  private readonly log: Logger;

  constructor(
    private readonly typed: TypedStoreClient | null,
    private readonly rest: RestSurface,
    private readonly reconciler: SchemaReconciler,
    private readonly options: CollectionManagerOptions
  ) {
    this.log = options.logger.child({ component: "collection-manager" });
  }

  async ensure(storageName: string, hint?: SchemaHint): Promise<OperationResult> {
    if (await this.existsAnywhere(storageName)) {
      this.log.debug({ collection: storageName }, "collection already exists");
      return this.ready(storageName);
    }

    const vectorMode = chooseVectorMode(this.options);
    let lastError = "no surface accepted the collection";

    for (const mode of this.typed ? vectorModeAttempts(vectorMode) : []) {
      const outcome = await this.createTyped(storageName, hint, mode);
      if (outcome === true) return this.ready(storageName);
      lastError = outcome;
    }

    const definition = buildCollectionDefinition(storageName, hint, vectorMode);
    if ((await this.rest.createV2(definition)) || (await this.rest.createV1(definition))) {
      return this.ready(storageName);
    }

    this.log.error({ collection: storageName, err: lastError }, "could not create collection");
    return {
      ok: false,
      storageName,
      message: `could not create ${storageName}: ${lastError}`,
    };
  }

  /**
   * Polls until some surface lists the collection.
   *
   * Typed visibility first, then REST. When only REST sees it, the typed
   * client gets one refresh before the collection is reported ready anyway.
   * On timeout a final union listing decides.
   */
  async ready(
    storageName: string,
    timeoutMs = this.options.readyTimeoutMs,
    intervalMs = this.options.readyIntervalMs
  ): Promise<OperationResult> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      if (await this.reconciler.typedVisible(storageName)) {
        return { ok: true, storageName, message: `${storageName} is ready` };
      }

      const rest = await this.reconciler.restVisibility(storageName);
      if (rest.v1 || rest.v2) {
        if (this.typed && !(await this.reconciler.waitForVisibility(storageName, 1, intervalMs))) {
          this.log.warn({ collection: storageName }, "collection visible over REST only");
        }
        return { ok: true, storageName, message: `${storageName} is ready` };
      }

      if (Date.now() + intervalMs > deadline) break;
      await sleep(intervalMs);
    }

    const all = await this.reconciler.listCollections();
    if (all.has(storageName)) {
      return { ok: true, storageName, message: `${storageName} is ready` };
    }
    return {
      ok: false,
      storageName,
      message: `${storageName} not visible after ${timeoutMs}ms`,
    };
  }

  async delete(storageName: string): Promise<OperationResult> {
    if (this.typed) {
      try {
        await this.typed.delete(storageName);
        this.log.info({ collection: storageName }, "deleted collection");
        return { ok: true, storageName, message: `deleted ${storageName}` };
      } catch (error) {
        this.log.warn({ collection: storageName, err: describeError(error) }, "typed delete failed");
      }
    }

    if (await this.rest.deleteClass(storageName)) {
      this.log.info({ collection: storageName }, "deleted collection via REST");
      return { ok: true, storageName, message: `deleted ${storageName}` };
    }
    return { ok: false, storageName, message: `could not delete ${storageName}` };
  }

  /** Object count, or null when neither surface answered. */
  async count(storageName: string): Promise<number | null> {
    if (this.typed) {
      try {
        return await this.typed.count(storageName);
      } catch (error) {
        this.log.debug({ collection: storageName, err: describeError(error) }, "typed count failed");
      }
    }
    return this.rest.count(storageName);
  }

  /** Schema as REST reports it, else as the typed client does. */
  async schemaFor(storageName: string): Promise<CollectionSchema | null> {
    const fromRest = await this.rest.getSchema(storageName);
    if (fromRest) return fromRest;
    if (!this.typed) return null;
    try {
      return await this.typed.describe(storageName);
    } catch (error) {
      this.log.debug({ collection: storageName, err: describeError(error) }, "typed describe failed");
      return null;
    }
  }

  private async existsAnywhere(storageName: string): Promise<boolean> {
    if (await this.reconciler.typedVisible(storageName)) return true;
    const rest = await this.reconciler.restVisibility(storageName);
    return rest.v1 || rest.v2;
  }

  /** true on success, else the failure message. */
  private async createTyped(
    storageName: string,
    hint: SchemaHint | undefined,
    mode: VectorMode
  ): Promise<true | string> {
    if (!this.typed) return "typed client unavailable";
    try {
      await this.typed.create(buildCollectionDefinition(storageName, hint, mode));
      this.log.info({ collection: storageName, vectorMode: mode }, "created collection");
      return true;
    } catch (error) {
      if (isAlreadyExists(error)) return true;
      const message = describeError(error);
      this.log.warn({ collection: storageName, vectorMode: mode, err: message }, "typed create failed");
      return message;
    }
  }
}
