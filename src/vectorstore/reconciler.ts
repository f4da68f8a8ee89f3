/**
 * reconciler.ts - One view of which collections exist
 *
 * The typed client and the REST API can disagree about the schema: right
 * after a create, or behind a proxy that only forwards REST, the typed
 * client may not see a collection REST already lists. REST is the truth;
 * the typed client's view is used when it agrees.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logger";
import { describeError } from "../errors";
import type { RestSurface } from "./rest-surface";
import type { TypedStoreClient } from "./typed-client";

export interface RestVisibility {
  v1: boolean;
  v2: boolean;
}

export class SchemaReconciler {
  private readonly log: Logger;

  constructor(
    private readonly typed: TypedStoreClient | null,
    private readonly rest: RestSurface,
    logger: Logger
  ) {
    this.log = logger.child({ component: "reconciler" });
  }

  /**
   * Union of the typed listing, the v2 listing and the v1 schema.
   * Names REST reports that the typed client does not are logged as drift.
   */
  async listCollections(): Promise<Set<string>> {
    const typedNames = await this.typedListing();
    const [v2, v1] = await Promise.all([this.rest.listV2(), this.rest.listV1()]);
    const restNames = new Set([...(v2 ?? []), ...(v1 ?? [])]);

    if (this.typed) {
      const typedSet = new Set(typedNames);
      const drift = [...restNames].filter((name) => !typedSet.has(name));
      if (drift.length > 0) {
        this.log.warn({ drift }, "collections visible over REST but not to the typed client");
      }
    }

    return new Set([...typedNames, ...restNames]);
  }

  /** Makes the typed client drop its cached view and reload it. */
  async refresh(): Promise<void> {
    if (!this.typed) return;
    try {
      await this.typed.refresh();
    } catch (error) {
      this.log.debug({ err: describeError(error) }, "typed refresh failed");
    }
  }

  async typedVisible(storageName: string): Promise<boolean> {
    if (!this.typed) return false;
    try {
      return await this.typed.exists(storageName);
    } catch (error) {
      this.log.debug({ collection: storageName, err: describeError(error) }, "typed exists failed");
      return false;
    }
  }

  /** Refresh-and-recheck up to `retries` times. */
  async waitForVisibility(storageName: string, retries: number, delayMs: number): Promise<boolean> {
    if (!this.typed) return false;
    for (let attempt = 1; attempt <= retries; attempt++) {
      await this.refresh();
      if (await this.typedVisible(storageName)) return true;
      if (attempt < retries) await sleep(delayMs);
    }
    this.log.debug({ collection: storageName, retries }, "typed client still cannot see collection");
    return false;
  }

  async restVisibility(storageName: string): Promise<RestVisibility> {
    const [v1, v2] = await Promise.all([this.rest.listV1(), this.rest.listV2()]);
    return {
      v1: v1?.includes(storageName) ?? false,
      v2: v2?.includes(storageName) ?? false,
    };
  }

  private async typedListing(): Promise<string[]> {
    if (!this.typed) return [];
    try {
      return await this.typed.listCollections();
    } catch (error) {
      this.log.warn({ err: describeError(error) }, "typed listing failed");
      return [];
    }
  }
}
