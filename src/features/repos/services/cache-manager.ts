// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/repos/services/cache-manager`
 * Purpose: Owns the persisted aggregate view: staleness, refresh through the aggregator, and offline queries for completion.
 * Scope: Reads/writes via SnapshotStore, refreshes via collectRepositories. Does not format output or parse locators.
 * Invariants:
 * - Absent / Fresh / Stale is derived on every read; no separate state is persisted.
 * - Only refresh() writes, and only when at least one store answered; total failure keeps the previous snapshot.
 * - A partial refresh carries forward the previous entries of stores that failed.
 * - query() never refreshes; an absent or unusable snapshot yields an empty result.
 * - Corruption is logged and treated as Absent, never thrown.
 * Side-effects: IO (via SnapshotStore and RepositoryStore)
 * Links: src/features/repos/services/aggregate.ts, src/features/repos/services/snapshot-codec.ts
 * @public
 */

import {
  type CachedQueryKind,
  collectTopics,
  formatLocator,
  isCacheCorruptionError,
  type Repository,
  sortRepositories,
} from "@/core/repos/public";
import type { Clock, RepositoryStore, SnapshotStore } from "@/ports";
import { type Logger, makeNoopLogger } from "@/shared/observability";

import { collectRepositories, type StoreFailure } from "./aggregate";
import { decodeSnapshot, encodeSnapshot, type Snapshot } from "./snapshot-codec";

export type CacheState = "absent" | "fresh" | "stale";

export interface CacheManagerDeps {
  readonly snapshotStore: SnapshotStore;
  readonly clock: Clock;
  /** Snapshot age beyond which it counts as stale */
  readonly maxAgeMs: number;
  /** Per-store listing deadline used during refresh */
  readonly storeTimeoutMs: number;
  readonly logger?: Logger;
}

export interface RefreshResult {
  /** What the stores returned in this refresh, unfiltered and sorted */
  readonly repositories: Repository[];
  readonly failures: StoreFailure[];
  readonly succeeded: string[];
  /** False when every store failed and the previous snapshot was kept */
  readonly snapshotWritten: boolean;
}

export class CacheManager {
  private readonly log: Logger;
  /** undefined = not read yet; null = absent or unusable */
  private current: Snapshot | null | undefined;

  constructor(private readonly deps: CacheManagerDeps) {
    this.log = deps.logger ?? makeNoopLogger();
  }

  async read(): Promise<Snapshot | null> {
    if (this.current !== undefined) return this.current;

    try {
      const loaded = await this.deps.snapshotStore.load();
      this.current = loaded.found
        ? decodeSnapshot(loaded.document, this.deps.snapshotStore.location)
        : null;
    } catch (error) {
      if (!isCacheCorruptionError(error)) throw error;
      this.log.warn({ err: error }, "ignoring unusable cache snapshot");
      this.current = null;
    }
    return this.current;
  }

  async state(): Promise<CacheState> {
    const snapshot = await this.read();
    if (!snapshot) return "absent";

    const age = Date.parse(this.deps.clock.now()) - Date.parse(snapshot.capturedAt);
    return age > this.deps.maxAgeMs ? "stale" : "fresh";
  }

  async refresh(stores: readonly RepositoryStore[]): Promise<RefreshResult> {
    const collected = await collectRepositories(stores, {
      timeoutMs: this.deps.storeTimeoutMs,
      logger: this.log,
    });

    if (collected.succeeded.length === 0) {
      this.log.warn(
        { failed: collected.failures.map((failure) => failure.storeName) },
        "every store failed; keeping previous snapshot"
      );
      return { ...collected, snapshotWritten: false };
    }

    const previous = await this.read();
    const failed = new Set(collected.failures.map((failure) => failure.storeName));
    const carried = previous
      ? previous.repositories.filter((repo) => failed.has(repo.storeName))
      : [];
    const withData = new Set([
      ...collected.succeeded,
      ...(previous?.stores ?? []).filter((name) => failed.has(name)),
    ]);

    const snapshot: Snapshot = {
      capturedAt: this.deps.clock.now(),
      stores: stores.map((store) => store.name).filter((name) => withData.has(name)),
      repositories: sortRepositories([...collected.repositories, ...carried]),
    };

    await this.deps.snapshotStore.save(encodeSnapshot(snapshot));
    this.current = snapshot;
    this.log.info(
      {
        repositories: snapshot.repositories.length,
        carriedForward: carried.length,
        location: this.deps.snapshotStore.location,
      },
      "cache snapshot written"
    );

    return { ...collected, snapshotWritten: true };
  }

  /** Completion data from the snapshot alone; never contacts a store. */
  async query(kind: CachedQueryKind): Promise<string[]> {
    const snapshot = await this.read();
    if (!snapshot) return [];

    switch (kind) {
      case "stores":
        return [...snapshot.stores];
      case "topics":
        return collectTopics(snapshot.repositories);
      case "names":
        return snapshot.repositories.map((repo) => formatLocator(repo));
    }
  }
}
