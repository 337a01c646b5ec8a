// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/repos/services/aggregate`
 * Purpose: Concurrent fan-out over every configured store, merged into one sorted view with a per-store failure report.
 * Scope: Calls listRepositories on each store under a deadline, tags results, filters and sorts. Does not touch the cache.
 * Invariants:
 * - Every store is attempted; one slow or failing store never blocks or hides the others.
 * - A store that misses its deadline is aborted and reported as StoreFetchError(cause: StoreTimeoutError).
 * - Output order depends only on the data, never on completion order.
 * - No cross-store deduplication.
 * - Failures are reported in configured store order.
 * Side-effects: IO (via RepositoryStore), timers
 * Links: src/ports/repository-store.port.ts, src/core/repos/view.ts
 * @public
 */

import {
  filterRepositories,
  isStoreFetchError,
  type Repository,
  type RepositoryFilter,
  sortRepositories,
  StoreFetchError,
  StoreTimeoutError,
} from "@/core/repos/public";
import type { RepositoryStore } from "@/ports";
import { type Logger, makeNoopLogger } from "@/shared/observability";

export interface StoreFailure {
  readonly storeName: string;
  readonly error: StoreFetchError;
}

export interface AggregateOptions {
  /** Deadline for each store's listing, in ms */
  readonly timeoutMs: number;
  readonly logger?: Logger;
}

export interface AggregateResult {
  /** Sorted repositories from every store that answered */
  readonly repositories: Repository[];
  readonly failures: StoreFailure[];
  /** Names of the stores that answered, in configured order */
  readonly succeeded: string[];
}

type StoreOutcome =
  | { readonly ok: true; readonly storeName: string; readonly repositories: Repository[] }
  | { readonly ok: false; readonly failure: StoreFailure };

/** Unfiltered merged view (what the cache persists). */
export async function collectRepositories(
  stores: readonly RepositoryStore[],
  options: AggregateOptions
): Promise<AggregateResult> {
  const log = options.logger ?? makeNoopLogger();
  const outcomes = await Promise.all(
    stores.map((store) => listWithDeadline(store, options.timeoutMs, log))
  );

  const repositories: Repository[] = [];
  const failures: StoreFailure[] = [];
  const succeeded: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.ok) {
      succeeded.push(outcome.storeName);
      repositories.push(...outcome.repositories);
    } else {
      failures.push(outcome.failure);
    }
  }

  return {
    repositories: sortRepositories(repositories),
    failures,
    succeeded,
  };
}

/** Merged view with the listing filter applied (archived hidden unless asked for). */
export async function aggregate(
  stores: readonly RepositoryStore[],
  filter: RepositoryFilter,
  options: AggregateOptions
): Promise<AggregateResult> {
  const collected = await collectRepositories(stores, options);
  return {
    ...collected,
    repositories: filterRepositories(collected.repositories, filter),
  };
}

async function listWithDeadline(
  store: RepositoryStore,
  timeoutMs: number,
  log: Logger
): Promise<StoreOutcome> {
  const controller = new AbortController();
  const startedAt = Date.now();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new StoreTimeoutError(store.name, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    const listed = await Promise.race([
      store.listRepositories({ signal: controller.signal }),
      deadline,
    ]);
    log.debug(
      { store: store.name, count: listed.length, durationMs: Date.now() - startedAt },
      "store listed"
    );
    return {
      ok: true,
      storeName: store.name,
      repositories: listed.map((repo) => ({ ...repo, storeName: store.name })),
    };
  } catch (error) {
    const fetchError =
      isStoreFetchError(error) && error.storeName === store.name
        ? error
        : new StoreFetchError(store.name, "list", error);
    log.warn({ store: store.name, err: fetchError }, "store listing failed");
    return { ok: false, failure: { storeName: store.name, error: fetchError } };
  } finally {
    clearTimeout(timer);
  }
}
