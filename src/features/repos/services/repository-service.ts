// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/repos/services/repository-service`
 * Purpose: Command surface behind `new`, `clone`, `list` and `cached`.
 * Scope: Resolves locators, dispatches to one store or to the cache manager, applies listing filters. Does not print.
 * Invariants:
 * - new/clone touch exactly one store; list goes through CacheManager.refresh; cached never leaves the snapshot.
 * - LocatorParseError surfaces before any I/O.
 * - StoreCreateError is logged by kind (already_exists at info, unreachable at error) and rethrown.
 * Side-effects: IO (via ports)
 * Links: src/features/repos/services/cache-manager.ts, src/cli/commands/
 * @public
 */

import {
  type CachedQueryKind,
  type CloneTarget,
  datedRepositoryName,
  filterRepositories,
  isStoreCreateError,
  type Locator,
  LocatorParseError,
  type Repository,
  type RepositoryFilter,
  resolveLocator,
} from "@/core/repos/public";
import type { Clock, GitCloner, RepoPicker, RepositoryStore } from "@/ports";
import { type Logger, makeNoopLogger } from "@/shared/observability";

import type { StoreFailure } from "./aggregate";
import type { CacheManager, CacheState } from "./cache-manager";

export interface RepositoryServiceDeps {
  /** Configured stores keyed by name, in dotfile order */
  readonly stores: ReadonlyMap<string, RepositoryStore>;
  readonly cache: CacheManager;
  readonly cloner: GitCloner;
  readonly picker: RepoPicker;
  readonly clock: Clock;
  readonly logger?: Logger;
}

export interface CreateOptions {
  /** Prefix the name with `__YYYY-MM-DD__` */
  readonly date?: boolean;
}

export interface ListResult {
  readonly repositories: Repository[];
  readonly failures: StoreFailure[];
  /** Every configured store failed */
  readonly totalFailure: boolean;
}

export interface CreateResult {
  readonly locator: Locator;
  readonly repository: Repository;
}

export interface CloneResult {
  readonly locator: Locator;
  readonly target: CloneTarget;
}

export class RepositoryService {
  private readonly log: Logger;

  constructor(private readonly deps: RepositoryServiceDeps) {
    this.log = deps.logger ?? makeNoopLogger();
  }

  resolveLocator(text: string): Locator {
    return resolveLocator(text, this.deps.stores);
  }

  /** Refreshes the cache from every store and returns the filtered live view. */
  async list(filter: RepositoryFilter = {}): Promise<ListResult> {
    const stores = [...this.deps.stores.values()];
    const refreshed = await this.deps.cache.refresh(stores);
    return {
      repositories: filterRepositories(refreshed.repositories, filter),
      failures: refreshed.failures,
      totalFailure: stores.length > 0 && refreshed.succeeded.length === 0,
    };
  }

  async create(text: string, options: CreateOptions = {}): Promise<CreateResult> {
    const parsed = this.resolveLocator(text);
    const locator: Locator = options.date
      ? { ...parsed, name: datedRepositoryName(parsed.name, this.deps.clock.now()) }
      : parsed;

    try {
      const repository = await this.storeFor(locator).createRepository(
        locator.name,
        locator.owner
      );
      return { locator, repository };
    } catch (error) {
      if (isStoreCreateError(error)) {
        const fields = { store: error.storeName, kind: error.kind };
        if (error.kind === "already_exists") {
          this.log.info(fields, error.message);
        } else if (error.kind === "unreachable") {
          this.log.error({ ...fields, err: error }, "repository creation failed");
        } else {
          this.log.warn({ ...fields, err: error }, "repository creation refused");
        }
      }
      throw error;
    }
  }

  async cloneSource(text: string): Promise<CloneResult> {
    const locator = this.resolveLocator(text);
    const target = await this.storeFor(locator).cloneSource(
      locator.name,
      locator.owner
    );
    return { locator, target };
  }

  /** Resolve and run `git clone` into `cwd`. */
  async clone(text: string, cwd: string): Promise<CloneResult> {
    const result = await this.cloneSource(text);
    await this.deps.cloner.clone(result.target, cwd);
    return result;
  }

  /**
   * Ask the picker for a cached locator. Null when the picker is missing,
   * the cache is empty, or the user cancelled.
   */
  async pickCached(): Promise<string | null> {
    if (!this.deps.picker.available) return null;
    const names = await this.deps.cache.query("names");
    if (names.length === 0) return null;
    return this.deps.picker.pick(names);
  }

  cachedQuery(kind: CachedQueryKind): Promise<string[]> {
    return this.deps.cache.query(kind);
  }

  /** Age of the snapshot behind `cachedQuery` and `pickCached`. */
  cacheState(): Promise<CacheState> {
    return this.deps.cache.state();
  }

  private storeFor(locator: Locator): RepositoryStore {
    const store = this.deps.stores.get(locator.storeName);
    if (!store) {
      throw new LocatorParseError(
        locator.storeName,
        `${locator.storeName} not a valid store.`
      );
    }
    return store;
  }
}
