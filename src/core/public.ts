// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Links: Used by features and cli via \@/core alias
 * @public
 */

export {
  ARCHIVED_TOPIC,
  CACHED_QUERY_KINDS,
  CacheCorruptionError,
  type CachedQueryKind,
  CloneFailedError,
  type CloneTarget,
  collectTopics,
  datedRepositoryName,
  describeCause,
  filterRepositories,
  formatLocator,
  fullRepositoryName,
  isCacheCorruptionError,
  isCloneFailedError,
  isLocatorParseError,
  isRepositoryNotFoundError,
  isStoreCreateError,
  isStoreFetchError,
  type Locator,
  LocatorParseError,
  normalizeRepository,
  type Repository,
  type RepositoryFilter,
  RepositoryNotFoundError,
  resolveLocator,
  sortRepositories,
  StoreCreateError,
  StoreFetchError,
  StoreTimeoutError,
} from "./repos/public";
