// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/repos/public`
 * Purpose: Public API barrel for the repository domain.
 * Scope: Re-exports only. Does not define any logic.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none
 * @public
 */

// Errors
export {
  CacheCorruptionError,
  CloneFailedError,
  describeCause,
  isCacheCorruptionError,
  isCloneFailedError,
  isLocatorParseError,
  isRepositoryNotFoundError,
  isStoreCreateError,
  isStoreFetchError,
  isStoreTimeoutError,
  LocatorParseError,
  RepositoryNotFoundError,
  StoreCreateError,
  type StoreCreateErrorKind,
  StoreFetchError,
  type StoreFetchOperation,
  StoreTimeoutError,
} from "./errors";
// Locators
export {
  formatLocator,
  fullRepositoryName,
  type OwnerSource,
  resolveLocator,
} from "./locator";
// Model types and constants
export type {
  CachedQueryKind,
  CloneTarget,
  Locator,
  Repository,
  RepositoryFilter,
} from "./model";
export { ARCHIVED_TOPIC, CACHED_QUERY_KINDS } from "./model";
// Naming
export { datedRepositoryName } from "./naming";
// Normalization
export { normalizeRepository } from "./normalize";
// View
export {
  collectTopics,
  compareRepositories,
  filterRepositories,
  hasTopic,
  matchesFilter,
  sortRepositories,
} from "./view";
