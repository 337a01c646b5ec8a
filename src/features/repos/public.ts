// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/repos/public`
 * Purpose: Single entrypoint for the repos feature - controlled API surface for the CLI and bootstrap layers.
 * Scope: Re-exports services and result types. Does not expose snapshot encoding details.
 * Invariants: Single entry point per feature, stable public API, no internal structure leakage
 * Side-effects: none
 * Links: src/bootstrap/container.ts, src/cli/
 * @public
 */

export {
  aggregate,
  type AggregateOptions,
  type AggregateResult,
  collectRepositories,
  type StoreFailure,
} from "./services/aggregate";
export {
  CacheManager,
  type CacheManagerDeps,
  type CacheState,
  type RefreshResult,
} from "./services/cache-manager";
export {
  type CloneResult,
  type CreateOptions,
  type CreateResult,
  type ListResult,
  RepositoryService,
  type RepositoryServiceDeps,
} from "./services/repository-service";
export { SNAPSHOT_VERSION, type Snapshot } from "./services/snapshot-codec";
