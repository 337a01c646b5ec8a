// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces. Does not export implementations or runtime objects.
 * Invariants: Named exports only, type-only, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { Clock } from "./clock.port";
export type { GitCloner } from "./git-cloner.port";
export type { RepoPicker } from "./repo-picker.port";
export type {
  ListRepositoriesOptions,
  RepositoryStore,
  StoreKind,
} from "./repository-store.port";
export type {
  SnapshotDocument,
  SnapshotLoadResult,
  SnapshotRepositoryRecord,
  SnapshotStore,
} from "./snapshot-store.port";
