// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/snapshot-store.port`
 * Purpose: Persistence port for the cached aggregate view.
 * Scope: Defines the on-disk document shape and load/save contract. Does not validate versions or decide staleness.
 * Invariants:
 * - save() is atomic: a concurrent reader sees the previous document or the new one, never a mix.
 * - load() reports absence as `found: false`, not as an error.
 * - load() throws CacheCorruptionError when the stored bytes are not a JSON document.
 * Side-effects: none (interface only)
 * Links: src/adapters/server/cache/file-snapshot-store.adapter.ts, src/features/repos/services/cache-manager.ts
 * @public
 */

/** One repository record as written to the cache file. */
export interface SnapshotRepositoryRecord {
  store_name: string;
  owner: string | null;
  name: string;
  description: string | null;
  topics: string[] | null;
}

/** The cache file's top-level JSON object. */
export interface SnapshotDocument {
  version: number;
  captured_at: string;
  stores: string[];
  repositories: SnapshotRepositoryRecord[];
}

export type SnapshotLoadResult =
  | { readonly found: false }
  | { readonly found: true; readonly document: unknown };

export interface SnapshotStore {
  /** Human-readable location used in logs and errors */
  readonly location: string;
  load(): Promise<SnapshotLoadResult>;
  save(document: SnapshotDocument): Promise<void>;
}
