// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for container assembly
 * @public
 */

export {
  CACHE_FILE_NAME,
  FileSnapshotStore,
} from "./cache/file-snapshot-store.adapter";
export { GitClonerAdapter } from "./git/git-cloner.adapter";
export { FzfPickerAdapter } from "./picker/fzf-picker.adapter";
export {
  GitHubStoreAdapter,
  type GitHubStoreAdapterConfig,
} from "./stores/github/github-store.adapter";
export {
  PensieveStoreAdapter,
  type PensieveStoreAdapterConfig,
} from "./stores/pensieve/pensieve-store.adapter";
export { SystemClock } from "./time/system.adapter";
