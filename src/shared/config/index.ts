// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config`
 * Purpose: Barrel export for `.pensieve.yaml` loading and store config types.
 * Scope: Re-exports only; callers import from this entry point.
 * Invariants: Store configs are immutable once loaded.
 * Side-effects: none (delegates to dotfile.ts for IO)
 * Links: src/shared/config/dotfile.ts
 * @public
 */

export {
  DOTFILE_NAME,
  type Dotfile,
  loadDotfile,
  parseDotfile,
} from "./dotfile";
export {
  type GitHubStoreConfig,
  githubStoreConfigSchema,
  type PensieveStoreConfig,
  pensieveStoreConfigSchema,
  STORE_NAME_PATTERN,
  STORE_TYPES,
  type StoreConfig,
  storeConfigSchema,
} from "./dotfile.schema";
