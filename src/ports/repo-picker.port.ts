// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/repo-picker.port`
 * Purpose: Interactive selection of one locator from cached candidates (used by `clone` without arguments).
 * Scope: Interface only.
 * Invariants: Returns null when the user cancels or no picker is available.
 * Side-effects: none (interface only)
 * Links: src/adapters/server/picker/fzf-picker.adapter.ts
 * @public
 */

export interface RepoPicker {
  readonly available: boolean;
  pick(candidates: readonly string[]): Promise<string | null>;
}
