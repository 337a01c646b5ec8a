// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes`
 * Purpose: Barrel for deterministic test doubles and data builders.
 * Scope: Re-exports fakes. Port-level fakes (stores, snapshot store) live in src/adapters/test.
 * Side-effects: none
 * Links: tests/setup.ts
 * @public
 */

export { DEFAULT_FAKE_TIME, FakeClock } from "./fake-clock";
export { CapturedOutput, keys, repo, type RepoSeed } from "./repositories";
