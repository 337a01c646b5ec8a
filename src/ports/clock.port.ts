// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time source for snapshot timestamps, staleness checks, and dated repository names.
 * Scope: Interface only. Does not handle timezone conversion or date arithmetic.
 * Invariants: now() returns an ISO 8601 UTC string
 * Side-effects: none (interface only)
 * Links: src/adapters/server/time/system.adapter.ts, tests/_fakes/fake-clock.ts
 * @public
 */

export interface Clock {
  now(): string;
}
