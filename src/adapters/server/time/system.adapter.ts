// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/time/system`
 * Purpose: Wall-clock Clock used for snapshot `captured_at` and `new --date` prefixes.
 * Scope: Reads the system time only.
 * Invariants: Always returns an ISO 8601 UTC string
 * Side-effects: IO (reads system time)
 * Links: Implements Clock port; tests use tests/_fakes/fake-clock.ts
 * @internal
 */

import type { Clock } from "@/ports";

export class SystemClock implements Clock {
  now(): string {
    return new Date().toISOString();
  }
}
