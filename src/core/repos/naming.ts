// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/repos/naming`
 * Purpose: Date-prefixed repository names for `new --date`.
 * Scope: Pure string formatting. Does not read the system clock.
 * Invariants: Prefix format is `__YYYY-MM-DD__` using the UTC calendar date of the given ISO timestamp.
 * Side-effects: none
 * @public
 */

const DATE_HIGHLIGHT = "__";

/**
 * @example
 * datedRepositoryName("notes", "2026-10-19T08:00:00.000Z") // => "__2026-10-19__notes"
 */
export function datedRepositoryName(name: string, nowIso: string): string {
  const day = nowIso.slice(0, 10);
  return `${DATE_HIGHLIGHT}${day}${DATE_HIGHLIGHT}${name}`;
}
