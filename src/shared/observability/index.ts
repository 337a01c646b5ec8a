// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability entry point.
 * Scope: Re-exports structured logging. Does not implement logic.
 * Invariants: No imports from bootstrap or ports.
 * Side-effects: none
 * @public
 */

export type { Logger } from "./logging";
export { makeLogger, makeNoopLogger, REDACT_PATHS } from "./logging";
