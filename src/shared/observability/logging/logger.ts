// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Pino logger factory - JSON-only stderr emission.
 * Scope: Create configured pino loggers. Does not format command output.
 * Invariants: Always emits JSON to stderr (stdout is reserved for command output); safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Use makeLogger for the CLI logger; use makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * Notes: Reads logging-specific env vars directly (NODE_ENV, PINO_LOG_LEVEL) without env() to avoid triggering validation at module load time.
 * Links: Initializes redaction paths via REDACT_PATHS; used by the composition root.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  // CLI default is quiet: only warnings and failures reach the terminal
  const pinoLogLevel = process.env.PINO_LOG_LEVEL ?? "warn";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  const config = {
    level: pinoLogLevel,
    enabled: !isTestTooling,
    base: { ...bindings, app: "pensieve", pid: process.pid },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  // Synchronous stderr writes
  return pino(config, pino.destination({ dest: 2, sync: true }));
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
