// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/errors`
 * Purpose: Shared error types for cross-layer use (configuration and process boundaries).
 * Scope: Exports error classes and type guards. Does not handle error reporting or logging.
 * Invariants:
 * - Messages are user-facing: the CLI prints them verbatim after "Error: ".
 * - DotfileError never includes credential values in its message.
 * Side-effects: none
 * Links: src/shared/config/dotfile.ts, src/cli/main.ts
 * @public
 */

export class DotfileError extends Error {
  public readonly code = "DOTFILE_INVALID" as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DotfileError";
  }
}

export function isDotfileError(error: unknown): error is DotfileError {
  return error instanceof Error && error.name === "DotfileError";
}
