// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cli/context`
 * Purpose: What command handlers receive: output sinks, palette, and a lazily built repository service.
 * Scope: Types and the process-backed output sink. Does not build the container.
 * Invariants: stdout carries command output only; warnings and errors go to stderr.
 * Side-effects: none (processOutput writes only when called)
 * Links: src/cli/program.ts
 * @public
 */

import type { RepositoryService } from "@/features/repos/public";
import type { Logger } from "@/shared/observability";

import type { Palette } from "./format";

export interface CliOutput {
  /** One line of command output (newline appended) */
  out(line: string): void;
  /** One line of diagnostics (newline appended) */
  err(line: string): void;
}

export interface CommandContext {
  readonly repositories: RepositoryService;
  /** Clone destination */
  readonly cwd: string;
}

export interface CliDeps {
  readonly output: CliOutput;
  readonly palette: Palette;
  readonly log: Logger;
  /** Terminal columns for listings; undefined leaves fields unwrapped */
  readonly width?: number;
  /** Built on first use so `--help` never reads the dotfile */
  context(): Promise<CommandContext>;
}

export const processOutput: CliOutput = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
};
