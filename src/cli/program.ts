// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cli/program`
 * Purpose: Commander program for the four commands plus the top-level error policy.
 * Scope: Parses argv, dispatches to command handlers, maps errors to `Error: <message>` and an exit code. Does not call process.exit.
 * Invariants:
 * - Every known domain or config error prints one red line on stderr and exits 1.
 * - Unknown errors are logged with their stack, then reported the same way.
 * - Usage errors and --help go through commander's own output, redirected to CliOutput.
 * Side-effects: none beyond the injected CliDeps
 * Links: src/cli/main.ts, src/cli/commands/
 * @public
 */

import { Command, CommanderError } from "commander";

import {
  describeCause,
  isCacheCorruptionError,
  isCloneFailedError,
  isLocatorParseError,
  isRepositoryNotFoundError,
  isStoreCreateError,
  isStoreFetchError,
} from "@/core/public";
import { isDotfileError } from "@/shared/errors";

import { registerCachedCommand } from "./commands/cached";
import { registerCloneCommand } from "./commands/clone";
import { registerListCommand } from "./commands/list";
import { registerNewCommand } from "./commands/new";
import type { CliDeps } from "./context";
import { formatError } from "./format";

export const PROGRAM_NAME = "pensieve";

function isKnownError(error: unknown): error is Error {
  return (
    isDotfileError(error) ||
    isLocatorParseError(error) ||
    isStoreCreateError(error) ||
    isStoreFetchError(error) ||
    isRepositoryNotFoundError(error) ||
    isCloneFailedError(error) ||
    isCacheCorruptionError(error)
  );
}

export function buildProgram(
  deps: CliDeps,
  report: (exitCode: number) => void
): Command {
  const program = new Command(PROGRAM_NAME)
    .description("manage repositories across GitHub and pensieve stores")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.output.out(text.trimEnd()),
      writeErr: (text) => deps.output.err(text.trimEnd()),
      outputError: (text, write) => write(deps.palette.bad(text)),
    });

  registerNewCommand(program, deps, report);
  registerCloneCommand(program, deps, report);
  registerListCommand(program, deps, report);
  registerCachedCommand(program, deps, report);

  return program;
}

/** Resolves to the process exit code. */
export async function runCli(
  argv: readonly string[],
  deps: CliDeps
): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
    return exitCode;
  } catch (error) {
    return handleCliError(error, deps);
  }
}

export function handleCliError(error: unknown, deps: CliDeps): number {
  // Commander already printed help or the usage error
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  if (!isKnownError(error)) {
    deps.log.error({ err: error }, "unexpected failure");
  }
  deps.output.err(formatError(describeCause(error), deps.palette));
  return 1;
}
