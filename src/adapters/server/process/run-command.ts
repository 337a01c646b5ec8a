// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/process/run-command`
 * Purpose: Run an external program (ssh, git) without a shell and collect its output.
 * Scope: execFile wrapper with stdin payload, timeout, and abort support. Does not interpret output.
 * Invariants:
 * - Never spawns through a shell; arguments are passed verbatim.
 * - stdin is always closed, so the child never blocks waiting for input.
 * - Non-zero exit, timeout, and missing binary each surface as a distinct error.
 * Side-effects: process spawn
 * Links: src/adapters/server/stores/pensieve/pensieve-agent.client.ts, src/adapters/server/git/git-cloner.adapter.ts
 * @internal
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

const DEFAULT_MAX_BUFFER = 16 * 1024 * 1024;

export interface RunCommandOptions {
  /** Written to stdin, then stdin is closed */
  readonly input?: string;
  readonly cwd?: string;
  /** Kill the child after this many ms (0 = no limit) */
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface CommandOutput {
  readonly stdout: string;
  readonly stderr: string;
}

export class CommandNotFoundError extends Error {
  public readonly code = "COMMAND_NOT_FOUND" as const;
  constructor(public readonly command: string) {
    super(`${command} not found in PATH`);
    this.name = "CommandNotFoundError";
  }
}

export class CommandFailedError extends Error {
  public readonly code = "COMMAND_FAILED" as const;
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stdout: string,
    public readonly stderr: string,
    public readonly timedOut: boolean,
    cause?: unknown
  ) {
    super(
      timedOut
        ? `${command} timed out`
        : `${command} exited with code ${exitCode ?? "unknown"}`,
      { cause }
    );
    this.name = "CommandFailedError";
  }

  /** stdout and stderr joined, as a user would have seen them on a terminal */
  get output(): string {
    return [this.stdout, this.stderr].filter((part) => part.length > 0).join("\n");
  }
}

export function isCommandFailedError(
  error: unknown
): error is CommandFailedError {
  return error instanceof Error && error.name === "CommandFailedError";
}

export function isCommandNotFoundError(
  error: unknown
): error is CommandNotFoundError {
  return error instanceof Error && error.name === "CommandNotFoundError";
}

export async function runCommand(
  command: string,
  args: readonly string[],
  options: RunCommandOptions = {}
): Promise<CommandOutput> {
  const pending = execFileAsync(command, [...args], {
    cwd: options.cwd,
    timeout: options.timeoutMs ?? 0,
    signal: options.signal,
    maxBuffer: DEFAULT_MAX_BUFFER,
    encoding: "utf8",
  });
  // Spawn failures and early exits also surface on stdin (EPIPE, closed socket)
  const stdinErrors: Error[] = [];
  pending.child.stdin?.on("error", (error) => {
    stdinErrors.push(error);
  });
  pending.child.stdin?.end(options.input ?? "");

  let output: CommandOutput;
  try {
    const { stdout, stderr } = await pending;
    output = { stdout, stderr };
  } catch (error) {
    throw toCommandError(command, error);
  }

  if (stdinErrors.length > 0 && options.input) {
    throw new CommandFailedError(
      command,
      0,
      output.stdout,
      output.stderr,
      false,
      stdinErrors[0]
    );
  }
  return output;
}

function toCommandError(command: string, error: unknown): unknown {
  if (!(error instanceof Error)) return error;
  if (error.name === "AbortError") return error;
  if ("code" in error && error.code === "ENOENT") {
    return new CommandNotFoundError(command);
  }

  const stdout = "stdout" in error && typeof error.stdout === "string" ? error.stdout : "";
  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
  const exitCode = "code" in error && typeof error.code === "number" ? error.code : null;
  const timedOut = "killed" in error && error.killed === true;

  return new CommandFailedError(command, exitCode, stdout, stderr, timedOut, error);
}
