// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/picker/fzf-picker.adapter`
 * Purpose: RepoPicker that hands candidates to `fzf` and returns the chosen line.
 * Scope: Spawns fzf with candidates on stdin; the terminal UI is fzf's own.
 * Invariants:
 * - available is false when no `fzf` executable is on PATH.
 * - Escape / no match (exit 1 or 130) ⇒ null; other exit codes reject.
 * - The exit code decides the outcome even when fzf stops reading stdin early.
 * Side-effects: process spawn, terminal interaction
 * Links: src/ports/repo-picker.port.ts
 * @internal
 */

import { spawn } from "node:child_process";
import { accessSync, constants } from "node:fs";
import { delimiter, join } from "node:path";

import type { RepoPicker } from "@/ports";

const FZF = "fzf";
const CANCELLED_EXIT_CODES = new Set([1, 130]);

export class FzfPickerAdapter implements RepoPicker {
  private executable: string | null | undefined;

  constructor(private readonly searchPath: string = process.env.PATH ?? "") {}

  get available(): boolean {
    return this.locate() !== null;
  }

  pick(candidates: readonly string[]): Promise<string | null> {
    const executable = this.locate();
    if (executable === null || candidates.length === 0) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      const child = spawn(executable, [], { stdio: ["pipe", "pipe", "inherit"] });
      let selection = "";

      child.stdout.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        selection += chunk;
      });
      child.on("error", reject);
      child.on("close", (code) => {
        if (code === 0) {
          const chosen = selection.trim();
          resolve(chosen.length > 0 ? chosen : null);
        } else if (code !== null && CANCELLED_EXIT_CODES.has(code)) {
          resolve(null);
        } else {
          reject(new Error(`fzf exited with code ${code ?? "unknown"}`));
        }
      });

      // fzf may exit before reading every candidate
      child.stdin.on("error", (error) => {
        if (isNodeError(error) && error.code === "EPIPE") return;
        reject(error);
      });
      child.stdin.end(`${candidates.join("\n")}\n`);
    });
  }

  /** First executable `fzf` on the search path, looked up once. */
  private locate(): string | null {
    if (this.executable === undefined) {
      this.executable =
        this.searchPath
          .split(delimiter)
          .filter((dir) => dir.length > 0)
          .map((dir) => join(dir, FZF))
          .find(isExecutable) ?? null;
    }
    return this.executable;
  }
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
