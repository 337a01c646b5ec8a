// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/git/git-cloner.adapter`
 * Purpose: GitCloner that shells out to `git clone` (no shell).
 * Scope: Runs git with fixed flags only. Does not resolve URLs.
 * Invariants: Clone output is returned inside CloneFailedError, never printed here.
 * Side-effects: IO (subprocess execution, writes the cloned directory)
 * Links: src/ports/git-cloner.port.ts
 * @internal
 */

import {
  isCommandFailedError,
  isCommandNotFoundError,
  runCommand,
} from "@/adapters/server/process/run-command";
import { CloneFailedError, type CloneTarget } from "@/core/repos/public";
import type { GitCloner } from "@/ports";

export class GitClonerAdapter implements GitCloner {
  async clone(target: CloneTarget, cwd: string): Promise<void> {
    try {
      await runCommand("git", ["clone", target.url, target.directory], { cwd });
    } catch (error) {
      if (isCommandNotFoundError(error)) {
        throw new CloneFailedError(target.url, "git is not installed");
      }
      if (isCommandFailedError(error)) {
        throw new CloneFailedError(target.url, error.output);
      }
      throw error;
    }
  }
}
