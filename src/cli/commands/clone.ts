// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cli/commands/clone`
 * Purpose: `pensieve clone [locator]`: clone one repository into the working directory.
 * Scope: Without a locator, offers cached names to the picker. Does not refresh the cache.
 * Invariants:
 * - Picker cancellation exits 1 without touching any store.
 * - Picking from a stale cache warns on stderr first.
 * Side-effects: IO (one store lookup, git clone, optional fzf)
 * Links: src/features/repos/services/repository-service.ts
 * @public
 */

import type { Command } from "commander";

import type { CliDeps } from "../context";
import { clonedMessage, formatError, staleCacheWarning } from "../format";

export async function runCloneCommand(
  deps: CliDeps,
  locatorText: string | undefined
): Promise<number> {
  const { repositories, cwd } = await deps.context();

  if (
    locatorText === undefined &&
    (await repositories.cacheState()) === "stale"
  ) {
    deps.output.err(staleCacheWarning(deps.palette));
  }

  const chosen = locatorText ?? (await repositories.pickCached());
  if (chosen === null) {
    deps.output.err(
      formatError(
        "No repository selected. Pass a locator such as store:name.",
        deps.palette
      )
    );
    return 1;
  }

  const { locator } = await repositories.clone(chosen, cwd);
  deps.output.out(clonedMessage(locator, deps.palette));
  return 0;
}

export function registerCloneCommand(
  program: Command,
  deps: CliDeps,
  report: (exitCode: number) => void
): void {
  program
    .command("clone")
    .description("clone a repository (pick from the cache when omitted)")
    .argument("[locator]", "store:name or store:owner/name")
    .action(async (locator: string | undefined) => {
      report(await runCloneCommand(deps, locator));
    });
}
