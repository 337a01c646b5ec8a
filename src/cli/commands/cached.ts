// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cli/commands/cached`
 * Purpose: `pensieve cached <stores|topics|names>`: print completion data from the last snapshot.
 * Scope: Offline only; never contacts a store.
 * Invariants:
 * - Absent or unusable cache prints nothing and exits 0.
 * - A stale cache still answers, with a warning on stderr.
 * Side-effects: IO (reads the cache file)
 * Links: src/features/repos/services/cache-manager.ts
 * @public
 */

import { Argument, type Command } from "commander";

import { CACHED_QUERY_KINDS, type CachedQueryKind } from "@/core/public";

import type { CliDeps } from "../context";
import { staleCacheWarning } from "../format";

export function isCachedQueryKind(value: string): value is CachedQueryKind {
  return CACHED_QUERY_KINDS.some((kind) => kind === value);
}

export async function runCachedCommand(
  deps: CliDeps,
  kind: CachedQueryKind
): Promise<number> {
  const { repositories } = await deps.context();
  if ((await repositories.cacheState()) === "stale") {
    deps.output.err(staleCacheWarning(deps.palette));
  }
  for (const value of await repositories.cachedQuery(kind)) {
    deps.output.out(value);
  }
  return 0;
}

export function registerCachedCommand(
  program: Command,
  deps: CliDeps,
  report: (exitCode: number) => void
): void {
  program
    .command("cached")
    .description("print cached stores, topics or repository names")
    .addArgument(new Argument("<what>").choices(CACHED_QUERY_KINDS))
    .action(async (what: string) => {
      // choices() already rejected anything else
      if (!isCachedQueryKind(what)) return;
      report(await runCachedCommand(deps, what));
    });
}
