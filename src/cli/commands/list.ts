// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cli/commands/list`
 * Purpose: `pensieve list [--topic <t>]`: query every store, refresh the cache, print the merged view.
 * Scope: Rendering and exit status. Aggregation and caching live in the repos feature.
 * Invariants:
 * - Store failures are printed to stderr; healthy stores are still listed.
 * - Exit 1 only when every configured store failed.
 * Side-effects: IO (all stores, cache write)
 * Links: src/features/repos/services/cache-manager.ts, src/cli/format.ts
 * @public
 */

import type { Command } from "commander";

import type { CliDeps } from "../context";
import { formatFailure, formatRepository } from "../format";

export interface ListCommandOptions {
  readonly topic?: string;
}

export async function runListCommand(
  deps: CliDeps,
  options: ListCommandOptions
): Promise<number> {
  const { repositories } = await deps.context();
  const result = await repositories.list(
    options.topic === undefined ? {} : { topic: options.topic }
  );

  for (const repository of result.repositories) {
    for (const line of formatRepository(repository, deps.palette, deps.width)) {
      deps.output.out(line);
    }
  }
  for (const failure of result.failures) {
    deps.output.err(formatFailure(failure, deps.palette));
  }

  return result.totalFailure ? 1 : 0;
}

export function registerListCommand(
  program: Command,
  deps: CliDeps,
  report: (exitCode: number) => void
): void {
  program
    .command("list")
    .description("list repositories on every store (archived hidden by default)")
    .option("-t, --topic <topic>", "only repositories carrying this topic")
    .action(async (options: ListCommandOptions) => {
      report(await runListCommand(deps, options));
    });
}
