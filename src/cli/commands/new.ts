// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cli/commands/new`
 * Purpose: `pensieve new <locator> [--date]`: create a repository on one store, then clone it here.
 * Scope: Argument wiring and output. Store errors propagate to the top-level handler.
 * Side-effects: IO (one store write, git clone)
 * Links: src/features/repos/services/repository-service.ts
 * @public
 */

import type { Command } from "commander";

import { formatLocator } from "@/core/public";

import type { CliDeps } from "../context";
import { createdMessage } from "../format";

export interface NewCommandOptions {
  readonly date?: boolean;
}

export async function runNewCommand(
  deps: CliDeps,
  locatorText: string,
  options: NewCommandOptions
): Promise<number> {
  const { repositories, cwd } = await deps.context();
  const { locator } = await repositories.create(locatorText, {
    date: options.date === true,
  });
  deps.output.out(createdMessage(locator));

  await repositories.clone(formatLocator(locator), cwd);
  return 0;
}

export function registerNewCommand(
  program: Command,
  deps: CliDeps,
  report: (exitCode: number) => void
): void {
  program
    .command("new")
    .description("create a repository on a store and clone it")
    .argument("<locator>", "store:name or store:owner/name")
    .option("-d, --date", "prefix the name with today's date (__YYYY-MM-DD__)")
    .action(async (locator: string, options: NewCommandOptions) => {
      report(await runNewCommand(deps, locator, options));
    });
}
