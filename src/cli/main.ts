// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cli/main`
 * Purpose: Process entry point: wire the container into the CLI and set the exit code.
 * Scope: Entry only. Environment validation errors are reported like any other error.
 * Notes: PENSIEVE_COLOR is read before env() so that an invalid environment is still reported in colour.
 * Side-effects: IO (process.argv, stdout/stderr, process.exitCode)
 * Links: bin/pensieve.mjs, src/bootstrap/container.ts, src/cli/program.ts
 * @internal
 */

import { createContainer } from "@/bootstrap/container";
import { env } from "@/bootstrap/env";
import { makeLogger } from "@/shared/observability";

import { type CliDeps, type CommandContext, processOutput } from "./context";
import { createPalette } from "./format";
import { runCli } from "./program";

async function main(): Promise<number> {
  const log = makeLogger({ component: "cli" });
  const colorEnabled = process.env.PENSIEVE_COLOR !== "no";
  const palette = createPalette(colorEnabled);

  let context: Promise<CommandContext> | undefined;
  const deps: CliDeps = {
    output: processOutput,
    palette,
    log,
    width: process.stdout.isTTY ? process.stdout.columns : undefined,
    context(): Promise<CommandContext> {
      context ??= createContainer({ env: env(), log }).then((container) => ({
        repositories: container.repositories,
        cwd: process.cwd(),
      }));
      return context;
    },
  };

  return runCli(process.argv.slice(2), deps);
}

process.exitCode = await main();
