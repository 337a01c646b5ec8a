// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Composition root: dotfile + environment → store adapters, cache manager, repository service.
 * Scope: Wire adapters to ports for one CLI invocation. Does not parse command-line arguments.
 * Invariants:
 * - Stores are built in dotfile order; that order is the configured store order everywhere.
 * - A GitHub store without a token (and no GITHUB_TOKEN) fails the whole load with a DotfileError.
 * - Tokens are passed to adapters only; never logged.
 * Side-effects: IO (reads the dotfile; emits a debug log)
 * Links: src/bootstrap/env.ts, src/shared/config/dotfile.ts, src/cli/main.ts
 * @public
 */

import path from "node:path";

import {
  CACHE_FILE_NAME,
  FileSnapshotStore,
  FzfPickerAdapter,
  GitClonerAdapter,
  GitHubStoreAdapter,
  PensieveStoreAdapter,
  SystemClock,
} from "@/adapters/server";
import { CacheManager, RepositoryService } from "@/features/repos/public";
import type { Clock, RepositoryStore } from "@/ports";
import {
  DOTFILE_NAME,
  type Dotfile,
  loadDotfile,
  type StoreConfig,
} from "@/shared/config";
import { DotfileError } from "@/shared/errors";
import { type Logger, makeLogger } from "@/shared/observability";

import { type Env, env as readEnv } from "./env";

const MS_PER_HOUR = 60 * 60 * 1000;

export interface Container {
  log: Logger;
  env: Env;
  dotfile: Dotfile;
  clock: Clock;
  stores: ReadonlyMap<string, RepositoryStore>;
  cache: CacheManager;
  repositories: RepositoryService;
}

export interface ContainerOptions {
  /** Working directory: dotfile lookup base and clone destination */
  readonly cwd?: string;
  /** Defaults to the validated process environment */
  readonly env?: Env;
  readonly log?: Logger;
}

/** Where the dotfile is looked up: PENSIEVE_DOTFILE (relative to cwd) or ./.pensieve.yaml. */
export function dotfilePath(cwd: string, config: Env): string {
  return path.resolve(cwd, config.PENSIEVE_DOTFILE ?? DOTFILE_NAME);
}

export function buildStore(
  storeName: string,
  config: StoreConfig,
  settings: Env,
  log: Logger
): RepositoryStore {
  switch (config.type) {
    case "github": {
      const token = config.token ?? settings.GITHUB_TOKEN;
      if (!token) {
        throw new DotfileError(
          `Invalid "${storeName}" definition in dotfile. Missing a "token" key (or set GITHUB_TOKEN).`
        );
      }
      return new GitHubStoreAdapter(
        {
          storeName,
          user: config.user,
          token,
          privateRepositories: config.private,
        },
        log
      );
    }
    case "pensieve":
      return new PensieveStoreAdapter(
        {
          storeName,
          host: config.host,
          path: config.path,
          agent: settings.PENSIEVE_AGENT_COMMAND ?? config.agent,
          connectTimeoutSeconds: settings.PENSIEVE_TIMEOUT,
          sshOptions: settings.PENSIEVE_SSH_OPTIONS.split(/\s+/).filter(
            (option) => option.length > 0
          ),
        },
        log
      );
  }
}

export async function createContainer(
  options: ContainerOptions = {}
): Promise<Container> {
  const cwd = options.cwd ?? process.cwd();
  const settings = options.env ?? readEnv();
  const log = options.log ?? makeLogger({ component: "cli" });

  const dotfile = await loadDotfile(dotfilePath(cwd, settings));

  const stores = new Map<string, RepositoryStore>();
  for (const [storeName, config] of dotfile.stores) {
    stores.set(storeName, buildStore(storeName, config, settings, log));
  }

  const clock = new SystemClock();
  const cache = new CacheManager({
    snapshotStore: new FileSnapshotStore(
      path.join(dotfile.directory, CACHE_FILE_NAME)
    ),
    clock,
    maxAgeMs: settings.PENSIEVE_CACHE_MAX_AGE_HOURS * MS_PER_HOUR,
    storeTimeoutMs: settings.PENSIEVE_STORE_TIMEOUT_MS,
    logger: log.child({ component: "cache" }),
  });

  const repositories = new RepositoryService({
    stores,
    cache,
    cloner: new GitClonerAdapter(),
    picker: new FzfPickerAdapter(),
    clock,
    logger: log.child({ component: "repositories" }),
  });

  log.debug(
    { dotfile: dotfile.path, stores: [...stores.keys()] },
    "container initialized"
  );

  return { log, env: settings, dotfile, clock, stores, cache, repositories };
}
