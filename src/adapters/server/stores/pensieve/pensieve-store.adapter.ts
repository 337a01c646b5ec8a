// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/stores/pensieve/pensieve-store.adapter`
 * Purpose: RepositoryStore backed by a directory of bare repositories on an SSH host, driven through its agent.
 * Scope: Maps list/new/clone-source onto agent commands. Does not run git.
 * Invariants:
 * - Repositories have no owner; a locator naming one is refused, never silently dropped.
 * - Listing entries that are not objects normalize to null description and null topics.
 * - createRepository issues a single `new` command.
 * Side-effects: IO (ssh subprocess via PensieveAgentClient)
 * Links: src/adapters/server/stores/pensieve/pensieve-agent.client.ts, src/ports/repository-store.port.ts
 * @public
 */

import { posix } from "node:path";

import {
  type CloneTarget,
  normalizeRepository,
  type Repository,
  RepositoryNotFoundError,
  StoreCreateError,
  StoreFetchError,
} from "@/core/repos/public";
import type { ListRepositoriesOptions, RepositoryStore } from "@/ports";
import { type Logger, makeNoopLogger } from "@/shared/observability";

import {
  isAgentRejectedError,
  PensieveAgentClient,
  type PensieveAgentConfig,
} from "./pensieve-agent.client";
import { parseSshHost, sshUrl } from "./ssh-host";

const BARE_REPOSITORY_DIR = "repo.git";

export interface PensieveStoreAdapterConfig {
  readonly storeName: string;
  /** `user@hostname[:port]` */
  readonly host: string;
  readonly path: string;
  readonly agent: string;
  readonly connectTimeoutSeconds: number;
  readonly sshOptions: readonly string[];
}

export class PensieveStoreAdapter implements RepositoryStore {
  public readonly kind = "pensieve" as const;
  public readonly name: string;

  private readonly agentConfig: PensieveAgentConfig;
  private readonly agent: PensieveAgentClient;
  private readonly log: Logger;

  constructor(config: PensieveStoreAdapterConfig, logger?: Logger) {
    this.name = config.storeName;
    this.log = (logger ?? makeNoopLogger()).child({ store: config.storeName });
    this.agentConfig = {
      host: parseSshHost(config.host),
      path: config.path,
      agent: config.agent,
      connectTimeoutSeconds: config.connectTimeoutSeconds,
      sshOptions: config.sshOptions,
    };
    this.agent = new PensieveAgentClient(this.agentConfig, this.log);
  }

  defaultOwner(): null {
    return null;
  }

  async listRepositories(
    options: ListRepositoriesOptions = {}
  ): Promise<Repository[]> {
    const listing = await this.fetchListing("list", options.signal);
    return Object.entries(listing).map(([name, metadata]) =>
      normalizeRepository(this.name, null, name, metadata)
    );
  }

  async createRepository(
    name: string,
    owner: string | null
  ): Promise<Repository> {
    if (owner !== null) {
      throw new StoreCreateError(
        this.name,
        `${owner}/${name}`,
        "rejected",
        "pensieve stores do not have owners"
      );
    }

    let data: unknown;
    try {
      data = await this.agent.invoke("new", { name });
    } catch (error) {
      if (isAgentRejectedError(error)) {
        const kind = /exist/i.test(error.message) ? "already_exists" : "rejected";
        throw new StoreCreateError(this.name, name, kind, error);
      }
      throw new StoreCreateError(this.name, name, "unreachable", error);
    }

    this.log.info({ repository: name }, "created repository");
    return normalizeRepository(this.name, null, name, data);
  }

  async cloneSource(name: string, owner: string | null): Promise<CloneTarget> {
    if (owner !== null) {
      throw new RepositoryNotFoundError(this.name, `${owner}/${name}`);
    }

    const listing = await this.fetchListing("clone");
    if (!Object.hasOwn(listing, name)) {
      throw new RepositoryNotFoundError(this.name, name);
    }

    return {
      url: sshUrl(
        this.agentConfig.host,
        posix.join(this.agentConfig.path, name, BARE_REPOSITORY_DIR)
      ),
      directory: name,
    };
  }

  private async fetchListing(
    operation: "list" | "clone",
    signal?: AbortSignal
  ): Promise<Readonly<Record<string, unknown>>> {
    let data: unknown;
    try {
      data = await this.agent.invoke("list", {}, signal);
    } catch (error) {
      throw new StoreFetchError(this.name, operation, error);
    }

    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw new StoreFetchError(
        this.name,
        operation,
        "agent returned a listing that is not a name → metadata mapping"
      );
    }
    return Object.fromEntries(Object.entries(data));
  }
}
