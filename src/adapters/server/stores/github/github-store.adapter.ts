// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/stores/github/github-store.adapter`
 * Purpose: RepositoryStore backed by the GitHub REST API for one authenticated user.
 * Scope: Lists administrable repositories, creates repositories for the user or an organization, resolves SSH clone URLs. Does not run git.
 * Invariants:
 * - Only repositories where the token holder has admin permission are listed.
 * - Every page of /user/repos is fetched; page size is the API maximum (100).
 * - createRepository sends exactly one POST (plugin retries disabled for it).
 * - The token never appears in errors or logs.
 * Side-effects: IO (HTTPS to api.github.com)
 * Links: src/ports/repository-store.port.ts, src/adapters/server/stores/github/octokit-client.ts
 * @public
 */

import { RequestError } from "@octokit/request-error";

import {
  type CloneTarget,
  normalizeRepository,
  type Repository,
  RepositoryNotFoundError,
  StoreCreateError,
  type StoreCreateErrorKind,
  StoreFetchError,
} from "@/core/repos/public";
import type { ListRepositoriesOptions, RepositoryStore } from "@/ports";
import { type Logger, makeNoopLogger } from "@/shared/observability";

import { createGitHubClient, type GitHubClient } from "./octokit-client";

const PER_PAGE = 100;
const SSH_BASE_URL = "ssh://git@github.com";

export interface GitHubStoreAdapterConfig {
  /** Store key from the dotfile */
  readonly storeName: string;
  /** Authenticated user; owner when a locator names none */
  readonly user: string;
  readonly token: string;
  /** Visibility for created repositories */
  readonly privateRepositories: boolean;
}

export class GitHubStoreAdapter implements RepositoryStore {
  public readonly kind = "github" as const;
  public readonly name: string;

  private readonly user: string;
  private readonly privateRepositories: boolean;
  private readonly client: GitHubClient;
  private readonly log: Logger;

  constructor(config: GitHubStoreAdapterConfig, logger?: Logger) {
    this.name = config.storeName;
    this.user = config.user;
    this.privateRepositories = config.privateRepositories;
    this.log = (logger ?? makeNoopLogger()).child({ store: config.storeName });
    this.client = createGitHubClient(config.token, this.log);
  }

  defaultOwner(): string {
    return this.user;
  }

  async listRepositories(
    options: ListRepositoriesOptions = {}
  ): Promise<Repository[]> {
    try {
      const repos = await this.client.paginate("GET /user/repos", {
        per_page: PER_PAGE,
        request: { signal: options.signal },
      });

      const administrable = repos.filter(
        (repo) => repo.permissions?.admin === true
      );
      this.log.debug(
        { total: repos.length, kept: administrable.length },
        "listed GitHub repositories"
      );

      return administrable.map((repo) =>
        normalizeRepository(this.name, repo.owner.login, repo.name, repo)
      );
    } catch (error) {
      throw new StoreFetchError(this.name, "list", error);
    }
  }

  async createRepository(
    name: string,
    owner: string | null
  ): Promise<Repository> {
    const target = owner ?? this.user;

    try {
      const response =
        target === this.user
          ? await this.client.request("POST /user/repos", {
              name,
              private: this.privateRepositories,
              request: { retries: 0 },
            })
          : await this.client.request("POST /orgs/{org}/repos", {
              org: target,
              name,
              private: this.privateRepositories,
              request: { retries: 0 },
            });

      const created = response.data;
      this.log.info({ repository: created.full_name }, "created repository");
      return normalizeRepository(
        this.name,
        created.owner.login,
        created.name,
        created
      );
    } catch (error) {
      throw new StoreCreateError(
        this.name,
        `${target}/${name}`,
        classifyCreateFailure(error),
        describeGitHubError(error)
      );
    }
  }

  async cloneSource(name: string, owner: string | null): Promise<CloneTarget> {
    const target = owner ?? this.user;

    try {
      const { data } = await this.client.request("GET /repos/{owner}/{repo}", {
        owner: target,
        repo: name,
      });
      return {
        url: `${SSH_BASE_URL}/${data.owner.login}/${data.name}`,
        directory: data.name,
      };
    } catch (error) {
      if (error instanceof RequestError && error.status === 404) {
        throw new RepositoryNotFoundError(this.name, `${target}/${name}`);
      }
      throw new StoreFetchError(this.name, "clone", error);
    }
  }
}

/**
 * 422 with "already exists" ⇒ name taken; any other 4xx ⇒ refused;
 * everything else (5xx, DNS, reset) ⇒ unreachable.
 */
export function classifyCreateFailure(error: unknown): StoreCreateErrorKind {
  if (!(error instanceof RequestError)) return "unreachable";
  if (error.status === 422 && /already exists/i.test(describeGitHubError(error))) {
    return "already_exists";
  }
  if (error.status >= 400 && error.status < 500) return "rejected";
  return "unreachable";
}

/** `<message> <first validation error>`, as GitHub reports them. */
export function describeGitHubError(error: unknown): string {
  if (!(error instanceof RequestError)) {
    return error instanceof Error ? error.message : String(error);
  }

  const data: unknown = error.response?.data;
  if (typeof data !== "object" || data === null) return error.message;

  const message =
    "message" in data && typeof data.message === "string"
      ? data.message
      : error.message;
  const detail =
    "errors" in data && Array.isArray(data.errors)
      ? firstErrorMessage(data.errors)
      : null;

  return detail ? `${message} ${detail}` : message;
}

function firstErrorMessage(errors: unknown[]): string | null {
  const first: unknown = errors[0];
  if (typeof first === "string") return first;
  if (
    typeof first === "object" &&
    first !== null &&
    "message" in first &&
    typeof first.message === "string"
  ) {
    return first.message;
  }
  return null;
}
