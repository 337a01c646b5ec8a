// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/repository-store.port`
 * Purpose: Capability set shared by every repository backend (GitHub, pensieve agent).
 * Scope: Interface only. Implementations live in src/adapters/server/stores/.
 * Invariants:
 * - listRepositories never mutates backend state and honours the abort signal.
 * - createRepository issues exactly one backend write; no retries that could double-create.
 * - Failures are thrown as core store errors carrying the store name; never swallowed here.
 * - defaultOwner is static configuration; resolving it performs no I/O.
 * Side-effects: none (interface only)
 * Links: src/core/repos/errors.ts, src/features/repos/services/aggregate.ts
 * @public
 */

import type { CloneTarget, OwnerSource, Repository } from "@/core/repos/public";

export type StoreKind = "github" | "pensieve";

export interface ListRepositoriesOptions {
  /** Aborted when the caller's per-store deadline passes */
  readonly signal?: AbortSignal;
}

export interface RepositoryStore extends OwnerSource {
  /** Configured store key, e.g. "home" or "github" */
  readonly name: string;
  readonly kind: StoreKind;

  /**
   * Enumerate every repository the backend currently exposes.
   * @throws StoreFetchError on transport, auth, or agent failure
   */
  listRepositories(options?: ListRepositoriesOptions): Promise<Repository[]>;

  /**
   * Create a repository. `owner` null ⇒ the store's default namespace.
   * @throws StoreCreateError with kind already_exists | unreachable | rejected
   */
  createRepository(name: string, owner: string | null): Promise<Repository>;

  /**
   * Resolve what the external clone step needs. Does not run git.
   * @throws RepositoryNotFoundError when the store answers "no such repository"
   * @throws StoreFetchError when the store cannot be reached
   */
  cloneSource(name: string, owner: string | null): Promise<CloneTarget>;
}
