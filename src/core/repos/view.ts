// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/repos/view`
 * Purpose: Filtering and deterministic ordering of the merged multi-store view.
 * Scope: Pure functions over Repository lists. Does not fetch or persist.
 * Invariants:
 * - Default filter hides repositories tagged `archived`; an explicit topic overrides that default.
 * - Order: name (code-unit, case-sensitive), then storeName, then owner (null first).
 * - Output order never depends on input order for distinct (storeName, owner, name) keys.
 * Side-effects: none
 * Links: src/features/repos/services/aggregate.ts
 * @public
 */

import { ARCHIVED_TOPIC, type Repository, type RepositoryFilter } from "./model";

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareOwner(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return compareText(a, b);
}

/** Comparator for display order. */
export function compareRepositories(a: Repository, b: Repository): number {
  return (
    compareText(a.name, b.name) ||
    compareText(a.storeName, b.storeName) ||
    compareOwner(a.owner, b.owner)
  );
}

/** Returns a new, sorted array; input is not mutated. */
export function sortRepositories(
  repositories: readonly Repository[]
): Repository[] {
  return [...repositories].sort(compareRepositories);
}

export function hasTopic(repository: Repository, topic: string): boolean {
  return repository.topics?.has(topic) ?? false;
}

export function matchesFilter(
  repository: Repository,
  filter: RepositoryFilter
): boolean {
  if (filter.topic !== undefined) {
    return hasTopic(repository, filter.topic);
  }
  return !hasTopic(repository, ARCHIVED_TOPIC);
}

export function filterRepositories(
  repositories: readonly Repository[],
  filter: RepositoryFilter
): Repository[] {
  return repositories.filter((repository) => matchesFilter(repository, filter));
}

/** Sorted unique topics across the given repositories. */
export function collectTopics(repositories: readonly Repository[]): string[] {
  const topics = new Set<string>();
  for (const repository of repositories) {
    for (const topic of repository.topics ?? []) {
      topics.add(topic);
    }
  }
  return [...topics].sort(compareText);
}
