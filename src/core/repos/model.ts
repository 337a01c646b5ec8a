// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/repos/model`
 * Purpose: Backend-neutral domain types for repositories, locators, and clone targets.
 * Scope: Pure types and constants. Does not contain I/O or normalization logic.
 * Invariants:
 * - (storeName, owner, name) is unique within one aggregate view.
 * - topics === null means the backend reported no topics field; an empty set means it reported none.
 * - owner === null for backends without an owner concept.
 * Side-effects: none
 * Links: src/core/repos/normalize.ts
 * @public
 */

/** Normalized metadata for one remote repository. */
export interface Repository {
  /** Configured store key this repository was listed from */
  readonly storeName: string;
  /** Account/organization on the backend; null where the backend has no owners */
  readonly owner: string | null;
  /** Short name, unique within (storeName, owner) */
  readonly name: string;
  readonly description: string | null;
  readonly topics: ReadonlySet<string> | null;
}

/** Parsed `store:[owner/]name` reference. Never persisted. */
export interface Locator {
  readonly storeName: string;
  readonly owner: string | null;
  readonly name: string;
}

/** What the external `git clone` step needs to fetch a repository. */
export interface CloneTarget {
  /** Remote URL handed to git */
  readonly url: string;
  /** Directory name to clone into, relative to the caller's cwd */
  readonly directory: string;
}

/** Reserved topic controlling default visibility in listings. */
export const ARCHIVED_TOPIC = "archived";

/** Listing filter. `topic` set ⇒ only that topic (archived default no longer applies). */
export interface RepositoryFilter {
  readonly topic?: string;
}

export const CACHED_QUERY_KINDS = ["stores", "topics", "names"] as const;
export type CachedQueryKind = (typeof CACHED_QUERY_KINDS)[number];
