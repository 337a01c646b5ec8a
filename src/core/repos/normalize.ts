// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/repos/normalize`
 * Purpose: Turn raw backend metadata into a Repository without ever failing.
 * Scope: Pure function. Does not perform I/O or validate names.
 * Invariants:
 * - description is kept only when it is a string.
 * - topics come from `topics`, falling back to the historical `tags` key; non-array ⇒ null.
 * - Non-string topic elements are dropped rather than rejected.
 * Side-effects: none
 * Links: src/core/repos/model.ts
 * @public
 */

import type { Repository } from "./model";

const TOPIC_KEYS = ["topics", "tags"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickDescription(raw: Readonly<Record<string, unknown>>): string | null {
  const value = raw.description;
  return typeof value === "string" ? value : null;
}

function pickTopics(
  raw: Readonly<Record<string, unknown>>
): ReadonlySet<string> | null {
  for (const key of TOPIC_KEYS) {
    if (!(key in raw)) continue;
    const value = raw[key];
    if (!Array.isArray(value)) return null;
    return new Set(
      value.filter((topic): topic is string => typeof topic === "string")
    );
  }
  return null;
}

/**
 * Build a Repository from identity fields plus whatever metadata the backend sent.
 *
 * @example
 * normalizeRepository("home", null, "foo", { description: 2, topics: ["a"] })
 * // => { storeName: "home", owner: null, name: "foo", description: null, topics: Set{"a"} }
 */
export function normalizeRepository(
  storeName: string,
  owner: string | null,
  name: string,
  raw: unknown
): Repository {
  const fields: Readonly<Record<string, unknown>> = isRecord(raw) ? raw : {};

  return {
    storeName,
    owner,
    name,
    description: pickDescription(fields),
    topics: pickTopics(fields),
  };
}
