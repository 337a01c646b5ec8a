// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/repos/locator`
 * Purpose: Parse `store:[owner/]name` text into a Locator and render locators back to text.
 * Scope: Pure parsing with default-owner inference from the store's static identity. Does not perform network I/O.
 * Invariants:
 * - Exactly one `:` separates store from the rest.
 * - At most one `/` in the rest; when present, owner and name are both non-empty.
 * - Omitted owner ⇒ store.defaultOwner() (null for owner-less stores).
 * Side-effects: none
 * Links: src/core/repos/errors.ts
 * @public
 */

import { LocatorParseError } from "./errors";
import type { Locator } from "./model";

/** The slice of a store the resolver needs. */
export interface OwnerSource {
  defaultOwner(): string | null;
}

/**
 * Resolve locator text against the configured stores.
 *
 * @example
 * resolveLocator("github:steve", stores) // owner from the GitHub store's configured user
 * resolveLocator("github:acme/steve", stores) // => { storeName: "github", owner: "acme", name: "steve" }
 * resolveLocator("home:steve", stores) // => { storeName: "home", owner: null, name: "steve" }
 */
export function resolveLocator(
  text: string,
  stores: ReadonlyMap<string, OwnerSource>
): Locator {
  const segments = text.split(":");
  if (segments.length < 2) {
    throw new LocatorParseError(text, "Must include store name.");
  }
  if (segments.length > 2) {
    throw new LocatorParseError(
      text,
      `Locator "${text}" must contain exactly one ":".`
    );
  }

  const [storeName = "", rest = ""] = segments;
  const store = stores.get(storeName);
  if (!store) {
    throw new LocatorParseError(text, `${storeName} not a valid store.`);
  }
  if (rest.length === 0) {
    throw new LocatorParseError(text, "Must include repository name.");
  }

  if (!rest.includes("/")) {
    return { storeName, owner: store.defaultOwner(), name: rest };
  }

  const parts = rest.split("/");
  const [owner = "", name = ""] = parts;
  if (parts.length > 2 || owner.length === 0 || name.length === 0) {
    throw new LocatorParseError(
      text,
      `Expected "<owner>/<name>" after "${storeName}:", got "${rest}".`
    );
  }
  return { storeName, owner, name };
}

/** `owner/name` when an owner exists, otherwise `name`. */
export function fullRepositoryName(ref: {
  readonly owner: string | null;
  readonly name: string;
}): string {
  return ref.owner ? `${ref.owner}/${ref.name}` : ref.name;
}

/** Render a locator (or repository) as re-parseable `store:[owner/]name` text. */
export function formatLocator(ref: {
  readonly storeName: string;
  readonly owner: string | null;
  readonly name: string;
}): string {
  return `${ref.storeName}:${fullRepositoryName(ref)}`;
}
