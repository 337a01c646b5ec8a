// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/repos/view`
 * Purpose: Unit tests for listing filters, display order and topic collection.
 * Scope: Pure functions over in-memory repositories.
 * Invariants: archived hidden by default; explicit topic overrides that default; total order.
 * Side-effects: none (unit tests only)
 * Links: src/core/repos/view.ts
 */

import { describe, expect, it } from "vitest";

import {
  collectTopics,
  filterRepositories,
  sortRepositories,
} from "@/core/repos/public";
import { keys, repo } from "@tests/_fakes";

const foo = repo("foo", { topics: ["research"] });
const bar = repo("bar", { topics: ["teaching", "research"] });
const baz = repo("baz", { topics: [] });
const archivedBaz = repo("baz", { topics: ["archived"] });

describe("filterRepositories", () => {
  it("includes every repository when none is archived", () => {
    expect(keys(filterRepositories([foo, bar, baz], {}))).toEqual([
      "home:foo",
      "home:bar",
      "home:baz",
    ]);
  });

  it("keeps only repositories with the requested topic", () => {
    expect(
      keys(filterRepositories([foo, bar, baz], { topic: "research" }))
    ).toEqual(["home:foo", "home:bar"]);
  });

  it("hides archived repositories by default", () => {
    expect(keys(filterRepositories([foo, bar, archivedBaz], {}))).toEqual([
      "home:foo",
      "home:bar",
    ]);
  });

  it("shows archived repositories when archived is requested explicitly", () => {
    expect(
      keys(filterRepositories([foo, bar, archivedBaz], { topic: "archived" }))
    ).toEqual(["home:baz"]);
  });

  it("never matches a topic on repositories with null topics", () => {
    const untagged = repo("qux", { topics: null });

    expect(filterRepositories([untagged], {})).toEqual([untagged]);
    expect(filterRepositories([untagged], { topic: "research" })).toEqual([]);
  });
});

describe("sortRepositories", () => {
  it("orders by name, then store, then owner with null first", () => {
    const input = [
      repo("zeta", { storeName: "home" }),
      repo("alpha", { storeName: "lab" }),
      repo("alpha", { storeName: "github", owner: "zed" }),
      repo("alpha", { storeName: "github", owner: "acme" }),
      repo("alpha", { storeName: "home" }),
    ];

    expect(keys(sortRepositories(input))).toEqual([
      "github:acme/alpha",
      "github:zed/alpha",
      "home:alpha",
      "lab:alpha",
      "home:zeta",
    ]);
  });

  it("is case-sensitive in code-unit order", () => {
    const sorted = sortRepositories([repo("apple"), repo("Zoo"), repo("Apple")]);

    expect(sorted.map((r) => r.name)).toEqual(["Apple", "Zoo", "apple"]);
  });

  it("does not mutate its input", () => {
    const input = [repo("b"), repo("a")];
    sortRepositories(input);

    expect(input.map((r) => r.name)).toEqual(["b", "a"]);
  });
});

describe("collectTopics", () => {
  it("returns the sorted union of topics, skipping null sets", () => {
    expect(
      collectTopics([foo, bar, archivedBaz, repo("qux", { topics: null })])
    ).toEqual(["archived", "research", "teaching"]);
  });
});
