// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cli/program`
 * Purpose: Command-level tests: argv in, captured stdout/stderr lines and exit code out.
 * Scope: Real RepositoryService and CacheManager over fake ports; colours disabled.
 * Invariants: Errors print one `Error: <message>` line on stderr and exit 1; --help never builds the context.
 * Side-effects: none
 * Links: src/cli/program.ts, src/cli/commands/
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  FakeGitCloner,
  FakeRepoPicker,
  FakeRepositoryStore,
  InMemorySnapshotStore,
} from "@/adapters/test";
import type { CliDeps, CommandContext } from "@/cli/context";
import { createPalette } from "@/cli/format";
import { runCli } from "@/cli/program";
import { CacheManager, RepositoryService } from "@/features/repos/public";
import type { RepositoryStore } from "@/ports";
import { makeNoopLogger } from "@/shared/observability";
import {
  CapturedOutput,
  DEFAULT_FAKE_TIME,
  FakeClock,
  repo,
} from "@tests/_fakes";

describe("pensieve CLI", () => {
  let home: FakeRepositoryStore;
  let lab: FakeRepositoryStore;
  let cloner: FakeGitCloner;
  let picker: FakeRepoPicker;
  let output: CapturedOutput;

  function deps(
    context: () => Promise<CommandContext> = async () => ({
      repositories: service(),
      cwd: "/work",
    })
  ): CliDeps {
    return {
      output,
      palette: createPalette(false),
      log: makeNoopLogger(),
      context,
    };
  }

  const snapshotStore = new InMemorySnapshotStore();
  const clock = new FakeClock();

  function service(): RepositoryService {
    const stores = new Map<string, RepositoryStore>([
      ["home", home],
      ["lab", lab],
    ]);
    return new RepositoryService({
      stores,
      cache: new CacheManager({
        snapshotStore,
        clock,
        maxAgeMs: 60_000,
        storeTimeoutMs: 1_000,
      }),
      cloner,
      picker,
      clock,
    });
  }

  beforeEach(() => {
    home = new FakeRepositoryStore({
      name: "home",
      repositories: [
        repo("foo", { description: "first", topics: ["b", "a"] }),
        repo("bar", { topics: null }),
        repo("baz", { description: "third" }),
      ],
    });
    lab = new FakeRepositoryStore({
      name: "lab",
      repositories: [
        repo("attic", { storeName: "lab", topics: ["archived", "a"] }),
      ],
    });
    cloner = new FakeGitCloner();
    picker = new FakeRepoPicker(null);
    output = new CapturedOutput();
    snapshotStore.seed(null);
    clock.setTime(DEFAULT_FAKE_TIME);
  });

  describe("list", () => {
    it("prints one block per repository in name order", async () => {
      const code = await runCli(["list"], deps());

      expect(code).toBe(0);
      expect(output.stdout).toEqual([
        "bar :: home",
        "    description: None",
        "    topics: None",
        "baz :: home",
        "    description: third",
        "    topics: None",
        "foo :: home",
        "    description: first",
        "    topics: a, b",
      ]);
      expect(output.stderr).toEqual([]);
    });

    it("shows archived repositories only when asked by topic", async () => {
      const code = await runCli(["list", "--topic", "archived"], deps());

      expect(code).toBe(0);
      expect(output.stdout).toEqual([
        "attic :: lab",
        "    description: None",
        "    topics: a, archived",
      ]);
    });

    it("wraps fields to the terminal width when one is known", async () => {
      home.configure({
        repositories: [
          repo("foo", {
            description: "a long description that needs more than one line",
            topics: ["b", "a"],
          }),
        ],
      });

      const code = await runCli(["list", "-t", "b"], { ...deps(), width: 40 });

      expect(code).toBe(0);
      expect(output.stdout).toEqual([
        "foo :: home",
        "    description: a long description",
        "        that needs more than one line",
        "    topics: a, b",
      ]);
    });

    it("warns about a failing store and still succeeds", async () => {
      lab.configure({ failure: new Error("connection refused") });

      const code = await runCli(["list", "-t", "a"], deps());

      expect(code).toBe(0);
      expect(output.stdout[0]).toBe("foo :: home");
      expect(output.stderr).toEqual([
        'Warning: Store "lab" is unavailable: connection refused',
      ]);
    });

    it("exits 1 when every store fails", async () => {
      home.configure({ failure: new Error("timed out") });
      lab.configure({ failure: new Error("connection refused") });

      const code = await runCli(["list"], deps());

      expect(code).toBe(1);
      expect(output.stdout).toEqual([]);
      expect(output.stderr).toEqual([
        'Warning: Store "home" is unavailable: timed out',
        'Warning: Store "lab" is unavailable: connection refused',
      ]);
    });
  });

  describe("cached", () => {
    it("prints nothing before the first list", async () => {
      const code = await runCli(["cached", "names"], deps());

      expect(code).toBe(0);
      expect(output.stdout).toEqual([]);
    });

    it("answers from the snapshot written by list", async () => {
      await runCli(["list"], deps());
      home.configure({ failure: new Error("offline") });
      output = new CapturedOutput();

      await runCli(["cached", "names"], deps());
      await runCli(["cached", "stores"], deps());
      await runCli(["cached", "topics"], deps());

      expect(output.stdout).toEqual([
        "lab:attic",
        "home:bar",
        "home:baz",
        "home:foo",
        "home",
        "lab",
        "a",
        "archived",
        "b",
      ]);
      expect(home.listCallCount).toBe(1);
    });

    it("warns on stderr when the snapshot is older than the cache lifetime", async () => {
      await runCli(["list"], deps());
      clock.advance(2 * 60_000);
      output = new CapturedOutput();

      const code = await runCli(["cached", "stores"], deps());

      expect(code).toBe(0);
      expect(output.stdout).toEqual(["home", "lab"]);
      expect(output.stderr).toEqual([
        'Warning: Cached data is out of date. Run "pensieve list" to refresh it.',
      ]);
    });

    it("stays quiet while the snapshot is fresh", async () => {
      await runCli(["list"], deps());
      clock.advance(30_000);
      output = new CapturedOutput();

      await runCli(["cached", "stores"], deps());

      expect(output.stderr).toEqual([]);
    });

    it("rejects an unknown query kind", async () => {
      const code = await runCli(["cached", "owners"], deps());

      expect(code).toBe(1);
      expect(output.stderr).toEqual([
        "error: command-argument value 'owners' is invalid for argument 'what'. Allowed choices are stores, topics, names.",
      ]);
    });
  });

  describe("new", () => {
    it("creates the repository and clones it into the working directory", async () => {
      const code = await runCli(["new", "home:notes"], deps());

      expect(code).toBe(0);
      expect(output.stdout).toEqual(['New repository "home:notes" created.']);
      expect(cloner.clones).toEqual([
        { target: { url: "fake://home:notes", directory: "notes" }, cwd: "/work" },
      ]);
    });

    it("prefixes today's date with --date", async () => {
      await runCli(["new", "--date", "home:notes"], deps());

      expect(output.stdout).toEqual([
        'New repository "home:__2026-03-14__notes" created.',
      ]);
    });

    it("reports an existing repository", async () => {
      const code = await runCli(["new", "home:foo"], deps());

      expect(code).toBe(1);
      expect(output.stderr).toEqual([
        'Error: Repository "foo" already exists on "home".',
      ]);
      expect(cloner.clones).toEqual([]);
    });

    it("reports an unknown store", async () => {
      const code = await runCli(["new", "nowhere:notes"], deps());

      expect(code).toBe(1);
      expect(output.stderr).toEqual(["Error: nowhere not a valid store."]);
    });
  });

  describe("clone", () => {
    it("clones the named repository", async () => {
      const code = await runCli(["clone", "home:foo"], deps());

      expect(code).toBe(0);
      expect(output.stdout).toEqual(['Cloned repository "home:foo".']);
      expect(cloner.clones[0]?.target.url).toBe("fake://home:foo");
    });

    it("reports a repository the store does not have", async () => {
      const code = await runCli(["clone", "home:missing"], deps());

      expect(code).toBe(1);
      expect(output.stderr).toEqual([
        'Error: Repository "missing" does not exist on "home".',
      ]);
    });

    it("reports git's failure", async () => {
      cloner.failWith = "fatal: could not create work tree dir 'foo'";

      const code = await runCli(["clone", "home:foo"], deps());

      expect(code).toBe(1);
      expect(output.stderr).toEqual([
        `Error: Could not clone "fake://home:foo": fatal: could not create work tree dir 'foo'`,
      ]);
    });

    it("offers cached names to the picker when no locator is given", async () => {
      await runCli(["list"], deps());
      picker = new FakeRepoPicker("home:baz");
      output = new CapturedOutput();

      const code = await runCli(["clone"], deps());

      expect(code).toBe(0);
      expect(picker.offered).toEqual([
        "lab:attic",
        "home:bar",
        "home:baz",
        "home:foo",
      ]);
      expect(output.stdout).toEqual(['Cloned repository "home:baz".']);
    });

    it("warns before picking from a stale cache", async () => {
      await runCli(["list"], deps());
      clock.advance(2 * 60_000);
      picker = new FakeRepoPicker("home:foo");
      output = new CapturedOutput();

      const code = await runCli(["clone"], deps());

      expect(code).toBe(0);
      expect(output.stderr).toEqual([
        'Warning: Cached data is out of date. Run "pensieve list" to refresh it.',
      ]);
      expect(output.stdout).toEqual(['Cloned repository "home:foo".']);
    });

    it("exits 1 when nothing is picked", async () => {
      await runCli(["list"], deps());
      output = new CapturedOutput();

      const code = await runCli(["clone"], deps());

      expect(code).toBe(1);
      expect(output.stderr).toEqual([
        "Error: No repository selected. Pass a locator such as store:name.",
      ]);
      expect(cloner.clones).toEqual([]);
    });
  });

  describe("errors", () => {
    it("reports unexpected failures on one line", async () => {
      const code = await runCli(
        ["list"],
        deps(() => Promise.reject(new Error("boom")))
      );

      expect(code).toBe(1);
      expect(output.stderr).toEqual(["Error: boom"]);
    });

    it("prints help without building the context", async () => {
      const context = vi.fn(() =>
        Promise.reject(new Error("context must not be built"))
      );

      const code = await runCli(["--help"], deps(context));

      expect(code).toBe(0);
      expect(output.stdout).toHaveLength(1);
      expect(output.stdout[0]).toMatch(/^Usage: pensieve \[options\] \[command\]\n/);
      expect(context).not.toHaveBeenCalled();
    });

    it("rejects unknown commands with a usage error", async () => {
      const code = await runCli(["frobnicate"], deps());

      expect(code).toBe(1);
      expect(output.stderr).toEqual(["error: unknown command 'frobnicate'"]);
    });
  });
});
