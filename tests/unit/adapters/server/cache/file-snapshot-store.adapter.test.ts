// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/cache/file-snapshot-store.adapter`
 * Purpose: Unit tests for the on-disk snapshot store.
 * Scope: Real filesystem under a per-test temp directory.
 * Invariants: save replaces the file atomically and leaves no temp files behind.
 * Side-effects: IO (temp directory)
 * Links: src/adapters/server/cache/file-snapshot-store.adapter.ts
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CACHE_FILE_NAME, FileSnapshotStore } from "@/adapters/server";
import { isCacheCorruptionError } from "@/core/repos/public";
import type { SnapshotDocument } from "@/ports";

const DOCUMENT: SnapshotDocument = {
  version: 2,
  captured_at: "2026-03-14T09:30:00.000Z",
  stores: ["home"],
  repositories: [
    {
      store_name: "home",
      owner: null,
      name: "foo",
      description: "first",
      topics: ["a"],
    },
  ],
};

describe("FileSnapshotStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "pensieve-cache-"));
    filePath = path.join(dir, CACHE_FILE_NAME);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports a missing file as not found", async () => {
    await expect(new FileSnapshotStore(filePath).load()).resolves.toEqual({
      found: false,
    });
  });

  it("raises CacheCorruptionError for invalid JSON", async () => {
    fs.writeFileSync(filePath, "{ not json");

    const error = await new FileSnapshotStore(filePath).load().then(
      () => null,
      (caught: unknown) => caught
    );

    expect(isCacheCorruptionError(error)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      `Cache at ${filePath} is unusable: not valid JSON`
    );
  });

  it("raises CacheCorruptionError when the file cannot be read", async () => {
    fs.mkdirSync(filePath);

    const error = await new FileSnapshotStore(filePath).load().then(
      () => null,
      (caught: unknown) => caught
    );

    expect(isCacheCorruptionError(error)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      `Cache at ${filePath} is unusable: unreadable`
    );
  });

  it("writes pretty JSON and reads it back", async () => {
    const store = new FileSnapshotStore(filePath);

    await store.save(DOCUMENT);

    expect(fs.readFileSync(filePath, "utf8")).toBe(
      `${JSON.stringify(DOCUMENT, null, 2)}\n`
    );
    await expect(store.load()).resolves.toEqual({
      found: true,
      document: DOCUMENT,
    });
  });

  it("replaces an existing file without leaving temp files", async () => {
    fs.writeFileSync(filePath, "old");
    const store = new FileSnapshotStore(filePath);

    await store.save(DOCUMENT);

    expect(fs.readdirSync(dir)).toEqual([CACHE_FILE_NAME]);
  });

  it("creates the parent directory on first save", async () => {
    const nested = path.join(dir, "nested", "deeper", CACHE_FILE_NAME);

    await new FileSnapshotStore(nested).save(DOCUMENT);

    expect(fs.existsSync(nested)).toBe(true);
  });

  it("exposes the file path as its location", () => {
    expect(new FileSnapshotStore(filePath).location).toBe(filePath);
  });
});
