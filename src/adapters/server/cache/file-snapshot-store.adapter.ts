// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/cache/file-snapshot-store.adapter`
 * Purpose: SnapshotStore persisting the cached aggregate view as a JSON file.
 * Scope: Raw load/save with atomic replace. Does not validate the document shape (see snapshot-codec).
 * Invariants:
 * - save() writes a sibling temp file, then renames it over the target; readers never see a partial file.
 * - A failed save removes its temp file and leaves the previous snapshot in place.
 * - A missing file is `found: false`; any other read failure or unparseable bytes are CacheCorruptionError.
 * Side-effects: IO (file system)
 * Links: src/ports/snapshot-store.port.ts
 * @public
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { CacheCorruptionError } from "@/core/repos/public";
import type {
  SnapshotDocument,
  SnapshotLoadResult,
  SnapshotStore,
} from "@/ports";

export const CACHE_FILE_NAME = ".cache.json";

export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  async load(): Promise<SnapshotLoadResult> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        return { found: false };
      }
      throw new CacheCorruptionError(this.filePath, "unreadable", error);
    }

    try {
      const document: unknown = JSON.parse(content);
      return { found: true, document };
    } catch (error) {
      throw new CacheCorruptionError(this.filePath, "not valid JSON", error);
    }
  }

  async save(document: SnapshotDocument): Promise<void> {
    const directory = dirname(this.filePath);
    const tempPath = join(
      directory,
      `.${basename(this.filePath)}.${randomUUID()}.tmp`
    );

    await mkdir(directory, { recursive: true });
    try {
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
