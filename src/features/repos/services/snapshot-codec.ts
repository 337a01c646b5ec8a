// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/repos/services/snapshot-codec`
 * Purpose: Convert between the in-memory Snapshot and the versioned JSON document on disk.
 * Scope: Zod validation on decode, deterministic encoding. Does not read or write files.
 * Invariants:
 * - Only SNAPSHOT_VERSION documents decode; anything else is CacheCorruptionError.
 * - Missing description/topics decode as null; null and [] topics survive a round trip distinctly.
 * - Encoded topics are sorted so identical views produce identical bytes.
 * Side-effects: none
 * Links: src/ports/snapshot-store.port.ts, src/features/repos/services/cache-manager.ts
 * @internal
 */

import { z } from "zod";

import {
  CacheCorruptionError,
  type Repository,
} from "@/core/repos/public";
import type { SnapshotDocument } from "@/ports";

export const SNAPSHOT_VERSION = 2;

const SnapshotRecordSchema = z.object({
  store_name: z.string().min(1),
  owner: z.string().nullish(),
  name: z.string().min(1),
  description: z.string().nullish(),
  topics: z.array(z.string()).nullish(),
});

const SnapshotDocumentSchema = z.object({
  version: z.number(),
  captured_at: z.string().datetime({ offset: true }),
  stores: z.array(z.string()).optional(),
  repositories: z.array(SnapshotRecordSchema),
});

/** The aggregate view as the cache manager holds it. */
export interface Snapshot {
  readonly capturedAt: string;
  /** Stores with data in this snapshot, in configured order */
  readonly stores: readonly string[];
  readonly repositories: readonly Repository[];
}

export function encodeSnapshot(snapshot: Snapshot): SnapshotDocument {
  return {
    version: SNAPSHOT_VERSION,
    captured_at: snapshot.capturedAt,
    stores: [...snapshot.stores],
    repositories: snapshot.repositories.map((repo) => ({
      store_name: repo.storeName,
      owner: repo.owner,
      name: repo.name,
      description: repo.description,
      topics: repo.topics ? [...repo.topics].sort() : null,
    })),
  };
}

/** @throws CacheCorruptionError when the document is not a current-version snapshot */
export function decodeSnapshot(document: unknown, location: string): Snapshot {
  const parsed = SnapshotDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const paths = parsed.error.issues
      .map((issue) => issue.path.join(".") || "(root)")
      .join(", ");
    throw new CacheCorruptionError(
      location,
      `unexpected shape at ${paths}`,
      parsed.error
    );
  }

  const { version, captured_at, stores, repositories } = parsed.data;
  if (version !== SNAPSHOT_VERSION) {
    throw new CacheCorruptionError(
      location,
      `unsupported version ${version} (expected ${SNAPSHOT_VERSION})`
    );
  }

  const decoded: Repository[] = repositories.map((record) => ({
    storeName: record.store_name,
    owner: record.owner ?? null,
    name: record.name,
    description: record.description ?? null,
    topics: record.topics ? new Set(record.topics) : null,
  }));

  return {
    capturedAt: captured_at,
    stores: stores ?? [...new Set(decoded.map((repo) => repo.storeName))],
    repositories: decoded,
  };
}
