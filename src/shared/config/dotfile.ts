// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/dotfile`
 * Purpose: Load `.pensieve.yaml` into an immutable map of store name → store config.
 * Scope: Reads and validates the dotfile; maps every failure to a DotfileError with a user-facing message. Does not construct store adapters.
 * Invariants:
 * - Store order follows the YAML document.
 * - One invalid store definition fails the whole load (no partial configs).
 * - Error messages never echo credential values.
 * Side-effects: IO (reads the dotfile) in loadDotfile only.
 * Links: src/shared/config/dotfile.schema.ts, src/bootstrap/container.ts
 * @public
 */

import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse } from "yaml";

import { DotfileError } from "@/shared/errors";

import {
  STORE_NAME_PATTERN,
  STORE_TYPES,
  type StoreConfig,
  storeConfigSchema,
} from "./dotfile.schema";

/** Default dotfile name, looked up in the working directory. */
export const DOTFILE_NAME = ".pensieve.yaml";

export interface Dotfile {
  /** Absolute path of the loaded file */
  readonly path: string;
  /** Directory holding the dotfile; the cache file lives here too */
  readonly directory: string;
  readonly stores: ReadonlyMap<string, StoreConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isKnownStoreType(value: unknown): boolean {
  return STORE_TYPES.some((type) => type === value);
}

function parseStore(storeName: string, definition: unknown): StoreConfig {
  const invalid = `Invalid "${storeName}" definition in dotfile. `;

  if (!STORE_NAME_PATTERN.test(storeName)) {
    throw new DotfileError(
      `Invalid store name "${storeName}" in dotfile. Store names cannot contain ":", "/" or whitespace.`
    );
  }
  if (!isRecord(definition) || !("type" in definition)) {
    throw new DotfileError(`${invalid}Missing a "type" key.`);
  }
  if (!isKnownStoreType(definition.type)) {
    throw new DotfileError(
      `${invalid}Unknown client type ${String(definition.type)}.`
    );
  }

  const result = storeConfigSchema.safeParse(definition);
  if (!result.success) {
    // Paths only: values may be secrets
    const fields = result.error.errors
      .map((e) => e.path.join(".") || e.message)
      .join(", ");
    throw new DotfileError(
      `${invalid}Missing or unknown parameters (${fields}).`
    );
  }
  return result.data;
}

/**
 * Parse dotfile text. `filePath` only anchors the returned paths.
 * @throws DotfileError
 */
export function parseDotfile(content: string, filePath: string): Dotfile {
  let document: unknown;
  try {
    document = parse(content);
  } catch (cause) {
    throw new DotfileError("Problem decoding the YAML dotfile.", { cause });
  }

  if (!isRecord(document) || !("stores" in document)) {
    throw new DotfileError('Invalid dotfile. Missing "stores" key.');
  }
  if (!isRecord(document.stores)) {
    throw new DotfileError(
      'Invalid dotfile. "stores" must map store names to store definitions.'
    );
  }

  const stores = new Map<string, StoreConfig>();
  for (const [storeName, definition] of Object.entries(document.stores)) {
    stores.set(storeName, parseStore(storeName, definition));
  }

  const absolute = path.resolve(filePath);
  return { path: absolute, directory: path.dirname(absolute), stores };
}

/**
 * Read and parse the dotfile at `filePath`.
 * @throws DotfileError when missing, unreadable, or invalid
 */
export async function loadDotfile(filePath: string): Promise<Dotfile> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (cause) {
    if (
      cause instanceof Error &&
      "code" in cause &&
      cause.code === "ENOENT"
    ) {
      throw new DotfileError(
        "Pensieve dotfile not found. Is this a pensieve?",
        { cause }
      );
    }
    throw new DotfileError(`Could not read dotfile at ${filePath}.`, { cause });
  }
  return parseDotfile(content, filePath);
}
