// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/dotfile.schema`
 * Purpose: Zod schemas and derived types for the `.pensieve.yaml` store definitions.
 * Scope: Defines per-backend store config shapes; validates structure at runtime; does not perform I/O.
 * Invariants:
 * - Store configs are strict: unknown parameters are rejected.
 * - `type` discriminates the backend; only "github" and "pensieve" are known.
 * - Store names cannot contain ":", "/" or whitespace (they appear inside locators).
 * Side-effects: none
 * Links: src/shared/config/dotfile.ts
 * @public
 */

import { z } from "zod";

export const STORE_TYPES = ["github", "pensieve"] as const;

export const STORE_NAME_PATTERN = /^[^\s:/]+$/;

/** `[ssh://][user@]hostname[:port]` */
export const SSH_HOST_PATTERN = /^(?:ssh:\/\/)?(?:[^@\s:/]+@)?[^@\s:/]+(?::\d{1,5})?$/;

/** GitHub account or organization accessed with a personal token. */
export const githubStoreConfigSchema = z
  .object({
    type: z.literal("github"),
    /** Authenticated user; default owner for locators without `owner/` */
    user: z.string().min(1, "user must be a non-empty string"),
    /** API token; falls back to GITHUB_TOKEN when omitted (treat as secret - never log) */
    token: z.string().min(1).optional(),
    /** Visibility of repositories created by `new` (default: private) */
    private: z.boolean().default(true),
  })
  .strict();

export type GitHubStoreConfig = z.infer<typeof githubStoreConfigSchema>;

/** SSH-reachable host running the pensieve agent against a directory of bare repos. */
export const pensieveStoreConfigSchema = z
  .object({
    type: z.literal("pensieve"),
    /** `user@hostname[:port]` */
    host: z
      .string()
      .regex(SSH_HOST_PATTERN, "host must look like user@hostname[:port]"),
    /** Remote directory holding one `<name>/repo.git` per repository */
    path: z.string().min(1, "path must be a non-empty string"),
    /** Agent command on the remote machine */
    agent: z.string().min(1, "agent must be a non-empty string"),
  })
  .strict();

export type PensieveStoreConfig = z.infer<typeof pensieveStoreConfigSchema>;

export const storeConfigSchema = z.discriminatedUnion("type", [
  githubStoreConfigSchema,
  pensieveStoreConfigSchema,
]);

export type StoreConfig = z.infer<typeof storeConfigSchema>;
