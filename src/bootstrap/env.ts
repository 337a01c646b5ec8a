// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction; reads process.env and nothing else.
 * Invariants:
 * - Every variable is optional with a documented default; the dotfile carries the store definitions.
 * - GITHUB_TOKEN is a secret - never log
 * - Fails fast with clear errors on invalid config
 * Side-effects: Reads process.env
 * Links: src/bootstrap/container.ts
 * @internal
 */

import { z } from "zod";

const EnvSchema = z.object({
  /** Path to the dotfile (default: .pensieve.yaml in the working directory) */
  PENSIEVE_DOTFILE: z.string().min(1).optional(),

  /** "no" disables coloured output (default: yes) */
  PENSIEVE_COLOR: z.enum(["yes", "no"]).default("yes"),

  /** SSH ConnectTimeout in seconds for pensieve-agent stores (default: 5) */
  PENSIEVE_TIMEOUT: z.coerce.number().int().positive().default(5),

  /** Extra ssh options, whitespace separated (e.g. "-i ~/.ssh/id_pensieve") */
  PENSIEVE_SSH_OPTIONS: z.string().default(""),

  /** Overrides the `agent` of every pensieve store */
  PENSIEVE_AGENT_COMMAND: z
    .string()
    .min(1)
    .optional()
    .or(z.literal("").transform(() => undefined)),

  /** Deadline for one store call during `list` (default: 30000) */
  PENSIEVE_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  /** Snapshot age after which cached data counts as stale (default: 24) */
  PENSIEVE_CACHE_MAX_AGE_HOURS: z.coerce.number().positive().default(24),

  /** Fallback token for GitHub stores without `token` (treat as secret - never log) */
  GITHUB_TOKEN: z
    .string()
    .min(1)
    .optional()
    .or(z.literal("").transform(() => undefined)),
});

export type Env = z.infer<typeof EnvSchema>;

let _env: Env | null = null;

/**
 * Parse an environment object. Exposed for tests; runtime code uses env().
 * Throws on invalid config with clear error messages.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
