// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/env`
 * Purpose: Unit tests for environment parsing defaults and validation.
 * Scope: parseEnv only; the process-wide singleton is not touched.
 * Side-effects: none
 * Links: src/bootstrap/env.ts
 */

import { describe, expect, it } from "vitest";

import { parseEnv } from "@/bootstrap/env";

describe("parseEnv", () => {
  it("applies defaults to an empty environment", () => {
    expect(parseEnv({})).toEqual({
      PENSIEVE_COLOR: "yes",
      PENSIEVE_TIMEOUT: 5,
      PENSIEVE_SSH_OPTIONS: "",
      PENSIEVE_STORE_TIMEOUT_MS: 30_000,
      PENSIEVE_CACHE_MAX_AGE_HOURS: 24,
    });
  });

  it("coerces numeric settings", () => {
    const parsed = parseEnv({
      PENSIEVE_TIMEOUT: "12",
      PENSIEVE_STORE_TIMEOUT_MS: "2500",
      PENSIEVE_CACHE_MAX_AGE_HOURS: "0.5",
    });

    expect(parsed.PENSIEVE_TIMEOUT).toBe(12);
    expect(parsed.PENSIEVE_STORE_TIMEOUT_MS).toBe(2500);
    expect(parsed.PENSIEVE_CACHE_MAX_AGE_HOURS).toBe(0.5);
  });

  it("treats empty optional strings as unset", () => {
    const parsed = parseEnv({ GITHUB_TOKEN: "", PENSIEVE_AGENT_COMMAND: "" });

    expect(parsed.GITHUB_TOKEN).toBeUndefined();
    expect(parsed.PENSIEVE_AGENT_COMMAND).toBeUndefined();
  });

  it("keeps provided values", () => {
    const parsed = parseEnv({
      GITHUB_TOKEN: "test-token",
      PENSIEVE_AGENT_COMMAND: "python3 agent.py",
      PENSIEVE_DOTFILE: "conf/pensieve.yaml",
      PENSIEVE_COLOR: "no",
    });

    expect(parsed).toMatchObject({
      GITHUB_TOKEN: "test-token",
      PENSIEVE_AGENT_COMMAND: "python3 agent.py",
      PENSIEVE_DOTFILE: "conf/pensieve.yaml",
      PENSIEVE_COLOR: "no",
    });
  });

  it("names every invalid variable", () => {
    expect(() =>
      parseEnv({ PENSIEVE_COLOR: "maybe", PENSIEVE_TIMEOUT: "-1" })
    ).toThrow(
      /Invalid environment configuration:\n {2}PENSIEVE_COLOR: .+\n {2}PENSIEVE_TIMEOUT: .+/
    );
  });
});
