// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/config/dotfile`
 * Purpose: Dotfile parsing and loading: valid store definitions, every rejection message.
 * Scope: parseDotfile on inline YAML; loadDotfile against a temp directory.
 * Invariants: Store order follows the file; error messages never include token values.
 * Side-effects: IO (temp directory)
 * Links: src/shared/config/dotfile.ts, src/shared/config/dotfile.schema.ts
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadDotfile, parseDotfile } from "@/shared/config";
import { isDotfileError } from "@/shared/errors";

const VALID = [
  "stores:",
  "  home:",
  "    type: pensieve",
  "    host: tester@0.0.0.0:1234",
  "    path: /home/tester/pensieve",
  "    agent: pensieve-agent",
  "  github:",
  "    type: github",
  "    user: eldridgejm",
  "    token: test-token",
  "    private: false",
  "  work:",
  "    type: github",
  "    user: someone",
].join("\n");

function parse(content: string): ReturnType<typeof parseDotfile> {
  return parseDotfile(content, "/work/.pensieve.yaml");
}

function errorOf(content: string): unknown {
  try {
    parse(content);
  } catch (error) {
    return error;
  }
  throw new Error("expected parseDotfile to throw");
}

describe("parseDotfile", () => {
  it("parses stores in file order", () => {
    const dotfile = parse(VALID);

    expect(dotfile.path).toBe("/work/.pensieve.yaml");
    expect(dotfile.directory).toBe("/work");
    expect([...dotfile.stores.keys()]).toEqual(["home", "github", "work"]);
    expect(dotfile.stores.get("home")).toEqual({
      type: "pensieve",
      host: "tester@0.0.0.0:1234",
      path: "/home/tester/pensieve",
      agent: "pensieve-agent",
    });
    expect(dotfile.stores.get("github")).toEqual({
      type: "github",
      user: "eldridgejm",
      token: "test-token",
      private: false,
    });
  });

  it("defaults GitHub repositories to private and leaves the token optional", () => {
    expect(parse(VALID).stores.get("work")).toEqual({
      type: "github",
      user: "someone",
      private: true,
    });
  });

  it("accepts an empty stores mapping", () => {
    expect(parse("stores: {}\n").stores.size).toBe(0);
  });

  it.each([
    ["invalid YAML", "stores: [unclosed", "Problem decoding the YAML dotfile."],
    ["a missing stores key", "other: 1\n", 'Invalid dotfile. Missing "stores" key.'],
    ["an empty file", "", 'Invalid dotfile. Missing "stores" key.'],
    [
      "stores that is not a mapping",
      "stores:\n  - home\n",
      'Invalid dotfile. "stores" must map store names to store definitions.',
    ],
    [
      "a store without a type",
      "stores:\n  home:\n    host: tester@0.0.0.0\n",
      'Invalid "home" definition in dotfile. Missing a "type" key.',
    ],
    [
      "an unknown store type",
      "stores:\n  home:\n    type: gitlab\n",
      'Invalid "home" definition in dotfile. Unknown client type gitlab.',
    ],
    [
      "a GitHub store without a user",
      "stores:\n  github:\n    type: github\n    token: test-token\n",
      'Invalid "github" definition in dotfile. Missing or unknown parameters (user).',
    ],
    [
      "a malformed host",
      "stores:\n  home:\n    type: pensieve\n    host: not a host\n    path: /p\n    agent: a\n",
      'Invalid "home" definition in dotfile. Missing or unknown parameters (host).',
    ],
    [
      "a store name with a colon",
      "stores:\n  'ho:me':\n    type: github\n    user: someone\n",
      'Invalid store name "ho:me" in dotfile. Store names cannot contain ":", "/" or whitespace.',
    ],
  ])("rejects %s", (_label, content, message) => {
    const error = errorOf(content);

    expect(isDotfileError(error)).toBe(true);
    expect(error).toHaveProperty("message", message);
  });

  it("names unknown keys without their values", () => {
    const error = errorOf(
      "stores:\n  github:\n    type: github\n    user: someone\n    tokn: test-token\n"
    );

    expect(error).toHaveProperty(
      "message",
      `Invalid "github" definition in dotfile. Missing or unknown parameters (Unrecognized key(s) in object: 'tokn').`
    );
  });
});

describe("loadDotfile", () => {
  it("reads the dotfile from disk", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pensieve-dotfile-"));
    const file = path.join(dir, ".pensieve.yaml");
    fs.writeFileSync(file, VALID);

    try {
      const dotfile = await loadDotfile(file);
      expect(dotfile.directory).toBe(dir);
      expect(dotfile.stores.size).toBe(3);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reports a missing dotfile", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pensieve-dotfile-"));

    try {
      await expect(loadDotfile(path.join(dir, ".pensieve.yaml"))).rejects.toThrow(
        "Pensieve dotfile not found. Is this a pensieve?"
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
