// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/stores/pensieve/ssh-host`
 * Purpose: Split a dotfile `host` value into the pieces ssh and git URLs need.
 * Scope: Pure parsing. Input is assumed to have passed SSH_HOST_PATTERN.
 * Invariants: Port defaults to 22. Repository paths always start with "/" in URLs.
 * Side-effects: none
 * @internal
 */

import { posix } from "node:path";

export const DEFAULT_SSH_PORT = 22;

export interface SshHost {
  readonly user: string | null;
  readonly hostname: string;
  readonly port: number;
}

export function parseSshHost(value: string): SshHost {
  const bare = value.startsWith("ssh://") ? value.slice("ssh://".length) : value;

  const at = bare.indexOf("@");
  const user = at >= 0 ? bare.slice(0, at) : null;
  const address = at >= 0 ? bare.slice(at + 1) : bare;

  const colon = address.lastIndexOf(":");
  const port = colon >= 0 ? Number.parseInt(address.slice(colon + 1), 10) : NaN;

  return {
    user,
    hostname: colon >= 0 ? address.slice(0, colon) : address,
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_SSH_PORT,
  };
}

/** `user@hostname` (or `hostname`), as ssh takes it. */
export function sshDestination(host: SshHost): string {
  return host.user ? `${host.user}@${host.hostname}` : host.hostname;
}

/**
 * `ssh://user@hostname:port/<path>`. Relative paths resolve against the
 * remote home directory (`/~/`), as git does for ssh URLs.
 */
export function sshUrl(host: SshHost, path: string): string {
  const normalized = posix.normalize(path);
  const absolute = normalized.startsWith("/") ? normalized : `/~/${normalized}`;
  return `ssh://${sshDestination(host)}:${host.port}${absolute}`;
}
