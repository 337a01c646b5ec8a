// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/stores/pensieve/pensieve-agent.client`
 * Purpose: JSON-over-SSH transport to the agent program running next to a pensieve directory.
 * Scope: Builds the ssh invocation, writes one `{command, data}` request to stdin, decodes the `{error, data}` reply. Does not know what commands mean.
 * Invariants:
 * - One ssh process per call; no connection reuse.
 * - A non-zero `error.code` is an AgentRejectedError (the agent answered); everything else is an AgentTransportError.
 * Side-effects: process spawn (ssh)
 * Links: src/adapters/server/stores/pensieve/pensieve-store.adapter.ts
 * @internal
 */

import { z } from "zod";

import {
  isCommandFailedError,
  isCommandNotFoundError,
  runCommand,
} from "@/adapters/server/process/run-command";
import { type Logger, makeNoopLogger } from "@/shared/observability";

import { type SshHost, sshDestination } from "./ssh-host";

const AgentResponseSchema = z.object({
  error: z.object({
    code: z.number().int(),
    msg: z.string().nullish(),
  }),
  data: z.unknown(),
});

export interface PensieveAgentConfig {
  readonly host: SshHost;
  /** Remote pensieve directory */
  readonly path: string;
  /** Agent command run from inside `path` */
  readonly agent: string;
  /** ssh ConnectTimeout, seconds */
  readonly connectTimeoutSeconds: number;
  /** Extra ssh arguments placed before `-p` */
  readonly sshOptions: readonly string[];
}

export class AgentTransportError extends Error {
  public readonly code = "AGENT_TRANSPORT" as const;
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "AgentTransportError";
  }
}

export class AgentRejectedError extends Error {
  public readonly code = "AGENT_REJECTED" as const;
  constructor(
    public readonly command: string,
    public readonly agentCode: number,
    message: string
  ) {
    super(message || `agent rejected "${command}" (code ${agentCode})`);
    this.name = "AgentRejectedError";
  }
}

export function isAgentRejectedError(
  error: unknown
): error is AgentRejectedError {
  return error instanceof Error && error.name === "AgentRejectedError";
}

export class PensieveAgentClient {
  private readonly log: Logger;

  constructor(
    private readonly config: PensieveAgentConfig,
    logger?: Logger
  ) {
    this.log = logger ?? makeNoopLogger();
  }

  /** Full argv for ssh, without the program name. */
  sshArgs(): string[] {
    const { host, path, agent, connectTimeoutSeconds, sshOptions } =
      this.config;
    return [
      "-o",
      `ConnectTimeout=${connectTimeoutSeconds}`,
      ...sshOptions,
      "-p",
      String(host.port),
      sshDestination(host),
      `bash -c "cd ${path} && ${agent}"`,
    ];
  }

  async invoke(
    command: string,
    data: Readonly<Record<string, unknown>>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const request = JSON.stringify({ command, data });
    this.log.debug({ command }, "invoking pensieve agent");

    let stdout: string;
    try {
      ({ stdout } = await runCommand("ssh", this.sshArgs(), {
        input: request,
        signal,
      }));
    } catch (error) {
      throw this.transportFailure(error);
    }

    const response = this.decode(stdout);
    if (response.error.code !== 0) {
      throw new AgentRejectedError(
        command,
        response.error.code,
        response.error.msg ?? ""
      );
    }
    return response.data;
  }

  private decode(stdout: string): z.infer<typeof AgentResponseSchema> {
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (error) {
      throw new AgentTransportError(
        `Problem decoding when communicating JSON over SSH. Received: ${stdout.trim()}`,
        error
      );
    }

    const parsed = AgentResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AgentTransportError(
        `Unexpected reply from agent. Received: ${stdout.trim()}`,
        parsed.error
      );
    }
    return parsed.data;
  }

  private transportFailure(error: unknown): unknown {
    if (isCommandNotFoundError(error)) {
      return new AgentTransportError("ssh is not installed", error);
    }
    if (!isCommandFailedError(error)) return error;

    const output = error.output;
    if (output.includes("No such file")) {
      return new AgentTransportError(
        `The server has no pensieve "${this.config.path}".`,
        error
      );
    }
    return new AgentTransportError(
      `Connection failed with error: ${output.trim() || error.message}`,
      error
    );
  }
}
