// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/stores/github/octokit-client`
 * Purpose: Octokit factory with pagination, retry and throttling plugins.
 * Scope: Creates configured @octokit/core instances. Single place to change GitHub client defaults.
 * Invariants:
 * - All GitHub API calls go through clients created by this factory.
 * - Retry: up to 2 retries on 5xx; writes opt out per request.
 * - Throttling: primary limit retried twice, secondary limit always retried (request was not processed).
 * - Octokit's own log lines go to the pino logger, never to the console.
 * Side-effects: none (factory only)
 * Links: src/adapters/server/stores/github/github-store.adapter.ts
 * @internal
 */

import { Octokit } from "@octokit/core";
import { paginateRest } from "@octokit/plugin-paginate-rest";
import { retry } from "@octokit/plugin-retry";
import { throttling } from "@octokit/plugin-throttling";

import type { Logger } from "@/shared/observability";

const OctokitWithPlugins = Octokit.plugin(paginateRest, retry, throttling);

export type GitHubClient = InstanceType<typeof OctokitWithPlugins>;

const MAX_RATE_LIMIT_RETRIES = 2;

export function createGitHubClient(token: string, logger: Logger): GitHubClient {
  return new OctokitWithPlugins({
    auth: token,
    userAgent: "pensieve-cli",
    log: {
      debug: (message: string) => logger.debug(message),
      info: (message: string) => logger.info(message),
      warn: (message: string) => logger.warn(message),
      error: (message: string) => logger.error(message),
    },
    retry: { retries: 2 },
    throttle: {
      onRateLimit: (
        retryAfter: number,
        _options: object,
        octokit: Octokit,
        retryCount: number
      ) => {
        octokit.log.warn(
          `Rate limit hit, retrying after ${retryAfter}s (attempt ${retryCount + 1})`
        );
        return retryCount < MAX_RATE_LIMIT_RETRIES;
      },
      onSecondaryRateLimit: (
        retryAfter: number,
        _options: object,
        octokit: Octokit
      ) => {
        octokit.log.warn(
          `Secondary rate limit hit, retrying after ${retryAfter}s`
        );
        return true;
      },
    },
  });
}
