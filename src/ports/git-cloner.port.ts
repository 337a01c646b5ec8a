// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/git-cloner.port`
 * Purpose: Port for the external `git clone` step.
 * Scope: Interface only. Does not resolve locators or talk to stores.
 * Invariants: Clones into `<cwd>/<target.directory>`; throws CloneFailedError on non-zero git exit.
 * Side-effects: none (interface only)
 * Links: src/adapters/server/git/git-cloner.adapter.ts
 * @public
 */

import type { CloneTarget } from "@/core/repos/public";

export interface GitCloner {
  clone(target: CloneTarget, cwd: string): Promise<void>;
}
