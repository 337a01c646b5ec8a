// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cli/format`
 * Purpose: Terminal rendering for command output (listing blocks, failure lines, status messages).
 * Scope: Pure string formatting with an injectable colour palette. Does not write to streams.
 * Invariants:
 * - With colours disabled, output is plain text (no escape codes).
 * - A null description renders as `None`; null or empty topics render as `None`.
 * - Without a width, every field stays on one line.
 * Side-effects: none
 * Links: src/cli/commands/list.ts
 * @public
 */

import { Chalk } from "chalk";

import {
  formatLocator,
  fullRepositoryName,
  type Locator,
  type Repository,
} from "@/core/public";
import type { StoreFailure } from "@/features/repos/public";

const INDENT = "    ";
const MISSING = "None";
const MIN_WRAP_WIDTH = 20;

export interface Palette {
  faded(text: string): string;
  info(text: string): string;
  infoHeading(text: string): string;
  highlight(text: string): string;
  bad(text: string): string;
  good(text: string): string;
}

/** `enabled: false` (PENSIEVE_COLOR=no) ⇒ identity palette. */
export function createPalette(enabled: boolean): Palette {
  const chalk = new Chalk(enabled ? {} : { level: 0 });
  return {
    faded: (text) => chalk.gray(text),
    info: (text) => chalk.magenta(text),
    infoHeading: (text) => chalk.blue(text),
    highlight: (text) => chalk.bold.white(text),
    bad: (text) => chalk.red(text),
    good: (text) => chalk.green(text),
  };
}

function formatTopics(topics: ReadonlySet<string> | null): string {
  if (!topics || topics.size === 0) return MISSING;
  return [...topics].sort().join(", ");
}

/** Greedy word wrap; a word longer than `width` gets a line of its own. */
export function wrapWords(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";
  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    if (current.length === 0) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current.length > 0) lines.push(current);
  return lines;
}

/**
 * `<heading>: <value>` indented once. With a width, the text is wrapped and
 * continuation lines are indented twice.
 */
function formatField(
  heading: string,
  value: string,
  palette: Palette,
  width: number | undefined
): string[] {
  const label = `${INDENT}${palette.infoHeading(heading)}:`;
  if (width === undefined) return [`${label} ${palette.info(value)}`];

  const budget = Math.max(width - 2 * INDENT.length, MIN_WRAP_WIDTH);
  const [first = "", ...rest] = wrapWords(`${heading}: ${value}`, budget);
  const firstValue = first.slice(heading.length + 1).trimStart();
  return [
    firstValue.length > 0 ? `${label} ${palette.info(firstValue)}` : label,
    ...rest.map((line) => `${INDENT}${INDENT}${palette.info(line)}`),
  ];
}

/** `<name> :: <store>`, then indented description and topics wrapped to `width` when given. */
export function formatRepository(
  repository: Repository,
  palette: Palette,
  width?: number
): string[] {
  return [
    palette.highlight(fullRepositoryName(repository)) +
      palette.faded(` :: ${repository.storeName}`),
    ...formatField("description", repository.description ?? MISSING, palette, width),
    ...formatField("topics", formatTopics(repository.topics), palette, width),
  ];
}

export function formatFailure(failure: StoreFailure, palette: Palette): string {
  return palette.bad(`Warning: ${failure.error.message}`);
}

export function staleCacheWarning(palette: Palette): string {
  return palette.bad(
    'Warning: Cached data is out of date. Run "pensieve list" to refresh it.'
  );
}

export function formatError(message: string, palette: Palette): string {
  return palette.bad(`Error: ${message}`);
}

export function createdMessage(locator: Locator): string {
  return `New repository "${formatLocator(locator)}" created.`;
}

export function clonedMessage(locator: Locator, palette: Palette): string {
  return palette.good(`Cloned repository "${formatLocator(locator)}".`);
}
