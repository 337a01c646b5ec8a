// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/repos/errors`
 * Purpose: Domain error classes for locator parsing, store calls, cloning, and cache recovery.
 * Scope: Error definitions and type guards. Does not perform I/O or decide propagation policy.
 * Invariants:
 * - All errors have a readonly `code` discriminant for type guards.
 * - Store errors always carry the store name; transport causes are chained via `cause`.
 * - StoreCreateError.kind separates an expected "already exists" from infrastructure failures.
 * Side-effects: none
 * Links: src/features/repos/services/aggregate.ts
 * @public
 */

/** Render an unknown thrown value as a one-line message. */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  return String(cause);
}

export class LocatorParseError extends Error {
  public readonly code = "LOCATOR_PARSE" as const;
  constructor(
    public readonly input: string,
    public readonly reason: string
  ) {
    super(reason);
    this.name = "LocatorParseError";
  }
}

export type StoreFetchOperation = "list" | "clone";

export class StoreFetchError extends Error {
  public readonly code = "STORE_FETCH" as const;
  constructor(
    public readonly storeName: string,
    public readonly operation: StoreFetchOperation,
    cause: unknown
  ) {
    super(`Store "${storeName}" is unavailable: ${describeCause(cause)}`, {
      cause,
    });
    this.name = "StoreFetchError";
  }
}

export class StoreTimeoutError extends Error {
  public readonly code = "STORE_TIMEOUT" as const;
  constructor(
    public readonly storeName: string,
    public readonly timeoutMs: number
  ) {
    super(`No response from store "${storeName}" within ${timeoutMs}ms`);
    this.name = "StoreTimeoutError";
  }
}

/**
 * - already_exists: the backend answered, and the name is taken (expected outcome)
 * - unreachable: network, SSH, or server-side failure
 * - rejected: the backend answered and refused for another reason (permissions, invalid name)
 */
export type StoreCreateErrorKind = "already_exists" | "unreachable" | "rejected";

export class StoreCreateError extends Error {
  public readonly code = "STORE_CREATE" as const;
  constructor(
    public readonly storeName: string,
    public readonly repositoryName: string,
    public readonly kind: StoreCreateErrorKind,
    cause?: unknown
  ) {
    super(StoreCreateError.message(storeName, repositoryName, kind, cause), {
      cause,
    });
    this.name = "StoreCreateError";
  }

  private static message(
    storeName: string,
    repositoryName: string,
    kind: StoreCreateErrorKind,
    cause: unknown
  ): string {
    switch (kind) {
      case "already_exists":
        return `Repository "${repositoryName}" already exists on "${storeName}".`;
      case "unreachable":
        return `Could not reach "${storeName}" to create "${repositoryName}": ${describeCause(cause)}`;
      case "rejected":
        return `Store "${storeName}" refused to create "${repositoryName}": ${describeCause(cause)}`;
    }
  }
}

export class RepositoryNotFoundError extends Error {
  public readonly code = "REPOSITORY_NOT_FOUND" as const;
  constructor(
    public readonly storeName: string,
    public readonly fullName: string
  ) {
    super(`Repository "${fullName}" does not exist on "${storeName}".`);
    this.name = "RepositoryNotFoundError";
  }
}

export class CloneFailedError extends Error {
  public readonly code = "CLONE_FAILED" as const;
  constructor(
    public readonly url: string,
    public readonly output: string
  ) {
    super(`Could not clone "${url}": ${output.trim() || "git exited with an error"}`);
    this.name = "CloneFailedError";
  }
}

export class CacheCorruptionError extends Error {
  public readonly code = "CACHE_CORRUPTION" as const;
  constructor(
    public readonly location: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Cache at ${location} is unusable: ${reason}`, { cause });
    this.name = "CacheCorruptionError";
  }
}

// Type guards

export function isLocatorParseError(
  error: unknown
): error is LocatorParseError {
  return error instanceof Error && error.name === "LocatorParseError";
}

export function isStoreFetchError(error: unknown): error is StoreFetchError {
  return error instanceof Error && error.name === "StoreFetchError";
}

export function isStoreTimeoutError(
  error: unknown
): error is StoreTimeoutError {
  return error instanceof Error && error.name === "StoreTimeoutError";
}

export function isStoreCreateError(error: unknown): error is StoreCreateError {
  return error instanceof Error && error.name === "StoreCreateError";
}

export function isRepositoryNotFoundError(
  error: unknown
): error is RepositoryNotFoundError {
  return error instanceof Error && error.name === "RepositoryNotFoundError";
}

export function isCloneFailedError(error: unknown): error is CloneFailedError {
  return error instanceof Error && error.name === "CloneFailedError";
}

export function isCacheCorruptionError(
  error: unknown
): error is CacheCorruptionError {
  return error instanceof Error && error.name === "CacheCorruptionError";
}
