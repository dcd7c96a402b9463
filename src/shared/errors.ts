import type { MenuKey } from "./schemas";

export type MenuServiceErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "PARSE_ERROR"
  | "RECONCILE_ERROR"
  | "INVALID_FILTER"
  | "STORE_UNAVAILABLE"
  | "CONFIG_ERROR"
  | "OWNERSHIP_ERROR";

/**
 * Base class for every failure the pipeline knows how to classify.
 * Anything else reaching the HTTP layer is treated as an internal error.
 */
export class MenuServiceError extends Error {
  constructor(
    message: string,
    public readonly code: MenuServiceErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, non-2xx status or unexpected content type. */
export class SourceUnavailable extends MenuServiceError {
  public readonly status: number | undefined;

  constructor(
    message: string,
    public readonly targetId: string,
    public readonly url: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, "SOURCE_UNAVAILABLE", options);
    this.status = options?.status;
  }
}

/** The document did not have the structure the parser expects. */
export class ParseError extends MenuServiceError {
  constructor(
    public readonly section: string,
    public readonly expected: string,
    detail?: string
  ) {
    super(`Unrecognized ${section}: expected ${expected}${detail ? ` (${detail})` : ""}`, "PARSE_ERROR");
  }
}

export class ReconcileError extends MenuServiceError {
  constructor(message: string, public readonly key: MenuKey, options?: { cause?: unknown }) {
    super(message, "RECONCILE_ERROR", options);
  }
}

export class InvalidFilter extends MenuServiceError {
  constructor(public readonly field: string, message: string) {
    super(message, "INVALID_FILTER");
  }
}

export class StoreUnavailable extends MenuServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "STORE_UNAVAILABLE", options);
  }
}

export class ConfigError extends MenuServiceError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

export class OwnershipError extends MenuServiceError {
  constructor(message: string) {
    super(message, "OWNERSHIP_ERROR");
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
