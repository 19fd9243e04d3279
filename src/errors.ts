export type CollectionErrorCode =
  | "session_failed"
  | "fetch_failed"
  | "parse_failed"
  | "no_collections"
  | "invalid_now";

export class CollectionError extends Error {
  readonly code: CollectionErrorCode;

  constructor(code: CollectionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The address handshake could not be verified by its session cookie. */
export class SessionError extends CollectionError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("session_failed", message, { cause: options.cause });
    if (options.status !== undefined) {
      this.status = options.status;
    }
  }
}

export class FetchError extends CollectionError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("fetch_failed", message, { cause: options.cause });
    if (options.status !== undefined) {
      this.status = options.status;
    }
  }
}

export class ParseError extends CollectionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("parse_failed", message, options);
  }
}

/**
 * The schedule page loaded but produced no collection events. Callers treat
 * this as "schedule temporarily unavailable" rather than a setup problem.
 */
export class NoCollectionsError extends CollectionError {
  constructor(message = "no collections found in schedule") {
    super("no_collections", message);
  }
}

export class InvalidTimeInputError extends CollectionError {
  readonly input: string;

  constructor(input: string) {
    super("invalid_now", `Invalid "now" value: ${input}`);
    this.input = input;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
