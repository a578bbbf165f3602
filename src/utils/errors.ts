export class ToolError extends Error {
  constructor(
    message: string,
    public readonly code: number = 1,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "ToolError";
  }
}

/**
 * Malformed address, slot, value or argument. Raised before any network or
 * file I/O takes place.
 */
export class InvalidInputError extends ToolError {
  constructor(message: string, details?: unknown) {
    super(message, 2, details);
    this.name = "InvalidInputError";
  }
}

export class RpcError extends ToolError {
  constructor(
    message: string,
    public readonly method: string,
    details?: unknown,
  ) {
    super(message, 3, details);
    this.name = "RpcError";
  }
}

/**
 * A single wallet could not be fetched. The extractor records these and moves
 * on to the next wallet.
 */
export class FetchFailureError extends ToolError {
  constructor(
    public readonly wallet: string,
    cause: unknown,
  ) {
    super(
      `Failed to fetch storage for ${wallet}: ${cause instanceof Error ? cause.message : String(cause)}`,
      3,
      cause,
    );
    this.name = "FetchFailureError";
  }
}

export class EmptyResultError extends ToolError {
  constructor(message = "No non-zero entries to write, state store not created") {
    super(message, 4);
    this.name = "EmptyResultError";
  }
}

// Raised on a programming defect, never on a data condition.
export class EncodingInvariantError extends ToolError {
  constructor(message: string, details?: unknown) {
    super(message, 70, details);
    this.name = "EncodingInvariantError";
  }
}

export type StateFormatErrorReason =
  | "header-too-short"
  | "invalid-magic"
  | "unsupported-version"
  | "unsupported-entry-size"
  | "entry-too-short"
  | "size-mismatch"
  | "index-too-short"
  | "index-not-sorted"
  | "index-mismatch"
  | "entries-not-sorted";

export class StateFormatError extends ToolError {
  constructor(
    public readonly reason: StateFormatErrorReason,
    message: string,
  ) {
    super(message, 5, { reason });
    this.name = "StateFormatError";
  }
}

export function exitCodeOf(error: unknown): number {
  return error instanceof ToolError ? error.code : 1;
}
