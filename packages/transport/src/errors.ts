/**
 * Transport Error Classes
 */

export type TransportErrorCode =
  | "ADDRESS_RESOLUTION"
  | "CONNECTION_FAILED"
  | "BIND_FAILED"
  | "READ_FAILED"
  | "WRITE_FAILED"
  | "OUTPUT_FAILED";

/**
 * Coarse failure category reported to the process boundary
 */
export type FailureCategory = "address" | "connection" | "io";

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code: TransportErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * Raised by HandoffQueue.send() once the queue is closed
 */
export class HandoffClosedError extends Error {
  constructor() {
    super("Handoff queue is closed");
    this.name = "HandoffClosedError";
  }
}

export function describeFailure(code: TransportErrorCode): FailureCategory {
  switch (code) {
    case "ADDRESS_RESOLUTION":
      return "address";
    case "CONNECTION_FAILED":
    case "BIND_FAILED":
      return "connection";
    case "READ_FAILED":
    case "WRITE_FAILED":
    case "OUTPUT_FAILED":
      return "io";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
