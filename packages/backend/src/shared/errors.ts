import type { BackendErrorCode } from "@workshop-access/shared";

/**
 * Failure reported to the terminal as a `terminal-error` envelope with `code`.
 */
export class BackendError extends Error {
  constructor(
    public readonly code: BackendErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "BackendError";
  }
}
