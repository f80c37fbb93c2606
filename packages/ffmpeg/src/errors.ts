export class CancelledError extends Error {
  constructor(message = "Processing cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}
