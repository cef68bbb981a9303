/**
 * Error thrown when an operation is refused, e.g. a delete blocked by a
 * `deny` delete rule or a refresh of an unsaved instance.
 */
export class OperationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "OperationError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OperationError);
    }
  }
}
