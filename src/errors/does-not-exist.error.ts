/**
 * Error thrown when a query expected a document but matched none.
 *
 * Raised by `first()`, `get()` and `at()`.
 */
export class DoesNotExistError extends Error {
  /**
   * Name of the queried model.
   */
  public readonly modelName: string;

  public constructor(modelName: string, message = `${modelName} matching query does not exist.`) {
    super(message);
    this.name = "DoesNotExistError";
    this.modelName = modelName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DoesNotExistError);
    }
  }
}
