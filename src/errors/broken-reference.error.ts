/**
 * Error thrown by strict dereferencing when a referenced document is gone.
 */
export class BrokenReferenceError extends Error {
  /**
   * Name of the referenced model.
   */
  public readonly modelName: string;

  /**
   * Primary key value that could not be resolved.
   */
  public readonly id: unknown;

  public constructor(modelName: string, id: unknown) {
    super(`Referenced ${modelName} with id "${String(id)}" does not exist.`);
    this.name = "BrokenReferenceError";
    this.modelName = modelName;
    this.id = id;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BrokenReferenceError);
    }
  }
}
