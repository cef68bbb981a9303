/**
 * Error thrown by `get()` when the match selects more than one document.
 */
export class MultipleObjectsReturnedError extends Error {
  public readonly modelName: string;

  public constructor(modelName: string) {
    super(`The query returned more than one ${modelName}.`);
    this.name = "MultipleObjectsReturnedError";
    this.modelName = modelName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MultipleObjectsReturnedError);
    }
  }
}
