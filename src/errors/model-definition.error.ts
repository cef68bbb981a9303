/**
 * Error thrown when a model schema is malformed or the model registry is
 * used incorrectly.
 */
export class ModelDefinitionError extends Error {
  /**
   * Name of the model being defined or looked up, when known.
   */
  public readonly modelName?: string;

  public constructor(message: string, modelName?: string) {
    super(message);
    this.name = "ModelDefinitionError";
    this.modelName = modelName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ModelDefinitionError);
    }
  }
}
