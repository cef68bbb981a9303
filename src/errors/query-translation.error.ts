/**
 * Error thrown when a filter, update, sort or projection cannot be
 * translated against the model schema.
 *
 * This can occur when:
 * - A field path does not exist on the model
 * - An operator is unknown or receives an operand of the wrong shape
 * - A value cannot be coerced to the field type
 */
export class QueryTranslationError extends Error {
  /**
   * The field path or operator being translated when the failure happened.
   */
  public readonly path?: string;

  public constructor(message: string, path?: string) {
    super(message);
    this.name = "QueryTranslationError";
    this.path = path;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueryTranslationError);
    }
  }
}
