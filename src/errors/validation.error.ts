/**
 * Error thrown when a model value fails its field constraints.
 *
 * Raised by the document codec before any document reaches storage, so a
 * rejected write never produces a round trip.
 */
export class ValidationError extends Error {
  /**
   * Dotted path of the offending field, e.g. `comments.1.body`.
   */
  public readonly field: string;

  /**
   * Name of the failed constraint, e.g. `required`, `maxLength`, `type`.
   */
  public readonly constraint: string;

  /**
   * The value that was rejected.
   */
  public readonly value: unknown;

  public constructor(field: string, constraint: string, message: string, value?: unknown) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
    this.constraint = constraint;
    this.value = value;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}
