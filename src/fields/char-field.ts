import { ValidationError } from "../errors/validation.error";
import { Field, type FieldOptions } from "./field";

export type CharFieldOptions = FieldOptions<string> & {
  minLength?: number;
  maxLength?: number;
};

export class CharField extends Field<string> {
  public readonly kind = "scalar";
  public readonly typeName: string = "string";

  public constructor(public readonly charOptions: CharFieldOptions = {}) {
    super(charOptions);
  }

  public coerce(value: unknown): string | undefined {
    return typeof value === "string" ? value : undefined;
  }

  protected checkConstraints(value: string, path: string): void {
    const { minLength, maxLength } = this.charOptions;

    if (minLength !== undefined && value.length < minLength) {
      throw new ValidationError(
        path,
        "minLength",
        `${path} must be at least ${minLength} characters.`,
        value,
      );
    }

    if (maxLength !== undefined && value.length > maxLength) {
      throw new ValidationError(
        path,
        "maxLength",
        `${path} must be at most ${maxLength} characters.`,
        value,
      );
    }
  }
}
