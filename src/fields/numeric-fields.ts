import { ValidationError } from "../errors/validation.error";
import { Field, type FieldOptions } from "./field";

export type NumericFieldOptions = FieldOptions<number> & {
  min?: number;
  max?: number;
};

abstract class NumericField extends Field<number> {
  public readonly kind = "scalar";

  public constructor(public readonly numericOptions: NumericFieldOptions = {}) {
    super(numericOptions);
  }

  protected checkConstraints(value: number, path: string): void {
    const { min, max } = this.numericOptions;

    if (min !== undefined && value < min) {
      throw new ValidationError(path, "min", `${path} must be at least ${min}.`, value);
    }

    if (max !== undefined && value > max) {
      throw new ValidationError(path, "max", `${path} must be at most ${max}.`, value);
    }
  }
}

export class IntegerField extends NumericField {
  public readonly typeName = "integer";

  public coerce(value: unknown): number | undefined {
    if (typeof value === "number") {
      return Number.isInteger(value) ? value : undefined;
    }

    if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
      const parsed = Number.parseInt(value, 10);

      // digits past 2^53 would be silently rounded
      return Number.isSafeInteger(parsed) ? parsed : undefined;
    }

    return undefined;
  }
}

export class FloatField extends NumericField {
  public readonly typeName = "number";

  public coerce(value: unknown): number | undefined {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : undefined;
    }

    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : undefined;
    }

    return undefined;
  }
}
