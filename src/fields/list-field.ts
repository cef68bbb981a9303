import { ValidationError } from "../errors/validation.error";
import { Field, type FieldOptions } from "./field";

export type ListFieldOptions<TValue> = FieldOptions<TValue[]> & {
  minItems?: number;
  maxItems?: number;
};

/**
 * Ordered list of values of the inner field.
 *
 * The codec checks and converts each element through `inner`, reporting
 * failures under `list.<index>`.
 */
export class ListField<TValue = unknown> extends Field<TValue[]> {
  public readonly kind = "list";
  public readonly typeName = "list";

  public constructor(
    public readonly inner: Field<TValue>,
    public readonly listOptions: ListFieldOptions<TValue> = {},
  ) {
    super(listOptions);
  }

  public coerce(value: unknown): TValue[] | undefined {
    if (!Array.isArray(value)) return undefined;

    const list: TValue[] = value;

    return list;
  }

  protected checkConstraints(value: TValue[], path: string): void {
    const { minItems, maxItems } = this.listOptions;

    if (minItems !== undefined && value.length < minItems) {
      throw new ValidationError(path, "minItems", `${path} must hold at least ${minItems} items.`, value);
    }

    if (maxItems !== undefined && value.length > maxItems) {
      throw new ValidationError(path, "maxItems", `${path} must hold at most ${maxItems} items.`, value);
    }
  }
}
