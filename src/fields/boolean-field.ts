import { Field } from "./field";

export class BooleanField extends Field<boolean> {
  public readonly kind = "scalar";
  public readonly typeName = "boolean";

  public coerce(value: unknown): boolean | undefined {
    return typeof value === "boolean" ? value : undefined;
  }
}
