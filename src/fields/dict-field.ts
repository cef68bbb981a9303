import { toPlainRecord } from "../utils/plain-object";
import { Field } from "./field";

export type Dictionary = Record<string, unknown>;

/**
 * Free-form sub document. Paths below a dict field are not checked against
 * any schema.
 */
export class DictField extends Field<Dictionary> {
  public readonly kind = "scalar";
  public readonly typeName = "object";

  public coerce(value: unknown): Dictionary | undefined {
    return toPlainRecord(value);
  }

  public isBlank(value: unknown): boolean {
    return this.isEmptyObject(value);
  }
}
