import { ObjectId } from "mongodb";
import { Field } from "./field";

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

export class ObjectIdField extends Field<ObjectId> {
  public readonly kind = "scalar";
  public readonly typeName = "ObjectId";

  public coerce(value: unknown): ObjectId | undefined {
    if (value instanceof ObjectId) return value;

    if (typeof value === "string" && OBJECT_ID_PATTERN.test(value)) {
      return new ObjectId(value);
    }

    return undefined;
  }

  protected sameValue(left: ObjectId, right: ObjectId): boolean {
    return left.equals(right);
  }
}
