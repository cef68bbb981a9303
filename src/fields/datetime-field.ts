import dayjs from "dayjs";
import { Field } from "./field";

/**
 * Stores a BSON date.
 *
 * Accepts `Date` instances and anything dayjs can parse (ISO strings,
 * timestamps). Stored dates carry millisecond precision.
 */
export class DateTimeField extends Field<Date> {
  public readonly kind = "scalar";
  public readonly typeName = "date";

  public coerce(value: unknown): Date | undefined {
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? undefined : value;
    }

    if (typeof value !== "string" && typeof value !== "number") return undefined;

    const date = dayjs(value);

    return date.isValid() ? date.toDate() : undefined;
  }

  protected sameValue(left: Date, right: Date): boolean {
    return left.getTime() === right.getTime();
  }
}
