import { isPlainObject } from "@mongez/supportive-is";

/**
 * The value as a string keyed record when it is a plain object.
 */
export function toPlainRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== "object" || value === null || !isPlainObject(value)) return undefined;

  const prototype = Object.getPrototypeOf(value);

  // BSON values (ObjectId, Decimal128...) are class instances
  if (prototype !== Object.prototype && prototype !== null) return undefined;

  const record: Record<string, unknown> = { ...value };

  return record;
}

/**
 * Whether every key of the record is an operator (`$...`).
 */
export function hasOnlyOperators(record: Record<string, unknown>): boolean {
  const keys = Object.keys(record);

  return keys.length > 0 && keys.every(key => key.startsWith("$"));
}

/**
 * Whether at least one key of the record is an operator (`$...`).
 */
export function hasOperators(record: Record<string, unknown>): boolean {
  return Object.keys(record).some(key => key.startsWith("$"));
}

/**
 * Freeze a document together with the plain objects and arrays nested in it.
 * BSON values are left as they are.
 */
export function freezeDocument<TValue>(value: TValue): TValue {
  if (Array.isArray(value)) {
    for (const element of value) freezeDocument(element);

    Object.freeze(value);

    return value;
  }

  if (typeof value !== "object" || value === null || !toPlainRecord(value)) return value;

  for (const element of Object.values(value)) freezeDocument(element);

  Object.freeze(value);

  return value;
}
