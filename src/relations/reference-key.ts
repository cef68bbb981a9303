import { ObjectId } from "mongodb";

/**
 * Stable map key for a primary key value, so equal ids of any BSON type
 * collapse together.
 */
export function referenceKey(value: unknown): string {
  if (value instanceof ObjectId) return `oid:${value.toHexString()}`;
  if (value instanceof Date) return `date:${value.getTime()}`;
  if (typeof value === "object" && value !== null) return `json:${JSON.stringify(value)}`;

  return `${typeof value}:${String(value)}`;
}
