import { MongoError } from "mongodb";

/**
 * Storage failures are the driver's own errors, passed through untouched.
 */
export type StorageError = MongoError;

/**
 * Narrow an unknown rejection to a driver failure (duplicate key, network, ...).
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof MongoError;
}
