import type { CollectionHandle } from "../contracts";
import { dataSourceRegistry } from "./data-source-registry";

/**
 * Anything that knows which collection (and data source) it is stored in.
 */
export type CollectionTarget = {
  readonly collectionName: string;
  readonly dataSource?: string;
};

/**
 * Resolve the collection handle a model definition reads from and writes to.
 *
 * @throws {MissingDataSourceError} when the named (or default) data source is
 * not registered
 */
export function resolveCollection(target: CollectionTarget): CollectionHandle {
  return dataSourceRegistry.get(target.dataSource).collection(target.collectionName);
}
