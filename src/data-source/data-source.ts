import type { CollectionHandle, DriverContract } from "../contracts";

/**
 * Configuration options used when registering a data source.
 */
export type DataSourceOptions = {
  /** Unique name identifying the data source. */
  name: string;
  /** Driver bound to the data source. */
  driver: DriverContract;
  /** Whether this data source should be considered the default one. */
  isDefault?: boolean;
};

/**
 * Wrapper that couples a driver with its registry metadata.
 *
 * Models name the data source they live in (or fall back to the default one);
 * the data source hands out the collection handles their querysets run on.
 *
 * @example
 * ```typescript
 * const driver = new MongoDbDriver({ database: "blog" });
 *
 * const dataSource = new DataSource({
 *   name: "primary",
 *   driver,
 *   isDefault: true,
 * });
 *
 * const posts = dataSource.collection("post");
 * ```
 */
export class DataSource {
  /** Unique name identifying this data source. */
  public readonly name: string;

  /** Driver owning the connection. */
  public readonly driver: DriverContract;

  /** Whether this is the default data source. */
  public readonly isDefault: boolean;

  public constructor(options: DataSourceOptions) {
    this.name = options.name;
    this.driver = options.driver;
    this.isDefault = Boolean(options.isDefault);
  }

  /**
   * Get a handle to the named collection of this data source.
   */
  public collection(name: string): CollectionHandle {
    return this.driver.collection(name);
  }
}
