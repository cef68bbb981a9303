import { EventEmitter } from "node:events";
import { MissingDataSourceError } from "../errors/missing-data-source.error";
import { DataSource, type DataSourceOptions } from "./data-source";

/**
 * - `registered`: a data source was registered
 * - `connected` / `disconnected`: forwarded from the data source driver
 */
export type DataSourceRegistryEvent = "registered" | "connected" | "disconnected";

export type DataSourceRegistryListener = (dataSource: DataSource) => void;

/**
 * Named data sources, with one default used by models that name none.
 */
class DataSourceRegistry {
  private readonly sources = new Map<string, DataSource>();
  private defaultSource?: DataSource;
  private readonly events = new EventEmitter();

  /**
   * Register a data source. The first one registered, or one flagged
   * `isDefault`, becomes the default.
   *
   * @example
   * ```typescript
   * dataSourceRegistry.register({ name: "main", driver, isDefault: true });
   * ```
   */
  public register(options: DataSourceOptions): DataSource {
    const source = new DataSource(options);
    this.sources.set(source.name, source);

    if (source.isDefault || !this.defaultSource) {
      this.defaultSource = source;
    }

    this.events.emit("registered", source);

    source.driver.on("connected", () => {
      this.events.emit("connected", source);
    });

    source.driver.on("disconnected", () => {
      this.events.emit("disconnected", source);
    });

    return source;
  }

  /**
   * Forget every data source, including the default one
   */
  public clear() {
    this.defaultSource = undefined;
    this.sources.clear();
  }

  public on(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.on(event, listener);
  }

  public off(event: DataSourceRegistryEvent, listener: DataSourceRegistryListener): void {
    this.events.off(event, listener);
  }

  /**
   * Retrieve a data source by name, or the default one.
   *
   * @throws {MissingDataSourceError} when it is not registered
   */
  public get(name?: string): DataSource {
    if (name != null) {
      const source = this.sources.get(name);

      if (!source) {
        throw new MissingDataSourceError(`Data source "${name}" is not registered.`, name);
      }

      return source;
    }

    if (!this.defaultSource) {
      throw new MissingDataSourceError("No default data source registered.");
    }

    return this.defaultSource;
  }

  public getAllDataSources(): DataSource[] {
    return Array.from(this.sources.values());
  }
}

export const dataSourceRegistry = new DataSourceRegistry();
