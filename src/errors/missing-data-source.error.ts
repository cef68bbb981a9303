/**
 * A model names a data source that is not registered, or no default data
 * source is registered yet.
 */
export class MissingDataSourceError extends Error {
  /**
   * Name of the missing data source, undefined for the default one.
   */
  public readonly dataSourceName?: string;

  public constructor(message: string, dataSourceName?: string) {
    super(message);
    this.name = "MissingDataSourceError";
    this.dataSourceName = dataSourceName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MissingDataSourceError);
    }
  }
}
