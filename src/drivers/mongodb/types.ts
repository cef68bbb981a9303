import type { MongoClientOptions } from "mongodb";

/**
 * Connection settings of the MongoDB driver.
 *
 * `uri` wins over `host` / `port` when given.
 */
export type MongoDriverConfig = {
  database: string;
  uri?: string;
  /**
   * @default "localhost"
   */
  host?: string;
  /**
   * @default 27017
   */
  port?: number;
  username?: string;
  password?: string;
  authSource?: string;
  /**
   * Passed through to the MongoClient, wins over the fields above
   */
  clientOptions?: MongoClientOptions;
};
