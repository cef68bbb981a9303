import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { MongoClient, type Db, type MongoClientOptions } from "mongodb";
import { EventEmitter } from "node:events";
import type { CollectionHandle, DriverContract, DriverEvent, DriverEventListener } from "../../contracts";
import { OperationError } from "../../errors/operation.error";
import { MongoCollectionHandle } from "./mongodb-collection-handle";
import type { MongoDriverConfig } from "./types";

/**
 * MongoDB driver: owns the `MongoClient`, reports its connection lifecycle and
 * hands out collection handles.
 *
 * @example
 * ```typescript
 * const driver = new MongoDbDriver({ database: "blog", uri: "mongodb://localhost:27017" });
 *
 * await driver.connect();
 *
 * dataSourceRegistry.register({ name: "main", driver, isDefault: true });
 * ```
 */
export class MongoDbDriver implements DriverContract {
  private readonly events = new EventEmitter();
  private readonly handles = new Map<string, CollectionHandle>();
  public client?: MongoClient;
  public database?: Db;
  private connected = false;

  /**
   * The name of this driver.
   */
  public readonly name = "mongodb";

  public constructor(private readonly config: MongoDriverConfig) {}

  /**
   * Indicates whether the driver currently maintains an active connection.
   */
  public get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Get the MongoDB database instance.
   *
   * @throws {OperationError} If not connected
   */
  public getDatabase(): Db {
    if (!this.database) {
      throw new OperationError(
        "Database not available. Ensure the driver is connected before accessing the database.",
      );
    }

    return this.database;
  }

  /**
   * Establish a MongoDB connection using the configured options.
   * Throws if the connection attempt fails.
   */
  public async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    const client = new MongoClient(this.resolveUri(), this.buildClientOptions());

    try {
      log.info(
        "database.mongodb",
        "connection",
        `Connecting to database ${colors.bold(colors.yellowBright(this.config.database))}`,
      );
      await client.connect();
      this.client = client;
      this.database = client.db(this.config.database);

      this.connected = true;
      log.success("database.mongodb", "connection", "Connected to database");

      client.on("close", () => {
        if (this.connected) {
          this.connected = false;
          this.emit("disconnected");
          log.warn("database.mongodb", "connection", "Disconnected from database");
        }
      });

      this.emit("connected");
    } catch (error) {
      await client.close().catch(closeError => {
        log.warn("database.mongodb", "connection", `Failed to close client: ${String(closeError)}`);
      });
      this.emit("disconnected");
      log.error(
        "database.mongodb",
        "connection",
        `Failed to connect to database: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }

  /**
   * Close the underlying MongoDB connection.
   */
  public async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      await this.client.close();
    } finally {
      this.connected = false;
      this.handles.clear();
      this.emit("disconnected");
    }
  }

  /**
   * Subscribe to driver lifecycle events.
   */
  public on(event: DriverEvent, listener: DriverEventListener): void {
    this.events.on(event, listener);
  }

  /**
   * Get a handle to the named collection of the connected database.
   */
  public collection(name: string): CollectionHandle {
    let handle = this.handles.get(name);

    if (!handle) {
      handle = new MongoCollectionHandle(this.getDatabase().collection(name));
      this.handles.set(name, handle);
    }

    return handle;
  }

  /**
   * Resolve the connection URI from the configuration.
   */
  private resolveUri(): string {
    if (this.config.uri) {
      return this.config.uri;
    }

    const host = this.config.host ?? "localhost";
    const port = this.config.port ?? 27017;

    return `mongodb://${host}:${port}`;
  }

  /**
   * Build the Mongo client options derived from the driver configuration.
   */
  private buildClientOptions(): MongoClientOptions {
    const baseOptions: MongoClientOptions = {
      ...(this.config.clientOptions ?? {}),
    };

    if (this.config.username && !baseOptions.auth) {
      baseOptions.auth = {
        username: this.config.username,
        password: this.config.password,
      };
    }

    if (this.config.authSource && !baseOptions.authSource) {
      baseOptions.authSource = this.config.authSource;
    }

    return baseOptions;
  }

  /**
   * Emit a driver lifecycle event.
   */
  private emit(event: DriverEvent, ...args: unknown[]): void {
    this.events.emit(event, ...args);
  }
}
