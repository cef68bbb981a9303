import type { CollectionHandle } from "./collection-handle.contract";

/** Supported driver lifecycle events. */
export type DriverEvent = "connected" | "disconnected";

/** Listener signature for driver lifecycle events. */
export type DriverEventListener = (...args: unknown[]) => void;

/**
 * Connection owner that hands out collection handles.
 */
export interface DriverContract {
  /**
   * The name of the driver, e.g. `mongodb`.
   */
  readonly name: string;

  /**
   * Whether the driver currently holds an open connection.
   */
  readonly isConnected: boolean;

  /**
   * Establish the connection.
   */
  connect(): Promise<void>;

  /**
   * Close the connection.
   */
  disconnect(): Promise<void>;

  /**
   * Subscribe to driver lifecycle events.
   */
  on(event: DriverEvent, listener: DriverEventListener): void;

  /**
   * Get a handle to the named collection.
   */
  collection(name: string): CollectionHandle;
}
