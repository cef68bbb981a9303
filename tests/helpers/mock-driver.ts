import { vi } from "vitest";
import type { CollectionHandle, DriverContract } from "../../src/contracts";

/**
 * Collection handle whose every operation is a Vitest mock.
 */
export function createMockCollection(collectionName = "mock"): CollectionHandle {
  const emptyCursor = () => ({
    async *[Symbol.asyncIterator]() {},
    close: vi.fn().mockResolvedValue(undefined),
  });

  return {
    collectionName,
    find: vi.fn(emptyCursor),
    findOne: vi.fn().mockResolvedValue(null),
    countDocuments: vi.fn().mockResolvedValue(0),
    insertOne: vi.fn().mockResolvedValue("id-1"),
    insertMany: vi.fn().mockResolvedValue([]),
    replaceOne: vi.fn().mockResolvedValue(1),
    updateMany: vi.fn().mockResolvedValue({ matchedCount: 0, modifiedCount: 0, upsertedCount: 0 }),
    deleteMany: vi.fn().mockResolvedValue(0),
    aggregate: vi.fn(emptyCursor),
    createIndexes: vi.fn().mockResolvedValue([]),
  };
}

/**
 * Mock driver for unit testing purposes.
 * Implements the DriverContract interface with Vitest mocks.
 */
export function createMockDriver(name = "mock"): DriverContract {
  return {
    name,
    isConnected: true,
    connect: vi.fn().mockResolvedValue(undefined),
    disconnect: vi.fn().mockResolvedValue(undefined),
    on: vi.fn(),
    collection: vi.fn((collectionName: string) => createMockCollection(collectionName)),
  };
}
