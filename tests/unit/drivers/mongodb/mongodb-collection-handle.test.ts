import { MongoClient, ObjectId, type Collection, type Document } from "mongodb";
import { afterAll, describe, expect, it, vi } from "vitest";
import { MongoCollectionHandle } from "../../../../src/drivers/mongodb/mongodb-collection-handle";
import { MongoDbDriver } from "../../../../src/drivers/mongodb/mongodb-driver";
import { OperationError } from "../../../../src/errors/operation.error";

// the client is never connected: every collection call below is stubbed
const client = new MongoClient("mongodb://localhost:27017");

function createCollection(): Collection<Document> {
  return client.db("test").collection("posts");
}

describe("MongoCollectionHandle", () => {
  afterAll(async () => {
    await client.close();
  });

  it("should expose the collection name", () => {
    expect(new MongoCollectionHandle(createCollection()).collectionName).toBe("posts");
  });

  it("should resolve inserts with the inserted ids", async () => {
    const collection = createCollection();
    const first = new ObjectId();
    const second = new ObjectId();

    vi.spyOn(collection, "insertOne").mockResolvedValue({ acknowledged: true, insertedId: first });
    const insertMany = vi
      .spyOn(collection, "insertMany")
      .mockResolvedValue({ acknowledged: true, insertedCount: 2, insertedIds: { 0: first, 1: second } });

    const handle = new MongoCollectionHandle(collection);

    expect(await handle.insertOne({ title: "A" })).toBe(first);
    expect(await handle.insertMany([{ title: "A" }, { title: "B" }])).toEqual([first, second]);
    expect(insertMany).toHaveBeenCalledWith([{ title: "A" }, { title: "B" }], { ordered: true });
  });

  it("should count modified and upserted documents on replace", async () => {
    const collection = createCollection();

    vi.spyOn(collection, "replaceOne").mockResolvedValue({
      acknowledged: true,
      matchedCount: 0,
      modifiedCount: 0,
      upsertedCount: 1,
      upsertedId: new ObjectId(),
    });

    expect(await new MongoCollectionHandle(collection).replaceOne({ _id: 1 }, { title: "A" }, { upsert: true })).toBe(1);
  });

  it("should report update and delete counts", async () => {
    const collection = createCollection();

    vi.spyOn(collection, "updateMany").mockResolvedValue({
      acknowledged: true,
      matchedCount: 3,
      modifiedCount: 2,
      upsertedCount: 0,
      upsertedId: null,
    });
    const deleteMany = vi.spyOn(collection, "deleteMany").mockResolvedValue({ acknowledged: true, deletedCount: 4 });

    const handle = new MongoCollectionHandle(collection);

    expect(await handle.updateMany({}, { $set: { published: true } })).toEqual({
      matchedCount: 3,
      modifiedCount: 2,
      upsertedCount: 0,
    });
    expect(await handle.deleteMany({ published: false }, { collation: { locale: "en" } })).toBe(4);
    expect(deleteMany).toHaveBeenCalledWith({ published: false }, { collation: { locale: "en" } });
  });

  it("should pass index descriptions through", async () => {
    const collection = createCollection();
    const createIndexes = vi.spyOn(collection, "createIndexes").mockResolvedValue(["title_1"]);

    expect(await new MongoCollectionHandle(collection).createIndexes([{ key: { title: 1 } }])).toEqual(["title_1"]);
    expect(createIndexes).toHaveBeenCalledWith([{ key: { title: 1 } }]);
  });
});

describe("MongoDbDriver", () => {
  it("should start disconnected", () => {
    const driver = new MongoDbDriver({ database: "test" });

    expect(driver.name).toBe("mongodb");
    expect(driver.isConnected).toBe(false);
  });

  it("should refuse collections before connecting", () => {
    const driver = new MongoDbDriver({ database: "test" });

    expect(() => driver.collection("posts")).toThrow(OperationError);
  });

  it("should do nothing when disconnecting without a client", async () => {
    const driver = new MongoDbDriver({ database: "test" });
    const listener = vi.fn();

    driver.on("disconnected", listener);
    await driver.disconnect();

    expect(listener).not.toHaveBeenCalled();
  });
});
