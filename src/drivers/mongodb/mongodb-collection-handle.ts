import type {
  AggregateOptions,
  CollationOptions,
  Collection,
  CountDocumentsOptions,
  Document,
  FindOptions,
  IndexDescription,
} from "mongodb";
import type {
  CollectionHandle,
  DocumentCursor,
  UpdateManyResult,
  WriteOptions,
} from "../../contracts";

/**
 * `CollectionHandle` backed by a native driver collection.
 *
 * Driver errors are not caught: a duplicate key or a network failure reaches
 * the caller as the driver's own `MongoError`.
 */
export class MongoCollectionHandle implements CollectionHandle {
  public constructor(private readonly collection: Collection<Document>) {}

  public get collectionName(): string {
    return this.collection.collectionName;
  }

  public find(filter: Document, options?: FindOptions): DocumentCursor {
    return this.collection.find(filter, options);
  }

  public async findOne(filter: Document, options?: FindOptions): Promise<Document | null> {
    return this.collection.findOne(filter, options);
  }

  public async countDocuments(filter: Document, options?: CountDocumentsOptions): Promise<number> {
    return this.collection.countDocuments(filter, options);
  }

  public async insertOne(document: Document): Promise<unknown> {
    const result = await this.collection.insertOne(document);

    return result.insertedId;
  }

  public async insertMany(documents: Document[]): Promise<unknown[]> {
    const result = await this.collection.insertMany(documents, { ordered: true });

    return documents.map((_document, index) => result.insertedIds[index]);
  }

  public async replaceOne(
    filter: Document,
    document: Document,
    options: WriteOptions = {},
  ): Promise<number> {
    const result = await this.collection.replaceOne(filter, document, options);

    return result.modifiedCount + result.upsertedCount;
  }

  public async updateMany(
    filter: Document,
    update: Document,
    options: WriteOptions = {},
  ): Promise<UpdateManyResult> {
    const result = await this.collection.updateMany(filter, update, options);

    return {
      matchedCount: result.matchedCount,
      modifiedCount: result.modifiedCount,
      upsertedCount: result.upsertedCount,
    };
  }

  public async deleteMany(
    filter: Document,
    options: { collation?: CollationOptions } = {},
  ): Promise<number> {
    const result = await this.collection.deleteMany(filter, options);

    return result.deletedCount;
  }

  public aggregate(pipeline: Document[], options?: AggregateOptions): DocumentCursor {
    return this.collection.aggregate(pipeline, options);
  }

  public async createIndexes(indexes: IndexDescription[]): Promise<string[]> {
    return this.collection.createIndexes(indexes);
  }
}
