import type {
  AggregateOptions,
  CollationOptions,
  CountDocumentsOptions,
  Document,
  FindOptions,
  IndexDescription,
} from "mongodb";

/**
 * Lazily consumed stream of raw documents.
 *
 * Closing releases the server-side cursor; it is safe to close an exhausted
 * cursor.
 */
export interface DocumentCursor extends AsyncIterable<Document> {
  close(): Promise<void>;
}

/** Result returned after multi-document updates. */
export type UpdateManyResult = {
  matchedCount: number;
  modifiedCount: number;
  upsertedCount: number;
};

/** Options shared by write operations that honor collation. */
export type WriteOptions = {
  upsert?: boolean;
  collation?: CollationOptions;
};

/**
 * A connected collection of one database.
 *
 * This is the only storage capability the query engine consumes: the
 * queryset, the dereferencer and the model writer are all written against it,
 * so the same classes run on the real driver and on in-process stand-ins.
 */
export interface CollectionHandle {
  /** Name of the underlying collection. */
  readonly collectionName: string;

  /**
   * Open a cursor over the documents matching the filter.
   */
  find(filter: Document, options?: FindOptions): DocumentCursor;

  /**
   * Fetch the first matching document, or `null`.
   */
  findOne(filter: Document, options?: FindOptions): Promise<Document | null>;

  /**
   * Count matching documents, honoring `skip` and `limit` when given.
   */
  countDocuments(filter: Document, options?: CountDocumentsOptions): Promise<number>;

  /**
   * Insert one document and resolve with its `_id`.
   */
  insertOne(document: Document): Promise<unknown>;

  /**
   * Insert documents in order and resolve with their `_id`s in the same order.
   */
  insertMany(documents: Document[]): Promise<unknown[]>;

  /**
   * Replace the first matching document and resolve with the number of
   * modified or upserted documents.
   */
  replaceOne(filter: Document, document: Document, options?: WriteOptions): Promise<number>;

  /**
   * Apply an update document to every matching document.
   */
  updateMany(filter: Document, update: Document, options?: WriteOptions): Promise<UpdateManyResult>;

  /**
   * Delete every matching document and resolve with the deleted count.
   */
  deleteMany(filter: Document, options?: { collation?: CollationOptions }): Promise<number>;

  /**
   * Run an aggregation pipeline.
   */
  aggregate(pipeline: Document[], options?: AggregateOptions): DocumentCursor;

  /**
   * Create the given indexes and resolve with their names.
   */
  createIndexes(indexes: IndexDescription[]): Promise<string[]>;
}
