// Configuration
export * from "./config";
export * from "./types";

// Contracts
export * from "./contracts";

// Data Source
export * from "./data-source/data-source";
export * from "./data-source/data-source-registry";
export * from "./data-source/resolve-collection";

// Errors
export * from "./errors";

// Fields
export * from "./fields";

// Models
export * from "./model/delete-rules";
export * from "./model/model";
export * from "./model/model-definition";
export * from "./model/register-model";
export * from "./model/types";
export * from "./utils/define-model";

// Codec
export * from "./codec/document-codec";

// Queries
export * from "./query/filter-translator";
export * from "./query/query-builder";
export * from "./query/query-set";
export * from "./query/query-spec";
export * from "./query/update-translator";

// References
export * from "./relations/broken-reference";
export * from "./relations/dereferencer";

// Persistence
export * from "./writer/database-writer";

// MongoDB Driver
export * from "./drivers/mongodb/mongodb-collection-handle";
export * from "./drivers/mongodb/mongodb-driver";
export * from "./drivers/mongodb/types";

// Re-export MongoDB client types for convenience
export { ObjectId } from "mongodb";
export type { CollationOptions, Document, MongoClientOptions } from "mongodb";
