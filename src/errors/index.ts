export * from "./broken-reference.error";
export * from "./does-not-exist.error";
export * from "./missing-data-source.error";
export * from "./model-definition.error";
export * from "./multiple-objects-returned.error";
export * from "./operation.error";
export * from "./query-translation.error";
export * from "./storage.error";
export * from "./validation.error";
