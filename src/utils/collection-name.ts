/**
 * Default collection name of a model: `CommentWrapper` becomes `comment_wrapper`.
 */
export function toCollectionName(modelName: string): string {
  return modelName
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/[\s-]+/g, "_")
    .toLowerCase();
}
