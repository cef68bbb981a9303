import { DocumentCodec } from "../codec/document-codec";
import type { CollectionHandle } from "../contracts";
import { resolveCollection as resolveDefaultCollection } from "../data-source/resolve-collection";
import { OperationError } from "../errors/operation.error";
import { EmbeddedDocumentField } from "../fields/embedded-document-field";
import { ListField } from "../fields/list-field";
import { ReferenceField } from "../fields/reference-field";
import { Model } from "../model/model";
import type { ModelDefinition } from "../model/model-definition";
import { logQuery } from "../utils/log-query";

export type SaveOptions = {
  /**
   * Save the referenced instances first
   * @default the model `cascade` option
   */
  cascade?: boolean;
  /**
   * Check every field before writing
   * @default true
   */
  fullClean?: boolean;
  /**
   * Insert even when the primary key is set
   * @default false
   */
  forceInsert?: boolean;
};

/**
 * Persists one model instance.
 *
 * The save pipeline:
 * 1. Refuse embedded instances
 * 2. With `cascade`, check the instance, then save every referenced instance
 * 3. Encode (and check) the document
 * 4. Insert when there is no primary key (or `forceInsert`), assigning the
 *    generated id, otherwise replace by `_id` with upsert
 *
 * @example
 * ```typescript
 * const post = new Post({ title: "Hello", author: new User({ email: "a@example.com" }) });
 * await new DatabaseWriter(post).save({ cascade: true });
 * ```
 */
export class DatabaseWriter {
  private readonly codec = new DocumentCodec();

  public constructor(
    private readonly model: Model,
    private readonly resolveCollection: (
      definition: ModelDefinition,
    ) => CollectionHandle = resolveDefaultCollection,
  ) {}

  public async save(options: SaveOptions = {}): Promise<Model> {
    return this.saveModel(this.model, options, new Set());
  }

  private async saveModel(model: Model, options: SaveOptions, visited: Set<Model>): Promise<Model> {
    const definition = model.definition;

    if (definition.embedded) {
      throw new OperationError(
        `Cannot save embedded ${definition.name} on its own; save the document holding it.`,
      );
    }

    visited.add(model);

    const validate = options.fullClean !== false;
    const cascade = options.cascade ?? definition.cascade;

    if (cascade) {
      // nothing is written when the instance itself is invalid
      this.codec.encode(model, { validate, allowUnsavedReferences: true });

      for (const referenced of this.referencedInstances(model)) {
        if (visited.has(referenced)) continue;

        await this.saveModel(referenced, { cascade: true, fullClean: options.fullClean }, visited);
      }
    }

    const document = this.codec.encode(model, { validate });
    const collection = this.resolveCollection(definition);
    const primaryKey = definition.primaryKey;

    if (model.pk === undefined || model.pk === null || options.forceInsert) {
      logQuery("insertOne", collection.collectionName);

      const id = await collection.insertOne(document);

      model.pk = primaryKey.field.fromMongo(id);

      return model;
    }

    logQuery("replaceOne", collection.collectionName, { _id: document._id });

    await collection.replaceOne({ _id: document._id }, document, { upsert: true });

    return model;
  }

  /**
   * Instances held by the reference fields of a model, including those nested
   * in embedded documents and lists.
   */
  private referencedInstances(model: Model): Model[] {
    const instances: Model[] = [];

    const visit = (field: unknown, value: unknown): void => {
      if (value === undefined || value === null) return;

      if (field instanceof ReferenceField) {
        if (value instanceof Model) instances.push(value);
        return;
      }

      if (field instanceof ListField && Array.isArray(value)) {
        for (const element of value) {
          visit(field.inner, element);
        }
        return;
      }

      if (field instanceof EmbeddedDocumentField && value instanceof Model) {
        for (const [name, inner] of value.definition.fields) {
          visit(inner, value.getValue(name));
        }
      }
    };

    for (const [name, field] of model.definition.fields) {
      visit(field, model.getValue(name));
    }

    return instances;
  }
}
