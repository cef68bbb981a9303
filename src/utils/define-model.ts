import { ListField } from "../fields/list-field";
import { ReferenceField } from "../fields/reference-field";
import { registerDeleteRule } from "../model/delete-rules";
import { Model } from "../model/model";
import { ModelDefinition } from "../model/model-definition";
import { registerModel } from "../model/register-model";
import type { FieldMap, IndexDeclaration, InferSchema } from "../model/types";
import { QueryBuilder } from "../query/query-builder";
import { querySetFor, type QuerySet } from "../query/query-set";
import type { UnknownFieldsPolicy } from "../types";

/**
 * Configuration options for defining a model.
 */
export type DefineModelOptions<TFields extends FieldMap> = {
  /**
   * Model name, registered in the models registry
   */
  name: string;
  /**
   * The database collection name
   * @default snake_case of the model name
   */
  collection?: string;
  /**
   * Field schemas in declaration order. When no field is flagged
   * `primaryKey`, an ObjectId primary key named `_id` is added.
   */
  fields: TFields;
  /**
   * Indexes created by `Model.objects.createIndexes()`
   */
  indexes?: IndexDeclaration[];
  /**
   * Name of the data source holding the collection
   */
  dataSource?: string;
  /**
   * What to do with stored fields the schema does not declare
   * @default the global `unknownFields` configuration, then "drop"
   */
  unknownFields?: UnknownFieldsPolicy;
  /**
   * Save referenced instances whenever an instance is saved
   */
  cascade?: boolean;
};

export type DefineEmbeddedModelOptions<TFields extends FieldMap> = Pick<
  DefineModelOptions<TFields>,
  "name" | "fields" | "unknownFields"
>;

function registerFieldDeleteRules(definition: ModelDefinition): void {
  for (const [name, field] of definition.fields) {
    const reference = field instanceof ListField ? field.inner : field;

    if (!(reference instanceof ReferenceField) || reference.onDelete === undefined) continue;

    registerDeleteRule(reference.target, definition, name, reference.onDelete);
  }
}

/**
 * Define a top level model, stored in its own collection.
 *
 * The returned class is registered under `options.name`, so references may
 * name it before it is defined.
 *
 * @example
 * ```typescript
 * export const User = defineModel({
 *   name: "User",
 *   fields: {
 *     email: new EmailField({ primaryKey: true }),
 *     name: new CharField({ required: true, maxLength: 50 }),
 *   },
 * });
 *
 * export const Post = defineModel({
 *   name: "Post",
 *   fields: {
 *     title: new CharField({ required: true }),
 *     author: new ReferenceField(User, { onDelete: DeleteRule.Cascade }),
 *     tags: new ListField(new CharField()),
 *   },
 *   indexes: [{ key: { author: 1, title: 1 } }],
 * });
 *
 * const post = await Post.objects.get({ title: "Hello" });
 * ```
 */
export function defineModel<TFields extends FieldMap>(options: DefineModelOptions<TFields>) {
  type Schema = InferSchema<TFields>;

  class DefinedModel extends Model<Schema> {
    public static readonly definition: ModelDefinition<DefinedModel> = new ModelDefinition(
      {
        name: options.name,
        collection: options.collection,
        fields: options.fields,
        indexes: options.indexes,
        dataSource: options.dataSource,
        unknownFields: options.unknownFields,
        cascade: options.cascade,
      },
      () => new DefinedModel(),
    );

    public constructor(data: Partial<Schema> = {}) {
      super(DefinedModel.definition, data);
    }

    /**
     * Query set over every stored instance.
     */
    public static get objects(): QuerySet<DefinedModel> {
      return querySetFor(DefinedModel.definition);
    }

    /**
     * Storage free query builder, to inspect translated queries.
     */
    public static queryBuilder(): QueryBuilder<DefinedModel> {
      return new QueryBuilder(DefinedModel.definition);
    }
  }

  registerModel(DefinedModel.definition);
  registerFieldDeleteRules(DefinedModel.definition);

  return DefinedModel;
}

/**
 * Define a model living inside other documents, through
 * `EmbeddedDocumentField` and `EmbeddedDocumentListField`.
 *
 * Embedded models have no primary key and no collection.
 *
 * @example
 * ```typescript
 * const Comment = defineEmbeddedModel({
 *   name: "Comment",
 *   fields: {
 *     body: new CharField({ required: true }),
 *     postedAt: new DateTimeField({ defaultFactory: () => new Date() }),
 *   },
 * });
 * ```
 */
export function defineEmbeddedModel<TFields extends FieldMap>(
  options: DefineEmbeddedModelOptions<TFields>,
) {
  type Schema = InferSchema<TFields>;

  class DefinedEmbeddedModel extends Model<Schema> {
    public static readonly definition: ModelDefinition<DefinedEmbeddedModel> = new ModelDefinition(
      {
        name: options.name,
        fields: options.fields,
        unknownFields: options.unknownFields,
        embedded: true,
      },
      () => new DefinedEmbeddedModel(),
    );

    public constructor(data: Partial<Schema> = {}) {
      super(DefinedEmbeddedModel.definition, data);
    }
  }

  registerModel(DefinedEmbeddedModel.definition);

  return DefinedEmbeddedModel;
}

/**
 * Instance data type of a defined model class.
 *
 * @example
 * ```typescript
 * type UserData = ModelData<typeof User>;
 * ```
 */
export type ModelData<TClass extends abstract new (...args: never[]) => Model> =
  InstanceType<TClass> extends Model<infer TSchema> ? TSchema : never;
