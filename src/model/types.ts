import type { Document, IndexDirection } from "mongodb";
import type { Field } from "../fields/field";
import type { UnknownFieldsPolicy } from "../types";
import type { Model } from "./model";
import type { ModelDefinition } from "./model-definition";

/**
 * Ordered map of field name to field schema, as declared by the model.
 */
export type FieldMap = Record<string, Field>;

/**
 * The value type a field holds on a model instance.
 */
export type FieldValue<TField> = TField extends Field<infer TValue> ? TValue : never;

/**
 * Instance data shape inferred from a field map.
 */
export type InferSchema<TFields extends FieldMap> = {
  [TKey in keyof TFields]?: FieldValue<TFields[TKey]>;
};

/**
 * Anything carrying a model definition: the classes returned by
 * `defineModel()` and `defineEmbeddedModel()`.
 */
export type ModelClassLike<TModel extends Model = Model> = {
  readonly definition: ModelDefinition<TModel>;
};

/**
 * A model given either by class or by its registered name.
 */
export type ModelReference<TModel extends Model = Model> = ModelClassLike<TModel> | string;

/**
 * Index declared on a model. Keys are field paths, translated to stored
 * names when the index is created.
 */
export type IndexDeclaration = {
  key: Record<string, IndexDirection>;
  name?: string;
  unique?: boolean;
  sparse?: boolean;
  expireAfterSeconds?: number;
  partialFilterExpression?: Document;
};

export type ModelDefinitionOptions = {
  /**
   * Registry name of the model
   */
  name: string;
  /**
   * Collection name
   * @default snake_case of the model name
   */
  collection?: string;
  /**
   * Field schemas in declaration order
   */
  fields: FieldMap;
  /**
   * Indexes created by `createIndexes()`
   */
  indexes?: IndexDeclaration[];
  /**
   * Embedded models live inside other documents and have no collection
   */
  embedded?: boolean;
  /**
   * Name of the data source holding the collection
   * @default the default data source
   */
  dataSource?: string;
  /**
   * Unknown fields policy, falls back to the global configuration
   */
  unknownFields?: UnknownFieldsPolicy;
  /**
   * Save referenced instances before saving this one
   * @default false
   */
  cascade?: boolean;
};
