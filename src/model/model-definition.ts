import type { IndexDescription, IndexDirection } from "mongodb";
import { getUnknownFieldsPolicy } from "../config";
import { ModelDefinitionError } from "../errors/model-definition.error";
import { QueryTranslationError } from "../errors/query-translation.error";
import { DictField } from "../fields/dict-field";
import { EmbeddedDocumentField } from "../fields/embedded-document-field";
import type { Field } from "../fields/field";
import { ListField } from "../fields/list-field";
import { ObjectIdField } from "../fields/object-id-field";
import type { UnknownFieldsPolicy } from "../types";
import { toCollectionName } from "../utils/collection-name";
import type { Model } from "./model";
import type { IndexDeclaration, ModelDefinitionOptions } from "./types";

/**
 * A field as seen from a model definition.
 */
export type FieldEntry = {
  name: string;
  wireName: string;
  field: Field;
};

/**
 * Result of resolving a dotted field path against a schema.
 *
 * `field` is undefined when the path leaves the schema (dict sub paths and
 * unknown fields of models preserving them).
 */
export type ResolvedPath = {
  wirePath: string;
  field?: Field;
};

const POSITIONAL_SEGMENT = /^(\d+|\$|\$\[\]|\$\[[A-Za-z0-9_]*\])$/;

function defaultIndexName(key: Record<string, IndexDirection>): string {
  return Object.entries(key)
    .map(([path, direction]) => `${path}_${String(direction)}`)
    .join("_");
}

/**
 * Immutable description of a model: its fields, primary key and storage
 * settings.
 *
 * Definitions are created by `defineModel()` / `defineEmbeddedModel()`, which
 * pass the factory building blank instances of the defined class.
 */
export class ModelDefinition<TModel extends Model = Model> {
  public readonly name: string;
  public readonly collectionName: string;
  public readonly fields: ReadonlyMap<string, Field>;
  public readonly indexes: readonly IndexDeclaration[];
  public readonly embedded: boolean;
  public readonly dataSource?: string;
  public readonly cascade: boolean;

  /**
   * Name of the primary key field, undefined for embedded models.
   */
  public readonly primaryKeyName?: string;

  private readonly ownUnknownFields?: UnknownFieldsPolicy;

  public constructor(
    options: ModelDefinitionOptions,
    private readonly instantiate: () => TModel,
  ) {
    this.name = options.name;
    this.embedded = options.embedded === true;
    this.collectionName = options.collection || toCollectionName(options.name);
    this.indexes = Object.freeze([...(options.indexes || [])]);
    this.dataSource = options.dataSource;
    this.cascade = options.cascade === true;
    this.ownUnknownFields = options.unknownFields;

    const declared = Object.entries(options.fields);
    const primaryKeys = declared.filter(([, field]) => field.isPrimaryKey);

    if (this.embedded && primaryKeys.length > 0) {
      throw new ModelDefinitionError(
        `Embedded model ${this.name} cannot declare a primary key.`,
        this.name,
      );
    }

    if (primaryKeys.length > 1) {
      throw new ModelDefinitionError(
        `Model ${this.name} declares more than one primary key: ${primaryKeys
          .map(([name]) => name)
          .join(", ")}.`,
        this.name,
      );
    }

    const fields = new Map<string, Field>();

    if (!this.embedded && primaryKeys.length === 0) {
      fields.set("_id", new ObjectIdField({ primaryKey: true }));
    }

    for (const [name, field] of declared) {
      fields.set(name, field);
    }

    const wireNames = new Set<string>();

    for (const [name, field] of fields) {
      const wireName = field.wireName(name);

      if (wireNames.has(wireName)) {
        throw new ModelDefinitionError(
          `Model ${this.name} stores two fields under "${wireName}".`,
          this.name,
        );
      }

      wireNames.add(wireName);
    }

    this.fields = fields;
    this.primaryKeyName = this.embedded
      ? undefined
      : primaryKeys.length === 1
        ? primaryKeys[0][0]
        : "_id";

    Object.freeze(this);
  }

  /**
   * Build a new instance: defaults applied, then the given values.
   *
   * @throws {ValidationError} when a key is not a field
   */
  public create(data: Record<string, unknown> = {}): TModel {
    return this.instantiate().assign(data);
  }

  /**
   * Build an instance from already decoded field values, defaults left out.
   */
  public hydrate(data: Record<string, unknown>): TModel {
    return this.instantiate().replaceData(data);
  }

  /**
   * Effective unknown fields policy of the model.
   */
  public get unknownFields(): UnknownFieldsPolicy {
    return this.ownUnknownFields || getUnknownFieldsPolicy();
  }

  /**
   * The primary key field.
   *
   * @throws {ModelDefinitionError} for embedded models
   */
  public get primaryKey(): FieldEntry {
    const name = this.primaryKeyName;
    const field = name === undefined ? undefined : this.fields.get(name);

    if (name === undefined || !field) {
      throw new ModelDefinitionError(`Embedded model ${this.name} has no primary key.`, this.name);
    }

    return { name, wireName: "_id", field };
  }

  /**
   * Look a field up by name or by stored name.
   */
  public field(name: string): FieldEntry | undefined {
    const field = this.fields.get(name);

    if (field) {
      return { name, wireName: field.wireName(name), field };
    }

    for (const [fieldName, candidate] of this.fields) {
      if (candidate.wireName(fieldName) === name) {
        return { name: fieldName, wireName: name, field: candidate };
      }
    }

    return undefined;
  }

  /**
   * Resolve a dotted field path into its stored path.
   *
   * `pk` and `_id` address the primary key. Paths may go through embedded
   * documents and lists of embedded documents; numeric and positional
   * segments (`$`, `$[]`, `$[name]`) are allowed after list fields.
   *
   * @throws {QueryTranslationError} for unknown fields or paths going below a
   * field that holds no document
   */
  public resolvePath(path: string): ResolvedPath {
    if (!this.embedded && (path === "pk" || path === "_id")) {
      return { wirePath: "_id", field: this.primaryKey.field };
    }

    const segments = path.split(".");
    const wireSegments: string[] = [];
    let container: ModelDefinition = this;
    let current: Field | undefined;

    for (let index = 0; index < segments.length; index++) {
      const segment = segments[index];

      if (current instanceof ListField) {
        if (POSITIONAL_SEGMENT.test(segment)) {
          wireSegments.push(segment);
          current = current.inner;
          continue;
        }

        current = current.inner;
      }

      if (current instanceof EmbeddedDocumentField) {
        container = current.definition;
      } else if (current instanceof DictField) {
        wireSegments.push(...segments.slice(index));
        return { wirePath: wireSegments.join("."), field: undefined };
      } else if (current !== undefined) {
        throw new QueryTranslationError(
          `Cannot resolve "${path}": "${segments[index - 1]}" of ${container.name} holds no document.`,
          path,
        );
      }

      const entry = container.field(segment);

      if (!entry) {
        if (container.unknownFields === "preserve") {
          wireSegments.push(...segments.slice(index));
          return { wirePath: wireSegments.join("."), field: undefined };
        }

        throw new QueryTranslationError(
          `Unknown field "${segment}" of ${container.name} in "${path}".`,
          path,
        );
      }

      wireSegments.push(entry.wireName);
      current = entry.field;
    }

    return { wirePath: wireSegments.join("."), field: current };
  }

  /**
   * Index descriptions to create for this model: the declared indexes plus a
   * unique index for every field flagged `unique`.
   */
  public indexDescriptions(): IndexDescription[] {
    const descriptions: IndexDescription[] = [];

    for (const index of this.indexes) {
      const key: Record<string, IndexDirection> = {};

      for (const [path, direction] of Object.entries(index.key)) {
        key[this.resolvePath(path).wirePath] = direction;
      }

      descriptions.push({ ...index, key, name: index.name || defaultIndexName(key) });
    }

    for (const [name, field] of this.fields) {
      if (!field.isUnique || field.isPrimaryKey) continue;

      const key: Record<string, IndexDirection> = { [field.wireName(name)]: 1 };
      const indexName = defaultIndexName(key);

      if (descriptions.some(description => description.name === indexName)) continue;

      descriptions.push({ key, name: indexName, unique: true });
    }

    return descriptions;
  }
}
