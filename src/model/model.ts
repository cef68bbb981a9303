import { areEqual } from "@mongez/reinforcements";
import type { Document } from "mongodb";
import { DocumentCodec } from "../codec/document-codec";
import { OperationError } from "../errors/operation.error";
import { ValidationError } from "../errors/validation.error";
import { querySetFor } from "../query/query-set";
import { dereference } from "../relations/dereferencer";
import { referenceKey } from "../relations/reference-key";
import { DatabaseWriter, type SaveOptions } from "../writer/database-writer";
import type { ModelDefinition } from "./model-definition";

/**
 * Base schema type for model data.
 */
export type ModelSchema = Record<string, unknown>;

/**
 * Base class of every defined model.
 *
 * Instances hold field values in `data`, keyed by field name. Values are
 * checked when the instance is encoded (on save, or through `fullClean()`),
 * not when they are assigned.
 *
 * @example
 * ```typescript
 * const User = defineModel({
 *   name: "User",
 *   fields: {
 *     email: new EmailField({ primaryKey: true }),
 *     name: new CharField({ required: true }),
 *   },
 * });
 *
 * const user = new User({ email: "a@example.com", name: "A" });
 * await user.save();
 * ```
 */
export abstract class Model<TSchema extends ModelSchema = ModelSchema> {
  /**
   * Definition of the model this instance belongs to.
   */
  public readonly definition: ModelDefinition;

  /**
   * Field values keyed by field name.
   */
  public data: TSchema;

  /**
   * Stored fields the schema does not declare, kept when the model preserves
   * unknown fields.
   */
  public unknownFields: Record<string, unknown> = {};

  /**
   * Build an instance; fields missing from `initialData` receive their
   * defaults.
   *
   * @throws {ValidationError} when `initialData` has a key that is not a field
   */
  public constructor(definition: ModelDefinition, initialData: Partial<TSchema> = {}) {
    this.definition = definition;
    this.data = this.castData({});

    const entries: Array<[string, unknown]> = Object.entries(initialData);

    this.assignEntries(entries);

    for (const [name, field] of definition.fields) {
      if (this.getValue(name) !== undefined) continue;

      const defaultValue = field.defaultValue();

      if (defaultValue !== undefined) {
        this.setValue(name, defaultValue);
      }
    }
  }

  /**
   * Get the value of the given field.
   */
  public get<TKey extends keyof TSchema & string>(field: TKey): TSchema[TKey] {
    return this.data[field];
  }

  /**
   * Set the value of the given field.
   */
  public set<TKey extends keyof TSchema & string>(field: TKey, value: TSchema[TKey]): this {
    this.data[field] = value;

    return this;
  }

  /**
   * Untyped read, for code walking fields by name.
   */
  public getValue(field: string): unknown {
    const record: Record<string, unknown> = this.data;

    return record[field];
  }

  /**
   * Untyped write, for code walking fields by name.
   */
  public setValue(field: string, value: unknown): this {
    const record: Record<string, unknown> = this.data;
    record[field] = value;

    return this;
  }

  /**
   * Whether the field holds a value.
   */
  public has(field: keyof TSchema & string): boolean {
    return this.data[field] !== undefined;
  }

  /**
   * Set several fields at once.
   *
   * @throws {ValidationError} when a key is not a field
   */
  public assign(data: Record<string, unknown>): this {
    this.assignEntries(Object.entries(data));

    return this;
  }

  /**
   * Replace every field value at once, used when hydrating stored documents.
   */
  public replaceData(data: Record<string, unknown>): this {
    this.data = this.castData(data);

    return this;
  }

  /**
   * Primary key value, undefined until the instance is saved (or for
   * embedded models).
   */
  public get pk(): unknown {
    const name = this.definition.primaryKeyName;

    return name === undefined ? undefined : this.getValue(name);
  }

  public set pk(value: unknown) {
    this.setValue(this.definition.primaryKey.name, value);
  }

  /**
   * Check every field without touching storage.
   *
   * @throws {ValidationError} on the first failing field
   */
  public fullClean(): void {
    new DocumentCodec().encode(this);
  }

  /**
   * Encode the instance into its stored document.
   */
  public toDocument(): Document {
    return new DocumentCodec().encode(this);
  }

  /**
   * Insert the instance, or replace its stored document when it has a
   * primary key.
   */
  public async save(options: SaveOptions = {}): Promise<this> {
    await new DatabaseWriter(this).save(options);

    return this;
  }

  /**
   * Delete the stored document, applying the delete rules registered on the
   * model.
   *
   * @returns number of deleted documents of this model
   */
  public async delete(): Promise<number> {
    const pk = this.requirePrimaryKey("delete");

    return querySetFor(this.definition).raw({ _id: this.encodedPrimaryKey(pk) }).delete();
  }

  /**
   * Reload field values from storage.
   *
   * @param fields only reload these fields
   */
  public async refreshFromDb(fields: string[] = []): Promise<this> {
    const pk = this.requirePrimaryKey("refresh");

    let querySet = querySetFor(this.definition).raw({ _id: this.encodedPrimaryKey(pk) });

    if (fields.length > 0) {
      querySet = querySet.only(...fields);
    }

    const fresh = await querySet.first();

    if (fields.length === 0) {
      this.replaceData({ ...fresh.data });
      this.unknownFields = { ...fresh.unknownFields };

      return this;
    }

    for (const field of fields) {
      const name = field.split(".")[0];
      this.setValue(name, fresh.getValue(name));
    }

    return this;
  }

  /**
   * Resolve the references held by this instance.
   *
   * @param fields dotted paths of the reference fields to resolve, all when empty
   */
  public async dereference(...fields: string[]): Promise<this> {
    await dereference(this, { fields: fields.length > 0 ? fields : undefined });

    return this;
  }

  /**
   * Same model and same primary key, or same data for instances without one.
   */
  public equals(other: unknown): boolean {
    if (!(other instanceof Model) || other.definition !== this.definition) return false;

    if (this.pk !== undefined && this.pk !== null && other.pk !== undefined && other.pk !== null) {
      return referenceKey(this.pk) === referenceKey(other.pk);
    }

    return areEqual(this.data, other.data);
  }

  private assignEntries(entries: Array<[string, unknown]>): void {
    for (const [name, value] of entries) {
      if (!this.definition.fields.has(name)) {
        throw new ValidationError(
          name,
          "unknown",
          `${this.definition.name} has no field named "${name}".`,
          value,
        );
      }

      this.setValue(name, value);
    }
  }

  private requirePrimaryKey(operation: string): unknown {
    if (this.definition.embedded) {
      throw new OperationError(`Cannot ${operation} embedded ${this.definition.name} on its own.`);
    }

    const pk = this.pk;

    if (pk === undefined || pk === null) {
      throw new OperationError(
        `Cannot ${operation} ${this.definition.name}: the instance has not been saved yet.`,
      );
    }

    return pk;
  }

  private encodedPrimaryKey(pk: unknown): unknown {
    const value = this.definition.primaryKey.field.toQueryValue(pk);

    return value === undefined ? pk : value;
  }

  private castData(data: Record<string, unknown>): TSchema {
    // values are checked on encode, not on assignment
    return data as TSchema;
  }
}
