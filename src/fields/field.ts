import { clone } from "@mongez/reinforcements";
import { isEmpty, isPlainObject } from "@mongez/supportive-is";
import { ValidationError } from "../errors/validation.error";

/**
 * How the codec treats a field's value.
 *
 * - `scalar`: stored as a single wire value
 * - `list`: an ordered array of an inner field's values
 * - `embedded`: a nested document described by an embedded model
 * - `reference`: the primary key of a document in another collection
 */
export type FieldKind = "scalar" | "list" | "embedded" | "reference";

/**
 * A custom constraint attached to a field.
 *
 * `message` may contain the `:field` placeholder.
 */
export interface FieldValidator<TValue> {
  readonly constraint: string;
  readonly message?: string;
  validate(value: TValue): boolean;
}

export type FieldOptions<TValue> = {
  /**
   * Reject missing (`undefined` / `null`) values
   */
  required?: boolean;
  /**
   * Allow empty strings, arrays and objects
   * @default true
   */
  blank?: boolean;
  /**
   * Mark the field as the model primary key, stored under `_id`
   */
  primaryKey?: boolean;
  /**
   * Uniqueness intent, materialized by `createIndexes()`
   */
  unique?: boolean;
  /**
   * Name of the field in the stored document
   */
  mongoName?: string;
  /**
   * Value used when a new instance omits the field, cloned per instance
   */
  default?: TValue;
  /**
   * Factory used when a new instance omits the field, wins over `default`
   */
  defaultFactory?: () => TValue;
  /**
   * Restrict the field to the listed values
   */
  choices?: readonly TValue[];
  /**
   * Extra constraints, checked after the built-in ones in declaration order
   */
  validators?: ReadonlyArray<FieldValidator<TValue>>;
};

/**
 * Base class of every field schema.
 *
 * A field knows how to check a value (`validate`), how to write it to the wire
 * (`toMongo`) and how to read it back (`fromMongo`). Container kinds (lists,
 * embedded documents, references) are walked by the document codec, which
 * delegates element checks back to the inner fields.
 */
export abstract class Field<TValue = unknown> {
  /**
   * Codec classification of the field.
   */
  public abstract readonly kind: FieldKind;

  /**
   * Human readable type used in error messages.
   */
  public abstract readonly typeName: string;

  public readonly options: Readonly<FieldOptions<TValue>>;

  public constructor(options: FieldOptions<TValue> = {}) {
    this.options = Object.freeze({ ...options });
  }

  public get isPrimaryKey(): boolean {
    return this.options.primaryKey === true;
  }

  public get isRequired(): boolean {
    return this.options.required === true || this.isPrimaryKey;
  }

  public get isUnique(): boolean {
    return this.options.unique === true;
  }

  /**
   * Name of the field in the stored document.
   */
  public wireName(fieldName: string): string {
    if (this.isPrimaryKey) return "_id";

    return this.options.mongoName || fieldName;
  }

  /**
   * Default value for a new instance, cloned so instances never share it.
   */
  public defaultValue(): TValue | undefined {
    if (this.options.defaultFactory) return this.options.defaultFactory();

    const defaultValue = this.options.default;

    if (Array.isArray(defaultValue) || isPlainObject(defaultValue)) {
      return clone(defaultValue);
    }

    return defaultValue;
  }

  /**
   * Whether the value counts as empty for the `blank` constraint.
   */
  public isBlank(value: unknown): boolean {
    if (typeof value === "string") return value.length === 0;
    if (Array.isArray(value)) return value.length === 0;

    return false;
  }

  /**
   * Coerce an arbitrary value into the field type, or return `undefined` when
   * the value is not compatible.
   */
  public abstract coerce(value: unknown): TValue | undefined;

  /**
   * Convert a checked value to its wire representation.
   */
  public toMongo(value: TValue): unknown {
    return value;
  }

  /**
   * Convert a stored value back to the field type.
   *
   * Decoding is permissive: a value that cannot be coerced is kept as stored.
   */
  public fromMongo(raw: unknown): unknown {
    if (raw === null || raw === undefined) return raw;

    const value = this.coerce(raw);

    return value === undefined ? raw : value;
  }

  /**
   * Convert a query operand to its wire form, or `undefined` when it cannot be
   * coerced to the field type.
   */
  public toQueryValue(value: unknown): unknown {
    const coerced = this.coerce(value);

    return coerced === undefined ? undefined : this.toMongo(coerced);
  }

  /**
   * Check the value against every constraint of the field.
   *
   * Order: required, blank, type, type specific constraints, choices, then the
   * custom validators. The first failure is thrown.
   *
   * @returns the coerced value, or `undefined` for a permitted missing value
   */
  public validate(value: unknown, path: string): TValue | undefined {
    if (value === undefined || value === null) {
      if (this.isRequired) {
        throw new ValidationError(path, "required", `${path} is required.`, value);
      }

      return undefined;
    }

    if (this.options.blank === false && this.isBlank(value)) {
      throw new ValidationError(path, "blank", `${path} cannot be blank.`, value);
    }

    const coerced = this.coerce(value);

    if (coerced === undefined) {
      throw new ValidationError(path, "type", `${path} must be a valid ${this.typeName}.`, value);
    }

    this.checkConstraints(coerced, path);

    const choices = this.options.choices;

    if (choices && !choices.some(choice => this.sameValue(choice, coerced))) {
      throw new ValidationError(
        path,
        "choices",
        `${path} must be one of: ${choices.map(String).join(", ")}.`,
        value,
      );
    }

    for (const validator of this.options.validators || []) {
      if (!validator.validate(coerced)) {
        const message = (validator.message || ":field is invalid.").replace(":field", path);
        throw new ValidationError(path, validator.constraint, message, value);
      }
    }

    return coerced;
  }

  /**
   * Type specific constraints (lengths, bounds, formats...).
   */
  protected checkConstraints(_value: TValue, _path: string): void {
    // no constraints by default
  }

  protected sameValue(left: TValue, right: TValue): boolean {
    return left === right;
  }

  /**
   * Shared helper for fields holding plain objects.
   */
  protected isEmptyObject(value: unknown): boolean {
    return typeof value === "object" && value !== null && !Array.isArray(value) && isEmpty(value);
  }
}
