import { ObjectId } from "mongodb";
import { ModelDefinitionError } from "../errors/model-definition.error";
import type { DeleteRule } from "../model/delete-rules";
import { Model } from "../model/model";
import type { ModelDefinition } from "../model/model-definition";
import { resolveModelDefinition } from "../model/register-model";
import type { ModelReference } from "../model/types";
import { BrokenReference } from "../relations/broken-reference";
import { Field, type FieldOptions } from "./field";

/**
 * Stored form of an unresolved reference: the target primary key.
 */
export type ReferenceKey = string | number | ObjectId | Date;

/**
 * What a reference field holds: the target key until dereferenced, then the
 * target instance (or a `BrokenReference` when the target is gone).
 */
export type ReferenceValue<TModel extends Model = Model> = TModel | ReferenceKey | BrokenReference;

export type ReferenceFieldOptions<TModel extends Model> = FieldOptions<ReferenceValue<TModel>> & {
  /**
   * What happens to documents holding this reference when the target is
   * deleted. Requires the target to be given as a class.
   */
  onDelete?: DeleteRule;
};

function isReferenceKey(value: unknown): value is ReferenceKey {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    value instanceof ObjectId ||
    value instanceof Date
  );
}

/**
 * Points at a document of another top level model. Only the target primary
 * key is stored.
 */
export class ReferenceField<TModel extends Model = Model> extends Field<ReferenceValue<TModel>> {
  public readonly kind = "reference";

  public readonly onDelete?: DeleteRule;

  public constructor(
    private readonly model: ModelReference<TModel>,
    options: ReferenceFieldOptions<TModel> = {},
  ) {
    super(options);

    if (options.onDelete !== undefined && typeof model === "string") {
      throw new ModelDefinitionError(
        `Cannot use onDelete on a reference to "${model}" given by name; pass the model class instead.`,
        model,
      );
    }

    this.onDelete = options.onDelete;
  }

  /**
   * Definition of the referenced model, resolved on first use so references
   * may name models defined later.
   *
   * @throws {ModelDefinitionError} when the target is embedded or unknown
   */
  public get target(): ModelDefinition {
    const definition = resolveModelDefinition(this.model);

    if (definition.embedded) {
      throw new ModelDefinitionError(
        `Cannot reference embedded model ${definition.name}; use an embedded document field.`,
        definition.name,
      );
    }

    return definition;
  }

  public get typeName(): string {
    return `reference to ${this.target.name}`;
  }

  public coerce(value: unknown): ReferenceValue<TModel> | undefined {
    if (value instanceof BrokenReference) return value;

    if (value instanceof Model) {
      return this.isTargetInstance(value) ? value : undefined;
    }

    const key = this.target.primaryKey.field.coerce(value);

    return isReferenceKey(key) ? key : undefined;
  }

  /**
   * Stored form of a reference value: the target primary key.
   */
  public toMongo(value: ReferenceValue<TModel>): unknown {
    if (value instanceof BrokenReference) return value.id;

    const primaryKey = this.target.primaryKey.field;
    const key = value instanceof Model ? value.pk : value;
    const stored = primaryKey.toQueryValue(key);

    return stored === undefined ? key : stored;
  }

  /**
   * Stored keys stay keys; they are swapped for instances by dereferencing.
   */
  public fromMongo(raw: unknown): unknown {
    if (raw === null || raw === undefined) return raw;

    return this.target.primaryKey.field.fromMongo(raw);
  }

  private isTargetInstance(value: Model): value is TModel {
    return value.definition === this.target;
  }
}
