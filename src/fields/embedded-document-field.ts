import { Model } from "../model/model";
import type { ModelDefinition } from "../model/model-definition";
import { resolveModelDefinition } from "../model/register-model";
import type { ModelReference } from "../model/types";
import { Field, type FieldOptions } from "./field";

/**
 * A nested document described by an embedded model.
 */
export class EmbeddedDocumentField<TModel extends Model = Model> extends Field<TModel> {
  public readonly kind = "embedded";

  public constructor(
    private readonly model: ModelReference<TModel>,
    options: FieldOptions<TModel> = {},
  ) {
    super(options);
  }

  /**
   * Definition of the embedded model, resolved on first use so models may be
   * given by registry name.
   */
  public get definition(): ModelDefinition {
    return resolveModelDefinition(this.model);
  }

  public get typeName(): string {
    return this.definition.name;
  }

  public coerce(value: unknown): TModel | undefined {
    return this.isModelInstance(value) ? value : undefined;
  }

  /**
   * Instances carrying this definition are built by the defined class.
   */
  private isModelInstance(value: unknown): value is TModel {
    return value instanceof Model && value.definition === this.definition;
  }
}
