import type { Document } from "mongodb";
import { ValidationError } from "../errors/validation.error";
import { EmbeddedDocumentField } from "../fields/embedded-document-field";
import type { Field } from "../fields/field";
import { ListField } from "../fields/list-field";
import { ObjectIdField } from "../fields/object-id-field";
import { ReferenceField } from "../fields/reference-field";
import { Model } from "../model/model";
import type { ModelDefinition } from "../model/model-definition";
import { BrokenReference } from "../relations/broken-reference";
import type { UnknownFieldsPolicy } from "../types";
import { toPlainRecord } from "../utils/plain-object";

export type DocumentCodecOptions = {
  /**
   * Overrides the model and global unknown fields policy
   */
  unknownFields?: UnknownFieldsPolicy;
};

export type EncodeOptions = {
  /**
   * Check field constraints while encoding
   * @default true
   */
  validate?: boolean;
  /**
   * Encode references to unsaved instances as missing instead of failing,
   * used to check an instance before its references are cascaded
   */
  allowUnsavedReferences?: boolean;
};

type EncodeContext = Required<EncodeOptions>;

/**
 * Converts model instances to stored documents and back.
 *
 * Encoding checks every field in declaration order and stops at the first
 * failure, so nothing invalid reaches the driver. Decoding is permissive and
 * never fails on unexpected stored values.
 */
export class DocumentCodec {
  public constructor(private readonly options: DocumentCodecOptions = {}) {}

  /**
   * Encode an instance into its stored document.
   *
   * @throws {ValidationError} on the first failing field
   */
  public encode(model: Model, options: EncodeOptions = {}): Document {
    return this.encodeModel(model, "", {
      validate: options.validate !== false,
      allowUnsavedReferences: options.allowUnsavedReferences === true,
    });
  }

  /**
   * Decode a stored document into an instance of the given model.
   */
  public decode<TModel extends Model>(document: Document, definition: ModelDefinition<TModel>): TModel {
    const data: Record<string, unknown> = {};
    const consumed = new Set<string>();

    for (const [name, field] of definition.fields) {
      const wireName = field.wireName(name);

      if (!(wireName in document)) continue;

      consumed.add(wireName);
      data[name] = this.decodeValue(field, document[wireName]);
    }

    const model = definition.hydrate(data);

    if (this.unknownFieldsPolicy(definition) === "preserve") {
      for (const [key, value] of Object.entries(document)) {
        if (!consumed.has(key)) {
          model.unknownFields[key] = value;
        }
      }
    }

    return model;
  }

  private unknownFieldsPolicy(definition: ModelDefinition): UnknownFieldsPolicy {
    return this.options.unknownFields || definition.unknownFields;
  }

  private encodeModel(model: Model, prefix: string, context: EncodeContext): Document {
    const document: Document = {};

    for (const [name, field] of model.definition.fields) {
      const path = prefix ? `${prefix}.${name}` : name;
      const current = model.getValue(name);

      // ObjectId keys are generated on insert
      if (
        name === model.definition.primaryKeyName &&
        field instanceof ObjectIdField &&
        (current === undefined || current === null)
      ) {
        continue;
      }

      const value = this.encodeValue(field, current, path, context);

      if (value !== undefined) {
        document[field.wireName(name)] = value;
      }
    }

    if (this.unknownFieldsPolicy(model.definition) === "preserve") {
      for (const [key, value] of Object.entries(model.unknownFields)) {
        if (!(key in document)) {
          document[key] = value;
        }
      }
    }

    return document;
  }

  private encodeValue(field: Field, value: unknown, path: string, context: EncodeContext): unknown {
    // present references are checked by encodeReference, which reports
    // unsaved and mistyped targets first
    const deferred = field instanceof ReferenceField && value !== undefined && value !== null;

    if (context.validate && !deferred) {
      field.validate(value, path);
    }

    if (value === undefined || value === null) return undefined;

    if (field instanceof ListField) {
      if (!Array.isArray(value)) return value;

      return value.map((element, index) => {
        const elementPath = `${path}.${index}`;

        if (element === undefined || element === null) {
          throw new ValidationError(
            elementPath,
            "type",
            `${elementPath} must be a valid ${field.inner.typeName}.`,
            element,
          );
        }

        return this.encodeValue(field.inner, element, elementPath, context);
      });
    }

    if (field instanceof EmbeddedDocumentField) {
      if (!(value instanceof Model)) return value;

      return this.encodeModel(value, path, context);
    }

    if (field instanceof ReferenceField) {
      return this.encodeReference(field, value, path, context);
    }

    const coerced = field.coerce(value);

    return coerced === undefined ? value : field.toMongo(coerced);
  }

  private encodeReference(
    field: ReferenceField,
    value: unknown,
    path: string,
    context: EncodeContext,
  ): unknown {
    if (value instanceof BrokenReference) return value.id;

    if (value instanceof Model) {
      if (value.definition !== field.target) {
        throw new ValidationError(
          path,
          "reference-type",
          `${path} must reference a ${field.target.name}, got a ${value.definition.name}.`,
          value,
        );
      }

      if (value.pk === undefined || value.pk === null) {
        if (context.allowUnsavedReferences) return undefined;

        throw new ValidationError(
          path,
          "reference-unsaved",
          `${path} references a ${field.target.name} that has not been saved.`,
          value,
        );
      }
    }

    if (context.validate) {
      field.validate(value, path);
    }

    const coerced = field.coerce(value);

    return coerced === undefined ? value : field.toMongo(coerced);
  }

  private decodeValue(field: Field, raw: unknown): unknown {
    if (raw === undefined || raw === null) return raw;

    if (field instanceof ListField) {
      if (!Array.isArray(raw)) return raw;

      return raw.map(element => this.decodeValue(field.inner, element));
    }

    if (field instanceof EmbeddedDocumentField) {
      const document = toPlainRecord(raw);

      return document ? this.decode(document, field.definition) : raw;
    }

    return field.fromMongo(raw);
  }
}
