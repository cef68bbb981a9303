import type { Document } from "mongodb";
import { DocumentCodec } from "../codec/document-codec";
import { QueryTranslationError } from "../errors/query-translation.error";
import { EmbeddedDocumentField } from "../fields/embedded-document-field";
import type { Field } from "../fields/field";
import { ListField } from "../fields/list-field";
import { ReferenceField } from "../fields/reference-field";
import { Model } from "../model/model";
import type { ModelDefinition } from "../model/model-definition";
import { hasOnlyOperators, hasOperators, toPlainRecord } from "../utils/plain-object";

/**
 * Filter written against field names, e.g.
 * `{ author: user, "comments.body": { $regex: "^hi" } }`.
 */
export type FilterExpression = Record<string, unknown>;

const LOGICAL_OPERATORS = new Set(["$and", "$or", "$nor"]);
const PASSTHROUGH_OPERATORS = new Set(["$text", "$expr", "$where", "$comment"]);
const VALUE_OPERATORS = new Set(["$eq", "$ne", "$gt", "$gte", "$lt", "$lte"]);
const LIST_OPERATORS = new Set(["$in", "$nin", "$all"]);

function describeValue(value: unknown): string {
  if (typeof value === "string") return `"${value}"`;

  return String(value);
}

/**
 * Translates filter expressions into stored filter documents: field names
 * become stored paths and operands are encoded through the field schema.
 */
export class FilterTranslator {
  private readonly codec = new DocumentCodec();

  public constructor(private readonly definition: ModelDefinition) {}

  /**
   * @throws {QueryTranslationError} on unknown fields or operators and on
   * operands of the wrong shape
   */
  public translate(expression: FilterExpression): Document {
    const filter: Document = {};

    for (const [key, matcher] of Object.entries(expression)) {
      if (LOGICAL_OPERATORS.has(key)) {
        filter[key] = this.translateLogical(key, matcher);
        continue;
      }

      if (PASSTHROUGH_OPERATORS.has(key)) {
        filter[key] = matcher;
        continue;
      }

      if (key.startsWith("$")) {
        throw new QueryTranslationError(`Unknown top level operator "${key}".`, key);
      }

      const { wirePath, field } = this.definition.resolvePath(key);

      filter[wirePath] = this.translateMatcher(field, matcher, key);
    }

    return filter;
  }

  /**
   * Translate the right hand side of `{ path: matcher }`.
   */
  public translateMatcher(field: Field | undefined, matcher: unknown, path: string): unknown {
    const record = toPlainRecord(matcher);

    if (!record || !hasOperators(record)) {
      return this.encodeValue(field, matcher, path);
    }

    if (!hasOnlyOperators(record)) {
      throw new QueryTranslationError(
        `The matcher of "${path}" mixes operators with plain keys.`,
        path,
      );
    }

    const translated: Document = {};

    for (const [operator, operand] of Object.entries(record)) {
      translated[operator] = this.translateOperator(field, operator, operand, path);
    }

    return translated;
  }

  /**
   * Encode a filter value through the field it is compared with.
   *
   * @throws {QueryTranslationError} when the value cannot be coerced
   */
  public encodeValue(field: Field | undefined, value: unknown, path: string): unknown {
    if (!field || value === null || value === undefined || value instanceof RegExp) {
      return value;
    }

    if (field instanceof ListField) {
      if (Array.isArray(value)) {
        return value.map(element => this.encodeValue(field.inner, element, path));
      }

      // a single value matches any element
      return this.encodeValue(field.inner, value, path);
    }

    if (field instanceof EmbeddedDocumentField) {
      return value instanceof Model ? this.codec.encode(value, { validate: false }) : value;
    }

    if (field instanceof ReferenceField) {
      if (value instanceof Model && (value.pk === undefined || value.pk === null)) {
        throw new QueryTranslationError(
          `Cannot filter "${path}" by a ${value.definition.name} that has not been saved.`,
          path,
        );
      }

      const reference = field.coerce(value);

      if (reference === undefined) {
        throw new QueryTranslationError(
          `Cannot use ${describeValue(value)} as a ${field.typeName} for "${path}".`,
          path,
        );
      }

      return field.toMongo(reference);
    }

    const encoded = field.toQueryValue(value);

    if (encoded === undefined) {
      throw new QueryTranslationError(
        `Cannot use ${describeValue(value)} as a ${field.typeName} for "${path}".`,
        path,
      );
    }

    return encoded;
  }

  private translateLogical(operator: string, operand: unknown): Document[] {
    if (!Array.isArray(operand) || operand.length === 0) {
      throw new QueryTranslationError(`${operator} expects a non empty list of filters.`, operator);
    }

    return operand.map(item => {
      const expression = toPlainRecord(item);

      if (!expression) {
        throw new QueryTranslationError(`${operator} expects a list of filter objects.`, operator);
      }

      return this.translate(expression);
    });
  }

  private translateOperator(
    field: Field | undefined,
    operator: string,
    operand: unknown,
    path: string,
  ): unknown {
    if (VALUE_OPERATORS.has(operator)) {
      return this.encodeValue(field, operand, path);
    }

    if (LIST_OPERATORS.has(operator)) {
      if (!Array.isArray(operand)) {
        throw new QueryTranslationError(`${operator} of "${path}" expects a list.`, path);
      }

      return operand.map(value => this.encodeValue(field, value, path));
    }

    switch (operator) {
      case "$exists":
        if (typeof operand !== "boolean") {
          throw new QueryTranslationError(`$exists of "${path}" expects a boolean.`, path);
        }

        return operand;

      case "$regex":
        if (typeof operand !== "string" && !(operand instanceof RegExp)) {
          throw new QueryTranslationError(`$regex of "${path}" expects a pattern.`, path);
        }

        return operand;

      case "$options":
        if (typeof operand !== "string") {
          throw new QueryTranslationError(`$options of "${path}" expects a string.`, path);
        }

        return operand;

      case "$size":
        if (typeof operand !== "number" || !Number.isInteger(operand) || operand < 0) {
          throw new QueryTranslationError(`$size of "${path}" expects a non negative integer.`, path);
        }

        return operand;

      case "$mod":
        if (
          !Array.isArray(operand) ||
          operand.length !== 2 ||
          !operand.every(item => typeof item === "number")
        ) {
          throw new QueryTranslationError(`$mod of "${path}" expects [divisor, remainder].`, path);
        }

        return operand;

      case "$type":
        return operand;

      case "$not":
        return this.translateNot(field, operand, path);

      case "$elemMatch":
        return this.translateElemMatch(field, operand, path);

      default:
        throw new QueryTranslationError(`Unknown operator "${operator}" for "${path}".`, path);
    }
  }

  private translateNot(field: Field | undefined, operand: unknown, path: string): unknown {
    if (operand instanceof RegExp) return operand;

    const record = toPlainRecord(operand);

    if (!record || !hasOnlyOperators(record)) {
      throw new QueryTranslationError(
        `$not of "${path}" expects an operator object or a regular expression.`,
        path,
      );
    }

    return this.translateMatcher(field, record, path);
  }

  private translateElemMatch(field: Field | undefined, operand: unknown, path: string): Document {
    const record = toPlainRecord(operand);

    if (!record) {
      throw new QueryTranslationError(`$elemMatch of "${path}" expects an object.`, path);
    }

    if (!field) return record;

    if (!(field instanceof ListField)) {
      throw new QueryTranslationError(`$elemMatch needs a list field, "${path}" is not one.`, path);
    }

    const inner = field.inner;

    if (inner instanceof EmbeddedDocumentField) {
      return new FilterTranslator(inner.definition).translate(record);
    }

    const translated: Document = {};

    for (const [operator, value] of Object.entries(record)) {
      translated[operator] = this.translateOperator(inner, operator, value, path);
    }

    return translated;
  }
}
