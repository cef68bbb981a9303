import type { Document } from "mongodb";
import { QueryTranslationError } from "../errors/query-translation.error";
import { EmbeddedDocumentField } from "../fields/embedded-document-field";
import type { Field } from "../fields/field";
import { ListField } from "../fields/list-field";
import type { ModelDefinition } from "../model/model-definition";
import { hasOperators, toPlainRecord } from "../utils/plain-object";
import { FilterTranslator } from "./filter-translator";

/**
 * Update written against field names, e.g. `{ $set: { title: "x" } }`.
 */
export type UpdateExpression = Record<string, unknown>;

/**
 * How the operands of each update operator are translated.
 */
type OperandMode = "value" | "number" | "raw" | "rename" | "element" | "elements" | "matcher";

const UPDATE_OPERATORS = new Map<string, OperandMode>([
  ["$set", "value"],
  ["$setOnInsert", "value"],
  ["$min", "value"],
  ["$max", "value"],
  ["$inc", "number"],
  ["$mul", "number"],
  ["$unset", "raw"],
  ["$currentDate", "raw"],
  ["$pop", "raw"],
  ["$rename", "rename"],
  ["$push", "element"],
  ["$addToSet", "element"],
  ["$pullAll", "elements"],
  ["$pull", "matcher"],
]);

/**
 * Translates update expressions into stored update documents.
 */
export class UpdateTranslator {
  private readonly filters: FilterTranslator;

  public constructor(private readonly definition: ModelDefinition) {
    this.filters = new FilterTranslator(definition);
  }

  /**
   * @throws {QueryTranslationError} on unknown operators or fields, plain
   * field keys and operands of the wrong shape
   */
  public translate(update: UpdateExpression): Document {
    const entries = Object.entries(update);

    if (entries.length === 0) {
      throw new QueryTranslationError("An update needs at least one operator.");
    }

    const translated: Document = {};

    for (const [operator, operand] of entries) {
      const mode = UPDATE_OPERATORS.get(operator);

      if (!mode) {
        throw new QueryTranslationError(
          operator.startsWith("$")
            ? `Unknown update operator "${operator}".`
            : `Updates only take operators, got the field "${operator}".`,
          operator,
        );
      }

      const fields = toPlainRecord(operand);

      if (!fields) {
        throw new QueryTranslationError(`${operator} expects an object of fields.`, operator);
      }

      const operatorDocument: Document = {};

      for (const [path, value] of Object.entries(fields)) {
        const { wirePath, field } = this.definition.resolvePath(path);

        operatorDocument[wirePath] = this.translateOperand(mode, operator, field, value, path);
      }

      translated[operator] = operatorDocument;
    }

    return translated;
  }

  private translateOperand(
    mode: OperandMode,
    operator: string,
    field: Field | undefined,
    value: unknown,
    path: string,
  ): unknown {
    switch (mode) {
      case "value":
        return this.filters.encodeValue(field, value, path);

      case "number":
        if (typeof value !== "number") {
          throw new QueryTranslationError(`${operator} of "${path}" expects a number.`, path);
        }

        return value;

      case "raw":
        return value;

      case "rename":
        if (typeof value !== "string") {
          throw new QueryTranslationError(`$rename of "${path}" expects the new field name.`, path);
        }

        return this.definition.resolvePath(value).wirePath;

      case "element":
        return this.translateElement(operator, field, value, path);

      case "elements": {
        if (!Array.isArray(value)) {
          throw new QueryTranslationError(`${operator} of "${path}" expects a list.`, path);
        }

        const inner = this.elementField(operator, field, path);

        return value.map(element => this.filters.encodeValue(inner, element, path));
      }

      case "matcher": {
        const inner = this.elementField(operator, field, path);
        const record = toPlainRecord(value);

        if (inner instanceof EmbeddedDocumentField && record && !hasOperators(record)) {
          return new FilterTranslator(inner.definition).translate(record);
        }

        return this.filters.translateMatcher(inner, value, path);
      }
    }
  }

  private translateElement(
    operator: string,
    field: Field | undefined,
    value: unknown,
    path: string,
  ): unknown {
    const inner = this.elementField(operator, field, path);
    const record = toPlainRecord(value);

    if (record && "$each" in record) {
      const each = record.$each;

      if (!Array.isArray(each)) {
        throw new QueryTranslationError(`$each of "${path}" expects a list.`, path);
      }

      return {
        ...record,
        $each: each.map(element => this.filters.encodeValue(inner, element, path)),
      };
    }

    return this.filters.encodeValue(inner, value, path);
  }

  private elementField(operator: string, field: Field | undefined, path: string): Field | undefined {
    if (!field) return undefined;

    if (!(field instanceof ListField)) {
      throw new QueryTranslationError(`${operator} needs a list field, "${path}" is not one.`, path);
    }

    return field.inner;
  }
}
