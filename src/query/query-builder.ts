import { colors } from "@mongez/copper";
import { clone } from "@mongez/reinforcements";
import { isEmpty } from "@mongez/supportive-is";
import type { CollationOptions, Document, FindOptions } from "mongodb";
import { QueryTranslationError } from "../errors/query-translation.error";
import type { Model } from "../model/model";
import type { ModelDefinition } from "../model/model-definition";
import { freezeDocument, toPlainRecord } from "../utils/plain-object";
import { FilterTranslator, type FilterExpression } from "./filter-translator";
import { EMPTY_QUERY_SPEC, toFindOptions, type QuerySpec, type SortDirection } from "./query-spec";

/**
 * A sort key: `"name"` (ascending), `"-name"` (descending) or a tuple.
 */
export type SortKey = string | readonly [string, SortDirection | "asc" | "desc"];

function conjoin(current: Document, next: Document): Document {
  if (isEmpty(current)) return next;
  if (isEmpty(next)) return current;

  const overlaps = Object.keys(next).some(key => key in current);

  if (!overlaps && !("$and" in current) && !("$and" in next)) {
    return { ...current, ...next };
  }

  return { $and: [current, next] };
}

function toSortEntry(key: SortKey): [string, SortDirection] {
  if (typeof key === "string") {
    return key.startsWith("-") ? [key.slice(1), -1] : [key, 1];
  }

  const [path, direction] = key;

  if (direction === "asc") return [path, 1];
  if (direction === "desc") return [path, -1];

  return [path, direction];
}

function assertCount(operation: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new QueryTranslationError(
      `${operation}() expects a non negative integer, got ${String(value)}.`,
    );
  }
}

/**
 * Immutable, schema aware query builder.
 *
 * Every operation returns a new builder holding a new frozen `QuerySpec`;
 * the receiver is never changed, so a builder can be shared and extended
 * freely. Nothing here touches storage.
 *
 * @example
 * ```typescript
 * const query = Post.queryBuilder()
 *   .filter({ author: user })
 *   .orderBy("-createdAt")
 *   .limit(10);
 *
 * query.spec.filter; // { author: "a@example.com" }
 * ```
 */
export class QueryBuilder<TModel extends Model = Model> {
  public constructor(
    public readonly definition: ModelDefinition<TModel>,
    public readonly spec: QuerySpec = EMPTY_QUERY_SPEC,
  ) {}

  /**
   * Add conditions, combined with the current ones by conjunction.
   *
   * @throws {QueryTranslationError} when the expression does not fit the schema
   */
  public filter(expression: FilterExpression): QueryBuilder<TModel> {
    const translated = new FilterTranslator(this.definition).translate(expression);

    return this.with({ filter: conjoin(this.spec.filter, translated) });
  }

  /**
   * Replace the filter with a stored filter document, used verbatim.
   */
  public raw(filter: Document): QueryBuilder<TModel> {
    return this.with({ filter, rawOverride: true });
  }

  /**
   * Only load the given fields (and the primary key).
   */
  public only(...fields: string[]): QueryBuilder<TModel> {
    const projection: Document = {};

    for (const field of fields) {
      projection[this.definition.resolvePath(field).wirePath] = 1;
    }

    return this.with({ projection });
  }

  /**
   * Load every field except the given ones. The primary key is always loaded.
   */
  public exclude(...fields: string[]): QueryBuilder<TModel> {
    const projection: Document = {};

    for (const field of fields) {
      const { wirePath } = this.definition.resolvePath(field);

      if (wirePath === "_id") continue;

      projection[wirePath] = 0;
    }

    return this.with({ projection: isEmpty(projection) ? undefined : projection });
  }

  /**
   * Replace the projection with a stored projection document.
   */
  public project(projection: Document): QueryBuilder<TModel> {
    return this.with({ projection });
  }

  /**
   * Replace the sort order.
   *
   * @example
   * ```typescript
   * query.orderBy("-createdAt", ["title", "asc"]);
   * ```
   */
  public orderBy(...keys: SortKey[]): QueryBuilder<TModel> {
    const sort = keys.map(key => {
      const [path, direction] = toSortEntry(key);

      return Object.freeze([this.definition.resolvePath(path).wirePath, direction] as const);
    });

    return this.with({ sort: Object.freeze(sort) });
  }

  public skip(skip: number): QueryBuilder<TModel> {
    assertCount("skip", skip);

    return this.with({ skip });
  }

  public limit(limit: number): QueryBuilder<TModel> {
    assertCount("limit", limit);

    return this.with({ limit });
  }

  public collation(collation: CollationOptions): QueryBuilder<TModel> {
    return this.with({ collation });
  }

  /**
   * Resolve references of every loaded instance, all of them when no field
   * is given.
   */
  public selectRelated(...fields: string[]): QueryBuilder<TModel> {
    return this.with({ selectRelated: Object.freeze([...fields]) });
  }

  public toFindOptions(): FindOptions {
    return toFindOptions(this.spec);
  }

  /**
   * Colored, human readable dump of the query.
   */
  public pretty(): string {
    let output = `${colors.bold(this.definition.name)} query on ${colors.yellowBright(
      this.definition.collectionName,
    )}\n`;
    output += "═".repeat(50) + "\n";

    const parts: Array<[string, unknown]> = [
      ["filter", this.spec.filter],
      ["projection", this.spec.projection],
      ["sort", this.spec.sort.length > 0 ? Object.fromEntries(this.spec.sort) : undefined],
      ["skip", this.spec.skip],
      ["limit", this.spec.limit],
      ["collation", this.spec.collation],
    ];

    for (const [label, value] of parts) {
      if (value === undefined) continue;

      output += `${colors.redBright(label)}${this.spec.rawOverride && label === "filter" ? " (raw)" : ""}:\n`;
      output += this.formatValue(value, 2);
    }

    return output;
  }

  private formatValue(value: unknown, indent: number): string {
    const spaces = " ".repeat(indent);

    if (Array.isArray(value)) {
      if (value.length === 0) return `${spaces}[]\n`;

      return value
        .map(
          (item, index) => `${spaces}[${colors.magenta(String(index))}]:\n${this.formatValue(item, indent + 2)}`,
        )
        .join("");
    }

    const record = toPlainRecord(value);

    if (record) {
      const entries = Object.entries(record);

      if (entries.length === 0) return `${spaces}{}\n`;

      return entries
        .map(([key, item]) => {
          const coloredKey = key.startsWith("$") ? colors.magentaBright(key) : colors.blue(key);

          if (Array.isArray(item) || toPlainRecord(item)) {
            return `${spaces}${coloredKey}:\n${this.formatValue(item, indent + 2)}`;
          }

          return `${spaces}${coloredKey}: ${this.formatScalar(item)}\n`;
        })
        .join("");
    }

    return `${spaces}${this.formatScalar(value)}\n`;
  }

  private formatScalar(value: unknown): string {
    if (typeof value === "number") return colors.yellowBright(String(value));
    if (typeof value === "boolean") return colors.cyanBright(String(value));
    if (typeof value === "string") return colors.greenBright(JSON.stringify(value));

    return colors.greenBright(String(value));
  }

  private with(patch: Partial<QuerySpec>): QueryBuilder<TModel> {
    const spec: QuerySpec = { ...this.spec, ...patch };

    // documents are copied in, so callers keep their own objects writable
    return new QueryBuilder(
      this.definition,
      Object.freeze({
        ...spec,
        filter: patch.filter ? freezeDocument(clone(patch.filter)) : spec.filter,
        projection: patch.projection ? freezeDocument(clone(patch.projection)) : spec.projection,
        collation: patch.collation ? freezeDocument(clone(patch.collation)) : spec.collation,
      }),
    );
  }
}
