import { colors } from "@mongez/copper";
import { isEmpty } from "@mongez/supportive-is";
import { log } from "@warlock.js/logger";
import type { CollationOptions, CountDocumentsOptions, Document } from "mongodb";
import { DocumentCodec } from "../codec/document-codec";
import type { CollectionHandle, DocumentCursor } from "../contracts";
import { resolveCollection } from "../data-source/resolve-collection";
import { DoesNotExistError } from "../errors/does-not-exist.error";
import { MultipleObjectsReturnedError } from "../errors/multiple-objects-returned.error";
import { OperationError } from "../errors/operation.error";
import { QueryTranslationError } from "../errors/query-translation.error";
import { DeleteRule, getDeleteRules, type DeleteRuleEntry } from "../model/delete-rules";
import type { Model } from "../model/model";
import type { ModelDefinition } from "../model/model-definition";
import { dereference } from "../relations/dereferencer";
import { logQuery } from "../utils/log-query";
import { DatabaseWriter } from "../writer/database-writer";
import type { FilterExpression } from "./filter-translator";
import { QueryBuilder, type SortKey } from "./query-builder";
import { EMPTY_QUERY_SPEC, effectiveLimit, toFindOptions, type QuerySpec } from "./query-spec";
import { UpdateTranslator, type UpdateExpression } from "./update-translator";

export type ToListOptions = {
  /**
   * Resolve references of the loaded instances: `true` for all of them, or
   * the dotted paths to resolve
   * @default the `selectRelated()` paths, if any
   */
  dereference?: boolean | string[];
};

export type UpdateOptions = {
  /**
   * Insert a document when nothing matches
   */
  upsert?: boolean;
};

function assertIndex(operation: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new QueryTranslationError(
      `${operation}() expects a non negative integer, got ${String(value)}.`,
    );
  }
}

/**
 * A query bound to a collection.
 *
 * Chain methods return new query sets, like the builder they wrap; the
 * remaining methods run the query. Iterating a query set opens a fresh cursor
 * every time.
 *
 * @example
 * ```typescript
 * for await (const post of Post.objects.filter({ published: true }).orderBy("-createdAt")) {
 *   console.log(post.get("title"));
 * }
 *
 * const count = await Post.objects.filter({ author: user }).count();
 * ```
 */
export class QuerySet<TModel extends Model = Model> implements AsyncIterable<TModel> {
  private readonly codec = new DocumentCodec();

  public constructor(
    public readonly builder: QueryBuilder<TModel>,
    public readonly collection: CollectionHandle,
  ) {}

  public get definition(): ModelDefinition<TModel> {
    return this.builder.definition;
  }

  public get spec(): QuerySpec {
    return this.builder.spec;
  }

  // ==========================================================================
  // Chain
  // ==========================================================================

  /**
   * A copy of this query set.
   */
  public all(): QuerySet<TModel> {
    return this.wrap(this.builder);
  }

  public filter(expression: FilterExpression): QuerySet<TModel> {
    return this.wrap(this.builder.filter(expression));
  }

  public raw(filter: Document): QuerySet<TModel> {
    return this.wrap(this.builder.raw(filter));
  }

  public only(...fields: string[]): QuerySet<TModel> {
    return this.wrap(this.builder.only(...fields));
  }

  public exclude(...fields: string[]): QuerySet<TModel> {
    return this.wrap(this.builder.exclude(...fields));
  }

  public project(projection: Document): QuerySet<TModel> {
    return this.wrap(this.builder.project(projection));
  }

  public orderBy(...keys: SortKey[]): QuerySet<TModel> {
    return this.wrap(this.builder.orderBy(...keys));
  }

  public skip(skip: number): QuerySet<TModel> {
    return this.wrap(this.builder.skip(skip));
  }

  public limit(limit: number): QuerySet<TModel> {
    return this.wrap(this.builder.limit(limit));
  }

  public collation(collation: CollationOptions): QuerySet<TModel> {
    return this.wrap(this.builder.collation(collation));
  }

  public selectRelated(...fields: string[]): QuerySet<TModel> {
    return this.wrap(this.builder.selectRelated(...fields));
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Number of matching documents, honoring skip and limit.
   */
  public async count(): Promise<number> {
    const options: CountDocumentsOptions = {};
    const limit = effectiveLimit(this.spec);

    if (this.spec.skip !== undefined) options.skip = this.spec.skip;
    if (limit !== undefined) options.limit = limit;
    if (this.spec.collation) options.collation = this.spec.collation;

    logQuery("countDocuments", this.collection.collectionName, this.spec.filter);

    return this.collection.countDocuments(this.spec.filter, options);
  }

  public async exists(): Promise<boolean> {
    return (await this.limit(1).count()) > 0;
  }

  /**
   * @throws {DoesNotExistError} when nothing matches
   */
  public async first(): Promise<TModel> {
    const [model] = await this.limit(1).toList();

    if (!model) {
      throw new DoesNotExistError(this.definition.name);
    }

    return model;
  }

  /**
   * The single instance matching the query (and `match`, when given).
   *
   * @throws {DoesNotExistError} when nothing matches
   * @throws {MultipleObjectsReturnedError} when more than one document matches
   */
  public async get(match?: FilterExpression): Promise<TModel> {
    const querySet = match ? this.filter(match) : this;
    const limit = Math.min(effectiveLimit(querySet.spec) ?? 2, 2);
    const models = await querySet.limit(limit).toList();

    if (models.length > 1) {
      throw new MultipleObjectsReturnedError(this.definition.name);
    }

    if (models.length === 0) {
      throw new DoesNotExistError(this.definition.name);
    }

    return models[0];
  }

  /**
   * Load every matching instance.
   */
  public async toList(options: ToListOptions = {}): Promise<TModel[]> {
    const models: TModel[] = [];
    const cursor = this.openCursor();

    try {
      for await (const document of cursor) {
        models.push(this.codec.decode(document, this.definition));
      }
    } finally {
      await cursor.close();
    }

    const fields = this.dereferencePaths(options.dereference);

    if (fields !== false && models.length > 0) {
      await dereference(models, { fields });
    }

    return models;
  }

  /**
   * The instance at the given position of the results.
   *
   * @throws {DoesNotExistError} when the results are shorter
   */
  public async at(index: number): Promise<TModel> {
    assertIndex("at", index);

    const [model] = await this.slice(index, index + 1);

    if (!model) {
      throw new DoesNotExistError(
        this.definition.name,
        `${this.definition.name} query has no result at index ${index}.`,
      );
    }

    return model;
  }

  /**
   * The instances from `start` up to (excluding) `end`, relative to the
   * current skip and limit.
   */
  public async slice(start: number, end?: number): Promise<TModel[]> {
    assertIndex("slice", start);

    if (end !== undefined) {
      assertIndex("slice", end);
    }

    const { skip = 0 } = this.spec;
    const limit = effectiveLimit(this.spec);
    const bounds = [end === undefined ? undefined : end - start, limit === undefined ? undefined : limit - start];
    const counts = bounds.filter((bound): bound is number => bound !== undefined);
    const count = counts.length > 0 ? Math.max(Math.min(...counts), 0) : undefined;

    // a zero limit would mean "no limit" to the storage layer
    if (count === 0) return [];

    let querySet = this.wrap(this.builder.skip(skip + start));

    if (count !== undefined) {
      querySet = querySet.wrap(querySet.builder.limit(count));
    }

    return querySet.toList();
  }

  /**
   * Stream the stored documents, without decoding them.
   */
  public async *values(): AsyncGenerator<Document> {
    const cursor = this.openCursor();

    try {
      for await (const document of cursor) {
        yield document;
      }
    } finally {
      await cursor.close();
    }
  }

  public async *[Symbol.asyncIterator](): AsyncGenerator<TModel> {
    const fields = this.dereferencePaths(undefined);
    const cursor = this.openCursor();

    try {
      for await (const document of cursor) {
        const model = this.codec.decode(document, this.definition);

        if (fields !== false) {
          await dereference(model, { fields });
        }

        yield model;
      }
    } finally {
      await cursor.close();
    }
  }

  /**
   * Run an aggregation whose pipeline starts with the query filter, sort,
   * skip, limit and projection, followed by the given stages.
   */
  public async *aggregate(...stages: Document[]): AsyncGenerator<Document> {
    const pipeline: Document[] = [];
    const { filter, sort, skip, projection, collation } = this.spec;
    const limit = effectiveLimit(this.spec);

    if (!isEmpty(filter)) pipeline.push({ $match: filter });
    if (sort.length > 0) pipeline.push({ $sort: Object.fromEntries(sort) });
    if (skip !== undefined) pipeline.push({ $skip: skip });
    if (limit !== undefined) pipeline.push({ $limit: limit });
    if (projection) pipeline.push({ $project: projection });

    pipeline.push(...stages);

    logQuery("aggregate", this.collection.collectionName, pipeline);

    const cursor = this.collection.aggregate(pipeline, collation ? { collation } : {});

    try {
      for await (const document of cursor) {
        yield document;
      }
    } finally {
      await cursor.close();
    }
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Apply an update to every matching document.
   *
   * @returns number of modified documents
   * @throws {QueryTranslationError} when the update does not fit the schema
   */
  public async update(modifications: UpdateExpression, options: UpdateOptions = {}): Promise<number> {
    const update = new UpdateTranslator(this.definition).translate(modifications);

    logQuery("updateMany", this.collection.collectionName, { filter: this.spec.filter, update });

    const result = await this.collection.updateMany(this.spec.filter, update, {
      upsert: options.upsert === true,
      collation: this.spec.collation,
    });

    return result.modifiedCount;
  }

  /**
   * Delete every matching document, applying the delete rules registered for
   * the model.
   *
   * @returns number of deleted documents of this model
   * @throws {OperationError} when a `deny` rule has referencing documents
   */
  public async delete(): Promise<number> {
    const rules = getDeleteRules(this.definition);
    const collation = this.spec.collation;

    if (rules.length === 0) {
      logQuery("deleteMany", this.collection.collectionName, this.spec.filter);

      return this.collection.deleteMany(this.spec.filter, { collation });
    }

    // skip, limit and sort never narrow a delete
    const matching = this.wrap(
      new QueryBuilder(
        this.definition,
        Object.freeze({
          ...EMPTY_QUERY_SPEC,
          filter: this.spec.filter,
          rawOverride: this.spec.rawOverride,
          collation,
        }),
      ),
    );

    if ((await matching.count()) === 0) return 0;

    const ids: unknown[] = [];

    for await (const document of matching.project({ _id: 1 }).values()) {
      ids.push(document._id);
    }

    for (const rule of rules) {
      if (rule.rule !== DeleteRule.Deny) continue;

      if (await this.referencing(rule, ids).exists()) {
        throw new OperationError(
          `Cannot delete ${this.definition.name}: ${rule.related.name}.${rule.fieldName} still references it.`,
        );
      }
    }

    const filter = { _id: { $in: ids } };

    logQuery("deleteMany", this.collection.collectionName, filter);

    const deleted = await this.collection.deleteMany(filter, { collation });

    for (const rule of rules) {
      await this.applyDeleteRule(rule, ids);
    }

    return deleted;
  }

  /**
   * Build and insert a new instance.
   */
  public async create(data: Record<string, unknown> = {}): Promise<TModel> {
    const model = this.definition.create(data);

    await new DatabaseWriter(model, definition => this.collectionFor(definition)).save({
      forceInsert: true,
    });

    return model;
  }

  /**
   * Insert many instances with one round trip.
   *
   * Every instance is encoded (and checked) before anything is written; the
   * generated ids are assigned back in input order.
   */
  public async bulkCreate(models: TModel[]): Promise<TModel[]> {
    const documents = models.map(model => {
      if (model.definition !== this.definition) {
        throw new OperationError(
          `Cannot insert a ${model.definition.name} into the ${this.definition.name} collection.`,
        );
      }

      return this.codec.encode(model);
    });

    if (documents.length === 0) return models;

    logQuery("insertMany", this.collection.collectionName, { count: documents.length });

    const ids = await this.collection.insertMany(documents);
    const primaryKey = this.definition.primaryKey.field;

    models.forEach((model, index) => {
      model.pk = primaryKey.fromMongo(ids[index]);
    });

    return models;
  }

  /**
   * Create the declared indexes and the unique field indexes.
   *
   * @returns the index names, empty (without a round trip) when the model
   * declares none
   */
  public async createIndexes(): Promise<string[]> {
    const descriptions = this.definition.indexDescriptions();

    if (descriptions.length === 0) return [];

    const names = await this.collection.createIndexes(descriptions);

    log.success(
      "database.mongodb",
      "indexes",
      `${colors.yellowBright(this.collection.collectionName)}: ${names.map(name => colors.cyan(name)).join(", ")}`,
    );

    return names;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private wrap(builder: QueryBuilder<TModel>): QuerySet<TModel> {
    return new QuerySet(builder, this.collection);
  }

  private openCursor(): DocumentCursor {
    logQuery("find", this.collection.collectionName, this.spec.filter);

    return this.collection.find(this.spec.filter, toFindOptions(this.spec));
  }

  /**
   * Reference paths to resolve after loading, or `false` for none.
   */
  private dereferencePaths(option: ToListOptions["dereference"]): string[] | undefined | false {
    if (option === false) return false;
    if (Array.isArray(option)) return option.length > 0 ? option : undefined;
    if (option === true) return undefined;

    const selected = this.spec.selectRelated;

    if (!selected) return false;

    return selected.length > 0 ? [...selected] : undefined;
  }

  private collectionFor(definition: ModelDefinition): CollectionHandle {
    return definition === this.definition ? this.collection : resolveCollection(definition);
  }

  private referencing(rule: DeleteRuleEntry, ids: unknown[]): QuerySet {
    const wireName = this.wireNameOf(rule);

    return querySetFor(rule.related).raw({ [wireName]: { $in: ids } });
  }

  private async applyDeleteRule(rule: DeleteRuleEntry, ids: unknown[]): Promise<void> {
    const wireName = this.wireNameOf(rule);
    const filter = { [wireName]: { $in: ids } };
    const related = resolveCollection(rule.related);

    if (rule.rule === DeleteRule.Cascade) {
      const deleted = await this.referencing(rule, ids).delete();

      if (deleted > 0) {
        log.info(
          "database.query",
          "cascade",
          `Deleted ${colors.yellowBright(String(deleted))} ${colors.cyan(rule.related.name)} referencing ${this.definition.name}`,
        );
      }

      return;
    }

    if (rule.rule === DeleteRule.Nullify) {
      logQuery("updateMany", related.collectionName, filter);
      await related.updateMany(filter, { $unset: { [wireName]: "" } });
      return;
    }

    if (rule.rule === DeleteRule.Pull) {
      logQuery("updateMany", related.collectionName, filter);
      await related.updateMany(filter, { $pull: { [wireName]: { $in: ids } } });
    }
  }

  private wireNameOf(rule: DeleteRuleEntry): string {
    const entry = rule.related.field(rule.fieldName);

    return entry ? entry.wireName : rule.fieldName;
  }
}

/**
 * Query set over every document of a model, bound to the collection of its
 * data source.
 */
export function querySetFor<TModel extends Model>(definition: ModelDefinition<TModel>): QuerySet<TModel> {
  return new QuerySet(new QueryBuilder(definition), resolveCollection(definition));
}
