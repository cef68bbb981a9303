import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { DocumentCodec } from "../codec/document-codec";
import { getBrokenReferencePolicy } from "../config";
import type { CollectionHandle } from "../contracts";
import { resolveCollection as resolveDefaultCollection } from "../data-source/resolve-collection";
import { BrokenReferenceError } from "../errors/broken-reference.error";
import { EmbeddedDocumentField } from "../fields/embedded-document-field";
import { ListField } from "../fields/list-field";
import { ReferenceField } from "../fields/reference-field";
import { Model } from "../model/model";
import { ModelDefinition } from "../model/model-definition";
import type { ModelClassLike } from "../model/types";
import { logQuery } from "../utils/log-query";
import { BrokenReference } from "./broken-reference";
import { referenceKey } from "./reference-key";

export type DereferenceOptions = {
  /**
   * Dotted paths of the reference fields to resolve, e.g. `wrapper.comments`.
   * Every reference is resolved when omitted.
   */
  fields?: readonly string[];
  /**
   * Raise `BrokenReferenceError` for missing targets instead of putting a
   * `BrokenReference` in the field.
   * @default the `brokenReferences` configuration
   */
  strict?: boolean;
  /**
   * Collection lookup of referenced models
   * @default the model data source collection
   */
  resolveCollection?: (definition: ModelDefinition) => CollectionHandle;
};

type PendingGroup = {
  definition: ModelDefinition;
  /** Stored ids keyed by `referenceKey()`. */
  ids: Map<string, unknown>;
  /** Assignments waiting for each id. */
  assignments: Map<string, Array<(value: unknown) => void>>;
};

type ResolvedGroup = {
  group: PendingGroup;
  found: Map<string, Model>;
};

function toModelList(target: Model | readonly Model[]): readonly Model[] {
  return target instanceof Model ? [target] : target;
}

/**
 * Collects the unresolved references of a set of instances, grouped by
 * referenced model.
 */
class ReferenceCollector {
  public readonly groups = new Map<ModelDefinition, PendingGroup>();

  public constructor(private readonly fields?: readonly string[]) {}

  public collect(model: Model, prefix = ""): void {
    for (const [name, field] of model.definition.fields) {
      const path = prefix ? `${prefix}.${name}` : name;

      if (!this.isSelected(path) && !this.leadsToSelection(path)) continue;

      const value = model.getValue(name);

      if (field instanceof ReferenceField) {
        this.add(field, value, resolved => model.setValue(name, resolved));
        continue;
      }

      if (field instanceof EmbeddedDocumentField) {
        if (value instanceof Model) this.collect(value, path);
        continue;
      }

      if (!(field instanceof ListField) || !Array.isArray(value)) continue;

      const inner = field.inner;
      const list: unknown[] = value;

      list.forEach((element, index) => {
        if (inner instanceof ReferenceField) {
          this.add(inner, element, resolved => {
            list[index] = resolved;
          });
        } else if (inner instanceof EmbeddedDocumentField && element instanceof Model) {
          this.collect(element, path);
        }
      });
    }
  }

  private isSelected(path: string): boolean {
    if (!this.fields) return true;

    return this.fields.some(field => path === field || path.startsWith(`${field}.`));
  }

  private leadsToSelection(path: string): boolean {
    return this.fields !== undefined && this.fields.some(field => field.startsWith(`${path}.`));
  }

  private add(field: ReferenceField, value: unknown, assign: (value: unknown) => void): void {
    // already resolved, broken or missing
    if (value === undefined || value === null) return;
    if (value instanceof Model || value instanceof BrokenReference) return;

    const definition = field.target;
    const stored = definition.primaryKey.field.toQueryValue(value);
    const id = stored === undefined ? value : stored;
    const key = referenceKey(id);

    let group = this.groups.get(definition);

    if (!group) {
      group = { definition, ids: new Map(), assignments: new Map() };
      this.groups.set(definition, group);
    }

    group.ids.set(key, id);

    const assignments = group.assignments.get(key);

    if (assignments) {
      assignments.push(assign);
    } else {
      group.assignments.set(key, [assign]);
    }
  }
}

async function lookup(
  group: PendingGroup,
  collection: CollectionHandle,
  codec: DocumentCodec,
): Promise<Map<string, Model>> {
  const found = new Map<string, Model>();
  const filter = { _id: { $in: Array.from(group.ids.values()) } };

  logQuery("dereference", collection.collectionName, filter);

  const cursor = collection.find(filter);

  try {
    for await (const document of cursor) {
      found.set(referenceKey(document._id), codec.decode(document, group.definition));
    }
  } finally {
    await cursor.close();
  }

  return found;
}

/**
 * Replace the stored keys held by reference fields with the referenced
 * instances.
 *
 * References are collected from the whole input first (through lists,
 * embedded documents and lists of embedded documents), then each referenced
 * model is queried once with `{ _id: { $in: ids } }`. Equal ids share the same
 * resolved instance. Instances are mutated in place.
 *
 * @throws {BrokenReferenceError} in strict mode, before any field is changed
 *
 * @example
 * ```typescript
 * const posts = await Post.objects.toList();
 * await dereference(posts, { fields: ["author"] });
 * ```
 */
export async function dereference<TTarget extends Model | readonly Model[]>(
  target: TTarget,
  options: DereferenceOptions = {},
): Promise<TTarget> {
  const collector = new ReferenceCollector(options.fields);

  for (const model of toModelList(target)) {
    collector.collect(model);
  }

  if (collector.groups.size === 0) return target;

  const strict = options.strict ?? getBrokenReferencePolicy() === "strict";
  const resolveCollection = options.resolveCollection || resolveDefaultCollection;
  const codec = new DocumentCodec();
  const resolved: ResolvedGroup[] = [];

  for (const group of collector.groups.values()) {
    const found = await lookup(group, resolveCollection(group.definition), codec);

    if (strict) {
      for (const [key, id] of group.ids) {
        if (!found.has(key)) {
          throw new BrokenReferenceError(group.definition.name, id);
        }
      }
    }

    resolved.push({ group, found });
  }

  for (const { group, found } of resolved) {
    for (const [key, assignments] of group.assignments) {
      let value: Model | BrokenReference | undefined = found.get(key);

      if (!value) {
        const id = group.ids.get(key);

        log.warn(
          "database.query",
          "dereference",
          `${colors.yellow(group.definition.name)} ${colors.gray(String(id))} no longer exists`,
        );

        value = new BrokenReference(group.definition.name, id);
      }

      for (const assign of assignments) {
        assign(value);
      }
    }
  }

  return target;
}

/**
 * Load one document by primary key.
 *
 * @returns the instance, or `null` when nothing matches
 */
export async function dereferenceId<TModel extends Model>(
  model: ModelClassLike<TModel> | ModelDefinition<TModel>,
  id: unknown,
  resolveCollection: (definition: ModelDefinition) => CollectionHandle = resolveDefaultCollection,
): Promise<TModel | null> {
  const definition = model instanceof ModelDefinition ? model : model.definition;
  const stored = definition.primaryKey.field.toQueryValue(id);
  const filter = { _id: stored === undefined ? id : stored };
  const collection = resolveCollection(definition);

  logQuery("findOne", collection.collectionName, filter);

  const document = await collection.findOne(filter);

  return document ? new DocumentCodec().decode(document, definition) : null;
}
