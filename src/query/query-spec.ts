import type { CollationOptions, Document, FindOptions } from "mongodb";

export type SortDirection = 1 | -1;

/**
 * Everything a query carries before it is run.
 *
 * Specs are frozen; every builder operation produces a new one.
 */
export type QuerySpec = Readonly<{
  /** Translated filter document. */
  filter: Document;
  /** Whether `filter` was given verbatim through `raw()`. */
  rawOverride: boolean;
  projection?: Document;
  /** Ordered stored paths and directions. */
  sort: ReadonlyArray<readonly [string, SortDirection]>;
  skip?: number;
  limit?: number;
  collation?: CollationOptions;
  /** Reference paths to resolve on iteration; empty means all of them. */
  selectRelated?: readonly string[];
}>;

export const EMPTY_QUERY_SPEC: QuerySpec = Object.freeze({
  filter: Object.freeze({}),
  rawOverride: false,
  sort: Object.freeze([]),
});

/**
 * The limit to send to storage; `0` means "no limit" and is left out.
 */
export function effectiveLimit(spec: QuerySpec): number | undefined {
  return spec.limit === 0 ? undefined : spec.limit;
}

/**
 * Driver options of a find for the given spec.
 */
export function toFindOptions(spec: QuerySpec): FindOptions {
  const options: FindOptions = {};

  if (spec.projection) options.projection = spec.projection;
  if (spec.sort.length > 0) {
    const sort: Array<[string, SortDirection]> = spec.sort.map(
      ([path, direction]): [string, SortDirection] => [path, direction],
    );
    options.sort = sort;
  }
  if (spec.skip !== undefined) options.skip = spec.skip;
  const limit = effectiveLimit(spec);

  if (limit !== undefined) options.limit = limit;
  if (spec.collation) options.collation = spec.collation;

  return options;
}
