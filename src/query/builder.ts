/**
 * Structured query construction for Firestore equality queries.
 *
 * Builds the `:runQuery` request body from a collection path and a set of
 * field equality filters. Filters are ANDed together in insertion order.
 */

import { InvalidArgumentError } from "../error/index.js";
import { toWireValue } from "../transport/wire-convert.js";
import type {
  DocumentValue,
  EqualityFilters,
  FieldFilter,
  QueryFilter,
  RunQueryRequest,
  StructuredQuery,
} from "../types/index.js";

/**
 * Options accepted by {@link buildStructuredQuery}.
 */
export interface QueryOptions {
  /** Field path to expected value; every entry must match */
  where?: EqualityFilters;
  /** Maximum number of results */
  limit?: number;
  /** Number of results to skip */
  offset?: number;
}

/**
 * Create an equality filter on a single field.
 */
export function equalityFilter(fieldPath: string, value: DocumentValue): FieldFilter {
  return {
    fieldFilter: {
      field: { fieldPath },
      op: "EQUAL",
      value: toWireValue(value),
    },
  };
}

/**
 * Combine equality filters.
 *
 * A single filter is sent unwrapped; two or more are wrapped in a composite
 * AND. No filters yields undefined.
 */
export function combineFilters(filters: FieldFilter[]): QueryFilter | undefined {
  if (filters.length === 0) {
    return undefined;
  }
  if (filters.length === 1) {
    return filters[0];
  }
  return {
    compositeFilter: {
      op: "AND",
      filters,
    },
  };
}

function checkCount(name: "limit" | "offset", value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer (got ${value})`, {
      argumentName: name,
    });
  }
}

/**
 * Build the `:runQuery` request body for a collection.
 *
 * @param collection - Collection path; only its last segment is the collection ID
 * @throws {InvalidArgumentError} If limit or offset is not a non-negative integer
 *
 * @example
 * ```typescript
 * buildStructuredQuery("users", { where: { familyId: "f1" }, limit: 10 });
 * // { structuredQuery: { from: [{ collectionId: "users" }],
 * //   where: { fieldFilter: { field: { fieldPath: "familyId" }, op: "EQUAL",
 * //   value: { stringValue: "f1" } } }, limit: 10 } }
 * ```
 */
export function buildStructuredQuery(collection: string, options: QueryOptions = {}): RunQueryRequest {
  const segments = collection.split("/");
  const collectionId = segments[segments.length - 1] ?? collection;

  const structuredQuery: StructuredQuery = {
    from: [{ collectionId }],
  };

  const filters = Object.entries(options.where ?? {}).map(([fieldPath, value]) =>
    equalityFilter(fieldPath, value)
  );
  const where = combineFilters(filters);
  if (where) {
    structuredQuery.where = where;
  }

  if (options.limit !== undefined) {
    checkCount("limit", options.limit);
    structuredQuery.limit = options.limit;
  }

  if (options.offset !== undefined) {
    checkCount("offset", options.offset);
    structuredQuery.offset = options.offset;
  }

  return { structuredQuery };
}
