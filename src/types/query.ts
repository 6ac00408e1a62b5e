/**
 * Structured query types for the `:runQuery` endpoint.
 */

import type { WireValue } from "./wire.js";

/**
 * Reference to a field in a document.
 */
export interface FieldReference {
  /** Field path using dot notation (e.g., "settings.timezone") */
  fieldPath: string;
}

/**
 * Field filter - compares a field to a value.
 */
export interface FieldFilter {
  fieldFilter: {
    field: FieldReference;
    op: "EQUAL";
    value: WireValue;
  };
}

/**
 * Composite filter - combines field filters.
 */
export interface CompositeFilter {
  compositeFilter: {
    op: "AND";
    filters: FieldFilter[];
  };
}

export type QueryFilter = FieldFilter | CompositeFilter;

/**
 * Collection selector.
 */
export interface CollectionSelector {
  collectionId: string;
  allDescendants?: boolean;
}

/**
 * Structured query.
 */
export interface StructuredQuery {
  from: CollectionSelector[];
  where?: QueryFilter;
  limit?: number;
  offset?: number;
}

/**
 * Request body of `:runQuery`.
 */
export interface RunQueryRequest {
  structuredQuery: StructuredQuery;
}
