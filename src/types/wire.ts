/**
 * Firestore REST wire format.
 *
 * Every value is wrapped in a one-key object naming its type.
 */

/**
 * Typed-wrapper value (REST API format).
 */
export type WireValue =
  | { nullValue: null }
  | { booleanValue: boolean }
  | { integerValue: string }
  | { doubleValue: number | "NaN" | "Infinity" | "-Infinity" }
  | { stringValue: string }
  | { timestampValue: string }
  | { arrayValue: { values?: WireValue[] } }
  | { mapValue: { fields?: Record<string, WireValue> } };

/**
 * Document resource (REST API format).
 */
export interface WireDocument {
  /** projects/{p}/databases/{d}/documents/{path}, present on responses */
  name?: string;
  fields?: Record<string, WireValue>;
  createTime?: string;
  updateTime?: string;
}
