/**
 * Wire Format Conversion for Firestore
 *
 * Converts between generic documents and the Firestore REST API typed-wrapper
 * JSON format. Both directions are pure and perform no I/O.
 */

import { z } from "zod";
import { FormatError, UnsupportedValueError } from "../error/index.js";
import { Timestamp, type DocumentData, type DocumentValue } from "../types/document.js";
import type { WireDocument, WireValue } from "../types/wire.js";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Envelope of a document resource as received from the API. Field values are
 * checked while they are unwrapped.
 */
const wireDocumentSchema = z
  .object({
    name: z.string().optional(),
    fields: z.record(z.unknown()).optional(),
    createTime: z.string().optional(),
    updateTime: z.string().optional(),
  })
  .passthrough();

/**
 * Document resource after envelope validation.
 */
export type ParsedWireDocument = z.infer<typeof wireDocumentSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function joinPath(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

// Keys such as "__proto__" must land as own properties
function setField<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function describe(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

// ============================================================================
// To wire
// ============================================================================

function encodeValue(value: unknown, path: string): WireValue {
  if (value === null) {
    return { nullValue: null };
  }

  switch (typeof value) {
    case "boolean":
      return { booleanValue: value };

    case "bigint":
      if (value < INT64_MIN || value > INT64_MAX) {
        throw new UnsupportedValueError(`Integer ${value} is outside the 64-bit range`, path);
      }
      return { integerValue: value.toString() };

    case "number":
      if (Number.isNaN(value)) return { doubleValue: "NaN" };
      if (value === Infinity) return { doubleValue: "Infinity" };
      if (value === -Infinity) return { doubleValue: "-Infinity" };
      return { doubleValue: value };

    case "string":
      return { stringValue: value };

    default:
      break;
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new UnsupportedValueError("Invalid Date", path);
    }
    return { timestampValue: value.toISOString() };
  }

  if (value instanceof Timestamp) {
    return { timestampValue: value.toRFC3339() };
  }

  if (Array.isArray(value)) {
    return {
      arrayValue: {
        values: value.map((item: unknown, index) => encodeValue(item, `${path}[${index}]`)),
      },
    };
  }

  if (isPlainObject(value)) {
    return { mapValue: { fields: encodeFields(value, path) } };
  }

  throw new UnsupportedValueError(`Cannot convert ${describe(value)} to a Firestore value`, path);
}

function encodeFields(data: Record<string, unknown>, path: string): Record<string, WireValue> {
  const fields: Record<string, WireValue> = {};
  for (const [key, value] of Object.entries(data)) {
    // Absent optionals are left out rather than stored as null
    if (value === undefined) continue;
    setField(fields, key, encodeValue(value, joinPath(path, key)));
  }
  return fields;
}

/**
 * Convert a document value to its wire wrapper.
 * @throws {UnsupportedValueError} For runtime values outside DocumentValue
 */
export function toWireValue(value: DocumentValue): WireValue {
  return encodeValue(value, "");
}

/**
 * Convert a document to the REST `{ fields }` body.
 */
export function toWireDocument(data: DocumentData): WireDocument {
  return { fields: encodeFields(data, "") };
}

// ============================================================================
// From wire
// ============================================================================

/**
 * Check that a value only contains kinds DocumentValue can hold.
 */
function isDocumentValue(value: unknown): value is DocumentValue {
  if (value === null) return true;
  switch (typeof value) {
    case "boolean":
    case "bigint":
    case "number":
    case "string":
      return true;
    default:
      break;
  }
  if (value instanceof Date || value instanceof Timestamp) return true;
  if (Array.isArray(value)) return value.every((item: unknown) => isDocumentValue(item));
  if (isPlainObject(value)) return Object.values(value).every((item) => isDocumentValue(item));
  return false;
}

function malformed(kind: string, path: string, payload: unknown): FormatError {
  const where = path ? ` at field "${path}"` : "";
  return new FormatError(`Malformed ${kind}${where}: ${JSON.stringify(payload) ?? String(payload)}`);
}

function decodeValue(wrapped: unknown, path: string): DocumentValue {
  if (!isRecord(wrapped)) {
    throw malformed("wire value", path, wrapped);
  }

  if ("nullValue" in wrapped) {
    return null;
  }

  if ("booleanValue" in wrapped) {
    const payload = wrapped.booleanValue;
    if (typeof payload !== "boolean") throw malformed("booleanValue", path, payload);
    return payload;
  }

  if ("integerValue" in wrapped) {
    const payload = wrapped.integerValue;
    let integer: bigint | undefined;
    if (typeof payload === "string" && INTEGER_PATTERN.test(payload)) {
      integer = BigInt(payload);
    } else if (typeof payload === "number" && Number.isSafeInteger(payload)) {
      integer = BigInt(payload);
    }
    if (integer === undefined || integer < INT64_MIN || integer > INT64_MAX) {
      throw malformed("integerValue", path, payload);
    }
    return integer;
  }

  if ("doubleValue" in wrapped) {
    const payload = wrapped.doubleValue;
    if (typeof payload === "number") return payload;
    if (payload === "NaN") return NaN;
    if (payload === "Infinity") return Infinity;
    if (payload === "-Infinity") return -Infinity;
    throw malformed("doubleValue", path, payload);
  }

  if ("stringValue" in wrapped) {
    const payload = wrapped.stringValue;
    if (typeof payload !== "string") throw malformed("stringValue", path, payload);
    return payload;
  }

  if ("timestampValue" in wrapped) {
    const payload = wrapped.timestampValue;
    const timestamp = typeof payload === "string" ? Timestamp.parse(payload) : null;
    if (timestamp === null) throw malformed("timestampValue", path, payload);
    return timestamp;
  }

  if ("arrayValue" in wrapped) {
    const payload = wrapped.arrayValue;
    if (!isRecord(payload)) throw malformed("arrayValue", path, payload);
    const values = payload.values;
    if (values === undefined) return [];
    if (!Array.isArray(values)) throw malformed("arrayValue", path, payload);
    return values.map((item: unknown, index) => decodeValue(item, `${path}[${index}]`));
  }

  if ("mapValue" in wrapped) {
    const payload = wrapped.mapValue;
    if (!isRecord(payload)) throw malformed("mapValue", path, payload);
    const fields = payload.fields;
    if (fields === undefined) return {};
    if (!isRecord(fields)) throw malformed("mapValue", path, payload);
    return decodeFields(fields, path);
  }

  // Unknown wrapper (geoPointValue, referenceValue, ...): pass through as-is
  if (isDocumentValue(wrapped)) {
    return wrapped;
  }
  throw malformed("wire value", path, wrapped);
}

function decodeFields(fields: Record<string, unknown>, path: string): DocumentData {
  const result: DocumentData = {};
  for (const [key, value] of Object.entries(fields)) {
    setField(result, key, decodeValue(value, joinPath(path, key)));
  }
  return result;
}

/**
 * Convert a wire wrapper back to a document value.
 * @throws {FormatError} When a known discriminator carries an invalid payload
 */
export function fromWireValue(wrapped: WireValue | Record<string, unknown>): DocumentValue {
  return decodeValue(wrapped, "");
}

/**
 * Convert a document resource to a flat document. The last segment of
 * `name`, when present, becomes the `id` field.
 */
export function fromWireDocument(wire: WireDocument | ParsedWireDocument): DocumentData {
  const result: DocumentData = wire.fields ? decodeFields(wire.fields, "") : {};

  if (wire.name) {
    const segments = wire.name.split("/");
    const id = segments[segments.length - 1];
    if (id) {
      result.id = id;
    }
  }

  return result;
}

/**
 * Validate the envelope of a document resource.
 * @throws {FormatError} When the value is not a document resource
 */
export function parseWireDocument(json: unknown, body?: string): ParsedWireDocument {
  const parsed = wireDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new FormatError(`Malformed document resource: ${parsed.error.message}`, {
      body,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Parse a JSON response body.
 * @throws {FormatError} When the body is not JSON
 */
export function parseJsonBody(body: string): unknown {
  try {
    const json: unknown = JSON.parse(body);
    return json;
  } catch (error) {
    throw new FormatError("Response body is not valid JSON", { body, cause: error });
  }
}
