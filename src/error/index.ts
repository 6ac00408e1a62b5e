/**
 * Firestore Error Types
 *
 * Error hierarchy for the Firestore REST document store. Every failure raised
 * by the client is a {@link FirestoreError}; callers branch on the subclass or
 * on the string `code`.
 */

import { z } from "zod";

/**
 * Base Firestore error class.
 */
export class FirestoreError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "FirestoreError";
    this.code = code;
    Object.setPrototypeOf(this, FirestoreError.prototype);
  }
}

/**
 * Options carried by store-level errors.
 */
export interface StoreErrorOptions {
  /** HTTP status, absent when the transport itself failed */
  status?: number;
  /** Raw response body for diagnostics */
  body?: string;
  /** Firestore status string from the error body, e.g. ALREADY_EXISTS */
  reason?: string;
  /** Client operation that produced the error */
  operation?: string;
  cause?: unknown;
}

/**
 * A Firestore REST call returned a non-2xx status or could not be completed.
 */
export class StoreError extends FirestoreError {
  public readonly status?: number;
  public readonly body?: string;
  public readonly reason?: string;
  public readonly operation?: string;

  constructor(message: string, options: StoreErrorOptions = {}, code: string = "STORE_ERROR") {
    super(message, code, { cause: options.cause });
    this.name = "StoreError";
    this.status = options.status;
    this.body = options.body;
    this.reason = options.reason;
    this.operation = options.operation;
    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

/**
 * Access token acquisition failed.
 */
export class AuthError extends StoreError {
  constructor(message: string, options: StoreErrorOptions = {}) {
    super(message, { operation: "token", ...options }, "AUTH_ERROR");
    this.name = "AuthError";
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

/**
 * Kinds of transport failure.
 */
export type NetworkErrorKind = "Timeout" | "ConnectionFailed" | "DnsResolutionFailed" | "TlsError";

/**
 * The HTTP request never produced a response.
 */
export class NetworkError extends StoreError {
  public readonly kind: NetworkErrorKind;

  constructor(message: string, kind: NetworkErrorKind, options: StoreErrorOptions = {}) {
    super(message, options, "NETWORK_ERROR");
    this.name = "NetworkError";
    this.kind = kind;
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * A response body did not have the expected JSON shape.
 */
export class FormatError extends FirestoreError {
  public readonly body?: string;

  constructor(message: string, options?: { body?: string; cause?: unknown }) {
    super(message, "FORMAT_ERROR", { cause: options?.cause });
    this.name = "FormatError";
    this.body = options?.body;
    Object.setPrototypeOf(this, FormatError.prototype);
  }
}

/**
 * The caller aborted the operation through its AbortSignal.
 */
export class CancelledError extends FirestoreError {
  constructor(message: string = "Operation cancelled", options?: { cause?: unknown }) {
    super(message, "CANCELLED", options);
    this.name = "CancelledError";
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

/**
 * Configuration error.
 */
export class ConfigurationError extends FirestoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIGURATION_ERROR", options);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Invalid argument passed by the caller (bad path, id or query parameter).
 */
export class InvalidArgumentError extends FirestoreError {
  public readonly argumentName?: string;

  constructor(message: string, options?: { argumentName?: string; code?: string }) {
    super(message, options?.code ?? "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
    this.argumentName = options?.argumentName;
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * A document value has no Firestore wire representation.
 */
export class UnsupportedValueError extends InvalidArgumentError {
  public readonly fieldPath: string;

  constructor(message: string, fieldPath: string) {
    super(
      fieldPath ? `${message} (at field "${fieldPath}")` : message,
      { argumentName: "data", code: "UNSUPPORTED_VALUE" }
    );
    this.name = "UnsupportedValueError";
    this.fieldPath = fieldPath;
    Object.setPrototypeOf(this, UnsupportedValueError.prototype);
  }
}

/**
 * A stored document could not be mapped to a domain entity.
 */
export class ModelParseError extends FirestoreError {
  public readonly model: string;

  constructor(model: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to parse ${model} from document: ${message}`, "MODEL_PARSE_ERROR", options);
    this.name = "ModelParseError";
    this.model = model;
    Object.setPrototypeOf(this, ModelParseError.prototype);
  }
}

/**
 * A repository operation failed. `cause` holds the underlying error.
 */
export class RepositoryError extends FirestoreError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, options?.code ?? "REPOSITORY_ERROR", { cause: options?.cause });
    this.name = "RepositoryError";
    Object.setPrototypeOf(this, RepositoryError.prototype);
  }
}

/**
 * An entity with the same ID already exists.
 */
export class ConflictError extends RepositoryError {
  public readonly entityId: string;

  constructor(message: string, entityId: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, code: "CONFLICT" });
    this.name = "ConflictError";
    this.entityId = entityId;
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * The entity to update or delete does not exist.
 */
export class EntityNotFoundError extends RepositoryError {
  public readonly entityId: string;

  constructor(message: string, entityId: string) {
    super(message, { code: "NOT_FOUND" });
    this.name = "EntityNotFoundError";
    this.entityId = entityId;
    Object.setPrototypeOf(this, EntityNotFoundError.prototype);
  }
}

const errorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

/**
 * Parsed Firestore REST error body.
 */
export interface FirestoreErrorBody {
  code?: number;
  message?: string;
  status?: string;
}

/**
 * Parse a Firestore `{"error": {...}}` body.
 * @returns The error payload, or null when the body is not one
 */
export function parseErrorBody(body: string): FirestoreErrorBody | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = errorBodySchema.safeParse(json);
  return parsed.success ? parsed.data.error : null;
}

/**
 * Build the StoreError for a non-2xx Firestore response.
 */
export function mapHttpError(operation: string, status: number, body: string): StoreError {
  const errorBody = parseErrorBody(body);
  const detail = errorBody?.message ?? body;
  const subject = operation === "query" ? "documents" : "document";
  return new StoreError(`Failed to ${operation} ${subject}: ${status} ${detail}`.trimEnd(), {
    status,
    body,
    reason: errorBody?.status,
    operation,
  });
}

/**
 * Check whether an error is the store's conflict response (HTTP 409).
 */
export function isConflictError(error: unknown): error is StoreError {
  return error instanceof StoreError && error.status === 409;
}

/**
 * Check whether an error came from this library.
 */
export function isFirestoreError(error: unknown): error is FirestoreError {
  return error instanceof FirestoreError;
}
