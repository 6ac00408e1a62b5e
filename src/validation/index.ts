/**
 * Path validation for Firestore collections and documents.
 *
 * Firestore rules enforced here:
 * - Collection paths have an odd number of non-empty segments
 *   (`users`, `families/f1/members`)
 * - Document IDs are 1-1500 bytes of UTF-8
 * - Document IDs cannot be "." or ".."
 * - Document IDs cannot match `__.*__` (reserved)
 * - Document IDs cannot contain "/" (would address a subcollection)
 */

import { InvalidArgumentError } from "../error/index.js";

/**
 * Reserved document IDs that cannot be used.
 */
const RESERVED_IDS = new Set([".", ".."]);

/**
 * Reserved pattern for system-managed documents.
 */
const RESERVED_PATTERN = /^__.*__$/;

/**
 * Maximum document ID length in bytes.
 */
export const MAX_DOCUMENT_ID_BYTES = 1500;

const encoder = new TextEncoder();

/**
 * Validate a document ID according to Firestore rules.
 *
 * @throws {InvalidArgumentError} If the document ID is invalid
 *
 * @example
 * ```typescript
 * validateDocumentId("user123"); // Valid
 * validateDocumentId(""); // Throws: Document ID cannot be empty
 * validateDocumentId("__stats__"); // Throws: reserved
 * validateDocumentId("users/123"); // Throws: Cannot contain /
 * ```
 */
export function validateDocumentId(id: string): void {
  if (!id) {
    throw new InvalidArgumentError("Document ID cannot be empty", {
      argumentName: "documentId",
    });
  }

  const byteLength = encoder.encode(id).length;
  if (byteLength > MAX_DOCUMENT_ID_BYTES) {
    throw new InvalidArgumentError(
      `Document ID exceeds maximum length of ${MAX_DOCUMENT_ID_BYTES} bytes (got ${byteLength})`,
      { argumentName: "documentId" }
    );
  }

  if (RESERVED_IDS.has(id)) {
    throw new InvalidArgumentError(`Document ID "${id}" is reserved and cannot be used`, {
      argumentName: "documentId",
    });
  }

  if (RESERVED_PATTERN.test(id)) {
    throw new InvalidArgumentError(
      `Document ID "${id}" matches the reserved pattern __.*__`,
      { argumentName: "documentId" }
    );
  }

  if (id.includes("/")) {
    throw new InvalidArgumentError(
      'Document ID cannot contain "/" character (use collection paths for subcollections)',
      { argumentName: "documentId" }
    );
  }
}

/**
 * Validate a collection path.
 *
 * @throws {InvalidArgumentError} If the path is empty, has an empty segment,
 * or addresses a document instead of a collection
 */
export function validateCollectionPath(path: string): void {
  if (!path) {
    throw new InvalidArgumentError("Collection path cannot be empty", {
      argumentName: "collection",
    });
  }

  const segments = path.split("/");

  if (segments.some((segment) => segment.length === 0)) {
    throw new InvalidArgumentError(`Collection path "${path}" contains an empty segment`, {
      argumentName: "collection",
    });
  }

  if (segments.length % 2 === 0) {
    throw new InvalidArgumentError(
      `Collection path "${path}" must have an odd number of segments (got ${segments.length})`,
      { argumentName: "collection" }
    );
  }
}

/**
 * Check if a document ID is valid without throwing.
 */
export function isValidDocumentId(id: string): boolean {
  try {
    validateDocumentId(id);
    return true;
  } catch {
    return false;
  }
}

