/**
 * HTTP Transport Layer for Firestore
 *
 * Provides HTTP request/response handling for Firestore REST API operations.
 * Firestore uses REST API at https://firestore.googleapis.com/v1/
 */

import { CancelledError, NetworkError } from "../error/index.js";
import type { FirestoreConfig } from "../config/index.js";

/**
 * HTTP request.
 */
export interface HttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** Timeout in milliseconds, overriding the transport default */
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * HTTP response.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  /**
   * Send an HTTP request.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Production Firestore REST endpoint.
 */
export const FIRESTORE_API_BASE = "https://firestore.googleapis.com/v1";

/**
 * Check if HTTP status indicates success.
 * @returns True if status is in 2xx range
 */
export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Get a header value (case-insensitive).
 */
export function getHeader(response: HttpResponse, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Collect the message and system error code of a failed fetch. Node's fetch
 * reports "fetch failed" and keeps the socket error in `cause`.
 */
function failureText(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    parts.push(current.message);
    if ("code" in current && typeof current.code === "string") {
      parts.push(current.code);
    }
    current = current.cause;
  }
  return parts.length > 0 ? parts.join(": ") : String(error);
}

/**
 * Map a fetch failure to a NetworkError.
 */
export function mapFetchError(error: unknown): NetworkError {
  const text = failureText(error);
  if (text.includes("ENOTFOUND") || text.includes("EAI_AGAIN") || text.includes("DNS")) {
    return new NetworkError(`DNS resolution failed: ${text}`, "DnsResolutionFailed", { cause: error });
  }
  if (text.includes("ECONNREFUSED") || text.includes("ECONNRESET")) {
    return new NetworkError(`Connection failed: ${text}`, "ConnectionFailed", { cause: error });
  }
  if (text.includes("TLS") || text.includes("SSL") || text.includes("CERT")) {
    return new NetworkError(`TLS error: ${text}`, "TlsError", { cause: error });
  }
  return new NetworkError(text, "ConnectionFailed", { cause: error });
}

/**
 * Fetch-based HTTP transport for Firestore.
 * Handles timeout and caller cancellation via AbortController.
 */
export class FetchTransport implements HttpTransport {
  private defaultTimeout: number;

  /**
   * Create a new FetchTransport.
   * @param defaultTimeout - Default timeout in milliseconds (default: 60000)
   */
  constructor(defaultTimeout: number = 60000) {
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Send an HTTP request.
   * @throws {CancelledError} If the request's signal fires
   * @throws {NetworkError} If the request fails or times out
   */
  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;
    const callerSignal = request.signal;

    if (callerSignal?.aborted) {
      throw new CancelledError("Request cancelled before it was sent", {
        cause: callerSignal.reason,
      });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onAbort = (): void => controller.abort();
    callerSignal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      // Convert headers to plain object
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      const responseBody = await response.text();

      return {
        status: response.status,
        headers,
        body: responseBody,
      };
    } catch (error) {
      if (callerSignal?.aborted) {
        throw new CancelledError("Request cancelled", { cause: error });
      }
      if (timedOut) {
        throw new NetworkError(`Request timeout after ${timeout}ms`, "Timeout", { cause: error });
      }
      throw mapFetchError(error);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onAbort);
    }
  }
}

/**
 * Create a fetch-based transport.
 * @param timeout - Optional timeout in milliseconds
 */
export function createTransport(timeout?: number): HttpTransport {
  return new FetchTransport(timeout);
}

/**
 * Connection settings the URL helpers need.
 */
export type EndpointConfig = Pick<FirestoreConfig, "projectId" | "databaseId" | "emulatorHost">;

function encodePath(path: string): string {
  return path
    .split("/")
    .map((segment) => encodeURIComponent(segment))
    .join("/");
}

/**
 * Build the documents root URL.
 * Format: {base}/projects/{projectId}/databases/{databaseId}/documents
 *
 * The emulator is reached over plain HTTP at `http://{emulatorHost}/v1`.
 */
export function buildDocumentsUrl(config: EndpointConfig): string {
  const base = config.emulatorHost ? `http://${config.emulatorHost}/v1` : FIRESTORE_API_BASE;
  return `${base}/projects/${encodeURIComponent(config.projectId)}/databases/${encodeURIComponent(
    config.databaseId
  )}/documents`;
}

/**
 * Build the URL of a collection.
 * @param collection - Collection path (may include subcollections)
 */
export function buildCollectionUrl(config: EndpointConfig, collection: string): string {
  return `${buildDocumentsUrl(config)}/${encodePath(collection)}`;
}

/**
 * Build the URL of a single document.
 */
export function buildDocumentUrl(config: EndpointConfig, collection: string, documentId: string): string {
  return `${buildCollectionUrl(config, collection)}/${encodeURIComponent(documentId)}`;
}

/**
 * Build the `:runQuery` URL for a collection. A top-level collection is
 * queried from the documents root; a subcollection from its owning document.
 */
export function buildRunQueryUrl(config: EndpointConfig, collection: string): string {
  const segments = collection.split("/");
  const parent = segments.slice(0, -1).join("/");
  const documentsUrl = buildDocumentsUrl(config);
  return parent ? `${documentsUrl}/${encodePath(parent)}:runQuery` : `${documentsUrl}:runQuery`;
}

/**
 * Add query parameters to URL.
 */
export function addQueryParams(url: string, params: Record<string, string | undefined>): string {
  const urlObj = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      urlObj.searchParams.set(key, value);
    }
  }
  return urlObj.toString();
}

/**
 * Add authorization header to request.
 */
export function withAuthorization(request: HttpRequest, accessToken: string): HttpRequest {
  return {
    ...request,
    headers: {
      ...request.headers,
      Authorization: `Bearer ${accessToken}`,
    },
  };
}
