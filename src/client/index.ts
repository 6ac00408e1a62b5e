/**
 * Firestore Client
 *
 * Document CRUD and equality queries over the Firestore REST API. Each
 * operation fetches a bearer token and sends exactly one HTTP request; there
 * is no retry.
 */

import { z } from "zod";
import {
  loadAppConfig,
  logLevelFromAppConfig,
  resolveConfig,
  toFirestoreConfig,
} from "../config/index.js";
import type { Env, FirestoreConfig, MinimalFirestoreConfig } from "../config/index.js";
import { createAuthProvider } from "../credentials/index.js";
import type { AuthProvider } from "../credentials/index.js";
import { FormatError, mapHttpError, StoreError } from "../error/index.js";
import { ConsoleLogger, logError, NoopLogger } from "../logging/index.js";
import type { LogContext, Logger } from "../logging/index.js";
import { buildStructuredQuery } from "../query/builder.js";
import type { QueryOptions } from "../query/builder.js";
import {
  addQueryParams,
  buildCollectionUrl,
  buildDocumentUrl,
  buildRunQueryUrl,
  FetchTransport,
  isSuccess,
  withAuthorization,
} from "../transport/index.js";
import type { HttpResponse, HttpTransport } from "../transport/index.js";
import {
  fromWireDocument,
  parseJsonBody,
  parseWireDocument,
  toWireDocument,
} from "../transport/wire-convert.js";
import type { DocumentData } from "../types/index.js";
import { validateCollectionPath, validateDocumentId } from "../validation/index.js";

/**
 * Options every operation accepts.
 */
export interface OperationOptions {
  /** Aborts the operation with a CancelledError */
  signal?: AbortSignal;
}

export interface CreateDocumentOptions extends OperationOptions {
  /** Explicit document ID; the store assigns one when absent */
  documentId?: string;
}

export interface QueryDocumentsOptions extends QueryOptions, OperationOptions {}

/**
 * Document operations the repositories depend on.
 */
export interface DocumentStore {
  createDocument(
    collection: string,
    data: DocumentData,
    options?: CreateDocumentOptions
  ): Promise<DocumentData>;
  getDocument(collection: string, documentId: string, options?: OperationOptions): Promise<DocumentData | null>;
  queryDocuments(collection: string, options?: QueryDocumentsOptions): Promise<DocumentData[]>;
  updateDocument(
    collection: string,
    documentId: string,
    data: DocumentData,
    options?: OperationOptions
  ): Promise<DocumentData>;
  deleteDocument(collection: string, documentId: string, options?: OperationOptions): Promise<void>;
  documentExists(collection: string, documentId: string, options?: OperationOptions): Promise<boolean>;
}

/**
 * Collaborators of the client. Each defaults to the production one.
 */
export interface FirestoreClientOptions {
  transport?: HttpTransport;
  authProvider?: AuthProvider;
  logger?: Logger;
  /** Clock used for token expiry */
  now?: () => Date;
}

const RunQueryResponseSchema = z.array(
  z
    .object({
      document: z.unknown().optional(),
    })
    .passthrough()
);

interface OutgoingRequest {
  method: "GET" | "POST" | "PATCH" | "DELETE";
  url: string;
  body?: unknown;
}

/**
 * Firestore REST client.
 *
 * @example
 * ```typescript
 * const client = new FirestoreRestClient({
 *   projectId: "my-project",
 *   serviceAccountEmail: "svc@my-project.iam.gserviceaccount.com",
 *   privateKey: process.env.FIREBASE_PRIVATE_KEY ?? "",
 * });
 *
 * const user = await client.createDocument("users", { displayName: "Ada" }, { documentId: "u1" });
 * const members = await client.queryDocuments("users", { where: { familyId: "f1" }, limit: 10 });
 * ```
 */
export class FirestoreRestClient implements DocumentStore {
  private readonly _config: FirestoreConfig;
  private readonly transport: HttpTransport;
  private readonly authProvider: AuthProvider;
  private readonly logger: Logger;

  /**
   * Create a client. No network call is made until the first operation.
   * @throws {ConfigurationError} If the configuration is invalid
   */
  constructor(config: FirestoreConfig | MinimalFirestoreConfig, options: FirestoreClientOptions = {}) {
    this._config = resolveConfig(config);
    this.logger = options.logger ?? new NoopLogger();
    this.transport = options.transport ?? new FetchTransport(this._config.requestTimeoutMs);
    this.authProvider =
      options.authProvider ??
      createAuthProvider(this._config, {
        transport: this.transport,
        logger: this.logger,
        now: options.now,
      });
  }

  /**
   * The resolved configuration.
   */
  get config(): FirestoreConfig {
    return this._config;
  }

  /**
   * Create a document.
   *
   * @param collection - Collection path, e.g. "users" or "families/f1/members"
   * @returns The stored document, with its `id`
   * @throws {StoreError} On any non-2xx response (409 when the ID is taken)
   */
  async createDocument(
    collection: string,
    data: DocumentData,
    options: CreateDocumentOptions = {}
  ): Promise<DocumentData> {
    validateCollectionPath(collection);
    const { documentId, signal } = options;
    if (documentId !== undefined) {
      validateDocumentId(documentId);
    }
    const body = toWireDocument(data);
    const collectionUrl = buildCollectionUrl(this._config, collection);

    return this.execute("create", { collection, documentId }, async () => {
      const response = await this.send(
        {
          method: "POST",
          url: documentId !== undefined ? addQueryParams(collectionUrl, { documentId }) : collectionUrl,
          body,
        },
        signal
      );
      if (!isSuccess(response.status)) {
        throw mapHttpError("create", response.status, response.body);
      }
      return this.readDocument(response);
    });
  }

  /**
   * Fetch a document.
   * @returns The document, or null when it does not exist
   */
  async getDocument(
    collection: string,
    documentId: string,
    options: OperationOptions = {}
  ): Promise<DocumentData | null> {
    validateCollectionPath(collection);
    validateDocumentId(documentId);

    return this.execute("get", { collection, documentId }, async () => {
      const response = await this.send(
        { method: "GET", url: buildDocumentUrl(this._config, collection, documentId) },
        options.signal
      );
      if (response.status === 404) {
        return null;
      }
      if (response.status !== 200) {
        throw mapHttpError("get", response.status, response.body);
      }
      return this.readDocument(response);
    });
  }

  /**
   * Find the documents of a collection whose fields equal the given values.
   * @returns Matching documents in server order; empty when nothing matches
   */
  async queryDocuments(collection: string, options: QueryDocumentsOptions = {}): Promise<DocumentData[]> {
    validateCollectionPath(collection);
    const { signal, ...queryOptions } = options;
    const body = buildStructuredQuery(collection, queryOptions);

    return this.execute("query", { collection }, async () => {
      const response = await this.send(
        { method: "POST", url: buildRunQueryUrl(this._config, collection), body },
        signal
      );
      if (!isSuccess(response.status)) {
        throw mapHttpError("query", response.status, response.body);
      }

      const parsed = RunQueryResponseSchema.safeParse(parseJsonBody(response.body));
      if (!parsed.success) {
        throw new FormatError("runQuery response is not an array of results", {
          body: response.body,
          cause: parsed.error,
        });
      }

      const documents: DocumentData[] = [];
      for (const entry of parsed.data) {
        // Entries without a document carry only progress information
        if (entry.document === undefined) continue;
        documents.push(fromWireDocument(parseWireDocument(entry.document, response.body)));
      }
      return documents;
    });
  }

  /**
   * Replace a document's fields. Missing documents are created; no update
   * mask is sent, so fields absent from `data` are removed.
   */
  async updateDocument(
    collection: string,
    documentId: string,
    data: DocumentData,
    options: OperationOptions = {}
  ): Promise<DocumentData> {
    validateCollectionPath(collection);
    validateDocumentId(documentId);
    const body = toWireDocument(data);

    return this.execute("update", { collection, documentId }, async () => {
      const response = await this.send(
        { method: "PATCH", url: buildDocumentUrl(this._config, collection, documentId), body },
        options.signal
      );
      if (!isSuccess(response.status)) {
        throw mapHttpError("update", response.status, response.body);
      }
      return this.readDocument(response);
    });
  }

  /**
   * Delete a document. Only 200 and 204 count as success.
   */
  async deleteDocument(collection: string, documentId: string, options: OperationOptions = {}): Promise<void> {
    validateCollectionPath(collection);
    validateDocumentId(documentId);

    await this.execute("delete", { collection, documentId }, async () => {
      const response = await this.send(
        { method: "DELETE", url: buildDocumentUrl(this._config, collection, documentId) },
        options.signal
      );
      if (response.status !== 200 && response.status !== 204) {
        throw mapHttpError("delete", response.status, response.body);
      }
    });
  }

  /**
   * Check whether a document exists.
   */
  async documentExists(collection: string, documentId: string, options: OperationOptions = {}): Promise<boolean> {
    const document = await this.getDocument(collection, documentId, options);
    return document !== null;
  }

  /**
   * Force refresh the authentication token.
   */
  async refreshToken(options: OperationOptions = {}): Promise<void> {
    this.authProvider.invalidate();
    await this.authProvider.getAccessToken(options.signal);
  }

  private async send(request: OutgoingRequest, signal?: AbortSignal): Promise<HttpResponse> {
    const token = await this.authProvider.getAccessToken(signal);

    const headers: Record<string, string> = { Accept: "application/json" };
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    return this.transport.send(
      withAuthorization(
        {
          method: request.method,
          url: request.url,
          headers,
          body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
          timeout: this._config.requestTimeoutMs,
          signal,
        },
        token
      )
    );
  }

  private readDocument(response: HttpResponse): DocumentData {
    const json = parseJsonBody(response.body);
    return fromWireDocument(parseWireDocument(json, response.body));
  }

  private async execute<T>(operation: string, context: LogContext, fn: () => Promise<T>): Promise<T> {
    this.logger.debug(`Firestore ${operation} started`, context);
    try {
      const result = await fn();
      this.logger.debug(`Firestore ${operation} succeeded`, context);
      return result;
    } catch (error) {
      const errorContext =
        error instanceof StoreError && error.status !== undefined
          ? { ...context, status: error.status, body: error.body }
          : context;
      logError(this.logger, operation, error, errorContext);
      throw error;
    }
  }
}

/**
 * Create a client from the server environment.
 *
 * Logs through a ConsoleLogger at the configured LOG_LEVEL unless a logger
 * is given.
 *
 * @throws {ConfigurationError} If a variable is missing or invalid
 */
export function createClientFromEnv(
  env: Env = process.env,
  options: FirestoreClientOptions = {}
): FirestoreRestClient {
  const appConfig = loadAppConfig(env);
  const config = toFirestoreConfig(appConfig);
  const logger = options.logger ?? new ConsoleLogger(logLevelFromAppConfig(appConfig), "firestore");
  return new FirestoreRestClient(config, { ...options, logger });
}
