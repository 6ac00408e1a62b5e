/**
 * In-process Firestore REST endpoint for testing.
 *
 * Implements the OAuth2 token endpoint and the document create, get, patch,
 * delete and runQuery calls against an in-memory store, so the real client
 * can be exercised end to end without a network.
 */

import { isDeepStrictEqual } from "node:util";
import { DEFAULT_TOKEN_ENDPOINT } from "../config/index.js";
import { EMULATOR_TOKEN, JWT_BEARER_GRANT_TYPE } from "../credentials/index.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "../transport/index.js";
import { fromWireDocument, toWireDocument } from "../transport/wire-convert.js";
import type { DocumentData } from "../types/index.js";

/**
 * Stored document in wire form.
 */
interface StoredDocument {
  fields: Record<string, unknown>;
  createTime: string;
  updateTime: string;
}

/**
 * Options of the simulated endpoint.
 */
export interface SimulatedFirestoreOptions {
  /** Token endpoint URL to answer. Default: Google's */
  tokenEndpoint?: string;
  /** Lifetime of issued tokens in seconds. Default: 3600 */
  tokenLifetimeSeconds?: number;
  /** Clock for document timestamps */
  now?: () => Date;
}

interface InjectedFailure {
  method: string;
  status: number;
  reason: string;
  message: string;
}

const DOCUMENTS_PATH = /^\/v1\/projects\/([^/]+)\/databases\/([^/]+)\/documents(\/.*)?$/;

const AUTO_ID_CHARS = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function json(status: number, body: unknown): HttpResponse {
  return {
    status,
    headers: { "content-type": "application/json; charset=UTF-8" },
    body: JSON.stringify(body),
  };
}

function errorResponse(status: number, reason: string, message: string): HttpResponse {
  return json(status, { error: { code: status, message, status: reason } });
}

function parseBody(request: HttpRequest): unknown {
  if (request.body === undefined || request.body === "") {
    return undefined;
  }
  const parsed: unknown = JSON.parse(request.body);
  return parsed;
}

/**
 * Read a dotted field path out of wire fields.
 */
function lookupField(fields: Record<string, unknown>, fieldPath: string): unknown {
  let current: unknown = { mapValue: { fields } };
  for (const segment of fieldPath.split(".")) {
    if (!isRecord(current) || !isRecord(current.mapValue) || !isRecord(current.mapValue.fields)) {
      return undefined;
    }
    current = current.mapValue.fields[segment];
  }
  return current;
}

function matchesFilter(fields: Record<string, unknown>, filter: unknown): boolean {
  if (!isRecord(filter)) {
    return false;
  }
  if (isRecord(filter.fieldFilter)) {
    const { field, op, value } = filter.fieldFilter;
    if (op !== "EQUAL" || !isRecord(field) || typeof field.fieldPath !== "string") {
      return false;
    }
    return isDeepStrictEqual(lookupField(fields, field.fieldPath), value);
  }
  if (isRecord(filter.compositeFilter)) {
    const { op, filters } = filter.compositeFilter;
    return op === "AND" && Array.isArray(filters) && filters.every((inner: unknown) => matchesFilter(fields, inner));
  }
  return false;
}

/**
 * Simulated Firestore REST endpoint.
 *
 * @example
 * ```typescript
 * const firestore = new SimulatedFirestore();
 * const client = new FirestoreRestClient(config, { transport: firestore });
 * await client.createDocument("users", { displayName: "Ada" }, { documentId: "u1" });
 * expect(firestore.peek("users/u1")).toEqual({ id: "u1", displayName: "Ada" });
 * ```
 */
export class SimulatedFirestore implements HttpTransport {
  private documents: Map<string, StoredDocument> = new Map();
  private issuedTokens: Set<string> = new Set();
  private failures: InjectedFailure[] = [];
  private requests: HttpRequest[] = [];
  private tokenCounter = 0;
  private readonly tokenEndpoint: string;
  private readonly tokenLifetimeSeconds: number;
  private readonly now: () => Date;

  constructor(options: SimulatedFirestoreOptions = {}) {
    this.tokenEndpoint = options.tokenEndpoint ?? DEFAULT_TOKEN_ENDPOINT;
    this.tokenLifetimeSeconds = options.tokenLifetimeSeconds ?? 3600;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Store a document directly.
   * @param path - Document path relative to the database, e.g. "users/u1"
   */
  seed(path: string, data: DocumentData): void {
    const fields = toWireDocument(data).fields ?? {};
    const time = this.now().toISOString();
    this.documents.set(path, { fields, createTime: time, updateTime: time });
  }

  /**
   * Read a stored document, decoded.
   */
  peek(path: string): DocumentData | undefined {
    const stored = this.documents.get(path);
    if (!stored) {
      return undefined;
    }
    return fromWireDocument({ name: path, fields: stored.fields });
  }

  /**
   * Raw wire fields of a stored document.
   */
  peekWire(path: string): Record<string, unknown> | undefined {
    return this.documents.get(path)?.fields;
  }

  /**
   * Number of stored documents.
   */
  get documentCount(): number {
    return this.documents.size;
  }

  /**
   * Number of access tokens issued so far.
   */
  get tokensIssued(): number {
    return this.tokenCounter;
  }

  /**
   * Fail the next Firestore request with the given method.
   */
  injectFailure(method: string, status: number, reason: string, message: string = reason): void {
    this.failures.push({ method, status, reason, message });
  }

  /**
   * Requests received, token requests included.
   */
  getRequests(): HttpRequest[] {
    return [...this.requests];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);

    if (request.url === this.tokenEndpoint) {
      return this.handleToken(request);
    }

    const url = new URL(request.url);
    const match = DOCUMENTS_PATH.exec(url.pathname);
    if (!match) {
      return errorResponse(404, "NOT_FOUND", `Unknown endpoint: ${url.pathname}`);
    }

    if (!this.isAuthorized(request)) {
      return errorResponse(401, "UNAUTHENTICATED", "Request is missing a valid bearer token");
    }

    const failureIndex = this.failures.findIndex((failure) => failure.method === request.method);
    if (failureIndex >= 0) {
      const [failure] = this.failures.splice(failureIndex, 1);
      if (failure) {
        return errorResponse(failure.status, failure.reason, failure.message);
      }
    }

    const [, projectId = "", databaseId = "", rest = ""] = match;
    const root = `projects/${projectId}/databases/${databaseId}/documents`;

    let body: unknown;
    try {
      body = parseBody(request);
    } catch {
      return errorResponse(400, "INVALID_ARGUMENT", "Request body is not valid JSON");
    }

    if (rest.endsWith(":runQuery")) {
      const parent = rest.slice(0, -":runQuery".length);
      return this.handleRunQuery(root, this.decodePath(parent), body);
    }

    const path = this.decodePath(rest);
    const segments = path ? path.split("/") : [];

    switch (request.method) {
      case "POST":
        if (segments.length % 2 === 1) {
          return this.handleCreate(root, path, url.searchParams.get("documentId"), body);
        }
        break;
      case "GET":
        if (segments.length > 0 && segments.length % 2 === 0) {
          return this.handleGet(root, path);
        }
        break;
      case "PATCH":
        if (segments.length > 0 && segments.length % 2 === 0) {
          return this.handlePatch(root, path, body);
        }
        break;
      case "DELETE":
        if (segments.length > 0 && segments.length % 2 === 0) {
          this.documents.delete(path);
          return json(200, {});
        }
        break;
      default:
        break;
    }

    return errorResponse(400, "INVALID_ARGUMENT", `Unsupported ${request.method} on ${path || "/"}`);
  }

  private decodePath(rest: string): string {
    return rest
      .split("/")
      .filter((segment) => segment.length > 0)
      .map((segment) => decodeURIComponent(segment))
      .join("/");
  }

  private isAuthorized(request: HttpRequest): boolean {
    const header = request.headers.Authorization ?? request.headers.authorization;
    if (!header?.startsWith("Bearer ")) {
      return false;
    }
    const token = header.slice("Bearer ".length);
    return token === EMULATOR_TOKEN || this.issuedTokens.has(token);
  }

  private handleToken(request: HttpRequest): HttpResponse {
    const params = new URLSearchParams(request.body ?? "");
    if (params.get("grant_type") !== JWT_BEARER_GRANT_TYPE || !params.get("assertion")) {
      return json(400, { error: "invalid_grant", error_description: "Invalid JWT bearer request" });
    }
    this.tokenCounter += 1;
    const token = `sim-access-token-${this.tokenCounter}`;
    this.issuedTokens.add(token);
    return json(200, {
      access_token: token,
      expires_in: this.tokenLifetimeSeconds,
      token_type: "Bearer",
    });
  }

  private toResource(root: string, path: string, stored: StoredDocument): Record<string, unknown> {
    return {
      name: `${root}/${path}`,
      fields: stored.fields,
      createTime: stored.createTime,
      updateTime: stored.updateTime,
    };
  }

  private readFields(body: unknown): Record<string, unknown> | undefined {
    if (body === undefined) {
      return {};
    }
    if (!isRecord(body)) {
      return undefined;
    }
    if (body.fields === undefined) {
      return {};
    }
    return isRecord(body.fields) ? body.fields : undefined;
  }

  private generateId(): string {
    let id = "";
    for (let i = 0; i < 20; i++) {
      id += AUTO_ID_CHARS[Math.floor(Math.random() * AUTO_ID_CHARS.length)];
    }
    return id;
  }

  private handleCreate(root: string, collection: string, documentId: string | null, body: unknown): HttpResponse {
    const fields = this.readFields(body);
    if (!fields) {
      return errorResponse(400, "INVALID_ARGUMENT", "Document body must be an object with fields");
    }
    const path = `${collection}/${documentId ?? this.generateId()}`;
    if (this.documents.has(path)) {
      return errorResponse(409, "ALREADY_EXISTS", `Document already exists: ${root}/${path}`);
    }
    const time = this.now().toISOString();
    const stored: StoredDocument = { fields, createTime: time, updateTime: time };
    this.documents.set(path, stored);
    return json(200, this.toResource(root, path, stored));
  }

  private handleGet(root: string, path: string): HttpResponse {
    const stored = this.documents.get(path);
    if (!stored) {
      return errorResponse(404, "NOT_FOUND", `Document "${root}/${path}" not found.`);
    }
    return json(200, this.toResource(root, path, stored));
  }

  private handlePatch(root: string, path: string, body: unknown): HttpResponse {
    const fields = this.readFields(body);
    if (!fields) {
      return errorResponse(400, "INVALID_ARGUMENT", "Document body must be an object with fields");
    }
    const existing = this.documents.get(path);
    const time = this.now().toISOString();
    const stored: StoredDocument = {
      fields,
      createTime: existing?.createTime ?? time,
      updateTime: time,
    };
    this.documents.set(path, stored);
    return json(200, this.toResource(root, path, stored));
  }

  private handleRunQuery(root: string, parent: string, body: unknown): HttpResponse {
    const query = isRecord(body) ? body.structuredQuery : undefined;
    if (!isRecord(query) || !Array.isArray(query.from)) {
      return errorResponse(400, "INVALID_ARGUMENT", "structuredQuery.from is required");
    }
    const [selector] = query.from;
    if (!isRecord(selector) || typeof selector.collectionId !== "string") {
      return errorResponse(400, "INVALID_ARGUMENT", "structuredQuery.from[0].collectionId is required");
    }

    const collection = parent ? `${parent}/${selector.collectionId}` : selector.collectionId;
    const prefix = `${collection}/`;
    const where = query.where;
    const offset = typeof query.offset === "number" ? query.offset : 0;
    const limit = typeof query.limit === "number" ? query.limit : undefined;

    const matches = [...this.documents.entries()]
      .filter(([path]) => path.startsWith(prefix) && !path.slice(prefix.length).includes("/"))
      .filter(([, stored]) => where === undefined || matchesFilter(stored.fields, where))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    const page = matches.slice(offset, limit === undefined ? undefined : offset + limit);
    const readTime = this.now().toISOString();

    if (page.length === 0) {
      // Firestore answers an empty result with a single entry without a document
      return json(200, [{ readTime }]);
    }
    return json(
      200,
      page.map(([path, stored]) => ({ document: this.toResource(root, path, stored), readTime }))
    );
  }
}
