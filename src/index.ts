/**
 * Firestore REST Document Store
 *
 * Storage layer of the family-management API server:
 * - Document CRUD and equality queries over the Firestore REST API
 * - Service-account JWT authentication with a cached access token
 * - Lossless conversion between documents and Firestore's typed wire format
 * - User and Family repositories on top of the client
 *
 * @example
 * ```typescript
 * import { createClientFromEnv, FirestoreUserRepository } from "firestore-rest-store";
 *
 * const client = createClientFromEnv();
 * const users = new FirestoreUserRepository(client);
 * const members = await users.findByFamilyId("family-1", { limit: 20 });
 * ```
 */

// Configuration
export {
  type FirestoreConfig,
  type MinimalFirestoreConfig,
  type ServiceAccountKey,
  type AppConfig,
  type AppLogLevel,
  type AppEnvironment,
  type Env,
  FirestoreConfigBuilder,
  configBuilder,
  validateConfig,
  resolveConfig,
  normalizePrivateKey,
  parseServiceAccountKey,
  loadServiceAccountKeyFile,
  loadAppConfig,
  toFirestoreConfig,
  logLevelFromAppConfig,
  isDevelopment,
  isProduction,
  DEFAULT_CONFIG,
  DEFAULT_TOKEN_ENDPOINT,
  DATASTORE_SCOPE,
} from "./config/index.js";

// Client
export {
  type DocumentStore,
  type OperationOptions,
  type CreateDocumentOptions,
  type QueryDocumentsOptions,
  type FirestoreClientOptions,
  FirestoreRestClient,
  createClientFromEnv,
} from "./client/index.js";

// Credentials
export {
  type AuthProvider,
  type AuthProviderDeps,
  type ServiceAccountCredentials,
  type CachedToken,
  ServiceAccountAuthProvider,
  StaticTokenAuthProvider,
  EmulatorAuthProvider,
  createAuthProvider,
  EMULATOR_TOKEN,
  JWT_BEARER_GRANT_TYPE,
} from "./credentials/index.js";

// Errors
export * from "./error/index.js";

// Logging
export * from "./logging/index.js";

// Query construction
export {
  type QueryOptions,
  buildStructuredQuery,
  equalityFilter,
  combineFilters,
} from "./query/builder.js";

// Transport and wire format
export {
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type EndpointConfig,
  FetchTransport,
  createTransport,
  isSuccess,
  getHeader,
  buildDocumentsUrl,
  buildCollectionUrl,
  buildDocumentUrl,
  buildRunQueryUrl,
  FIRESTORE_API_BASE,
} from "./transport/index.js";
export {
  type ParsedWireDocument,
  toWireValue,
  fromWireValue,
  toWireDocument,
  fromWireDocument,
  parseWireDocument,
} from "./transport/wire-convert.js";

// Types
export * from "./types/index.js";

// Validation
export {
  validateCollectionPath,
  validateDocumentId,
  isValidDocumentId,
  MAX_DOCUMENT_ID_BYTES,
} from "./validation/index.js";

// Domain models and repositories
export * from "./models/index.js";
export * from "./repositories/index.js";

// Simulation
export { MockTransport, type MockReply } from "./simulation/mock-transport.js";
export { SimulatedFirestore, type SimulatedFirestoreOptions } from "./simulation/simulated-firestore.js";
