/**
 * Firestore Configuration Module
 *
 * Client configuration, service-account key files, and the server
 * environment the store is deployed with.
 */

import * as fs from "fs/promises";
import { z } from "zod";
import { ConfigurationError } from "../error/index.js";
import type { LogLevel } from "../logging/index.js";

/**
 * Default Google OAuth2 token endpoint.
 */
export const DEFAULT_TOKEN_ENDPOINT = "https://oauth2.googleapis.com/token";

/**
 * OAuth2 scope granting Firestore access.
 */
export const DATASTORE_SCOPE = "https://www.googleapis.com/auth/datastore";

/**
 * Firestore client configuration.
 */
export interface FirestoreConfig {
  /** GCP project ID. */
  projectId: string;
  /** Firestore database ID. Default: "(default)" */
  databaseId: string;
  /** Service account email, the JWT issuer. */
  serviceAccountEmail: string;
  /** PKCS#8 PEM private key. Literal "\n" sequences are accepted. */
  privateKey: string;
  /** Key ID, sent as the JWT `kid` header when present. */
  privateKeyId?: string;
  /** OAuth2 token endpoint. Default: https://oauth2.googleapis.com/token */
  tokenEndpoint: string;
  /** OAuth2 scope. Default: datastore */
  scope: string;
  /** Emulator host:port. When set, requests go to the emulator over HTTP. */
  emulatorHost?: string;
  /** Request timeout in milliseconds. Default: 60000 */
  requestTimeoutMs: number;
}

/**
 * The least a caller must provide; everything else takes its default.
 */
export interface MinimalFirestoreConfig {
  projectId: string;
  serviceAccountEmail: string;
  privateKey: string;
}

/**
 * Default configuration values for Firestore.
 */
export const DEFAULT_CONFIG: Omit<
  FirestoreConfig,
  "projectId" | "serviceAccountEmail" | "privateKey"
> = {
  databaseId: "(default)",
  tokenEndpoint: DEFAULT_TOKEN_ENDPOINT,
  scope: DATASTORE_SCOPE,
  requestTimeoutMs: 60000,
};

const FirestoreConfigSchema = z
  .object({
    projectId: z.string().trim().min(1, "Project ID is required"),
    databaseId: z.string().trim().min(1, "Database ID is required"),
    serviceAccountEmail: z.string(),
    privateKey: z.string(),
    privateKeyId: z.string().min(1).optional(),
    tokenEndpoint: z.string().url("Token endpoint must be a URL"),
    scope: z.string().min(1, "Scope is required"),
    emulatorHost: z.string().min(1).optional(),
    requestTimeoutMs: z.number().int().positive("Request timeout must be positive"),
  })
  .superRefine((config, ctx) => {
    // The emulator accepts any bearer token, so it needs no service account
    if (config.emulatorHost) {
      return;
    }
    if (!z.string().email().safeParse(config.serviceAccountEmail).success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["serviceAccountEmail"],
        message: "Invalid service account email",
      });
    }
    if (config.privateKey.trim().length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["privateKey"],
        message: "Private key is required",
      });
    }
  });

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate a Firestore configuration object.
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: FirestoreConfig): FirestoreConfig {
  const result = FirestoreConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError(`Invalid Firestore configuration: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Fill in defaults and validate.
 * @throws {ConfigurationError} If configuration is invalid
 */
export function resolveConfig(config: FirestoreConfig | MinimalFirestoreConfig): FirestoreConfig {
  return validateConfig({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Turn the literal two-character `\n` sequences of an env-provided PEM into
 * newlines.
 */
export function normalizePrivateKey(privateKey: string): string {
  return privateKey.replace(/\\n/g, "\n");
}

// ============================================================================
// Service account key files
// ============================================================================

const ServiceAccountKeySchema = z.object({
  type: z.literal("service_account", {
    errorMap: () => ({ message: "type must be 'service_account'" }),
  }),
  project_id: z.string().optional(),
  private_key_id: z.string().optional(),
  private_key: z.string({ required_error: "missing private_key" }).min(1, "missing private_key"),
  client_email: z.string({ required_error: "missing client_email" }).min(1, "missing client_email"),
  client_id: z.string().optional(),
  auth_uri: z.string().optional(),
  token_uri: z.string().optional(),
});

/**
 * Google service account JSON key.
 */
export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

/**
 * Validate a parsed service account key.
 * @throws {ConfigurationError} If the key is not a service account key
 */
export function parseServiceAccountKey(json: unknown): ServiceAccountKey {
  const result = ServiceAccountKeySchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(`Invalid key file: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Read and validate a service account key file.
 * @throws {ConfigurationError} If the file cannot be read or is not a key
 */
export async function loadServiceAccountKeyFile(path: string): Promise<ServiceAccountKey> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read key file ${path}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Key file ${path} is not valid JSON`, { cause: error });
  }

  return parseServiceAccountKey(json);
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Firestore configuration builder with fluent API.
 *
 * @example
 * ```typescript
 * const config = configBuilder()
 *   .projectId("my-project")
 *   .serviceAccount("svc@my-project.iam.gserviceaccount.com", privateKeyPem)
 *   .requestTimeout(30000)
 *   .build();
 * ```
 */
export class FirestoreConfigBuilder {
  private config: Partial<FirestoreConfig> = {};

  /**
   * Set the GCP project ID.
   */
  projectId(projectId: string): this {
    if (!projectId || projectId.trim().length === 0) {
      throw new ConfigurationError("Project ID cannot be empty");
    }
    this.config.projectId = projectId.trim();
    return this;
  }

  /**
   * Set the Firestore database ID.
   */
  databaseId(databaseId: string): this {
    if (!databaseId || databaseId.trim().length === 0) {
      throw new ConfigurationError("Database ID cannot be empty");
    }
    this.config.databaseId = databaseId.trim();
    return this;
  }

  /**
   * Authenticate as a service account.
   */
  serviceAccount(email: string, privateKey: string, privateKeyId?: string): this {
    this.config.serviceAccountEmail = email;
    this.config.privateKey = privateKey;
    if (privateKeyId) {
      this.config.privateKeyId = privateKeyId;
    } else {
      delete this.config.privateKeyId;
    }
    return this;
  }

  /**
   * Authenticate with a service account JSON key. The key's project and
   * token endpoint are used unless set explicitly.
   */
  serviceAccountKey(key: ServiceAccountKey): this {
    this.serviceAccount(key.client_email, key.private_key, key.private_key_id);
    if (key.project_id && !this.config.projectId) {
      this.config.projectId = key.project_id;
    }
    if (key.token_uri && !this.config.tokenEndpoint) {
      this.config.tokenEndpoint = key.token_uri;
    }
    return this;
  }

  /**
   * Send requests to a Firestore emulator.
   * @param host - Emulator host:port, e.g. "localhost:8080"
   */
  emulator(host: string): this {
    if (!host || host.trim().length === 0) {
      throw new ConfigurationError("Emulator host cannot be empty");
    }
    this.config.emulatorHost = host.trim().replace(/^https?:\/\//, "");
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  requestTimeout(timeoutMs: number): this {
    if (timeoutMs <= 0) {
      throw new ConfigurationError("Request timeout must be positive");
    }
    this.config.requestTimeoutMs = timeoutMs;
    return this;
  }

  /**
   * Override the OAuth2 token endpoint.
   */
  tokenEndpoint(url: string): this {
    this.config.tokenEndpoint = url;
    return this;
  }

  /**
   * Override the OAuth2 scope.
   */
  scope(scope: string): this {
    this.config.scope = scope;
    return this;
  }

  /**
   * Build the configuration.
   * @throws {ConfigurationError} If required fields are missing or invalid
   */
  build(): FirestoreConfig {
    const { projectId, serviceAccountEmail, privateKey } = this.config;
    if (!projectId) {
      throw new ConfigurationError("Project ID must be specified (call projectId())");
    }
    return validateConfig({
      ...DEFAULT_CONFIG,
      ...this.config,
      projectId,
      serviceAccountEmail: serviceAccountEmail ?? "",
      privateKey: privateKey ?? "",
    });
  }
}

/**
 * Create a new Firestore configuration builder.
 */
export function configBuilder(): FirestoreConfigBuilder {
  return new FirestoreConfigBuilder();
}

// ============================================================================
// Server environment
// ============================================================================

export type AppLogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export type AppEnvironment = "development" | "staging" | "production";

/**
 * Environment variables, as found on `process.env`.
 */
export type Env = Record<string, string | undefined>;

/**
 * Configuration of the API server the store runs in.
 */
export interface AppConfig {
  firebaseProjectId: string;
  firebasePrivateKeyId: string;
  firebasePrivateKey: string;
  firebaseClientEmail: string;
  firebaseClientId: string;
  firebaseAuthUri: string;
  firebaseTokenUri: string;
  port: number;
  logLevel: AppLogLevel;
  environment: AppEnvironment;
  useFirebaseEmulator: boolean;
  /** Only set when the emulator is enabled */
  firestoreEmulatorHost?: string;
  /** Only set when the emulator is enabled */
  authEmulatorHost?: string;
}

const LOG_LEVELS: readonly AppLogLevel[] = ["DEBUG", "INFO", "WARNING", "ERROR"];

const ENVIRONMENTS: readonly AppEnvironment[] = ["development", "staging", "production"];

function isLogLevel(value: string): value is AppLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isEnvironment(value: string): value is AppEnvironment {
  return ENVIRONMENTS.some((environment) => environment === value);
}

const REQUIRED = "environment variable is required";
const REQUIRED_WITH_EMULATOR = "is required when USE_FIREBASE_EMULATOR is true";

const requiredVariable = z.string({ required_error: REQUIRED }).min(1, REQUIRED);

/**
 * Server environment variables and the AppConfig they map to.
 */
const AppEnvSchema = z
  .object({
    FIREBASE_PROJECT_ID: requiredVariable,
    FIREBASE_PRIVATE_KEY_ID: requiredVariable,
    FIREBASE_PRIVATE_KEY: requiredVariable,
    FIREBASE_CLIENT_EMAIL: requiredVariable,
    FIREBASE_CLIENT_ID: requiredVariable,
    FIREBASE_AUTH_URI: requiredVariable,
    FIREBASE_TOKEN_URI: requiredVariable,
    PORT: z
      .string()
      .default("8080")
      .transform((value, ctx) => {
        const port = /^\d+$/.test(value) ? Number.parseInt(value, 10) : NaN;
        if (!Number.isInteger(port) || port <= 0 || port > 65535) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `must be a valid integer between 1 and 65535, got: ${value}`,
          });
          return z.NEVER;
        }
        return port;
      }),
    LOG_LEVEL: z
      .string()
      .default("INFO")
      .transform((value, ctx) => {
        const level = value.toUpperCase();
        if (!isLogLevel(level)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `must be one of ${LOG_LEVELS.join(", ")}, got: ${value}`,
          });
          return z.NEVER;
        }
        return level;
      }),
    ENVIRONMENT: z
      .string()
      .default("development")
      .transform((value, ctx) => {
        if (!isEnvironment(value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `must be one of ${ENVIRONMENTS.join(", ")}, got: ${value}`,
          });
          return z.NEVER;
        }
        return value;
      }),
    USE_FIREBASE_EMULATOR: z
      .string()
      .default("false")
      .transform((value) => value.toLowerCase() === "true"),
    FIRESTORE_EMULATOR_HOST: z.string().optional(),
    AUTH_EMULATOR_HOST: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (!env.USE_FIREBASE_EMULATOR) return;
    if (!env.FIRESTORE_EMULATOR_HOST) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["FIRESTORE_EMULATOR_HOST"], message: REQUIRED_WITH_EMULATOR });
    }
    if (!env.AUTH_EMULATOR_HOST) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["AUTH_EMULATOR_HOST"], message: REQUIRED_WITH_EMULATOR });
    }
  })
  .transform((env): AppConfig => {
    const config: AppConfig = {
      firebaseProjectId: env.FIREBASE_PROJECT_ID,
      firebasePrivateKeyId: env.FIREBASE_PRIVATE_KEY_ID,
      firebasePrivateKey: env.FIREBASE_PRIVATE_KEY,
      firebaseClientEmail: env.FIREBASE_CLIENT_EMAIL,
      firebaseClientId: env.FIREBASE_CLIENT_ID,
      firebaseAuthUri: env.FIREBASE_AUTH_URI,
      firebaseTokenUri: env.FIREBASE_TOKEN_URI,
      port: env.PORT,
      logLevel: env.LOG_LEVEL,
      environment: env.ENVIRONMENT,
      useFirebaseEmulator: env.USE_FIREBASE_EMULATOR,
    };
    if (env.USE_FIREBASE_EMULATOR) {
      config.firestoreEmulatorHost = env.FIRESTORE_EMULATOR_HOST;
      config.authEmulatorHost = env.AUTH_EMULATOR_HOST;
    }
    return config;
  });

/**
 * Load the server configuration from environment variables.
 *
 * Required: FIREBASE_PROJECT_ID, FIREBASE_PRIVATE_KEY_ID, FIREBASE_PRIVATE_KEY,
 * FIREBASE_CLIENT_EMAIL, FIREBASE_CLIENT_ID, FIREBASE_AUTH_URI, FIREBASE_TOKEN_URI.
 *
 * Optional: PORT (default 8080), LOG_LEVEL (default INFO), ENVIRONMENT
 * (default development), USE_FIREBASE_EMULATOR (default false), and
 * FIRESTORE_EMULATOR_HOST / AUTH_EMULATOR_HOST, both required when the
 * emulator is enabled.
 *
 * @throws {ConfigurationError} Listing every missing or invalid variable
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const result = AppEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(`Invalid server environment: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function isDevelopment(config: AppConfig): boolean {
  return config.environment === "development";
}

export function isProduction(config: AppConfig): boolean {
  return config.environment === "production";
}

/**
 * Derive the client configuration from the server configuration.
 * @throws {ConfigurationError} If the derived configuration is invalid
 */
export function toFirestoreConfig(appConfig: AppConfig): FirestoreConfig {
  const config: FirestoreConfig = {
    ...DEFAULT_CONFIG,
    projectId: appConfig.firebaseProjectId,
    serviceAccountEmail: appConfig.firebaseClientEmail,
    privateKey: normalizePrivateKey(appConfig.firebasePrivateKey),
    privateKeyId: appConfig.firebasePrivateKeyId,
    tokenEndpoint: appConfig.firebaseTokenUri,
  };
  if (appConfig.useFirebaseEmulator && appConfig.firestoreEmulatorHost) {
    config.emulatorHost = appConfig.firestoreEmulatorHost;
  }
  return validateConfig(config);
}

/**
 * Map the server's LOG_LEVEL to a logger level.
 */
export function logLevelFromAppConfig(config: Pick<AppConfig, "logLevel">): LogLevel {
  switch (config.logLevel) {
    case "DEBUG":
      return "debug";
    case "INFO":
      return "info";
    case "WARNING":
      return "warn";
    case "ERROR":
      return "error";
  }
}
