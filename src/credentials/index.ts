/**
 * Firestore Credentials Provider
 *
 * Service account authentication for the Firestore REST API: a signed JWT
 * assertion is exchanged for an OAuth2 access token, which is cached until
 * shortly before it expires.
 */

import * as jose from "jose";
import { z } from "zod";
import { normalizePrivateKey } from "../config/index.js";
import type { FirestoreConfig } from "../config/index.js";
import { AuthError, CancelledError } from "../error/index.js";
import { logError, NoopLogger } from "../logging/index.js";
import type { Logger } from "../logging/index.js";
import type { HttpResponse, HttpTransport } from "../transport/index.js";

/**
 * Grant type of the JWT bearer token exchange (RFC 7523).
 */
export const JWT_BEARER_GRANT_TYPE = "urn:ietf:params:oauth:grant-type:jwt-bearer";

/**
 * Lifetime of a signed assertion, in seconds.
 */
const ASSERTION_LIFETIME_SECONDS = 3600;

/**
 * Tokens are treated as expired this many seconds early.
 */
const EXPIRY_BUFFER_SECONDS = 60;

/**
 * Token returned by the Firestore emulator's auth bypass.
 */
export const EMULATOR_TOKEN = "owner";

/**
 * Source of bearer tokens for Firestore requests.
 */
export interface AuthProvider {
  /**
   * Get a valid access token, refreshing it if needed.
   * @param signal - Cancels this caller's wait, not a shared refresh
   */
  getAccessToken(signal?: AbortSignal): Promise<string>;

  /**
   * Drop the cached token so the next call refreshes.
   */
  invalidate(): void;

  /**
   * Check if the current token is valid.
   */
  isTokenValid(): boolean;
}

/**
 * Service account identity used to sign assertions.
 */
export interface ServiceAccountCredentials {
  clientEmail: string;
  /** PKCS#8 PEM; literal "\n" sequences are turned into newlines */
  privateKey: string;
  privateKeyId?: string;
  tokenEndpoint: string;
  scope: string;
}

/**
 * Collaborators of an auth provider.
 */
export interface AuthProviderDeps {
  transport: HttpTransport;
  logger?: Logger;
  /** Clock, for tests */
  now?: () => Date;
}

/**
 * Cached access token.
 */
export interface CachedToken {
  token: string;
  expiresAt: Date;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  token_type: z.string().optional(),
});

/**
 * Wait for a promise unless the signal fires first.
 */
function waitFor<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new CancelledError("Access token request cancelled", { cause: signal.reason }));
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Service account authentication provider.
 *
 * Concurrent callers share a single in-flight refresh.
 *
 * @example
 * ```typescript
 * const provider = new ServiceAccountAuthProvider(
 *   {
 *     clientEmail: "svc@my-project.iam.gserviceaccount.com",
 *     privateKey: pem,
 *     tokenEndpoint: DEFAULT_TOKEN_ENDPOINT,
 *     scope: DATASTORE_SCOPE,
 *   },
 *   { transport: new FetchTransport() }
 * );
 * const token = await provider.getAccessToken();
 * ```
 */
export class ServiceAccountAuthProvider implements AuthProvider {
  private credentials: ServiceAccountCredentials;
  private transport: HttpTransport;
  private logger: Logger;
  private now: () => Date;
  private cachedToken?: CachedToken;
  private tokenLock: Promise<CachedToken> | null = null;

  constructor(credentials: ServiceAccountCredentials, deps: AuthProviderDeps) {
    this.credentials = credentials;
    this.transport = deps.transport;
    this.logger = deps.logger ?? new NoopLogger();
    this.now = deps.now ?? (() => new Date());
  }

  async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new CancelledError("Access token request cancelled", { cause: signal.reason });
    }

    // Check cached token
    if (this.cachedToken && !this.isTokenExpired(this.cachedToken)) {
      return this.cachedToken.token;
    }

    // Avoid concurrent token refreshes
    if (!this.tokenLock) {
      this.tokenLock = this.performRefresh()
        .catch((error: unknown) => {
          logError(this.logger, "token refresh", error, {
            tokenEndpoint: this.credentials.tokenEndpoint,
          });
          throw error;
        })
        .finally(() => {
          this.tokenLock = null;
        });
    }

    const token = await waitFor(this.tokenLock, signal);
    return token.token;
  }

  invalidate(): void {
    this.cachedToken = undefined;
  }

  isTokenValid(): boolean {
    return this.cachedToken !== undefined && !this.isTokenExpired(this.cachedToken);
  }

  /**
   * Expiry of the cached token, if any.
   */
  get tokenExpiresAt(): Date | undefined {
    return this.cachedToken?.expiresAt;
  }

  private isTokenExpired(cached: CachedToken): boolean {
    return this.now().getTime() >= cached.expiresAt.getTime();
  }

  private async performRefresh(): Promise<CachedToken> {
    const { tokenEndpoint } = this.credentials;
    this.logger.debug("Refreshing access token", { tokenEndpoint });

    const assertion = await this.createJwt();

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: "POST",
        url: tokenEndpoint,
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: `grant_type=${JWT_BEARER_GRANT_TYPE}&assertion=${assertion}`,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Token request failed: ${message}`, { cause: error });
    }

    if (response.status !== 200) {
      throw new AuthError(`Failed to obtain access token: ${response.status} ${response.body}`.trimEnd(), {
        status: response.status,
        body: response.body,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (error) {
      throw new AuthError("Token response is not valid JSON", {
        status: response.status,
        body: response.body,
        cause: error,
      });
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthError(`Token response is malformed: ${parsed.error.message}`, {
        status: response.status,
        body: response.body,
        cause: parsed.error,
      });
    }

    // Cache token with a buffer before expiry
    const expiresAt = new Date(
      this.now().getTime() + (parsed.data.expires_in - EXPIRY_BUFFER_SECONDS) * 1000
    );
    const token: CachedToken = { token: parsed.data.access_token, expiresAt };
    this.cachedToken = token;

    this.logger.debug("Access token refreshed", { expiresAt: expiresAt.toISOString() });
    return token;
  }

  /**
   * Build and sign the RS256 assertion.
   */
  private async createJwt(): Promise<string> {
    const { clientEmail, privateKey, privateKeyId, tokenEndpoint, scope } = this.credentials;

    let key: jose.KeyLike;
    try {
      key = await jose.importPKCS8(normalizePrivateKey(privateKey), "RS256");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Invalid service account private key: ${message}`, { cause: error });
    }

    const now = Math.floor(this.now().getTime() / 1000);

    const header: jose.JWTHeaderParameters = {
      alg: "RS256",
      typ: "JWT",
    };
    if (privateKeyId) {
      header.kid = privateKeyId;
    }

    try {
      return await new jose.SignJWT({ scope })
        .setProtectedHeader(header)
        .setIssuer(clientEmail)
        .setAudience(tokenEndpoint)
        .setIssuedAt(now)
        .setExpirationTime(now + ASSERTION_LIFETIME_SECONDS)
        .sign(key);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Failed to sign JWT assertion: ${message}`, { cause: error });
    }
  }
}

/**
 * Access token authentication provider.
 *
 * Uses an explicit access token obtained elsewhere. It is never refreshed.
 */
export class StaticTokenAuthProvider implements AuthProvider {
  private token: string;

  constructor(token: string) {
    this.token = token;
  }

  async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new CancelledError("Access token request cancelled", { cause: signal.reason });
    }
    return this.token;
  }

  invalidate(): void {
    // Cannot refresh static token
  }

  isTokenValid(): boolean {
    return this.token.length > 0;
  }
}

/**
 * Emulator authentication provider.
 *
 * The Firestore emulator accepts the bearer token "owner" and needs no
 * network call.
 */
export class EmulatorAuthProvider extends StaticTokenAuthProvider {
  constructor() {
    super(EMULATOR_TOKEN);
  }
}

/**
 * Create the auth provider a configuration calls for: the emulator provider
 * when an emulator host is set, a service account provider otherwise.
 */
export function createAuthProvider(config: FirestoreConfig, deps: AuthProviderDeps): AuthProvider {
  if (config.emulatorHost) {
    return new EmulatorAuthProvider();
  }
  return new ServiceAccountAuthProvider(
    {
      clientEmail: config.serviceAccountEmail,
      privateKey: config.privateKey,
      privateKeyId: config.privateKeyId,
      tokenEndpoint: config.tokenEndpoint,
      scope: config.scope,
    },
    deps
  );
}
