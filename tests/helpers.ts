/**
 * Shared test fixtures.
 */

import * as jose from "jose";
import type { LogContext, Logger, LogLevel } from "../src/logging/index.js";

export const TEST_PROJECT_ID = "test-project";
export const TEST_CLIENT_EMAIL = "svc@test-project.iam.gserviceaccount.com";
export const DOCUMENTS_URL =
  "https://firestore.googleapis.com/v1/projects/test-project/databases/(default)/documents";
export const DOCUMENT_NAME_PREFIX = "projects/test-project/databases/(default)/documents";

export interface TestKey {
  /** PKCS#8 PEM */
  pem: string;
  publicKey: jose.KeyLike;
}

/**
 * Generate a throwaway RSA key pair.
 */
export async function generateTestKey(): Promise<TestKey> {
  const { privateKey, publicKey } = await jose.generateKeyPair("RS256", { extractable: true });
  return { pem: await jose.exportPKCS8(privateKey), publicKey };
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/**
 * Logger that keeps every entry in memory.
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  error(message: string, context?: LogContext): void {
    this.entries.push({ level: "error", message, context });
  }

  warn(message: string, context?: LogContext): void {
    this.entries.push({ level: "warn", message, context });
  }

  info(message: string, context?: LogContext): void {
    this.entries.push({ level: "info", message, context });
  }

  debug(message: string, context?: LogContext): void {
    this.entries.push({ level: "debug", message, context });
  }

  trace(message: string, context?: LogContext): void {
    this.entries.push({ level: "trace", message, context });
  }

  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }
}
