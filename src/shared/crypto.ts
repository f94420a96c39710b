/**
 * Shared cryptographic utilities
 */
import { randomBytes, createHash } from "node:crypto";

/**
 * Generate a unique correlation/request ID for tracing a socket event across logs
 */
export function generateCorrelationId(): string {
  return randomBytes(8).toString("hex");
}

/**
 * SHA-256 of a token, used for the revocation key
 */
export const hashToken = (token: string): string =>
  createHash("sha256").update(token).digest("hex");
