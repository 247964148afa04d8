// src/core/token/types.ts

/**
 * Narrow, JSON-safe OAuth credential kept in the session.
 */
export interface Credential {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: number; // Epoch milliseconds
  scope?: string;
  tokenType?: string;
}
