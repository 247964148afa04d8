// src/core/token/expiry.ts

import type { Credential } from './types';

export const PRE_REFRESH_MARGIN_MS = 5 * 60 * 1000;

/**
 * True when the credential can and should be refreshed before use.
 */
export function needsRefresh(
  credential: Credential,
  nowMs: number = Date.now(),
  marginMs: number = PRE_REFRESH_MARGIN_MS
): boolean {
  if (!credential.refreshToken || credential.expiresAt === undefined) {
    return false;
  }
  return credential.expiresAt <= nowMs + marginMs;
}
