import * as crypto from 'crypto';

export interface AuthHeaders {
  authorization?: string | string[];
  'x-auth-token'?: string | string[];
}

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Bearer token from `Authorization: Bearer <token>`, falling back to the
 * single-value `X-Auth-Token` header.
 */
export function extractAuthToken(headers: AuthHeaders): string | null {
  const authorization = firstValue(headers.authorization);
  if (authorization) {
    const parts = authorization.trim().split(/\s+/);
    if (parts.length === 2 && parts[0].toLowerCase() === 'bearer') {
      return parts[1];
    }
  }
  const alternate = firstValue(headers['x-auth-token'])?.trim();
  return alternate || null;
}

export function generateAuthToken(): string {
  return crypto.randomBytes(16).toString('hex');
}
