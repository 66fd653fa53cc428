import { createHash, randomBytes } from 'node:crypto';

/** RFC 7636 unreserved characters, 43 to 128 long */
const VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;

/**
 * 64 random bytes, base64url-encoded: 86 characters, all unreserved.
 */
export function generateCodeVerifier(): string {
  return randomBytes(64).toString('base64url');
}

/**
 * S256 transform: BASE64URL(SHA256(verifier)) without padding.
 */
export function deriveCodeChallenge(codeVerifier: string): string {
  return createHash('sha256').update(codeVerifier, 'ascii').digest('base64url');
}

export function isValidCodeVerifier(codeVerifier: string): boolean {
  return VERIFIER_PATTERN.test(codeVerifier);
}

/** Opaque state token binding a callback to its session */
export function generateState(): string {
  return randomBytes(24).toString('base64url');
}
