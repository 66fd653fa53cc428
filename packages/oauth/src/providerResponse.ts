/** Helpers for reading untyped provider response bodies */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Non-empty string, otherwise null */
export function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * Error code reported inside a 2xx body, or null when there is none.
 * Token errors arrive as `{ error: "invalid_grant" }`; API errors as
 * `{ error: { code, message } }`, where code "ok" means success.
 */
export function providerErrorCode(body: unknown): string | null {
  if (!isRecord(body)) return null;

  const error = body['error'];
  if (typeof error === 'string') return error === '' ? null : error;
  if (isRecord(error) && typeof error['code'] === 'string' && error['code'] !== 'ok') {
    return error['code'];
  }
  return null;
}
