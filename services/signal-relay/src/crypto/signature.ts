import { createHmac, timingSafeEqual } from 'node:crypto';

/** Lowercase hex HMAC-SHA256 of the raw body. */
export function signPayload(body: Buffer | string, secret: string): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * Checks a caller-supplied signature against the HMAC of the raw body.
 * Returns false for a missing, empty or malformed signature and never throws.
 */
export function verifySignature(
  body: Buffer | string,
  secret: string,
  signature: string | string[] | undefined,
): boolean {
  if (!secret || typeof signature !== 'string' || signature.length === 0) return false;

  const expected = Buffer.from(signPayload(body, secret), 'utf8');
  const supplied = Buffer.from(signature, 'utf8');
  // timingSafeEqual throws on unequal lengths
  if (supplied.length !== expected.length) return false;

  return timingSafeEqual(expected, supplied);
}
