// src/utils/webhookSecurity.ts
import crypto from 'crypto';

/** Hex HMAC-SHA256 of the raw request body under the integration's webhook secret. */
export function computeWebhookSignature(rawBody: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(rawBody, 'utf8').digest('hex');
}

/** Constant-time comparison against the expected signature. Empty secrets never verify. */
export function verifyWebhookSignature(rawBody: string, signature: string | undefined, secret: string): boolean {
  if (!secret || !signature) return false;

  const expected = Buffer.from(computeWebhookSignature(rawBody, secret), 'utf8');
  const received = Buffer.from(signature.trim().toLowerCase(), 'utf8');
  if (expected.length !== received.length) {
    return false;
  }
  return crypto.timingSafeEqual(expected, received);
}
