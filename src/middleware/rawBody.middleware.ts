import express, { Request } from 'express';

// Webhook bodies are read as text whatever their content type: the signature is
// computed over the exact bytes, and malformed JSON must still reach the handler.
export const rawTextBody = express.text({ type: () => true, limit: '1mb' });

export function rawBodyOf(req: Request): string {
  return typeof req.body === 'string' ? req.body : '';
}
