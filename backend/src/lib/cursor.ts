/**
 * Opaque pagination cursor: base64url(JSON payload) + "." + base64url(HMAC-SHA256).
 * Кодирует последнюю выданную позицию (asOf, ticker) в порядке asOf DESC, ticker ASC.
 */

import crypto from 'crypto';
import { InvalidCursor } from './errors';

const CURSOR_VERSION = 1;

export interface CursorPosition {
  asOf: string;
  ticker: string;
  pattern: string;
}

interface CursorPayload {
  v: number;
  asOf: string;
  ticker: string;
  pattern: string;
}

function sign(secret: string, body: string): string {
  return crypto.createHmac('sha256', secret).update(body).digest('base64url');
}

function isPayload(value: unknown): value is CursorPayload {
  if (typeof value !== 'object' || value === null) return false;
  const o: Record<string, unknown> = { ...value };
  return (
    typeof o.v === 'number' &&
    typeof o.asOf === 'string' &&
    typeof o.ticker === 'string' &&
    typeof o.pattern === 'string'
  );
}

export function encodeCursor(position: CursorPosition, secret: string): string {
  const payload: CursorPayload = {
    v: CURSOR_VERSION,
    asOf: position.asOf,
    ticker: position.ticker,
    pattern: position.pattern
  };
  const body = Buffer.from(JSON.stringify(payload), 'utf8').toString('base64url');
  return `${body}.${sign(secret, body)}`;
}

/**
 * Throws InvalidCursor for malformed, tampered or stale tokens.
 * Never falls back to the first page.
 */
export function decodeCursor(token: string, secret: string): CursorPosition {
  const parts = token.split('.');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new InvalidCursor('malformed token');
  }
  const [body, signature] = parts;

  const expected = Buffer.from(sign(secret, body), 'utf8');
  const actual = Buffer.from(signature, 'utf8');
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    throw new InvalidCursor('signature mismatch');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(body, 'base64url').toString('utf8'));
  } catch {
    throw new InvalidCursor('undecodable payload');
  }
  if (!isPayload(parsed)) throw new InvalidCursor('unexpected payload shape');
  if (parsed.v !== CURSOR_VERSION) throw new InvalidCursor(`unsupported version ${parsed.v}`);
  if (!parsed.ticker) throw new InvalidCursor('empty ticker');
  const ts = Date.parse(parsed.asOf);
  if (Number.isNaN(ts) || new Date(ts).toISOString() !== parsed.asOf) {
    throw new InvalidCursor('bad as_of');
  }

  return { asOf: parsed.asOf, ticker: parsed.ticker, pattern: parsed.pattern };
}
