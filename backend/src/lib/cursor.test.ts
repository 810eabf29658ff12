import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import { decodeCursor, encodeCursor } from './cursor';
import { InvalidCursor } from './errors';

const SECRET = 'test-secret';
const position = { asOf: '2024-03-30T00:00:00.000Z', ticker: 'NVDA', pattern: 'VCP' };

function signed(payload: unknown, secret = SECRET): string {
  const body = Buffer.from(JSON.stringify(payload), 'utf8').toString('base64url');
  const sig = crypto.createHmac('sha256', secret).update(body).digest('base64url');
  return `${body}.${sig}`;
}

describe('cursor', () => {
  it('round-trips a position', () => {
    const token = encodeCursor(position, SECRET);
    expect(token).toMatch(/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/);
    expect(decodeCursor(token, SECRET)).toEqual(position);
  });

  it('rejects a tampered payload', () => {
    const [, sig] = encodeCursor(position, SECRET).split('.');
    const forged = Buffer.from(JSON.stringify({ ...position, v: 1, ticker: 'AAPL' })).toString('base64url');
    expect(() => decodeCursor(`${forged}.${sig}`, SECRET)).toThrow(InvalidCursor);
  });

  it('rejects a token signed with another secret', () => {
    const token = encodeCursor(position, 'other-secret');
    expect(() => decodeCursor(token, SECRET)).toThrow('Invalid cursor: signature mismatch');
  });

  it('rejects garbage', () => {
    expect(() => decodeCursor('not-a-cursor', SECRET)).toThrow('Invalid cursor: malformed token');
    expect(() => decodeCursor('.', SECRET)).toThrow(InvalidCursor);
  });

  it('rejects unknown versions', () => {
    expect(() => decodeCursor(signed({ ...position, v: 2 }), SECRET)).toThrow('Invalid cursor: unsupported version 2');
  });

  it('rejects payloads with a bad shape or timestamp', () => {
    expect(() => decodeCursor(signed({ v: 1, ticker: 'NVDA' }), SECRET)).toThrow('Invalid cursor: unexpected payload shape');
    expect(() => decodeCursor(signed({ ...position, v: 1, asOf: '2024-03-30' }), SECRET)).toThrow(
      'Invalid cursor: bad as_of'
    );
    expect(() => decodeCursor(signed({ ...position, v: 1, ticker: '' }), SECRET)).toThrow('Invalid cursor: empty ticker');
  });
});
