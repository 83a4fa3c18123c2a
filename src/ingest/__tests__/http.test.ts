import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { assertOk, isTransientStatus, joinUrl, parseJsonBody } from '../http.js';
import { SinkRejectedError, TransientIOError } from '../../errors/index.js';

describe('joinUrl', () => {
  it('joins without doubling slashes', () => {
    expect(joinUrl('http://localhost:6333/', '/collections')).toBe('http://localhost:6333/collections');
    expect(joinUrl('http://localhost:6333', 'collections')).toBe('http://localhost:6333/collections');
  });
});

describe('isTransientStatus', () => {
  it.each([408, 429, 500, 502, 503, 504])('%i is transient', (status) => {
    expect(isTransientStatus(status)).toBe(true);
  });

  it.each([400, 401, 404, 409, 422])('%i is not transient', (status) => {
    expect(isTransientStatus(status)).toBe(false);
  });
});

describe('assertOk', () => {
  it('accepts any 2xx', () => {
    expect(() => assertOk('qdrant', { status: 200, body: '' }, 'sink')).not.toThrow();
    expect(() => assertOk('qdrant', { status: 204, body: '' }, 'sink')).not.toThrow();
  });

  it('rejects sink 4xx without retry', () => {
    expect(() => assertOk('qdrant', { status: 400, body: 'wrong vector size' }, 'sink')).toThrow(SinkRejectedError);
  });

  it('treats sink 429 and 5xx as transient', () => {
    expect(() => assertOk('qdrant', { status: 429, body: '' }, 'sink')).toThrow(TransientIOError);
    expect(() => assertOk('qdrant', { status: 503, body: 'overloaded' }, 'sink')).toThrow(
      'qdrant answered with status 503: overloaded'
    );
  });

  it('treats every provider failure as transient', () => {
    expect(() => assertOk('ollama', { status: 400, body: '' }, 'embedding')).toThrow(TransientIOError);
  });

  it('cuts long bodies in messages', () => {
    try {
      assertOk('quickwit', { status: 400, body: 'x'.repeat(400) }, 'sink');
    } catch (error) {
      expect(error).toBeInstanceOf(SinkRejectedError);
      expect(error).toHaveProperty('message', `quickwit rejected the request with status 400: ${'x'.repeat(300)}...`);
      return;
    }
    expect.unreachable();
  });
});

describe('parseJsonBody', () => {
  const Schema = z.object({ ok: z.boolean() });

  it('returns the parsed value', () => {
    expect(parseJsonBody('svc', '{"ok":true}', Schema)).toEqual({ ok: true });
  });

  it('treats non-JSON as transient', () => {
    expect(() => parseJsonBody('svc', '<html>', Schema)).toThrow('svc returned a body that is not JSON');
  });

  it('lists schema issues', () => {
    expect(() => parseJsonBody('svc', '{"ok":"yes"}', Schema)).toThrow(
      'svc returned a malformed response (ok: Expected boolean, received string)'
    );
  });
});
