import { describe, it, expect } from 'vitest';
import { chunkId, fingerprint, normalizeText, truncateText } from '../identity.js';

const UUID_V5 = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('normalizeText', () => {
  it('collapses whitespace runs and trims', () => {
    expect(normalizeText('  Hello\n\n\tworld  again ')).toBe('Hello world again');
  });

  it('applies NFKC', () => {
    expect(normalizeText('ﬁle Ａ')).toBe('file A');
  });

  it('returns an empty string for blank input', () => {
    expect(normalizeText(' \n\t ')).toBe('');
  });
});

describe('fingerprint', () => {
  it('is a sha-256 hex digest', () => {
    expect(fingerprint('text', 'model')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('depends on text and model', () => {
    const base = fingerprint('text', 'model-a');

    expect(fingerprint('text', 'model-a')).toBe(base);
    expect(fingerprint('text', 'model-b')).not.toBe(base);
    expect(fingerprint('text2', 'model-a')).not.toBe(base);
  });

  it('does not confuse model and text boundaries', () => {
    expect(fingerprint('b', 'a')).not.toBe(fingerprint('', 'ab'));
  });
});

describe('chunkId', () => {
  it('is a stable UUID v5', () => {
    const id = chunkId('books/dune.epub', 3);

    expect(id).toMatch(UUID_V5);
    expect(chunkId('books/dune.epub', 3)).toBe(id);
  });

  it('differs per document and per index', () => {
    const id = chunkId('doc', 0);

    expect(chunkId('doc', 1)).not.toBe(id);
    expect(chunkId('doc2', 0)).not.toBe(id);
  });
});

describe('truncateText', () => {
  it('leaves short text alone', () => {
    expect(truncateText('abc', 3)).toEqual({ text: 'abc', truncated: false });
  });

  it('cuts to the limit', () => {
    expect(truncateText('abcdef', 4)).toEqual({ text: 'abcd', truncated: true });
  });

  it('counts code points, not UTF-16 units', () => {
    expect(truncateText('😀😀😀', 4)).toEqual({ text: '😀😀😀', truncated: false });
    expect(truncateText('😀😀😀', 2)).toEqual({ text: '😀😀', truncated: true });
  });
});
