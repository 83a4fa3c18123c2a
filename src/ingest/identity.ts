/**
 * Text normalization, cache fingerprints and deterministic chunk identifiers.
 */

import { createHash } from 'node:crypto';
import { v5 as uuidv5 } from 'uuid';

/** Namespace for chunk identifiers; changing it re-keys every stored point */
export const CHUNK_ID_NAMESPACE = 'a3f1c2d4-5b6e-4f70-8a91-b2c3d4e5f607';

/**
 * NFKC, whitespace runs collapsed to one space, trimmed.
 */
export function normalizeText(text: string): string {
  return text.normalize('NFKC').replace(/\s+/gu, ' ').trim();
}

/**
 * Cache key for a normalized text. The model name is part of the key, so
 * vectors of one model are never served for another.
 */
export function fingerprint(normalizedText: string, model: string): string {
  return createHash('sha256').update(model).update('\u0000').update(normalizedText).digest('hex');
}

/**
 * Stable identifier for the chunk at `index` of `documentId`.
 * Re-processing the same input always yields the same id in both sinks.
 */
export function chunkId(documentId: string, index: number): string {
  return uuidv5(`${documentId}#${index}`, CHUNK_ID_NAMESPACE);
}

/**
 * Cut `text` to at most `maxChars` code points. Returns the input unchanged
 * when it already fits.
 */
export function truncateText(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  const codePoints = Array.from(text);
  if (codePoints.length <= maxChars) {
    return { text, truncated: false };
  }
  return { text: codePoints.slice(0, maxChars).join(''), truncated: true };
}
