/**
 * Cache Store Tests
 *
 * Extraction cache keys, scope, TTL and the frozen cached result shape.
 */

import { CacheStore, type ExtractionResult } from '@formbridge/shared';
import { sampleMnrTree } from './helpers';

function visionResult(): ExtractionResult {
  return {
    success: true,
    data: sampleMnrTree(),
    method_used: 'vision',
    confidence: 0.92,
    cost: 0.012,
    tokens: 1800,
    processing_time: 3.2,
  };
}

describe('CacheStore', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_700_000_000_000;
  });

  it('should return a frozen cached copy with zero cost', () => {
    const cache = new CacheStore({ ttlMs: 60_000, scope: 'shared', now: clock });
    const key = { contentHash: 'abc', method: 'auto' as const };

    cache.setExtraction(key, visionResult());
    const hit = cache.getExtraction(key);

    expect(hit).toMatchObject({ success: true, method_used: 'cached', cached_from: 'vision', cost: 0, tokens: 1800 });
    expect(Object.isFrozen(hit)).toBe(true);
  });

  it('should key entries by content hash and requested method', () => {
    const cache = new CacheStore({ ttlMs: 60_000, scope: 'shared', now: clock });
    cache.setExtraction({ contentHash: 'abc', method: 'auto' }, visionResult());

    expect(cache.getExtraction({ contentHash: 'abc', method: 'vision' })).toBeUndefined();
    expect(cache.getExtraction({ contentHash: 'def', method: 'auto' })).toBeUndefined();
    expect(cache.extractionKey({ contentHash: 'abc', method: 'auto' })).toBe('abc_auto');
  });

  it('should expire entries after the TTL', () => {
    const cache = new CacheStore({ ttlMs: 60_000, scope: 'shared', now: clock });
    const key = { contentHash: 'abc', method: 'auto' as const };
    cache.setExtraction(key, visionResult());

    now += 60_000;
    expect(cache.getExtraction(key)).toBeDefined();

    now += 1;
    expect(cache.getExtraction(key)).toBeUndefined();
    expect(cache.stats().extractions).toBe(0);
  });

  it('should share entries across callers in shared scope', () => {
    const cache = new CacheStore({ ttlMs: 60_000, scope: 'shared', now: clock });
    cache.setExtraction({ contentHash: 'abc', method: 'auto', userId: 'user-1' }, visionResult());

    expect(cache.getExtraction({ contentHash: 'abc', method: 'auto', userId: 'user-2' })).toBeDefined();
  });

  it('should isolate entries per caller in identity scope', () => {
    const cache = new CacheStore({ ttlMs: 60_000, scope: 'identity', now: clock });
    cache.setExtraction({ contentHash: 'abc', method: 'auto', userId: 'user-1' }, visionResult());

    expect(cache.getExtraction({ contentHash: 'abc', method: 'auto', userId: 'user-2' })).toBeUndefined();
    expect(cache.getExtraction({ contentHash: 'abc', method: 'auto', userId: 'user-1' })).toBeDefined();
    expect(cache.extractionKey({ contentHash: 'abc', method: 'auto' })).toBe('anonymous:abc_auto');
  });

  it('should hold template inventories and fill methods', () => {
    const cache = new CacheStore({ ttlMs: 60_000, scope: 'shared', now: clock });
    cache.setTemplate('/t/ash.pdf', { bytes: new Uint8Array([1]), fieldNames: ['Weight'], pageCount: 1 });
    cache.setFillMethod('/t/ash.pdf', 'overlay');

    expect(cache.getTemplate('/t/ash.pdf')?.fieldNames).toEqual(['Weight']);
    expect(cache.getFillMethod('/t/ash.pdf')).toBe('overlay');

    cache.clear();
    expect(cache.stats()).toEqual({ extractions: 0, templates: 0, ttlMs: 60_000, scope: 'shared' });
  });
});
