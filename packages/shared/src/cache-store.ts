/**
 * Process-wide caches, held in one explicit object.
 *
 * Constructed once at startup and injected into the coordinator; tests build a
 * fresh store each. Concurrent writers on the same key are benign (last write
 * wins, values are equivalent).
 */

import { config, type CacheScope } from './config';
import { cacheHitsCounter, cacheMissesCounter } from './metrics';
import { logger } from './logger';
import type { ExtractionResult, FillMethod, RequestedExtractionMethod } from './types';

interface ExtractionEntry {
  result: ExtractionResult;
  storedAt: number;
}

export interface TemplateEntry {
  bytes: Uint8Array;
  fieldNames: string[];
  pageCount: number;
}

export interface CacheStoreOptions {
  ttlMs?: number;
  scope?: CacheScope;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface ExtractionCacheKey {
  contentHash: string;
  method: RequestedExtractionMethod;
  /** Requester identity, used when the scope is 'identity' */
  userId?: string;
}

export class CacheStore {
  readonly ttlMs: number;
  readonly scope: CacheScope;
  private readonly now: () => number;

  private readonly extractions = new Map<string, ExtractionEntry>();
  private readonly templates = new Map<string, TemplateEntry>();
  private readonly fillMethods = new Map<string, FillMethod>();

  constructor(options: CacheStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? config.extractionCacheTtlMs;
    this.scope = options.scope ?? config.extractionCacheScope;
    this.now = options.now ?? Date.now;
  }

  extractionKey({ contentHash, method, userId }: ExtractionCacheKey): string {
    const base = `${contentHash}_${method}`;
    if (this.scope === 'identity') {
      return `${userId || 'anonymous'}:${base}`;
    }
    return base;
  }

  /**
   * Look up a cached extraction. Expired entries are purged on access.
   */
  getExtraction(key: ExtractionCacheKey): ExtractionResult | undefined {
    const cacheKey = this.extractionKey(key);
    const entry = this.extractions.get(cacheKey);

    if (!entry) {
      cacheMissesCounter.inc({ cache: 'extraction' });
      return undefined;
    }

    if (this.now() - entry.storedAt > this.ttlMs) {
      this.extractions.delete(cacheKey);
      cacheMissesCounter.inc({ cache: 'extraction' });
      logger.debug('Extraction cache entry expired', { method: key.method });
      return undefined;
    }

    cacheHitsCounter.inc({ cache: 'extraction' });
    return entry.result;
  }

  /**
   * Store a successful extraction. The stored object is what later hits return.
   */
  setExtraction(key: ExtractionCacheKey, result: ExtractionResult): ExtractionResult {
    const stored: ExtractionResult = Object.freeze({
      ...result,
      method_used: 'cached',
      cost: 0,
      cached_from: result.method_used,
    });
    this.extractions.set(this.extractionKey(key), { result: stored, storedAt: this.now() });
    return stored;
  }

  getTemplate(templatePath: string): TemplateEntry | undefined {
    return this.templates.get(templatePath);
  }

  setTemplate(templatePath: string, entry: TemplateEntry): void {
    this.templates.set(templatePath, entry);
  }

  /** Method that last succeeded for a template; the fill cascade starts there */
  getFillMethod(templatePath: string): FillMethod | undefined {
    return this.fillMethods.get(templatePath);
  }

  setFillMethod(templatePath: string, method: FillMethod): void {
    this.fillMethods.set(templatePath, method);
  }

  stats(): { extractions: number; templates: number; ttlMs: number; scope: CacheScope } {
    return {
      extractions: this.extractions.size,
      templates: this.templates.size,
      ttlMs: this.ttlMs,
      scope: this.scope,
    };
  }

  clear(): void {
    this.extractions.clear();
    this.templates.clear();
    this.fillMethods.clear();
  }
}
