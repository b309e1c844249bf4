/**
 * Extraction Orchestrator
 *
 * Picks a strategy for the requested method and, with fallback enabled, tries
 * each other registered strategy once until one succeeds.
 */

import { firstSuccess } from '../cascade';
import { ExtractionUnavailableError } from '../errors';
import { logger } from '../logger';
import type {
  ExtractionMethodName,
  ExtractionResult,
  PreparedDocument,
  RequestedExtractionMethod,
} from '../types';
import type { ExtractionRegistry } from './registry';

export interface ExtractOptions {
  fallback?: boolean;
}

export interface OrchestratorStats {
  registered_methods: ExtractionMethodName[];
  available_methods: Record<ExtractionMethodName, boolean>;
}

export class ExtractionOrchestrator {
  constructor(private readonly registry: ExtractionRegistry) {
    if (registry.size() === 0) {
      throw new ExtractionUnavailableError();
    }
  }

  /**
   * `auto` prefers vision and falls back to the first available strategy.
   */
  resolveMethod(method: RequestedExtractionMethod): ExtractionMethodName {
    if (method !== 'auto') return method;

    const availability = this.registry.availability();
    if (this.registry.has('vision') && availability.vision) return 'vision';

    const available = this.registry.methods().find((name) => availability[name]);
    if (!available) {
      throw new ExtractionUnavailableError();
    }
    return available;
  }

  async extract(
    document: PreparedDocument,
    method: RequestedExtractionMethod = 'auto',
    options: ExtractOptions = {}
  ): Promise<ExtractionResult> {
    const fallback = options.fallback ?? true;
    const chosen = this.resolveMethod(method);

    const strategy = this.registry.get(chosen);
    if (!fallback && (!strategy || !strategy.isAvailable().available)) {
      throw new ExtractionUnavailableError(`Extraction method ${chosen} is not available`);
    }

    const order: ExtractionMethodName[] = [chosen];
    if (fallback) {
      order.push(...this.registry.methods().filter((name) => name !== chosen));
    }

    logger.info('Extracting document', {
      requested_method: method,
      order,
      fallback,
      content_hash: document.content_hash,
    });

    const startTime = Date.now();
    const outcome = await firstSuccess(
      order.map((name) => ({
        name,
        run: (): Promise<ExtractionResult> => {
          const candidate = this.registry.get(name);
          if (!candidate) {
            return Promise.reject(new ExtractionUnavailableError(`Extraction method ${name} is not registered`));
          }
          return candidate.extract(document);
        },
      }))
    );

    const attempts = outcome.failures.map((failure) => ({ method: failure.name, error: failure.error }));
    const failedCost = outcome.failures.reduce((sum, failure) => sum + (failure.result?.cost ?? 0), 0);

    if (outcome.winner) {
      const result = outcome.winner.result;
      if (attempts.length > 0) {
        logger.warn('Extraction succeeded after fallback', {
          method: outcome.winner.name,
          failed_methods: attempts.map((attempt) => attempt.method),
        });
      }
      return {
        ...result,
        cost: result.cost + failedCost,
        // Failed attempts count toward the time spent
        ...(attempts.length > 0 ? { attempts, processing_time: (Date.now() - startTime) / 1000 } : {}),
      };
    }

    logger.warn('All extraction methods failed', { attempts });
    return {
      success: false,
      method_used: 'all_failed',
      confidence: 0,
      cost: failedCost,
      tokens: 0,
      processing_time: (Date.now() - startTime) / 1000,
      error: 'All extraction methods failed',
      attempts,
    };
  }

  getStats(): OrchestratorStats {
    return {
      registered_methods: this.registry.methods(),
      available_methods: this.registry.availability(),
    };
  }
}
