/**
 * Extraction Strategy Registry
 *
 * Lookup table from method name to strategy. One registry instance per
 * orchestrator, so tests register fakes without touching shared state.
 */

import type { ExtractionMethodName } from '../types';
import type { ExtractionStrategy } from './types';
import { logger } from '../logger';

export class ExtractionRegistry {
  private readonly strategies = new Map<ExtractionMethodName, ExtractionStrategy>();

  constructor(strategies: ExtractionStrategy[] = []) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  /**
   * Register a strategy. Overwrites any existing strategy for that method.
   */
  register(strategy: ExtractionStrategy): void {
    this.strategies.set(strategy.method, strategy);

    logger.debug('Registered extraction strategy', {
      method: strategy.method,
      description: strategy.description,
    });
  }

  get(method: ExtractionMethodName): ExtractionStrategy | undefined {
    return this.strategies.get(method);
  }

  has(method: ExtractionMethodName): boolean {
    return this.strategies.has(method);
  }

  /** Registered methods in registration order */
  methods(): ExtractionMethodName[] {
    return Array.from(this.strategies.keys());
  }

  size(): number {
    return this.strategies.size;
  }

  /**
   * Availability of each registered method
   */
  availability(): Record<ExtractionMethodName, boolean> {
    const result: Record<ExtractionMethodName, boolean> = { vision: false, legacy_ocr: false };
    for (const [method, strategy] of this.strategies) {
      result[method] = strategy.isAvailable().available;
    }
    return result;
  }
}
