/**
 * Extraction Strategy Types
 *
 * A strategy turns one prepared document into a structured MNR tree. Each
 * reports its own success, confidence and cost; none of them throws for an
 * ordinary recognition failure.
 */

import type { ExtractionMethodName, ExtractionResult, PreparedDocument } from '../types';

export interface StrategyAvailability {
  available: boolean;
  /** Why the strategy cannot run, when it cannot */
  reason?: string;
}

export interface ExtractionStrategy {
  /** Registry key */
  readonly method: ExtractionMethodName;

  /** Human-readable description of what this strategy does */
  readonly description: string;

  isAvailable(): StrategyAvailability;

  extract(document: PreparedDocument): Promise<ExtractionResult>;
}
