/**
 * First-success cascade.
 *
 * Runs candidates in order and stops at the first that reports success. Each
 * failure (a `success: false` outcome or a thrown error) is collected. Shared by
 * the extraction fallback and the fill-method cascade.
 */

import { errorMessage } from './errors';
import { logger } from './logger';

export interface CascadeCandidate<TName extends string, TResult extends { success: boolean; error?: string }> {
  name: TName;
  run: () => Promise<TResult>;
}

export interface CascadeFailure<TName extends string, TResult> {
  name: TName;
  error: string;
  /** The failed result, absent when the candidate threw */
  result?: TResult;
}

export interface CascadeOutcome<TName extends string, TResult> {
  winner?: { name: TName; result: TResult };
  failures: CascadeFailure<TName, TResult>[];
}

export async function firstSuccess<
  TName extends string,
  TResult extends { success: boolean; error?: string },
>(candidates: CascadeCandidate<TName, TResult>[]): Promise<CascadeOutcome<TName, TResult>> {
  const failures: CascadeFailure<TName, TResult>[] = [];

  for (const [index, candidate] of candidates.entries()) {
    try {
      const result = await candidate.run();
      if (result.success) {
        return { winner: { name: candidate.name, result }, failures };
      }
      failures.push({ name: candidate.name, error: result.error || 'unknown failure', result });
    } catch (error) {
      logger.error('Cascade candidate threw', error, { candidate: candidate.name });
      failures.push({ name: candidate.name, error: errorMessage(error) });
    }

    logger.debug('Cascade candidate failed, trying next', {
      candidate: candidate.name,
      remaining: candidates.length - index - 1,
    });
  }

  return { failures };
}
