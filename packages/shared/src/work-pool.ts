/**
 * Bounded pool for blocking library work (rasterization, image encoding,
 * form-field I/O). The size is a fixed constant, not request-proportional.
 */

import pLimit from 'p-limit';
import { config } from './config';

export interface WorkPool {
  readonly size: number;
  run<T>(task: () => Promise<T>): Promise<T>;
  /** Tasks currently executing */
  activeCount(): number;
  /** Tasks waiting for a slot */
  pendingCount(): number;
}

export function createWorkPool(size: number = config.workPoolSize): WorkPool {
  const limit = pLimit(Math.max(1, size));

  return {
    size: Math.max(1, size),
    run: <T>(task: () => Promise<T>) => limit(task),
    activeCount: () => limit.activeCount,
    pendingCount: () => limit.pendingCount,
  };
}
