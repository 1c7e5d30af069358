/**
 * Tick Context Module
 *
 * AsyncLocalStorage-based context for one scheduler tick. Everything logged
 * while the chain is evaluated (sensor reads, sink writes) carries the tick
 * it belongs to.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Context established for each scheduler tick.
 */
export interface TickContext {
  /** Unique ID of this tick */
  tickId: string;
  /** Sequential tick number since the scheduler started */
  tickNumber: number;
}

const asyncLocalStorage = new AsyncLocalStorage<TickContext>();

/**
 * Run a function with tick context.
 * All descendant async operations inherit this context automatically.
 *
 * @example
 * ```ts
 * await withTickContext(createTickContext(1), async () => {
 *   // All logs here automatically get tickId
 *   logger.info('Pulling sensor');
 * });
 * ```
 */
export function withTickContext<T>(context: TickContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current tick context (if any).
 * Returns undefined if called outside of any withTickContext.
 */
export function getTickContext(): TickContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Create a new tick context.
 */
export function createTickContext(tickNumber: number): TickContext {
  return {
    tickId: `tick_${randomUUID().slice(0, 8)}`,
    tickNumber,
  };
}
