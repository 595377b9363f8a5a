/**
 * Concurrency Control
 *
 * Counting semaphore that gates how many operations run at once. `parallel`
 * uses one per call, sized by the policy's parallelism.
 *
 * @example
 * ```typescript
 * const limiter = createConcurrencyLimiter('uploads', { maxConcurrent: 4 });
 *
 * const sizes = await limiter.executeAll(
 *   files.map((file) => () => upload(file))
 * );
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for concurrency limiter.
 */
export interface ConcurrencyLimiterConfig {
  /**
   * Maximum concurrent operations. `Infinity` disables the limit.
   */
  maxConcurrent: number;
}

/**
 * Statistics for concurrency limiter.
 */
export interface ConcurrencyLimiterStats {
  name: string;
  activeCount: number;
  maxConcurrent: number;
  queueSize: number;
}

/**
 * Concurrency limiter interface.
 */
export interface ConcurrencyLimiter {
  /**
   * Execute an operation once a slot is free.
   * @param operation - The operation to execute
   * @returns The operation result
   */
  execute<T>(operation: () => T | Promise<T>): Promise<T>;

  /**
   * Execute multiple operations with concurrency control.
   * @param operations - Array of operation factories
   * @returns Array of results (in order)
   */
  executeAll<T>(operations: Array<() => T | Promise<T>>): Promise<T[]>;

  /**
   * Get current statistics.
   */
  getStats(): ConcurrencyLimiterStats;
}

// =============================================================================
// Concurrency Limiter
// =============================================================================

/**
 * Create a concurrency limiter. Waiting operations start in FIFO order.
 *
 * @param name - Name for the limiter (reported in stats)
 * @param config - Concurrency limiter configuration
 */
export function createConcurrencyLimiter(
  name: string,
  config: ConcurrencyLimiterConfig
): ConcurrencyLimiter {
  const maxConcurrent = config.maxConcurrent >= 1 ? config.maxConcurrent : 1;

  let activeCount = 0;
  const queue: Array<() => void> = [];

  /**
   * Acquire a slot.
   */
  async function acquire(): Promise<void> {
    if (activeCount < maxConcurrent) {
      activeCount++;
      return;
    }

    return new Promise<void>((resolve) => {
      queue.push(resolve);
    });
  }

  /**
   * Release a slot, handing it straight to the next waiter if there is one.
   */
  function release(): void {
    const next = queue.shift();
    if (next) {
      next();
    } else {
      activeCount--;
    }
  }

  return {
    async execute<T>(operation: () => T | Promise<T>): Promise<T> {
      await acquire();
      try {
        return await operation();
      } finally {
        release();
      }
    },

    async executeAll<T>(operations: Array<() => T | Promise<T>>): Promise<T[]> {
      return Promise.all(operations.map((operation) => this.execute(operation)));
    },

    getStats(): ConcurrencyLimiterStats {
      return {
        name,
        activeCount,
        maxConcurrent,
        queueSize: queue.length,
      };
    },
  };
}
