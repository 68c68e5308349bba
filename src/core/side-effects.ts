/**
 * Side-effect guard for best-effort collaborator calls.
 *
 * Notification and reputation calls must never fail the operation that
 * triggered them. Each named effect gets its own circuit breaker; failures
 * and skips are logged and counted, then reported back as `false`.
 */

import { CircuitBreaker, CircuitOpenError, type CircuitBreakerConfig } from './circuit-breaker.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';

export class SideEffectGuard {
  private breakers = new Map<string, CircuitBreaker>();

  constructor(
    private config: CircuitBreakerConfig,
    private logger: Logger,
    private metrics: MetricsCollector,
    private now: () => number = Date.now,
  ) {}

  /** Resolves to `true` when the effect ran without throwing. */
  async attempt(effect: string, fn: () => Promise<void>, context: Record<string, unknown> = {}): Promise<boolean> {
    try {
      await this.breaker(effect).execute(fn);
      return true;
    } catch (err) {
      if (err instanceof CircuitOpenError) {
        this.metrics.counter('side_effects.skipped', { effect });
        this.logger.warn('Side effect skipped, circuit open', { effect, ...context });
      } else {
        this.metrics.counter('side_effects.failed', { effect });
        this.logger.warn('Side effect failed', {
          effect,
          error: err instanceof Error ? err.message : String(err),
          ...context,
        });
      }
      return false;
    }
  }

  breaker(effect: string): CircuitBreaker {
    let breaker = this.breakers.get(effect);
    if (!breaker) {
      breaker = new CircuitBreaker(effect, this.config, this.now);
      breaker.onStateChange((from, to) => {
        this.logger.info('Circuit state changed', { effect, from, to });
      });
      this.breakers.set(effect, breaker);
    }
    return breaker;
  }
}
