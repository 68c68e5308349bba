/**
 * Circuit Breaker — stops calling a collaborator that keeps failing.
 */

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Consecutive failures before tripping to OPEN */
  failureThreshold: number;
  /** Time in ms before an OPEN circuit lets a probe call through */
  resetTimeoutMs: number;
}

export type StateChangeCallback = (from: CircuitState, to: CircuitState) => void;

export class CircuitOpenError extends Error {
  constructor(public readonly circuit: string) {
    super(`Circuit "${circuit}" is OPEN`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private openedAt = 0;
  private probeInFlight = false;
  private listeners: StateChangeCallback[] = [];

  constructor(
    readonly name: string,
    private config: CircuitBreakerConfig,
    private now: () => number = Date.now,
  ) {}

  /**
   * Run `fn` unless the circuit is open. While HALF_OPEN only one probe runs
   * at a time; its outcome closes or re-opens the circuit.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const state = this.getState();
    if (state === 'OPEN' || (state === 'HALF_OPEN' && this.probeInFlight)) {
      throw new CircuitOpenError(this.name);
    }

    const probing = state === 'HALF_OPEN';
    if (probing) this.probeInFlight = true;
    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    } finally {
      if (probing) this.probeInFlight = false;
    }
  }

  getState(): CircuitState {
    if (this.state === 'OPEN' && this.now() - this.openedAt >= this.config.resetTimeoutMs) {
      this.transition('HALF_OPEN');
    }
    return this.state;
  }

  onStateChange(callback: StateChangeCallback): void {
    this.listeners.push(callback);
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  forceReset(): void {
    this.failureCount = 0;
    this.transition('CLOSED');
  }

  private onSuccess(): void {
    this.failureCount = 0;
    this.transition('CLOSED');
  }

  private onFailure(): void {
    this.failureCount++;
    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      this.openedAt = this.now();
      this.transition('OPEN');
    }
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    for (const cb of this.listeners) {
      cb(from, to);
    }
  }
}
