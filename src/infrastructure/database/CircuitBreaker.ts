/**
 * Circuit Breaker around database calls.
 * After `threshold` consecutive failures it rejects immediately for `timeoutMs`,
 * then lets calls through half-open until two succeed. It never retries.
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private successCount = 0;
  private nextAttempt = 0;

  private readonly threshold: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly isFailure: (error: unknown) => boolean;

  constructor(options: CircuitBreakerOptions = {}) {
    this.threshold = options.threshold ?? 5;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.now = options.now ?? Date.now;
    this.isFailure = options.isFailure ?? (() => true);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (this.now() < this.nextAttempt) {
        throw new CircuitBreakerOpenError(
          `Circuit breaker is OPEN. Next attempt at ${new Date(this.nextAttempt).toISOString()}`
        );
      }
      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      // Errors the backend answered with (constraint violations etc.) prove it is up
      if (this.isFailure(error)) {
        this.onFailure();
      } else {
        this.onSuccess();
      }
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  private onSuccess(): void {
    this.failures = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= 2) {
        this.state = CircuitState.CLOSED;
        this.successCount = 0;
      }
    }
  }

  private onFailure(): void {
    this.failures++;

    // A failed probe reopens straight away
    if (this.state === CircuitState.HALF_OPEN || this.failures >= this.threshold) {
      this.state = CircuitState.OPEN;
      this.nextAttempt = this.now() + this.timeoutMs;
    }
  }
}

export interface CircuitBreakerOptions {
  threshold?: number;
  timeoutMs?: number;
  now?: () => number;
  /** Which errors count towards opening the circuit. Defaults to all. */
  isFailure?: (error: unknown) => boolean;
}

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export class CircuitBreakerOpenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
  }
}
