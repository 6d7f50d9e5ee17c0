/**
 * Circuit Breaker for the Gemini cross-encoder
 * - threshold: 5 consecutive failures opens the circuit
 * - recovery: after 60 seconds one trial window (HALF_OPEN) is allowed
 *
 * While OPEN every rerank fails fast with CircuitBreakerOpenError instead of
 * waiting on retries for each candidate.
 */

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
  /** Clock, replaceable in tests */
  now: () => number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 3,
  now: () => Date.now(),
};

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Execute a function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state === CircuitState.OPEN && this.lastFailureTime !== null) {
      const elapsed = this.config.now() - this.lastFailureTime;
      if (elapsed >= this.config.recoveryTimeMs) {
        console.error('[CircuitBreaker] Transitioning from OPEN to HALF_OPEN');
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
      }
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, transitioning to CLOSED');
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
        this.successCount = 0;
        this.lastFailureTime = null;
      }
    } else if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.config.now();

    if (this.state === CircuitState.HALF_OPEN) {
      // Any failure in HALF_OPEN reopens immediately
      console.error('[CircuitBreaker] Failure in HALF_OPEN, transitioning to OPEN');
      this.state = CircuitState.OPEN;
      this.successCount = 0;
    } else if (this.failureCount >= this.config.failureThreshold) {
      console.error(`[CircuitBreaker] Threshold reached (${this.failureCount}), transitioning to OPEN`);
      this.state = CircuitState.OPEN;
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    const elapsed = this.config.now() - this.lastFailureTime;
    return Math.max(0, this.config.recoveryTimeMs - elapsed);
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
  }
}

/**
 * Error thrown when circuit breaker is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}
