/**
 * Circuit breaker for the Ollama HTTP endpoints
 *
 * CLOSED -> OPEN after `failureThreshold` consecutive server-side failures;
 * OPEN -> HALF_OPEN once the recovery window elapses; HALF_OPEN -> CLOSED
 * after `halfOpenSuccessThreshold` successes, or straight back to OPEN on
 * any failure. Each consecutive trip doubles the recovery window (capped
 * at 16x).
 *
 * Only server-side errors count: HTTP 429/5xx, timeouts and network
 * failures. A malformed prompt or an unparseable response is the caller's
 * problem and leaves the breaker alone.
 */

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

const SERVER_STATUS_PATTERN = /\b(429|500|502|503|504)\b/;
const NETWORK_ERROR_PATTERN =
  /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|EAI_AGAIN|socket hang up|fetch failed|timed out/i;
const OVERLOAD_PATTERN =
  /rate.?limit|server.?(error|overloaded|unavailable)|service.?unavailable|model.*load/i;

/**
 * Whether `error` looks like a transient server-side failure.
 */
export function isServerError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const cause = error.cause;
  const causeMsg = cause instanceof Error ? cause.message : '';
  const causeCode =
    typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string'
      ? cause.code
      : '';
  const combined = `${error.message} ${causeMsg} ${causeCode}`;

  return (
    SERVER_STATUS_PATTERN.test(combined) ||
    NETWORK_ERROR_PATTERN.test(combined) ||
    OVERLOAD_PATTERN.test(combined)
  );
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
  /** Prefix for log lines, e.g. "LLM" or "Embedding" */
  name: string;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60_000,
  halfOpenSuccessThreshold: 2,
  name: 'CircuitBreaker',
};

const MAX_RECOVERY_MULTIPLIER = 16;

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  consecutiveTrips: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private halfOpenSuccesses = 0;
  private lastFailureTime: number | null = null;
  private consecutiveTrips = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getRecoveryTimeMs(): number {
    const exponent = Math.max(0, this.consecutiveTrips - 1);
    const multiplier = Math.min(Math.pow(2, exponent), MAX_RECOVERY_MULTIPLIER);
    return this.config.recoveryTimeMs * multiplier;
  }

  /**
   * Run `fn` unless the circuit is open.
   *
   * @throws CircuitBreakerOpenError while OPEN
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === 'OPEN') {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `${this.config.name} circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isServerError(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  isOpen(): boolean {
    this.checkRecovery();
    return this.state === 'OPEN';
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      consecutiveTrips: this.consecutiveTrips,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === 'OPEN' ? this.getTimeToRecovery() : null,
    };
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.halfOpenSuccesses = 0;
    this.lastFailureTime = null;
    this.consecutiveTrips = 0;
    console.error(`[${this.config.name}] Circuit manually reset to CLOSED`);
  }

  private checkRecovery(): void {
    if (this.state !== 'OPEN' || this.lastFailureTime === null) return;
    if (Date.now() - this.lastFailureTime >= this.getRecoveryTimeMs()) {
      console.error(
        `[${this.config.name}] Circuit OPEN -> HALF_OPEN after ${this.getRecoveryTimeMs()}ms (trip #${this.consecutiveTrips})`
      );
      this.state = 'HALF_OPEN';
      this.halfOpenSuccesses = 0;
    }
  }

  private recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.config.halfOpenSuccessThreshold) {
        console.error(`[${this.config.name}] Recovery confirmed, circuit CLOSED`);
        this.state = 'CLOSED';
        this.failureCount = 0;
        this.halfOpenSuccesses = 0;
        this.lastFailureTime = null;
        this.consecutiveTrips = 0;
      }
      return;
    }
    this.failureCount = 0;
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      this.consecutiveTrips++;
      this.state = 'OPEN';
      this.halfOpenSuccesses = 0;
      console.error(
        `[${this.config.name}] Circuit OPEN after ${this.failureCount} failures (trip #${this.consecutiveTrips}, recovery ${this.getRecoveryTimeMs()}ms)`
      );
      return;
    }

    console.error(
      `[${this.config.name}] Failure recorded (${this.failureCount}/${this.config.failureThreshold})`
    );
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (Date.now() - this.lastFailureTime));
  }
}

/**
 * Thrown instead of calling the service while the circuit is open
 */
export class CircuitBreakerOpenError extends Error {
  constructor(
    message: string,
    public readonly timeToRecovery: number
  ) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
  }
}
