/**
 * Collaborator Guard — explicit timeout plus circuit breaker around calls to
 * external collaborators (signer, verifier, rollback executor, action executor).
 * A timeout or an open circuit surfaces as a rejected promise; callers map it
 * onto the same failure path as an explicit negative answer.
 */

// ── Types ──

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Number of consecutive failures before tripping to OPEN */
  failureThreshold: number;
  /** Time in ms before transitioning from OPEN to HALF_OPEN */
  resetTimeoutMs: number;
  /** Trial calls allowed while HALF_OPEN */
  halfOpenMaxAttempts: number;
}

export type StateChangeCallback = (from: CircuitState, to: CircuitState) => void;

export class CollaboratorTimeoutError extends Error {
  constructor(readonly collaborator: string, readonly timeoutMs: number) {
    super(`${collaborator} did not answer within ${timeoutMs}ms`);
    this.name = 'CollaboratorTimeoutError';
  }
}

export class CircuitOpenError extends Error {
  constructor(readonly collaborator: string) {
    super(`Circuit for ${collaborator} is OPEN`);
    this.name = 'CircuitOpenError';
  }
}

/** Race `fn` against a timer; the timer is always cleared. */
export async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number, collaborator: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CollaboratorTimeoutError(collaborator, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ── Circuit Breaker ──

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private halfOpenAttempts = 0;
  private lastFailureTime = 0;
  private listeners: StateChangeCallback[] = [];

  constructor(
    private name: string,
    private config: CircuitBreakerConfig,
    private clock: () => Date = () => new Date(),
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.getState() === 'OPEN') {
      throw new CircuitOpenError(this.name);
    }
    if (this.state === 'HALF_OPEN') {
      if (this.halfOpenAttempts >= this.config.halfOpenMaxAttempts) {
        throw new CircuitOpenError(this.name);
      }
      this.halfOpenAttempts++;
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    }
  }

  getState(): CircuitState {
    if (this.state === 'OPEN' && this.clock().getTime() - this.lastFailureTime >= this.config.resetTimeoutMs) {
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

  private onSuccess(): void {
    this.failureCount = 0;
    this.halfOpenAttempts = 0;
    this.transition('CLOSED');
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.clock().getTime();
    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      this.halfOpenAttempts = 0;
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

// ── Guard ──

/** Timeout + circuit breaker for one named collaborator */
export class CollaboratorGuard {
  readonly breaker: CircuitBreaker;

  constructor(
    readonly name: string,
    private timeoutMs: number,
    breakerConfig: CircuitBreakerConfig,
    clock?: () => Date,
  ) {
    this.breaker = new CircuitBreaker(name, breakerConfig, clock);
  }

  call<T>(fn: () => Promise<T>): Promise<T> {
    return this.breaker.execute(() => withTimeout(fn, this.timeoutMs, this.name));
  }
}
