import logger from "./logger";

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitPolicy {
  /** Consecutive failures that open a closed circuit. */
  failureThreshold: number;
  /** Successful trial calls needed to close a half-open circuit. */
  successThreshold: number;
  cooldownMs: number;
}

export interface CircuitSnapshot {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  trialSuccesses: number;
  openedAt: number | null;
  retryAfterMs: number;
}

export class CircuitOpenError extends Error {
  constructor(
    readonly circuit: string,
    readonly retryAfterMs: number,
  ) {
    super(`${circuit} is open. Retry after ${Math.ceil(retryAfterMs / 1000)}s`);
    this.name = "CircuitOpenError";
  }
}

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private trialSuccesses = 0;
  private openedAt: number | null = null;

  constructor(
    readonly name: string,
    private readonly policy: CircuitPolicy,
    private readonly now: () => number = Date.now,
  ) {}

  getState(): CircuitState {
    this.maybeHalfOpen();
    return this.state;
  }

  retryAfterMs(): number {
    if (this.state !== "open" || this.openedAt === null) return 0;
    return Math.max(0, this.openedAt + this.policy.cooldownMs - this.now());
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    this.maybeHalfOpen();
    if (this.state === "open") {
      throw new CircuitOpenError(this.name, this.retryAfterMs());
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure();
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  snapshot(): CircuitSnapshot {
    this.maybeHalfOpen();
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      trialSuccesses: this.trialSuccesses,
      openedAt: this.openedAt,
      retryAfterMs: this.retryAfterMs(),
    };
  }

  private maybeHalfOpen(): void {
    if (this.state === "open" && this.retryAfterMs() === 0) {
      this.moveTo("half-open");
    }
  }

  private recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state !== "half-open") return;
    this.trialSuccesses += 1;
    if (this.trialSuccesses >= this.policy.successThreshold) {
      this.moveTo("closed");
    }
  }

  private recordFailure(): void {
    this.consecutiveFailures += 1;
    // any failed trial call reopens immediately
    if (this.state === "half-open" || this.consecutiveFailures >= this.policy.failureThreshold) {
      this.moveTo("open");
    }
  }

  private moveTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.trialSuccesses = 0;
    if (next === "open") {
      this.openedAt = this.now();
    } else if (next === "closed") {
      this.consecutiveFailures = 0;
      this.openedAt = null;
    }
    if (previous !== next) {
      logger.warn("Circuit state changed", { circuit: this.name, from: previous, to: next });
    }
  }
}

/** One lazily created circuit per key, all sharing a policy. */
export class CircuitBreakerGroup {
  private readonly circuits = new Map<string, CircuitBreaker>();

  constructor(
    private readonly prefix: string,
    private readonly policy: CircuitPolicy,
    private readonly now: () => number = Date.now,
  ) {}

  for(key: string): CircuitBreaker {
    let circuit = this.circuits.get(key);
    if (!circuit) {
      circuit = new CircuitBreaker(`${this.prefix}:${key}`, this.policy, this.now);
      this.circuits.set(key, circuit);
    }
    return circuit;
  }

  snapshots(): CircuitSnapshot[] {
    return Array.from(this.circuits.values(), (circuit) => circuit.snapshot());
  }
}
