/**
 * Per-dependency circuit breaker.
 *
 * State machine:
 * - CLOSED: calls pass through; `failureThreshold` consecutive failures open the circuit
 * - OPEN: calls are refused until `recoveryTimeoutMs` has elapsed since the last failure
 * - HALF_OPEN: calls pass through; `successThreshold` consecutive successes close the
 *   circuit, a single failure opens it again
 *
 * The breaker never throws. Callers ask `allow()` before attempting and report the
 * outcome with `recordSuccess()` / `recordFailure()`.
 */

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export type CircuitBreakerOptions = {
  failureThreshold: number;
  successThreshold: number;
  recoveryTimeoutMs: number;
  now?: () => number;
  onStateChange?: (change: { name: string; from: CircuitState; to: CircuitState; reason: string }) => void;
};

export type CircuitBreakerSnapshot = {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number | null;
};

export const defaultCircuitBreakerOptions = {
  failureThreshold: 5,
  successThreshold: 3,
  recoveryTimeoutMs: 300_000
} as const;

export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private readonly failureThreshold: number;
  private readonly successThreshold: number;
  private readonly recoveryTimeoutMs: number;
  private readonly now: () => number;
  private readonly onStateChange?: CircuitBreakerOptions["onStateChange"];

  constructor(
    readonly name: string,
    options: Partial<CircuitBreakerOptions> = {}
  ) {
    this.failureThreshold = options.failureThreshold ?? defaultCircuitBreakerOptions.failureThreshold;
    this.successThreshold = options.successThreshold ?? defaultCircuitBreakerOptions.successThreshold;
    this.recoveryTimeoutMs = options.recoveryTimeoutMs ?? defaultCircuitBreakerOptions.recoveryTimeoutMs;
    this.now = options.now ?? Date.now;
    this.onStateChange = options.onStateChange;

    if (!Number.isInteger(this.failureThreshold) || this.failureThreshold < 1) {
      throw new Error("failureThreshold must be an integer >= 1");
    }
    if (!Number.isInteger(this.successThreshold) || this.successThreshold < 1) {
      throw new Error("successThreshold must be an integer >= 1");
    }
  }

  allow(): boolean {
    if (this.state !== "OPEN") return true;

    if (this.remainingCooldownMs() > 0) return false;

    this.successCount = 0;
    this.transitionTo("HALF_OPEN", "recovery timeout elapsed");
    return true;
  }

  /** Milliseconds until an OPEN circuit admits a probe; 0 when not OPEN. */
  remainingCooldownMs(): number {
    if (this.state !== "OPEN" || this.lastFailureTime == null) return 0;
    return Math.max(0, this.lastFailureTime + this.recoveryTimeoutMs - this.now());
  }

  recordSuccess(): void {
    this.successCount += 1;

    if (this.state === "HALF_OPEN") {
      if (this.successCount >= this.successThreshold) {
        this.failureCount = 0;
        this.successCount = 0;
        this.transitionTo("CLOSED", `${this.successThreshold} consecutive probe successes`);
      }
      return;
    }

    if (this.state === "CLOSED") {
      // Thresholds count consecutive failures.
      this.failureCount = 0;
    }
  }

  recordFailure(): void {
    this.failureCount += 1;
    this.lastFailureTime = this.now();

    if (this.state === "HALF_OPEN") {
      this.successCount = 0;
      this.transitionTo("OPEN", "probe failed");
      return;
    }

    if (this.state === "CLOSED" && this.failureCount >= this.failureThreshold) {
      this.successCount = 0;
      this.transitionTo("OPEN", `failure threshold reached (${this.failureCount}/${this.failureThreshold})`);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime
    };
  }

  private transitionTo(next: CircuitState, reason: string): void {
    const from = this.state;
    if (from === next) return;
    this.state = next;
    this.onStateChange?.({ name: this.name, from, to: next, reason });
  }
}
