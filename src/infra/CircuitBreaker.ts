/**
 * Circuit Breaker
 *
 * Stops hammering the server of record while it is down.
 *
 * States:
 * - CLOSED: requests pass through
 * - OPEN: requests fail immediately with CircuitOpenError (no network call)
 * - HALF_OPEN: one trial request decides whether to close again
 *
 * Usage:
 *   const breaker = new CircuitBreaker('attendance-api', { failureThreshold: 5 });
 *   const verdicts = await breaker.execute(() => upload(batch));
 */

import type { Logger } from 'pino';
import { SyncError } from '../lib/errors/index.js';
import { systemClock, type Clock } from '../types/index.js';
import { syncLogger } from '../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Failures before opening the circuit (default: 5) */
  failureThreshold?: number;
  /** Time before a trial request is allowed (ms, default: 30_000) */
  resetTimeoutMs?: number;
  /** Which errors count against the circuit (default: all) */
  isFailure?: (error: unknown) => boolean;
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
  clock?: Clock;
}

export class CircuitOpenError extends SyncError {
  constructor(name: string, retryAfterMs: number) {
    super('SERVER_UNAVAILABLE', `Circuit '${name}' is open; retry in ${Math.ceil(retryAfterMs / 1000)}s`, {
      circuit: name,
      retryAfterMs,
    });
  }
}

// ============================================================================
// CIRCUIT BREAKER
// ============================================================================

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private lastFailureTime = 0;
  private trialInFlight = false;

  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly name: string,
    options: CircuitBreakerOptions = {}
  ) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 30_000;
    this.isFailure = options.isFailure ?? (() => true);
    this.onStateChange = options.onStateChange;
    this.clock = options.clock ?? systemClock;
    this.log = syncLogger.child({ module: `circuit-breaker:${name}` });
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      const elapsed = this.clock().getTime() - this.lastFailureTime;
      if (elapsed >= this.resetTimeoutMs) {
        this.transition('HALF_OPEN');
      } else {
        throw new CircuitOpenError(this.name, this.resetTimeoutMs - elapsed);
      }
    }

    if (this.state === 'HALF_OPEN' && this.trialInFlight) {
      throw new CircuitOpenError(this.name, this.resetTimeoutMs);
    }

    const trial = this.state === 'HALF_OPEN';
    if (trial) this.trialInFlight = true;

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (this.isFailure(error)) {
        this.onFailure();
      } else if (trial) {
        // inconclusive trial: allow another
        this.trialInFlight = false;
      }
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  reset(): void {
    this.transition('CLOSED');
    this.failureCount = 0;
    this.trialInFlight = false;
  }

  // ---------- Internal ----------

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.log.info('Server recovered, closing circuit');
      this.transition('CLOSED');
    }
    this.failureCount = 0;
    this.trialInFlight = false;
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.clock().getTime();
    this.trialInFlight = false;

    if (this.state === 'HALF_OPEN') {
      this.log.warn('Server still failing, reopening circuit');
      this.transition('OPEN');
    } else if (this.state === 'CLOSED' && this.failureCount >= this.failureThreshold) {
      this.log.warn({ failures: this.failureCount }, 'Failure threshold reached, opening circuit');
      this.transition('OPEN');
    }
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    this.onStateChange?.(this.name, from, to);
  }
}
