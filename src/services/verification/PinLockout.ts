/**
 * Kiosk PIN credentials and lockout
 *
 * - PINs are stored as bcrypt hashes (salt embedded), compared with bcrypt.compare
 * - N consecutive failures lock the PIN for a cool-down window
 * - Lockout state is an append-only event stream, replayed on open(),
 *   so it survives restarts
 */

import bcrypt from 'bcrypt';
import { z } from 'zod';
import { StorageError } from '../../lib/errors/index.js';
import { STREAMS, type LogEntry, type LogStore } from '../../infra/storage/LogStore.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('PinLockout');

const CONFIG = {
  maxAttempts: 5,
  lockoutMs: 15 * 60 * 1000,
  saltRounds: 10,
};

// ============================================================================
// CREDENTIALS
// ============================================================================

export class PinCredentialStore {
  private readonly hashes = new Map<string, string>();

  static async hashPin(pin: string, saltRounds: number = CONFIG.saltRounds): Promise<string> {
    return bcrypt.hash(pin, saltRounds);
  }

  setHash(employeeId: string, hash: string): void {
    this.hashes.set(employeeId, hash);
  }

  async setPin(employeeId: string, pin: string, saltRounds?: number): Promise<void> {
    this.hashes.set(employeeId, await PinCredentialStore.hashPin(pin, saltRounds));
  }

  /** false when no credential exists for the employee */
  async matches(employeeId: string, pin: string): Promise<boolean> {
    const hash = this.hashes.get(employeeId);
    if (!hash) return false;
    return bcrypt.compare(pin, hash);
  }
}

// ============================================================================
// LOCKOUT
// ============================================================================

const lockoutEventSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('FAILURE'), employeeId: z.string(), at: z.string() }),
  z.object({ kind: z.literal('LOCKED'), employeeId: z.string(), at: z.string(), until: z.string() }),
  z.object({ kind: z.literal('SUCCESS'), employeeId: z.string(), at: z.string() }),
]);

type LockoutEvent = z.infer<typeof lockoutEventSchema>;

export interface LockoutState {
  consecutiveFailures: number;
  lockedUntil?: string;
}

export interface PinLockoutOptions {
  maxAttempts?: number;
  lockoutMs?: number;
}

export class PinLockoutStore {
  private readonly states = new Map<string, LockoutState>();
  private readonly maxAttempts: number;
  private readonly lockoutMs: number;
  private opened = false;

  constructor(private readonly store: LogStore, options: PinLockoutOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? CONFIG.maxAttempts;
    this.lockoutMs = options.lockoutMs ?? CONFIG.lockoutMs;
  }

  async open(): Promise<void> {
    if (this.opened) return;
    const entries = await this.store.readRange(STREAMS.pinLockout);
    for (const entry of entries) {
      this.apply(parseEvent(entry));
    }
    this.opened = true;
    logger.debug({ employees: this.states.size }, 'Lockout state replayed');
  }

  getState(employeeId: string): LockoutState {
    return this.states.get(employeeId) ?? { consecutiveFailures: 0 };
  }

  isLocked(employeeId: string, now: Date): boolean {
    const { lockedUntil } = this.getState(employeeId);
    return lockedUntil !== undefined && Date.parse(lockedUntil) > now.getTime();
  }

  /**
   * Record a failed attempt. Returns true when this failure triggered a lockout.
   */
  async recordFailure(employeeId: string, now: Date): Promise<boolean> {
    const failures = this.currentFailures(employeeId, now) + 1;
    const events: LockoutEvent[] = [{ kind: 'FAILURE', employeeId, at: now.toISOString() }];

    const locks = failures >= this.maxAttempts;
    if (locks) {
      events.push({
        kind: 'LOCKED',
        employeeId,
        at: now.toISOString(),
        until: new Date(now.getTime() + this.lockoutMs).toISOString(),
      });
    }

    await this.store.append(STREAMS.pinLockout, events);
    events.forEach((event) => this.apply(event));

    if (locks) {
      logger.warn({ employeeId, failures }, 'PIN locked after consecutive failures');
    }
    return locks;
  }

  async recordSuccess(employeeId: string, now: Date): Promise<void> {
    if (this.getState(employeeId).consecutiveFailures === 0 && !this.getState(employeeId).lockedUntil) {
      return;
    }
    const event: LockoutEvent = { kind: 'SUCCESS', employeeId, at: now.toISOString() };
    await this.store.append(STREAMS.pinLockout, [event]);
    this.apply(event);
  }

  /** Failures count from zero again once an earlier lockout has expired */
  private currentFailures(employeeId: string, now: Date): number {
    const state = this.getState(employeeId);
    if (state.lockedUntil && Date.parse(state.lockedUntil) <= now.getTime()) {
      return 0;
    }
    return state.consecutiveFailures;
  }

  private apply(event: LockoutEvent): void {
    const state = this.getState(event.employeeId);
    switch (event.kind) {
      case 'FAILURE': {
        const expired = state.lockedUntil !== undefined && Date.parse(state.lockedUntil) <= Date.parse(event.at);
        this.states.set(event.employeeId, {
          consecutiveFailures: (expired ? 0 : state.consecutiveFailures) + 1,
          lockedUntil: expired ? undefined : state.lockedUntil,
        });
        break;
      }
      case 'LOCKED':
        this.states.set(event.employeeId, { consecutiveFailures: 0, lockedUntil: event.until });
        break;
      case 'SUCCESS':
        this.states.set(event.employeeId, { consecutiveFailures: 0 });
        break;
    }
  }
}

function parseEvent(entry: LogEntry): LockoutEvent {
  const parsed = lockoutEventSchema.safeParse(entry.payload);
  if (!parsed.success) {
    throw new StorageError(`Corrupt lockout event at offset ${entry.offset}`);
  }
  return parsed.data;
}
