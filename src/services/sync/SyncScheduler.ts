/**
 * SYNC SCHEDULER
 *
 * Single consumer of sync triggers. Runs are strictly sequential; triggers
 * that arrive while a run is waiting to start join that run instead of
 * queueing another.
 *
 * TRIGGERS:
 * - TIMER: periodic tick (skipped while offline)
 * - CONNECTIVITY: the device came back online
 * - FORCE: the user asked for a sync
 *
 * stop() cancels the running attempt; its in-flight records return to
 * PENDING without counting an attempt.
 */

import { syncLogger } from '../../utils/logger.js';
import type { SyncReconciler, SyncResult } from './SyncReconciler.js';

const logger = syncLogger.child({ module: 'SyncScheduler' });

export type SyncTrigger = 'TIMER' | 'CONNECTIVITY' | 'FORCE';

export interface SyncSchedulerOptions {
  reconciler: Pick<SyncReconciler, 'syncOnce'>;
  intervalMs: number;
  initiallyOnline?: boolean;
  onRun?: (result: SyncResult, triggers: SyncTrigger[]) => void;
  onError?: (error: unknown, triggers: SyncTrigger[]) => void;
}

interface PendingRun {
  triggers: Set<SyncTrigger>;
  promise: Promise<SyncResult | undefined>;
  resolve: (result: SyncResult | undefined) => void;
  reject: (error: unknown) => void;
}

export class SyncScheduler {
  private pending?: PendingRun;
  private running?: Promise<void>;
  private controller?: AbortController;
  private timer?: NodeJS.Timeout;
  private online: boolean;
  private stopped = false;

  constructor(private readonly options: SyncSchedulerOptions) {
    this.online = options.initiallyOnline ?? true;
  }

  start(): void {
    if (this.timer) return;
    this.stopped = false;
    this.timer = setInterval(() => {
      this.trigger('TIMER').catch((error: unknown) => {
        logger.error({ err: error }, 'Scheduled sync failed');
      });
    }, this.options.intervalMs);
    this.timer.unref();
    logger.info({ intervalMs: this.options.intervalMs }, 'Sync scheduler started');
  }

  /**
   * Request a run. Resolves with the result of the run that served the
   * trigger, or undefined when it was skipped.
   */
  trigger(kind: SyncTrigger): Promise<SyncResult | undefined> {
    if (this.stopped) return Promise.resolve(undefined);
    if (kind === 'TIMER' && !this.online) {
      logger.debug('Offline; timer tick skipped');
      return Promise.resolve(undefined);
    }

    const run = this.pending ?? this.createPending();
    run.triggers.add(kind);
    this.pump();
    return run.promise;
  }

  setOnline(online: boolean): void {
    const cameOnline = online && !this.online;
    this.online = online;
    if (cameOnline) {
      this.trigger('CONNECTIVITY').catch((error: unknown) => {
        logger.error({ err: error }, 'Reconnect sync failed');
      });
    }
  }

  isOnline(): boolean {
    return this.online;
  }

  isRunning(): boolean {
    return this.controller !== undefined;
  }

  /** Cancel the current run and wait for the loop to drain */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.controller?.abort();

    const pending = this.pending;
    this.pending = undefined;
    pending?.resolve(undefined);

    await this.running;
    logger.info('Sync scheduler stopped');
  }

  // ==========================================================================
  // LOOP
  // ==========================================================================

  private createPending(): PendingRun {
    let resolve: (result: SyncResult | undefined) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const promise = new Promise<SyncResult | undefined>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.pending = { triggers: new Set(), promise, resolve, reject };
    return this.pending;
  }

  private pump(): void {
    if (this.running) return;
    this.running = this.drain().finally(() => {
      this.running = undefined;
      if (this.pending && !this.stopped) this.pump();
    });
  }

  private async drain(): Promise<void> {
    while (this.pending && !this.stopped) {
      const run = this.pending;
      this.pending = undefined;
      const triggers = [...run.triggers];
      this.controller = new AbortController();

      try {
        const result = await this.options.reconciler.syncOnce(this.controller.signal);
        this.options.onRun?.(result, triggers);
        run.resolve(result);
      } catch (error) {
        logger.error({ err: error, triggers }, 'Sync run threw');
        this.options.onError?.(error, triggers);
        run.reject(error);
      } finally {
        this.controller = undefined;
      }
    }
  }
}
