/**
 * Runs the ingestion cycle once, or forever on a fixed cadence with
 * consecutive-failure counting. Stopping is cooperative: an in-flight cycle
 * always finishes, the loop exits at the next iteration boundary.
 */

import type { EnvironmentConfig } from '../config/environment';
import type { CycleResult, RunMode } from '../types/news';
import { logger } from '../utils/logger';

export type SchedulerState = 'idle' | 'running-once' | 'running-continuous' | 'stopped';
export type ExitCode = 0 | 1;
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  runCycle: () => Promise<CycleResult>;
  settings: EnvironmentConfig['scheduler'];
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Time to wait before the next cycle. Never below the floor, so an overrunning
 * cycle cannot make the loop spin.
 */
export function computeSleepMs(elapsedMs: number, periodMs: number, minSleepMs: number): number {
  return Math.max(periodMs - elapsedMs, minSleepMs);
}

/**
 * setTimeout that resolves early when the signal aborts
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

export class IngestionScheduler {
  private readonly controller = new AbortController();
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private failures = 0;
  private currentState: SchedulerState = 'idle';

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get stopRequested(): boolean {
    return this.controller.signal.aborted;
  }

  stop() {
    if (!this.stopRequested) {
      logger.info('Stop requested, finishing current cycle');
      this.controller.abort();
    }
  }

  async run(mode: RunMode): Promise<ExitCode> {
    if (this.currentState !== 'idle') {
      throw new Error(`Scheduler already ${this.currentState}`);
    }

    if (mode === 'once') {
      logger.info('Running in ONCE mode');
      this.currentState = 'running-once';
      const success = await this.executeCycle();
      this.currentState = 'stopped';
      return success ? 0 : 1;
    }

    logger.info('Running in CONTINUOUS mode');
    this.currentState = 'running-continuous';
    return this.loop();
  }

  private async loop(): Promise<ExitCode> {
    const { pollIntervalMs, minSleepMs, maxConsecutiveFailures } = this.options.settings;

    while (!this.stopRequested) {
      const startTime = this.now();
      logger.info(`Run started at ${new Date(startTime).toISOString()}`);

      const success = await this.executeCycle();
      if (this.stopRequested) {
        break;
      }

      if (success) {
        this.failures = 0;
      } else {
        this.failures += 1;
        logger.warn(`Cycle failed (${this.failures}/${maxConsecutiveFailures} consecutive)`);
        if (this.failures >= maxConsecutiveFailures) {
          logger.error(`Too many failures (${maxConsecutiveFailures}). Exiting...`);
          this.currentState = 'stopped';
          return 1;
        }
      }

      const elapsed = this.now() - startTime;
      const sleepMs = computeSleepMs(elapsed, pollIntervalMs, minSleepMs);
      logger.info(`Took ${(elapsed / 1000).toFixed(1)}s. Sleeping ${(sleepMs / 1000).toFixed(1)}s...`);
      await this.sleep(sleepMs, this.controller.signal);
    }

    logger.info('Shutting down...');
    this.currentState = 'stopped';
    return 0;
  }

  private async executeCycle(): Promise<boolean> {
    try {
      const result = await this.options.runCycle();
      return result.success;
    } catch (error) {
      logger.error('Unexpected error during ingestion cycle:', error);
      return false;
    }
  }
}
