import type { Logger } from 'pino';
import type { Notifier } from '../types/notifier.js';
import type { CycleResult } from '../types/result.js';
import { buildCycleResult } from './cycle.js';

/** Longest delay setTimeout honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export type SchedulerState = 'idle' | 'running' | 'stopped';

export interface SchedulerOptions {
  /** Period between cycle starts */
  intervalMs: number;
  competition: string;
  runCycle: (cycleId: number) => Promise<CycleResult>;
  notifier: Notifier;
  logger: Logger;
  /** Called after every cycle, after the notification went out */
  onCycleComplete?: (result: CycleResult) => void | Promise<void>;
}

/**
 * Drives cycles on a fixed interval. Idle between ticks, Running during a
 * cycle. Cycles never overlap: a tick that comes due while a cycle is still
 * running fires as soon as that cycle finishes.
 */
export class CycleScheduler {
  private state: SchedulerState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleResult> | null = null;
  private cycleCount = 0;

  constructor(private readonly options: SchedulerOptions) {}

  get currentState(): SchedulerState {
    return this.state;
  }

  get cyclesRun(): number {
    return this.cycleCount;
  }

  /** Runs the first cycle right away, then one per interval until stop(). */
  start(): void {
    if (this.isStopped()) throw new Error('Scheduler has been stopped');
    if (this.timer || this.inFlight) return;
    this.options.logger.info({ intervalMs: this.options.intervalMs }, 'Scheduler started');
    this.schedule(0);
  }

  /** Cancels the next tick and waits for a running cycle to finish. */
  async stop(): Promise<void> {
    this.state = 'stopped';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      this.options.logger.info('Waiting for the running cycle to finish');
      await this.inFlight;
    }
    this.options.logger.info('Scheduler stopped');
  }

  /** Runs a single cycle now, or joins the one already running. */
  async runOnce(): Promise<CycleResult> {
    if (this.inFlight) return this.inFlight;

    if (!this.isStopped()) this.state = 'running';
    const cycleId = ++this.cycleCount;
    this.inFlight = this.execute(cycleId);
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
      if (!this.isStopped()) this.state = 'idle';
    }
  }

  private isStopped(): boolean {
    return this.state === 'stopped';
  }

  /** Long delays are waited out in steps no longer than MAX_TIMER_DELAY_MS. */
  private schedule(delayMs: number): void {
    const dueAt = Date.now() + delayMs;
    const arm = (): void => {
      const remainingMs = dueAt - Date.now();
      if (remainingMs > MAX_TIMER_DELAY_MS) {
        this.timer = setTimeout(arm, MAX_TIMER_DELAY_MS);
        return;
      }
      this.timer = setTimeout(() => {
        this.timer = null;
        this.tick().catch((err: unknown) => {
          this.options.logger.error({ err }, 'Scheduler tick failed');
        });
      }, Math.max(0, remainingMs));
    };
    arm();
  }

  private async tick(): Promise<void> {
    if (this.isStopped()) return;

    const startedMs = Date.now();
    await this.runOnce();

    if (this.isStopped()) return;
    const elapsedMs = Date.now() - startedMs;
    const delayMs = Math.max(0, this.options.intervalMs - elapsedMs);
    this.options.logger.info(
      { nextRunAt: new Date(Date.now() + delayMs).toISOString() },
      'Next cycle scheduled',
    );
    this.schedule(delayMs);
  }

  private async execute(cycleId: number): Promise<CycleResult> {
    const log = this.options.logger.child({ cycle: cycleId });
    const startedAt = new Date();
    log.info('Starting tipping cycle');

    let result: CycleResult;
    try {
      result = await this.options.runCycle(cycleId);
    } catch (err) {
      log.error({ err }, 'Cycle failed unexpectedly');
      result = buildCycleResult({
        cycleId,
        competition: this.options.competition,
        startedAt,
        finishedAt: new Date(),
        outcomes: [],
        error: err,
      });
    }

    try {
      await this.options.notifier.notify(result);
    } catch (err) {
      log.error({ err }, 'Notifier failed');
    }
    try {
      await this.options.onCycleComplete?.(result);
    } catch (err) {
      log.error({ err }, 'Post-cycle hook failed');
    }

    return result;
  }
}
