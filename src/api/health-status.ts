import type { CycleResult } from '../types/result.js';

export type HealthState = 'starting' | 'ready' | 'healthy' | 'error';

const MINUTE_MS = 60 * 1000;
const STARTUP_GRACE_MS = 5 * MINUTE_MS;
const STARTUP_HEARTBEAT_MS = 2 * MINUTE_MS;

export interface HealthReport {
  status: HealthState;
  healthy: boolean;
  uptimeSeconds: number;
  startTime: string;
  lastHeartbeat: string | null;
  lastSuccessfulRun: string | null;
  lastError: string | null;
  stats: {
    totalRuns: number;
    successfulRuns: number;
    failedRuns: number;
    successRate: number;
  };
}

/**
 * In-memory liveness bookkeeping for the health endpoints.
 *
 * During the first five minutes the process counts as healthy unless it is in
 * error and it has beaten within two minutes. After that it is healthy while
 * the last heartbeat is younger than 1.5 cycle intervals.
 */
export class HealthStatus {
  private state: HealthState = 'starting';
  private readonly startTime: Date;
  private lastHeartbeat: Date;
  private lastSuccessfulRun: Date | null = null;
  private lastError: string | null = null;
  private totalRuns = 0;
  private successfulRuns = 0;
  private failedRuns = 0;

  constructor(
    private readonly intervalMinutes: number,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.startTime = now();
    this.lastHeartbeat = this.startTime;
  }

  get status(): HealthState {
    return this.state;
  }

  heartbeat(): void {
    this.lastHeartbeat = this.now();
  }

  markReady(): void {
    this.state = 'ready';
    this.heartbeat();
  }

  recordCycle(result: CycleResult): void {
    this.totalRuns++;
    this.heartbeat();
    if (result.status === 'completed') {
      this.successfulRuns++;
      this.lastSuccessfulRun = result.finishedAt;
      this.lastError = null;
      this.state = 'healthy';
    } else {
      this.failedRuns++;
      this.lastError = result.error;
      this.state = 'error';
    }
  }

  uptimeSeconds(): number {
    return Math.floor((this.now().getTime() - this.startTime.getTime()) / 1000);
  }

  isHealthy(): boolean {
    const now = this.now().getTime();
    const sinceHeartbeat = now - this.lastHeartbeat.getTime();

    if (now - this.startTime.getTime() < STARTUP_GRACE_MS) {
      return this.state !== 'error' && sinceHeartbeat < STARTUP_HEARTBEAT_MS;
    }

    const interval = this.intervalMinutes > 0 ? this.intervalMinutes : 60;
    return sinceHeartbeat < interval * 1.5 * MINUTE_MS;
  }

  report(): HealthReport {
    return {
      status: this.state,
      healthy: this.isHealthy(),
      uptimeSeconds: this.uptimeSeconds(),
      startTime: this.startTime.toISOString(),
      lastHeartbeat: this.lastHeartbeat.toISOString(),
      lastSuccessfulRun: this.lastSuccessfulRun?.toISOString() ?? null,
      lastError: this.lastError,
      stats: {
        totalRuns: this.totalRuns,
        successfulRuns: this.successfulRuns,
        failedRuns: this.failedRuns,
        successRate: Math.round((this.successfulRuns / Math.max(this.totalRuns, 1)) * 10000) / 100,
      },
    };
  }
}
