import type { TerminalStatus } from '../router/types.js';

export interface DispatchMetricsReport {
  requestsProcessed: number;
  totalResponseTimeMs: number;
  averageResponseTimeMs: number;
  errorsEncountered: number;
  byStatus: Record<TerminalStatus, number>;
  uptimeSeconds: number;
  uptimeFormatted: string;
  requestsPerSecond: number;
  errorRate: number;
}

/**
 * "1d 02:03:04" for durations of a day or more, otherwise "02:03:04".
 */
export function formatUptime(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(seconds / 86400);
  const pad = (n: number) => String(n).padStart(2, '0');
  const clock = `${pad(Math.floor((seconds % 86400) / 3600))}:${pad(Math.floor((seconds % 3600) / 60))}:${pad(seconds % 60)}`;
  return days > 0 ? `${days}d ${clock}` : clock;
}

/**
 * In-process dispatch counters. A dispatch counts as an error when it did
 * not finish with status `completed`.
 */
export class DispatchMetrics {
  private requestsProcessed = 0;
  private totalResponseTimeMs = 0;
  private errorsEncountered = 0;
  private byStatus: Record<TerminalStatus, number> = {
    completed: 0,
    completed_with_errors: 0,
    error: 0,
  };
  private readonly startedAt: number;

  constructor(private clock: () => number = Date.now) {
    this.startedAt = clock();
  }

  record(status: TerminalStatus, elapsedMs: number): void {
    this.requestsProcessed++;
    this.totalResponseTimeMs += elapsedMs;
    this.byStatus[status]++;
    if (status !== 'completed') {
      this.errorsEncountered++;
    }
  }

  report(): DispatchMetricsReport {
    const uptimeSeconds = (this.clock() - this.startedAt) / 1000;
    const processed = this.requestsProcessed;
    return {
      requestsProcessed: processed,
      totalResponseTimeMs: this.totalResponseTimeMs,
      averageResponseTimeMs: processed > 0 ? this.totalResponseTimeMs / processed : 0,
      errorsEncountered: this.errorsEncountered,
      byStatus: { ...this.byStatus },
      uptimeSeconds,
      uptimeFormatted: formatUptime(uptimeSeconds),
      requestsPerSecond: uptimeSeconds > 0 ? processed / uptimeSeconds : 0,
      errorRate: processed > 0 ? this.errorsEncountered / processed : 0,
    };
  }
}
