// ── Process update scheduler ────────────────────────────────────────────────
//
// Periodically asks every pending process to poll its external system.
// Sweeps never overlap: a tick that fires while the previous sweep is still
// running is skipped. The timer is unref'd so it never holds the process open.
//
import { logError, logInfo } from "./log.js";
import type { GovernanceProcessEngine } from "./processEngine.js";

export type SweepResult = {
  checked: number;
  failed: number;
};

export type ProcessUpdateSchedulerOptions = {
  processes: GovernanceProcessEngine;
  intervalMs: number;
};

export class ProcessUpdateScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private sweeping: Promise<SweepResult> | null = null;

  constructor(private readonly options: ProcessUpdateSchedulerOptions) {}

  get running(): boolean {
    return this.timer !== null;
  }

  /** No-op when already running or when the interval is 0. */
  start(): void {
    if (this.timer || this.options.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      if (this.sweeping) return;
      this.sweepOnce().catch((error: unknown) => logError("scheduler.sweep", error));
    }, this.options.intervalMs);
    this.timer.unref();
    logInfo("scheduler.started", { intervalMs: this.options.intervalMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logInfo("scheduler.stopped");
  }

  /** One pass over every pending process. Failures are logged per process. */
  async sweepOnce(): Promise<SweepResult> {
    if (this.sweeping) return this.sweeping;
    this.sweeping = this.sweep();
    try {
      return await this.sweeping;
    } finally {
      this.sweeping = null;
    }
  }

  private async sweep(): Promise<SweepResult> {
    const pending = this.options.processes.listPendingProcesses();
    const results = await Promise.allSettled(pending.map((process) => this.options.processes.updateProcess(process.id)));

    let failed = 0;
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        failed += 1;
        logError("scheduler.update", result.reason, { process: pending[index].id });
      }
    });
    return { checked: pending.length, failed };
  }
}
