import cron from 'cron';
import type { JobContext } from './context';
import { Mutex } from './lib/mutex';
import { ShutdownSignal } from './lib/shutdown';
import { createLogger, type Logger } from './logger';
import { errorMessage } from './errors';
import { runMonitor, type MonitorSummary } from './jobs/monitor';
import { runAnalyze, type AnalyzeOptions, type AnalyzeOutput } from './jobs/analyze';
import { runDeliver } from './jobs/deliver';

// ms to wait before the next tick
export type Cadence = () => number;

export function cronCadence(expression: string): Cadence {
  const time = new cron.CronTime(expression);
  return () => Math.max(0, time.getTimeout());
}

export interface SchedulerOptions {
  projectId?: string;
  monitorCadence: Cadence;
  deliveryCadence: Cadence;
  shutdown?: ShutdownSignal;
}

export interface MonitorCycle {
  monitor: MonitorSummary;
  // null when shutdown cut the monitor pass short
  analyze: AnalyzeOutput | null;
}

/**
 * Two independent loops: monitor+analyze and delivery. Both run once on start,
 * then park on the shutdown signal until their next tick.
 */
export class Scheduler {
  readonly shutdown: ShutdownSignal;
  private readonly monitorLock = new Mutex();
  private loops: Promise<void>[] = [];

  constructor(
    private readonly ctx: JobContext,
    private readonly options: SchedulerOptions,
    private readonly log: Logger = createLogger('scheduler')
  ) {
    this.shutdown = options.shutdown ?? new ShutdownSignal(ctx.clock);
  }

  get running(): boolean {
    return this.loops.length > 0;
  }

  start(): void {
    if (this.running) return;
    this.log.info('scheduler_started', { projectId: this.options.projectId });
    this.loops = [this.monitorLoop(), this.deliveryLoop()];
  }

  // Waits for in-flight work, so the process can exit right after.
  async stop(): Promise<void> {
    this.shutdown.request();
    await Promise.all(this.loops);
    this.loops = [];
    this.log.info('scheduler_stopped');
  }

  /**
   * Monitor then analyze; never overlaps another cycle. Null when shutting down.
   * A shutdown request stops the pass before the next handle and skips analysis.
   */
  runMonitorCycle(projectId = this.options.projectId): Promise<MonitorCycle | null> {
    return this.monitorLock.runExclusive(async () => {
      if (this.shutdown.requested) return null;
      const monitor = await runMonitor(this.ctx, projectId, () => this.shutdown.requested);
      if (this.shutdown.requested) return { monitor, analyze: null };
      const analyze = await runAnalyze(this.ctx, { projectId });
      return { monitor, analyze };
    });
  }

  // On-demand analysis, queued behind any monitor cycle so it never ranks half-written history.
  runAnalyze(options: AnalyzeOptions = {}): Promise<AnalyzeOutput> {
    return this.monitorLock.runExclusive(() => runAnalyze(this.ctx, options));
  }

  private async monitorLoop(): Promise<void> {
    this.log.info('monitor_loop_started');
    while (!this.shutdown.requested) {
      try {
        await this.runMonitorCycle();
      } catch (err) {
        this.log.error('monitor_cycle_crashed', { error: errorMessage(err) });
      }
      if (!(await this.shutdown.wait(this.options.monitorCadence()))) break;
    }
    this.log.info('monitor_loop_exited');
  }

  private async deliveryLoop(): Promise<void> {
    this.log.info('delivery_loop_started');
    while (!this.shutdown.requested) {
      try {
        const sent = await runDeliver(this.ctx, this.options.projectId);
        if (sent > 0) this.log.info('delivery_tick', { delivered: sent });
      } catch (err) {
        this.log.error('delivery_cycle_crashed', { error: errorMessage(err) });
      }
      if (!(await this.shutdown.wait(this.options.deliveryCadence()))) break;
    }
    this.log.info('delivery_loop_exited');
  }
}

// SIGINT/SIGTERM stop both loops; the process exits once in-flight work is done.
export function stopOnSignals(scheduler: Scheduler, beforeStop: () => void = () => {}): void {
  const log = createLogger('scheduler');
  const handle = (signal: NodeJS.Signals) => {
    log.warn('shutdown_signal', { signal });
    beforeStop();
    scheduler.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error('shutdown_failed', { error: errorMessage(err) });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', handle);
  process.once('SIGTERM', handle);
}
