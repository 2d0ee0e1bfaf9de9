import { agentMetrics } from '../metrics/agents.metrics';
import type { Logger } from '../utils/logger';

export interface PeriodicTaskOptions {
  name: string;
  periodMs: number;
  run: () => Promise<unknown>;
  log: Logger;
}

/**
 * Runs `run` once on start and then every `periodMs`. A tick that fires while
 * the previous run is still in flight is skipped, never queued.
 */
export class PeriodicTask {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private skipped = 0;

  constructor(private readonly options: PeriodicTaskOptions) {}

  get running(): boolean {
    return this.timer !== null;
  }

  get skippedTicks(): number {
    return this.skipped;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.periodMs);
    void this.tick();
  }

  /** Triggers one run now unless one is already in flight. Resolves when that run settles. */
  tick(): Promise<void> {
    if (this.inFlight) {
      this.skipped += 1;
      agentMetrics.recordSkippedTick(this.options.name);
      this.options.log.debug('tick-skipped', { task: this.options.name });
      return this.inFlight;
    }
    const stopTimer = agentMetrics.startScanTimer(this.options.name);
    this.inFlight = this.options
      .run()
      .then(
        () => undefined,
        (err: unknown) => {
          agentMetrics.recordWorkerFailure(this.options.name, 'scan');
          this.options.log.error('periodic-run-failed', { task: this.options.name, error: err });
        }
      )
      .finally(() => {
        stopTimer();
        this.inFlight = null;
      });
    return this.inFlight;
  }

  /** Clears the schedule and waits for a run already in flight. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }
}
