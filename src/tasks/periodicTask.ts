import loggerModule from '../logger.js';

type TaskLogger = Pick<typeof loggerModule, 'info' | 'error'>;

export type TaskRun<T> = (signal: AbortSignal) => Promise<T>;

export interface PeriodicTaskOptions<T> {
  name: string;
  intervalMs: number;
  run: TaskRun<T>;
  onResult?: (result: T) => void;
  logger?: TaskLogger;
}

export type PeriodicTaskStatus = {
  name: string;
  started: boolean;
  stopped: boolean;
  running: boolean;
  runs: number;
  failures: number;
  lastRunAt: string | null;
  lastError: string | null;
};

/**
 * Runs `run` immediately on `start()` and then `intervalMs` after each run
 * settles. At most one run is in flight; a slow run pushes the next one back.
 */
export class PeriodicTask<T> {
  private readonly options: PeriodicTaskOptions<T>;
  private readonly logger: TaskLogger;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<T | null> | null = null;
  private controller: AbortController | null = null;
  private started = false;
  private stopped = false;
  private runs = 0;
  private failures = 0;
  private lastRunAt: number | null = null;
  private lastError: string | null = null;

  constructor(options: PeriodicTaskOptions<T>) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs < 0) {
      throw new RangeError(`intervalMs must be a non-negative number (got ${options.intervalMs})`);
    }
    this.options = options;
    this.logger = options.logger ?? loggerModule;
  }

  start() {
    if (this.started || this.stopped) {
      return;
    }
    this.started = true;
    this.logger.info({ task: this.options.name, intervalMs: this.options.intervalMs }, 'Periodic task started');
    this.scheduleNext(0);
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      await this.inFlight;
      return;
    }
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    await this.inFlight;
    this.logger.info({ task: this.options.name, runs: this.runs }, 'Periodic task stopped');
  }

  /**
   * Executes a single run outside the schedule, or joins the run already in
   * flight. Resolves to `null` when the run failed.
   */
  runOnce(): Promise<T | null> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const controller = new AbortController();
    this.controller = controller;
    const execution = this.execute(controller.signal).finally(() => {
      this.inFlight = null;
      this.controller = null;
    });
    this.inFlight = execution;
    return execution;
  }

  getStatus(): PeriodicTaskStatus {
    return {
      name: this.options.name,
      started: this.started,
      stopped: this.stopped,
      running: this.inFlight !== null,
      runs: this.runs,
      failures: this.failures,
      lastRunAt: this.lastRunAt === null ? null : new Date(this.lastRunAt).toISOString(),
      lastError: this.lastError
    };
  }

  private async execute(signal: AbortSignal): Promise<T | null> {
    this.lastRunAt = Date.now();
    try {
      const result = await this.options.run(signal);
      this.runs += 1;
      this.lastError = null;
      this.options.onResult?.(result);
      return result;
    } catch (error) {
      this.runs += 1;
      this.failures += 1;
      this.lastError = error instanceof Error ? error.message : String(error);
      this.logger.error({ err: error, task: this.options.name }, 'Periodic task run failed');
      return null;
    }
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().then(() => {
        this.scheduleNext(this.options.intervalMs);
      });
    }, delayMs);
  }
}
