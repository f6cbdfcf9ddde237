/**
 * Task scheduler
 *
 * Runs external jobs (preparation, build graph generation, index processes)
 * with bounded parallelism. Knows nothing about what the jobs do.
 *
 * - Among ready jobs, higher priority first, FIFO within a priority
 * - Cancelling a queued job removes it; cancelling a running job aborts its signal
 * - A failure only affects jobs that list the failed job in `dependsOn`
 */

import * as os from 'node:os';
import { v7 as uuidv7 } from 'uuid';
import { ConfigError, toError } from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';

export const TaskPriority = {
  low: 0,
  medium: 50,
  high: 100,
} as const;

export type JobState = 'queued' | 'running' | 'finished';

export type JobOutcome<T> =
  | { status: 'succeeded'; value: T }
  | { status: 'failed'; error: Error }
  | { status: 'cancelled' }
  | { status: 'dependency-failed'; dependencyId: string };

export type JobStatus = JobOutcome<unknown>['status'];

export interface JobDescription<T> {
  /** Human readable label used in logs */
  description: string;
  priority?: number;
  run: (signal: AbortSignal) => Promise<T>;
  /** Jobs that must succeed before this one may start */
  dependsOn?: ReadonlyArray<JobHandle<unknown>>;
  /** Non-cancellable jobs ignore `cancel()` and `cancelAll()` */
  cancellable?: boolean;
}

interface JobControl {
  state(): JobState;
  status(): JobStatus | null;
  priority(): number;
  cancel(): boolean;
  elevate(priority: number): void;
}

export class JobHandle<T> {
  constructor(
    readonly id: string,
    readonly description: string,
    readonly outcome: Promise<JobOutcome<T>>,
    private readonly control: JobControl,
  ) {}

  get state(): JobState {
    return this.control.state();
  }

  /** Final status, or null while the job is queued or running */
  get status(): JobStatus | null {
    return this.control.status();
  }

  get priority(): number {
    return this.control.priority();
  }

  /**
   * Request cancellation. Returns false when the job already finished or is
   * not cancellable.
   */
  cancel(): boolean {
    return this.control.cancel();
  }

  /** Raise the priority of a queued job. Lower values are ignored. */
  elevatePriority(priority: number): void {
    this.control.elevate(priority);
  }
}

type EarlyOutcome =
  | { status: 'cancelled' }
  | { status: 'dependency-failed'; dependencyId: string };

interface JobEntry {
  readonly id: string;
  readonly seq: number;
  readonly description: string;
  readonly cancellable: boolean;
  readonly dependencies: ReadonlyArray<JobHandle<unknown>>;
  readonly controller: AbortController;
  priority: number;
  state: JobState;
  status: JobStatus | null;
  start(signal: AbortSignal): Promise<void>;
  settleEarly(outcome: EarlyOutcome): void;
}

export interface TaskSchedulerOptions {
  /** Defaults to the number of logical cores */
  maxConcurrentJobs?: number | null;
  logger?: Logger;
}

export class TaskScheduler {
  readonly maxConcurrentJobs: number;
  private readonly logger: Logger;
  private queue: JobEntry[] = [];
  private readonly running = new Set<JobEntry>();
  private nextSeq = 0;
  private drainResolvers: Array<() => void> = [];

  constructor(options: TaskSchedulerOptions = {}) {
    const max = options.maxConcurrentJobs ?? os.availableParallelism();
    if (!Number.isInteger(max) || max < 1) {
      throw new ConfigError(`maxConcurrentJobs must be a positive integer, got ${max}`);
    }
    this.maxConcurrentJobs = max;
    this.logger = options.logger ?? createLogger('TaskScheduler');
  }

  schedule<T>(job: JobDescription<T>): JobHandle<T> {
    let resolveOutcome: (outcome: JobOutcome<T>) => void = () => {};
    const outcome = new Promise<JobOutcome<T>>((resolve) => {
      resolveOutcome = resolve;
    });

    const entry: JobEntry = {
      id: uuidv7(),
      seq: this.nextSeq++,
      description: job.description,
      cancellable: job.cancellable ?? true,
      dependencies: job.dependsOn ?? [],
      controller: new AbortController(),
      priority: job.priority ?? TaskPriority.medium,
      state: 'queued',
      status: null,
      start: async (signal) => {
        let result: JobOutcome<T>;
        try {
          const value = await job.run(signal);
          result = signal.aborted ? { status: 'cancelled' } : { status: 'succeeded', value };
        } catch (err) {
          result = signal.aborted
            ? { status: 'cancelled' }
            : { status: 'failed', error: toError(err) };
        }
        entry.state = 'finished';
        entry.status = result.status;
        resolveOutcome(result);
      },
      settleEarly: (early) => {
        entry.state = 'finished';
        entry.status = early.status;
        resolveOutcome(early);
      },
    };

    const handle = new JobHandle<T>(entry.id, entry.description, outcome, {
      state: () => entry.state,
      status: () => entry.status,
      priority: () => entry.priority,
      cancel: () => this.cancelEntry(entry),
      elevate: (priority) => {
        if (entry.state === 'queued' && priority > entry.priority) {
          entry.priority = priority;
        }
      },
    });

    this.queue.push(entry);
    this.logger.debug(`Queued ${entry.description} (priority ${entry.priority})`);
    this.failBlockedJobs();
    this.pump();
    return handle;
  }

  get runningCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /** Cancel every cancellable job, queued or running. */
  cancelAll(): void {
    for (const entry of [...this.queue, ...this.running]) {
      this.cancelEntry(entry);
    }
  }

  /** Resolves once no job is queued or running. */
  async drain(): Promise<void> {
    if (this.isIdle()) return;
    return new Promise<void>((resolve) => {
      this.drainResolvers.push(resolve);
    });
  }

  // --- private ---

  private cancelEntry(entry: JobEntry): boolean {
    if (!entry.cancellable || entry.state === 'finished') return false;

    if (entry.state === 'queued') {
      this.queue = this.queue.filter((e) => e !== entry);
      entry.settleEarly({ status: 'cancelled' });
      this.logger.debug(`Cancelled queued ${entry.description}`);
      this.failBlockedJobs();
      this.pump();
      return true;
    }

    if (!entry.controller.signal.aborted) {
      this.logger.debug(`Cancelling running ${entry.description}`);
      entry.controller.abort();
    }
    return true;
  }

  private pump(): void {
    while (this.running.size < this.maxConcurrentJobs) {
      const next = this.nextReady();
      if (!next) break;
      this.startEntry(next);
    }
    if (this.isIdle()) {
      for (const resolve of this.drainResolvers) {
        resolve();
      }
      this.drainResolvers = [];
    }
  }

  private nextReady(): JobEntry | undefined {
    let best: JobEntry | undefined;
    for (const entry of this.queue) {
      if (!entry.dependencies.every((d) => d.status === 'succeeded')) continue;
      if (
        !best ||
        entry.priority > best.priority ||
        (entry.priority === best.priority && entry.seq < best.seq)
      ) {
        best = entry;
      }
    }
    return best;
  }

  private startEntry(entry: JobEntry): void {
    this.queue = this.queue.filter((e) => e !== entry);
    entry.state = 'running';
    this.running.add(entry);
    this.logger.debug(`Started ${entry.description}`);

    void entry
      .start(entry.controller.signal)
      .catch((err: unknown) => {
        this.logger.error(`Job ${entry.description} crashed: ${toError(err).message}`);
        entry.settleEarly({ status: 'cancelled' });
      })
      .finally(() => {
        this.running.delete(entry);
        this.logger.debug(`Finished ${entry.description}: ${entry.status ?? 'unknown'}`);
        this.failBlockedJobs();
        this.pump();
      });
  }

  /** Resolve queued jobs whose dependencies can no longer succeed. */
  private failBlockedJobs(): void {
    let changed = true;
    while (changed) {
      changed = false;
      for (const entry of this.queue) {
        const failed = entry.dependencies.find(
          (d) => d.status !== null && d.status !== 'succeeded',
        );
        if (!failed) continue;
        this.queue = this.queue.filter((e) => e !== entry);
        entry.settleEarly({ status: 'dependency-failed', dependencyId: failed.id });
        this.logger.debug(`Skipped ${entry.description}: dependency ${failed.description} did not succeed`);
        changed = true;
        break;
      }
    }
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.running.size === 0;
  }
}
