import { describe, it, expect, vi } from 'vitest';
import { TaskScheduler, TaskPriority } from './task-scheduler.js';
import { ConfigError } from '../../shared/errors.js';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}

function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function flush(): Promise<void> {
  return new Promise((r) => setTimeout(r, 0));
}

describe('TaskScheduler', () => {
  it('resolves a succeeded outcome with the job value', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    const handle = scheduler.schedule({ description: 'answer', run: async () => 42 });

    await expect(handle.outcome).resolves.toEqual({ status: 'succeeded', value: 42 });
    expect(handle.state).toBe('finished');
    expect(handle.status).toBe('succeeded');
  });

  it('never runs more than maxConcurrentJobs at once', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 2 });
    const gates = Array.from({ length: 5 }, () => deferred());
    let active = 0;
    let maxActive = 0;

    const handles = gates.map((gate, i) =>
      scheduler.schedule({
        description: `job-${i}`,
        run: async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await gate.promise;
          active--;
        },
      }),
    );

    await flush();
    expect(scheduler.runningCount).toBe(2);
    expect(scheduler.queuedCount).toBe(3);

    for (const gate of gates) {
      gate.resolve();
      await flush();
    }
    await Promise.all(handles.map((h) => h.outcome));

    expect(maxActive).toBe(2);
    expect(scheduler.runningCount).toBe(0);
  });

  it('starts higher priority jobs first and keeps FIFO order within a priority', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    const blocker = deferred();
    const order: string[] = [];

    scheduler.schedule({ description: 'blocker', run: () => blocker.promise });
    const record = (name: string) => async () => {
      order.push(name);
    };
    scheduler.schedule({ description: 'low', priority: TaskPriority.low, run: record('low') });
    scheduler.schedule({ description: 'medium-1', priority: TaskPriority.medium, run: record('medium-1') });
    scheduler.schedule({ description: 'high', priority: TaskPriority.high, run: record('high') });
    scheduler.schedule({ description: 'medium-2', priority: TaskPriority.medium, run: record('medium-2') });

    blocker.resolve();
    await scheduler.drain();

    expect(order).toEqual(['high', 'medium-1', 'medium-2', 'low']);
  });

  it('elevates the priority of a queued job', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    const blocker = deferred();
    const order: string[] = [];

    scheduler.schedule({ description: 'blocker', run: () => blocker.promise });
    scheduler.schedule({
      description: 'first',
      priority: TaskPriority.medium,
      run: async () => {
        order.push('first');
      },
    });
    const late = scheduler.schedule({
      description: 'late',
      priority: TaskPriority.low,
      run: async () => {
        order.push('late');
      },
    });

    late.elevatePriority(TaskPriority.high);
    expect(late.priority).toBe(TaskPriority.high);
    late.elevatePriority(TaskPriority.low);
    expect(late.priority).toBe(TaskPriority.high);

    blocker.resolve();
    await scheduler.drain();
    expect(order).toEqual(['late', 'first']);
  });

  it('removes a cancelled queued job without running it', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    const blocker = deferred();
    const run = vi.fn(async () => {});

    scheduler.schedule({ description: 'blocker', run: () => blocker.promise });
    const queued = scheduler.schedule({ description: 'queued', run });

    expect(queued.cancel()).toBe(true);
    await expect(queued.outcome).resolves.toEqual({ status: 'cancelled' });
    expect(scheduler.queuedCount).toBe(0);

    blocker.resolve();
    await scheduler.drain();
    expect(run).not.toHaveBeenCalled();
  });

  it('aborts the signal of a cancelled running job and resolves as cancelled', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    const seen: { signal?: AbortSignal } = {};

    const handle = scheduler.schedule({
      description: 'long-running',
      run: (signal) =>
        new Promise<void>((_resolve, reject) => {
          seen.signal = signal;
          signal.addEventListener('abort', () => reject(new Error('terminated')));
        }),
    });

    await flush();
    expect(handle.state).toBe('running');
    expect(handle.cancel()).toBe(true);

    await expect(handle.outcome).resolves.toEqual({ status: 'cancelled' });
    expect(seen.signal?.aborted).toBe(true);
  });

  it('ignores cancel() for non-cancellable jobs', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    const gate = deferred();

    const handle = scheduler.schedule({
      description: 'graph',
      cancellable: false,
      run: async () => {
        await gate.promise;
        return 'done';
      },
    });

    await flush();
    expect(handle.cancel()).toBe(false);
    scheduler.cancelAll();

    gate.resolve();
    await expect(handle.outcome).resolves.toEqual({ status: 'succeeded', value: 'done' });
  });

  it('does not cancel siblings when one job fails', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 2 });

    const failing = scheduler.schedule({
      description: 'failing',
      run: async () => {
        throw new Error('exit code 1');
      },
    });
    const sibling = scheduler.schedule({ description: 'sibling', run: async () => 'ok' });

    const failed = await failing.outcome;
    expect(failed.status).toBe('failed');
    if (failed.status === 'failed') {
      expect(failed.error.message).toBe('exit code 1');
    }
    await expect(sibling.outcome).resolves.toEqual({ status: 'succeeded', value: 'ok' });
  });

  it('runs a dependent job only after its dependency succeeds', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 4 });
    const gate = deferred();
    const order: string[] = [];

    const dependency = scheduler.schedule({
      description: 'dependency',
      run: async () => {
        await gate.promise;
        order.push('dependency');
      },
    });
    const dependent = scheduler.schedule({
      description: 'dependent',
      priority: TaskPriority.high,
      dependsOn: [dependency],
      run: async () => {
        order.push('dependent');
      },
    });

    await flush();
    expect(dependent.state).toBe('queued');

    gate.resolve();
    await dependent.outcome;
    expect(order).toEqual(['dependency', 'dependent']);
  });

  it('skips dependents of a failed job', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 2 });
    const run = vi.fn(async () => {});

    const failing = scheduler.schedule({
      description: 'failing',
      run: async () => {
        throw new Error('broken');
      },
    });
    const dependent = scheduler.schedule({ description: 'dependent', dependsOn: [failing], run });
    const transitive = scheduler.schedule({ description: 'transitive', dependsOn: [dependent], run });

    await expect(dependent.outcome).resolves.toEqual({
      status: 'dependency-failed',
      dependencyId: failing.id,
    });
    await expect(transitive.outcome).resolves.toEqual({
      status: 'dependency-failed',
      dependencyId: dependent.id,
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('resolves a job depending on a cancelled job as dependency-failed', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    const blocker = deferred();
    const run = vi.fn(async () => {});

    scheduler.schedule({ description: 'blocker', run: () => blocker.promise });
    const cancelled = scheduler.schedule({ description: 'cancelled', run });
    const dependent = scheduler.schedule({ description: 'dependent', dependsOn: [cancelled], run });

    cancelled.cancel();
    await expect(dependent.outcome).resolves.toEqual({
      status: 'dependency-failed',
      dependencyId: cancelled.id,
    });

    blocker.resolve();
    await scheduler.drain();
    expect(run).not.toHaveBeenCalled();
  });

  it('fails a job scheduled on top of an already failed dependency', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    const failing = scheduler.schedule({
      description: 'failing',
      run: async () => {
        throw new Error('broken');
      },
    });
    await failing.outcome;

    const late = scheduler.schedule({ description: 'late', dependsOn: [failing], run: async () => {} });
    expect(late.state).toBe('finished');
    await expect(late.outcome).resolves.toEqual({
      status: 'dependency-failed',
      dependencyId: failing.id,
    });
  });

  it('cancelAll cancels queued and running cancellable jobs', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    const running = scheduler.schedule({
      description: 'running',
      run: (signal) =>
        new Promise<void>((resolve) => {
          signal.addEventListener('abort', () => resolve());
        }),
    });
    const queued = scheduler.schedule({ description: 'queued', run: async () => {} });

    await flush();
    scheduler.cancelAll();

    await expect(running.outcome).resolves.toEqual({ status: 'cancelled' });
    await expect(queued.outcome).resolves.toEqual({ status: 'cancelled' });
    await scheduler.drain();
    expect(scheduler.runningCount).toBe(0);
  });

  it('drain resolves immediately when idle', async () => {
    const scheduler = new TaskScheduler({ maxConcurrentJobs: 1 });
    await expect(scheduler.drain()).resolves.toBeUndefined();
  });

  it('rejects a non-positive maxConcurrentJobs', () => {
    expect(() => new TaskScheduler({ maxConcurrentJobs: 0 })).toThrow(ConfigError);
  });

  it('defaults maxConcurrentJobs to the core count', () => {
    const scheduler = new TaskScheduler();
    expect(scheduler.maxConcurrentJobs).toBeGreaterThanOrEqual(1);
  });
});
