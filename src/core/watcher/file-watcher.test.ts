import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FileWatcher } from './file-watcher.js';
import type { FileEvent } from '../../shared/types.js';
import { flush, silentLogger } from '../__test-helpers.js';

describe('FileWatcher', () => {
  let received: FileEvent[][];
  let watcher: FileWatcher;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    received = [];
    watcher = new FileWatcher({
      root: '/proj',
      exclude: ['node_modules', '.build'],
      delayMs: 100,
      logger: silentLogger,
      onFileEvents: async (events) => {
        received.push(events);
      },
    });
  });

  afterEach(async () => {
    await watcher.stop();
    vi.useRealTimers();
  });

  async function settle(ms = 100): Promise<void> {
    vi.advanceTimersByTime(ms);
    await flush();
  }

  it('forwards one event per path after the delay', async () => {
    watcher.record('changed', '/proj/src/a.c');
    watcher.record('changed', '/proj/src/a.c');
    await settle(99);
    expect(received).toEqual([]);

    await settle(1);
    expect(received).toEqual([[{ uri: 'file:///proj/src/a.c', type: 'changed' }]]);
  });

  it('keeps paths independent', async () => {
    watcher.record('created', '/proj/a.c');
    watcher.record('deleted', '/proj/b.c');
    await settle();

    expect(received).toEqual([
      [{ uri: 'file:///proj/a.c', type: 'created' }],
      [{ uri: 'file:///proj/b.c', type: 'deleted' }],
    ]);
  });

  it('merges the changes of one path', async () => {
    watcher.record('created', '/proj/new.c');
    watcher.record('changed', '/proj/new.c');
    watcher.record('deleted', '/proj/old.c');
    watcher.record('created', '/proj/old.c');
    watcher.record('created', '/proj/tmp.c');
    watcher.record('deleted', '/proj/tmp.c');
    await settle();

    expect(received).toEqual([
      [{ uri: 'file:///proj/new.c', type: 'created' }],
      [{ uri: 'file:///proj/old.c', type: 'changed' }],
    ]);
  });

  it('ignores excluded directories and paths outside the root', async () => {
    watcher.record('changed', '/proj/node_modules/x/a.c');
    watcher.record('changed', '/proj/.build/debug/a.o');
    watcher.record('changed', '/elsewhere/a.c');
    await settle();

    expect(received).toEqual([]);
    expect(watcher.isExcluded('/proj/src/node_modules.c')).toBe(false);
    expect(watcher.isExcluded('/proj')).toBe(false);
  });
});
