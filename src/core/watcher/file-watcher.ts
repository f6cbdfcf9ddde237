/**
 * File watcher using chokidar
 * Monitors the project root and forwards debounced FileEvents.
 */

import chokidar from 'chokidar';
import * as path from 'node:path';
import type { FileEvent, FileEventType } from '../../shared/types.js';
import { Debouncer } from '../debouncer/debouncer.js';
import { pathToUri } from '../../shared/path-utils.js';
import { createLogger, type Logger } from '../../shared/logger.js';

export const DEFAULT_WATCH_DELAY_MS = 100;

export interface FileWatcherOptions {
  root: string;
  /** Directory names skipped anywhere below the root */
  exclude: string[];
  onFileEvents: (events: FileEvent[]) => Promise<void>;
  delayMs?: number;
  logger?: Logger;
}

export class FileWatcher {
  private watcher: ReturnType<typeof chokidar.watch> | null = null;
  private readonly debouncer: Debouncer;
  private readonly root: string;
  private readonly exclude: Set<string>;
  private readonly onFileEvents: (events: FileEvent[]) => Promise<void>;
  private readonly delayMs: number;
  private readonly logger: Logger;
  private readonly pending = new Map<string, FileEventType>();
  private ready = false;

  constructor(options: FileWatcherOptions) {
    this.root = path.resolve(options.root);
    this.exclude = new Set(options.exclude);
    this.onFileEvents = options.onFileEvents;
    this.delayMs = options.delayMs ?? DEFAULT_WATCH_DELAY_MS;
    this.logger = options.logger ?? createLogger('FileWatcher');
    this.debouncer = new Debouncer(this.logger);
  }

  start(): void {
    if (this.watcher) return;

    this.watcher = chokidar.watch(this.root, {
      ignored: (filepath: string) => this.isExcluded(filepath),
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 50,
      },
    });

    this.watcher
      .on('add', (filepath) => this.record('created', filepath))
      .on('change', (filepath) => this.record('changed', filepath))
      .on('unlink', (filepath) => this.record('deleted', filepath))
      .on('error', (error) => {
        this.logger.error('Watch error:', String(error));
      })
      .on('ready', () => {
        this.ready = true;
        this.logger.info('File watcher ready');
      });
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    this.debouncer.clear();
    this.pending.clear();
    this.ready = false;
  }

  get isReady(): boolean {
    return this.ready;
  }

  isExcluded(filepath: string): boolean {
    const relative = path.relative(this.root, path.resolve(this.root, filepath));
    if (relative === '') return false;
    return relative.split(path.sep).some((segment) => this.exclude.has(segment));
  }

  /**
   * Record a raw change. Changes to one path within the delay collapse into
   * a single event.
   */
  record(type: FileEventType, filepath: string): void {
    const absolutePath = path.resolve(this.root, filepath);
    const relative = path.relative(this.root, absolutePath);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      this.logger.warn(`Ignoring path outside project root: ${filepath}`);
      return;
    }
    if (this.isExcluded(absolutePath)) return;

    const previous = this.pending.get(absolutePath);
    const merged = mergeEventTypes(previous, type);
    if (merged) {
      this.pending.set(absolutePath, merged);
    } else {
      this.pending.delete(absolutePath);
    }

    this.debouncer.schedule(absolutePath, this.delayMs, async () => {
      const pendingType = this.pending.get(absolutePath);
      this.pending.delete(absolutePath);
      if (!pendingType) return;
      await this.onFileEvents([{ uri: pathToUri(absolutePath), type: pendingType }]);
    });
  }
}

/** null: the two changes cancel out (created, then deleted). */
function mergeEventTypes(previous: FileEventType | undefined, next: FileEventType): FileEventType | null {
  if (previous === 'created') {
    return next === 'deleted' ? null : 'created';
  }
  if (previous === 'deleted' && next === 'created') {
    return 'changed';
  }
  return next;
}
