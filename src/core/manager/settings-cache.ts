/**
 * Per-(document, target, language) build settings cache
 *
 *   unknown → pending → known → stale → pending → ...
 *
 * At most one backend query per key is in flight; concurrent lookups share
 * it. A failed query keeps the last known value.
 */

import type {
  ConfiguredTarget,
  DocumentURI,
  FileBuildSettings,
  Language,
} from '../../shared/types.js';
import { configuredTargetKey } from '../../shared/types.js';
import { toError } from '../../shared/errors.js';
import type { Logger } from '../../shared/logger.js';

export type SettingsEntryState = 'unknown' | 'pending' | 'known' | 'stale';

type SettingsEntry =
  | {
      state: 'pending';
      document: DocumentURI;
      promise: Promise<FileBuildSettings | null>;
      lastKnown: FileBuildSettings | null;
    }
  | { state: 'known'; document: DocumentURI; value: FileBuildSettings | null }
  | { state: 'stale'; document: DocumentURI; lastKnown: FileBuildSettings | null };

export type SettingsQuery = () => Promise<FileBuildSettings | null>;

function cacheKey(document: DocumentURI, target: ConfiguredTarget, language: Language): string {
  return `${document}\u0000${configuredTargetKey(target)}\u0000${language}`;
}

export class SettingsCache {
  private entries = new Map<string, SettingsEntry>();
  private keysByDocument = new Map<DocumentURI, Set<string>>();

  constructor(private readonly logger: Logger) {}

  state(document: DocumentURI, target: ConfiguredTarget, language: Language): SettingsEntryState {
    return this.entries.get(cacheKey(document, target, language))?.state ?? 'unknown';
  }

  lookup(
    document: DocumentURI,
    target: ConfiguredTarget,
    language: Language,
    query: SettingsQuery,
  ): Promise<FileBuildSettings | null> {
    const key = cacheKey(document, target, language);
    const entry = this.entries.get(key);

    if (entry?.state === 'known') return Promise.resolve(entry.value);
    if (entry?.state === 'pending') return entry.promise;

    const lastKnown = entry?.state === 'stale' ? entry.lastKnown : null;
    const pending: SettingsEntry = {
      state: 'pending',
      document,
      lastKnown,
      promise: query().then(
        (value) => {
          if (this.entries.get(key) === pending) {
            this.entries.set(key, { state: 'known', document, value });
          }
          return value;
        },
        (err: unknown) => {
          this.logger.error(`Build settings query failed: ${toError(err).message}`);
          if (this.entries.get(key) === pending) {
            this.entries.set(key, { state: 'stale', document, lastKnown });
          }
          return lastKnown;
        },
      ),
    };

    this.entries.set(key, pending);
    let keys = this.keysByDocument.get(document);
    if (!keys) {
      keys = new Set();
      this.keysByDocument.set(document, keys);
    }
    keys.add(key);
    return pending.promise;
  }

  /**
   * Mark every entry of `document` stale. An in-flight query still answers
   * its callers but its result is not stored.
   */
  invalidate(document: DocumentURI): void {
    for (const key of this.keysByDocument.get(document) ?? []) {
      const entry = this.entries.get(key);
      if (!entry || entry.state === 'stale') continue;
      this.entries.set(key, {
        state: 'stale',
        document,
        lastKnown: entry.state === 'known' ? entry.value : entry.lastKnown,
      });
    }
  }

  /** Forget `document` entirely. */
  drop(document: DocumentURI): void {
    for (const key of this.keysByDocument.get(document) ?? []) {
      this.entries.delete(key);
    }
    this.keysByDocument.delete(document);
  }

  clear(): void {
    this.entries.clear();
    this.keysByDocument.clear();
  }

  /** Resolves when every query in flight right now has settled. */
  async settle(): Promise<void> {
    const pending: Promise<unknown>[] = [];
    for (const entry of this.entries.values()) {
      if (entry.state === 'pending') pending.push(entry.promise);
    }
    await Promise.all(pending);
  }

  get documents(): DocumentURI[] {
    return [...this.keysByDocument.keys()];
  }
}
