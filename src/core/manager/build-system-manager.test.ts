import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { BuildSystemManager, type BuildSettingsChange } from './build-system-manager.js';
import { TaskPriority, TaskScheduler } from '../scheduler/task-scheduler.js';
import { FallbackBuildSystem } from '../fallback/fallback-build-system.js';
import { ToolchainRegistry } from '../toolchain/toolchain-registry.js';
import {
  BuildGraphGenerationError,
  ManagerClosedError,
  PrepareNotSupportedError,
} from '../../shared/errors.js';
import type { ConfiguredTarget } from '../../shared/types.js';
import {
  FakeBuildSystem,
  TEST_TARGET,
  deferred,
  fileSettings,
  flush,
  processResult,
  recordingLogger,
  silentLogger,
} from '../__test-helpers.js';

const A = 'file:///proj/a.c';
const B = 'file:///proj/b.c';
const OTHER_TARGET: ConfiguredTarget = { targetID: 'other', runDestinationID: 'host' };

describe('BuildSystemManager', () => {
  let backend: FakeBuildSystem;
  let manager: BuildSystemManager;
  let changes: BuildSettingsChange[][];

  function createManager(
    options: Partial<ConstructorParameters<typeof BuildSystemManager>[0]> = {},
  ): BuildSystemManager {
    const created = new BuildSystemManager({
      buildSystem: backend,
      scheduler: new TaskScheduler({ maxConcurrentJobs: 2, logger: silentLogger }),
      logger: silentLogger,
      ...options,
    });
    created.onBuildSettingsChanged((c) => {
      changes.push(c);
    });
    return created;
  }

  /** Let the settings debounce fire and the notification pipeline finish. */
  async function settle(ms = 20): Promise<void> {
    vi.advanceTimersByTime(ms);
    await flush();
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    backend = new FakeBuildSystem();
    changes = [];
    manager = createManager();
  });

  afterEach(async () => {
    await manager.close();
    vi.useRealTimers();
  });

  describe('buildSettings', () => {
    it('returns null for a document that was never registered', async () => {
      await expect(manager.buildSettings(A, TEST_TARGET, 'c')).resolves.toBeNull();
    });

    it('returns null without a backend', async () => {
      const empty = createManager({ buildSystem: null });

      await expect(empty.buildSettings(A, TEST_TARGET, 'c')).resolves.toBeNull();
      await expect(empty.buildSettingsForDocument(A, 'c')).resolves.toBeNull();
      await empty.close();
    });

    it('coalesces concurrent queries for the same key', async () => {
      backend.settings.set(A, fileSettings(['-O']));
      const gate = deferred();
      backend.queryGate = gate.promise;

      const first = manager.buildSettings(A, TEST_TARGET, 'c');
      const second = manager.buildSettings(A, TEST_TARGET, 'c');
      await flush();

      expect(backend.buildSettingsCalls).toBe(1);
      expect(manager.settingsState(A, TEST_TARGET, 'c')).toBe('pending');

      gate.resolve();
      const [r1, r2] = await Promise.all([first, second]);
      expect(r1).toEqual(fileSettings(['-O']));
      expect(r2).toBe(r1);
      expect(manager.settingsState(A, TEST_TARGET, 'c')).toBe('known');
    });

    it('serves known settings from the cache', async () => {
      backend.settings.set(A, fileSettings(['-O']));

      await manager.buildSettings(A, TEST_TARGET, 'c');
      await manager.buildSettings(A, TEST_TARGET, 'c');

      expect(backend.buildSettingsCalls).toBe(1);
    });

    it('keys the cache by language', async () => {
      await manager.buildSettings(A, TEST_TARGET, 'c');
      await manager.buildSettings(A, TEST_TARGET, 'objective-c');

      expect(backend.buildSettingsCalls).toBe(2);
    });

    it('keeps the last known settings when the backend fails', async () => {
      const { logger, lines } = recordingLogger();
      manager = createManager({ logger });
      backend.settings.set(A, fileSettings(['-O']));
      await manager.buildSettings(A, TEST_TARGET, 'c');

      backend.update(A, fileSettings(['-O2']));
      await settle();
      expect(manager.settingsState(A, TEST_TARGET, 'c')).toBe('stale');

      backend.queryError = new Error('backend down');
      await expect(manager.buildSettings(A, TEST_TARGET, 'c')).resolves.toEqual(fileSettings(['-O']));
      expect(lines).toContain('error Build settings query failed: backend down');
      expect(manager.settingsState(A, TEST_TARGET, 'c')).toBe('stale');

      backend.queryError = null;
      await expect(manager.buildSettings(A, TEST_TARGET, 'c')).resolves.toEqual(fileSettings(['-O2']));
    });

    it('returns null when the first query fails', async () => {
      backend.queryError = new Error('backend down');

      await expect(manager.buildSettings(A, TEST_TARGET, 'c')).resolves.toBeNull();
    });
  });

  describe('buildSettingsForDocument', () => {
    it('uses the first configured target', async () => {
      backend.targetsByDocument.set(A, [OTHER_TARGET, TEST_TARGET]);
      backend.settings.set(A, fileSettings(['-DOTHER']));

      await expect(manager.buildSettingsForDocument(A, 'c')).resolves.toEqual(fileSettings(['-DOTHER']));
      expect(manager.settingsState(A, OTHER_TARGET, 'c')).toBe('known');
      expect(manager.settingsState(A, TEST_TARGET, 'c')).toBe('unknown');
    });

    it('falls back when the backend has no settings', async () => {
      const fallback = new FakeBuildSystem({ kind: 'fallback' });
      fallback.settings.set(A, fileSettings(['-std=c11', '/proj/a.c']));
      manager = createManager({ fallbackBuildSystem: fallback });

      await expect(manager.buildSettingsForDocument(A, 'c')).resolves.toEqual({
        compilerArguments: ['-std=c11', '/proj/a.c'],
        workingDirectory: '/proj',
        language: 'c',
        isFallback: true,
      });
    });

    it('falls back when the document has no configured target', async () => {
      const fallback = new FakeBuildSystem({ kind: 'fallback' });
      fallback.settings.set(A, fileSettings(['/proj/a.c']));
      backend.targetsByDocument.set(A, []);
      manager = createManager({ fallbackBuildSystem: fallback });

      const settings = await manager.buildSettingsForDocument(A, 'c');

      expect(settings?.isFallback).toBe(true);
      expect(backend.buildSettingsCalls).toBe(0);
    });
  });

  describe('change notifications', () => {
    it('delivers exactly one notification after registering, even without settings', async () => {
      await manager.registerForChangeNotifications(A, 'c');
      expect(changes).toEqual([]);

      await settle();
      expect(changes).toEqual([[{ document: A, settings: null }]]);

      await settle(1000);
      expect(changes).toHaveLength(1);
      expect(backend.registered.has(A)).toBe(true);
    });

    it('coalesces a backend report during the debounce window into the initial notification', async () => {
      backend = new FakeBuildSystem({ reportOnRegister: true });
      backend.settings.set(A, fileSettings(['-O']));
      manager = createManager();

      await manager.registerForChangeNotifications(A, 'c');
      await settle();
      await settle(1000);

      expect(changes).toEqual([[{ document: A, settings: fileSettings(['-O']) }]]);
    });

    it('delivers an updated value between two queries with one notification', async () => {
      backend.settings.set(A, fileSettings(['-O'], '/proj'));
      await manager.registerForChangeNotifications(A, 'c');
      await settle();

      await expect(manager.buildSettings(A, TEST_TARGET, 'c')).resolves.toEqual(
        fileSettings(['-O'], '/proj'),
      );
      changes = [];

      backend.update(A, fileSettings(['-O0'], '/proj'));
      await settle();

      await expect(manager.buildSettings(A, TEST_TARGET, 'c')).resolves.toEqual(
        fileSettings(['-O0'], '/proj'),
      );
      expect(changes).toEqual([[{ document: A, settings: fileSettings(['-O0'], '/proj') }]]);
    });

    it('collapses a burst of backend reports into one notification', async () => {
      await manager.registerForChangeNotifications(A, 'c');
      await settle();
      changes = [];

      backend.update(A, fileSettings(['-O1']));
      vi.advanceTimersByTime(10);
      backend.update(A, fileSettings(['-O2']));
      vi.advanceTimersByTime(10);
      backend.update(A, fileSettings(['-O3']));
      await settle(19);
      expect(changes).toEqual([]);

      await settle(1);
      expect(changes).toEqual([[{ document: A, settings: fileSettings(['-O3']) }]]);
    });

    it('does not re-deliver identical settings', async () => {
      backend.settings.set(A, fileSettings(['-O']));
      await manager.registerForChangeNotifications(A, 'c');
      await settle();
      changes = [];

      backend.update(A, fileSettings(['-O']));
      await settle();

      expect(changes).toEqual([]);
      expect(backend.buildSettingsCalls).toBe(2);
    });

    it('keeps documents independent', async () => {
      await manager.registerForChangeNotifications(A, 'c');
      await manager.registerForChangeNotifications(B, 'c');
      await settle();
      changes = [];

      backend.update(B, fileSettings(['-DB']));
      await settle();

      expect(changes).toEqual([[{ document: B, settings: fileSettings(['-DB']) }]]);
    });

    it('stops notifying after unregistering', async () => {
      await manager.registerForChangeNotifications(A, 'c');
      await manager.unregisterForChangeNotifications(A);
      await settle();

      expect(changes).toEqual([]);
      expect(backend.registered.has(A)).toBe(false);
      expect(manager.watchedDocuments).toEqual([]);
    });

    it('discards an in-flight query of an unregistered document', async () => {
      await manager.registerForChangeNotifications(A, 'c');
      backend.settings.set(A, fileSettings(['-O']));
      const gate = deferred();
      backend.queryGate = gate.promise;

      const pending = manager.buildSettings(A, TEST_TARGET, 'c');
      await flush();
      await manager.unregisterForChangeNotifications(A);
      gate.resolve();

      await expect(pending).resolves.toEqual(fileSettings(['-O']));
      expect(manager.settingsState(A, TEST_TARGET, 'c')).toBe('unknown');
    });

    it('invalidates unwatched documents without notifying', async () => {
      backend.settings.set(A, fileSettings(['-O']));
      await manager.buildSettings(A, TEST_TARGET, 'c');

      backend.update(A, fileSettings(['-O0']));
      await settle();

      expect(changes).toEqual([]);
      await expect(manager.buildSettings(A, TEST_TARGET, 'c')).resolves.toEqual(fileSettings(['-O0']));
    });

    it('debounces source file changes per manager', async () => {
      const handler = vi.fn();
      manager.onSourceFilesChanged(handler);

      backend.delegate?.sourceFilesChanged();
      backend.delegate?.sourceFilesChanged();
      backend.delegate?.sourceFilesChanged();
      await settle(499);
      expect(handler).not.toHaveBeenCalled();

      await settle(1);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('forwards capability changes to subscribers', async () => {
      const handler = vi.fn();
      manager.onFileHandlingCapabilityChanged(handler);

      backend.delegate?.fileHandlingCapabilityChanged();
      await settle(500);

      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('stops calling a disposed subscriber', async () => {
      const handler = vi.fn();
      const subscription = manager.onSourceFilesChanged(handler);
      subscription.dispose();

      backend.delegate?.sourceFilesChanged();
      await settle(500);

      expect(handler).not.toHaveBeenCalled();
    });

    it('keeps notifying other subscribers when one throws', async () => {
      manager.onBuildSettingsChanged(() => {
        throw new Error('subscriber bug');
      });
      const after = vi.fn();
      manager.onBuildSettingsChanged(after);

      await manager.registerForChangeNotifications(A, 'c');
      await settle();

      expect(changes).toHaveLength(1);
      expect(after).toHaveBeenCalledTimes(1);
    });

    it('keeps two managers independent', async () => {
      const otherChanges: BuildSettingsChange[][] = [];
      const otherBackend = new FakeBuildSystem();
      const other = new BuildSystemManager({ buildSystem: otherBackend, logger: silentLogger });
      other.onBuildSettingsChanged((c) => {
        otherChanges.push(c);
      });

      await manager.registerForChangeNotifications(A, 'c');
      await settle();

      expect(changes).toHaveLength(1);
      expect(otherChanges).toEqual([]);
      await other.close();
    });
  });

  describe('generateBuildGraph', () => {
    it('shares one run between concurrent callers', async () => {
      const gate = deferred();
      backend.graphGate = gate.promise;

      const first = manager.generateBuildGraph();
      const second = manager.generateBuildGraph();
      expect(second).toBe(first);
      await flush();
      expect(backend.generateBuildGraphCalls).toBe(1);

      gate.resolve();
      await first;
      await manager.generateBuildGraph();
      expect(backend.generateBuildGraphCalls).toBe(2);
    });

    it('fails with BuildGraphGenerationError and keeps cached settings', async () => {
      backend.settings.set(A, fileSettings(['-O']));
      await manager.buildSettings(A, TEST_TARGET, 'c');
      backend.graphError = new Error('manifest is invalid');

      const generation = manager.generateBuildGraph();

      await expect(generation).rejects.toBeInstanceOf(BuildGraphGenerationError);
      await expect(generation).rejects.toThrow('Build graph generation failed: manifest is invalid');
      expect(manager.settingsState(A, TEST_TARGET, 'c')).toBe('known');
    });

    it('re-notifies only documents whose configured targets changed', async () => {
      await manager.registerForChangeNotifications(A, 'c');
      await manager.registerForChangeNotifications(B, 'c');
      await settle();
      changes = [];

      backend.targetsByDocument.set(A, [OTHER_TARGET]);
      backend.settings.set(A, fileSettings(['-DOTHER']));
      backend.settings.set(B, fileSettings(['-DB']));
      await manager.generateBuildGraph();

      expect(changes).toEqual([[{ document: A, settings: fileSettings(['-DOTHER']) }]]);
    });

    it('forgets configured targets of unwatched documents after one refresh', async () => {
      const configuredTargets = vi.spyOn(backend, 'configuredTargets');
      await manager.configuredTargets(B);
      backend.settings.set(B, fileSettings(['-DB']));
      await manager.buildSettings(B, TEST_TARGET, 'c');

      await manager.generateBuildGraph();
      expect(manager.settingsState(B, TEST_TARGET, 'c')).toBe('stale');
      await manager.generateBuildGraph();

      expect(configuredTargets).toHaveBeenCalledTimes(1);
    });

    it('runs ahead of queued preparation', async () => {
      const scheduler = new TaskScheduler({ maxConcurrentJobs: 1, logger: silentLogger });
      const order: string[] = [];
      backend = new FakeBuildSystem({
        prepare: async () => {
          order.push('prepare');
        },
      });
      backend.generateBuildGraph = async () => {
        order.push('graph');
      };
      manager = createManager({ scheduler });
      const blocker = deferred();
      scheduler.schedule({ description: 'blocker', run: () => blocker.promise });

      const preparation = manager.prepare([TEST_TARGET], () => {});
      await flush();
      const generation = manager.generateBuildGraph();
      await flush();
      blocker.resolve();

      await Promise.all([preparation, generation]);
      expect(order).toEqual(['graph', 'prepare']);
    });

    it('stays ahead of preparation requested above high priority', async () => {
      const scheduler = new TaskScheduler({ maxConcurrentJobs: 1, logger: silentLogger });
      const order: string[] = [];
      backend = new FakeBuildSystem({
        prepare: async () => {
          order.push('prepare');
        },
      });
      backend.generateBuildGraph = async () => {
        order.push('graph');
      };
      manager = createManager({ scheduler });
      const blocker = deferred();
      scheduler.schedule({ description: 'blocker', run: () => blocker.promise });

      const preparation = manager.prepare([TEST_TARGET], () => {}, { priority: TaskPriority.high + 50 });
      await flush();
      const generation = manager.generateBuildGraph();
      await flush();
      blocker.resolve();

      await Promise.all([preparation, generation]);
      expect(order).toEqual(['graph', 'prepare']);
    });
  });

  describe('topologicalSort and targets', () => {
    it('returns null when the backend cannot answer', async () => {
      await expect(manager.topologicalSort([TEST_TARGET])).resolves.toBeNull();
      await expect(manager.targets([TEST_TARGET])).resolves.toBeNull();
    });

    it('passes the backend ordering through', async () => {
      backend.sortResult = [OTHER_TARGET, TEST_TARGET];
      backend.dependentsResult = [TEST_TARGET];

      await expect(manager.topologicalSort([TEST_TARGET, OTHER_TARGET])).resolves.toEqual([
        OTHER_TARGET,
        TEST_TARGET,
      ]);
      await expect(manager.targets([OTHER_TARGET])).resolves.toEqual([TEST_TARGET]);
    });
  });

  describe('prepare', () => {
    it('rejects when the backend cannot prepare', async () => {
      await expect(manager.prepare([TEST_TARGET], () => {})).rejects.toBeInstanceOf(
        PrepareNotSupportedError,
      );
    });

    it('rejects when the backend reports preparation as unsupported', async () => {
      backend = new FakeBuildSystem({
        prepare: async () => {
          throw new PrepareNotSupportedError();
        },
      });
      manager = createManager();

      await expect(manager.prepare([TEST_TARGET], () => {})).rejects.toThrow('Preparation not supported');
    });

    it('reports every spawned process', async () => {
      const processRunner = vi.fn(async (command: readonly string[]) => processResult([...command]));
      backend = new FakeBuildSystem({
        prepare: async (targets, context) => {
          await context.runProcess(['build', ...targets.map((t) => t.targetID)], { cwd: '/proj' });
          await context.runProcess(['index']);
        },
      });
      manager = createManager({ processRunner });
      const onProcessResult = vi.fn();

      await expect(manager.prepare([TEST_TARGET], onProcessResult)).resolves.toBe('completed');

      expect(onProcessResult).toHaveBeenCalledTimes(2);
      expect(onProcessResult).toHaveBeenNthCalledWith(1, processResult(['build', 'app']));
      expect(onProcessResult).toHaveBeenNthCalledWith(2, processResult(['index']));
      expect(processRunner).toHaveBeenCalledWith(['build', 'app'], {
        cwd: '/proj',
        signal: expect.any(AbortSignal),
      });
    });

    it('resolves cancelled when the caller aborts', async () => {
      backend = new FakeBuildSystem({
        prepare: (_targets, context) =>
          new Promise<void>((resolve) => {
            context.signal.addEventListener('abort', () => resolve());
          }),
      });
      manager = createManager();
      const controller = new AbortController();

      const preparation = manager.prepare([TEST_TARGET], () => {}, { signal: controller.signal });
      await flush();
      controller.abort();

      await expect(preparation).resolves.toBe('cancelled');
    });

    it('resolves dependency-failed when a dependency fails', async () => {
      const scheduler = new TaskScheduler({ maxConcurrentJobs: 2, logger: silentLogger });
      const prepare = vi.fn(async () => {});
      backend = new FakeBuildSystem({ prepare });
      manager = createManager({ scheduler });
      const dependency = scheduler.schedule({
        description: 'dependency',
        run: async () => {
          throw new Error('broken');
        },
      });

      await expect(manager.prepare([TEST_TARGET], () => {}, { dependsOn: [dependency] })).resolves.toBe(
        'dependency-failed',
      );
      expect(prepare).not.toHaveBeenCalled();
    });

    it('propagates other preparation failures', async () => {
      backend = new FakeBuildSystem({
        prepare: async () => {
          throw new Error('compiler crashed');
        },
      });
      manager = createManager();

      await expect(manager.prepare([TEST_TARGET], () => {})).rejects.toThrow('compiler crashed');
    });
  });

  describe('delegation', () => {
    it('forwards file events to the backend', async () => {
      await manager.filesDidChange([{ uri: A, type: 'changed' }]);
      await manager.filesDidChange([]);

      expect(backend.fileEvents).toEqual([[{ uri: A, type: 'changed' }]]);
    });

    it('answers capability and source file queries from the backend', async () => {
      backend.capability = 'fallback';
      backend.sources = [{ uri: A, isPartOfRootProject: true, mayContainTests: false }];

      await expect(manager.fileHandlingCapability(A)).resolves.toBe('fallback');
      await expect(manager.sourceFiles()).resolves.toEqual(backend.sources);
    });

    it('reports the better capability of the active and the fallback backend', async () => {
      backend.capability = 'unhandled';
      manager = createManager({
        fallbackBuildSystem: new FallbackBuildSystem({ projectRoot: '/proj' }),
      });

      await expect(manager.fileHandlingCapability(A)).resolves.toBe('fallback');
      await expect(manager.fileHandlingCapability('file:///proj/notes.txt')).resolves.toBe('unhandled');
    });

    it('infers the default language from the extension', async () => {
      await expect(manager.defaultLanguage('file:///proj/lib.cpp')).resolves.toBe('cpp');
      await expect(manager.defaultLanguage('file:///proj/notes.txt')).resolves.toBeNull();
      await expect(manager.defaultLanguage('untitled:Untitled-1')).resolves.toBeNull();
    });

    it('exposes the backend properties and remaps index paths', () => {
      backend = new FakeBuildSystem({
        properties: {
          projectRoot: '/work/proj',
          indexStorePath: '/work/proj/.build/index/store',
          indexPrefixMappings: [{ original: '/build', replacement: '/work/proj' }],
        },
      });
      manager = createManager();

      expect(manager.projectRoot).toBe('/work/proj');
      expect(manager.indexStorePath).toBe('/work/proj/.build/index/store');
      expect(manager.indexDatabasePath).toBeNull();
      expect(manager.remapIndexPath('/build/src/a.c')).toBe('/work/proj/src/a.c');
      expect(manager.remapIndexPath('/builder/a.c')).toBe('/builder/a.c');
    });
  });

  describe('toolchain', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'buildsense-manager-')));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('resolves a toolchain per language and treats removed ones as gone', async () => {
      const dir = path.join(tmpDir, 'llvm-17');
      fs.mkdirSync(path.join(dir, 'bin'), { recursive: true });
      fs.writeFileSync(path.join(dir, 'bin', 'clang'), '#!/bin/sh\n', { mode: 0o755 });
      const registry = new ToolchainRegistry({
        searchPaths: [tmpDir],
        environment: {},
        platformDefaults: false,
        platform: 'linux',
      });
      await registry.scan();
      manager = createManager({ toolchainRegistry: registry });

      const toolchain = manager.toolchain('c');
      expect(toolchain?.version).toBe('17');
      expect(manager.toolchain('cpp')).toBeNull();
      expect(manager.toolchain('markdown')).toBeNull();

      fs.rmSync(dir, { recursive: true, force: true });
      await registry.scan();

      expect(manager.toolchain('c')).toBeNull();
      expect(toolchain && manager.isToolchainAvailable(toolchain)).toBe(false);
    });

    it('returns null without a registry', () => {
      expect(manager.toolchain('c')).toBeNull();
    });
  });

  describe('reconfigure', () => {
    it('moves watched documents to the new backend', async () => {
      backend.settings.set(A, fileSettings(['-O']));
      await manager.registerForChangeNotifications(A, 'c');
      await settle();
      const oldBackend = backend;
      const oldDelegate = oldBackend.delegate;
      const next = new FakeBuildSystem({ kind: 'build-server' });
      next.settings.set(A, fileSettings(['-O2']));
      changes = [];

      await manager.reconfigure(next);

      expect(manager.kind).toBe('build-server');
      expect(oldBackend.delegate).toBeNull();
      expect(oldBackend.registered.has(A)).toBe(false);
      expect(next.registered.has(A)).toBe(true);

      oldDelegate?.fileBuildSettingsChanged([A]);
      await settle();
      expect(changes).toEqual([[{ document: A, settings: fileSettings(['-O2']) }]]);
    });

    it('waits for in-flight queries before swapping', async () => {
      backend.settings.set(A, fileSettings(['-O']));
      const gate = deferred();
      backend.queryGate = gate.promise;
      const next = new FakeBuildSystem();

      const pending = manager.buildSettings(A, TEST_TARGET, 'c');
      await flush();
      const swap = manager.reconfigure(next);
      await flush();
      expect(next.delegate).toBeNull();

      gate.resolve();
      await swap;
      expect(next.delegate).not.toBeNull();
      await expect(pending).resolves.toEqual(fileSettings(['-O']));
    });

    it('cancels cancellable jobs of the old backend', async () => {
      backend = new FakeBuildSystem({
        prepare: (_targets, context) =>
          new Promise<void>((resolve) => {
            context.signal.addEventListener('abort', () => resolve());
          }),
      });
      manager = createManager();

      const preparation = manager.prepare([TEST_TARGET], () => {});
      await flush();
      await manager.reconfigure(new FakeBuildSystem());

      await expect(preparation).resolves.toBe('cancelled');
    });

    it('lets subscribers query the new backend while being notified', async () => {
      const next = new FakeBuildSystem();
      next.sources = [{ uri: B, isPartOfRootProject: true, mayContainTests: true }];
      next.capability = 'fallback';
      let seen: unknown = null;
      manager.onSourceFilesChanged(async () => {
        seen = await manager.sourceFiles();
      });
      let capability: unknown = null;
      manager.onFileHandlingCapabilityChanged(async () => {
        capability = await manager.fileHandlingCapability(B);
      });

      await manager.reconfigure(next);

      expect(seen).toEqual(next.sources);
      expect(capability).toBe('fallback');
    });
  });

  describe('close', () => {
    it('rejects new work and answers queries with null', async () => {
      backend.settings.set(A, fileSettings(['-O']));
      await manager.close();

      await expect(manager.registerForChangeNotifications(A, 'c')).rejects.toBeInstanceOf(
        ManagerClosedError,
      );
      await expect(manager.generateBuildGraph()).rejects.toBeInstanceOf(ManagerClosedError);
      await expect(manager.buildSettings(A, TEST_TARGET, 'c')).resolves.toBeNull();
      expect(backend.delegate).toBeNull();
    });
  });
});
