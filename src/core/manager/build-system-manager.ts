/**
 * Build system manager
 *
 * Owns the active backend and is the only component that talks to it.
 * Adds on top of the backend contract:
 * - a per-(document, target, language) settings cache with request coalescing
 * - debounced, per-document serialized change notifications
 * - build graph generation and preparation as jobs on the TaskScheduler
 * - toolchain resolution through the ToolchainRegistry
 *
 * Everything is injected; two managers never share state.
 */

import { v7 as uuidv7 } from 'uuid';
import {
  BuildGraphGenerationError,
  ManagerClosedError,
  NoToolchainFoundError,
  PrepareNotSupportedError,
  toError,
} from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import { languageForPath, remapPath, uriToPath } from '../../shared/path-utils.js';
import {
  bestFileHandlingCapability,
  configuredTargetsEqual,
  fileBuildSettingsEqual,
  indexProcessSucceeded,
  redactConfiguredTarget,
  type ConfiguredTarget,
  type DocumentURI,
  type FileBuildSettings,
  type FileEvent,
  type FileHandlingCapability,
  type IndexProcessResult,
  type Language,
  type SourceFileInfo,
} from '../../shared/types.js';
import { Debouncer } from '../debouncer/debouncer.js';
import { runIndexProcess, type IndexProcessRunner } from '../scheduler/index-process.js';
import { TaskPriority, TaskScheduler, type JobHandle } from '../scheduler/task-scheduler.js';
import type { ToolchainRegistry } from '../toolchain/toolchain-registry.js';
import { toolForLanguage, type Toolchain } from '../toolchain/toolchain.js';
import type { BuildSystem, BuildSystemDelegate, PrepareContext } from './build-system.js';
import { HandlerRegistry, type Subscription } from './handler-registry.js';
import { SettingsCache, type SettingsEntryState } from './settings-cache.js';

export interface BuildSystemManagerConfig {
  /** Quiet period before a document's settings change is delivered */
  buildSettingsDelayMs: number;
  /** Quiet period before source-file and target-graph changes are handled */
  sourceFilesDelayMs: number;
}

export const DEFAULT_MANAGER_CONFIG: BuildSystemManagerConfig = {
  buildSettingsDelayMs: 20,
  sourceFilesDelayMs: 500,
};

export interface BuildSystemManagerOptions {
  buildSystem: BuildSystem | null;
  /** Consulted by `buildSettingsForDocument` when the primary backend has nothing */
  fallbackBuildSystem?: BuildSystem | null;
  toolchainRegistry?: ToolchainRegistry | null;
  scheduler?: TaskScheduler;
  processRunner?: IndexProcessRunner;
  config?: Partial<BuildSystemManagerConfig>;
  logger?: Logger;
}

export interface BuildSettingsChange {
  document: DocumentURI;
  /** null: no settings are known for the document */
  settings: FileBuildSettings | null;
}

export type PrepareStatus = 'completed' | 'cancelled' | 'dependency-failed';

export interface PrepareOptions {
  /** Capped below `TaskPriority.high`, which build graph generation uses */
  priority?: number;
  signal?: AbortSignal;
  dependsOn?: ReadonlyArray<JobHandle<unknown>>;
}

export type ProcessResultCallback = (result: IndexProcessResult) => void;

/** Delegate handed to one backend. Deactivated when the backend is swapped out. */
interface AttachedDelegate extends BuildSystemDelegate {
  active: boolean;
}

export class BuildSystemManager {
  readonly id = uuidv7();

  private buildSystem: BuildSystem | null = null;
  private delegate: AttachedDelegate | null = null;
  private readonly fallbackBuildSystem: BuildSystem | null;
  private readonly toolchainRegistry: ToolchainRegistry | null;
  private readonly scheduler: TaskScheduler;
  private readonly ownsScheduler: boolean;
  private readonly processRunner: IndexProcessRunner;
  private readonly config: BuildSystemManagerConfig;
  private readonly logger: Logger;

  private readonly debouncer: Debouncer;
  private readonly cache: SettingsCache;
  /** Documents registered for change notifications, with their language */
  private readonly watched = new Map<DocumentURI, Language>();
  /** Last settings delivered per watched document */
  private readonly delivered = new Map<DocumentURI, FileBuildSettings | null>();
  private readonly deliveryChains = new Map<DocumentURI, Promise<void>>();
  private readonly targetsByDocument = new Map<DocumentURI, ConfiguredTarget[]>();
  private readonly resolvedToolchains = new Map<Language, Toolchain>();
  private readonly jobs = new Set<JobHandle<unknown>>();

  private buildGraphGeneration: Promise<void> | null = null;
  private reconfiguring: Promise<void> | null = null;
  private closed = false;

  private readonly settingsHandlers: HandlerRegistry<[BuildSettingsChange[]]>;
  private readonly sourceFilesHandlers: HandlerRegistry<[]>;
  private readonly capabilityHandlers: HandlerRegistry<[]>;

  constructor(options: BuildSystemManagerOptions) {
    this.logger = options.logger ?? createLogger('BuildSystemManager');
    this.fallbackBuildSystem = options.fallbackBuildSystem ?? null;
    this.toolchainRegistry = options.toolchainRegistry ?? null;
    this.ownsScheduler = options.scheduler === undefined;
    this.scheduler = options.scheduler ?? new TaskScheduler({ logger: this.logger });
    this.processRunner = options.processRunner ?? runIndexProcess;
    this.config = { ...DEFAULT_MANAGER_CONFIG, ...options.config };

    this.debouncer = new Debouncer(this.logger);
    this.cache = new SettingsCache(this.logger);
    this.settingsHandlers = new HandlerRegistry('Build settings', this.logger);
    this.sourceFilesHandlers = new HandlerRegistry('Source files', this.logger);
    this.capabilityHandlers = new HandlerRegistry('File handling capability', this.logger);

    this.attach(options.buildSystem);
  }

  // --- Backend properties ---

  get kind(): BuildSystem['kind'] | null {
    return this.buildSystem?.kind ?? null;
  }

  get projectRoot(): string | null {
    return this.buildSystem?.properties.projectRoot ?? null;
  }

  get indexStorePath(): string | null {
    return this.buildSystem?.properties.indexStorePath ?? null;
  }

  get indexDatabasePath(): string | null {
    return this.buildSystem?.properties.indexDatabasePath ?? null;
  }

  /** Map a path recorded in the index store to the local file system. */
  remapIndexPath(filepath: string): string {
    return remapPath(filepath, this.buildSystem?.properties.indexPrefixMappings ?? []);
  }

  // --- Subscriptions ---

  onBuildSettingsChanged(
    handler: (changes: BuildSettingsChange[]) => void | Promise<void>,
  ): Subscription {
    return this.settingsHandlers.add(handler);
  }

  onSourceFilesChanged(handler: () => void | Promise<void>): Subscription {
    return this.sourceFilesHandlers.add(handler);
  }

  onFileHandlingCapabilityChanged(handler: () => void | Promise<void>): Subscription {
    return this.capabilityHandlers.add(handler);
  }

  // --- Build settings ---

  /**
   * Settings of `document` in `target`, or null when none are known.
   * Never throws: a failing backend yields the last known value.
   */
  async buildSettings(
    document: DocumentURI,
    target: ConfiguredTarget,
    language: Language,
  ): Promise<FileBuildSettings | null> {
    const backend = await this.activeBackend();
    if (!backend) return null;
    return this.cache.lookup(document, target, language, () =>
      backend.buildSettings(document, target, language),
    );
  }

  /**
   * Settings of `document` in its canonical target, falling back to inferred
   * settings when the backend has none.
   */
  async buildSettingsForDocument(
    document: DocumentURI,
    language: Language,
  ): Promise<FileBuildSettings | null> {
    const [target] = await this.configuredTargets(document);
    if (target) {
      const settings = await this.buildSettings(document, target, language);
      if (settings) return settings;
    }
    return this.fallbackSettings(document, language);
  }

  /** Cache state of one entry, mostly for diagnostics. */
  settingsState(
    document: DocumentURI,
    target: ConfiguredTarget,
    language: Language,
  ): SettingsEntryState {
    return this.cache.state(document, target, language);
  }

  async configuredTargets(document: DocumentURI): Promise<ConfiguredTarget[]> {
    const backend = await this.activeBackend();
    if (!backend) return [];
    try {
      const targets = await backend.configuredTargets(document);
      this.targetsByDocument.set(document, targets);
      return targets;
    } catch (err) {
      this.logger.error(`Failed to get configured targets: ${toError(err).message}`);
      return [];
    }
  }

  async defaultLanguage(document: DocumentURI): Promise<Language | null> {
    const backend = await this.activeBackend();
    if (backend?.defaultLanguage) {
      try {
        const language = await backend.defaultLanguage(document);
        if (language) return language;
      } catch (err) {
        this.logger.warn(`Failed to get default language: ${toError(err).message}`);
      }
    }
    const filepath = uriToPath(document);
    return filepath ? languageForPath(filepath) : null;
  }

  // --- Build graph ---

  /**
   * Regenerate the build graph. Concurrent calls share one run, which is a
   * high priority job that cannot be cancelled.
   */
  generateBuildGraph(): Promise<void> {
    if (this.closed) return Promise.reject(new ManagerClosedError());
    if (this.buildGraphGeneration) return this.buildGraphGeneration;

    const generation = this.runBuildGraphGeneration().finally(() => {
      this.buildGraphGeneration = null;
    });
    this.buildGraphGeneration = generation;
    return generation;
  }

  /** Dependencies first; null when the backend cannot order targets. */
  async topologicalSort(targets: ConfiguredTarget[]): Promise<ConfiguredTarget[] | null> {
    const backend = await this.activeBackend();
    if (!backend) return null;
    try {
      return await backend.topologicalSort(targets);
    } catch (err) {
      this.logger.error(`Topological sort failed: ${toError(err).message}`);
      return null;
    }
  }

  /** Targets depending on `dependingOn`; null means every target may depend on them. */
  async targets(dependingOn: ConfiguredTarget[]): Promise<ConfiguredTarget[] | null> {
    const backend = await this.activeBackend();
    if (!backend) return null;
    try {
      return await backend.targets(dependingOn);
    } catch (err) {
      this.logger.error(`Reverse dependency query failed: ${toError(err).message}`);
      return null;
    }
  }

  // --- Preparation ---

  /**
   * Prepare `targets` for indexing as a scheduler job. `onProcessResult` is
   * called once per process the backend spawns.
   */
  async prepare(
    targets: ConfiguredTarget[],
    onProcessResult: ProcessResultCallback,
    options: PrepareOptions = {},
  ): Promise<PrepareStatus> {
    if (this.closed) throw new ManagerClosedError();
    const backend = await this.activeBackend();
    const prepareTargets = backend?.prepare;
    if (!backend || !prepareTargets) throw new PrepareNotSupportedError();

    this.logger.debug(`Preparing ${targets.map(redactConfiguredTarget).join(', ')}`);

    const handle = this.track(
      this.scheduler.schedule({
        description: `prepare ${targets.length} target(s)`,
        priority: Math.min(options.priority ?? TaskPriority.low, TaskPriority.high - 1),
        dependsOn: options.dependsOn,
        run: async (signal) => {
          const context: PrepareContext = {
            signal,
            runProcess: (command, processOptions = {}) =>
              this.runPrepareProcess(command, { ...processOptions, signal }, onProcessResult),
          };
          await prepareTargets.call(backend, targets, context);
        },
      }),
    );

    const abort = (): void => {
      handle.cancel();
    };
    options.signal?.addEventListener('abort', abort, { once: true });
    if (options.signal?.aborted) abort();

    try {
      const outcome = await handle.outcome;
      switch (outcome.status) {
        case 'succeeded':
          return 'completed';
        case 'cancelled':
          return 'cancelled';
        case 'dependency-failed':
          return 'dependency-failed';
        case 'failed':
          if (!(outcome.error instanceof PrepareNotSupportedError)) {
            this.logger.error(`Preparation of ${targets.length} target(s) failed: ${outcome.error.message}`);
          }
          throw outcome.error;
      }
    } finally {
      options.signal?.removeEventListener('abort', abort);
    }
  }

  // --- File events & capabilities ---

  async filesDidChange(events: FileEvent[]): Promise<void> {
    if (events.length === 0) return;
    const backend = await this.activeBackend();
    if (!backend) return;
    try {
      await backend.filesDidChange(events);
    } catch (err) {
      this.logger.error(`Failed to forward ${events.length} file event(s): ${toError(err).message}`);
    }
  }

  /** The better of what the active and the fallback backend offer for `uri`. */
  async fileHandlingCapability(uri: DocumentURI): Promise<FileHandlingCapability> {
    const backend = await this.activeBackend();
    const backends = [backend, this.closed ? null : this.fallbackBuildSystem];
    const capabilities: FileHandlingCapability[] = [];
    for (const candidate of new Set(backends)) {
      if (!candidate) continue;
      try {
        capabilities.push(await candidate.fileHandlingCapability(uri));
      } catch (err) {
        this.logger.warn(`Failed to get file handling capability: ${toError(err).message}`);
      }
    }
    return bestFileHandlingCapability(capabilities);
  }

  async sourceFiles(): Promise<SourceFileInfo[]> {
    const backend = await this.activeBackend();
    if (!backend) return [];
    try {
      return await backend.sourceFiles();
    } catch (err) {
      this.logger.error(`Failed to list source files: ${toError(err).message}`);
      return [];
    }
  }

  // --- Change notifications ---

  /**
   * Watch `document`. Exactly one notification follows asynchronously, with
   * null settings when nothing is known yet.
   */
  async registerForChangeNotifications(document: DocumentURI, language: Language): Promise<void> {
    if (this.closed) throw new ManagerClosedError();
    this.watched.set(document, language);
    this.delivered.delete(document);
    this.scheduleSettingsChange(document);

    const backend = await this.activeBackend();
    if (!backend) return;
    try {
      await backend.registerForChangeNotifications(document);
    } catch (err) {
      this.logger.error(`Failed to register for change notifications: ${toError(err).message}`);
    }
  }

  /** Stop watching `document` and forget its cached settings. */
  async unregisterForChangeNotifications(document: DocumentURI): Promise<void> {
    this.watched.delete(document);
    this.delivered.delete(document);
    this.debouncer.cancel(settingsDebounceKey(document));
    this.cache.drop(document);
    this.targetsByDocument.delete(document);

    const backend = await this.activeBackend();
    if (!backend) return;
    try {
      await backend.unregisterForChangeNotifications(document);
    } catch (err) {
      this.logger.error(`Failed to unregister from change notifications: ${toError(err).message}`);
    }
  }

  get watchedDocuments(): DocumentURI[] {
    return [...this.watched.keys()];
  }

  // --- Toolchains ---

  /** Toolchain used to compile `language`, or null when none is installed. */
  toolchain(language: Language): Toolchain | null {
    const registry = this.toolchainRegistry;
    const tool = toolForLanguage(language);
    if (!registry || !tool) return null;

    const previous = this.resolvedToolchains.get(language);
    if (previous && !registry.isAvailable(previous)) {
      this.logger.info(`Toolchain ${previous.displayName} was removed`);
      this.resolvedToolchains.delete(language);
    }

    try {
      const toolchain = registry.select({ tool });
      this.resolvedToolchains.set(language, toolchain);
      return toolchain;
    } catch (err) {
      if (err instanceof NoToolchainFoundError) {
        this.logger.debug(err.message);
        return null;
      }
      throw err;
    }
  }

  /** False once a toolchain handed out earlier disappeared in a re-scan. */
  isToolchainAvailable(toolchain: Toolchain): boolean {
    return this.toolchainRegistry?.isAvailable(toolchain) ?? false;
  }

  // --- Lifecycle ---

  /**
   * Swap the backend. Cancellable jobs are cancelled; the rest and all
   * in-flight queries finish against the old backend first. Subscribers
   * are notified once queries reach the new backend.
   */
  async reconfigure(buildSystem: BuildSystem | null): Promise<void> {
    if (this.closed) throw new ManagerClosedError();
    const previous = this.reconfiguring ?? Promise.resolve();
    const next = previous.then(() => this.swapBuildSystem(buildSystem));
    this.reconfiguring = next;
    try {
      await next;
    } finally {
      if (this.reconfiguring === next) {
        this.reconfiguring = null;
      }
    }
    await Promise.all([this.sourceFilesHandlers.emit(), this.capabilityHandlers.emit()]);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    this.debouncer.clear();
    for (const job of this.jobs) {
      job.cancel();
    }
    await Promise.all([...this.jobs].map((job) => job.outcome));

    this.detach();
    this.watched.clear();
    this.delivered.clear();
    this.cache.clear();
    this.targetsByDocument.clear();
    this.settingsHandlers.clear();
    this.sourceFilesHandlers.clear();
    this.capabilityHandlers.clear();
    if (this.ownsScheduler) {
      this.scheduler.cancelAll();
    }
  }

  // --- private ---

  private async activeBackend(): Promise<BuildSystem | null> {
    while (this.reconfiguring) {
      await this.reconfiguring.catch(() => undefined);
    }
    return this.closed ? null : this.buildSystem;
  }

  private attach(buildSystem: BuildSystem | null): void {
    this.buildSystem = buildSystem;
    if (!buildSystem) return;

    const delegate: AttachedDelegate = {
      active: true,
      fileBuildSettingsChanged: (documents) => {
        if (!delegate.active) return;
        for (const document of documents) {
          this.scheduleSettingsChange(document);
        }
      },
      buildTargetsChanged: () => {
        if (!delegate.active) return;
        this.debouncer.schedule(`${this.id}:build-targets`, this.config.sourceFilesDelayMs, () =>
          this.refreshConfiguredTargets(),
        );
      },
      fileHandlingCapabilityChanged: () => {
        if (!delegate.active) return;
        this.debouncer.schedule(`${this.id}:capability`, this.config.sourceFilesDelayMs, () =>
          this.capabilityHandlers.emit(),
        );
      },
      sourceFilesChanged: () => {
        if (!delegate.active) return;
        this.debouncer.schedule(`${this.id}:source-files`, this.config.sourceFilesDelayMs, () =>
          this.sourceFilesHandlers.emit(),
        );
      },
    };
    this.delegate = delegate;
    buildSystem.setDelegate(delegate);
  }

  private detach(): void {
    if (this.delegate) {
      this.delegate.active = false;
      this.delegate = null;
    }
    this.buildSystem?.setDelegate(null);
  }

  private async swapBuildSystem(buildSystem: BuildSystem | null): Promise<void> {
    this.logger.info(`Switching build system from ${this.kind ?? 'none'} to ${buildSystem?.kind ?? 'none'}`);

    for (const job of this.jobs) {
      job.cancel();
    }
    await Promise.all([...this.jobs].map((job) => job.outcome));
    await this.cache.settle();

    const old = this.buildSystem;
    for (const document of this.watched.keys()) {
      this.debouncer.cancel(settingsDebounceKey(document));
      try {
        await old?.unregisterForChangeNotifications(document);
      } catch (err) {
        this.logger.warn(`Failed to unregister from the previous build system: ${toError(err).message}`);
      }
    }
    this.detach();
    this.cache.clear();
    this.targetsByDocument.clear();

    this.attach(buildSystem);
    for (const document of this.watched.keys()) {
      this.scheduleSettingsChange(document);
      try {
        await buildSystem?.registerForChangeNotifications(document);
      } catch (err) {
        this.logger.error(`Failed to register for change notifications: ${toError(err).message}`);
      }
    }
  }

  private async runBuildGraphGeneration(): Promise<void> {
    const backend = await this.activeBackend();
    if (!backend) return;

    this.logger.info('Generating build graph');
    const handle = this.track(
      this.scheduler.schedule({
        description: 'generate build graph',
        priority: TaskPriority.high,
        cancellable: false,
        run: () => backend.generateBuildGraph(),
      }),
    );

    const outcome = await handle.outcome;
    if (outcome.status !== 'succeeded') {
      const error = new BuildGraphGenerationError(
        outcome.status === 'failed' ? outcome.error : undefined,
      );
      this.logger.error(error.message);
      throw error;
    }
    await this.refreshConfiguredTargets();
  }

  /** Re-query configured targets and re-notify documents whose target set changed. */
  private async refreshConfiguredTargets(): Promise<void> {
    const documents = new Set([...this.targetsByDocument.keys(), ...this.watched.keys()]);
    const changed: DocumentURI[] = [];

    for (const document of documents) {
      if (!this.watched.has(document)) {
        this.targetsByDocument.delete(document);
        this.cache.invalidate(document);
        continue;
      }
      const before = this.targetsByDocument.get(document);
      const after = await this.configuredTargets(document);
      if (!before || !configuredTargetsEqual(before, after)) {
        this.cache.invalidate(document);
        changed.push(document);
      }
    }

    if (changed.length > 0) {
      this.logger.debug(`Configured targets changed for ${changed.length} document(s)`);
    }
    await Promise.all(changed.map((d) => this.deliverSettingsChange(d)));
  }

  private scheduleSettingsChange(document: DocumentURI): void {
    this.debouncer.schedule(settingsDebounceKey(document), this.config.buildSettingsDelayMs, () => {
      this.cache.invalidate(document);
      if (!this.watched.has(document)) return;
      return this.deliverSettingsChange(document);
    });
  }

  /** Deliveries for one document run one after another, in scheduling order. */
  private deliverSettingsChange(document: DocumentURI): Promise<void> {
    const previous = this.deliveryChains.get(document) ?? Promise.resolve();
    const delivery: Promise<void> = previous
      .then(() => this.notifySettingsChanged(document))
      .finally(() => {
        if (this.deliveryChains.get(document) === delivery) {
          this.deliveryChains.delete(document);
        }
      });
    this.deliveryChains.set(document, delivery);
    return delivery;
  }

  private async notifySettingsChanged(document: DocumentURI): Promise<void> {
    const language = this.watched.get(document);
    if (language === undefined) return;

    const settings = await this.buildSettingsForDocument(document, language);
    if (!this.watched.has(document)) return;

    if (this.delivered.has(document) && fileBuildSettingsEqual(this.delivered.get(document) ?? null, settings)) {
      this.logger.debug('Build settings unchanged, notification suppressed');
      return;
    }
    this.delivered.set(document, settings);
    await this.settingsHandlers.emit([{ document, settings }]);
  }

  private async fallbackSettings(
    document: DocumentURI,
    language: Language,
  ): Promise<FileBuildSettings | null> {
    const fallback = this.fallbackBuildSystem;
    if (!fallback || this.closed) return null;
    try {
      const [target] = await fallback.configuredTargets(document);
      if (!target) return null;
      const settings = await fallback.buildSettings(document, target, language);
      return settings ? { ...settings, isFallback: true } : null;
    } catch (err) {
      this.logger.warn(`Fallback build settings failed: ${toError(err).message}`);
      return null;
    }
  }

  private async runPrepareProcess(
    command: readonly string[],
    options: { cwd?: string; env?: Record<string, string>; signal: AbortSignal },
    onProcessResult: ProcessResultCallback,
  ): Promise<IndexProcessResult> {
    const result = await this.processRunner(command, options);
    if (!indexProcessSucceeded(result) && !result.cancelled) {
      this.logger.warn(
        `Preparation process exited with ${result.exitCode ?? result.signal ?? 'unknown status'}`,
      );
    }
    try {
      onProcessResult(result);
    } catch (err) {
      this.logger.error(`Process result callback failed: ${toError(err).message}`);
    }
    return result;
  }

  private track<T>(handle: JobHandle<T>): JobHandle<T> {
    this.jobs.add(handle);
    void handle.outcome.then(() => {
      this.jobs.delete(handle);
    });
    return handle;
  }
}

function settingsDebounceKey(document: DocumentURI): string {
  return `settings:${document}`;
}
