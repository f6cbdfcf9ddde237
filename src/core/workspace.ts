/**
 * Workspace - Core Layer facade
 *
 * The CLI accesses all functionality through this facade only. Wires the
 * configuration into the toolchain registry, the task scheduler, the build
 * system manager and the file watcher.
 */

import * as path from 'node:path';
import type { BuildSenseConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import { configExists, loadConfig, resolveConfigPath, saveConfig } from '../config/config.js';
import { BuildSenseError } from '../shared/errors.js';
import { configureLogger, createLogger, closeLogger, type Logger } from '../shared/logger.js';
import { pathToUri } from '../shared/path-utils.js';
import type { FileBuildSettings, Language } from '../shared/types.js';
import { FallbackBuildSystem } from './fallback/fallback-build-system.js';
import type { BuildSystem } from './manager/build-system.js';
import { BuildSystemManager, type BuildSettingsChange } from './manager/build-system-manager.js';
import type { Subscription } from './manager/handler-registry.js';
import { TaskScheduler } from './scheduler/task-scheduler.js';
import { ToolchainRegistry } from './toolchain/toolchain-registry.js';
import type { Toolchain } from './toolchain/toolchain.js';
import { FileWatcher } from './watcher/file-watcher.js';

export interface WorkspaceOptions {
  /** Primary backend. Without one the fallback backend is the active one. */
  buildSystem?: BuildSystem | null;
  /** Skips reading .buildsense/config.json */
  config?: BuildSenseConfig;
  /** Source of PATH and BUILDSENSE_TOOLCHAINS */
  environment?: Record<string, string | undefined>;
  /** Leave the global logger configuration alone */
  configureLogging?: boolean;
}

export interface FileSettingsResult {
  file: string;
  language: Language | null;
  settings: FileBuildSettings | null;
  toolchain: Toolchain | null;
}

export class Workspace {
  private fileWatcher: FileWatcher | null = null;
  private readonly logger: Logger;

  constructor(
    readonly cwd: string,
    readonly config: BuildSenseConfig,
    readonly toolchainRegistry: ToolchainRegistry,
    readonly scheduler: TaskScheduler,
    readonly manager: BuildSystemManager,
  ) {
    this.logger = createLogger('Workspace');
  }

  get toolchains(): Toolchain[] {
    return this.toolchainRegistry.toolchains;
  }

  /**
   * Build settings for a file path, relative to the workspace root.
   * `language` defaults to the backend's guess or the file extension.
   */
  async settingsForFile(file: string, language?: Language): Promise<FileSettingsResult> {
    const absolutePath = path.resolve(this.cwd, file);
    const uri = pathToUri(absolutePath);
    const resolvedLanguage = language ?? (await this.manager.defaultLanguage(uri));
    if (!resolvedLanguage) {
      return { file: absolutePath, language: null, settings: null, toolchain: null };
    }

    return {
      file: absolutePath,
      language: resolvedLanguage,
      settings: await this.manager.buildSettingsForDocument(uri, resolvedLanguage),
      toolchain: this.manager.toolchain(resolvedLanguage),
    };
  }

  onBuildSettingsChanged(
    handler: (changes: BuildSettingsChange[]) => void | Promise<void>,
  ): Subscription {
    return this.manager.onBuildSettingsChanged(handler);
  }

  // --- Watching ---

  startWatching(): void {
    if (this.fileWatcher) return;
    this.fileWatcher = new FileWatcher({
      root: this.cwd,
      exclude: this.config.watcher.exclude,
      onFileEvents: (events) => this.manager.filesDidChange(events),
    });
    this.fileWatcher.start();
    this.logger.info(`Watching ${this.cwd}`);
  }

  async stopWatching(): Promise<void> {
    if (this.fileWatcher) {
      await this.fileWatcher.stop();
      this.fileWatcher = null;
    }
  }

  get isWatching(): boolean {
    return this.fileWatcher !== null;
  }

  async close(): Promise<void> {
    await this.stopWatching();
    await this.manager.close();
    this.scheduler.cancelAll();
    closeLogger();
  }
}

/**
 * Load the configuration of `cwd` (defaults when there is none), scan for
 * toolchains and construct the manager.
 */
export async function createWorkspace(cwd: string, options: WorkspaceOptions = {}): Promise<Workspace> {
  const root = path.resolve(cwd);
  const config = options.config ?? (configExists(root) ? loadConfig(root) : DEFAULT_CONFIG);

  if (options.configureLogging ?? true) {
    configureLogger({
      level: config.log.level,
      file: config.log.file ? path.resolve(root, config.log.file) : null,
    });
  }

  const registry = new ToolchainRegistry({
    searchPaths: config.toolchains.search_paths.map((p) => path.resolve(root, p)),
    environment: options.environment,
    platformDefaults: config.toolchains.platform_defaults,
    defaultIdentifier: config.toolchains.default,
  });
  await registry.scan();

  const scheduler = new TaskScheduler({ maxConcurrentJobs: config.scheduler.max_concurrent_jobs });
  const fallback = new FallbackBuildSystem({
    projectRoot: root,
    cFlags: config.fallback.c_flags,
    cxxFlags: config.fallback.cxx_flags,
  });
  const manager = new BuildSystemManager({
    buildSystem: options.buildSystem ?? fallback,
    fallbackBuildSystem: fallback,
    toolchainRegistry: registry,
    scheduler,
    config: {
      buildSettingsDelayMs: config.debounce.build_settings_ms,
      sourceFilesDelayMs: config.debounce.source_files_ms,
    },
  });

  return new Workspace(root, config, registry, scheduler, manager);
}

/**
 * Write the default configuration. Fails when one exists unless `force`.
 */
export function initWorkspace(cwd: string, options: { force?: boolean } = {}): string {
  const root = path.resolve(cwd);
  const configPath = resolveConfigPath(root);
  if (configExists(root) && !options.force) {
    throw new BuildSenseError(
      `Configuration already exists: ${configPath}. Use --force to overwrite.`,
      'ALREADY_INITIALIZED',
    );
  }
  saveConfig(root, DEFAULT_CONFIG);
  return configPath;
}
