/**
 * Shared test helpers for manager tests
 */

import type {
  BuildSystem,
  BuildSystemDelegate,
  BuildSystemKind,
  BuildSystemProperties,
  PrepareContext,
} from './manager/build-system.js';
import type {
  ConfiguredTarget,
  DocumentURI,
  FileBuildSettings,
  FileEvent,
  FileHandlingCapability,
  IndexProcessResult,
  Language,
  SourceFileInfo,
} from '../shared/types.js';
import type { Logger } from '../shared/logger.js';

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/** Logger that keeps `level message` lines for assertions. */
export function recordingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const record =
    (level: string) =>
    (message: string): void => {
      lines.push(`${level} ${message}`);
    };
  return {
    lines,
    logger: { debug: record('debug'), info: record('info'), warn: record('warn'), error: record('error') },
  };
}

export const TEST_TARGET: ConfiguredTarget = { targetID: 'app', runDestinationID: 'host' };

export function fileSettings(
  compilerArguments: string[],
  workingDirectory: string | null = '/proj',
  language: Language = 'c',
): FileBuildSettings {
  return { compilerArguments, workingDirectory, language, isFallback: false };
}

export function processResult(command: string[], exitCode = 0): IndexProcessResult {
  return {
    command,
    exitCode,
    signal: null,
    output: '',
    startedAt: new Date(0),
    durationMs: 1,
    cancelled: false,
  };
}

/** Resolves once every pending microtask has run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface FakeBuildSystemOptions {
  kind?: BuildSystemKind;
  properties?: Partial<BuildSystemProperties>;
  prepare?: (targets: ConfiguredTarget[], context: PrepareContext) => Promise<void>;
  /** Report current settings from `registerForChangeNotifications` */
  reportOnRegister?: boolean;
}

/**
 * In-memory backend. Tests mutate its maps and call `update` to emulate a
 * backend noticing a change.
 */
export class FakeBuildSystem implements BuildSystem {
  readonly kind: BuildSystemKind;
  readonly properties: BuildSystemProperties;
  prepare?: (targets: ConfiguredTarget[], context: PrepareContext) => Promise<void>;

  delegate: BuildSystemDelegate | null = null;
  readonly settings = new Map<DocumentURI, FileBuildSettings>();
  readonly targetsByDocument = new Map<DocumentURI, ConfiguredTarget[]>();
  readonly registered = new Set<DocumentURI>();
  readonly fileEvents: FileEvent[][] = [];
  sources: SourceFileInfo[] = [];
  sortResult: ConfiguredTarget[] | null = null;
  dependentsResult: ConfiguredTarget[] | null = null;
  capability: FileHandlingCapability = 'handled';

  buildSettingsCalls = 0;
  generateBuildGraphCalls = 0;
  /** While set, settings queries wait for it */
  queryGate: Promise<void> | null = null;
  queryError: Error | null = null;
  graphGate: Promise<void> | null = null;
  graphError: Error | null = null;

  private readonly reportOnRegister: boolean;

  constructor(options: FakeBuildSystemOptions = {}) {
    this.kind = options.kind ?? 'compilation-database';
    this.properties = {
      projectRoot: '/proj',
      indexStorePath: null,
      indexDatabasePath: null,
      indexPrefixMappings: [],
      ...options.properties,
    };
    if (options.prepare) {
      this.prepare = options.prepare;
    }
    this.reportOnRegister = options.reportOnRegister ?? false;
  }

  /** Change (or clear) the settings of `document` and report it. */
  update(document: DocumentURI, settings: FileBuildSettings | null): void {
    if (settings) {
      this.settings.set(document, settings);
    } else {
      this.settings.delete(document);
    }
    this.delegate?.fileBuildSettingsChanged([document]);
  }

  setDelegate(delegate: BuildSystemDelegate | null): void {
    this.delegate = delegate;
  }

  async buildSettings(
    document: DocumentURI,
    _target: ConfiguredTarget,
    _language: Language,
  ): Promise<FileBuildSettings | null> {
    this.buildSettingsCalls++;
    if (this.queryGate) await this.queryGate;
    if (this.queryError) throw this.queryError;
    return this.settings.get(document) ?? null;
  }

  async configuredTargets(document: DocumentURI): Promise<ConfiguredTarget[]> {
    return this.targetsByDocument.get(document) ?? [TEST_TARGET];
  }

  async generateBuildGraph(): Promise<void> {
    this.generateBuildGraphCalls++;
    if (this.graphGate) await this.graphGate;
    if (this.graphError) throw this.graphError;
  }

  async topologicalSort(_targets: ConfiguredTarget[]): Promise<ConfiguredTarget[] | null> {
    return this.sortResult;
  }

  async targets(_dependingOn: ConfiguredTarget[]): Promise<ConfiguredTarget[] | null> {
    return this.dependentsResult;
  }

  async registerForChangeNotifications(document: DocumentURI): Promise<void> {
    this.registered.add(document);
    if (this.reportOnRegister) {
      this.delegate?.fileBuildSettingsChanged([document]);
    }
  }

  async unregisterForChangeNotifications(document: DocumentURI): Promise<void> {
    this.registered.delete(document);
  }

  async filesDidChange(events: FileEvent[]): Promise<void> {
    this.fileEvents.push(events);
  }

  async fileHandlingCapability(_uri: DocumentURI): Promise<FileHandlingCapability> {
    return this.capability;
  }

  async sourceFiles(): Promise<SourceFileInfo[]> {
    return this.sources;
  }
}
