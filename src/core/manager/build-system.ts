/**
 * Backend contract
 *
 * A BuildSystem answers build-settings queries for one project. Concrete
 * backends (package build graph, compilation database, build server, fallback)
 * implement this interface; the BuildSystemManager is the only caller.
 */

import type {
  ConfiguredTarget,
  DocumentURI,
  FileBuildSettings,
  FileEvent,
  FileHandlingCapability,
  IndexProcessResult,
  Language,
  PathPrefixMapping,
  SourceFileInfo,
} from '../../shared/types.js';
import type { RunIndexProcessOptions } from '../scheduler/index-process.js';

export type BuildSystemKind = 'package' | 'compilation-database' | 'build-server' | 'fallback';

/** Supplied by a backend when it is constructed. */
export interface BuildSystemProperties {
  /** e.g. the directory holding the package manifest or compile_commands.json */
  projectRoot: string;
  indexStorePath: string | null;
  indexDatabasePath: string | null;
  indexPrefixMappings: PathPrefixMapping[];
}

/**
 * Events a backend reports. The backend must not assume anything about the
 * object behind this interface and must drop it on `setDelegate(null)`.
 */
export interface BuildSystemDelegate {
  fileBuildSettingsChanged(documents: DocumentURI[]): void;
  /** The target graph changed; every document's settings may be affected. */
  buildTargetsChanged(): void;
  fileHandlingCapabilityChanged(): void;
  sourceFilesChanged(): void;
}

/** Handed to `prepare`. Every process spawned through it is reported. */
export interface PrepareContext {
  readonly signal: AbortSignal;
  runProcess(
    command: readonly string[],
    options?: Omit<RunIndexProcessOptions, 'signal'>,
  ): Promise<IndexProcessResult>;
}

export interface BuildSystem {
  readonly kind: BuildSystemKind;
  readonly properties: BuildSystemProperties;

  setDelegate(delegate: BuildSystemDelegate | null): void;

  /** null when the backend has no settings for the file (yet). */
  buildSettings(
    document: DocumentURI,
    target: ConfiguredTarget,
    language: Language,
  ): Promise<FileBuildSettings | null>;

  configuredTargets(document: DocumentURI): Promise<ConfiguredTarget[]>;

  /** Resolve packages and rebuild the target graph. */
  generateBuildGraph(): Promise<void>;

  /** Low-level targets first; null when unsupported. */
  topologicalSort(targets: ConfiguredTarget[]): Promise<ConfiguredTarget[] | null>;

  /** Targets that may need re-preparation; null means "all of them". */
  targets(dependingOn: ConfiguredTarget[]): Promise<ConfiguredTarget[] | null>;

  /**
   * Build the dependencies of `targets` far enough for semantic analysis.
   * Absent, or throwing PrepareNotSupportedError, when unsupported.
   */
  prepare?(targets: ConfiguredTarget[], context: PrepareContext): Promise<void>;

  defaultLanguage?(document: DocumentURI): Promise<Language | null>;

  /**
   * Start reporting changes for `document`. The backend should report its
   * initial settings through `fileBuildSettingsChanged`, even if it has none.
   */
  registerForChangeNotifications(document: DocumentURI): Promise<void>;
  unregisterForChangeNotifications(document: DocumentURI): Promise<void>;

  filesDidChange(events: FileEvent[]): Promise<void>;

  fileHandlingCapability(uri: DocumentURI): Promise<FileHandlingCapability>;

  /** Compilable source files; headers are not included. */
  sourceFiles(): Promise<SourceFileInfo[]>;
}
