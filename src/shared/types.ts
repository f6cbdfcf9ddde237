/**
 * Shared value types
 * Used by the manager, the scheduler and every backend adapter.
 */

import { hashForLogging } from './hash.js';

// --- Documents ---

/** A `file://` URI identifying a source document. */
export type DocumentURI = string;

/** LSP language identifier. */
export type Language =
  | 'c'
  | 'cpp'
  | 'objective-c'
  | 'objective-cpp'
  | (string & {});

export type FileEventType = 'created' | 'changed' | 'deleted';

export interface FileEvent {
  uri: DocumentURI;
  type: FileEventType;
}

// --- Configured targets ---

/**
 * A target / run destination combination, e.g. `MyLibrary` built for one
 * platform. Both IDs are opaque and only interpreted by the backend that
 * produced them.
 */
export interface ConfiguredTarget {
  readonly targetID: string;
  readonly runDestinationID: string;
}

export function configuredTargetKey(target: ConfiguredTarget): string {
  return `${target.targetID}\u0000${target.runDestinationID}`;
}

export function configuredTargetsEqual(
  a: readonly ConfiguredTarget[],
  b: readonly ConfiguredTarget[],
): boolean {
  if (a.length !== b.length) return false;
  const keys = new Set(a.map(configuredTargetKey));
  return b.every((t) => keys.has(configuredTargetKey(t)));
}

export function describeConfiguredTarget(target: ConfiguredTarget): string {
  return `${target.targetID}-${target.runDestinationID}`;
}

export function redactConfiguredTarget(target: ConfiguredTarget): string {
  return `${hashForLogging(target.targetID)}-${hashForLogging(target.runDestinationID)}`;
}

// --- Build settings ---

export interface FileBuildSettings {
  readonly compilerArguments: readonly string[];
  readonly workingDirectory: string | null;
  readonly language: Language;
  /** True when the settings were inferred rather than reported by the build system. */
  readonly isFallback: boolean;
}

export function fileBuildSettingsEqual(
  a: FileBuildSettings | null,
  b: FileBuildSettings | null,
): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return (
    a.workingDirectory === b.workingDirectory &&
    a.language === b.language &&
    a.isFallback === b.isFallback &&
    a.compilerArguments.length === b.compilerArguments.length &&
    a.compilerArguments.every((arg, i) => arg === b.compilerArguments[i])
  );
}

// --- Source files ---

export interface SourceFileInfo {
  uri: DocumentURI;
  /** False when the file belongs to a dependency of the project. */
  isPartOfRootProject: boolean;
  /**
   * Over-approximation: may be true for files without tests, must never be
   * false for a file that has them.
   */
  mayContainTests: boolean;
}

// --- File handling capability ---

export type FileHandlingCapability = 'unhandled' | 'fallback' | 'handled';

const CAPABILITY_RANK: Record<FileHandlingCapability, number> = {
  unhandled: 0,
  fallback: 1,
  handled: 2,
};

export function compareFileHandlingCapability(
  a: FileHandlingCapability,
  b: FileHandlingCapability,
): number {
  return CAPABILITY_RANK[a] - CAPABILITY_RANK[b];
}

export function bestFileHandlingCapability(
  capabilities: Iterable<FileHandlingCapability>,
): FileHandlingCapability {
  let best: FileHandlingCapability = 'unhandled';
  for (const capability of capabilities) {
    if (compareFileHandlingCapability(capability, best) > 0) {
      best = capability;
    }
  }
  return best;
}

// --- Index processes ---

export interface IndexProcessResult {
  readonly command: readonly string[];
  /** null when the process was terminated by a signal or never started. */
  readonly exitCode: number | null;
  readonly signal: string | null;
  /** Combined stdout and stderr. */
  readonly output: string;
  readonly startedAt: Date;
  readonly durationMs: number;
  readonly cancelled: boolean;
}

export function indexProcessSucceeded(result: IndexProcessResult): boolean {
  return !result.cancelled && result.exitCode === 0;
}

// --- Path remapping ---

export interface PathPrefixMapping {
  /** Prefix as recorded on the machine that produced the index data. */
  original: string;
  /** Local prefix to substitute. */
  replacement: string;
}
