/**
 * Fallback backend
 *
 * Infers settings for C-family files that no real build system knows about:
 * the configured flags for the language followed by the file itself.
 */

import * as path from 'node:path';
import type {
  BuildSystem,
  BuildSystemDelegate,
  BuildSystemProperties,
} from '../manager/build-system.js';
import { isCFamilyLanguage, languageForPath, uriToPath } from '../../shared/path-utils.js';
import type {
  ConfiguredTarget,
  DocumentURI,
  FileBuildSettings,
  FileHandlingCapability,
  Language,
  SourceFileInfo,
} from '../../shared/types.js';

export const FALLBACK_TARGET: ConfiguredTarget = {
  targetID: 'fallback',
  runDestinationID: 'local',
};

export interface FallbackBuildSystemOptions {
  projectRoot: string;
  /** Flags for C and Objective-C */
  cFlags?: string[];
  /** Flags for C++ and Objective-C++ */
  cxxFlags?: string[];
}

export class FallbackBuildSystem implements BuildSystem {
  readonly kind = 'fallback';
  readonly properties: BuildSystemProperties;
  private readonly cFlags: readonly string[];
  private readonly cxxFlags: readonly string[];
  private delegate: BuildSystemDelegate | null = null;

  constructor(options: FallbackBuildSystemOptions) {
    this.properties = {
      projectRoot: options.projectRoot,
      indexStorePath: null,
      indexDatabasePath: null,
      indexPrefixMappings: [],
    };
    this.cFlags = options.cFlags ?? [];
    this.cxxFlags = options.cxxFlags ?? [];
  }

  setDelegate(delegate: BuildSystemDelegate | null): void {
    this.delegate = delegate;
  }

  async buildSettings(
    document: DocumentURI,
    _target: ConfiguredTarget,
    language: Language,
  ): Promise<FileBuildSettings | null> {
    const filepath = uriToPath(document);
    if (!filepath || !isCFamilyLanguage(language)) return null;

    const flags = language === 'cpp' || language === 'objective-cpp' ? this.cxxFlags : this.cFlags;
    return {
      compilerArguments: [...flags, filepath],
      workingDirectory: path.dirname(filepath),
      language,
      isFallback: true,
    };
  }

  async configuredTargets(document: DocumentURI): Promise<ConfiguredTarget[]> {
    return uriToPath(document) ? [FALLBACK_TARGET] : [];
  }

  async generateBuildGraph(): Promise<void> {}

  async topologicalSort(_targets: ConfiguredTarget[]): Promise<ConfiguredTarget[] | null> {
    return null;
  }

  async targets(_dependingOn: ConfiguredTarget[]): Promise<ConfiguredTarget[] | null> {
    return null;
  }

  async defaultLanguage(document: DocumentURI): Promise<Language | null> {
    const filepath = uriToPath(document);
    return filepath ? languageForPath(filepath) : null;
  }

  // Settings never change, so the initial report is the only one.
  async registerForChangeNotifications(document: DocumentURI): Promise<void> {
    this.delegate?.fileBuildSettingsChanged([document]);
  }

  async unregisterForChangeNotifications(_document: DocumentURI): Promise<void> {}

  async filesDidChange(): Promise<void> {}

  async fileHandlingCapability(uri: DocumentURI): Promise<FileHandlingCapability> {
    const filepath = uriToPath(uri);
    const language = filepath ? languageForPath(filepath) : null;
    return language && isCFamilyLanguage(language) ? 'fallback' : 'unhandled';
  }

  async sourceFiles(): Promise<SourceFileInfo[]> {
    return [];
  }
}
