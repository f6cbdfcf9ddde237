/**
 * Toolchain registry
 *
 * Discovers toolchains in the configured search locations, ranks them and
 * resolves the toolchain to use for a request. Re-scans are serialized and
 * keep the Toolchain objects of unchanged installations, so references handed
 * out earlier stay valid until the installation disappears.
 */

import { readdir, realpath } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { NoToolchainFoundError } from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import {
  compareVersions,
  loadToolchain,
  versionMatches,
  type Toolchain,
  type ToolKind,
} from './toolchain.js';

export const TOOLCHAINS_ENV_VAR = 'BUILDSENSE_TOOLCHAINS';

/**
 * `toolchain`: the location is an installation.
 * `container`: its subdirectories are installations.
 * `auto`: an installation if valid, otherwise a container.
 */
export type SearchLocationKind = 'toolchain' | 'container' | 'auto';

export interface SearchLocation {
  path: string;
  kind: SearchLocationKind;
}

export interface ToolchainRegistryOptions {
  searchPaths?: string[];
  /** Source of PATH and BUILDSENSE_TOOLCHAINS. Defaults to process.env */
  environment?: Record<string, string | undefined>;
  /** Include the platform's standard install directories */
  platformDefaults?: boolean;
  platform?: NodeJS.Platform;
  defaultIdentifier?: string | null;
  logger?: Logger;
}

export interface ToolchainRequest {
  tool: ToolKind;
  /** Version prefix, e.g. `17` or `17.0` */
  version?: string;
}

export interface ScanSummary {
  added: string[];
  removed: string[];
  total: number;
}

export function platformSearchLocations(platform: NodeJS.Platform): SearchLocation[] {
  switch (platform) {
    case 'darwin':
      return [
        { path: path.join(os.homedir(), 'Library', 'Developer', 'Toolchains'), kind: 'container' },
        { path: '/Library/Developer/Toolchains', kind: 'container' },
        { path: '/usr/local', kind: 'toolchain' },
        { path: '/usr', kind: 'toolchain' },
      ];
    case 'win32':
      return [{ path: 'C:\\Program Files\\LLVM', kind: 'toolchain' }];
    default:
      return [
        { path: '/usr/local', kind: 'toolchain' },
        { path: '/usr', kind: 'toolchain' },
        { path: '/opt', kind: 'container' },
      ];
  }
}

export class ToolchainRegistry {
  private readonly searchPaths: string[];
  private readonly environment: Record<string, string | undefined>;
  private readonly platformDefaults: boolean;
  private readonly platform: NodeJS.Platform;
  private readonly logger: Logger;
  private readonly defaultIdentifier: string | null;
  private byIdentifier = new Map<string, Toolchain>();
  private byPath = new Map<string, Toolchain>();
  private scanChain: Promise<unknown> = Promise.resolve();

  constructor(options: ToolchainRegistryOptions = {}) {
    this.searchPaths = options.searchPaths ?? [];
    this.environment = options.environment ?? process.env;
    this.platformDefaults = options.platformDefaults ?? true;
    this.platform = options.platform ?? process.platform;
    this.defaultIdentifier = options.defaultIdentifier ?? null;
    this.logger = options.logger ?? createLogger('ToolchainRegistry');
  }

  /** Search locations in priority order */
  searchLocations(): SearchLocation[] {
    const locations: SearchLocation[] = this.searchPaths.map((p) => ({ path: p, kind: 'auto' }));

    const fromEnv = this.environment[TOOLCHAINS_ENV_VAR];
    if (fromEnv) {
      for (const p of fromEnv.split(path.delimiter).filter(Boolean)) {
        locations.push({ path: p, kind: 'auto' });
      }
    }

    const envPath = this.environment['PATH'];
    if (envPath) {
      for (const p of envPath.split(path.delimiter).filter(Boolean)) {
        if (path.basename(p) === 'bin') {
          locations.push({ path: path.dirname(p), kind: 'toolchain' });
        }
      }
    }

    if (this.platformDefaults) {
      locations.push(...platformSearchLocations(this.platform));
    }
    return locations;
  }

  /**
   * Discover toolchains again. Newly found installations are merged in,
   * vanished ones are dropped.
   */
  scan(): Promise<ScanSummary> {
    const next = this.scanChain.then(() => this.scanOnce());
    this.scanChain = next.catch(() => undefined);
    return next;
  }

  /** Known toolchains, newest version first, then by path */
  get toolchains(): Toolchain[] {
    return [...this.byIdentifier.values()].sort(
      (a, b) => compareVersions(b.version, a.version) || a.path.localeCompare(b.path),
    );
  }

  find(identifier: string): Toolchain | null {
    return this.byIdentifier.get(identifier) ?? null;
  }

  require(identifier: string): Toolchain {
    const toolchain = this.find(identifier);
    if (!toolchain) {
      throw new NoToolchainFoundError(`identifier '${identifier}'`);
    }
    return toolchain;
  }

  findByPath(dir: string): Toolchain | null {
    return this.byPath.get(path.resolve(dir)) ?? null;
  }

  /** The configured default toolchain, when it is currently installed */
  get default(): Toolchain | null {
    return this.defaultIdentifier ? this.find(this.defaultIdentifier) : null;
  }

  /**
   * Resolve a toolchain: the configured default when it satisfies the request,
   * otherwise the newest toolchain providing the tool.
   */
  select(request: ToolchainRequest): Toolchain {
    const satisfies = (toolchain: Toolchain): boolean =>
      toolchain.hasTool(request.tool) &&
      (request.version === undefined || versionMatches(toolchain.version, request.version));

    const preferred = this.default;
    if (preferred && satisfies(preferred)) {
      return preferred;
    }

    const match = this.toolchains.find(satisfies);
    if (!match) {
      const version = request.version !== undefined ? ` version ${request.version}` : '';
      throw new NoToolchainFoundError(`tool '${request.tool}'${version}`);
    }
    return match;
  }

  /** False once a re-scan no longer finds the installation behind `toolchain`. */
  isAvailable(toolchain: Toolchain): boolean {
    return this.byIdentifier.get(toolchain.identifier) === toolchain;
  }

  // --- private ---

  private async scanOnce(): Promise<ScanSummary> {
    const discovered = new Map<string, Toolchain>();
    const seenRoots = new Set<string>();

    for (const location of this.searchLocations()) {
      for (const candidate of await this.expandLocation(location)) {
        const root = await canonicalPath(candidate);
        if (seenRoots.has(root)) continue;
        seenRoots.add(root);

        const result = await loadToolchain(root, this.platform);
        if (result.status === 'skipped') {
          this.logger.debug(`Skipping ${root}: ${result.reason}`);
          continue;
        }

        const toolchain = result.toolchain;
        if (discovered.has(toolchain.identifier)) {
          this.logger.debug(
            `Ignoring ${root}: identifier ${toolchain.identifier} already provided by an earlier location`,
          );
          continue;
        }
        discovered.set(toolchain.identifier, toolchain);
      }
    }

    const previous = this.byIdentifier;
    const added: string[] = [];
    const merged = new Map<string, Toolchain>();

    for (const [identifier, toolchain] of discovered) {
      const existing = previous.get(identifier);
      if (existing && existing.sameInstallation(toolchain)) {
        merged.set(identifier, existing);
      } else {
        merged.set(identifier, toolchain);
        added.push(identifier);
      }
    }
    const removed = [...previous.keys()].filter((id) => merged.get(id) !== previous.get(id));

    this.byIdentifier = merged;
    this.byPath = new Map([...merged.values()].map((t) => [t.path, t]));

    if (added.length > 0 || removed.length > 0) {
      this.logger.info(
        `Toolchains updated: ${added.length} added, ${removed.length} removed, ${merged.size} total`,
      );
    }
    return { added, removed, total: merged.size };
  }

  private async expandLocation(location: SearchLocation): Promise<string[]> {
    if (location.kind === 'toolchain') {
      return [location.path];
    }

    const children = await listSubdirectories(location.path);
    if (location.kind === 'container') {
      return children;
    }

    const self = await loadToolchain(location.path, this.platform);
    return self.status === 'loaded' ? [location.path] : children;
  }
}

async function listSubdirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() || entry.isSymbolicLink())
      .map((entry) => path.join(dir, entry.name))
      .sort();
  } catch {
    return [];
  }
}

async function canonicalPath(dir: string): Promise<string> {
  try {
    return await realpath(dir);
  } catch {
    return path.resolve(dir);
  }
}
