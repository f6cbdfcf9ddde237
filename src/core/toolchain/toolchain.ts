/**
 * A compiler / language-service installation on the host.
 */

import { access, stat } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import * as path from 'node:path';
import type { Language } from '../../shared/types.js';
import { readToolchainInfo } from './toolchain-info.js';

export type ToolKind = 'clang' | 'clangxx' | 'clangd' | 'indexStore';

export const TOOL_KINDS: readonly ToolKind[] = ['clang', 'clangxx', 'clangd', 'indexStore'];

const EXECUTABLE_NAMES: ReadonlyArray<readonly [ToolKind, string]> = [
  ['clang', 'clang'],
  ['clangxx', 'clang++'],
  ['clangd', 'clangd'],
];

const INDEX_STORE_LIBRARIES = ['libIndexStore.so', 'libIndexStore.dylib', 'IndexStore.dll'];

export interface ToolchainProperties {
  identifier: string;
  displayName: string;
  path: string;
  version: string | null;
  tools: Partial<Record<ToolKind, string>>;
}

export class Toolchain {
  readonly identifier: string;
  readonly displayName: string;
  readonly path: string;
  readonly version: string | null;
  readonly tools: Readonly<Partial<Record<ToolKind, string>>>;

  constructor(properties: ToolchainProperties) {
    this.identifier = properties.identifier;
    this.displayName = properties.displayName;
    this.path = properties.path;
    this.version = properties.version;
    this.tools = Object.freeze({ ...properties.tools });
  }

  hasTool(kind: ToolKind): boolean {
    return this.tools[kind] !== undefined;
  }

  sameInstallation(other: Toolchain): boolean {
    return (
      this.identifier === other.identifier &&
      this.path === other.path &&
      this.version === other.version &&
      TOOL_KINDS.every((kind) => this.tools[kind] === other.tools[kind])
    );
  }

  toJSON(): ToolchainProperties {
    return {
      identifier: this.identifier,
      displayName: this.displayName,
      path: this.path,
      version: this.version,
      tools: { ...this.tools },
    };
  }
}

export type ToolchainLoadResult =
  | { status: 'loaded'; toolchain: Toolchain }
  | { status: 'skipped'; reason: string };

/**
 * Build a Toolchain from an installation directory. A directory counts as a
 * toolchain when it provides at least one known tool.
 */
export async function loadToolchain(
  dir: string,
  platform: NodeJS.Platform = process.platform,
): Promise<ToolchainLoadResult> {
  const root = path.resolve(dir);

  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      return { status: 'skipped', reason: `${root} is not a directory` };
    }
  } catch {
    return { status: 'skipped', reason: `${root} is not readable` };
  }

  const tools = await findTools(root, platform);
  if (Object.keys(tools).length === 0) {
    return { status: 'skipped', reason: `${root} provides no known tools` };
  }

  const manifest = await readToolchainInfo(root);
  if (manifest.status === 'invalid') {
    return { status: 'skipped', reason: manifest.message };
  }
  const info = manifest.status === 'valid' ? manifest.info : {};

  return {
    status: 'loaded',
    toolchain: new Toolchain({
      identifier: info.identifier ?? path.basename(root),
      displayName: info.display_name ?? defaultDisplayName(root),
      path: root,
      version: info.version ?? versionFromDirectoryName(path.basename(root)),
      tools,
    }),
  };
}

async function findTools(
  root: string,
  platform: NodeJS.Platform,
): Promise<Partial<Record<ToolKind, string>>> {
  const tools: Partial<Record<ToolKind, string>> = {};
  const binDirs = [path.join(root, 'bin'), path.join(root, 'usr', 'bin')];
  const libDirs = [path.join(root, 'lib'), path.join(root, 'usr', 'lib')];
  const suffix = platform === 'win32' ? '.exe' : '';

  for (const [kind, name] of EXECUTABLE_NAMES) {
    for (const dir of binDirs) {
      const candidate = path.join(dir, name + suffix);
      if (await isExecutable(candidate, platform)) {
        tools[kind] = candidate;
        break;
      }
    }
  }

  outer: for (const dir of libDirs) {
    for (const name of INDEX_STORE_LIBRARIES) {
      const candidate = path.join(dir, name);
      if (await isFile(candidate)) {
        tools.indexStore = candidate;
        break outer;
      }
    }
  }

  return tools;
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

async function isExecutable(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
  if (!(await isFile(candidate))) return false;
  if (platform === 'win32') return true;
  try {
    await access(candidate, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function defaultDisplayName(root: string): string {
  const base = path.basename(root);
  if (base === 'usr') {
    return path.basename(path.dirname(root)) || root;
  }
  return base || root;
}

/** `llvm-17.0.6` → `17.0.6`, `clang_18` → `18`, `usr` → null */
export function versionFromDirectoryName(name: string): string | null {
  const match = /[-_](\d+(?:\.\d+)*)$/.exec(name);
  return match?.[1] ?? null;
}

/** Numeric, segment-wise comparison. A missing version compares lowest. */
export function compareVersions(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  const pa = a.split('.').map((s) => Number.parseInt(s, 10) || 0);
  const pb = b.split('.').map((s) => Number.parseInt(s, 10) || 0);
  const length = Math.max(pa.length, pb.length);
  for (let i = 0; i < length; i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/** `17` matches `17.0.6` but not `170.1`. */
export function versionMatches(version: string | null, requested: string): boolean {
  if (version === null) return false;
  return version === requested || version.startsWith(requested + '.');
}

export function toolForLanguage(language: Language): ToolKind | null {
  switch (language) {
    case 'c':
    case 'objective-c':
      return 'clang';
    case 'cpp':
    case 'objective-cpp':
      return 'clangxx';
    default:
      return null;
  }
}
