/**
 * Version utility - reads version from package.json
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const PACKAGE_NAME = 'buildsense';

let cachedVersion: string | null = null;

/**
 * Walk up from this file to the nearest package.json of this package;
 * the depth differs between src/ and dist/ layouts.
 */
function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (isPackageJson(pkg) && pkg.name === PACKAGE_NAME) {
        return candidate;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function isPackageJson(value: unknown): value is { name?: unknown; version?: unknown } {
  return typeof value === 'object' && value !== null;
}

export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  try {
    const pkgPath = findPackageJson(dirname(fileURLToPath(import.meta.url)));
    if (!pkgPath) return '0.0.0';
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    cachedVersion = isPackageJson(pkg) && typeof pkg.version === 'string' ? pkg.version : '0.0.0';
    return cachedVersion;
  } catch {
    return '0.0.0';
  }
}
