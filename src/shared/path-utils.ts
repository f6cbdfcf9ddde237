/**
 * Path, URI and prefix-mapping utilities
 */

import * as path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import type { DocumentURI, Language, PathPrefixMapping } from './types.js';

/**
 * Convert a document URI to a filesystem path.
 * Returns null for non-file URIs.
 */
export function uriToPath(uri: DocumentURI): string | null {
  if (!uri.startsWith('file:')) return null;
  try {
    return fileURLToPath(uri);
  } catch {
    return null;
  }
}

export function pathToUri(filepath: string): DocumentURI {
  return pathToFileURL(path.resolve(filepath)).href;
}

/**
 * Normalize a filepath to use forward slashes (POSIX-style).
 */
export function normalizeToPosix(filepath: string): string {
  return filepath.split(path.sep).join('/');
}

/**
 * Rewrite a path recorded on another machine with the first matching prefix
 * mapping. A prefix only matches on a path-segment boundary.
 */
export function remapPath(
  filepath: string,
  mappings: readonly PathPrefixMapping[],
): string {
  for (const mapping of mappings) {
    const original = mapping.original.replace(/\/+$/, '');
    if (filepath === original) {
      return mapping.replacement;
    }
    if (filepath.startsWith(original + '/')) {
      return mapping.replacement.replace(/\/+$/, '') + filepath.slice(original.length);
    }
  }
  return filepath;
}

const LANGUAGE_BY_EXTENSION: Record<string, Language> = {
  '.c': 'c',
  '.h': 'c',
  '.cc': 'cpp',
  '.cpp': 'cpp',
  '.cxx': 'cpp',
  '.c++': 'cpp',
  '.hh': 'cpp',
  '.hpp': 'cpp',
  '.hxx': 'cpp',
  '.m': 'objective-c',
  '.mm': 'objective-cpp',
};

/** Language inferred from the file extension, or null when unknown. */
export function languageForPath(filepath: string): Language | null {
  return LANGUAGE_BY_EXTENSION[path.extname(filepath).toLowerCase()] ?? null;
}

export function isCFamilyLanguage(language: Language): boolean {
  return (
    language === 'c' ||
    language === 'cpp' ||
    language === 'objective-c' ||
    language === 'objective-cpp'
  );
}
