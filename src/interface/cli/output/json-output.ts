/**
 * JSON output mode for --json flag
 */

import type { Toolchain } from '../../../core/toolchain/toolchain.js';
import type { FileSettingsResult } from '../../../core/workspace.js';

export function printJson(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + '\n');
}

/** One compact object per line, for streams such as `watch`. */
export function printJsonLine(data: unknown): void {
  process.stdout.write(JSON.stringify(data) + '\n');
}

export function printJsonError(error: {
  message: string;
  code?: string;
  cause?: string;
  hint?: string;
}): void {
  printJson({ error });
}

export function settingsToJson(result: FileSettingsResult): Record<string, unknown> {
  return {
    file: result.file,
    language: result.language,
    settings: result.settings,
    toolchain: result.toolchain ? toolchainToJson(result.toolchain) : null,
  };
}

export function toolchainToJson(toolchain: Toolchain, isDefault = false): Record<string, unknown> {
  return { ...toolchain.toJSON(), default: isDefault };
}
