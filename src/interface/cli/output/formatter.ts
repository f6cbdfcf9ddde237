/**
 * CLI output formatter with picocolors
 */

import pc from 'picocolors';
import type { GlobalOptions } from '../utils/global-options.js';
import type { Toolchain } from '../../../core/toolchain/toolchain.js';
import { TOOL_KINDS } from '../../../core/toolchain/toolchain.js';
import type { FileBuildSettings } from '../../../shared/types.js';

export function formatSuccess(message: string): string {
  return pc.green(`OK ${message}`);
}

export function formatError(message: string): string {
  return pc.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return pc.cyan(`Hint: ${message}`);
}

export function formatDim(text: string): string {
  return pc.dim(text);
}

export function formatBold(text: string): string {
  return pc.bold(text);
}

export function shouldUseColor(globals: GlobalOptions): boolean {
  if (globals.noColor) return false;
  if (process.env['NO_COLOR']) return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

export function indent(text: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return text
    .split('\n')
    .map((line) => pad + line)
    .join('\n');
}

/** `identifier  version  path  [tools]`, with a marker on the default. */
export function formatToolchain(toolchain: Toolchain, isDefault: boolean): string {
  const tools = TOOL_KINDS.filter((kind) => toolchain.hasTool(kind)).join(', ');
  const marker = isDefault ? pc.green('*') : ' ';
  return `${marker} ${formatBold(toolchain.identifier)}  ${toolchain.version ?? formatDim('unknown')}  ${toolchain.path}  ${formatDim(`[${tools}]`)}`;
}

/** Compiler arguments one per line, preceded by the working directory. */
export function formatSettings(settings: FileBuildSettings): string {
  const lines = [
    `${formatBold('Language:')}          ${settings.language}${settings.isFallback ? ` ${formatDim('(fallback)')}` : ''}`,
    `${formatBold('Working directory:')} ${settings.workingDirectory ?? formatDim('none')}`,
    `${formatBold('Arguments:')}`,
    ...settings.compilerArguments.map((arg) => indent(arg, 2)),
  ];
  return lines.join('\n');
}
