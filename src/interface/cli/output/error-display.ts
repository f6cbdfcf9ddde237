/**
 * 3-layer error display: Error / Cause / Hint
 */

import pc from 'picocolors';
import { formatError, formatHint } from './formatter.js';
import { printJsonError } from './json-output.js';
import type { GlobalOptions } from '../utils/global-options.js';
import { BuildSenseError } from '../../../shared/errors.js';

export interface ErrorDisplay {
  message: string;
  code?: string;
  cause?: string;
  hint?: string;
  stack?: string;
}

export function toErrorDisplay(error: unknown): ErrorDisplay {
  if (error instanceof BuildSenseError) {
    return {
      message: error.message,
      code: error.code,
      cause: error.cause?.message,
      hint: getHintForCode(error.code),
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function getHintForCode(code: string): string | undefined {
  switch (code) {
    case 'CONFIG_ERROR':
      return "Check your .buildsense/config.json file or run 'buildsense init --force'.";
    case 'ALREADY_INITIALIZED':
      return 'Edit the existing configuration instead.';
    case 'NO_TOOLCHAIN_FOUND':
      return "Add the toolchain's directory to toolchains.search_paths or BUILDSENSE_TOOLCHAINS.";
    case 'PREPARE_NOT_SUPPORTED':
      return 'The active build system cannot prepare targets; indexing continues without it.';
    case 'BUILD_GRAPH_GENERATION_FAILED':
      return 'Fix the build description and try again.';
    default:
      return undefined;
  }
}

export function renderError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): void {
  if (globals.json) {
    printJsonError({
      message: error.message,
      code: error.code,
      cause: error.cause,
      hint: error.hint,
    });
    return;
  }

  const lines: string[] = [];
  lines.push(formatError(error.message));

  if (error.cause) {
    lines.push(`  Cause: ${error.cause}`);
  }

  if (error.hint) {
    lines.push(`  ${formatHint(error.hint)}`);
  }

  if (globals.verbose && error.stack) {
    lines.push('');
    lines.push(pc.dim(error.stack));
  }

  process.stderr.write(lines.join('\n') + '\n');
}

export function exitWithError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): never {
  renderError(error, globals);
  process.exit(1);
}

export function handleCommandError(error: unknown, globals: GlobalOptions): never {
  exitWithError(toErrorDisplay(error), globals);
}
