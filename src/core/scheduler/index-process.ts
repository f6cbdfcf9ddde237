/**
 * Spawns one preparation / index process and reports its completion.
 * Timeouts are left to the caller; an aborted signal terminates the process.
 */

import { execa } from 'execa';
import { BuildSenseError } from '../../shared/errors.js';
import type { IndexProcessResult } from '../../shared/types.js';

export interface RunIndexProcessOptions {
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export type IndexProcessRunner = (
  command: readonly string[],
  options?: RunIndexProcessOptions,
) => Promise<IndexProcessResult>;

export const runIndexProcess: IndexProcessRunner = async (command, options = {}) => {
  const [file, ...args] = command;
  if (!file) {
    throw new BuildSenseError('Cannot run an empty command', 'INVALID_COMMAND');
  }

  const startedAt = new Date();
  const res = await execa(file, args, {
    cwd: options.cwd,
    env: options.env,
    stdin: 'ignore',
    all: true,
    reject: false,
    cancelSignal: options.signal,
  });

  return {
    command: [...command],
    exitCode: res.exitCode ?? null,
    signal: res.signal ?? null,
    output: typeof res.all === 'string' ? res.all : '',
    startedAt,
    durationMs: Date.now() - startedAt.getTime(),
    cancelled: res.isCanceled,
  };
};
