/**
 * toolchain.yaml manifest
 *
 * Optional file at the root of a toolchain directory:
 *
 *   identifier: org.llvm.17
 *   display_name: LLVM 17
 *   version: 17.0.6
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';

export const TOOLCHAIN_INFO_FILE = 'toolchain.yaml';

const toolchainInfoSchema = z.object({
  identifier: z.string().min(1).optional(),
  display_name: z.string().min(1).optional(),
  version: z.union([z.string(), z.number()]).transform(String).optional(),
});

export type ToolchainInfo = z.infer<typeof toolchainInfoSchema>;

export type ToolchainInfoResult =
  | { status: 'missing' }
  | { status: 'valid'; info: ToolchainInfo }
  | { status: 'invalid'; message: string };

export async function readToolchainInfo(dir: string): Promise<ToolchainInfoResult> {
  const infoPath = path.join(dir, TOOLCHAIN_INFO_FILE);

  let raw: string;
  try {
    raw = await readFile(infoPath, 'utf-8');
  } catch {
    return { status: 'missing' };
  }

  return parseToolchainInfo(raw, infoPath);
}

export function parseToolchainInfo(raw: string, source: string): ToolchainInfoResult {
  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch (err) {
    return { status: 'invalid', message: `Failed to parse ${source}: ${String(err)}` };
  }

  // An empty file carries no information
  if (parsed === null || parsed === undefined) {
    return { status: 'valid', info: {} };
  }

  const result = toolchainInfoSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return { status: 'invalid', message: `Invalid ${source}: ${issues}` };
  }
  return { status: 'valid', info: result.data };
}
