/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG, type BuildSenseConfig } from './types.js';
import { ConfigError, ConfigNotFoundError, toError } from '../shared/errors.js';

const CONFIG_DIR = '.buildsense';
const CONFIG_FILE = 'config.json';

const configFileSchema = z
  .object({
    scheduler: z
      .object({
        max_concurrent_jobs: z.number().int().positive().nullable(),
      })
      .partial(),
    debounce: z
      .object({
        build_settings_ms: z.number().int().nonnegative(),
        source_files_ms: z.number().int().nonnegative(),
      })
      .partial(),
    toolchains: z
      .object({
        search_paths: z.array(z.string()),
        default: z.string().nullable(),
        platform_defaults: z.boolean(),
      })
      .partial(),
    fallback: z
      .object({
        c_flags: z.array(z.string()),
        cxx_flags: z.array(z.string()),
      })
      .partial(),
    watcher: z
      .object({
        exclude: z.array(z.string()),
      })
      .partial(),
    log: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']),
        file: z.string().nullable(),
      })
      .partial(),
  })
  .partial();

type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Resolve the .buildsense directory path from a given working directory.
 */
export function resolveConfigDir(cwd: string): string {
  return path.join(cwd, CONFIG_DIR);
}

/**
 * Resolve the config.json path.
 */
export function resolveConfigPath(cwd: string): string {
  return path.join(resolveConfigDir(cwd), CONFIG_FILE);
}

export function configExists(cwd: string): boolean {
  return fs.existsSync(resolveConfigPath(cwd));
}

/**
 * Load config from disk, merging with defaults.
 */
export function loadConfig(cwd: string): BuildSenseConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const error = toError(err);
    throw new ConfigError(`Failed to load config from ${configPath}: ${error.message}`, error);
  }
  return parseConfig(raw, configPath);
}

/**
 * Validate a parsed config.json and fill in defaults.
 */
export function parseConfig(raw: unknown, source = CONFIG_FILE): BuildSenseConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  return mergeWithDefaults(result.data);
}

/**
 * Save config to disk.
 */
export function saveConfig(cwd: string, config: BuildSenseConfig): void {
  const configDir = resolveConfigDir(cwd);
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true });
  }
  const configPath = resolveConfigPath(cwd);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

function mergeWithDefaults(partial: ConfigFile): BuildSenseConfig {
  return {
    scheduler: {
      max_concurrent_jobs:
        partial.scheduler?.max_concurrent_jobs !== undefined
          ? partial.scheduler.max_concurrent_jobs
          : DEFAULT_CONFIG.scheduler.max_concurrent_jobs,
    },
    debounce: {
      build_settings_ms: partial.debounce?.build_settings_ms ?? DEFAULT_CONFIG.debounce.build_settings_ms,
      source_files_ms: partial.debounce?.source_files_ms ?? DEFAULT_CONFIG.debounce.source_files_ms,
    },
    toolchains: {
      search_paths: partial.toolchains?.search_paths ?? DEFAULT_CONFIG.toolchains.search_paths,
      default:
        partial.toolchains?.default !== undefined
          ? partial.toolchains.default
          : DEFAULT_CONFIG.toolchains.default,
      platform_defaults: partial.toolchains?.platform_defaults ?? DEFAULT_CONFIG.toolchains.platform_defaults,
    },
    fallback: {
      c_flags: partial.fallback?.c_flags ?? DEFAULT_CONFIG.fallback.c_flags,
      cxx_flags: partial.fallback?.cxx_flags ?? DEFAULT_CONFIG.fallback.cxx_flags,
    },
    watcher: {
      exclude: partial.watcher?.exclude ?? DEFAULT_CONFIG.watcher.exclude,
    },
    log: {
      level: partial.log?.level ?? DEFAULT_CONFIG.log.level,
      file: partial.log?.file ?? DEFAULT_CONFIG.log.file,
    },
  };
}
