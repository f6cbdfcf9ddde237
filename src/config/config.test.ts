import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { configExists, loadConfig, parseConfig, resolveConfigPath, saveConfig } from './config.js';
import { DEFAULT_CONFIG } from './types.js';
import { ConfigError, ConfigNotFoundError } from '../shared/errors.js';

describe('config', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildsense-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('round-trips through saveConfig and loadConfig', () => {
    const config = {
      ...DEFAULT_CONFIG,
      scheduler: { max_concurrent_jobs: 4 },
      toolchains: { search_paths: ['/opt/toolchains'], default: 'llvm17', platform_defaults: false },
    };

    expect(configExists(tmpDir)).toBe(false);
    saveConfig(tmpDir, config);

    expect(configExists(tmpDir)).toBe(true);
    expect(loadConfig(tmpDir)).toEqual(config);
  });

  it('throws ConfigNotFoundError when no config exists', () => {
    expect(() => loadConfig(tmpDir)).toThrow(ConfigNotFoundError);
  });

  it('wraps malformed JSON in ConfigError', () => {
    fs.mkdirSync(path.dirname(resolveConfigPath(tmpDir)), { recursive: true });
    fs.writeFileSync(resolveConfigPath(tmpDir), '{ "debounce": ', 'utf-8');

    expect(() => loadConfig(tmpDir)).toThrow(ConfigError);
  });

  describe('parseConfig', () => {
    it('fills every missing key with its default', () => {
      expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('merges sections key by key', () => {
      const config = parseConfig({
        debounce: { build_settings_ms: 50 },
        fallback: { cxx_flags: ['-std=c++20'] },
        log: { level: 'debug' },
      });

      expect(config.debounce).toEqual({ build_settings_ms: 50, source_files_ms: 500 });
      expect(config.fallback).toEqual({ c_flags: [], cxx_flags: ['-std=c++20'] });
      expect(config.log).toEqual({ level: 'debug', file: null });
    });

    it('keeps an explicit null default toolchain', () => {
      expect(parseConfig({ toolchains: { default: null } }).toolchains.default).toBeNull();
    });

    it('rejects values of the wrong shape with the offending path', () => {
      expect(() => parseConfig({ scheduler: { max_concurrent_jobs: 0 } })).toThrow(
        'Invalid config.json: scheduler.max_concurrent_jobs: Number must be greater than 0',
      );
      expect(() => parseConfig({ log: { level: 'verbose' } })).toThrow(ConfigError);
      expect(() => parseConfig([])).toThrow(ConfigError);
    });
  });
});
