/**
 * buildsense error hierarchy
 *
 * Absence (no settings yet, unsupported queries) is modelled as `null` and
 * never as one of these errors.
 */

export class BuildSenseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'BuildSenseError';
  }
}

// --- Config ---

export class ConfigError extends BuildSenseError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Configuration not found: ${path}. Run 'buildsense init' first.`);
    this.name = 'ConfigNotFoundError';
  }
}

// --- Build system ---

export class PrepareNotSupportedError extends BuildSenseError {
  constructor() {
    super('Preparation not supported', 'PREPARE_NOT_SUPPORTED');
    this.name = 'PrepareNotSupportedError';
  }
}

export class BuildGraphGenerationError extends BuildSenseError {
  constructor(cause?: Error) {
    super(
      `Build graph generation failed${cause ? `: ${cause.message}` : ''}`,
      'BUILD_GRAPH_GENERATION_FAILED',
      cause,
    );
    this.name = 'BuildGraphGenerationError';
  }
}

export class ManagerClosedError extends BuildSenseError {
  constructor() {
    super('Build system manager has been closed', 'MANAGER_CLOSED');
    this.name = 'ManagerClosedError';
  }
}

// --- Toolchains ---

export class NoToolchainFoundError extends BuildSenseError {
  constructor(request: string) {
    super(`No toolchain found for ${request}`, 'NO_TOOLCHAIN_FOUND');
    this.name = 'NoToolchainFoundError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
