/**
 * buildsense public API
 */

export { createWorkspace, initWorkspace, Workspace } from './core/workspace.js';
export type { WorkspaceOptions, FileSettingsResult } from './core/workspace.js';

export { BuildSystemManager, DEFAULT_MANAGER_CONFIG } from './core/manager/build-system-manager.js';
export type {
  BuildSystemManagerConfig,
  BuildSystemManagerOptions,
  BuildSettingsChange,
  PrepareStatus,
  PrepareOptions,
} from './core/manager/build-system-manager.js';
export type {
  BuildSystem,
  BuildSystemDelegate,
  BuildSystemKind,
  BuildSystemProperties,
  PrepareContext,
} from './core/manager/build-system.js';
export type { Subscription } from './core/manager/handler-registry.js';
export { FallbackBuildSystem, FALLBACK_TARGET } from './core/fallback/fallback-build-system.js';

export { TaskScheduler, TaskPriority, JobHandle } from './core/scheduler/task-scheduler.js';
export type { JobOutcome, JobDescription, TaskSchedulerOptions } from './core/scheduler/task-scheduler.js';
export { runIndexProcess } from './core/scheduler/index-process.js';

export { Toolchain, TOOL_KINDS } from './core/toolchain/toolchain.js';
export type { ToolKind } from './core/toolchain/toolchain.js';
export { ToolchainRegistry, TOOLCHAINS_ENV_VAR } from './core/toolchain/toolchain-registry.js';
export type { ToolchainRequest, ToolchainRegistryOptions } from './core/toolchain/toolchain-registry.js';

export { loadConfig, saveConfig, parseConfig } from './config/config.js';
export { DEFAULT_CONFIG } from './config/types.js';
export type { BuildSenseConfig } from './config/types.js';

export * from './shared/errors.js';
export * from './shared/types.js';
