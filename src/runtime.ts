// Programmatic entry point for hosts embedding the Python runtime manager
export { ConfigManager, createDefaultSettings } from './core/ConfigManager';
export { CacheManager } from './core/cache/CacheManager';
export { RuntimeManager, parseVersionRequest } from './core/runtime/RuntimeManager';
export { RuntimeRegistry } from './core/runtime/RuntimeRegistry';
export { detectPlatform } from './core/runtime/Platform';
export { PythonRuntimeManager, selectStrategy } from './core/runtime/python/PythonRuntimeManager';
export { ProvisionError, ProcessError } from './utils/Errors';
export type { Settings } from './types/Config';
export type {
  InstallOutcome,
  InstallTarget,
  PrecompiledEntry,
  ProgressReporter,
  ProjectContext,
  RuntimeContext,
  StrategyChoice,
  ToolVersion,
  VersionRequest,
  VirtualEnvDescriptor,
} from './types/Runtime';
