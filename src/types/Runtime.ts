// src/types/Runtime.ts - Runtime provisioning types
import { Settings } from './Config';

export type RuntimeType = 'python';

export type RequestKind = 'version' | 'prefix' | 'ref';

export interface VersionRequest {
  kind: RequestKind;
  value: string;
}

/**
 * One downloadable build listed by the precompiled feed.
 * A version may appear several times, once per release.
 */
export interface PrecompiledEntry {
  version: string;
  releaseTag: string;
  filename: string;
}

export interface ToolVersion {
  version: string;
  installPath: string;
  options: Record<string, string>;
}

export interface InstallTarget extends ToolVersion {
  request: VersionRequest;
  downloadPath: string;
}

export type StrategyChoice = 'precompiled' | 'source-build';

export type InstallState =
  | 'start'
  | 'strategy-selected'
  | 'strategy-executed'
  | 'validated'
  | 'post-install-complete'
  | 'failed';

export interface VirtualEnvDescriptor {
  path: string;
  created: boolean;
}

export interface PlatformTag {
  os: 'unknown-linux-gnu' | 'unknown-linux-musl' | 'apple-darwin';
  arch: 'x86_64_v3' | 'aarch64';
}

export interface ProjectContext {
  root: string | null;
  env: Record<string, string>;
  tools: Record<string, Record<string, string>>;
}

/**
 * Everything an operation reads from configuration, captured once when it starts
 */
export interface RuntimeContext {
  settings: Settings;
  project: ProjectContext;
}

export interface InstallOutcome {
  state: 'post-install-complete';
  strategy: StrategyChoice;
  virtualenv: VirtualEnvDescriptor | null;
  warnings: string[];
}

export interface ProgressReporter {
  setMessage(message: string): void;
}
