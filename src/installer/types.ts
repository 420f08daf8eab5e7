/**
 * Types for the tool installer
 */

import type { Config, FailureCause, Platform, StepResult } from '../types/index.js';
import type { CommandRunner } from '../utils/index.js';

export type InstallerKind = 'go' | 'pip' | 'npm' | 'snap';

export interface InstallSource {
  kind: InstallerKind;
  /** Package identifiers, tried in order until one installs */
  packages: string[];
  /** Restrict this source to some platforms (default: all) */
  platforms?: Platform[];
}

export interface ToolDefinition {
  /** Tool identifier */
  id: string;
  /** Display name */
  name: string;
  description: string;
  /** Install sources; a later one is only used when the earlier ones left the tool missing */
  sources: InstallSource[];
  /** Binary names; the tool is present when any of them resolves */
  binaries: string[];
  /** Symlink the binaries into the shared bin directory after install */
  linkIntoBin: boolean;
}

export type ToolStatus = 'installed' | 'present' | 'failed' | 'skipped';

export interface ToolInstallResult {
  tool: ToolDefinition;
  status: ToolStatus;
  message: string;
  source?: InstallerKind;
  /** Package identifier that installed the tool */
  package?: string;
  binaryPath?: string;
  linked?: string[];
  cause?: FailureCause;
  /** Failed attempts from sources tried before this one */
  earlierFailures?: ToolInstallResult[];
}

export interface PathEntry {
  dirs: string[];
  position: 'prepend' | 'append';
}

export interface EnvironmentPlan {
  entries: PathEntry[];
}

export type ShellSyntax = 'posix' | 'fish';

export interface ShellProfile {
  file: string;
  syntax: ShellSyntax;
}

export interface ProfileUpdate {
  file: string;
  added: string[];
}

export type FetchLike = (url: string) => Promise<Response>;

/**
 * Everything a step needs; one per run
 */
export interface InstallContext {
  config: Config;
  /** Environment used for PATH lookups and child processes; PATH grows during the run */
  env: NodeJS.ProcessEnv;
  runner: CommandRunner;
  fetch: FetchLike;
  tmpDir: string;
  /** Progress output (stdout) */
  print: (line: string) => void;
  plan: EnvironmentPlan;
  tools: Map<string, ToolInstallResult>;
}

export interface StepOutcome {
  status: 'ok' | 'skipped';
  message?: string;
}

export interface BootstrapStep {
  id: string;
  label: string;
  /** A fatal step aborts the run when it throws */
  fatal: boolean;
  run(ctx: InstallContext): Promise<StepOutcome | void>;
}

export interface ToolReportLine {
  name: string;
  path: string | null;
}

export interface FailureItem {
  item: string;
  /** Source that failed, for tool items */
  source?: InstallerKind;
  cause: FailureCause;
  message: string;
}

export interface InstallSummary {
  steps: StepResult[];
  tools: ToolInstallResult[];
  report: ToolReportLine[];
  wordlistsDir: string;
  failures: FailureItem[];
}
