/**
 * Recon tool installer module
 */

// Types
export type {
  InstallerKind,
  InstallSource,
  ToolDefinition,
  ToolStatus,
  ToolInstallResult,
  PathEntry,
  EnvironmentPlan,
  ShellProfile,
  ShellSyntax,
  ProfileUpdate,
  FetchLike,
  InstallContext,
  BootstrapStep,
  StepOutcome,
  ToolReportLine,
  FailureItem,
  InstallSummary,
} from './types.js';

// Tool definitions
export {
  SUPPORTED_TOOLS,
  EXPECTED_TOOLS,
  getToolById,
  getToolIds,
  getSourcesFor,
  getToolsForPlatform,
  getToolsInstalledBy,
} from './tools.js';

// Detection utilities
export {
  getPlatform,
  goArchFor,
  isExecutableFile,
  directoryExists,
  fileExists,
  resolveBinary,
  binaryExists,
  canElevate,
  elevated,
} from './detector.js';

export { createContext, say } from './context.js';
export { ensureDirs, runBootstrap, stepsFor } from './pipeline.js';
export { installTool, installToolsVia, installerCommand, linkIntoBin, resolveTool } from './installer.js';
export {
  ensureHomebrew,
  ensureSnap,
  installBaseDependencies,
  installPackages,
  parseShellenv,
  expandVars,
} from './package-managers.js';
export { ensureGo, ensureNode, ensurePython, upgradePip, fetchLatestGoVersion } from './toolchains.js';
export {
  exportLine,
  profileMentions,
  reconcileProfile,
  applyToEnv,
  profilesFor,
  wirePath,
} from './path-plan.js';
export { syncWordlists, wordlistDir } from './wordlists.js';
export {
  buildToolReport,
  formatToolReport,
  collectFailures,
  printInstallSummary,
  exitCodeFor,
} from './summary.js';
