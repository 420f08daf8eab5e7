/**
 * Runtime configuration types
 */

export const PLATFORMS = ['linux', 'darwin'] as const;

export type Platform = (typeof PLATFORMS)[number];

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  /** Root of the tools tree (TOOLS_DIR) */
  toolsDir: string;
  /** Installed binaries and symlinks */
  binDir: string;
  /** Cloned repositories */
  srcDir: string;
  home: string;
  platform: Platform;
  /** Machine hardware name as reported by uname -m */
  arch: string;
  /** Effective uid; 0 means no sudo needed */
  uid: number;
  dryRun: boolean;
  /** Reinstall tools whose binary already resolves */
  force: boolean;
  /** Non-zero exit when an optional item failed */
  strict: boolean;
  skipWordlists: boolean;
  logLevel: LogLevel;
}
