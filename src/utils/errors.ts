import type { FailureCause } from '../types/index.js';

/**
 * Base error class for bootstrap errors
 */
export class BootstrapError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BootstrapError';
  }
}

/**
 * Error in configuration or CLI flags
 */
export class ConfigError extends BootstrapError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Host OS is neither Linux nor macOS
 */
export class UnsupportedPlatformError extends BootstrapError {
  constructor(platform: string) {
    super(`Unsupported platform: ${platform}`, 'UNSUPPORTED_PLATFORM', { platform });
    this.name = 'UnsupportedPlatformError';
  }
}

/**
 * Neither root nor sudo available
 */
export class PrivilegeError extends BootstrapError {
  constructor(message = 'sudo not available; run as root or install sudo.') {
    super(message, 'PRIVILEGE_ERROR');
    this.name = 'PrivilegeError';
  }
}

/**
 * No upstream Go build for this CPU
 */
export class UnsupportedArchitectureError extends BootstrapError {
  constructor(arch: string) {
    super(`Unsupported architecture for this script: ${arch}`, 'UNSUPPORTED_ARCHITECTURE', {
      arch,
    });
    this.name = 'UnsupportedArchitectureError';
  }
}

/**
 * OS package manager missing or failing in a foundational step
 */
export class PackageManagerError extends BootstrapError {
  constructor(manager: string, message: string, details?: Record<string, unknown>) {
    super(`[${manager}] ${message}`, 'PACKAGE_MANAGER_ERROR', { manager, ...details });
    this.name = 'PackageManagerError';
  }
}

/**
 * HTTP download failed
 */
export class DownloadError extends BootstrapError {
  constructor(url: string, message: string) {
    super(`Download of ${url} failed: ${message}`, 'DOWNLOAD_ERROR', { url });
    this.name = 'DownloadError';
  }
}

/**
 * A delegated command exited non-zero or could not be spawned
 */
export class CommandError extends BootstrapError {
  constructor(
    message: string,
    public failureCause: FailureCause,
    details?: Record<string, unknown>
  ) {
    super(message, 'COMMAND_FAILED', { cause: failureCause, ...details });
    this.name = 'CommandError';
  }
}

/**
 * Failure cause of an arbitrary thrown value
 */
export function causeOf(error: unknown): FailureCause {
  if (error instanceof CommandError) {
    return error.failureCause;
  }
  if (error instanceof DownloadError) {
    return 'network';
  }
  if (error instanceof PrivilegeError) {
    return 'permission';
  }
  const code = errnoCode(error);
  if (code === 'EACCES' || code === 'EPERM') {
    return 'permission';
  }
  return 'command-failed';
}

/**
 * `code` of a Node system error, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Message of an arbitrary thrown value
 */
export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
