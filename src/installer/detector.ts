/**
 * Host and binary detection
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Platform } from '../types/index.js';
import { UnsupportedArchitectureError, UnsupportedPlatformError } from '../utils/index.js';
import type { CommandSpec } from '../utils/index.js';
import type { InstallContext } from './types.js';

/**
 * Map a Node platform onto the platforms we install for
 */
export function getPlatform(platform: string = process.platform): Platform {
  if (platform === 'linux' || platform === 'darwin') {
    return platform;
  }
  throw new UnsupportedPlatformError(platform);
}

/**
 * Go's name for a machine architecture
 */
export function goArchFor(machine: string): 'amd64' | 'arm64' {
  switch (machine) {
    case 'x86_64':
    case 'amd64':
    case 'x64':
      return 'amd64';
    case 'aarch64':
    case 'arm64':
      return 'arm64';
    default:
      throw new UnsupportedArchitectureError(machine);
  }
}

/**
 * Check if a path is an executable regular file (symlinks followed)
 */
export function isExecutableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) {
      return false;
    }
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a directory exists
 */
export function directoryExists(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a file exists
 */
export function fileExists(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve a binary on PATH the way `command -v` does.
 * Returns the first match, or null.
 */
export function resolveBinary(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (name.includes('/')) {
    return isExecutableFile(name) ? name : null;
  }

  for (const dir of (env.PATH ?? '').split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Check if a binary exists in PATH
 */
export function binaryExists(name: string, env: NodeJS.ProcessEnv = process.env): boolean {
  return resolveBinary(name, env) !== null;
}

/**
 * Root, or sudo on PATH
 */
export function canElevate(ctx: InstallContext): boolean {
  return ctx.config.uid === 0 || binaryExists('sudo', ctx.env);
}

/**
 * Run through sudo unless we already are root
 */
export function elevated(spec: CommandSpec, ctx: InstallContext): CommandSpec {
  if (ctx.config.uid === 0) {
    return spec;
  }
  return { ...spec, command: 'sudo', args: [spec.command, ...spec.args] };
}
