import os from 'node:os';
import path from 'node:path';
import { ConfigError } from '../utils/index.js';
import { levelFromEnv } from '../utils/index.js';
import { getPlatform } from '../installer/detector.js';
import { DEFAULT_TOOLS_DIR_NAME } from './defaults.js';
import { configSchema, type CliOptions } from './schema.js';
import type { Config } from '../types/index.js';

/**
 * Facts about the machine we are running on
 */
export interface HostInfo {
  platform: string;
  /** uname -m */
  machine: string;
  uid?: number;
  homedir: string;
  cwd: string;
}

export function currentHost(): HostInfo {
  return {
    platform: process.platform,
    machine: os.machine(),
    uid: process.getuid?.(),
    homedir: os.homedir(),
    cwd: process.cwd(),
  };
}

/**
 * Expand a leading ~ and make the path absolute
 */
export function expandHome(input: string, home: string, cwd: string): string {
  if (input === '~') {
    return home;
  }
  if (input.startsWith('~/')) {
    return path.join(home, input.slice(2));
  }
  return path.resolve(cwd, input);
}

/**
 * EUID wins over the process uid when it is a number
 */
export function resolveUid(env: NodeJS.ProcessEnv, host: HostInfo): number {
  const fromEnv = env.EUID?.trim();
  if (fromEnv && /^\d+$/.test(fromEnv)) {
    return parseInt(fromEnv, 10);
  }
  return host.uid ?? 0;
}

/**
 * Build the run configuration from flags, environment and host facts.
 * Flags beat TOOLS_DIR, which beats $HOME/tools.
 */
export function resolveConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  host: HostInfo = currentHost()
): Config {
  const platform = getPlatform(host.platform);
  const home = env.HOME?.trim() || host.homedir;
  const rawToolsDir = options.toolsDir ?? env.TOOLS_DIR?.trim() ?? '';
  const toolsDir = rawToolsDir
    ? expandHome(rawToolsDir, home, host.cwd)
    : path.join(home, DEFAULT_TOOLS_DIR_NAME);

  const candidate = {
    toolsDir,
    binDir: path.join(toolsDir, 'bin'),
    srcDir: path.join(toolsDir, 'src'),
    home,
    platform,
    arch: host.machine,
    uid: resolveUid(env, host),
    dryRun: options.dryRun,
    force: options.force,
    strict: options.strict,
    skipWordlists: options.skipWordlists,
    logLevel: options.verbose ? 'debug' : levelFromEnv(env),
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error.message}`);
  }
  return result.data;
}
