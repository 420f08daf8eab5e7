/**
 * OS package managers: apt, Homebrew, snap
 */

import * as path from 'path';
import { APT_BASE_PACKAGES, HOMEBREW_BREW_PATHS, HOMEBREW_INSTALL_SCRIPT_URL } from '../config/index.js';
import {
  assertSuccess,
  DownloadError,
  logger,
  messageOf,
  PackageManagerError,
  PrivilegeError,
  succeeded,
} from '../utils/index.js';
import type { CommandResult, CommandSpec } from '../utils/index.js';
import { binaryExists, canElevate, elevated, isExecutableFile } from './detector.js';
import { say } from './context.js';
import { extendPath } from './path-plan.js';
import type { InstallContext } from './types.js';

export type PackageManager = 'apt' | 'brew' | 'snap';

/**
 * Non-interactive install command for a package manager
 */
export function installCommand(manager: PackageManager, packages: string[]): CommandSpec {
  switch (manager) {
    case 'apt':
      return { command: 'apt-get', args: ['install', '-y', ...packages] };
    case 'brew':
      return { command: 'brew', args: ['install', ...packages] };
    case 'snap':
      return { command: 'snap', args: ['install', ...packages] };
  }
}

/**
 * Install packages, elevating for apt and snap
 */
export async function installPackages(
  ctx: InstallContext,
  manager: PackageManager,
  packages: string[]
): Promise<CommandResult> {
  const base = { ...installCommand(manager, packages), env: ctx.env };
  const spec = manager === 'brew' ? base : elevated(base, ctx);
  return ctx.runner.run(spec);
}

async function runApt(ctx: InstallContext, args: string[]): Promise<void> {
  const spec = elevated({ command: 'apt-get', args, env: ctx.env }, ctx);
  const result = await ctx.runner.run(spec);
  try {
    assertSuccess(result, spec);
  } catch (error) {
    throw new PackageManagerError('apt', messageOf(error));
  }
}

/**
 * apt-get update, then the base packages. Any failure here is fatal.
 */
export async function installBaseDependencies(ctx: InstallContext): Promise<void> {
  say(ctx, 'Installing system dependencies via apt…');
  if (!canElevate(ctx)) {
    throw new PrivilegeError();
  }
  if (!binaryExists('apt-get', ctx.env) && !ctx.config.dryRun) {
    throw new PackageManagerError('apt', 'apt-get not found; this installer targets Debian-based systems');
  }

  await runApt(ctx, ['update', '-y']);
  await runApt(ctx, ['install', '-y', ...APT_BASE_PACKAGES]);
}

const SHELL_NAME = '([A-Za-z_][A-Za-z0-9_]*)';
const SHELL_VALUE = `(?:"([^"]*)"|'([^']*)'|([^;\\s]*))`;
const EXPORT_ASSIGNMENT = new RegExp(`^\\s*export\\s+${SHELL_NAME}=${SHELL_VALUE};?\\s*$`);
// path_helper style: NAME="value"; export NAME;
const ASSIGNMENT_THEN_EXPORT = new RegExp(
  `^\\s*${SHELL_NAME}=${SHELL_VALUE};\\s*export\\s+${SHELL_NAME};?\\s*$`
);

/**
 * Parse `brew shellenv` output into environment variables
 */
export function parseShellenv(output: string): Record<string, string> {
  const vars: Record<string, string> = {};

  for (const line of output.split('\n')) {
    const exported = EXPORT_ASSIGNMENT.exec(line);
    if (exported) {
      const [, name, doubleQuoted, singleQuoted, bare] = exported;
      vars[name] = doubleQuoted ?? singleQuoted ?? bare ?? '';
      continue;
    }
    const assigned = ASSIGNMENT_THEN_EXPORT.exec(line);
    if (assigned && assigned[1] === assigned[5]) {
      const [, name, doubleQuoted, singleQuoted, bare] = assigned;
      vars[name] = doubleQuoted ?? singleQuoted ?? bare ?? '';
    }
  }
  return vars;
}

/**
 * Expand $NAME and ${NAME...} references the way the shell would for shellenv output
 */
export function expandVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)([^}]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_match: string, braced?: string, modifier?: string, plain?: string) => {
      if (plain !== undefined) {
        return env[plain] ?? '';
      }
      const current = env[braced ?? ''];
      const op = modifier ?? '';
      if (op.startsWith(':+')) return current ? expandVars(op.slice(2), env) : '';
      if (op.startsWith('+')) return current !== undefined ? expandVars(op.slice(1), env) : '';
      if (op.startsWith(':-')) return current || expandVars(op.slice(2), env);
      if (op.startsWith('-')) return current ?? expandVars(op.slice(1), env);
      return current ?? '';
    }
  );
}

/**
 * Evaluate `brew shellenv` from the first brew binary that exists
 */
async function loadBrewShellenv(ctx: InstallContext, brewPaths: readonly string[]): Promise<boolean> {
  for (const brew of brewPaths) {
    if (!isExecutableFile(brew)) continue;

    const result = await ctx.runner.run({
      command: brew,
      args: ['shellenv'],
      env: ctx.env,
      capture: true,
    });
    if (!succeeded(result)) continue;

    for (const [name, value] of Object.entries(parseShellenv(result.stdout))) {
      ctx.env[name] = expandVars(value, ctx.env);
    }
    logger.debug('Loaded brew shellenv', { brew });
    return true;
  }
  return false;
}

async function downloadText(ctx: InstallContext, url: string): Promise<string> {
  let response: Response;
  try {
    response = await ctx.fetch(url);
  } catch (error) {
    throw new DownloadError(url, messageOf(error));
  }
  if (!response.ok) {
    throw new DownloadError(url, `HTTP ${response.status}`);
  }
  return response.text();
}

/**
 * Install Homebrew when missing, otherwise update it.
 * A missing brew after the installer ran is fatal; a failed update is not.
 */
export async function ensureHomebrew(
  ctx: InstallContext,
  brewPaths: readonly string[] = HOMEBREW_BREW_PATHS
): Promise<void> {
  if (binaryExists('brew', ctx.env)) {
    say(ctx, 'Updating Homebrew...');
    const result = await ctx.runner.run({ command: 'brew', args: ['update'], env: ctx.env });
    if (!succeeded(result)) {
      logger.warn('brew update failed; continuing with the current formulae', {
        exitCode: result.exitCode,
      });
    }
    return;
  }

  say(ctx, 'Homebrew not found. Installing Homebrew...');
  if (ctx.config.dryRun) {
    await ctx.runner.run({
      command: '/bin/bash',
      args: ['-c', `$(curl -fsSL ${HOMEBREW_INSTALL_SCRIPT_URL})`],
    });
    return;
  }

  const script = await downloadText(ctx, HOMEBREW_INSTALL_SCRIPT_URL);
  const spec: CommandSpec = { command: '/bin/bash', args: ['-c', script], env: ctx.env };
  const result = await ctx.runner.run(spec);
  try {
    assertSuccess(result, { command: '/bin/bash', args: ['-c', '<homebrew install script>'] });
  } catch (error) {
    throw new PackageManagerError('brew', messageOf(error));
  }

  await loadBrewShellenv(ctx, brewPaths);
  // brew must resolve whatever shellenv printed
  const installed = brewPaths.find((brew) => isExecutableFile(brew));
  if (installed) {
    extendPath(ctx, { dirs: [path.dirname(installed)], position: 'prepend' });
  }
  if (!binaryExists('brew', ctx.env)) {
    throw new PackageManagerError('brew', 'Homebrew installation finished but brew is not on PATH');
  }
}

/**
 * Make sure snapd is installed (Linux). Only used for the amass fallback.
 */
export async function ensureSnap(ctx: InstallContext): Promise<void> {
  if (binaryExists('snap', ctx.env)) {
    return;
  }

  say(ctx, 'snapd not found; installing (optional: for amass snap) …');
  const result = await installPackages(ctx, 'apt', ['snapd']);
  assertSuccess(result, installCommand('apt', ['snapd']));

  const bestEffort: CommandSpec[] = [
    { command: 'systemctl', args: ['enable', '--now', 'snapd.socket'] },
    { command: 'ln', args: ['-sf', '/var/lib/snapd/snap', '/snap'] },
  ];
  for (const spec of bestEffort) {
    const outcome = await ctx.runner.run(elevated({ ...spec, env: ctx.env }, ctx));
    if (!succeeded(outcome)) {
      logger.warn('snapd setup command failed', { command: spec.command, exitCode: outcome.exitCode });
    }
  }
}
