/**
 * Language toolchains: Go, Node.js/npm, Python/pip
 */

import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { GO_DOWNLOAD_BASE_URL, GO_INSTALL_ROOT, GO_VERSION_URL } from '../config/index.js';
import {
  assertSuccess,
  DownloadError,
  logger,
  messageOf,
  PackageManagerError,
  succeeded,
} from '../utils/index.js';
import type { CommandSpec } from '../utils/index.js';
import { say } from './context.js';
import { binaryExists, elevated, goArchFor } from './detector.js';
import { installCommand, installPackages } from './package-managers.js';
import { extendPath } from './path-plan.js';
import type { InstallContext } from './types.js';

/**
 * `go version` output, or null when go does not run
 */
export async function goVersion(ctx: InstallContext): Promise<string | null> {
  const result = await ctx.runner.run({
    command: 'go',
    args: ['version'],
    env: ctx.env,
    capture: true,
  });
  return succeeded(result) ? result.stdout.trim() : null;
}

/**
 * Latest stable Go release name, e.g. go1.22.5
 */
export async function fetchLatestGoVersion(ctx: InstallContext): Promise<string> {
  let body: string;
  try {
    const response = await ctx.fetch(GO_VERSION_URL);
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    body = await response.text();
  } catch (error) {
    throw new DownloadError(GO_VERSION_URL, messageOf(error));
  }

  const version = body.split('\n')[0]?.trim() ?? '';
  if (!/^go\d+(\.\d+)*\S*$/.test(version)) {
    throw new DownloadError(GO_VERSION_URL, `unexpected version string "${version}"`);
  }
  return version;
}

/**
 * Tarball name for a release on Linux
 */
export function goTarballName(version: string, goarch: string): string {
  return `${version}.linux-${goarch}.tar.gz`;
}

async function downloadToFile(ctx: InstallContext, url: string, destination: string): Promise<void> {
  let response: Response;
  try {
    response = await ctx.fetch(url);
  } catch (error) {
    throw new DownloadError(url, messageOf(error));
  }
  if (!response.ok) {
    throw new DownloadError(url, `HTTP ${response.status}`);
  }
  if (!response.body) {
    throw new DownloadError(url, 'empty response body');
  }
  try {
    await pipeline(Readable.fromWeb(response.body), fs.createWriteStream(destination));
  } catch (error) {
    throw new DownloadError(url, messageOf(error));
  }
}

async function runOrThrow(ctx: InstallContext, spec: CommandSpec): Promise<void> {
  const result = await ctx.runner.run(spec);
  assertSuccess(result, spec);
}

/**
 * Upstream tarball into /usr/local/go (Linux)
 */
async function installGoFromTarball(ctx: InstallContext): Promise<void> {
  // Unknown CPU fails before anything is downloaded
  const goarch = goArchFor(ctx.config.arch);

  say(ctx, 'Go not found; installing latest stable to /usr/local…');
  if (ctx.config.dryRun) {
    ctx.print(`  [dry-run] download ${GO_DOWNLOAD_BASE_URL}/<latest>.linux-${goarch}.tar.gz`);
  } else {
    const version = await fetchLatestGoVersion(ctx);
    const tarball = goTarballName(version, goarch);
    const archivePath = path.join(ctx.tmpDir, tarball);

    logger.info('Downloading Go', { version, goarch });
    await downloadToFile(ctx, `${GO_DOWNLOAD_BASE_URL}/${tarball}`, archivePath);
    try {
      await runOrThrow(
        ctx,
        elevated({ command: 'rm', args: ['-rf', path.join(GO_INSTALL_ROOT, 'go')], env: ctx.env }, ctx)
      );
      await runOrThrow(
        ctx,
        elevated({ command: 'tar', args: ['-C', GO_INSTALL_ROOT, '-xzf', archivePath], env: ctx.env }, ctx)
      );
    } finally {
      await fs.promises.rm(archivePath, { force: true });
    }
  }

  extendPath(ctx, { dirs: [path.join(GO_INSTALL_ROOT, 'go', 'bin')], position: 'prepend' });
}

/**
 * `brew install go` (macOS)
 */
async function installGoFromHomebrew(ctx: InstallContext): Promise<void> {
  say(ctx, 'Installing Go via Homebrew...');
  const result = await installPackages(ctx, 'brew', ['go']);
  try {
    assertSuccess(result, installCommand('brew', ['go']));
  } catch (error) {
    throw new PackageManagerError('brew', messageOf(error));
  }
  extendPath(ctx, { dirs: ['/usr/local/go/bin', '/opt/homebrew/bin'], position: 'append' });
}

/**
 * Make sure `go` runs. Failure here is fatal: most tools are Go builds.
 */
export async function ensureGo(ctx: InstallContext): Promise<void> {
  if (binaryExists('go', ctx.env)) {
    say(ctx, `Go found: ${(await goVersion(ctx)) || 'unknown version'}`);
    return;
  }

  if (ctx.config.platform === 'darwin') {
    await installGoFromHomebrew(ctx);
  } else {
    await installGoFromTarball(ctx);
  }

  if (!ctx.config.dryRun) {
    const version = await goVersion(ctx);
    if (!version) {
      throw new PackageManagerError(
        ctx.config.platform === 'darwin' ? 'brew' : 'go',
        'Go was installed but `go version` does not run'
      );
    }
    say(ctx, `Installed ${version}`);
  }
}

/**
 * Node.js and npm from the OS package manager
 */
export async function ensureNode(ctx: InstallContext): Promise<void> {
  if (binaryExists('npm', ctx.env)) {
    return;
  }

  if (ctx.config.platform === 'darwin') {
    say(ctx, 'Installing Node.js + npm...');
    const result = await installPackages(ctx, 'brew', ['node']);
    assertSuccess(result, installCommand('brew', ['node']));
  } else {
    say(ctx, 'npm not found; installing Node.js + npm from apt (for Wappalyzer CLI)…');
    const result = await installPackages(ctx, 'apt', ['nodejs', 'npm']);
    assertSuccess(result, installCommand('apt', ['nodejs', 'npm']));
  }
}

/**
 * Python 3 from Homebrew (macOS; apt base packages cover Linux)
 */
export async function ensurePython(ctx: InstallContext): Promise<void> {
  if (binaryExists('python3', ctx.env)) {
    return;
  }
  say(ctx, 'Installing Python3...');
  const result = await installPackages(ctx, 'brew', ['python']);
  assertSuccess(result, installCommand('brew', ['python']));
}

/**
 * python3 -m pip install --upgrade pip
 */
export async function upgradePip(ctx: InstallContext): Promise<void> {
  const spec: CommandSpec = {
    command: 'python3',
    args: ['-m', 'pip', 'install', '--upgrade', 'pip'],
    env: ctx.env,
  };
  await runOrThrow(ctx, spec);
}
