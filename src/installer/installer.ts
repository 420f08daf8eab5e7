/**
 * Per-tool installation through Go, pip, npm and snap
 */

import * as fs from 'fs';
import * as path from 'path';
import { classifyFailure, formatCommand, logger, messageOf, succeeded } from '../utils/index.js';
import type { CommandResult, CommandSpec } from '../utils/index.js';
import { say } from './context.js';
import { binaryExists, elevated, isExecutableFile, resolveBinary } from './detector.js';
import { getSourcesFor, getToolsInstalledBy, SUPPORTED_TOOLS } from './tools.js';
import type {
  InstallContext,
  InstallerKind,
  InstallSource,
  ToolDefinition,
  ToolInstallResult,
} from './types.js';

/**
 * Binary that must be on PATH before a source can be used
 */
const TOOLCHAIN_BINARY: Record<InstallerKind, string> = {
  go: 'go',
  pip: 'python3',
  npm: 'npm',
  snap: 'snap',
};

/**
 * Command that installs one package through a source kind
 */
export function installerCommand(
  ctx: InstallContext,
  kind: InstallerKind,
  pkg: string
): CommandSpec {
  switch (kind) {
    case 'go':
      return {
        command: 'go',
        args: ['install', '-v', pkg],
        env: { ...ctx.env, GOBIN: ctx.config.binDir, GO111MODULE: 'on' },
      };
    case 'pip':
      return {
        command: 'python3',
        args: ['-m', 'pip', 'install', '--user', pkg],
        env: ctx.env,
      };
    case 'npm': {
      const spec: CommandSpec = { command: 'npm', args: ['install', '-g', pkg], env: ctx.env };
      // Global npm prefix is root-owned on Linux distributions
      return ctx.config.platform === 'linux' ? elevated(spec, ctx) : spec;
    }
    case 'snap':
      return elevated({ command: 'snap', args: ['install', pkg], env: ctx.env }, ctx);
  }
}

/**
 * Whether a resolved binary path already lives in the shared bin directory
 */
function insideBinDir(ctx: InstallContext, binaryPath: string): boolean {
  return path.dirname(path.resolve(binaryPath)) === path.resolve(ctx.config.binDir);
}

/**
 * ln -sf target <binDir>/name
 */
export async function linkIntoBin(ctx: InstallContext, name: string, target: string): Promise<string> {
  const linkPath = path.join(ctx.config.binDir, name);
  if (ctx.config.dryRun) {
    ctx.print(`  [dry-run] ln -sf ${target} ${linkPath}`);
    return linkPath;
  }
  await fs.promises.mkdir(ctx.config.binDir, { recursive: true });
  await fs.promises.rm(linkPath, { force: true });
  await fs.promises.symlink(target, linkPath);
  return linkPath;
}

/**
 * pip --user scripts directory, from `python3 -m site --user-base`
 */
export async function pythonUserBin(ctx: InstallContext): Promise<string | null> {
  const result = await ctx.runner.run({
    command: 'python3',
    args: ['-m', 'site', '--user-base'],
    env: ctx.env,
    capture: true,
  });
  const base = result.stdout.trim();
  return succeeded(result) && base ? path.join(base, 'bin') : null;
}

/**
 * Where an installed binary lives, when it is not already in the bin directory
 */
async function locateBinary(
  ctx: InstallContext,
  kind: InstallerKind,
  name: string
): Promise<string | null> {
  const onPath = resolveBinary(name, ctx.env);
  if (onPath) {
    return onPath;
  }
  if (kind === 'pip') {
    const userBin = await pythonUserBin(ctx);
    const candidate = userBin ? path.join(userBin, name) : null;
    if (candidate && isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Symlink every binary of the tool that can be found into the bin directory
 */
async function linkBinaries(
  ctx: InstallContext,
  tool: ToolDefinition,
  kind: InstallerKind
): Promise<string[]> {
  const linked: string[] = [];
  for (const name of tool.binaries) {
    const target = await locateBinary(ctx, kind, name);
    if (!target || insideBinDir(ctx, target)) continue;
    try {
      linked.push(await linkIntoBin(ctx, name, target));
    } catch (error) {
      logger.warn('Could not link binary into bin directory', {
        tool: tool.id,
        binary: name,
        error: messageOf(error),
      });
    }
  }
  return linked;
}

/**
 * First binary of the tool that resolves on PATH
 */
export function resolveTool(tool: ToolDefinition, env: NodeJS.ProcessEnv): string | null {
  for (const name of tool.binaries) {
    const resolved = resolveBinary(name, env);
    if (resolved) return resolved;
  }
  return null;
}

function failure(
  tool: ToolDefinition,
  source: InstallSource,
  cause: ToolInstallResult['cause'],
  message: string
): ToolInstallResult {
  return { tool, status: 'failed', source: source.kind, cause, message };
}

/**
 * Install one tool from one source. Never throws; failures come back as results.
 */
export async function installTool(
  ctx: InstallContext,
  tool: ToolDefinition,
  source: InstallSource
): Promise<ToolInstallResult> {
  const sources = getSourcesFor(tool, ctx.config.platform);
  const isFirstSource = sources[0] === source;
  const previous = ctx.tools.get(tool.id);

  if (previous && (previous.status === 'installed' || previous.status === 'present')) {
    return previous;
  }

  const existing = resolveTool(tool, ctx.env);
  if (existing && !(ctx.config.force && isFirstSource)) {
    return {
      tool,
      status: 'present',
      binaryPath: existing,
      message: `Already installed at ${existing}`,
    };
  }

  const toolchain = TOOLCHAIN_BINARY[source.kind];
  if (!ctx.config.dryRun && !binaryExists(toolchain, ctx.env)) {
    return failure(tool, source, 'missing-toolchain', `${toolchain} is not on PATH`);
  }

  let lastResult: CommandResult | null = null;
  let lastSpec: CommandSpec | null = null;
  let installedPackage: string | null = null;

  for (const pkg of source.packages) {
    const spec = installerCommand(ctx, source.kind, pkg);
    lastSpec = spec;
    lastResult = await ctx.runner.run(spec);
    if (succeeded(lastResult)) {
      installedPackage = pkg;
      break;
    }
    logger.warn('Package install failed', {
      tool: tool.id,
      package: pkg,
      exitCode: lastResult.exitCode,
      cause: classifyFailure(lastResult),
    });
  }

  if (!installedPackage) {
    const cause = lastResult ? classifyFailure(lastResult) : 'command-failed';
    const command = lastSpec ? formatCommand(lastSpec) : source.kind;
    const status = lastResult?.error ? 'could not be started' : `exited with status ${lastResult?.exitCode}`;
    return failure(tool, source, cause, `\`${command}\` ${status}`);
  }

  if (ctx.config.dryRun) {
    return {
      tool,
      status: 'skipped',
      source: source.kind,
      package: installedPackage,
      message: `Would install ${installedPackage} via ${source.kind}`,
    };
  }

  const linked = tool.linkIntoBin ? await linkBinaries(ctx, tool, source.kind) : [];
  const binaryPath = resolveTool(tool, ctx.env) ?? linked[0];

  if (!binaryPath) {
    return failure(
      tool,
      source,
      'not-found',
      `${installedPackage} installed but ${tool.binaries.join('/')} is not on PATH`
    );
  }

  return {
    tool,
    status: 'installed',
    source: source.kind,
    package: installedPackage,
    binaryPath,
    linked,
    message: `Installed ${installedPackage} via ${source.kind}`,
  };
}

const KIND_LABELS: Record<InstallerKind, string> = {
  go: 'Go-based tools',
  pip: 'Python-based tools',
  npm: 'Node-based tools',
  snap: 'snap packages',
};

/**
 * Install every tool with a source of this kind, in manifest order.
 * Results are recorded on the context; one failure never stops the rest.
 */
export async function installToolsVia(
  ctx: InstallContext,
  kind: InstallerKind,
  tools: ToolDefinition[] = SUPPORTED_TOOLS
): Promise<ToolInstallResult[]> {
  const selected = getToolsInstalledBy(kind, ctx.config.platform, tools);
  if (selected.length === 0) {
    return [];
  }

  say(ctx, `Installing ${KIND_LABELS[kind]} into ${ctx.config.binDir} …`);

  const results: ToolInstallResult[] = [];
  for (const tool of selected) {
    const source = getSourcesFor(tool, ctx.config.platform).find((s) => s.kind === kind);
    if (!source) continue;

    const previous = ctx.tools.get(tool.id);
    let result = await installTool(ctx, tool, source);
    if (result.status === 'failed' && previous?.status === 'failed') {
      const { earlierFailures = [], ...earlier } = previous;
      result = { ...result, earlierFailures: [...earlierFailures, earlier] };
    }
    ctx.tools.set(tool.id, result);
    results.push(result);

    if (result.status === 'failed') {
      logger.warn('Tool install failed', { tool: tool.id, cause: result.cause, message: result.message });
      ctx.print(`  ! ${tool.name}: ${result.message} (${result.cause})`);
    }
  }
  return results;
}
