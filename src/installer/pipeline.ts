/**
 * Ordered bootstrap steps per platform
 */

import * as fs from 'fs';
import type { Platform, StepResult } from '../types/index.js';
import { BootstrapError, causeOf, logger, messageOf } from '../utils/index.js';
import { say } from './context.js';
import { installToolsVia } from './installer.js';
import { ensureHomebrew, ensureSnap, installBaseDependencies } from './package-managers.js';
import { wirePath } from './path-plan.js';
import { buildToolReport, collectFailures } from './summary.js';
import { ensureGo, ensureNode, ensurePython, upgradePip } from './toolchains.js';
import { wordlistDir, syncWordlists } from './wordlists.js';
import type { BootstrapStep, InstallContext, InstallSummary } from './types.js';

/**
 * mkdir -p <binDir> <srcDir>
 */
export async function ensureDirs(ctx: InstallContext): Promise<void> {
  if (ctx.config.dryRun) {
    ctx.print(`  [dry-run] mkdir -p ${ctx.config.binDir} ${ctx.config.srcDir}`);
    return;
  }
  await fs.promises.mkdir(ctx.config.binDir, { recursive: true });
  await fs.promises.mkdir(ctx.config.srcDir, { recursive: true });
}

const dirsStep: BootstrapStep = {
  id: 'dirs',
  label: 'Tools directory',
  fatal: true,
  run: ensureDirs,
};

const goStep: BootstrapStep = { id: 'go', label: 'Go toolchain', fatal: true, run: ensureGo };

const pathStep: BootstrapStep = {
  id: 'path',
  label: 'PATH wiring',
  fatal: false,
  run: async (ctx) => {
    wirePath(ctx);
  },
};

const nodeStep: BootstrapStep = { id: 'node', label: 'Node.js + npm', fatal: false, run: ensureNode };

const goToolsStep: BootstrapStep = {
  id: 'go-tools',
  label: 'Go-based tools',
  fatal: false,
  run: async (ctx) => {
    await installToolsVia(ctx, 'go');
  },
};

const pythonToolsStep: BootstrapStep = {
  id: 'python-tools',
  label: 'Python-based tools',
  fatal: false,
  run: async (ctx) => {
    say(ctx, 'Installing Python-based tools (Shodan CLI)…');
    try {
      await upgradePip(ctx);
    } catch (error) {
      // An old pip still installs shodan
      logger.warn('pip upgrade failed', { error: messageOf(error), cause: causeOf(error) });
    }
    await installToolsVia(ctx, 'pip');
  },
};

const nodeToolsStep: BootstrapStep = {
  id: 'node-tools',
  label: 'Node-based tools',
  fatal: false,
  run: async (ctx) => {
    await installToolsVia(ctx, 'npm');
  },
};

const wordlistsStep: BootstrapStep = {
  id: 'wordlists',
  label: 'Wordlists',
  fatal: false,
  run: async (ctx) => {
    if (ctx.config.skipWordlists) {
      return { status: 'skipped', message: 'skipped by --skip-wordlists' };
    }
    const action = await syncWordlists(ctx);
    return { status: 'ok', message: action };
  },
};

const LINUX_STEPS: BootstrapStep[] = [
  dirsStep,
  { id: 'base-deps', label: 'System dependencies (apt)', fatal: true, run: installBaseDependencies },
  goStep,
  pathStep,
  goToolsStep,
  pythonToolsStep,
  nodeStep,
  nodeToolsStep,
  wordlistsStep,
  { id: 'snap', label: 'snapd', fatal: false, run: ensureSnap },
  {
    id: 'snap-tools',
    label: 'snap packages',
    fatal: false,
    run: async (ctx) => {
      await installToolsVia(ctx, 'snap');
    },
  },
];

const DARWIN_STEPS: BootstrapStep[] = [
  dirsStep,
  { id: 'homebrew', label: 'Homebrew', fatal: true, run: ensureHomebrew },
  goStep,
  nodeStep,
  { id: 'python', label: 'Python 3', fatal: false, run: ensurePython },
  pathStep,
  goToolsStep,
  pythonToolsStep,
  nodeToolsStep,
  wordlistsStep,
];

export function stepsFor(platform: Platform): BootstrapStep[] {
  return platform === 'darwin' ? DARWIN_STEPS : LINUX_STEPS;
}

/**
 * Run each step once, in order.
 * A fatal step's error propagates and nothing after it runs; other errors are recorded.
 */
export async function runBootstrap(
  ctx: InstallContext,
  steps: BootstrapStep[] = stepsFor(ctx.config.platform)
): Promise<InstallSummary> {
  const platformName = ctx.config.platform === 'darwin' ? 'macOS' : 'Linux';
  say(ctx, `Starting ${platformName} recon tool bootstrap into ${ctx.config.toolsDir}`);

  const results: StepResult[] = [];

  for (const step of steps) {
    logger.debug('Running step', { step: step.id });
    try {
      const outcome = await step.run(ctx);
      results.push({
        id: step.id,
        label: step.label,
        status: outcome?.status ?? 'ok',
        message: outcome?.message,
      });
    } catch (error) {
      if (step.fatal) {
        logger.error('Fatal step failed', { step: step.id, error: messageOf(error) });
        throw error instanceof BootstrapError
          ? error
          : new BootstrapError(messageOf(error), 'STEP_FAILED', { step: step.id });
      }
      const cause = causeOf(error);
      logger.warn('Step failed; continuing', { step: step.id, cause, error: messageOf(error) });
      ctx.print(`  ! ${step.label}: ${messageOf(error)}`);
      results.push({
        id: step.id,
        label: step.label,
        status: 'failed',
        cause,
        message: messageOf(error),
      });
    }
  }

  const tools = [...ctx.tools.values()];
  return {
    steps: results,
    tools,
    report: buildToolReport(ctx.env),
    wordlistsDir: wordlistDir(ctx),
    failures: collectFailures(results, tools),
  };
}
