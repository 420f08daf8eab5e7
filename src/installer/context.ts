import os from 'node:os';
import type { Config } from '../types/index.js';
import { createCommandRunner, createDryRunRunner } from '../utils/index.js';
import type { InstallContext } from './types.js';

/**
 * Build the context for one run. Tests pass their own runner, fetch and env.
 */
export function createContext(
  config: Config,
  overrides: Partial<Omit<InstallContext, 'config'>> = {}
): InstallContext {
  const print = overrides.print ?? ((line: string) => console.log(line));
  return {
    config,
    env: overrides.env ?? { ...process.env },
    runner: overrides.runner ?? (config.dryRun ? createDryRunRunner(print) : createCommandRunner()),
    fetch: overrides.fetch ?? ((url: string) => fetch(url)),
    tmpDir: overrides.tmpDir ?? os.tmpdir(),
    print,
    plan: overrides.plan ?? { entries: [] },
    tools: overrides.tools ?? new Map(),
  };
}

function clock(date: Date): string {
  return date.toTimeString().slice(0, 8);
}

/**
 * Progress line: a blank line, then `[HH:MM:SS] message`
 */
export function say(ctx: InstallContext, message: string, now: Date = new Date()): void {
  ctx.print(`\n[${clock(now)}] ${message}`);
}
