/**
 * PATH reconciliation for future shells and the current process
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Platform } from '../types/index.js';
import { fileExists } from './detector.js';
import type {
  EnvironmentPlan,
  InstallContext,
  PathEntry,
  ProfileUpdate,
  ShellProfile,
  ShellSyntax,
} from './types.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Shell line that puts the entry's directories on PATH
 */
export function exportLine(entry: PathEntry, syntax: ShellSyntax): string {
  if (syntax === 'fish') {
    const flag = entry.position === 'append' ? ' -a' : '';
    return `fish_add_path${flag} ${entry.dirs.join(' ')}`;
  }
  const dirs = entry.dirs.join(':');
  return entry.position === 'prepend'
    ? `export PATH="${dirs}:$PATH"`
    : `export PATH="$PATH:${dirs}"`;
}

/**
 * Whether profile content already names the directory as a PATH element
 */
export function profileMentions(content: string, dir: string): boolean {
  const pattern = new RegExp(`${escapeRegExp(dir)}(?=[:"'\\s]|$)`, 'm');
  return pattern.test(content);
}

/**
 * Add an entry to the plan unless an identical one is there
 */
export function addToPlan(plan: EnvironmentPlan, entry: PathEntry): void {
  const key = `${entry.position}:${entry.dirs.join(':')}`;
  if (!plan.entries.some((e) => `${e.position}:${e.dirs.join(':')}` === key)) {
    plan.entries.push(entry);
  }
}

/**
 * Apply an entry to an in-process environment, skipping directories already on PATH
 */
export function applyToEnv(env: NodeJS.ProcessEnv, entry: PathEntry): void {
  const current = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
  const missing = entry.dirs.filter((dir) => !current.includes(dir));
  if (missing.length === 0) {
    return;
  }
  const next = entry.position === 'prepend' ? [...missing, ...current] : [...current, ...missing];
  env.PATH = next.join(path.delimiter);
}

/**
 * Append export lines for every entry the profile does not mention yet.
 * A missing posix profile is created; a missing fish config is left alone.
 */
export function reconcileProfile(
  profile: ShellProfile,
  plan: EnvironmentPlan,
  options: { dryRun?: boolean } = {}
): ProfileUpdate {
  const exists = fileExists(profile.file);
  if (!exists && profile.syntax === 'fish') {
    return { file: profile.file, added: [] };
  }

  const content = exists ? fs.readFileSync(profile.file, 'utf-8') : '';
  const added = plan.entries
    .filter((entry) => !entry.dirs.some((dir) => profileMentions(content, dir)))
    .map((entry) => exportLine(entry, profile.syntax));

  if (added.length > 0 && !options.dryRun) {
    const separator = content.length > 0 && !content.endsWith('\n') ? '\n' : '';
    fs.mkdirSync(path.dirname(profile.file), { recursive: true });
    fs.appendFileSync(profile.file, separator + added.join('\n') + '\n', 'utf-8');
  }

  return { file: profile.file, added };
}

/**
 * Shell startup files to keep in sync
 */
export function profilesFor(platform: Platform, home: string): ShellProfile[] {
  const profiles: ShellProfile[] =
    platform === 'darwin'
      ? [
          { file: path.join(home, '.zshrc'), syntax: 'posix' },
          { file: path.join(home, '.bashrc'), syntax: 'posix' },
        ]
      : [{ file: path.join(home, '.bashrc'), syntax: 'posix' }];

  const fishConfig = path.join(home, '.config', 'fish', 'config.fish');
  if (fileExists(fishConfig)) {
    profiles.push({ file: fishConfig, syntax: 'fish' });
  }
  return profiles;
}

/**
 * Record an entry and make it effective for the rest of this run
 */
export function extendPath(ctx: InstallContext, entry: PathEntry): void {
  addToPlan(ctx.plan, entry);
  applyToEnv(ctx.env, entry);
}

/**
 * Put the bin directory on PATH and write every planned entry to the shell profiles
 */
export function wirePath(ctx: InstallContext): ProfileUpdate[] {
  extendPath(ctx, { dirs: [ctx.config.binDir], position: 'prepend' });

  const updates = profilesFor(ctx.config.platform, ctx.config.home).map((profile) =>
    reconcileProfile(profile, ctx.plan, { dryRun: ctx.config.dryRun })
  );

  for (const update of updates) {
    for (const line of update.added) {
      ctx.print(`  ${ctx.config.dryRun ? 'would append' : 'appended'} to ${update.file}: ${line}`);
    }
  }
  return updates;
}
