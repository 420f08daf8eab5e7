/**
 * OneListForAll wordlist checkout
 */

import * as path from 'path';
import { WORDLIST_DIR_NAME, WORDLIST_SOURCES } from '../config/index.js';
import { assertSuccess, logger, succeeded } from '../utils/index.js';
import type { CommandResult, CommandSpec } from '../utils/index.js';
import { say } from './context.js';
import { directoryExists } from './detector.js';
import type { InstallContext } from './types.js';

export type WordlistAction = 'cloned' | 'updated';

export function wordlistDir(ctx: InstallContext): string {
  return path.join(ctx.config.srcDir, WORDLIST_DIR_NAME);
}

/**
 * Clone the wordlists, or fast-forward an existing checkout.
 * Sources are tried in order; the first clone that works wins.
 */
export async function syncWordlists(
  ctx: InstallContext,
  sources: string[] = WORDLIST_SOURCES
): Promise<WordlistAction> {
  say(ctx, 'Fetching OneListForAll wordlists…');
  const target = wordlistDir(ctx);

  if (directoryExists(target)) {
    const spec: CommandSpec = { command: 'git', args: ['pull', '--ff-only'], cwd: target, env: ctx.env };
    assertSuccess(await ctx.runner.run(spec), spec);
    return 'updated';
  }

  let lastSpec: CommandSpec | null = null;
  let lastResult: CommandResult | null = null;
  for (const url of sources) {
    lastSpec = { command: 'git', args: ['clone', '--depth=1', url, target], env: ctx.env };
    lastResult = await ctx.runner.run(lastSpec);
    if (succeeded(lastResult)) {
      logger.info('Cloned wordlists', { url, target });
      return 'cloned';
    }
    logger.warn('Wordlist clone failed', { url, exitCode: lastResult.exitCode });
  }

  if (lastSpec && lastResult) {
    assertSuccess(lastResult, lastSpec);
  }
  throw new Error('No wordlist sources configured');
}
