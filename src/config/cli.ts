import { ConfigError } from '../utils/index.js';
import { cliOptionsSchema, type CliOptions } from './schema.js';

const BOOLEAN_FLAGS = new Map<string, keyof Omit<CliOptions, 'toolsDir'>>([
  ['--dry-run', 'dryRun'],
  ['-n', 'dryRun'],
  ['--force', 'force'],
  ['-f', 'force'],
  ['--strict', 'strict'],
  ['--skip-wordlists', 'skipWordlists'],
  ['--verbose', 'verbose'],
  ['-v', 'verbose'],
  ['--list', 'list'],
  ['-l', 'list'],
  ['--help', 'help'],
  ['-h', 'help'],
  ['--version', 'version'],
]);

/**
 * Parse CLI arguments (without the node and script entries)
 */
export function parseArgs(args: string[]): CliOptions {
  const raw: Record<string, unknown> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--tools-dir' || arg === '-t') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new ConfigError(`${arg} needs a directory`);
      }
      raw.toolsDir = value;
      i++;
      continue;
    }

    if (arg.startsWith('--tools-dir=')) {
      raw.toolsDir = arg.slice('--tools-dir='.length);
      continue;
    }

    const flag = BOOLEAN_FLAGS.get(arg);
    if (!flag) {
      throw new ConfigError(`Unknown option: ${arg}`);
    }
    raw[flag] = true;
  }

  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}
