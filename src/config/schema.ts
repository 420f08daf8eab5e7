import { z } from 'zod';
import { LOG_LEVELS, PLATFORMS } from '../types/index.js';

/**
 * Full configuration schema
 */
export const configSchema = z.object({
  toolsDir: z.string().min(1, 'Tools directory is required'),
  binDir: z.string().min(1),
  srcDir: z.string().min(1),
  home: z.string().min(1, 'Home directory is required'),
  platform: z.enum(PLATFORMS),
  arch: z.string().min(1),
  uid: z.number().int().min(0),
  dryRun: z.boolean(),
  force: z.boolean(),
  strict: z.boolean(),
  skipWordlists: z.boolean(),
  logLevel: z.enum(LOG_LEVELS),
});

/**
 * Parsed command-line flags
 */
export const cliOptionsSchema = z.object({
  toolsDir: z.string().min(1, '--tools-dir needs a directory').optional(),
  dryRun: z.boolean().default(false),
  force: z.boolean().default(false),
  strict: z.boolean().default(false),
  skipWordlists: z.boolean().default(false),
  verbose: z.boolean().default(false),
  list: z.boolean().default(false),
  help: z.boolean().default(false),
  version: z.boolean().default(false),
});

export type ValidatedConfig = z.infer<typeof configSchema>;
export type CliOptions = z.infer<typeof cliOptionsSchema>;
