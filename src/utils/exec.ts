import { spawn } from 'child_process';
import type { FailureCause } from '../types/index.js';
import { CommandError } from './errors.js';
import { logger } from './logger.js';

/** Keep this many characters of stderr for failure classification */
const STDERR_TAIL_CHARS = 64 * 1024;

export interface CommandSpec {
  command: string;
  args: string[];
  /** Full environment for the child; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Pipe stdout into the result instead of the terminal */
  capture?: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Set when the process could not be spawned at all */
  error?: NodeJS.ErrnoException;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

/**
 * Render a command line for display
 */
export function formatCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...spec.args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

/**
 * Spawns real processes. stderr is streamed to the terminal while its tail is kept.
 */
export function createCommandRunner(): CommandRunner {
  return {
    run(spec: CommandSpec): Promise<CommandResult> {
      logger.debug('Spawning command', { command: formatCommand(spec), cwd: spec.cwd });

      return new Promise((resolve) => {
        let stdout = '';
        let stderr = '';
        let settled = false;

        const settle = (result: CommandResult): void => {
          if (settled) return;
          settled = true;
          logger.debug('Command finished', {
            command: spec.command,
            exitCode: result.exitCode,
            error: result.error?.code,
          });
          resolve(result);
        };

        const child = spawn(spec.command, spec.args, {
          cwd: spec.cwd,
          env: spec.env ?? process.env,
          stdio: ['inherit', spec.capture ? 'pipe' : 'inherit', 'pipe'],
        });

        child.stdout?.setEncoding('utf-8');
        child.stdout?.on('data', (chunk: string) => {
          stdout += chunk;
        });

        child.stderr?.setEncoding('utf-8');
        child.stderr?.on('data', (chunk: string) => {
          if (!spec.capture) {
            process.stderr.write(chunk);
          }
          stderr = (stderr + chunk).slice(-STDERR_TAIL_CHARS);
        });

        child.on('error', (error: NodeJS.ErrnoException) => {
          settle({ exitCode: -1, stdout, stderr, error });
        });

        child.on('close', (code, signal) => {
          settle({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
        });
      });
    },
  };
}

/**
 * Prints each command instead of running it and reports success
 */
export function createDryRunRunner(print: (line: string) => void = console.log): CommandRunner {
  return {
    async run(spec: CommandSpec): Promise<CommandResult> {
      const where = spec.cwd ? ` (in ${spec.cwd})` : '';
      print(`  [dry-run] ${formatCommand(spec)}${where}`);
      return { exitCode: 0, stdout: '', stderr: '' };
    },
  };
}

const PERMISSION_PATTERN =
  /permission denied|operation not permitted|are you root|not in the sudoers|EACCES|EPERM|a password is required/i;

const NETWORK_PATTERN =
  /could not resolve|temporary failure in name resolution|name or service not known|network is unreachable|no route to host|connection (refused|reset|timed out)|dial tcp|i\/o timeout|tls handshake timeout|ETIMEDOUT|ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|failed to fetch/i;

/**
 * Classify why a command failed from its spawn error and stderr
 */
export function classifyFailure(result: CommandResult): FailureCause {
  const code = result.error?.code;
  if (code === 'ENOENT') {
    return 'missing-toolchain';
  }
  if (code === 'EACCES' || code === 'EPERM' || PERMISSION_PATTERN.test(result.stderr)) {
    return 'permission';
  }
  if (NETWORK_PATTERN.test(result.stderr)) {
    return 'network';
  }
  return 'command-failed';
}

export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.error;
}

/**
 * Throw a CommandError unless the command exited 0
 */
export function assertSuccess(result: CommandResult, spec: CommandSpec): void {
  if (succeeded(result)) {
    return;
  }
  const cause = classifyFailure(result);
  const reason = result.error
    ? `could not be started (${result.error.code ?? result.error.message})`
    : `exited with status ${result.exitCode}`;
  throw new CommandError(`\`${formatCommand(spec)}\` ${reason}`, cause, {
    command: spec.command,
    exitCode: result.exitCode,
  });
}
