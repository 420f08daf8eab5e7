import pino from 'pino';
import { LOG_LEVELS, type LogLevel } from '../types/index.js';

const DEFAULT_LEVEL: LogLevel = 'warn';

/**
 * Read the level from RECON_BOOTSTRAP_LOG_LEVEL, falling back to warn
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.RECON_BOOTSTRAP_LOG_LEVEL?.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === raw);
  return match ?? DEFAULT_LEVEL;
}

/**
 * Structured diagnostics on stderr.
 * stdout is reserved for the progress lines and the summary.
 */
export class Logger {
  private readonly pino: pino.Logger;
  private current: LogLevel;

  constructor(level: LogLevel = levelFromEnv()) {
    this.current = level;
    this.pino = pino(
      {
        name: 'recon-bootstrap',
        level,
        base: undefined,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ fd: 2, sync: true })
    );
  }

  get level(): LogLevel {
    return this.current;
  }

  setLevel(level: LogLevel): void {
    this.current = level;
    this.pino.level = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.pino.debug(context ?? {}, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.pino.info(context ?? {}, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.pino.warn(context ?? {}, message);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.pino.error(context ?? {}, message);
  }
}

export const logger = new Logger();
