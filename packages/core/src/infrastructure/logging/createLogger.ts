import pino from 'pino';
import type { Logger, Level } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Minimum level. Default: `LOG_LEVEL` from the environment, else `'info'`. */
  readonly level?: Level | 'silent';
  /** Human-readable output through pino-pretty instead of JSON lines. */
  readonly pretty?: boolean;
  /** Extra bindings attached to every line. */
  readonly base?: Record<string, unknown>;
}

function resolveLevel(requested?: string): string {
  return requested ?? process.env.LOG_LEVEL ?? 'info';
}

/**
 * Create the pipeline logger.
 *
 * JSON lines with ISO timestamps and the level as a label; `pretty` switches to the
 * pino-pretty transport for terminals.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: resolveLevel(options.level),
    base: { service: 'pipjoin', ...options.base },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(options.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/** A logger that discards everything. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
