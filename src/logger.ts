/**
 * Logger configuration using Pino.
 *
 * Logs go to stderr so that record listings on stdout stay clean.
 * `LOG_LEVEL` sets the level, `LOG_PRETTY=false` switches to JSON lines.
 */
import pino, { type Logger, type LoggerOptions } from 'pino';
import { z } from 'zod';

export const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

interface LogSettings {
  level: LogLevel;
  pretty: boolean;
}

function settingsFromEnv(env: NodeJS.ProcessEnv): LogSettings {
  const level = logLevelSchema.safeParse(env['LOG_LEVEL']?.toLowerCase());
  return {
    level: level.success ? level.data : 'info',
    pretty: env['LOG_PRETTY'] !== 'false',
  };
}

function createLogger(settings: LogSettings): Logger {
  const options: LoggerOptions = {
    level: settings.level,
    base: { app: 'porkbun-ddns' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (settings.pretty && settings.level !== 'silent') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'app,service',
          messageFormat: '{if service}[{service}] {end}{msg}',
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

export const logger = createLogger(settingsFromEnv(process.env));

const children = new Set<Logger>();

/**
 * Set the level of the root logger and of every logger made by
 * `createChildLogger`. Children copy the level when created, so each is updated.
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  const child = logger.child(bindings);
  children.add(child);
  return child;
}
