/**
 * Logger
 * 
 * Pino-based structured logger shared by the engine packages. The API
 * builds its Fastify logger from the same options with its own service name.
 */

import { pino, type LoggerOptions } from 'pino';

export interface LoggerSettings {
  service: string;
  level: string;
  env: string;
}

export function loggerSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  return {
    service: env['LOG_SERVICE'] ?? 'mediakit',
    level: env['LOG_LEVEL'] ?? 'info',
    env: env['NODE_ENV'] ?? 'development',
  };
}

/**
 * JSON lines with ISO timestamps; pretty-printed in development
 */
export function buildLoggerOptions(settings: LoggerSettings): LoggerOptions {
  return {
    level: settings.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: settings.service,
      env: settings.env,
    },
    transport: settings.env === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  };
}

export const logger = pino(buildLoggerOptions(loggerSettingsFromEnv()));

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
