/**
 * Structured logger built on Pino.
 *
 * Pretty-print in development, JSON in production, silent under the test runner.
 */

import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTestRun = process.env.VITEST !== undefined;
const isEnabled = process.env.ENABLE_OBSERVABILITY !== 'false' && !isTestRun;
const logLevel = process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug');

const baseLogger = pino({
  level: isEnabled ? logLevel : 'silent',
  ...(isProduction || !isEnabled
    ? {
        formatters: { level: (label: string) => ({ level: label }) },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' },
        },
      }),
});

export const logger = baseLogger;

export type ModuleLogger = pino.Logger;

/** `level` overrides the root level for this module unless logging is disabled. */
export function createModuleLogger(module: string, level?: pino.LevelWithSilent): ModuleLogger {
  const child = logger.child({ module });
  if (isEnabled && level) {
    child.level = level;
  }
  return child;
}
