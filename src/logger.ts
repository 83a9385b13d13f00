import env from 'env-var';
import { inspect, type InspectOptions } from 'node:util';
import { createLogger, format, transports } from 'winston';

const LOG_LEVEL = env.get('LOG_LEVEL').default('debug').asEnum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']);

const LOG_FORMAT = env.get('LOG_FORMAT').default('simple').asEnum(['simple', 'json']);

const consoleFormat = format.combine(
  format.errors({ stack: true }),
  format((info) => {
    info.level = info.level.slice(0, 1).toUpperCase();
    return info;
  })(),
  format.colorize(),
  format.timestamp({ format: 'HH:mm:ss.SSS' }),
  format.printf(({ level, message, timestamp, stack }) =>
    stack ? `${timestamp} [${level}]: ${message}\n${stack}` : `${timestamp} [${level}]: ${message}`,
  ),
);

const baseLogger = createLogger({
  level: LOG_LEVEL,
  format: LOG_FORMAT === 'json' ? format.combine(format.errors({ stack: true }), format.json()) : consoleFormat,
  transports: [new transports.Console({ stderrLevels: ['error', 'warn'] })],
});

const logger = Object.assign(baseLogger, {
  dir(obj: unknown, options: Partial<InspectOptions> = {}) {
    baseLogger.debug(inspect(obj, { colors: LOG_FORMAT !== 'json', depth: 2, ...options }));
  },
});

export type Logger = typeof logger;

export { logger };
