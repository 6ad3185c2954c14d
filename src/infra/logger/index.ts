/**
 * Logger factory using Pino
 * Structured JSON logging; credentials and session tokens are redacted.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'critical-minerals-api',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Paths never written to the log. Shared with the Fastify logger so request
 * logs get the same treatment.
 */
export const REDACTED_PATHS = [
  'req.headers.authorization',
  '*.password',
  '*.confirmPassword',
  '*.adminCode',
  '*.passwordHash',
  '*.password_hash',
  '*.token',
];

const prettyTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
};

/**
 * Options shared by the standalone logger and Fastify's request logger.
 */
export const buildLoggerOptions = (config: Partial<LoggerConfig> = {}): LoggerOptions => {
  const finalConfig = { ...defaultConfig, ...config };

  return {
    name: finalConfig.name,
    level: finalConfig.level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    // Use pino-pretty in development for readable logs
    ...(finalConfig.pretty === true && { transport: prettyTransport }),
  };
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  return pinoLib(buildLoggerOptions(config));
};

export { type Logger } from 'pino';
