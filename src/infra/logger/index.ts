/**
 * Logger factory using Pino
 * Structured JSON logs in production, pino-pretty everywhere else
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

/**
 * Shared by the application logger and Fastify's request logger
 */
export const PRETTY_TRANSPORT = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
};

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'songshare-server',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
    ...(finalConfig.pretty === true && { transport: PRETTY_TRANSPORT }),
  };

  return pinoLib(options);
};

export { type Logger } from 'pino';
