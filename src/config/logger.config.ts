import winston from 'winston';
import { config } from './env.config';

const { combine, timestamp, printf, colorize } = winston.format;

const lineFormat = printf(({ level, message, timestamp: time, scope }) => {
  const prefix = typeof scope === 'string' ? `[${scope}] ` : '';
  return `${String(time)} ${level}: ${prefix}${String(message)}`;
});

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: combine(colorize(), timestamp(), lineFormat),
  transports: [new winston.transports.Console()],
});

/** The subset of the winston logger the registry and store depend on. */
export interface SimpleLogger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export const scopedLogger = (scope: string): winston.Logger => logger.child({ scope });
