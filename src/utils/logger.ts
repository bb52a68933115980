import winston from 'winston';
import path from 'path';
import { env } from '../config/env';

/**
 * Structured logging
 *
 * Console output in development, JSON files in production, silent under test.
 */

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

type LogMeta = Record<string, unknown>;

const consoleFormat = printf(({ level, message, timestamp: ts, ...metadata }) => {
  let msg = `${String(ts)} [${level}] ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(colorize(), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), consoleFormat),
  }),
];

if (env.NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: path.join(process.cwd(), 'logs', 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(process.cwd(), 'logs', 'combined.log'),
      maxsize: 5242880,
      maxFiles: 5,
    })
  );
}

const logger = winston.createLogger({
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
  silent: env.NODE_ENV === 'test',
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), json()),
  transports,
  exitOnError: false,
});

export const Logger = {
  debug(message: string, meta?: LogMeta) {
    logger.debug(message, meta);
  },

  info(message: string, meta?: LogMeta) {
    logger.info(message, meta);
  },

  warn(message: string, meta?: LogMeta) {
    logger.warn(message, meta);
  },

  error(message: string, error?: unknown, meta?: LogMeta) {
    if (error instanceof Error) {
      logger.error(message, { ...meta, error: error.message, stack: error.stack });
    } else if (error !== undefined) {
      logger.error(message, { ...meta, error });
    } else {
      logger.error(message, meta);
    }
  },

  /**
   * Agent calls, tagged with the agent name
   */
  agent(agentName: string, message: string, meta?: LogMeta) {
    logger.info(`[${agentName}] ${message}`, meta);
  },

  /**
   * Chat session events
   */
  session(sessionId: string, message: string, meta?: LogMeta) {
    logger.info(message, { sessionId, ...meta });
  },

  /**
   * Work-tracking REST operations
   */
  devops(operation: string, message: string, meta?: LogMeta) {
    logger.info(`[DevOps ${operation}] ${message}`, meta);
  },

  /**
   * Container job lifecycle
   */
  job(containerGroup: string, message: string, meta?: LogMeta) {
    logger.info(`[Job ${containerGroup}] ${message}`, meta);
  },
};

export default logger;
