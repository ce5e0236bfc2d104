/**
 * Process-wide pino logger. Tools and invocations log through child
 * loggers carrying the tool name and correlation id.
 */

import { pino } from 'pino';
import { config } from '../config/index.js';

// Base logger configuration
export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    service: 'doc-query-tools',
    env: config.env,
  },
  // Connection strings and identity claims must never reach the log
  redact: ['uri', 'password', 'token', 'authorization', 'claims'],
});

/**
 * Create a child logger bound to a tool and, optionally, one invocation
 */
export function createToolLogger(context: {
  toolName: string;
  invocationId?: string;
  correlationId?: string;
}): pino.Logger {
  return logger.child(context);
}

export type Logger = pino.Logger;
