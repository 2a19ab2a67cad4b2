/**
 * Logging with Pino. Level and output format come from the env config.
 */

import pino, { type Logger } from 'pino';
import { getEnvConfig, type EnvConfig } from '@/core/env';

export function createLogger(env: Pick<EnvConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return pino({
    level: env.logLevel,
    transport:
      env.nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  });
}

export const logger = createLogger(getEnvConfig());

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
