import pino from 'pino';
import { logLevelSchema, nodeEnvSchema } from '../config/validation.js';

const level = logLevelSchema.catch('info').parse(process.env.LOG_LEVEL);
const nodeEnv = nodeEnvSchema.catch('development').parse(process.env.NODE_ENV);

export const logger = pino({
  level,
  transport:
    nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});
