import pino from 'pino';
import { config } from './config';

export type Logger = pino.Logger;

export const logger: Logger = pino({
  name: 'botworker',
  level: config.logLevel,
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
