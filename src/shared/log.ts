import { config } from './config';
import { createLogger, Logger } from './logger';

export function getLogger(component: string): Logger {
  return createLogger(component, config.log.level, config.log.format);
}
