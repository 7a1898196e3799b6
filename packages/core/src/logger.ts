import pino, { Logger } from 'pino';
import { AppConfig } from './config';

// Row output owns stdout; logs go to stderr.
export const createLogger = (config: AppConfig): Logger =>
  pino(
    {
      level: config.logLevel,
      base: {
        service: 'rowfold'
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination(2)
  );
