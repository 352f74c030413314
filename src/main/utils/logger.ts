import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import type { LoggingConfig } from '../../shared/types/config';

// JSON on the console in production, readable lines everywhere else
const consoleFormat = process.env.NODE_ENV !== 'production' ? winston.format.simple() : undefined;

const logger = winston.createLogger({
  level: process.env.SNARE_LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'snare' },
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

let fileTransportsAdded = false;

export function initializeLogger(options: LoggingConfig): winston.Logger {
  logger.level = options.level;

  if (options.directory && !fileTransportsAdded) {
    if (!fs.existsSync(options.directory)) {
      fs.mkdirSync(options.directory, { recursive: true });
    }
    logger.add(
      new winston.transports.File({
        filename: path.join(options.directory, 'error.log'),
        level: 'error',
      })
    );
    logger.add(new winston.transports.File({ filename: path.join(options.directory, 'combined.log') }));
    fileTransportsAdded = true;
  }

  logger.info('Logger initialized', { level: options.level, directory: options.directory });
  return logger;
}

export { logger };
