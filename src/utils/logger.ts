import winston from 'winston';
import type { LoggingConfig } from '../config/index.js';

const logger = winston.createLogger({
  level: 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'jira-command-server' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
    }),
  ],
});

/** Apply the loaded logging configuration: level and optional log file. */
export function configureLogger(config: LoggingConfig): void {
  logger.level = config.level;
  if (config.file) {
    logger.add(new winston.transports.File({ filename: config.file }));
  }
}

export default logger;
