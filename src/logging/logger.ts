import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager } from '../config/ConfigManager.js';

// Create logger with default config first to avoid circular dependency
// Will be configured properly during initializeLogger()
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    // Default console transport for early initialization logs
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

let isInitialized = false;

/**
 * Initialize logger with configuration from ConfigManager
 * Must be called after ConfigManager is fully initialized
 */
export function initializeLogger(): void {
  if (isInitialized) {
    return;
  }

  const config = ConfigManager.getInstance().getLoggingConfig();

  logger.level = config.level;
  logger.clear();

  if (config.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: `${config.file.maxSize}m`,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/catalog-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: `${config.file.maxSize}m`,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-catalog.json`,
      })
    );
  }

  if (config.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  // winston warns when writing with no transports at all
  if (logger.transports.length === 0) {
    logger.add(new winston.transports.Console({ silent: true }));
  }

  isInitialized = true;
  logger.info('Logger initialized with configuration', { level: config.level });
}
