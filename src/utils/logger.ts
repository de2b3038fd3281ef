import path from 'path';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager } from '../config/ConfigManager.js';
import { LoggingConfig } from '../config/types.js';

// Usable at import time; initializeLogger() swaps in the configured transports
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize({ all: true }), winston.format.simple()),
    }),
  ],
});

let isInitialized = false;

function rotatingFile(settings: LoggingConfig['file'], stem: string, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(settings.path, `${stem}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    ...(level && { level }),
    maxSize: `${settings.maxSizeMb}m`,
    maxFiles: `${settings.maxFiles}d`,
    zippedArchive: true,
    auditFile: path.join(settings.path, `.audit-${stem}.json`),
  });
}

/**
 * Apply the logging section of the configuration. The first call wins;
 * SubtitlePairingService makes it with its own ConfigManager.
 */
export function initializeLogger(config: ConfigManager = ConfigManager.getInstance()): void {
  if (isInitialized) {
    return;
  }

  const settings = config.getConfig().logging;

  logger.level = settings.level;
  logger.clear();

  if (settings.file.enabled) {
    logger.add(rotatingFile(settings.file, 'subpair-error', 'error'));
    logger.add(rotatingFile(settings.file, 'subpair'));
  }

  if (settings.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: settings.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  // winston warns when a message is written with no transport attached
  if (!settings.file.enabled && !settings.console.enabled) {
    logger.add(new winston.transports.Console({ silent: true }));
  }

  isInitialized = true;
  logger.debug('Logger initialized', { level: settings.level, file: settings.file.enabled });
}
