import { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager } from '../config/ConfigManager.js';
import { LoggingConfig } from '../config/types.js';
import { ApplicationError } from '../errors/index.js';

function consoleTransport(colorize: boolean) {
  return new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize({ all: colorize }),
      winston.format.simple()
    ),
  });
}

/**
 * One rotated file per day under the configured directory, gzipped once
 * rotated and removed after `maxFiles` days
 */
function rotatingFile(
  file: LoggingConfig['file'],
  name: string,
  level?: string
) {
  return new DailyRotateFile({
    filename: `${file.path}/${name}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    maxSize: `${file.maxSizeMb}m`,
    maxFiles: `${file.maxFiles}d`,
    zippedArchive: true,
    auditFile: `${file.path}/.audit-${name}.json`,
    ...(level && { level }),
  });
}

// Usable before configuration is loaded; initializeLogger() replaces the
// transports. Jest runs with NODE_ENV=test, which keeps test output clean.
export const logger = winston.createLogger({
  level: 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [consoleTransport(true)],
});

let isInitialized = false;

/**
 * Apply level and transports from ConfigManager. Runs once per process.
 */
export function initializeLogger(): void {
  if (isInitialized) {
    return;
  }

  const { logging } = ConfigManager.getInstance().getConfig();

  logger.level = logging.level;
  logger.clear();

  if (logging.file.enabled) {
    logger.add(rotatingFile(logging.file, 'error', 'error'));
    logger.add(rotatingFile(logging.file, 'catalog'));
  }
  if (logging.console.enabled) {
    logger.add(consoleTransport(logging.console.colorize));
  }

  isInitialized = true;
  logger.info('Logger initialized', {
    level: logging.level,
    fileLogging: logging.file.enabled,
  });
}

// Access log; health probes are left out
export const requestLoggingMiddleware = morgan(
  ':remote-addr :method :url :status :res[content-length] - :response-time ms',
  {
    skip: req => req.url === '/health',
    stream: {
      write: (line: string) => {
        logger.info(line.trim());
      },
    },
  }
);

export const errorLoggingMiddleware = (
  error: Error,
  req: Request,
  _res: Response,
  next: NextFunction
): void => {
  logger.debug('Request failed', {
    message: error.message,
    ...(error instanceof ApplicationError && { code: error.code }),
    url: req.url,
    method: req.method,
    ip: req.ip,
  });

  next(error);
};
