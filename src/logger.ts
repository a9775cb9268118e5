/**
 * Logging configuration for SSH Console
 */

import winston from 'winston';

export interface LogFields {
  timestamp: string;
  module: string;
  level: string;
  message: string;
}

export interface LoggingOptions {
  // A winston level, or "silent"
  level?: string;
  file?: string;
  format?: string;
}

export const DEFAULT_LOG_FORMAT = '%timestamp% - %module% - %level% - %message%';

/**
 * Fills `%timestamp%`, `%module%`, `%level%` and `%message%` in a line
 * template. Unknown placeholders are left as they are.
 */
export function renderLine(template: string, fields: LogFields): string {
  return template.replace(/%(timestamp|module|level|message)%/g, (_match, name: keyof LogFields) => fields[name]);
}

let lineTemplate = DEFAULT_LOG_FORMAT;

// Custom format for timestamps
const timestampFormat = winston.format.timestamp({
  format: 'YYYY-MM-DD HH:mm:ss'
});

// Custom format for log messages; `module` comes from child loggers
const logFormat = winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
  let logMessage = renderLine(lineTemplate, {
    timestamp: String(timestamp),
    module: typeof module === 'string' ? module : 'ssh-console',
    level: level.toUpperCase(),
    message: String(message)
  });

  if (Object.keys(meta).length > 0) {
    logMessage += ` - ${JSON.stringify(meta)}`;
  }

  return logMessage;
});

// Create logger instance
const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    timestampFormat,
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn']
    })
  ]
});

let fileTransport: InstanceType<typeof winston.transports.File> | undefined;

/**
 * Applies level, line format and log file. Applications call this once at
 * startup; child loggers created earlier pick the settings up.
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.level !== undefined) {
    const level = options.level.toLowerCase();
    logger.silent = level === 'silent';
    logger.level = level === 'silent' ? 'error' : level;
  }

  if (options.format !== undefined) {
    lineTemplate = options.format;
  }

  if (options.file !== undefined) {
    if (fileTransport) {
      logger.remove(fileTransport);
      fileTransport = undefined;
    }
    if (options.file) {
      fileTransport = new winston.transports.File({ filename: options.file });
      logger.add(fileTransport);
    }
  }
}

// Create child loggers for different modules
export const createLogger = (module: string) => {
  return logger.child({ module });
};

// Export default logger
export { logger };
