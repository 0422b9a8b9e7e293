import path from 'path';
import winston from 'winston';

const diagnosticFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * Diagnostics logger. Operator-facing output goes through the console
 * reporter; the console transport here only speaks when LOG_TO_CONSOLE=true.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'warn',
  format: diagnosticFormat,
  defaultMeta: { service: 'stale-account-audit' },
  transports: [
    new winston.transports.Console({
      silent: process.env.LOG_TO_CONSOLE !== 'true',
      stderrLevels: ['error', 'warn'],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple())
    })
  ]
});

/**
 * Attach the per-run diagnostic log. The file is truncated so it only holds
 * anomalies from the current run. Returns the absolute path.
 */
export function configureDiagnosticLog(filePath: string, level: string = 'warn'): string {
  const filename = path.resolve(filePath);
  logger.add(
    new winston.transports.File({
      filename,
      level,
      options: { flags: 'w' }
    })
  );
  return filename;
}

export function flushLogger(): Promise<void> {
  return new Promise(resolve => {
    logger.once('finish', () => resolve());
    logger.end();
  });
}
