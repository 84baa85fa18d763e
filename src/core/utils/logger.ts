// Logger utility
// One winston root logger for the queue manager; each component logs through
// a child that tags entries with its name.

import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat = process.env.LOG_FORMAT || 'json';

// "12:00:01 info [load-monitor] Queue overloaded ... {"load_factor":0.9}"
const textFormat = winston.format.printf(({ level, message, timestamp, component, service, version, ...meta }) => {
  const scope = typeof component === 'string' ? ` [${component}]` : '';
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} ${level}${scope} ${message}${extra}`;
});

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    logFormat === 'json'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), textFormat)
  ),
  defaultMeta: {
    service: 'analysis-queue-manager',
    version: process.env.npm_package_version || '1.0.0',
  },
  transports: [new winston.transports.Console()],
});

if (process.env.LOG_TO_FILE === 'true') {
  const logDir = process.env.LOG_DIR || '/tmp';
  const fileFormat = winston.format.combine(winston.format.timestamp(), winston.format.json());

  logger.add(
    new winston.transports.File({
      filename: `${logDir}/queue-manager-error.log`,
      level: 'error',
      format: fileFormat,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: `${logDir}/queue-manager.log`,
      format: fileFormat,
    })
  );
}

export type LogComponent =
  | 'queue-manager'
  | 'load-monitor'
  | 'job-store'
  | 'analysis-history'
  | 'scheduler'
  | 'service';

const componentLoggers = new Map<LogComponent, winston.Logger>();

/**
 * Child logger for one component. The same instance is returned on every call,
 * so callers and tests share it.
 */
export function getComponentLogger(component: LogComponent): winston.Logger {
  let child = componentLoggers.get(component);
  if (!child) {
    child = logger.child({ component });
    componentLoggers.set(component, child);
  }
  return child;
}

export default logger;
