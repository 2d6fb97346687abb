import winston from 'winston';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

winston.addColors({
  info: 'green',
  debug: 'magenta',
  warn: 'yellow',
  error: 'red',
});

function formatMeta(meta: Record<string, unknown>): string {
  return Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, null, 0)}` : '';
}

const plainLine = winston.format.printf((info) => {
  const { level, message, timestamp, ...meta } = info;
  return `${String(timestamp)} ${level.toUpperCase()}: ${String(message)}${formatMeta(meta)}`;
});

const coloredLine = winston.format.printf((info) => {
  const { level, message, timestamp, ...meta } = info;
  const coloredLevel = winston.format.colorize().colorize(level, `${level.toLowerCase()}:`);
  return `${String(timestamp)} ${coloredLevel} ${String(message)}${formatMeta(meta)}`;
});

/**
 * Shared router logger. It has no sinks and stays silent until the host
 * application opts in with {@link enableConsoleLogging} or
 * {@link enableFileLogging}, so importing the library never touches the
 * filesystem.
 */
const logger = winston.createLogger({
  level: process.env.BUCKET_ROUTER_LOG_LEVEL || 'info',
  format: winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
  silent: true,
  transports: [],
});

let consoleTransportAdded = false;
export const enableConsoleLogging = (): void => {
  if (consoleTransportAdded) return;
  logger.add(
    new winston.transports.Console({
      format: coloredLine,
      silent:
        process.env.BUCKET_ROUTER_SILENT === 'true' || process.env.BUCKET_ROUTER_SILENT === '1',
    })
  );
  // Console logging defaults to debug unless overridden via env
  logger.level = (process.env.BUCKET_ROUTER_LOG_LEVEL || 'debug').toLowerCase();
  logger.silent = false;
  consoleTransportAdded = true;
};

let fileTransportsAdded = false;
/**
 * Writes `router.log` and `error.log` into `logsDir`, by default a `logs/`
 * directory next to the package sources.
 */
export const enableFileLogging = (
  logsDir: string = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'logs')
): void => {
  if (fileTransportsAdded) return;
  fs.mkdirSync(logsDir, { recursive: true });
  logger.add(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: plainLine,
    })
  );
  logger.add(new winston.transports.File({ filename: path.join(logsDir, 'router.log'), format: plainLine }));
  logger.silent = false;
  fileTransportsAdded = true;
};

export default logger;
