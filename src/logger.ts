import path from 'node:path';
import winston from 'winston';
import { config } from './config.js';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const FILE_MAX_BYTES = 5 * 1024 * 1024;
const FILE_MAX_COUNT = 5;

// Single line: "<time> [<level>]: <message> {meta}" plus an optional stack
const lineFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  let line = `${timestamp} [${level}]: ${message}`;
  if (stack) {
    line += `\n${stack}`;
  }
  if (Object.keys(meta).length > 0) {
    line += ` ${JSON.stringify(meta)}`;
  }
  return line;
});

function createFileTransports(dir: string) {
  // Files get one JSON object per line
  const format = combine(timestamp(), json());
  return [
    new winston.transports.File({
      filename: path.join(dir, 'error.log'),
      level: 'error',
      format,
      maxsize: FILE_MAX_BYTES,
      maxFiles: FILE_MAX_COUNT,
    }),
    new winston.transports.File({
      filename: path.join(dir, 'engine.log'),
      format,
      maxsize: FILE_MAX_BYTES,
      maxFiles: FILE_MAX_COUNT,
    }),
  ];
}

const consoleTransport = new winston.transports.Console({
  format: combine(colorize(), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), lineFormat),
});

export const logger = winston.createLogger({
  level: config.logging.level,
  format: errors({ stack: true }),
  transports: config.logging.toFile
    ? [consoleTransport, ...createFileTransports(config.logging.dir)]
    : [consoleTransport],
});

// Mask sensitive data in logs
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '****';
  }
  return `${secret.substring(0, 4)}****${secret.substring(secret.length - 4)}`;
}
