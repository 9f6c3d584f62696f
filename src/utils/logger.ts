import winston from 'winston';
import path from 'path';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for each level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(colors);

const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, ...meta } = info;
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${extra}`;
  }),
);

// File transports only when a log directory is configured
function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [new winston.transports.Console()];
  const logDir = process.env.LOG_DIR;
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'errors.log'),
        level: 'error',
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
      }),
    );
  }
  return transports;
}

function resolveLevel(): string {
  if (process.env.LOG_LEVEL && process.env.LOG_LEVEL in levels) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'production' ? 'warn' : 'debug';
}

const logger = winston.createLogger({
  level: resolveLevel(),
  levels,
  format,
  transports: buildTransports(),
  silent: process.env.NODE_ENV === 'test',
});

export default logger;
