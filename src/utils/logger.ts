import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import config from '../config';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

// Custom format for development
const devFormat = printf(({ level, message, timestamp, service, ...metadata }) => {
  let msg = `${timestamp} [${service}] ${level}: ${message}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

const isProduction = config.server.env === 'production';

const logLevel = isProduction ? 'info' : config.logging.level;

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(
      colorize(),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      isProduction ? json() : devFormat
    )
  })
];

if (isProduction) {
  transports.push(
    new DailyRotateFile({
      filename: 'logs/application-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '14d',
      level: 'info'
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error'
    })
  );
}

const logger = winston.createLogger({
  level: logLevel,
  silent: config.server.env === 'test',
  defaultMeta: {
    service: config.server.serviceName,
    environment: config.server.env
  },
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    errors({ stack: true })
  ),
  transports,
  exitOnError: false
});

const errorMeta = (error: unknown, meta?: Record<string, unknown>): Record<string, unknown> => {
  const result: Record<string, unknown> = { ...meta };

  if (error instanceof Error) {
    result.errorName = error.name;
    result.errorMessage = error.message;
    result.stack = error.stack;
  } else if (error) {
    result.error = error;
  }

  return result;
};

export const logError = (message: string, error?: unknown, meta?: Record<string, unknown>): void => {
  logger.error(message, errorMeta(error, meta));
};

export const logWarn = (message: string, meta?: Record<string, unknown>): void => {
  logger.warn(message, meta);
};

export default logger;
