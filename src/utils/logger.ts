import winston from 'winston';
import pino from 'pino';

// Determine environment and logger preference
const isDevelopment = !process.env.NODE_ENV || process.env.NODE_ENV === 'development';
export const loggerType = process.env.LOGGER?.toLowerCase() || (isDevelopment ? 'winston' : 'pino');
const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Winston uses ascending numbers for less important levels
const customLevels = {
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
    trace: 4
  },
  colors: {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    debug: 'blue',
    trace: 'gray'
  }
};

// Logger interface that works with both Winston and Pino
export interface Logger {
  error: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
  trace: (message: string, ...args: unknown[]) => void;
  always: (message: string, ...args: unknown[]) => void;  // Always logs regardless of level
  level: string;
}

let logger: Logger;

if (loggerType === 'winston') {
  winston.addColors(customLevels.colors);

  const winstonLogger = winston.createLogger({
    levels: customLevels.levels,
    level: logLevel,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true })
    ),
    defaultMeta: { service: 'naim-streamer-control' },
    transports: [
      new winston.transports.Console({
        format: isDevelopment
          ? winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
          : winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
          )
      })
    ]
  });

  logger = {
    error: (message: string, ...args: unknown[]) => winstonLogger.error(message, ...args),
    warn: (message: string, ...args: unknown[]) => winstonLogger.warn(message, ...args),
    info: (message: string, ...args: unknown[]) => winstonLogger.info(message, ...args),
    debug: (message: string, ...args: unknown[]) => winstonLogger.debug(message, ...args),
    // trace is one of our custom levels, so it has no typed shortcut
    trace: (message: string, ...args: unknown[]) => winstonLogger.log('trace', message, ...args),
    always: (message: string, ...args: unknown[]) => {
      winstonLogger.info(message, ...args);
    },
    get level() { return winstonLogger.level; },
    set level(level: string) { winstonLogger.level = level; }
  };
} else {
  const pinoLogger = pino({
    level: logLevel,
    base: {
      service: 'naim-streamer-control'
    },
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => {
        return { level: label };
      }
    }
  });

  // Pino wants the metadata object first
  const write = (level: 'error' | 'warn' | 'info' | 'debug' | 'trace', message: string, args: unknown[]): void => {
    const [meta] = args;
    if (meta instanceof Error) {
      pinoLogger[level]({ err: meta }, message);
    } else if (typeof meta === 'object' && meta !== null) {
      pinoLogger[level](meta, message);
    } else if (meta !== undefined) {
      pinoLogger[level]({ data: meta }, message);
    } else {
      pinoLogger[level](message);
    }
  };

  logger = {
    error: (message: string, ...args: unknown[]) => write('error', message, args),
    warn: (message: string, ...args: unknown[]) => write('warn', message, args),
    info: (message: string, ...args: unknown[]) => write('info', message, args),
    debug: (message: string, ...args: unknown[]) => write('debug', message, args),
    trace: (message: string, ...args: unknown[]) => write('trace', message, args),
    always: (message: string, ...args: unknown[]) => write('info', message, args),
    get level() { return pinoLogger.level; },
    set level(level: string) { pinoLogger.level = level; }
  };
}

export default logger;
