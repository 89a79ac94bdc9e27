import { config, LogLevel } from '../config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = config.logLevel;

const formatMessage = (level: LogLevel, message: string): string => {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
};

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

export const setLogLevel = (level: LogLevel): void => {
  currentLevel = level;
};

export const logger = {
  debug: (message: string): void => {
    if (enabled('debug')) {
      console.debug(formatMessage('debug', message));
    }
  },
  info: (message: string): void => {
    if (enabled('info')) {
      console.info(formatMessage('info', message));
    }
  },
  warn: (message: string): void => {
    if (enabled('warn')) {
      console.warn(formatMessage('warn', message));
    }
  },
  error: (message: string, error?: Error): void => {
    console.error(formatMessage('error', message));
    if (error && enabled('debug')) {
      console.error(error.stack || error.message);
    }
  },
};
