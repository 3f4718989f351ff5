import pino from 'pino';
import type { LoggingConfig } from '../types/index.js';

let logger: pino.Logger | null = null;

// Call sites log failures as `{ error }`, which pino only serializes for `err` by default
const baseOptions: pino.LoggerOptions = {
  name: 'tidyfs',
  serializers: {
    error: pino.stdSerializers.err,
  },
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
};

export function createLogger(config: LoggingConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    ...baseOptions,
    level: config.level,
  };

  // pino-pretty runs in a worker; skip it when nothing would be printed
  if (config.pretty && config.level !== 'silent') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname,name',
        },
      },
    });
  }

  // JSON lines on stdout
  return pino(options);
}

export function initLogger(config: LoggingConfig): void {
  logger = createLogger(config);
}

export function getLogger(): pino.Logger {
  if (!logger) {
    // Not initialized yet (library use, tests)
    logger = pino({
      ...baseOptions,
      level: process.env.LOG_LEVEL ?? 'info',
    });
  }
  return logger;
}

export function createChildLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}
