import pino from 'pino';

/**
 * Environment-based log level
 */
const getLogLevel = (): pino.Level => {
  const level = process.env['LOG_LEVEL']?.toLowerCase();
  const validLevels: pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

  const match = validLevels.find((valid) => valid === level);
  if (match) {
    return match;
  }

  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
};

/**
 * Pino logger configuration
 */
const loggerConfig: pino.LoggerOptions = {
  level: getLogLevel(),
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(process.env['NODE_ENV'] !== 'production' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
};

/**
 * Main application logger
 */
export const logger = pino(loggerConfig);

/**
 * Create child logger with additional context
 */
export const createChildLogger = (context: Record<string, unknown>) => {
  return logger.child(context);
};

/**
 * Transport layer logger (codec, workers, server, client)
 */
export const transportLogger = createChildLogger({ service: 'transport' });

/**
 * Device registry logger
 */
export const registryLogger = createChildLogger({ service: 'registry' });

/**
 * Host (authoritative) passthrough service logger
 */
export const hostLogger = createChildLogger({ service: 'host' });

/**
 * Guest (mirror) registry service logger
 */
export const guestLogger = createChildLogger({ service: 'guest' });
