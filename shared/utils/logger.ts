import winston from 'winston';

type LogMeta = Record<string, unknown>;

const environment = process.env.NODE_ENV || 'development';
const level = process.env.LOG_LEVEL || 'info';
const logDirectory = process.env.LOG_DIR || 'logs';

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
});

// Pretty console output: "12:00:01 info [analytics-pipeline:rfm]: Stage complete {...}"
const developmentFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, service, stage, ...meta }) => {
    const scope = [service, stage].filter((part) => typeof part === 'string' && part.length > 0).join(':');
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level} [${scope}]: ${message}${metaStr}`;
  })
);

const productionFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const logger = winston.createLogger({
  level,
  levels: { error: 0, warn: 1, info: 2, debug: 3 },
  format: environment === 'production' ? productionFormat : developmentFormat,
  silent: environment === 'test',
  defaultMeta: { service: 'shopper-insights' },
  transports: [new winston.transports.Console()],
  exitOnError: false,
});

if (environment === 'production') {
  logger.add(
    new winston.transports.File({
      filename: `${logDirectory}/error.log`,
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 10,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: `${logDirectory}/pipeline.log`,
      maxsize: 5242880, // 5MB
      maxFiles: 10,
    })
  );
}

/**
 * Times `fn` and logs its duration on `target`; failures are logged and rethrown.
 */
export const performanceLogger = {
  measure: async <T>(label: string, fn: () => Promise<T> | T, target: winston.Logger = logger): Promise<T> => {
    const start = Date.now();
    try {
      const result = await fn();
      target.debug(`Finished ${label}`, { duration: `${Date.now() - start}ms` });
      return result;
    } catch (error) {
      target.error(`Failed ${label}`, {
        duration: `${Date.now() - start}ms`,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  },
};

// Messages of an error and every `cause` beneath it, outermost first
const causeChain = (error: unknown): string[] => {
  const chain: string[] = [];
  let current: unknown = error;
  while (current !== undefined && chain.length < 10) {
    chain.push(current instanceof Error ? `${current.name}: ${current.message}` : String(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
};

export const errorLogger = {
  logError: (error: unknown, context?: LogMeta, target: winston.Logger = logger) => {
    target.error(error instanceof Error ? error.message : String(error), {
      causes: causeChain(error).slice(1),
      stack: error instanceof Error ? error.stack : undefined,
      context,
    });
  },
};

export const createServiceLogger = (serviceName: string): winston.Logger => {
  return logger.child({ service: serviceName });
};

// Stage measurements as structured log lines
export const metrics = {
  gauge: (name: string, value: number, tags?: LogMeta) => {
    logger.info(`${name}=${value}`, { type: 'metric', metric: 'gauge', name, value, tags });
  },

  timing: (name: string, duration: number, tags?: LogMeta) => {
    logger.info(`${name}=${duration}ms`, { type: 'metric', metric: 'timing', name, duration, tags });
  },
};

export type Logger = winston.Logger;

export default logger;
