import winston from 'winston';
import LokiTransport from 'winston-loki';

const logLevel = process.env.LOG_LEVEL || 'info';
const serviceName = process.env.SERVICE_NAME || 'tutorbot';
const lokiUrl = process.env.LOKI_URL || 'http://localhost:3100';

// Create base logger with multiple transports
const transports: winston.transport[] = [
  // Console transport with high-density format
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.printf(({ timestamp, level, service, message, ...meta }) => {
        // Skip pid and nodeVersion
        const { pid: _pid, nodeVersion: _nodeVersion, ...cleanMeta } = meta;

        // Collapse message to single line
        const cleanMessage = String(message).replace(/\n/g, ' ').replace(/\s+/g, ' ').trim();

        // Only show meta if it has meaningful content
        const hasUsefulMeta =
          Object.keys(cleanMeta).length > 0 &&
          !Object.values(cleanMeta).every((v) => v === undefined || v === null);

        const metaStr = hasUsefulMeta ? ` ${JSON.stringify(cleanMeta)}` : '';

        // Short service names
        const shortService = String(service || 'unknown')
          .replace('@tutorbot/', '')
          .substring(0, 8);

        return `${timestamp} ${level} ${shortService}: ${cleanMessage}${metaStr}`;
      })
    ),
  }),
];

// Add Loki transport if URL is configured
if (process.env.LOKI_URL && process.env.LOKI_URL !== 'disabled') {
  transports.push(
    new LokiTransport({
      host: lokiUrl,
      labels: {
        service: serviceName,
        environment: process.env.NODE_ENV || 'development',
        host: process.env.HOSTNAME || 'localhost',
      },
      json: true,
      format: winston.format.json(),
      replaceTimestamp: true,
      onConnectionError: (err: unknown) => {
        console.error('Loki connection error:', err);
      },
    })
  );
}

// Add file transports in production
if (process.env.NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 5242880,
      maxFiles: 5,
      format: winston.format.json(),
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      maxsize: 5242880,
      maxFiles: 5,
      format: winston.format.json(),
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: serviceName,
    pid: process.pid,
    nodeVersion: process.version,
  },
  transports,
});

export interface LogMetrics {
  duration?: number;
  userId?: string;
  success?: boolean;
  error?: string;
}

/**
 * Logger bound to one chat user. Every line it writes carries `userId`, so
 * a single conversation can be followed through the logs.
 */
export function createUserLogger(userId: string): winston.Logger {
  return logger.child({ userId });
}

// Performance monitoring utilities
export const performanceLogger = {
  startTimer: (label: string) => {
    const start = process.hrtime.bigint();
    return {
      end: (meta?: LogMetrics) => {
        const duration = Number(process.hrtime.bigint() - start) / 1000000; // Convert to ms
        logger.info(`${label} completed`, {
          ...meta,
          duration: Math.round(duration),
          memoryUsage: process.memoryUsage().heapUsed,
        });
        return duration;
      },
    };
  },

  measureAsync: async <T>(label: string, fn: () => Promise<T>, meta?: LogMetrics): Promise<T> => {
    const timer = performanceLogger.startTimer(label);
    try {
      const result = await fn();
      timer.end({ ...meta, success: true });
      return result;
    } catch (error) {
      timer.end({
        ...meta,
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  },
};

export default logger;
