import winston from 'winston';
import { env } from './environment';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: logFormat,
  defaultMeta: { service: 'fabric-order-ledger-api' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
          const scope = typeof component === 'string' ? ` (${component})` : '';
          const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
          return `${timestamp} [${level}]${scope}: ${message}${metaStr}`;
        })
      ),
    }),
  ],
});

// In production, also log to files
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: 'logs/ledger.log',
      maxsize: 5242880, // 5MB
      maxFiles: 10,
    })
  );
}

// Suppress logs in test environment
if (env.NODE_ENV === 'test') {
  logger.transports.forEach((t) => (t.silent = true));
}

/**
 * Logger tagged with the component that emits the entries
 * (e.g. `InvoiceService`, `LedgerRepository`).
 */
export const componentLogger = (component: string): winston.Logger => logger.child({ component });

export default logger;
