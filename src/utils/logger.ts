import winston from 'winston';

export type Logger = winston.Logger;

// Console-only logger; silenced under jest unless LOG_LEVEL is set explicitly
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'bridge-relayer' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, ...metadata }) => {
          const meta = Object.keys(metadata).length > 0
            ? JSON.stringify(metadata, bigintReplacer, 2)
            : '';

          return `${timestamp} [${level}]: ${message} ${meta}`;
        })
      )
    })
  ]
});

/**
 * Child logger tagged with the component that emits the lines
 */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
