import winston from 'winston';

const IS_TEST = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: IS_TEST && !process.env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.errors({ stack: true })
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
          const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          if (stack) return `${timestamp} ${level}: ${message}${extra}\n${stack}`;
          return `${timestamp} ${level}: ${message}${extra}`;
        })
      )
    })
  ]
});

type Meta = Record<string, unknown> | unknown[] | Error;

function toMeta(meta: Meta | undefined): Record<string, unknown> {
  if (meta === undefined) return {};
  if (meta instanceof Error) {
    return { error: meta.message, stack: meta.stack };
  }
  if (Array.isArray(meta)) return { items: meta };
  return meta;
}

export const log = {
  debug: (message: string, meta?: Meta) => logger.debug(message, toMeta(meta)),
  info: (message: string, meta?: Meta) => logger.info(message, toMeta(meta)),
  warn: (message: string, meta?: Meta) => logger.warn(message, toMeta(meta)),
  error: (message: string, meta?: Meta) => logger.error(message, toMeta(meta))
};
