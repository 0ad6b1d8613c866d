// src/infra/logger/index.ts
import winston from 'winston';
import { LOG_CONFIG, APP_VERSION, SERVICE_NAME } from '../../shared/constants';
import dotenv from 'dotenv';
dotenv.config();

// --- SECRET REDACTION LOGIC ---

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'authorization', 'cookie', 'jwt'];

/**
 * Recursively masks sensitive values in log metadata.
 */
export function redactObject(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactObject);
  if (value instanceof Error || value instanceof Date) return value;
  if (typeof value === 'object' && value !== null) {
    const result: Record<string | symbol, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const lowerKey = key.toLowerCase();
      result[key] = SENSITIVE_KEYS.some((k) => lowerKey.includes(k))
        ? '[REDACTED]'
        : redactObject(entry);
    }
    // winston keeps level/message under symbols
    for (const sym of Object.getOwnPropertySymbols(value)) {
      result[sym] = Reflect.get(value, sym);
    }
    return result;
  }
  return value;
}

const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    const lowerKey = key.toLowerCase();
    info[key] = SENSITIVE_KEYS.some((k) => lowerKey.includes(k))
      ? '[REDACTED]'
      : redactObject(info[key]);
  }
  return info;
});

// ------------------------------

const developmentFormat = winston.format.combine(
  redactSecrets(),
  winston.format.colorize(),
  winston.format.timestamp({ format: LOG_CONFIG.DATE_FORMAT }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr =
      Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
    return `${timestamp} [${level}]: ${message}${metaStr}`;
  })
);

const productionFormat = winston.format.combine(
  redactSecrets(),
  winston.format.timestamp({ format: LOG_CONFIG.DATE_FORMAT }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * Reads the environment directly: the logger must work before
 * ConfigManager has validated anything.
 */
function createLogger() {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const logLevel = process.env.LOG_LEVEL || 'info';
  const isTest = nodeEnv === 'test';

  return winston.createLogger({
    level: logLevel,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: nodeEnv,
      version: APP_VERSION,
    },
    transports: [
      new winston.transports.Console({
        format: nodeEnv === 'production' ? productionFormat : developmentFormat,
        silent: isTest,
      }),
      ...(isTest
        ? []
        : [
            new winston.transports.File({
              filename: 'logs/error.log',
              level: 'error',
              maxsize: LOG_CONFIG.MAX_SIZE,
              maxFiles: LOG_CONFIG.MAX_FILES,
              format: productionFormat,
            }),
            new winston.transports.File({
              filename: 'logs/combined.log',
              maxsize: LOG_CONFIG.MAX_SIZE,
              maxFiles: LOG_CONFIG.MAX_FILES,
              format: productionFormat,
            }),
          ]),
    ],
    exitOnError: false,
  });
}

export const logger = createLogger();

/**
 * Applies the level from the loaded configuration. Unknown levels keep the
 * current one.
 */
export function setLogLevel(level: string): void {
  if (level in winston.config.npm.levels) {
    logger.level = level;
    return;
  }
  logger.warn(`Unknown log level '${level}', keeping '${logger.level}'`);
}
