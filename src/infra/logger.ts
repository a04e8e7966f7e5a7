import winston from 'winston';
import type { Env } from './env.js';
import { redactSecrets, SECRET_KEYS } from './redact.js';

/**
 * Structured logger with secret redaction.
 * Console output for operators, JSON file output when LOG_FILE is set.
 */

export { redactSecrets };

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level') {
      continue;
    }
    info[key] = SECRET_KEYS.includes(key) ? '***REDACTED***' : redactSecrets(info[key]);
  }
  return info;
})();

/**
 * Creates a Winston logger instance
 */
export function createLogger(env: Pick<Env, 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}]: ${message}${metaStr}`;
        })
      ),
    }),
  ];

  if (env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    format: winston.format.combine(redactFormat, winston.format.errors({ stack: true })),
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance (replaced in cli.ts once the environment is validated)
 */
export let logger: winston.Logger = winston.createLogger({
  level: 'info',
  transports: [new winston.transports.Console({ silent: true })],
});

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
