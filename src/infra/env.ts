import { z, ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';

/** Longest delay a Node.js timer accepts, in ms and in whole seconds */
export const MAX_TIMER_MS = 2_147_483_647;
export const MAX_TIMER_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

/**
 * Environment variable schema with strict validation.
 * CLI flags override these values; see infra/runConfig.ts.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: optionalString,

  // Inventory
  FLEET_INVENTORY: z.string().min(1).default('./inventory/hosts'),
  FLEET_INVENTORY_GROUP: z.string().min(1).default('deployment_boxes'),
  FLEET_RELAY: optionalString,

  // Remote command
  FLEET_COMMAND_TEMPLATE: optionalString,

  // Worker pool
  FLEET_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1, { message: 'FLEET_CONCURRENCY must be at least 1' })
    .default(10),
  FLEET_DISPATCH_STAGGER_MS: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_TIMER_MS, { message: `FLEET_DISPATCH_STAGGER_MS must be at most ${MAX_TIMER_MS}` })
    .default(100),

  // Retry policy
  FLEET_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  FLEET_RETRY_DELAY_SECONDS: z.coerce
    .number()
    .min(0)
    .max(MAX_TIMER_SECONDS, { message: `FLEET_RETRY_DELAY_SECONDS must be at most ${MAX_TIMER_SECONDS}` })
    .default(10),
  FLEET_RETRY_DELAY_MODE: z.enum(['fixed', 'linear']).default('fixed'),
  FLEET_MAX_RETRY_DELAY_SECONDS: z.coerce
    .number()
    .min(0)
    .max(MAX_TIMER_SECONDS, { message: `FLEET_MAX_RETRY_DELAY_SECONDS must be at most ${MAX_TIMER_SECONDS}` })
    .default(300),
  FLEET_NO_RETRY_ON: optionalString,

  // Remote executor
  FLEET_ATTEMPT_TIMEOUT_SECONDS: z.coerce
    .number()
    .int()
    .min(1, { message: 'FLEET_ATTEMPT_TIMEOUT_SECONDS must be at least 1' })
    .max(MAX_TIMER_SECONDS, { message: `FLEET_ATTEMPT_TIMEOUT_SECONDS must be at most ${MAX_TIMER_SECONDS}` })
    .default(7200),
  FLEET_SSH_BINARY: z.string().min(1).default('ssh'),
  FLEET_SSHPASS_BINARY: z.string().min(1).default('sshpass'),
  FLEET_SSH_CONNECT_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(30),

  // Output
  FLEET_LOG_DIR: z.string().min(1).default('./logs'),
  FLEET_PREFLIGHT_FILE: optionalString,
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates and parses environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Environment validation failed:\n  - ${issues.join('\n  - ')}`, {
        issues,
      });
    }
    throw error;
  }
}
