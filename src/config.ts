/**
 * @fileoverview Service configuration read from the environment
 * @module @tasklane/platform/config
 */

import { z } from 'zod';
import { ValidationError } from '@tasklane/errors';
import { formatZodErrors } from '@tasklane/validation';
import { CLICKUP_API_BASE } from '@tasklane/integrations';
import { LOG_LEVELS } from '@tasklane/logger';

const portSchema = z.coerce.number().int().min(1).max(65535);

export const EnvSchema = z.object({
  CLICKUP_API_KEY: z.string({ required_error: 'CLICKUP_API_KEY is required' }).regex(/\S/, 'CLICKUP_API_KEY is required'),
  CLICKUP_BASE_URL: z.string().url().default(CLICKUP_API_BASE),
  CLICKUP_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  PORT: portSchema.default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type ServiceConfig = z.infer<typeof EnvSchema>;

/**
 * Reads and validates service configuration.
 *
 * Empty variables count as unset, so `PORT=` falls back to the default.
 * @throws ValidationError naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ValidationError('Invalid environment configuration', formatZodErrors(result.error));
  }
  return result.data;
}
