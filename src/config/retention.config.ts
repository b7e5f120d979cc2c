import path from 'path';
import { z } from 'zod';
import { ValidationError } from '../utils/errors';

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  RETENTION_POLICY_FILE: z.string().min(1).default('config.json'),
  PORT: z.coerce.number().int().positive().default(3000),
  ADMIN_API_TOKEN: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined)),
  NODE_ENV: z.string().default('development'),
});

export interface RetentionConfig {
  discordToken: string;
  policyFile: string;
  port: number;
  /** Admin routes answer 503 when unset. */
  adminApiToken?: string;
  environment: string;
}

export function loadRetentionConfig(env: NodeJS.ProcessEnv = process.env): RetentionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError('Invalid environment configuration', parsed.error.issues);
  }
  const { DISCORD_TOKEN, RETENTION_POLICY_FILE, PORT, ADMIN_API_TOKEN, NODE_ENV } = parsed.data;
  return {
    discordToken: DISCORD_TOKEN,
    policyFile: path.resolve(RETENTION_POLICY_FILE),
    port: PORT,
    adminApiToken: ADMIN_API_TOKEN,
    environment: NODE_ENV,
  };
}
