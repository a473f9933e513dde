// Asset Registry - Server Configuration

import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().default('0.0.0.0'),
  REGISTRY_NAME: z.string().min(1).default('Ludo Tokens'),
  REGISTRY_SYMBOL: z.string().min(1).default('LUDO'),
  ADMIN_API_KEY: z.string().min(1).optional(),
  DISABLE_RATE_LIMITING: z.string().optional(),
});

export interface ServerConfig {
  port: number;
  host: string;
  registryName: string;
  registrySymbol: string;
  adminApiKey: string | null;
  enableRateLimiting: boolean;
}

/**
 * Read configuration from the environment.
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(fromZodError(parsed.error, { prefix: 'Invalid configuration' }).message);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    registryName: vars.REGISTRY_NAME,
    registrySymbol: vars.REGISTRY_SYMBOL,
    adminApiKey: vars.ADMIN_API_KEY ?? null,
    enableRateLimiting: vars.DISABLE_RATE_LIMITING !== 'true',
  };
}
