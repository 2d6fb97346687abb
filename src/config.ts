import { z } from 'zod';
import { ConfigError } from './errors.js';

const configSchema = z.object({
  BUCKET_ROUTER_HOST: z.string().min(1).default('127.0.0.1'),
  BUCKET_ROUTER_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
});

export type ServerConfig = {
  host: string;
  port: number;
};

/**
 * Reads listener settings from the environment. Call after `dotenv/config`
 * has been imported when values should come from a `.env` file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return {
    host: parsed.data.BUCKET_ROUTER_HOST,
    port: parsed.data.BUCKET_ROUTER_PORT,
  };
}
