import { z } from 'zod';

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATA_DIR: z.string().min(1).default('./data/sales'),
  STORAGE: z.enum(['memory', 'filesystem']).default('filesystem'),
  LOG_REQUESTS: z.enum(['true', 'false']).default('true').transform((value) => value === 'true'),
});

export type ServerConfig = z.infer<typeof configSchema>;

/**
 * Read server settings from environment variables
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
}
