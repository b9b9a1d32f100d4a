/**
 * Client configuration from environment variables
 */

import { z } from 'zod';

export interface ClientConfig {
  host: string;
  port: number;
}

const envSchema = z.object({
  TREEPORT_HOST: z.string().min(1).default('127.0.0.1'),
  TREEPORT_PORT: z.coerce.number().int().min(1).max(65535).default(9090),
});

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return { host: parsed.data.TREEPORT_HOST, port: parsed.data.TREEPORT_PORT };
}
