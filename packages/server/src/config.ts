/**
 * Server configuration from environment variables
 */

import { z } from 'zod';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { ServerConfig } from './types.js';

/** Directory the server package is installed in */
export const INSTALL_DIR = path.resolve(fileURLToPath(new URL('..', import.meta.url)));

const port = z.coerce.number().int().min(0).max(65535);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  TREEPORT_HOST: z.string().min(1).default('127.0.0.1'),
  TREEPORT_PORT: port.default(9090),
  TREEPORT_ROOT: z.string().min(1).optional(),
  TREEPORT_ROOT_SCOPE: z.enum(['session', 'shared']).default('session'),
  TREEPORT_CONFINE: flag.default('false'),
  TREEPORT_HEALTH_PORT: port.optional(),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  const config: ServerConfig = {
    host: values.TREEPORT_HOST,
    port: values.TREEPORT_PORT,
    root: path.resolve(values.TREEPORT_ROOT ?? INSTALL_DIR),
    rootScope: values.TREEPORT_ROOT_SCOPE,
    confine: values.TREEPORT_CONFINE,
  };

  if (values.TREEPORT_HEALTH_PORT !== undefined) {
    config.healthPort = values.TREEPORT_HEALTH_PORT;
  }

  return config;
}
