import { resolve } from 'node:path';
import { z } from 'zod';

const unsetIfEmpty = (v: unknown) => (v === '' ? undefined : v);

const EnvSchema = z.object({
  PROJECT_DIR: z.preprocess(unsetIfEmpty, z.string().default('projects')),
  ACTIVE_PROJECT: z.preprocess(unsetIfEmpty, z.string().optional()),
  HOST: z.preprocess(unsetIfEmpty, z.string().default('0.0.0.0')),
  PORT: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(0).max(65535).default(8765)),
  WS_HEARTBEAT_MS: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(0).default(20_000)),
  APP_VERSION: z.preprocess(unsetIfEmpty, z.string().default('dev')),
});

export interface ServerConfig {
  projectPath: string;
  activeProject?: string;
  host: string;
  port: number;
  heartbeatMs: number;
  version: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Read server settings from the environment. A first positional argument
 * overrides PROJECT_DIR.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  args: string[] = process.argv.slice(2),
): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    projectPath: resolve(args[0] ?? e.PROJECT_DIR),
    activeProject: e.ACTIVE_PROJECT,
    host: e.HOST,
    port: e.PORT,
    heartbeatMs: e.WS_HEARTBEAT_MS,
    version: e.APP_VERSION,
  };
}
