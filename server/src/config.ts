import { z } from 'zod';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';

// server/src -> project root
const projectRoot = fileURLToPath(new URL('../../', import.meta.url));

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    DB_URL: z.string().default(join(projectRoot, 'data/archive.db')),
    ARCHIVE_ROOT: z.string().default(projectRoot),
    THUMBNAILS_DIR: z.string().default(join(projectRoot, 'data/thumbnails')),
    RAW_DIR: z.string().default(join(projectRoot, 'data/raw')),
    ADMIN_PASSWORD: z.preprocess(emptyToUndefined, z.string().optional()),
    SESSION_SECRET: z.preprocess(emptyToUndefined, z.string().min(8).optional()),
  })
  .refine((env) => !env.ADMIN_PASSWORD || env.SESSION_SECRET, {
    message: 'SESSION_SECRET is required when ADMIN_PASSWORD is set',
    path: ['SESSION_SECRET'],
  });

export interface ServerConfig {
  env: string;
  port: number;
  dbPath: string;
  archiveRoot: string;
  thumbnailsDir: string;
  rawDir: string;
  /** Admin login is only enforced when both are present. */
  auth?: {
    password: string;
    sessionSecret: string;
  };
}

/**
 * Reads the server configuration from the environment.
 * Not cached: tests change the environment between requests.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`[Config] Invalid environment: ${details}`);
  }
  const env = parsed.data;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    dbPath: env.DB_URL === ':memory:' ? env.DB_URL : resolve(env.DB_URL),
    archiveRoot: resolve(env.ARCHIVE_ROOT),
    thumbnailsDir: resolve(env.THUMBNAILS_DIR),
    rawDir: resolve(env.RAW_DIR),
    auth:
      env.ADMIN_PASSWORD && env.SESSION_SECRET
        ? { password: env.ADMIN_PASSWORD, sessionSecret: env.SESSION_SECRET }
        : undefined,
  };
}
