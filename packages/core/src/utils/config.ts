import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';

/**
 * Centralised configuration schema for Planboard.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
// Env values arrive as strings; only 'true' and '1' switch a flag on
const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', ''])])
  .transform((value) => value === true || value === 'true' || value === '1');

export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // HTTP port for the server package
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // SQLite file path, sqlite:// URL or memory://label
  DATABASE_URI: z.string().default('./data/planboard.db'),

  DB_VERBOSE: booleanFlag.default(false),

  // Project images are written below <MEDIA_ROOT>/media
  MEDIA_ROOT: z.string().default('./data'),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg = (await loadConfig({
  schema: configSchema,
  adapters: [
    // Order matters: later adapters win -> env overrides `.env` defaults.
    dotEnvAdapter({ path: '.env', silent: true }),
    envAdapter(),
  ],
})) as AppConfig;
