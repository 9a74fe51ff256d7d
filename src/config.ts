/**
 * Configuration validation for the task library and the CLI.
 */
import { z } from 'zod';

export const ConfigSchema = z.object({
  settingsDirectory: z.string().min(1).default('./settings'),
  userDataPath: z.string().min(1).default('.'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw ?? {});
}

const ENV_KEYS = {
  settingsDirectory: 'SCAN_TASKS_SETTINGS_DIR',
  userDataPath: 'SCAN_TASKS_DATA_DIR',
  logLevel: 'SCAN_TASKS_LOG_LEVEL',
} as const satisfies Record<keyof Config, string>;

/** Build a config from environment variables; unset variables keep their defaults. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, string> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  return parseConfig(raw);
}
