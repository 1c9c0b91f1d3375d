// src/config.ts
// Runtime settings, read from the environment (optionally via a .env file)

import * as dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((v) => v === true || v === 'true' || v === '1' || v === 'yes');

export const SettingsSchema = z.object({
  /** Deep-copy resolved inputs before handing them to a node's builder. */
  copyInputs: booleanFlag.default(false),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  /** gzip level used for binary payloads on the wire. */
  compressionLevel: z.coerce.number().int().min(0).max(9).default(6),
  /** Device tag written for binary tensors that do not carry one. */
  defaultDevice: z.string().min(1).default('cpu'),
});

export type Settings = z.output<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

const ENV_KEYS: Record<keyof Settings, string> = {
  copyInputs: 'GRAPHLOOM_COPY_INPUTS',
  logLevel: 'GRAPHLOOM_LOG_LEVEL',
  compressionLevel: 'GRAPHLOOM_COMPRESSION_LEVEL',
  defaultDevice: 'GRAPHLOOM_DEFAULT_DEVICE',
};

export interface LoadSettingsOptions {
  env?: Record<string, string | undefined>;
  /** When given, the file is loaded into `process.env` first. */
  dotenvPath?: string;
}

let _settings: Settings | null = null;

/**
 * Build settings from environment variables. Unset variables fall back to
 * schema defaults; invalid ones throw a ZodError.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  if (options.dotenvPath) {
    dotenv.config({ path: options.dotenvPath });
  }
  const env = options.env ?? process.env;

  const raw: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  _settings = SettingsSchema.parse(raw);
  return _settings;
}

export function getSettings(): Settings {
  if (!_settings) {
    _settings = loadSettings();
  }
  return _settings;
}

export function updateSettings(partial: SettingsInput): Settings {
  _settings = SettingsSchema.parse({ ...getSettings(), ...partial });
  return _settings;
}

/**
 * Drop cached settings so the next read goes back to the environment.
 */
export function resetSettings(): void {
  _settings = null;
}
