import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import type { CountryCode } from 'libphonenumber-js';
import { DEFAULT_COUNTRY, isCountryCode } from './phonebook/normalize.js';
import { ConfigError, describeError, hasErrorCode } from './utils/index.js';

export interface AppConfig {
  dataPath: string;
  git: boolean;
  defaultCountry: CountryCode;
}

const CONFIG_DIR = path.join(os.homedir(), '.phonebook');
const DEFAULT_CONFIG_PATH = path.join(CONFIG_DIR, 'config.json');
export const DEFAULT_DATA_PATH = path.join(CONFIG_DIR, 'entries.json');

const configFileSchema = z.object({
  dataPath: z.string().min(1).optional(),
  git: z.boolean().optional(),
  defaultCountry: z.string().refine(isCountryCode, { message: 'unsupported country code' }).optional(),
});

type ConfigFile = z.infer<typeof configFileSchema>;

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

async function readConfigFile(configPath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return {};
    throw new ConfigError(`cannot read config ${configPath}: ${describeError(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid JSON in config ${configPath}: ${describeError(err)}`);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid config ${configPath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Resolve configuration from the environment and the optional config file.
 * Environment variables win over the file.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const configPath = env.PHONEBOOK_CONFIG ?? DEFAULT_CONFIG_PATH;
  const file = await readConfigFile(configPath);

  return {
    dataPath: env.PHONEBOOK_DATA ?? file.dataPath ?? DEFAULT_DATA_PATH,
    git: parseFlag(env.PHONEBOOK_GIT) ?? file.git ?? false,
    defaultCountry: file.defaultCountry ?? DEFAULT_COUNTRY,
  };
}
