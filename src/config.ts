import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { isSupportedCountry, type CountryCode } from 'libphonenumber-js';
import {
  DEFAULT_MAX_NAME_LENGTH_DIFFERENCE,
  DEFAULT_SHARED_ORGANIZATION_THRESHOLD,
  DEFAULT_SIMILAR_NAME_THRESHOLD,
} from './contacts/dedup.js';
import { DEFAULT_COUNTRY } from './contacts/normalize.js';
import { ConfigError, isErrnoCode } from './utils/index.js';

const CONFIG_DIR = path.join(os.homedir(), '.contact-curator');
const DEFAULT_STORE_PATH = path.join(CONFIG_DIR, 'store');

const countrySchema = z.custom<CountryCode>(
  value => typeof value === 'string' && isSupportedCountry(value),
  { message: 'Unsupported country code' },
);

const configFileSchema = z.object({
  storePath: z.string().min(1).optional(),
  defaultCountry: countrySchema.optional(),
  autoRefresh: z.boolean().optional(),
  detection: z.object({
    similarNameThreshold: z.number().min(0).max(1).optional(),
    sharedOrganizationThreshold: z.number().min(0).max(1).optional(),
    maxNameLengthDifference: z.number().int().min(0).optional(),
  }).optional(),
});

export interface DetectionConfig {
  similarNameThreshold: number;
  sharedOrganizationThreshold: number;
  maxNameLengthDifference: number;
}

export interface AppConfig {
  storePath: string;
  defaultCountry: CountryCode;
  autoRefresh: boolean;
  detection: DetectionConfig;
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const configPath = env.CONTACT_CURATOR_CONFIG ?? path.join(CONFIG_DIR, 'config.json');

  let raw: string | undefined;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    // No config file yet, use defaults
    if (!isErrnoCode(err, 'ENOENT')) throw err;
  }

  let json: unknown = {};
  if (raw !== undefined) {
    try {
      json = JSON.parse(raw);
    } catch {
      throw new ConfigError(`Config file ${configPath} is not valid JSON`);
    }
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configPath}: ${parsed.error.message}`);
  }
  const file = parsed.data;

  return {
    storePath: env.CONTACT_CURATOR_STORE ?? file.storePath ?? DEFAULT_STORE_PATH,
    defaultCountry: file.defaultCountry ?? DEFAULT_COUNTRY,
    autoRefresh: file.autoRefresh ?? true,
    detection: {
      similarNameThreshold: file.detection?.similarNameThreshold ?? DEFAULT_SIMILAR_NAME_THRESHOLD,
      sharedOrganizationThreshold: file.detection?.sharedOrganizationThreshold
        ?? DEFAULT_SHARED_ORGANIZATION_THRESHOLD,
      maxNameLengthDifference: file.detection?.maxNameLengthDifference ?? DEFAULT_MAX_NAME_LENGTH_DIFFERENCE,
    },
  };
}
