import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getTributaryDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const TypeTagSchema = z.enum(['null', 'bool', 'int', 'float', 'str', 'list', 'dict', 'datetime', 'other']);

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().default(8000),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.tributary/tributary.db'),
    })
    .default({}),

  http: z
    .object({
      timeout_ms: z.number().int().positive().default(30000),
      user_agent: z.string().default('Tributary/1.0'),
    })
    .default({}),

  rate_limit: z
    .object({
      requests_per_minute: z.number().int().positive().default(60),
      max_retries: z.number().int().nonnegative().default(5),
      backoff_base: z.number().positive().default(2.0),
    })
    .default({}),

  schema_drift: z
    .object({
      enabled: z.boolean().default(true),
      confidence_threshold: z.number().min(0).max(1).default(0.8),
      expected_schemas: z.record(z.string(), z.record(z.string(), TypeTagSchema)).default({}),
    })
    .default({}),

  sources: z
    .object({
      api: z
        .object({
          enabled: z.boolean().default(true),
          base_url: z.string().default('https://api.coinpaprika.com/v1'),
          api_key: z.string().default(''),
          list_path: z.string().default('/coins'),
          detail_path: z.string().default('/tickers/{id}'),
          max_entries: z.number().int().positive().default(100),
          provider: z.string().default('coinpaprika'),
          site_url: z.string().default('https://coinpaprika.com'),
          rate_limit_key: z.string().default('api'),
        })
        .default({}),
      file: z
        .object({
          enabled: z.boolean().default(true),
          path: z.string().default('./data/source.csv'),
          encodings: z.array(z.string()).nonempty().default(['utf-8', 'windows-1252']),
          sample_bytes: z.number().int().positive().default(4096),
        })
        .default({}),
      feed: z
        .object({
          enabled: z.boolean().default(true),
          url: z.string().default('https://hnrss.org/frontpage'),
          rate_limit_key: z.string().default('feed'),
        })
        .default({}),
    })
    .default({}),

  orchestrator: z
    .object({
      parallel: z.boolean().default(false),
      max_workers: z.number().int().positive().default(3),
      fail_on_error: z.boolean().default(false),
    })
    .default({}),

  schedule: z
    .object({
      cron: z.string().default('*/5 * * * *'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function asObject(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * Apply TRIBUTARY_* environment overrides on top of the raw file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const out = { ...rawConfig };

  const dbPath = env['TRIBUTARY_DB_PATH'];
  if (dbPath) {
    out['db'] = { ...asObject(out['db']), path: dbPath };
  }

  const apiKey = env['TRIBUTARY_API_KEY'];
  const feedUrl = env['TRIBUTARY_FEED_URL'];
  const filePath = env['TRIBUTARY_FILE_PATH'];
  if (apiKey || feedUrl || filePath) {
    const sources = asObject(out['sources']);
    if (apiKey) sources['api'] = { ...asObject(sources['api']), api_key: apiKey };
    if (feedUrl) sources['feed'] = { ...asObject(sources['feed']), url: feedUrl };
    if (filePath) sources['file'] = { ...asObject(sources['file']), path: filePath };
    out['sources'] = sources;
  }

  return out;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

/**
 * Build the process-wide config. Called once at startup; the result is passed
 * explicitly to every component.
 */
export async function loadConfig(): Promise<Config> {
  const explorer = cosmiconfig('tributary', {
    searchPlaces: [
      'tributary.config.yaml',
      'tributary.config.yml',
      '.tributaryrc.yaml',
      '.tributaryrc.yml',
    ],
  });

  const envConfigPath = process.env['TRIBUTARY_CONFIG'];
  const defaultConfigPath = path.join(getTributaryDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asObject(result?.config);
  } else {
    const found = await explorer.search();
    if (found) {
      rawConfig = asObject(found.config);
      logger.debug({ path: found.filepath }, 'Config file found');
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      rawConfig = asObject(result?.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  return parseConfig(applyEnvOverrides(rawConfig));
}
