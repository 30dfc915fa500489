import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getScholarsyncDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_BLUESKY_QUERIES = [
  'PhD position',
  'PhD call',
  'doctoral position',
  'PhD opportunity',
  'PhD opening',
  'PhD vacancy',
  'postdoc position',
  'call for postdocs',
  'join my lab',
  'call for master students',
  'research assistant position',
];

export const DEFAULT_SCHOLARSHIPDB_FIELDS = [
  'Computer Science',
  'Biology',
  'Chemistry',
  'Physics',
  'Mathematics',
  'Medical Sciences',
  'Economics',
  'Psychology',
  'Engineering',
];

export const SOURCE_NAMES = ['bluesky', 'scholarshipdb'] as const;
export const STORAGE_BACKENDS = ['sqlite', 'csv'] as const;

const RetrySchema = z.object({
  max_attempts: z.number().int().min(1).default(5),
  base_delay_ms: z.number().min(0).default(10000),
  max_delay_ms: z.number().min(0).default(120000),
  timeout_attempts: z.number().int().min(1).default(3),
});

export const ConfigSchema = z.object({
  llm: z
    .object({
      provider: z.enum(['openai', 'gemini']).default('openai'),
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('meta/llama-3.3-70b-instruct'),
      max_tokens: z.number().default(256),
      temperature: z.number().default(0.1),
      timeout_ms: z.number().default(30000),
      cooldown_ms: z.number().default(0),
      retry: RetrySchema.default({}),
    })
    .default({}),

  sources: z
    .object({
      order: z.array(z.enum(SOURCE_NAMES)).default([...SOURCE_NAMES]),
      bluesky: z
        .object({
          enabled: z.boolean().default(true),
          service_url: z.string().default('https://bsky.social'),
          handle: z.string().default(''),
          password: z.string().default(''),
          queries: z.array(z.string()).min(1).default(DEFAULT_BLUESKY_QUERIES),
          limit: z.number().int().min(1).max(100).default(50),
          request_delay_ms: z.number().default(500),
          max_retries: z.number().int().min(1).default(3),
        })
        .default({}),
      scholarshipdb: z
        .object({
          enabled: z.boolean().default(true),
          base_url: z.string().default('https://scholarshipdb.net'),
          fields: z.array(z.string()).min(1).default(DEFAULT_SCHOLARSHIPDB_FIELDS),
          max_pages: z.number().int().min(1).default(2),
          request_delay_ms: z.number().default(2000),
          timeout_ms: z.number().default(60000),
          user_agent: z
            .string()
            .default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36'),
        })
        .default({}),
    })
    .default({}),

  storage: z
    .object({
      backend: z.enum(STORAGE_BACKENDS).default('sqlite'),
      sqlite_path: z.string().default('~/.scholarsync/postings.db'),
      csv_path: z.string().default('phd_positions.csv'),
    })
    .default({}),

  sync: z
    .object({
      state_file: z.string().default('~/.scholarsync/last_sync.json'),
      seed_from_storage: z.boolean().default(true),
    })
    .default({}),

  dedup: z
    .object({
      enabled: z.boolean().default(true),
      low_threshold: z.number().min(0).max(1).default(0.25),
      high_threshold: z.number().min(0).max(1).default(0.95),
      max_features: z.number().int().min(1).default(10000),
      oracle_delay_ms: z.number().min(0).default(2000),
      // New records from these sources are checked against stored ones.
      sources: z.array(z.enum(SOURCE_NAMES)).default(['bluesky']),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SourceName = (typeof SOURCE_NAMES)[number];
export type StorageBackendName = (typeof STORAGE_BACKENDS)[number];

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

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? { ...(value as Record<string, unknown>) }
    : {};
}

/**
 * Layer secrets and endpoints from the environment over the file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result = { ...rawConfig };

  const envApiKey = env['SCHOLARSYNC_LLM_API_KEY'];
  const envBaseUrl = env['SCHOLARSYNC_LLM_BASE_URL'];
  const envModel = env['SCHOLARSYNC_LLM_MODEL'];
  if (envApiKey || envBaseUrl || envModel) {
    const llm = asRecord(result['llm']);
    if (envApiKey) llm['api_key'] = envApiKey;
    if (envBaseUrl) llm['base_url'] = envBaseUrl;
    if (envModel) llm['model'] = envModel;
    result['llm'] = llm;
  }

  const envHandle = env['SCHOLARSYNC_BLUESKY_HANDLE'];
  const envPassword = env['SCHOLARSYNC_BLUESKY_PASSWORD'];
  if (envHandle || envPassword) {
    const sources = asRecord(result['sources']);
    const bluesky = asRecord(sources['bluesky']);
    if (envHandle) bluesky['handle'] = envHandle;
    if (envPassword) bluesky['password'] = envPassword;
    sources['bluesky'] = bluesky;
    result['sources'] = sources;
  }

  return result;
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

export function getDefaultConfigPath(): string {
  return path.join(getScholarsyncDir(), 'config.yaml');
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const explorer = cosmiconfig('scholarsync', {
    searchPlaces: [
      'scholarsync.config.yaml',
      'scholarsync.config.yml',
      '.scholarsyncrc.yaml',
      '.scholarsyncrc.yml',
    ],
  });

  const envConfigPath = env['SCHOLARSYNC_CONFIG'];
  const defaultConfigPath = getDefaultConfigPath();

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = asRecord(result?.config);
  } else {
    const found = await explorer.search();
    if (found) {
      logger.debug({ path: found.filepath }, 'Using project config');
      rawConfig = asRecord(found.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  return parseConfig(applyEnvOverrides(rawConfig, env));
}
