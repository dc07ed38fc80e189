import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { LOG_LEVELS } from '../utils/logger.js';

const seconds = z.coerce.number().int().positive();

const flag = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform(v => v === true || v === 'true' || v === '1');

export const appConfigSchema = z.object({
  sourceUri: z.string().optional(),
  destUri: z.string().optional(),
  uri: z.string().optional(),
  database: z.string().default('mobile_apps'),
  collection: z.string().default('applications'),
  indexesFile: z.string().default('data/mongodb_indexes.json'),
  queriesFile: z.string().default('data/mongodb_queries.json'),
  queryOutputFile: z.string().default('data/Query_Execution_output.csv'),
  explainOutputDir: z.string().default('data'),
  timeoutSeconds: seconds.optional(),
  explainTimeoutSeconds: seconds.default(300),
  prefix: z.string().default(''),
  client: z.string().default('mongosh'),
  engine: z.enum(['shell', 'driver']).default('shell'),
  strictShardDetection: flag,
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ConfigInput = z.input<typeof appConfigSchema>;
export type ExtractEngine = AppConfig['engine'];

const ENV_KEYS = {
  sourceUri: 'SOURCE_MONGODB_CONNECTION_STRING',
  destUri: 'DEST_MONGODB_CONNECTION_STRING',
  uri: 'MONGODB_CONNECTION_STRING',
  database: 'MONGODB_DATABASE',
  collection: 'MONGODB_COLLECTION',
  indexesFile: 'INDEXES_FILE',
  queriesFile: 'QUERIES_FILE',
  queryOutputFile: 'QUERY_OUTPUT_FILE',
  explainOutputDir: 'EXPLAIN_OUTPUT_DIR',
  timeoutSeconds: 'TIMEOUT_SECONDS',
  explainTimeoutSeconds: 'EXPLAIN_TIMEOUT_SECONDS',
  prefix: 'DATABASE_PREFIX',
  client: 'MONGOSH_PATH',
  engine: 'EXTRACT_ENGINE',
  strictShardDetection: 'STRICT_SHARD_DETECTION',
  logLevel: 'LOG_LEVEL',
} as const satisfies Record<keyof ConfigInput, string>;

type ConfigKey = keyof typeof ENV_KEYS;

function isConfigKey(key: string): key is ConfigKey {
  return key in ENV_KEYS;
}

function present(value: unknown): boolean {
  return value !== undefined && value !== null && !(typeof value === 'string' && value.trim() === '');
}

export function readEnv(env: NodeJS.ProcessEnv): Partial<Record<ConfigKey, string>> {
  const raw: Partial<Record<ConfigKey, string>> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (isConfigKey(key) && value !== undefined && present(value)) raw[key] = value;
  }
  return raw;
}

/**
 * Builds the run configuration from the environment and CLI flags.
 * Flags win over environment variables; blank values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv, overrides: Record<string, unknown> = {}): AppConfig {
  const fromFlags = Object.fromEntries(
    Object.entries(overrides).filter(([key, value]) => isConfigKey(key) && present(value))
  );
  return appConfigSchema.parse({ ...readEnv(env), ...fromFlags });
}

export function loadEnvFile(path?: string) {
  loadDotenv(path ? { path } : undefined);
}

type ConnectionKey = 'sourceUri' | 'destUri' | 'uri';

export function requireConnection(config: AppConfig, key: ConnectionKey): string {
  const value = config[key];
  if (value) return value;
  const name = ENV_KEYS[key];
  throw new ConfigurationError(
    `${name} is not set`,
    `Copy .env.template to .env and set ${name}, or pass the connection string on the command line.`
  );
}

export function resolveTimeout(config: AppConfig, fallbackSeconds: number): number {
  return config.timeoutSeconds ?? fallbackSeconds;
}
