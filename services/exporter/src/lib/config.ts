import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Load environment variables from .env file in the repo root
// config.ts is at: services/exporter/src/lib/config.ts
// Path: lib -> src -> exporter -> services -> root (4 levels up)
const currentFile = fileURLToPath(import.meta.url);
const currentDir = dirname(currentFile);
const rootDir = resolve(currentDir, '..', '..', '..', '..');
loadDotenv({ path: resolve(rootDir, '.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

export const TransformNameSchema = z.enum(['passthrough', 'security']);

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Cloud Foundry credentials (validated by the authenticator, not here)
  cfUsername: z.string().optional(),
  cfPassword: z.string().optional(),

  // Cloud Foundry CLI
  cfApiEndpoint: z.string().url().default('https://api.fr.cloud.gov'),
  cfBinary: z.string().min(1).default('cf'),
  cfCommandTimeoutSeconds: z.coerce.number().int().positive().default(120),

  // Export
  exportDir: z.string().min(1).default('exports'),
  exportWindowDays: z.coerce.number().int().positive().default(7),
  exportPageSize: z.coerce.number().int().min(1).max(5000).default(5000),
  exportMaxPages: z.coerce.number().int().positive().default(1000),
  exportSeparatorHint: booleanFlag,
  processTransform: TransformNameSchema.default('passthrough'),

  // Artifact upload (disabled when no bucket is set)
  artifactBucket: z.string().optional(),
  artifactPrefix: z.string().default('audit-logs'),
  runId: z.string().optional(),

  // S3 / MinIO
  s3Region: z.string().default('us-east-1'),
  s3Endpoint: z.string().url().optional(),
  s3AccessKeyId: z.string().optional(),
  s3SecretAccessKey: z.string().optional(),
  s3ForcePathStyle: booleanFlag,
});

export type Config = z.infer<typeof ConfigSchema>;
export type TransformName = z.infer<typeof TransformNameSchema>;

let config: Config | null = null;

/**
 * `VAR=` (empty) counts as unset, so `.env.example` can be copied verbatim.
 */
function setting(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const raw = {
    nodeEnv: setting(env.NODE_ENV),
    logLevel: setting(env.LOG_LEVEL),
    cfUsername: setting(env.CF_USERNAME),
    cfPassword: setting(env.CF_PASSWORD),
    cfApiEndpoint: setting(env.CF_API_ENDPOINT),
    cfBinary: setting(env.CF_BINARY),
    cfCommandTimeoutSeconds: setting(env.CF_COMMAND_TIMEOUT_SECONDS),
    exportDir: setting(env.EXPORT_DIR),
    exportWindowDays: setting(env.EXPORT_WINDOW_DAYS),
    exportPageSize: setting(env.EXPORT_PAGE_SIZE),
    exportMaxPages: setting(env.EXPORT_MAX_PAGES),
    exportSeparatorHint: setting(env.EXPORT_SEPARATOR_HINT),
    processTransform: setting(env.PROCESS_TRANSFORM),
    artifactBucket: setting(env.ARTIFACT_BUCKET),
    artifactPrefix: setting(env.ARTIFACT_PREFIX),
    runId: setting(env.RUN_ID),
    s3Region: setting(env.S3_REGION),
    s3Endpoint: setting(env.S3_ENDPOINT),
    s3AccessKeyId: setting(env.S3_ACCESS_KEY_ID),
    s3SecretAccessKey: setting(env.S3_SECRET_ACCESS_KEY),
    s3ForcePathStyle: setting(env.S3_FORCE_PATH_STYLE),
  };

  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.error.message}`);
  }

  return result.data;
}

export function loadConfig(): Config {
  if (config) {
    return config;
  }

  config = parseConfig(process.env);
  return config;
}
