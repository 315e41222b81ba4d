/**
 * Configuration loading
 *
 * Builder configuration is resolved from defaults, then
 * `TIERED_CONTEXT_*` environment variables, then explicit overrides,
 * and validated against BuilderConfigSchema.
 */

import { ConfigValidationError } from '../errors/index.js';
import type { LogLevel } from '../logging/logger.js';
import {
  BuilderConfigSchema,
  type BuilderConfig,
  type BuilderConfigInput,
} from '../schemas/index.js';

type Env = Record<string, string | undefined>;

/**
 * Process-level settings
 */
export interface RuntimeEnv {
  LOG_LEVEL: LogLevel;
  CONFIG_DIR: string;
}

const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];

/**
 * Get environment configuration
 */
export function getEnv(env: Env = process.env): RuntimeEnv {
  const level = (env.LOG_LEVEL ?? 'info').toLowerCase();
  const match = LOG_LEVELS.find((candidate) => candidate === level);

  return {
    LOG_LEVEL: match ?? 'info',
    CONFIG_DIR: env.CONFIG_DIR ?? './config',
  };
}

/** Environment variable → config field */
const ENV_FIELDS: Array<{
  variable: string;
  field: keyof BuilderConfig;
  kind: 'string' | 'number' | 'boolean';
}> = [
  { variable: 'TIERED_CONTEXT_MODE', field: 'mode', kind: 'string' },
  { variable: 'TIERED_CONTEXT_ENABLE_CACHE', field: 'enableCache', kind: 'boolean' },
  { variable: 'TIERED_CONTEXT_SEMI_STATIC_TTL_MS', field: 'semiStaticCacheTtlMs', kind: 'number' },
  { variable: 'TIERED_CONTEXT_RETRIEVAL_TTL_MS', field: 'retrievalCacheTtlMs', kind: 'number' },
  { variable: 'TIERED_CONTEXT_ENABLE_COMPRESSION', field: 'enableCompression', kind: 'boolean' },
  { variable: 'TIERED_CONTEXT_ENABLE_TOKEN_COUNTING', field: 'enableTokenCounting', kind: 'boolean' },
  { variable: 'TIERED_CONTEXT_RECENT_CONVERSATIONS', field: 'recentConversationLimit', kind: 'number' },
  { variable: 'TIERED_CONTEXT_AUTO_ADJUST', field: 'autoAdjustMode', kind: 'boolean' },
  { variable: 'TIERED_CONTEXT_THRESHOLD_LITE', field: 'memoryCountThresholdLite', kind: 'number' },
  { variable: 'TIERED_CONTEXT_THRESHOLD_STANDARD', field: 'memoryCountThresholdStandard', kind: 'number' },
];

function parseEnvValue(
  raw: string,
  kind: 'string' | 'number' | 'boolean'
): unknown {
  switch (kind) {
    case 'string':
      return raw;
    case 'number':
      return raw.trim() === '' ? raw : Number(raw);
    case 'boolean': {
      const normalised = raw.trim().toLowerCase();
      if (normalised === 'true' || normalised === '1') return true;
      if (normalised === 'false' || normalised === '0') return false;
      // Left as a string so validation reports it
      return raw;
    }
  }
}

/**
 * Read builder settings present in the environment
 */
export function readBuilderEnv(env: Env = process.env): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const { variable, field, kind } of ENV_FIELDS) {
    const raw = env[variable];
    if (raw === undefined) continue;
    values[field] = parseEnvValue(raw, kind);
  }
  return values;
}

/**
 * Resolve and validate the builder configuration
 *
 * @throws {ConfigValidationError} if the merged configuration is invalid
 */
export function loadBuilderConfig(
  overrides: BuilderConfigInput = {},
  env: Env = process.env
): BuilderConfig {
  const result = BuilderConfigSchema.safeParse({
    ...readBuilderEnv(env),
    ...overrides,
  });

  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors.map(
    (e) => `${e.path.join('.')}: ${e.message}`
  );
  throw new ConfigValidationError('builder config', issues);
}
