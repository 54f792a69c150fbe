/**
 * Unified Application Configuration
 *
 * Single source of truth for runtime settings, validated with Zod.
 * Values come from the environment; CLI flags override them per command.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'trace']).default('info');
const OutputFormatSchema = z.enum(['text', 'json']).default('text');

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const AppConfigSchema = z.object({
  server: z.object({
    nodeEnv: NodeEnvSchema,
    logLevel: LogLevelSchema,
  }),
  compose: z.object({
    file: z.string().min(1).optional(),
    strict: BooleanFlagSchema.default('false'),
    interpolate: BooleanFlagSchema.default('true'),
  }),
  output: z.object({
    format: OutputFormatSchema,
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Treat empty strings as unset so `LOG_LEVEL=` falls back to the default
 */
function getEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Create configuration from environment variables
 */
export function createAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    server: {
      nodeEnv: getEnvValue(env, 'NODE_ENV'),
      logLevel: getEnvValue(env, 'LOG_LEVEL'),
    },
    compose: {
      file: getEnvValue(env, 'COMPOSE_FILE'),
      strict: getEnvValue(env, 'COMPOSE_STRICT'),
      interpolate: getEnvValue(env, 'COMPOSE_INTERPOLATE'),
    },
    output: {
      format: getEnvValue(env, 'COMPOSE_OUTPUT_FORMAT'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const [issue] = result.error.issues;
    const configKey = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Configuration validation failed: ${result.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ')}`,
      configKey,
    );
  }

  return result.data;
}

/**
 * Summarize configuration as printable key/value pairs
 */
export function getConfigurationSummary(config: AppConfig): Record<string, string> {
  return {
    environment: config.server.nodeEnv,
    logLevel: config.server.logLevel,
    composeFile: config.compose.file ?? '(auto-detect)',
    strict: String(config.compose.strict),
    interpolate: String(config.compose.interpolate),
    outputFormat: config.output.format,
  };
}
