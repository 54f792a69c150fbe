/**
 * Command context: the logger, configuration and output streams a command runs against.
 * Tests build one with capturing writers and a mock logger.
 */

import type { Logger } from 'pino';
import { createAppConfig, type AppConfig } from '../config/app-config.js';
import { createLogger } from '../lib/logger.js';

export interface OutputWriter {
  write(chunk: string): unknown;
}

export type OutputFormat = AppConfig['output']['format'];

export interface CommandContext {
  logger: Logger;
  config: AppConfig;
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: OutputWriter;
  stderr: OutputWriter;
}

export interface ContextOverrides {
  logLevel?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export function createCommandContext(overrides: ContextOverrides = {}): CommandContext {
  const env = overrides.env ?? process.env;
  const config = createAppConfig(
    overrides.logLevel !== undefined ? { ...env, LOG_LEVEL: overrides.logLevel } : env,
  );

  return {
    logger: createLogger({ name: 'cli', level: config.server.logLevel }),
    config,
    cwd: overrides.cwd ?? process.cwd(),
    env,
    stdout: process.stdout,
    stderr: process.stderr,
  };
}
