/**
 * Filesystem entry point: locate, read and parse a compose file.
 *
 * Interpolation variables come from the `.env` file beside the compose file (or an
 * explicit file relative to the working directory), with the process environment
 * taking precedence. `env_file`
 * references are checked for existence relative to the compose directory.
 */

import { access, readFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import type { Logger } from 'pino';
import { COMPOSE_FILE_CANDIDATES, DEFAULT_INTERPOLATION_ENV_FILE } from '../config/defaults.js';
import { Failure, Success, type Result } from '../domain/types/result.js';
import type { ValidationIssue } from '../domain/types/compose.js';
import { createTimer } from '../lib/logger.js';
import { parseEnvFile } from './env-file.js';
import type { VariableSource } from './interpolation.js';
import { parseCompose, type ParsedCompose } from './parser.js';

export interface LoadOptions {
  /** Process environment; defaults to `process.env` */
  env?: VariableSource;
  /** Explicit interpolation file, resolved against `cwd`; must exist when given */
  envFile?: string;
  /** Working directory for a relative `envFile`; defaults to `process.cwd()` */
  cwd?: string;
  /** Set to false to keep `${VAR}` text as written */
  interpolate?: boolean;
  logger?: Logger;
}

export interface LoadedCompose extends ParsedCompose {
  path: string;
  directory: string;
  /** Interpolation variables that came from the env file */
  fileVariables: Record<string, string>;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Use the explicit path, or the first default file name present in `cwd`
 */
export async function resolveComposePath(cwd: string, explicit?: string): Promise<Result<string>> {
  if (explicit !== undefined) {
    const path = resolve(cwd, explicit);
    return (await exists(path)) ? Success(path) : Failure(`Compose file not found: ${path}`);
  }

  for (const candidate of COMPOSE_FILE_CANDIDATES) {
    const path = join(cwd, candidate);
    if (await exists(path)) return Success(path);
  }

  return Failure(`No compose file found in ${cwd} (looked for ${COMPOSE_FILE_CANDIDATES.join(', ')})`);
}

async function readVariables(
  directory: string,
  explicit: string | undefined,
  cwd: string,
): Promise<Result<Record<string, string>>> {
  const path = explicit !== undefined ? resolve(cwd, explicit) : join(directory, DEFAULT_INTERPOLATION_ENV_FILE);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (explicit === undefined && errorCode(error) === 'ENOENT') {
      return Success({});
    }
    const message = error instanceof Error ? error.message : String(error);
    return Failure(`Cannot read env file ${path}: ${message}`);
  }

  const parsed = parseEnvFile(text);
  return parsed.ok ? parsed : Failure(`${path}: ${parsed.error}`);
}

async function findMissingEnvFiles(parsed: ParsedCompose, directory: string): Promise<ValidationIssue[]> {
  const issues: ValidationIssue[] = [];

  for (const service of parsed.project.services) {
    for (const [index, envFile] of service.envFiles.entries()) {
      if (!envFile.required) continue;
      const path = isAbsolute(envFile.path) ? envFile.path : join(directory, envFile.path);
      if (!(await exists(path))) {
        issues.push({
          rule: 'env-file-missing',
          severity: 'warning',
          message: `env_file "${envFile.path}" of "${service.name}" does not exist`,
          service: service.name,
          path: `services.${service.name}.env_file[${index}]`,
        });
      }
    }
  }

  return issues;
}

/**
 * Read and parse a compose file from disk
 */
export async function loadComposeFile(filePath: string, options: LoadOptions = {}): Promise<Result<LoadedCompose>> {
  const path = resolve(filePath);
  const directory = dirname(path);
  const timer = options.logger ? createTimer(options.logger, 'load-compose', { path }) : undefined;

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    timer?.error(error);
    return errorCode(error) === 'ENOENT'
      ? Failure(`Compose file not found: ${path}`)
      : Failure(`Cannot read compose file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let fileVariables: Record<string, string> = {};
  let env: VariableSource | undefined;

  if (options.interpolate !== false) {
    const variables = await readVariables(directory, options.envFile, options.cwd ?? process.cwd());
    if (!variables.ok) {
      timer?.error(variables.error);
      return variables;
    }
    fileVariables = variables.value;
    env = { ...fileVariables, ...(options.env ?? process.env) };
  }

  const parsed = parseCompose(text, env ? { env } : {});
  if (!parsed.ok) {
    timer?.error(parsed.error);
    return Failure(`${path}: ${parsed.error}`);
  }

  const missingEnvFiles = await findMissingEnvFiles(parsed.value, directory);
  timer?.end({ services: parsed.value.project.services.length });

  return Success({
    ...parsed.value,
    issues: [...parsed.value.issues, ...missingEnvFiles],
    path,
    directory,
    fileVariables,
  });
}
