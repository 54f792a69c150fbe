/**
 * Compose parsing: YAML text -> validated document -> normalized project.
 *
 * The loaded mapping is kept next to the zod output because zod rebuilds objects in
 * schema key order; serialization works from the loaded mapping so key order and
 * unknown keys survive untouched.
 */

import * as yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { Failure, Success, type Result } from '../domain/types/result.js';
import type {
  BuildSpec,
  ComposeProject,
  EnvFileReference,
  ResourceDeclaration,
  ServiceDefinition,
  ServiceDependency,
  ValidationIssue,
  WatchRule,
} from '../domain/types/compose.js';
import {
  ComposeDocumentSchema,
  type ComposeDocument,
  type ComposeResourceDocument,
  type ComposeServiceDocument,
} from './schema.js';
import { interpolate, type VariableSource } from './interpolation.js';

export interface ParseOptions {
  /** Variables for `${VAR}` substitution; interpolation is skipped when absent */
  env?: VariableSource;
}

export interface ParsedCompose {
  /** Mapping as loaded from YAML, before interpolation */
  raw: Record<string, unknown>;
  document: ComposeDocument;
  project: ComposeProject;
  /** Interpolation findings, reported alongside validator output */
  issues: ValidationIssue[];
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function formatIssuePath(path: Array<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

export function formatSchemaIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${formatIssuePath(issue.path) || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Load YAML text and require a mapping at the top level
 */
export function loadYamlMapping(text: string): Result<Record<string, unknown>> {
  let loaded: unknown;
  try {
    loaded = yaml.load(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Failure(`Invalid YAML: ${message}`);
  }

  if (loaded === undefined || loaded === null) {
    return Failure('Compose file is empty');
  }
  if (!isMapping(loaded)) {
    return Failure('Compose file must be a mapping at the top level');
  }
  return Success(loaded);
}

/**
 * Check a loaded mapping against the compose document schema
 */
export function validateDocument(raw: Record<string, unknown>): Result<ComposeDocument> {
  const result = ComposeDocumentSchema.safeParse(raw);
  if (!result.success) {
    return Failure(`Invalid compose document: ${formatSchemaIssues(result.error.issues)}`);
  }
  return Success(result.data);
}

export function parseComposeYaml(text: string): Result<ComposeDocument> {
  const loaded = loadYamlMapping(text);
  return loaded.ok ? validateDocument(loaded.value) : loaded;
}

function normalizeBuild(build: ComposeServiceDocument['build']): BuildSpec | undefined {
  if (build === undefined) return undefined;
  if (typeof build === 'string') return { context: build };
  return {
    context: build.context ?? '.',
    ...(build.dockerfile !== undefined ? { dockerfile: build.dockerfile } : {}),
  };
}

function normalizeEnvFiles(envFile: ComposeServiceDocument['env_file']): EnvFileReference[] {
  if (envFile === undefined) return [];
  if (typeof envFile === 'string') return [{ path: envFile, required: true }];
  return envFile.map((entry) =>
    typeof entry === 'string' ? { path: entry, required: true } : { path: entry.path, required: entry.required ?? true },
  );
}

function normalizeEnvironment(
  environment: ComposeServiceDocument['environment'],
): Record<string, string | null> {
  const out: Record<string, string | null> = {};
  if (environment === undefined) return out;

  if (Array.isArray(environment)) {
    for (const entry of environment) {
      const eq = entry.indexOf('=');
      if (eq === -1) out[entry] = null;
      else out[entry.slice(0, eq)] = entry.slice(eq + 1);
    }
    return out;
  }

  for (const [key, value] of Object.entries(environment)) {
    out[key] = value === null ? null : String(value);
  }
  return out;
}

function normalizeNetworks(networks: ComposeServiceDocument['networks']): string[] {
  if (networks === undefined) return [];
  return Array.isArray(networks) ? [...networks] : Object.keys(networks);
}

function normalizeDependencies(dependsOn: ComposeServiceDocument['depends_on']): ServiceDependency[] {
  if (dependsOn === undefined) return [];

  if (Array.isArray(dependsOn)) {
    return dependsOn.map((service) => ({
      service,
      condition: 'service_started',
      restart: false,
      required: true,
    }));
  }

  return Object.entries(dependsOn).map(([service, options]) => ({
    service,
    condition: options?.condition ?? 'service_started',
    restart: options?.restart ?? false,
    required: options?.required ?? true,
  }));
}

function normalizeWatch(develop: ComposeServiceDocument['develop']): WatchRule[] {
  return (develop?.watch ?? []).map((rule) => ({
    path: rule.path,
    action: rule.action,
    ...(rule.target !== undefined ? { target: rule.target } : {}),
    ignore: rule.ignore ?? [],
  }));
}

function normalizeService(name: string, service: ComposeServiceDocument): ServiceDefinition {
  const build = normalizeBuild(service.build);
  const { healthcheck } = service;

  return {
    name,
    ...(service.image !== undefined ? { image: service.image } : {}),
    ...(build ? { build } : {}),
    ...(service.container_name !== undefined ? { containerName: service.container_name } : {}),
    ...(service.restart !== undefined ? { restart: service.restart } : {}),
    envFiles: normalizeEnvFiles(service.env_file),
    environment: normalizeEnvironment(service.environment),
    ports: service.ports ?? [],
    networks: normalizeNetworks(service.networks),
    ...(healthcheck
      ? {
          healthcheck: {
            ...(healthcheck.test !== undefined ? { test: healthcheck.test } : {}),
            ...(healthcheck.interval !== undefined ? { interval: healthcheck.interval } : {}),
            ...(healthcheck.timeout !== undefined ? { timeout: healthcheck.timeout } : {}),
            ...(healthcheck.retries !== undefined ? { retries: healthcheck.retries } : {}),
            ...(healthcheck.start_period !== undefined ? { startPeriod: healthcheck.start_period } : {}),
            ...(healthcheck.disable !== undefined ? { disable: healthcheck.disable } : {}),
          },
        }
      : {}),
    volumes: service.volumes ?? [],
    dependsOn: normalizeDependencies(service.depends_on),
    watch: normalizeWatch(service.develop),
  };
}

function normalizeResource(name: string, declaration: ComposeResourceDocument): ResourceDeclaration {
  if (declaration === null) {
    return { name, external: false };
  }

  const external = declaration.external;
  const legacyName = typeof external === 'object' ? external.name : undefined;
  const externalName = declaration.name ?? legacyName;

  return {
    name,
    ...(declaration.driver !== undefined ? { driver: declaration.driver } : {}),
    external: external === true || typeof external === 'object',
    ...(externalName !== undefined ? { externalName } : {}),
  };
}

/**
 * Fold short and long syntaxes into the analysis model; services keep declaration order
 */
export function normalizeProject(document: ComposeDocument): ComposeProject {
  return {
    ...(document.name !== undefined ? { name: document.name } : {}),
    services: Object.entries(document.services).map(([name, service]) => normalizeService(name, service)),
    volumes: Object.entries(document.volumes ?? {}).map(([name, decl]) => normalizeResource(name, decl)),
    networks: Object.entries(document.networks ?? {}).map(([name, decl]) => normalizeResource(name, decl)),
  };
}

/**
 * Parse YAML text into a project, interpolating variables when `env` is given
 */
export function parseCompose(text: string, options: ParseOptions = {}): Result<ParsedCompose> {
  const loaded = loadYamlMapping(text);
  if (!loaded.ok) return loaded;

  const issues: ValidationIssue[] = [];
  let subject = loaded.value;

  if (options.env) {
    const result = interpolate(loaded.value, options.env);
    subject = result.document;

    for (const name of result.missing) {
      issues.push({
        rule: 'variable-unset',
        severity: 'warning',
        message: `Variable ${name} is not set; substituting an empty string`,
        path: name,
      });
    }
    for (const error of result.errors) {
      issues.push({ rule: 'variable-required', severity: 'error', message: error.message, path: error.path });
    }
  }

  const document = validateDocument(subject);
  if (!document.ok) return document;

  return Success({
    raw: loaded.value,
    document: document.value,
    project: normalizeProject(document.value),
    issues,
  });
}
