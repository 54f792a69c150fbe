/**
 * Reference topology generator.
 *
 * Builds the database + backend topology: a database with a persistent volume and a
 * health check, and a backend that waits for the database to be healthy, both on one
 * shared network. With no options the output reproduces the reference file exactly.
 */

import { z } from 'zod';
import { REFERENCE_TOPOLOGY } from '../config/defaults.js';
import { Failure, Success, type Result } from '../domain/types/result.js';
import {
  durationValidator,
  portValidator,
  resourceNameValidator,
  retriesValidator,
} from '../domain/validators.js';
import { formatSchemaIssues } from './parser.js';
import type { ComposeDocument } from './schema.js';

const { database, backend } = REFERENCE_TOPOLOGY;

export const TopologyOptionsSchema = z
  .object({
    databaseService: resourceNameValidator.default(database.serviceName),
    databaseImage: z.string().min(1).default(database.image),
    databaseContainerName: resourceNameValidator.default(database.containerName),
    databaseHostPort: portValidator.default(database.hostPort),
    databaseContainerPort: portValidator.default(database.containerPort),
    databaseDataPath: z.string().startsWith('/').default(database.dataPath),
    healthcheckTest: z.array(z.string().min(1)).min(1).default([...database.healthcheckTest]),
    healthcheckTimeout: durationValidator.default(database.healthcheckTimeout),
    healthcheckRetries: retriesValidator.default(database.healthcheckRetries),
    backendService: resourceNameValidator.default(backend.serviceName),
    backendBuildContext: z.string().min(1).default(backend.buildContext),
    backendContainerName: resourceNameValidator.default(backend.containerName),
    backendHostPort: portValidator.default(backend.hostPort),
    backendContainerPort: portValidator.default(backend.containerPort),
    watchTarget: z.string().startsWith('/').default(backend.watchTarget),
    databaseUrlVariable: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Must be a valid environment variable name')
      .default(backend.databaseUrlVariable),
    restart: z.string().min(1).default(REFERENCE_TOPOLOGY.restart),
    envFile: z.string().min(1).default(REFERENCE_TOPOLOGY.envFile),
    volume: resourceNameValidator.default(REFERENCE_TOPOLOGY.volume),
    network: resourceNameValidator.default(REFERENCE_TOPOLOGY.network),
  })
  .refine((options) => options.databaseService !== options.backendService, {
    message: 'Database and backend services need different names',
    path: ['backendService'],
  })
  .refine((options) => options.databaseHostPort !== options.backendHostPort, {
    message: 'Database and backend cannot publish the same host port',
    path: ['backendHostPort'],
  });

export type TopologyOptionsInput = z.input<typeof TopologyOptionsSchema>;
export type TopologyOptions = z.output<typeof TopologyOptionsSchema>;

/**
 * Build the reference topology document
 */
export function generateTopology(input: TopologyOptionsInput = {}): Result<ComposeDocument> {
  const parsed = TopologyOptionsSchema.safeParse(input);
  if (!parsed.success) {
    return Failure(`Invalid topology options: ${formatSchemaIssues(parsed.error.issues)}`);
  }
  const options = parsed.data;

  const document: ComposeDocument = {
    services: {
      [options.databaseService]: {
        image: options.databaseImage,
        container_name: options.databaseContainerName,
        restart: options.restart,
        env_file: [options.envFile],
        ports: [`${options.databaseHostPort}:${options.databaseContainerPort}`],
        networks: [options.network],
        healthcheck: {
          test: options.healthcheckTest,
          timeout: options.healthcheckTimeout,
          retries: options.healthcheckRetries,
        },
        volumes: [`${options.volume}:${options.databaseDataPath}`],
      },
      [options.backendService]: {
        build: options.backendBuildContext,
        container_name: options.backendContainerName,
        restart: options.restart,
        depends_on: {
          [options.databaseService]: { condition: 'service_healthy' },
        },
        env_file: [options.envFile],
        develop: {
          watch: [{ path: '.', action: 'rebuild', target: options.watchTarget }],
        },
        environment: {
          [options.databaseUrlVariable]: `\${${options.databaseUrlVariable}}`,
        },
        ports: [`${options.backendHostPort}:${options.backendContainerPort}`],
        networks: [options.network],
      },
    },
    volumes: {
      [options.volume]: null,
    },
    networks: {
      [options.network]: null,
    },
  };

  return Success(document);
}
