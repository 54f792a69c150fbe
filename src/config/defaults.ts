/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the constants the parser, validator and generator share.
 */

/**
 * File names searched, in order, when no compose file is given
 */
export const COMPOSE_FILE_CANDIDATES = [
  'compose.yaml',
  'compose.yml',
  'docker-compose.yaml',
  'docker-compose.yml',
] as const;

/**
 * Interpolation variables file read from the compose directory
 */
export const DEFAULT_INTERPOLATION_ENV_FILE = '.env';

/**
 * Docker's health check defaults, applied when a field is omitted
 */
export const DEFAULT_HEALTHCHECK = {
  intervalMs: 30_000,
  timeoutMs: 30_000,
  retries: 3,
  startPeriodMs: 0,
} as const;

/**
 * Network every service joins when it lists none
 */
export const IMPLICIT_NETWORK = 'default';

export const RESTART_POLICIES = ['no', 'always', 'unless-stopped', 'on-failure'] as const;

/**
 * Values of the reference database + backend topology
 */
export const REFERENCE_TOPOLOGY = {
  database: {
    serviceName: 'db',
    image: 'mysql:latest',
    containerName: 'ave-database',
    hostPort: 3305,
    containerPort: 3306,
    dataPath: '/var/lib/mysql',
    healthcheckTest: ['CMD', 'mysqladmin', 'ping', '-h', 'localhost'],
    healthcheckTimeout: '20s',
    healthcheckRetries: 10,
  },
  backend: {
    serviceName: 'ave-backend',
    buildContext: '.',
    containerName: 'ave-backend',
    hostPort: 8000,
    containerPort: 8000,
    watchTarget: '/app',
    databaseUrlVariable: 'DATABASE_URL',
  },
  restart: 'always',
  envFile: 'docker.env',
  volume: 'mysql_data',
  network: 'mynetwork',
} as const;
