#!/usr/bin/env node
/**
 * compose-topology CLI entry point
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv, exit } from 'node:process';
import { createProgram } from '../src/cli/program.js';
import { createLogger } from '../src/lib/logger.js';

// Handle both development (apps/) and production (dist/apps/) paths
const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../package.json')
  : join(__dirname, '../package.json');

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (parsed !== null && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

// Lazy logger creation so --help and --version stay quiet
let fallbackLogger: ReturnType<typeof createLogger> | undefined;
function getLogger(): ReturnType<typeof createLogger> {
  fallbackLogger ??= createLogger({ name: 'cli' });
  return fallbackLogger;
}

const program = createProgram(readVersion(), (code) => {
  process.exitCode = code;
});

program.addHelpText(
  'after',
  `

Examples:
  $ compose-topology validate                      Validate compose.yaml / docker-compose.yml in the current directory
  $ compose-topology validate --strict stack.yml   Fail on warnings too
  $ compose-topology inspect --format json         Describe services, health checks and startup order
  $ compose-topology format --check                Check that the file survives a parse/serialize cycle
  $ compose-topology generate -o docker-compose.yml

Environment Variables:
  COMPOSE_FILE              Compose file used when no argument is given
  COMPOSE_STRICT            Treat warnings as errors (true/false)
  COMPOSE_INTERPOLATE       Substitute \${VAR} references (true/false)
  COMPOSE_OUTPUT_FORMAT     text or json
  LOG_LEVEL                 Logging level (trace, debug, info, warn, error)
  NODE_ENV                  Environment (development, production)
`,
);

process.on('uncaughtException', (error) => {
  getLogger().fatal({ error }, 'Uncaught exception in CLI');
  console.error('❌ Uncaught exception:', error);
  exit(1);
});

process.on('unhandledRejection', (reason) => {
  getLogger().fatal({ reason }, 'Unhandled rejection in CLI');
  console.error('❌ Unhandled rejection:', reason);
  exit(1);
});

async function main(): Promise<void> {
  await program.parseAsync(argv);
}

void main();
