/**
 * compose-topology CLI definition
 */

import { Command, Option } from 'commander';
import { isApplicationError, normalizeError } from '../errors/index.js';
import { runConfig } from './commands/config.js';
import { runFormat } from './commands/format.js';
import { runGenerate, type GenerateCommandOptions } from './commands/generate.js';
import { runInspect } from './commands/inspect.js';
import { runValidate } from './commands/validate.js';
import { createCommandContext, type CommandContext, type ContextOverrides, type OutputFormat } from './context.js';

interface GlobalFlags {
  logLevel?: string;
}

interface LoadFlags {
  format?: OutputFormat;
  envFile?: string;
  interpolate: boolean;
}

interface ValidateFlags extends LoadFlags {
  strict?: boolean;
}

interface FormatFlags {
  check?: boolean;
  write?: boolean;
}

export interface GenerateFlags {
  output?: string;
  dbService?: string;
  dbImage?: string;
  dbContainer?: string;
  dbPort?: number;
  dbContainerPort?: number;
  backendService?: string;
  backendContext?: string;
  backendContainer?: string;
  backendPort?: number;
  backendContainerPort?: number;
  envFile?: string;
  network?: string;
  volume?: string;
  healthTimeout?: string;
  healthRetries?: number;
}

function toInteger(value: string): number {
  return Number.parseInt(value, 10);
}

function formatOption(): Option {
  return new Option('--format <format>', 'output format').choices(['text', 'json']);
}

/**
 * Map generate flags onto generator options, dropping flags that were not given
 */
export function toTopologyOptions(flags: GenerateFlags): GenerateCommandOptions {
  return {
    ...(flags.output !== undefined ? { output: flags.output } : {}),
    ...(flags.dbService !== undefined ? { databaseService: flags.dbService } : {}),
    ...(flags.dbImage !== undefined ? { databaseImage: flags.dbImage } : {}),
    ...(flags.dbContainer !== undefined ? { databaseContainerName: flags.dbContainer } : {}),
    ...(flags.dbPort !== undefined ? { databaseHostPort: flags.dbPort } : {}),
    ...(flags.dbContainerPort !== undefined ? { databaseContainerPort: flags.dbContainerPort } : {}),
    ...(flags.backendService !== undefined ? { backendService: flags.backendService } : {}),
    ...(flags.backendContext !== undefined ? { backendBuildContext: flags.backendContext } : {}),
    ...(flags.backendContainer !== undefined ? { backendContainerName: flags.backendContainer } : {}),
    ...(flags.backendPort !== undefined ? { backendHostPort: flags.backendPort } : {}),
    ...(flags.backendContainerPort !== undefined ? { backendContainerPort: flags.backendContainerPort } : {}),
    ...(flags.envFile !== undefined ? { envFile: flags.envFile } : {}),
    ...(flags.network !== undefined ? { network: flags.network } : {}),
    ...(flags.volume !== undefined ? { volume: flags.volume } : {}),
    ...(flags.healthTimeout !== undefined ? { healthcheckTimeout: flags.healthTimeout } : {}),
    ...(flags.healthRetries !== undefined ? { healthcheckRetries: flags.healthRetries } : {}),
  };
}

export type ContextFactory = (overrides: ContextOverrides) => CommandContext;

/**
 * Build the commander program; exit codes are reported through `onExit`
 */
export function createProgram(
  version: string,
  onExit: (code: number) => void,
  contextFactory: ContextFactory = createCommandContext,
): Command {
  const program = new Command();

  program
    .name('compose-topology')
    .description('Validate, inspect, format and generate container compose topologies')
    .version(version)
    .option('--log-level <level>', 'logging level: trace, debug, info, warn, error');

  const run = async (action: (ctx: CommandContext) => Promise<number> | number): Promise<void> => {
    const { logLevel } = program.opts<GlobalFlags>();
    let ctx: CommandContext | undefined;
    try {
      ctx = contextFactory(logLevel !== undefined ? { logLevel } : {});
      onExit(await action(ctx));
    } catch (error) {
      const normalized = normalizeError(error);
      ctx?.logger.error({ error: normalized.toJSON() }, 'Command failed');
      const stream = ctx?.stderr ?? process.stderr;
      stream.write(`❌ ${isApplicationError(error) ? error.message : normalized.message}\n`);
      onExit(1);
    }
  };

  program
    .command('validate')
    .description('check a compose file against the topology rules')
    .argument('[file]', 'compose file (default: COMPOSE_FILE or compose.yaml / docker-compose.yml)')
    .option('--strict', 'treat warnings as errors')
    .addOption(formatOption())
    .option('--env-file <path>', 'variables file for interpolation (default: .env beside the compose file)')
    .option('--no-interpolate', 'keep ${VAR} references as written')
    .action((file: string | undefined, flags: ValidateFlags) =>
      run((ctx) =>
        runValidate(
          file,
          {
            ...(flags.strict !== undefined ? { strict: flags.strict } : {}),
            ...(flags.format !== undefined ? { format: flags.format } : {}),
            ...(flags.envFile !== undefined ? { envFile: flags.envFile } : {}),
            ...(flags.interpolate === false ? { interpolate: false } : {}),
          },
          ctx,
        ),
      ),
    );

  program
    .command('inspect')
    .description('describe services, ports, volumes, health checks and startup order')
    .argument('[file]', 'compose file')
    .addOption(formatOption())
    .option('--env-file <path>', 'variables file for interpolation')
    .option('--no-interpolate', 'keep ${VAR} references as written')
    .action((file: string | undefined, flags: LoadFlags) =>
      run((ctx) =>
        runInspect(
          file,
          {
            ...(flags.format !== undefined ? { format: flags.format } : {}),
            ...(flags.envFile !== undefined ? { envFile: flags.envFile } : {}),
            ...(flags.interpolate === false ? { interpolate: false } : {}),
          },
          ctx,
        ),
      ),
    );

  program
    .command('format')
    .description('print the file as canonical YAML')
    .argument('[file]', 'compose file')
    .option('--check', 'exit 1 when a parse/serialize cycle would change the document')
    .option('--write', 'rewrite the file in place')
    .action((file: string | undefined, flags: FormatFlags) => run((ctx) => runFormat(file, flags, ctx)));

  program
    .command('generate')
    .description('emit the reference database + backend topology')
    .option('-o, --output <file>', 'write to a file instead of stdout')
    .option('--db-service <name>', 'database service name')
    .option('--db-image <image>', 'database image')
    .option('--db-container <name>', 'database container name')
    .option('--db-port <port>', 'database host port', toInteger)
    .option('--db-container-port <port>', 'database container port', toInteger)
    .option('--backend-service <name>', 'backend service name')
    .option('--backend-context <path>', 'backend build context')
    .option('--backend-container <name>', 'backend container name')
    .option('--backend-port <port>', 'backend host port', toInteger)
    .option('--backend-container-port <port>', 'backend container port', toInteger)
    .option('--env-file <path>', 'env_file both services load')
    .option('--network <name>', 'shared network name')
    .option('--volume <name>', 'database volume name')
    .option('--health-timeout <duration>', 'database health check timeout')
    .option('--health-retries <count>', 'database health check retries', toInteger)
    .action((flags: GenerateFlags) => run((ctx) => runGenerate(toTopologyOptions(flags), ctx)));

  program
    .command('config')
    .description('print the resolved configuration')
    .addOption(formatOption())
    .action((flags: { format?: OutputFormat }) => run((ctx) => runConfig(flags, ctx)));

  return program;
}
