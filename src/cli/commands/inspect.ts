/**
 * `inspect` command: describe services, resources, health checks and startup order
 */

import { describeProject } from '../../compose/inspector.js';
import { loadComposeFile } from '../../compose/loader.js';
import type { CommandContext, OutputFormat } from '../context.js';
import { renderProjectDescription } from '../render.js';
import { fail, locateComposeFile } from './shared.js';

export interface InspectCommandOptions {
  format?: OutputFormat;
  envFile?: string;
  interpolate?: boolean;
}

export async function runInspect(
  file: string | undefined,
  options: InspectCommandOptions,
  ctx: CommandContext,
): Promise<number> {
  const located = await locateComposeFile(file, ctx);
  if (!located.ok) return fail(ctx, located.error);

  const loaded = await loadComposeFile(located.value, {
    env: ctx.env,
    cwd: ctx.cwd,
    interpolate: options.interpolate ?? ctx.config.compose.interpolate,
    logger: ctx.logger,
    ...(options.envFile !== undefined ? { envFile: options.envFile } : {}),
  });
  if (!loaded.ok) return fail(ctx, loaded.error);

  const description = describeProject(loaded.value.project, loaded.value.raw);

  if ((options.format ?? ctx.config.output.format) === 'json') {
    ctx.stdout.write(`${JSON.stringify(description, null, 2)}\n`);
  } else {
    ctx.stdout.write(renderProjectDescription(description));
  }

  return 0;
}
