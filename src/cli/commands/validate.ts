/**
 * `validate` command: load a compose file and run every topology rule
 */

import { loadComposeFile } from '../../compose/loader.js';
import { validateProject } from '../../compose/validator.js';
import type { CommandContext, OutputFormat } from '../context.js';
import { renderValidationReport } from '../render.js';
import { displayPath, fail, locateComposeFile } from './shared.js';

export interface ValidateCommandOptions {
  strict?: boolean;
  format?: OutputFormat;
  envFile?: string;
  interpolate?: boolean;
}

export async function runValidate(
  file: string | undefined,
  options: ValidateCommandOptions,
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

  const report = validateProject(loaded.value.project, {
    strict: options.strict ?? ctx.config.compose.strict,
    additionalIssues: loaded.value.issues,
  });

  ctx.logger.info(
    { file: loaded.value.path, errors: report.errors.length, warnings: report.warnings.length },
    'Validation completed',
  );

  const shown = displayPath(loaded.value.path, ctx);
  if ((options.format ?? ctx.config.output.format) === 'json') {
    ctx.stdout.write(`${JSON.stringify({ file: shown, ...report }, null, 2)}\n`);
  } else {
    ctx.stdout.write(renderValidationReport(report, shown));
  }

  return report.valid ? 0 : 1;
}
