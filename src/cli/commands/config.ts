/**
 * `config` command: print the resolved application configuration
 */

import { getConfigurationSummary } from '../../config/app-config.js';
import type { CommandContext, OutputFormat } from '../context.js';

export interface ConfigCommandOptions {
  format?: OutputFormat;
}

export function runConfig(options: ConfigCommandOptions, ctx: CommandContext): number {
  const summary = getConfigurationSummary(ctx.config);

  if ((options.format ?? ctx.config.output.format) === 'json') {
    ctx.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
    return 0;
  }

  const lines = ['📋 Configuration Summary:', ...Object.entries(summary).map(([key, value]) => `  • ${key}: ${value}`)];
  ctx.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}
