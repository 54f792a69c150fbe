/**
 * `generate` command: emit the reference database + backend topology
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { generateTopology, type TopologyOptionsInput } from '../../compose/generator.js';
import { normalizeProject } from '../../compose/parser.js';
import { serializeCompose } from '../../compose/serializer.js';
import { validateProject } from '../../compose/validator.js';
import type { CommandContext } from '../context.js';
import { displayPath, fail } from './shared.js';

export interface GenerateCommandOptions extends TopologyOptionsInput {
  output?: string;
}

export async function runGenerate(options: GenerateCommandOptions, ctx: CommandContext): Promise<number> {
  const { output, ...topologyOptions } = options;

  const generated = generateTopology(topologyOptions);
  if (!generated.ok) return fail(ctx, generated.error);

  const report = validateProject(normalizeProject(generated.value));
  for (const issue of [...report.errors, ...report.warnings]) {
    ctx.logger.warn({ rule: issue.rule, path: issue.path }, issue.message);
  }
  if (!report.valid) {
    return fail(ctx, `Generated topology is invalid: ${report.errors.map((e) => e.message).join('; ')}`);
  }

  const text = serializeCompose(generated.value);

  if (output === undefined) {
    ctx.stdout.write(text);
    return 0;
  }

  const path = resolve(ctx.cwd, output);
  await writeFile(path, text, 'utf-8');
  ctx.logger.info({ file: path }, 'Topology written');
  ctx.stdout.write(`✅ Wrote ${displayPath(path, ctx)}\n`);
  return 0;
}
