/**
 * `format` command: canonical YAML output and the round-trip check
 */

import { readFile, writeFile } from 'node:fs/promises';
import { checkRoundTrip } from '../../compose/serializer.js';
import type { CommandContext } from '../context.js';
import { displayPath, fail, locateComposeFile } from './shared.js';

export interface FormatCommandOptions {
  /** Only report whether the document survives a parse/serialize/parse cycle */
  check?: boolean;
  /** Rewrite the file in place */
  write?: boolean;
}

export async function runFormat(
  file: string | undefined,
  options: FormatCommandOptions,
  ctx: CommandContext,
): Promise<number> {
  const located = await locateComposeFile(file, ctx);
  if (!located.ok) return fail(ctx, located.error);

  const path = located.value;
  const shown = displayPath(path, ctx);
  const text = await readFile(path, 'utf-8');

  const roundTrip = checkRoundTrip(text);
  if (!roundTrip.ok) return fail(ctx, `${shown}: ${roundTrip.error}`);

  const { preserved, output, differences } = roundTrip.value;
  ctx.logger.debug({ file: path, preserved, differences }, 'Round trip checked');

  if (options.check) {
    if (!preserved) {
      return fail(ctx, `${shown} does not round-trip; changed: ${differences.join(', ')}`);
    }
    ctx.stdout.write(`✅ ${shown} round-trips without changes\n`);
    return 0;
  }

  if (!preserved) {
    return fail(ctx, `${shown} would change when re-serialized; changed: ${differences.join(', ')}`);
  }

  if (options.write) {
    await writeFile(path, output, 'utf-8');
    ctx.logger.info({ file: path }, 'Compose file rewritten');
    ctx.stdout.write(`✅ Wrote ${shown}\n`);
    return 0;
  }

  ctx.stdout.write(output);
  return 0;
}
