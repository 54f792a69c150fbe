import { relative } from 'node:path';
import { resolveComposePath } from '../../compose/loader.js';
import type { Result } from '../../domain/types/result.js';
import type { CommandContext } from '../context.js';

/**
 * Resolve the compose file a command works on: argument, then COMPOSE_FILE, then discovery
 */
export function locateComposeFile(file: string | undefined, ctx: CommandContext): Promise<Result<string>> {
  return resolveComposePath(ctx.cwd, file ?? ctx.config.compose.file);
}

export function displayPath(path: string, ctx: CommandContext): string {
  const rel = relative(ctx.cwd, path);
  return rel === '' || rel.startsWith('..') ? path : rel;
}

export function fail(ctx: CommandContext, message: string): number {
  ctx.stderr.write(`❌ ${message}\n`);
  return 1;
}
