/**
 * Volume mount parsing: `[source:]target[:mode]` or the long `{ type, source, target }` map.
 */

import { Failure, Success, type Result } from '../domain/types/result.js';
import type { VolumeMount, VolumeMountType } from '../domain/types/compose.js';

const MOUNT_TYPES = new Set<string>(['volume', 'bind', 'tmpfs'] satisfies VolumeMountType[]);
const ACCESS_MODES = new Set(['ro', 'rw', 'z', 'Z', 'nocopy', 'consistent', 'cached', 'delegated']);

function isMountType(value: string): value is VolumeMountType {
  return MOUNT_TYPES.has(value);
}

/**
 * Sources that name a host path rather than a named volume
 */
export function isHostPath(source: string): boolean {
  return /^[./~$]/.test(source);
}

function parseShortSyntax(raw: string): Result<VolumeMount> {
  const parts = raw.trim().split(':');

  if (parts.length > 3 || parts.some((part) => part === '')) {
    return Failure(`Invalid volume "${raw}"`);
  }

  const [first = '', second, mode] = parts;

  if (second === undefined) {
    if (!first.startsWith('/')) {
      return Failure(`Volume target must be an absolute path in "${raw}"`);
    }
    return Success({ type: 'volume', target: first, readOnly: false, raw });
  }

  if (!second.startsWith('/')) {
    return Failure(`Volume target must be an absolute path in "${raw}"`);
  }

  const modes = mode === undefined ? [] : mode.split(',');
  const unknown = modes.find((m) => !ACCESS_MODES.has(m));
  if (unknown !== undefined) {
    return Failure(`Unknown volume mode "${unknown}" in "${raw}"`);
  }

  return Success({
    type: isHostPath(first) ? 'bind' : 'volume',
    source: first,
    target: second,
    readOnly: modes.includes('ro'),
    raw,
  });
}

function parseLongSyntax(entry: Record<string, unknown>): Result<VolumeMount> {
  const { type, source, target } = entry;
  const readOnly = entry.read_only;

  if (typeof target !== 'string' || !target.startsWith('/')) {
    return Failure('Volume entry needs an absolute "target" path');
  }
  if (source !== undefined && typeof source !== 'string') {
    return Failure(`Invalid "source" in volume entry for ${target}`);
  }
  if (readOnly !== undefined && typeof readOnly !== 'boolean') {
    return Failure(`Invalid "read_only" in volume entry for ${target}`);
  }

  let mountType: VolumeMountType;
  if (type === undefined) {
    mountType = source !== undefined && isHostPath(source) ? 'bind' : 'volume';
  } else if (typeof type === 'string' && isMountType(type)) {
    mountType = type;
  } else {
    return Failure(`Unsupported volume type "${String(type)}" for ${target}`);
  }

  if (mountType === 'bind' && source === undefined) {
    return Failure(`Bind mount for ${target} needs a "source"`);
  }

  return Success({
    type: mountType,
    ...(source !== undefined ? { source } : {}),
    target,
    readOnly: readOnly ?? false,
    raw: source !== undefined ? `${source}:${target}` : target,
  });
}

/**
 * Parse one service `volumes:` entry
 */
export function parseVolumeMount(entry: string | Record<string, unknown>): Result<VolumeMount> {
  return typeof entry === 'string' ? parseShortSyntax(entry) : parseLongSyntax(entry);
}

/**
 * Name of the top-level volume a mount refers to, if any
 */
export function namedVolumeOf(mount: VolumeMount): string | undefined {
  return mount.type === 'volume' ? mount.source : undefined;
}
