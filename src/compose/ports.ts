/**
 * Port mapping parsing.
 *
 * Short syntax: `[[host_ip:]published:]target[/protocol]`, where either side may be a
 * `start-end` range and IPv6 host addresses are written in brackets (`[::1]:80:80`).
 * Long syntax: `{ target, published?, host_ip?, protocol? }`.
 */

import { Failure, Success, type Result } from '../domain/types/result.js';
import type { HostBinding, PortMapping, PortRange, Protocol } from '../domain/types/compose.js';

const PROTOCOLS = new Set<string>(['tcp', 'udp', 'sctp'] satisfies Protocol[]);
const RANGE_PATTERN = /^(\d+)(?:-(\d+))?$/;
const WILDCARD_HOSTS = new Set(['0.0.0.0', '::']);

function isProtocol(value: string): value is Protocol {
  return PROTOCOLS.has(value);
}

function rangeSize(range: PortRange): number {
  return range.end - range.start + 1;
}

/**
 * Parse `8000` or `8000-8010`
 */
export function parsePortRange(text: string): Result<PortRange> {
  const match = RANGE_PATTERN.exec(text.trim());
  if (!match) {
    return Failure(`Invalid port: "${text}"`);
  }

  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);

  if (start < 1 || start > 65535 || end < 1 || end > 65535) {
    return Failure(`Port out of range (1-65535): "${text}"`);
  }
  if (end < start) {
    return Failure(`Invalid port range: "${text}"`);
  }

  return Success({ start, end });
}

function buildMapping(
  raw: string,
  hostIp: string | undefined,
  publishedText: string | undefined,
  targetText: string,
  protocolText: string,
): Result<PortMapping> {
  const protocol = protocolText.toLowerCase();
  if (!isProtocol(protocol)) {
    return Failure(`Unsupported protocol "${protocolText}" in port "${raw}"`);
  }

  const target = parsePortRange(targetText);
  if (!target.ok) {
    return Failure(`${target.error} in port "${raw}"`);
  }

  let published: PortRange | undefined;
  if (publishedText !== undefined && publishedText !== '') {
    const parsed = parsePortRange(publishedText);
    if (!parsed.ok) {
      return Failure(`${parsed.error} in port "${raw}"`);
    }
    published = parsed.value;

    // A host range may feed a single container port; otherwise sizes must agree
    if (rangeSize(target.value) > 1 && rangeSize(published) !== rangeSize(target.value)) {
      return Failure(`Published and target ranges differ in size in port "${raw}"`);
    }
  }

  return Success({
    ...(hostIp !== undefined && hostIp !== '' ? { hostIp } : {}),
    ...(published ? { published } : {}),
    target: target.value,
    protocol,
    raw,
  });
}

function parseShortSyntax(raw: string): Result<PortMapping> {
  let text = raw.trim();
  let protocol = 'tcp';

  const slash = text.lastIndexOf('/');
  if (slash !== -1) {
    protocol = text.slice(slash + 1);
    text = text.slice(0, slash);
  }

  if (text.startsWith('[')) {
    const close = text.indexOf(']');
    if (close === -1 || text[close + 1] !== ':') {
      return Failure(`Invalid host address in port "${raw}"`);
    }
    const hostIp = text.slice(1, close);
    const rest = text.slice(close + 2).split(':');
    if (rest.length !== 2) {
      return Failure(`Invalid port "${raw}"`);
    }
    return buildMapping(raw, hostIp, rest[0], rest[1] ?? '', protocol);
  }

  const parts = text.split(':');
  switch (parts.length) {
    case 1:
      return buildMapping(raw, undefined, undefined, parts[0] ?? '', protocol);
    case 2:
      return buildMapping(raw, undefined, parts[0], parts[1] ?? '', protocol);
    case 3:
      return buildMapping(raw, parts[0], parts[1], parts[2] ?? '', protocol);
    default:
      return Failure(`Invalid port "${raw}" (IPv6 host addresses need brackets)`);
  }
}

function parseLongSyntax(entry: Record<string, unknown>): Result<PortMapping> {
  const { target, published, host_ip: hostIp, protocol } = entry;

  if (typeof target !== 'number' && typeof target !== 'string') {
    return Failure('Port entry is missing "target"');
  }
  if (published !== undefined && typeof published !== 'number' && typeof published !== 'string') {
    return Failure(`Invalid "published" value in port entry for target ${String(target)}`);
  }
  if (hostIp !== undefined && typeof hostIp !== 'string') {
    return Failure(`Invalid "host_ip" value in port entry for target ${String(target)}`);
  }
  if (protocol !== undefined && typeof protocol !== 'string') {
    return Failure(`Invalid "protocol" value in port entry for target ${String(target)}`);
  }

  const publishedText = published === undefined ? undefined : String(published);
  const raw = [hostIp, publishedText, String(target)]
    .filter((part) => part !== undefined)
    .join(':')
    .concat(protocol ? `/${protocol}` : '');

  return buildMapping(raw, hostIp, publishedText, String(target), protocol ?? 'tcp');
}

/**
 * Parse one `ports:` entry in any accepted form
 */
export function parsePortMapping(entry: string | number | Record<string, unknown>): Result<PortMapping> {
  if (typeof entry === 'number') {
    return parseShortSyntax(String(entry));
  }
  if (typeof entry === 'string') {
    return parseShortSyntax(entry);
  }
  return parseLongSyntax(entry);
}

/**
 * Host ports a mapping claims; container-only mappings claim none
 */
export function hostBindingOf(mapping: PortMapping): HostBinding | undefined {
  if (!mapping.published) return undefined;

  return {
    ...(mapping.hostIp !== undefined ? { hostIp: mapping.hostIp } : {}),
    ports: mapping.published,
    protocol: mapping.protocol,
    anyOf: rangeSize(mapping.published) > 1 && rangeSize(mapping.target) === 1,
  };
}

function isWildcard(hostIp: string | undefined): boolean {
  return hostIp === undefined || WILDCARD_HOSTS.has(hostIp);
}

function interfacesOverlap(a: HostBinding, b: HostBinding): boolean {
  if (isWildcard(a.hostIp) || isWildcard(b.hostIp)) return true;
  return a.hostIp === b.hostIp;
}

function covers(outer: PortRange, inner: PortRange): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

/**
 * First host port both bindings need, or undefined when they can coexist.
 *
 * A fixed binding needs every port of its range. An `anyOf` binding needs a single
 * free port, so it only clashes with a fixed binding that covers its whole range.
 */
export function collidingPort(a: HostBinding, b: HostBinding): number | undefined {
  if (a.protocol !== b.protocol || !interfacesOverlap(a, b)) return undefined;

  if (a.anyOf && b.anyOf) return undefined;
  if (a.anyOf) return covers(b.ports, a.ports) ? a.ports.start : undefined;
  if (b.anyOf) return covers(a.ports, b.ports) ? b.ports.start : undefined;

  const start = Math.max(a.ports.start, b.ports.start);
  return start <= Math.min(a.ports.end, b.ports.end) ? start : undefined;
}

export function formatPortMapping(mapping: PortMapping): string {
  const range = (r: PortRange): string => (r.start === r.end ? `${r.start}` : `${r.start}-${r.end}`);
  let host = '';
  if (mapping.hostIp !== undefined) {
    host = mapping.hostIp.includes(':') ? `[${mapping.hostIp}]:` : `${mapping.hostIp}:`;
  }
  const published = mapping.published ? `${range(mapping.published)}:` : host ? ':' : '';
  return `${host}${published}${range(mapping.target)}/${mapping.protocol}`;
}
