/**
 * YAML output and the round-trip check.
 */

import * as yaml from 'js-yaml';
import { Success, type Result } from '../domain/types/result.js';
import { loadYamlMapping, validateDocument } from './parser.js';

export interface SerializeOptions {
  /** Comment lines written above the document, without the leading `#` */
  header?: string[];
}

export interface RoundTripReport {
  preserved: boolean;
  output: string;
  /** Paths whose value changed, capped at MAX_DIFFERENCES */
  differences: string[];
}

const MAX_DIFFERENCES = 20;

/**
 * Dump a document; key order follows the object, anchors are expanded, lines never wrap
 */
export function serializeCompose(document: Record<string, unknown>, options: SerializeOptions = {}): string {
  const header = (options.header ?? []).map((line) => (line === '' ? '#' : `# ${line}`)).join('\n');
  const body = yaml.dump(document, { lineWidth: -1, noRefs: true });
  return header ? `${header}\n${body}` : body;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function childPath(path: string, key: string | number): string {
  if (typeof key === 'number') return `${path}[${key}]`;
  return path ? `${path}.${key}` : key;
}

/**
 * Collect paths where two loaded YAML values differ
 */
export function diffValues(before: unknown, after: unknown, path = '', out: string[] = []): string[] {
  if (out.length >= MAX_DIFFERENCES) return out;

  if (before instanceof Date || after instanceof Date) {
    const same = before instanceof Date && after instanceof Date && before.getTime() === after.getTime();
    if (!same) out.push(path || '(root)');
    return out;
  }

  if (Array.isArray(before) || Array.isArray(after)) {
    if (!Array.isArray(before) || !Array.isArray(after) || before.length !== after.length) {
      out.push(path || '(root)');
      return out;
    }
    before.forEach((item, index) => diffValues(item, after[index], childPath(path, index), out));
    return out;
  }

  if (isRecord(before) && isRecord(after)) {
    const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
    for (const key of keys) {
      const inBefore = Object.prototype.hasOwnProperty.call(before, key);
      const inAfter = Object.prototype.hasOwnProperty.call(after, key);
      if (!inBefore || !inAfter) {
        out.push(childPath(path, key));
        continue;
      }
      diffValues(before[key], after[key], childPath(path, key), out);
    }
    return out;
  }

  if (!Object.is(before, after)) out.push(path || '(root)');
  return out;
}

/**
 * Parse, serialize and parse again; the document is preserved when both loads agree
 */
export function checkRoundTrip(text: string): Result<RoundTripReport> {
  const first = loadYamlMapping(text);
  if (!first.ok) return first;

  const schema = validateDocument(first.value);
  if (!schema.ok) return schema;

  const output = serializeCompose(first.value);
  const second = loadYamlMapping(output);
  if (!second.ok) {
    return Success({ preserved: false, output, differences: ['(root)'] });
  }

  const differences = diffValues(first.value, second.value);
  return Success({ preserved: differences.length === 0, output, differences });
}
