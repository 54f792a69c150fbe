/**
 * `.env` / `env_file` parsing
 */

import { Failure, Success, type Result } from '../domain/types/result.js';

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

const DOUBLE_QUOTE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '"': '"',
  '\\': '\\',
  $: '$',
};

function readDoubleQuoted(text: string, line: number): Result<string> {
  let out = '';
  for (let i = 1; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\' && i + 1 < text.length) {
      const escaped = text[i + 1] ?? '';
      out += DOUBLE_QUOTE_ESCAPES[escaped] ?? `\\${escaped}`;
      i++;
      continue;
    }
    if (ch === '"') {
      return Success(out);
    }
    out += ch;
  }
  return Failure(`Line ${line}: unterminated double-quoted value`);
}

/**
 * Parse `KEY=VALUE` lines. Single quotes are literal; double quotes honor `\n`, `\t`,
 * `\"` and `\\`; unquoted values drop a trailing ` # comment`.
 */
export function parseEnvFile(text: string): Result<Record<string, string>> {
  const variables: Record<string, string> = {};
  const lines = text.split(/\r?\n/);

  for (const [index, line] of lines.entries()) {
    const lineNumber = index + 1;
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    const body = trimmed.startsWith('export ') ? trimmed.slice('export '.length).trimStart() : trimmed;
    const eq = body.indexOf('=');
    if (eq === -1) {
      return Failure(`Line ${lineNumber}: expected KEY=VALUE`);
    }

    const key = body.slice(0, eq).trim();
    if (!KEY_PATTERN.test(key)) {
      return Failure(`Line ${lineNumber}: invalid variable name "${key}"`);
    }

    const rawValue = body.slice(eq + 1).trim();
    let value: string;

    if (rawValue.startsWith("'")) {
      const close = rawValue.indexOf("'", 1);
      if (close === -1) {
        return Failure(`Line ${lineNumber}: unterminated single-quoted value`);
      }
      value = rawValue.slice(1, close);
    } else if (rawValue.startsWith('"')) {
      const parsed = readDoubleQuoted(rawValue, lineNumber);
      if (!parsed.ok) return parsed;
      value = parsed.value;
    } else {
      const comment = rawValue.search(/\s#/);
      value = comment === -1 ? rawValue : rawValue.slice(0, comment).trimEnd();
    }

    variables[key] = value;
  }

  return Success(variables);
}
