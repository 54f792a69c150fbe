/**
 * Variable interpolation for compose documents.
 *
 * Supported forms, applied to string values only (never to keys):
 *   $VAR  ${VAR}
 *   ${VAR:-default}  ${VAR-default}   default when unset (or empty, with `:`)
 *   ${VAR:?message}  ${VAR?message}   error when unset (or empty, with `:`)
 *   ${VAR:+alt}      ${VAR+alt}       alt when set (and non-empty, with `:`)
 *   $$                                literal `$`
 */

export type VariableSource = Record<string, string | undefined>;

export interface InterpolationResult {
  document: Record<string, unknown>;
  /** Variables referenced without a default that had no value */
  missing: string[];
  errors: Array<{ path: string; message: string }>;
}

const NAME_START = /^[A-Za-z_][A-Za-z0-9_]*/;
const EXPRESSION = /^([A-Za-z_][A-Za-z0-9_]*)(?:(:?[-?+])([\s\S]*))?$/;

interface State {
  env: VariableSource;
  missing: Set<string>;
  errors: Array<{ path: string; message: string }>;
}

function findClosingBrace(text: string, from: number): number {
  let depth = 1;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function resolveExpression(expression: string, path: string, state: State): string {
  const match = EXPRESSION.exec(expression);
  if (!match) {
    state.errors.push({ path, message: `Invalid interpolation format "\${${expression}}"` });
    return '';
  }

  const name = match[1] ?? '';
  const operator = match[2];
  const argument = match[3] ?? '';
  const raw = state.env[name];
  const isSet = raw !== undefined;
  const value = raw ?? '';
  const isNonEmpty = value !== '';

  switch (operator) {
    case undefined:
      if (!isSet) {
        state.missing.add(name);
        return '';
      }
      return value;
    case ':-':
      return isNonEmpty ? value : substitute(argument, path, state);
    case '-':
      return isSet ? value : substitute(argument, path, state);
    case ':?':
    case '?': {
      const ok = operator === ':?' ? isNonEmpty : isSet;
      if (!ok) {
        const detail = substitute(argument, path, state);
        state.errors.push({
          path,
          message: `Required variable ${name} is not set${detail ? `: ${detail}` : ''}`,
        });
        return '';
      }
      return value;
    }
    case ':+':
      return isNonEmpty ? substitute(argument, path, state) : '';
    case '+':
      return isSet ? substitute(argument, path, state) : '';
    default:
      return '';
  }
}

function substitute(text: string, path: string, state: State): string {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch !== '$') {
      out += ch;
      i++;
      continue;
    }

    const next = text[i + 1];
    if (next === '$') {
      out += '$';
      i += 2;
      continue;
    }

    if (next === '{') {
      const end = findClosingBrace(text, i + 2);
      if (end === -1) {
        state.errors.push({ path, message: `Unterminated variable reference in "${text}"` });
        out += text.slice(i);
        break;
      }
      out += resolveExpression(text.slice(i + 2, end), path, state);
      i = end + 1;
      continue;
    }

    const name = NAME_START.exec(text.slice(i + 1));
    if (name) {
      out += resolveExpression(name[0], path, state);
      i += 1 + name[0].length;
      continue;
    }

    out += '$';
    i++;
  }

  return out;
}

function walk(value: unknown, path: string, state: State): unknown {
  if (typeof value === 'string') {
    return substitute(value, path, state);
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => walk(item, `${path}[${index}]`, state));
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = walk(child, path ? `${path}.${key}` : key, state);
    }
    return out;
  }
  return value;
}

/**
 * Interpolate one string
 */
export function interpolateString(text: string, env: VariableSource): string {
  return substitute(text, '', { env, missing: new Set(), errors: [] });
}

/**
 * Interpolate every string value of a loaded document
 */
export function interpolate(document: Record<string, unknown>, env: VariableSource): InterpolationResult {
  const state: State = { env, missing: new Set(), errors: [] };
  const out: Record<string, unknown> = {};

  for (const [key, child] of Object.entries(document)) {
    out[key] = walk(child, key, state);
  }

  return {
    document: out,
    missing: [...state.missing].sort(),
    errors: state.errors,
  };
}

/**
 * Names of every variable a string references
 */
export function referencedVariables(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(/(?<!\$)\$(?:\{([A-Za-z_][A-Za-z0-9_]*)|([A-Za-z_][A-Za-z0-9_]*))/g)) {
    const name = match[1] ?? match[2];
    if (name !== undefined) names.add(name);
  }
  return [...names];
}
