import { TemplateResolutionError } from './errors.js';
import { isRecord } from './state.js';
import { closestMatch } from './suggest.js';

const PLACEHOLDER = /\{([a-zA-Z_][a-zA-Z0-9_.]*)\}/g;
const SINGLE_PLACEHOLDER = /^\{([a-zA-Z_][a-zA-Z0-9_.]*)\}$/;
const STATE_PREFIX = 'state.';

type Lookup = { found: true; value: unknown } | { found: false };

export function extractVariables(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (match[1]) names.add(match[1]);
  }
  return [...names];
}

/** `{state.topic}` and `{topic}` address the same state path. */
export function stripStatePrefix(path: string): string {
  return path.startsWith(STATE_PREFIX) ? path.slice(STATE_PREFIX.length) : path;
}

export function getPath(source: unknown, path: string): Lookup {
  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      const index = Number(segment);
      if (index >= current.length) return { found: false };
      current = current[index];
      continue;
    }
    if (!isRecord(current) || !Object.hasOwn(current, segment)) {
      return { found: false };
    }
    current = current[segment];
  }
  return { found: true, value: current };
}

/** Dot paths of every nested mapping key, used for suggestions. */
export function listPaths(source: Record<string, unknown>, prefix = ''): string[] {
  const paths: string[] = [];
  for (const [key, value] of Object.entries(source)) {
    const path = prefix ? `${prefix}.${key}` : key;
    paths.push(path);
    if (isRecord(value)) {
      paths.push(...listPaths(value, path));
    }
  }
  return paths;
}

export function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function unresolved(path: string, inputs: Record<string, unknown>, state: Record<string, unknown>): TemplateResolutionError {
  const available = [...new Set([...listPaths(inputs), ...listPaths(state)])].sort();
  return new TemplateResolutionError(path, available, closestMatch(path, available));
}

/**
 * Look a placeholder path up, node-local inputs first, then state.
 * A `state.` prefix skips the inputs.
 */
export function lookupVariable(
  path: string,
  inputs: Record<string, unknown>,
  state: Record<string, unknown>,
): unknown {
  if (!path.startsWith(STATE_PREFIX)) {
    const fromInputs = getPath(inputs, path);
    if (fromInputs.found) return fromInputs.value;
  }
  const fromState = getPath(state, stripStatePrefix(path));
  if (fromState.found) return fromState.value;
  throw unresolved(path, inputs, state);
}

export function resolveTemplate(
  template: string,
  inputs: Record<string, unknown>,
  state: Record<string, unknown>,
): string {
  return template.replace(PLACEHOLDER, (_match, path: string) => stringify(lookupVariable(path, inputs, state)));
}

/**
 * Resolve a node's input mapping against state. A mapping that is exactly one
 * placeholder binds the raw value, anything else binds the substituted string.
 */
export function resolveInputs(
  mappings: Record<string, string>,
  state: Record<string, unknown>,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [name, template] of Object.entries(mappings)) {
    const single = SINGLE_PLACEHOLDER.exec(template.trim());
    resolved[name] = single?.[1]
      ? structuredClone(lookupVariable(stripStatePrefix(single[1]), {}, state))
      : resolveTemplate(template.replace(/\{state\./g, '{'), {}, state);
  }
  return resolved;
}
