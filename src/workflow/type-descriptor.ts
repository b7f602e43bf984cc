import { z } from 'zod';
import { SchemaBuildError } from './errors.js';

export type ScalarKind = 'str' | 'int' | 'float' | 'bool';

export type TypeDescriptor =
  | { kind: ScalarKind }
  | { kind: 'list'; element?: TypeDescriptor }
  | { kind: 'dict'; value?: TypeDescriptor }
  | { kind: 'object'; fields: FieldDescriptor[] };

export interface FieldDescriptor {
  name: string;
  type: TypeDescriptor;
  required: boolean;
  hasDefault: boolean;
  default?: unknown;
  description?: string;
}

const SCALARS: readonly ScalarKind[] = ['str', 'int', 'float', 'bool'];
const SUPPORTED = 'str, int, float, bool, list, dict, list[T], dict[str, T], object';

function isScalar(name: string): name is ScalarKind {
  return SCALARS.some((scalar) => scalar === name);
}

function splitTopLevel(source: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const char of source) {
    if (char === '[') depth++;
    if (char === ']') depth--;
    if (char === ',' && depth === 0) {
      parts.push(current.trim());
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current.trim());
  return parts;
}

/**
 * Parse a type string such as `list[dict[str, int]]`.
 *
 * `object` is only valid where a nested schema accompanies it, so callers pass
 * `objectFields` when the declaration carries one.
 */
export function parseTypeString(source: string, objectFields?: FieldDescriptor[]): TypeDescriptor {
  const text = source.trim();
  if (text === '') {
    throw new SchemaBuildError(`Invalid type '${source}': type string is empty`, undefined, `Supported: ${SUPPORTED}`);
  }

  if (isScalar(text)) {
    return { kind: text };
  }
  if (text === 'list') {
    return { kind: 'list' };
  }
  if (text === 'dict') {
    return { kind: 'dict' };
  }
  if (text === 'object') {
    if (!objectFields || objectFields.length === 0) {
      throw new SchemaBuildError(`Invalid type '${source}': object type requires a non-empty schema`);
    }
    return { kind: 'object', fields: objectFields };
  }

  const generic = /^(list|dict)\[(.+)\]$/.exec(text);
  if (generic) {
    const [, container, inner] = generic;
    const params = splitTopLevel(inner ?? '');
    if (container === 'list') {
      if (params.length !== 1) {
        throw new SchemaBuildError(`Invalid type '${source}': list takes exactly one type parameter`);
      }
      return { kind: 'list', element: parseTypeString(params[0] ?? '') };
    }
    if (params.length !== 2) {
      throw new SchemaBuildError(`Invalid type '${source}': dict takes exactly two type parameters`);
    }
    if (params[0] !== 'str') {
      throw new SchemaBuildError(`Invalid type '${source}': dict keys must be str`);
    }
    return { kind: 'dict', value: parseTypeString(params[1] ?? '') };
  }

  throw new SchemaBuildError(`Invalid type '${source}': Unknown type`, undefined, `Supported: ${SUPPORTED}`);
}

export function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'list':
      return type.element ? `list[${describeType(type.element)}]` : 'list';
    case 'dict':
      return type.value ? `dict[str, ${describeType(type.value)}]` : 'dict';
    case 'object':
      return `object{${type.fields.map((field) => `${field.name}: ${describeType(field.type)}`).join(', ')}}`;
    default:
      return type.kind;
  }
}

export function zodFor(type: TypeDescriptor): z.ZodTypeAny {
  switch (type.kind) {
    case 'str':
      return z.string();
    case 'int':
      return z.number().int();
    case 'float':
      return z.number().finite();
    case 'bool':
      return z.boolean();
    case 'list':
      return z.array(type.element ? zodFor(type.element) : z.unknown());
    case 'dict':
      return z.record(z.string(), type.value ? zodFor(type.value) : z.unknown());
    case 'object': {
      const shape: Record<string, z.ZodTypeAny> = {};
      for (const field of type.fields) {
        shape[field.name] = zodFor(field.type);
      }
      return z.object(shape).strict();
    }
  }
}

export function zeroValue(type: TypeDescriptor): unknown {
  switch (type.kind) {
    case 'str':
      return '';
    case 'int':
    case 'float':
      return 0;
    case 'bool':
      return false;
    case 'list':
      return [];
    case 'dict':
      return {};
    case 'object':
      return {};
  }
}

/** Whether a value of type `source` can be stored in a field of type `target`. */
export function isAssignable(source: TypeDescriptor, target: TypeDescriptor): boolean {
  if (source.kind === 'int' && target.kind === 'float') {
    return true;
  }
  if (source.kind === 'list' && target.kind === 'list') {
    if (!target.element) return true;
    return source.element !== undefined && isAssignable(source.element, target.element);
  }
  if (source.kind === 'dict' && target.kind === 'dict') {
    if (!target.value) return true;
    return source.value !== undefined && isAssignable(source.value, target.value);
  }
  return source.kind === target.kind && source.kind !== 'object';
}
