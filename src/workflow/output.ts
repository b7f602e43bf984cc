import { OutputValidationError, SchemaBuildError } from './errors.js';
import type { OutputSchemaDeclaration } from './schema.js';
import { isRecord } from './state.js';
import { describeType, parseTypeString, type TypeDescriptor } from './type-descriptor.js';

export const SIMPLE_OUTPUT_FIELD = 'result';

export interface OutputField {
  name: string;
  type: TypeDescriptor;
  description?: string;
}

/** JSON Schema handed to the LLM capability so it can shape its answer. */
export interface OutputShape {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required: string[];
  additionalProperties: false;
}

export interface OutputModel {
  nodeId: string;
  kind: 'object' | 'simple';
  fields: OutputField[];
  shape: OutputShape;
  /**
   * Check an LLM payload. A simple output accepts either the `{ result }`
   * envelope its shape asks for or the bare value.
   */
  validate(payload: unknown): Record<string, unknown>;
  /** Check a value a code block returned; a simple output always wraps it. */
  validateValue(value: unknown): Record<string, unknown>;
}

function jsonSchemaFor(type: TypeDescriptor, description?: string): Record<string, unknown> {
  const base: Record<string, unknown> = description ? { description } : {};
  switch (type.kind) {
    case 'str':
      return { ...base, type: 'string' };
    case 'int':
      return { ...base, type: 'integer' };
    case 'float':
      return { ...base, type: 'number' };
    case 'bool':
      return { ...base, type: 'boolean' };
    case 'list':
      return { ...base, type: 'array', ...(type.element ? { items: jsonSchemaFor(type.element) } : {}) };
    case 'dict':
      return {
        ...base,
        type: 'object',
        ...(type.value ? { additionalProperties: jsonSchemaFor(type.value) } : {}),
      };
    case 'object':
      return { ...base, type: 'object' };
  }
}

function actualType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'string') return 'str';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'object') return 'dict';
  return typeof value;
}

function coerce(nodeId: string, field: string, type: TypeDescriptor, value: unknown): unknown {
  const mismatch = (): never => {
    throw new OutputValidationError(nodeId, field, describeType(type), actualType(value));
  };

  switch (type.kind) {
    case 'str':
      if (typeof value === 'string') return value;
      if (typeof value === 'number' || typeof value === 'boolean') return String(value);
      return mismatch();
    case 'int':
      return typeof value === 'number' && Number.isInteger(value) ? value : mismatch();
    case 'float':
      return typeof value === 'number' && Number.isFinite(value) ? value : mismatch();
    case 'bool':
      return typeof value === 'boolean' ? value : mismatch();
    case 'list': {
      if (!Array.isArray(value)) return mismatch();
      const element = type.element;
      return element
        ? value.map((item, index) => coerce(nodeId, `${field}[${index}]`, element, item))
        : structuredClone(value);
    }
    case 'dict': {
      if (!isRecord(value)) return mismatch();
      const valueType = type.value;
      if (!valueType) return structuredClone(value);
      const out: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        out[key] = coerce(nodeId, `${field}.${key}`, valueType, item);
      }
      return out;
    }
    case 'object':
      return mismatch();
  }
}

/**
 * Build the validator for a node's declared result shape. Scalar and
 * collection outputs are wrapped in a single `result` field.
 */
export function buildOutputModel(nodeId: string, declaration: OutputSchemaDeclaration): OutputModel {
  const fail = (message: string): never => {
    throw new SchemaBuildError(`Node '${nodeId}' output_schema: ${message}`, nodeId);
  };

  let kind: OutputModel['kind'];
  let fields: OutputField[];

  if (declaration.type.trim() === 'object') {
    if (!declaration.fields || declaration.fields.length === 0) {
      return fail('object outputs must declare fields');
    }
    kind = 'object';
    const seen = new Set<string>();
    fields = declaration.fields.map((field) => {
      if (seen.has(field.name)) {
        fail(`duplicate output field '${field.name}'`);
      }
      seen.add(field.name);
      if (field.type.trim() === 'object') {
        fail(`nested object field '${field.name}' is not supported in outputs`);
      }
      const type = parseTypeString(field.type);
      return { name: field.name, type, description: field.description };
    });
  } else {
    if (declaration.fields && declaration.fields.length > 0) {
      return fail(`fields are only allowed when type is 'object'`);
    }
    kind = 'simple';
    fields = [{ name: SIMPLE_OUTPUT_FIELD, type: parseTypeString(declaration.type), description: declaration.description }];
  }

  const shape: OutputShape = {
    type: 'object',
    properties: Object.fromEntries(fields.map((field) => [field.name, jsonSchemaFor(field.type, field.description)])),
    required: fields.map((field) => field.name),
    additionalProperties: false,
  };

  const check = (record: unknown): Record<string, unknown> => {
    if (!isRecord(record)) {
      throw new OutputValidationError(nodeId, '(root)', 'object', actualType(record));
    }
    const declared = new Set(fields.map((field) => field.name));
    for (const key of Object.keys(record)) {
      if (!declared.has(key)) {
        throw new OutputValidationError(nodeId, key, 'no such field', 'unexpected field');
      }
    }
    const result: Record<string, unknown> = {};
    for (const field of fields) {
      if (!Object.hasOwn(record, field.name) || record[field.name] === undefined) {
        throw new OutputValidationError(nodeId, field.name, describeType(field.type), 'missing');
      }
      result[field.name] = coerce(nodeId, field.name, field.type, record[field.name]);
    }
    return result;
  };

  const wrap = (value: unknown): Record<string, unknown> => ({ [SIMPLE_OUTPUT_FIELD]: value });

  return {
    nodeId,
    kind,
    fields,
    shape,
    validate(payload: unknown): Record<string, unknown> {
      return check(kind === 'simple' && !isEnvelope(payload) ? wrap(payload) : payload);
    },
    validateValue(value: unknown): Record<string, unknown> {
      return check(kind === 'simple' ? wrap(value) : value);
    },
  };
}

function isEnvelope(payload: unknown): boolean {
  if (!isRecord(payload)) return false;
  const keys = Object.keys(payload);
  return keys.length === 1 && keys[0] === SIMPLE_OUTPUT_FIELD;
}
