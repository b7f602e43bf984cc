import type { z } from 'zod';
import { SchemaBuildError } from './errors.js';
import type { StateFieldDeclaration } from './schema.js';
import { closestMatch } from './suggest.js';
import {
  describeType,
  parseTypeString,
  zeroValue,
  zodFor,
  type FieldDescriptor,
  type TypeDescriptor,
} from './type-descriptor.js';

export type StateValues = Readonly<Record<string, unknown>>;

/** Result of looking a dot path up in the declared schema. */
export type PathLookup =
  | { found: true; type: TypeDescriptor }
  | { found: true; type: undefined }
  | { found: false };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function buildField(name: string, declaration: string | StateFieldDeclaration, path: string): FieldDescriptor {
  const decl: StateFieldDeclaration = typeof declaration === 'string' ? { type: declaration } : declaration;
  const required = decl.required ?? false;

  if (required && decl.default !== undefined) {
    throw new SchemaBuildError(`State field '${path}' is required and cannot have a default`, path);
  }

  let nested: FieldDescriptor[] | undefined;
  if (decl.schema !== undefined) {
    if (decl.type.trim() !== 'object') {
      throw new SchemaBuildError(`State field '${path}' declares a schema but its type is '${decl.type}'`, path);
    }
    nested = Object.entries(decl.schema).map(([child, childDecl]) => buildField(child, childDecl, `${path}.${child}`));
  }

  let type: TypeDescriptor;
  try {
    type = parseTypeString(decl.type, nested);
  } catch (error) {
    if (error instanceof SchemaBuildError) {
      throw new SchemaBuildError(`State field '${path}': ${error.message}`, path);
    }
    throw error;
  }

  const field: FieldDescriptor = {
    name,
    type,
    required,
    hasDefault: decl.default !== undefined,
    default: decl.default,
    description: decl.description,
  };

  if (field.hasDefault) {
    const parsed = zodFor(type).safeParse(decl.default);
    if (!parsed.success) {
      throw new SchemaBuildError(
        `State field '${path}' has a default that does not match type ${describeType(type)}`,
        path,
      );
    }
  }
  return field;
}

/**
 * Validated container type built from state field declarations.
 *
 * Instances are deep-frozen plain objects; `apply` returns a new instance and
 * never touches the one it was given.
 */
export class StateModel {
  private readonly byName: Map<string, FieldDescriptor>;

  private constructor(readonly fields: readonly FieldDescriptor[]) {
    this.byName = new Map(fields.map((field) => [field.name, field]));
  }

  static build(declarations: Record<string, string | StateFieldDeclaration>): StateModel {
    const entries = Object.entries(declarations);
    if (entries.length === 0) {
      throw new SchemaBuildError('State must declare at least one field');
    }
    return new StateModel(entries.map(([name, decl]) => buildField(name, decl, name)));
  }

  field(name: string): FieldDescriptor | undefined {
    return this.byName.get(name);
  }

  fieldNames(): string[] {
    return this.fields.map((field) => field.name);
  }

  /** Every dot path the schema declares, nested object fields included. */
  paths(): string[] {
    const collect = (fields: readonly FieldDescriptor[], prefix: string): string[] =>
      fields.flatMap((field) => {
        const path = prefix ? `${prefix}.${field.name}` : field.name;
        return field.type.kind === 'object' ? [path, ...collect(field.type.fields, path)] : [path];
      });
    return collect(this.fields, '');
  }

  /**
   * Resolve a dot path against the schema. Paths that descend into an untyped
   * `dict` or a `list` are found with an unknown type.
   */
  lookup(path: string): PathLookup {
    const segments = path.split('.');
    let fields: readonly FieldDescriptor[] = this.fields;
    let type: TypeDescriptor | undefined;

    for (let index = 0; index < segments.length; index++) {
      const field = fields.find((candidate) => candidate.name === segments[index]);
      if (!field) {
        return { found: false };
      }
      type = field.type;
      if (index === segments.length - 1) {
        return { found: true, type };
      }
      if (type.kind === 'dict' || type.kind === 'list') {
        return { found: true, type: undefined };
      }
      if (type.kind !== 'object') {
        return { found: false };
      }
      fields = type.fields;
    }
    return { found: false };
  }

  create(inputs: Record<string, unknown> = {}): StateValues {
    for (const key of Object.keys(inputs)) {
      if (!this.byName.has(key)) {
        const suggestion = closestMatch(key, this.fieldNames());
        throw new SchemaBuildError(
          `Unknown state field '${key}'`,
          key,
          suggestion ? `Did you mean '${suggestion}'?` : undefined,
        );
      }
    }
    const values = materialize(this.fields, inputs, '');
    validateFields(this.fields, values, Object.keys(values));
    return deepFreeze(values);
  }

  apply(state: StateValues, updates: Record<string, unknown>): StateValues {
    const next: Record<string, unknown> = { ...state };
    for (const [key, value] of Object.entries(updates)) {
      if (!this.byName.has(key)) {
        throw new SchemaBuildError(`Unknown state field '${key}'`, key);
      }
      next[key] = structuredClone(value);
    }
    validateFields(this.fields, next, Object.keys(updates));
    return deepFreeze(next);
  }

  /** Independent, mutable-free copy for handing to a concurrent branch. */
  snapshot(state: StateValues): StateValues {
    return deepFreeze(structuredClone({ ...state }));
  }

  serialize(state: StateValues): string {
    return JSON.stringify(state);
  }

  deserialize(text: string): StateValues {
    const parsed: unknown = JSON.parse(text);
    if (!isRecord(parsed)) {
      throw new SchemaBuildError('Serialized state must be a JSON object');
    }
    return this.create(parsed);
  }
}

function materialize(
  fields: readonly FieldDescriptor[],
  provided: Record<string, unknown>,
  prefix: string,
): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const field of fields) {
    const path = prefix ? `${prefix}.${field.name}` : field.name;
    const supplied = Object.hasOwn(provided, field.name) ? provided[field.name] : undefined;

    if (supplied === undefined && field.required) {
      throw new SchemaBuildError(`Missing required state field '${path}'`, path);
    }

    const raw = supplied !== undefined ? supplied : field.hasDefault ? field.default : zeroValue(field.type);
    let value: unknown = structuredClone(raw);
    if (field.type.kind === 'object') {
      if (!isRecord(value)) {
        throw new SchemaBuildError(`Invalid value for state field '${path}': expected object`, path);
      }
      value = { ...value, ...materialize(field.type.fields, value, path) };
    }
    values[field.name] = value;
  }
  return values;
}

function validateFields(fields: readonly FieldDescriptor[], values: Record<string, unknown>, keys: string[]): void {
  for (const key of keys) {
    const field = fields.find((candidate) => candidate.name === key);
    if (!field) continue;
    const schema: z.ZodTypeAny = zodFor(field.type);
    const result = schema.safeParse(values[key]);
    if (!result.success) {
      const issue = result.error.issues[0];
      const path = [key, ...(issue?.path ?? [])].join('.');
      throw new SchemaBuildError(
        `Invalid value for state field '${path}': expected ${describeType(field.type)} (${issue?.message ?? 'type mismatch'})`,
        path,
      );
    }
  }
}
