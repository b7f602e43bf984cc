import { describe, expect, it } from 'vitest';
import { SchemaBuildError } from './errors.js';
import { StateModel } from './state.js';

describe('StateModel', () => {
  const model = StateModel.build({
    topic: { type: 'str', required: true },
    count: { type: 'int', default: 2 },
    tags: { type: 'list[str]', default: ['a'] },
    score: 'float',
    metadata: {
      type: 'object',
      schema: {
        source: 'str',
        flags: { type: 'object', schema: { level: { type: 'int', default: 1 } } },
      },
    },
  });

  it('fills defaults and zero values around supplied inputs', () => {
    const state = model.create({ topic: 'graphs' });

    expect(state).toEqual({
      topic: 'graphs',
      count: 2,
      tags: ['a'],
      score: 0,
      metadata: { source: '', flags: { level: 1 } },
    });
  });

  it('rejects a missing required field by name', () => {
    expect(() => model.create({ count: 3 })).toThrow("Missing required state field 'topic'");
  });

  it('suggests the closest field for an unknown input', () => {
    let caught: unknown;
    try {
      model.create({ topic: 'x', cout: 1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaBuildError);
    expect(caught instanceof SchemaBuildError ? caught.suggestion : undefined).toBe("Did you mean 'count'?");
  });

  it('never shares default collections between instances', () => {
    const first = model.create({ topic: 'a' });
    const second = model.create({ topic: 'b' });

    expect(first.tags).not.toBe(second.tags);
    expect(Object.isFrozen(first.tags)).toBe(true);
  });

  it('does not freeze or alias the caller inputs', () => {
    const tags = ['x', 'y'];
    const state = model.create({ topic: 'a', tags });

    expect(state.tags).toEqual(['x', 'y']);
    expect(state.tags).not.toBe(tags);
    expect(Object.isFrozen(tags)).toBe(false);
  });

  it('round-trips through serialize and deserialize', () => {
    const state = model.create({ topic: 'loop', count: 7, metadata: { source: 'web', flags: { level: 3 } } });

    expect(model.deserialize(model.serialize(state))).toEqual(state);
  });

  it('applies updates into a new instance and leaves the old one untouched', () => {
    const before = model.create({ topic: 'a' });
    const after = model.apply(before, { count: 9 });

    expect(after.count).toBe(9);
    expect(before.count).toBe(2);
    expect(after.topic).toBe('a');
    expect(Object.isFrozen(after)).toBe(true);
  });

  it('rejects an update of the wrong type', () => {
    const state = model.create({ topic: 'a' });

    expect(() => model.apply(state, { count: 'nine' })).toThrow(SchemaBuildError);
  });

  it('rejects wrongly typed nested values', () => {
    expect(() => model.create({ topic: 'a', metadata: { source: 'x', flags: { level: 'high' } } })).toThrow(
      SchemaBuildError,
    );
  });

  it('gives snapshots their own copies of nested values', () => {
    const state = model.create({ topic: 'a', tags: ['one'] });
    const snapshot = model.snapshot(state);

    expect(snapshot).toEqual(state);
    expect(snapshot.tags).not.toBe(state.tags);
  });

  it('resolves nested paths against the schema', () => {
    expect(model.lookup('metadata.flags.level')).toEqual({ found: true, type: { kind: 'int' } });
    expect(model.lookup('metadata.missing')).toEqual({ found: false });
    expect(model.paths()).toContain('metadata.flags.level');
  });

  describe('build', () => {
    it('rejects a required field that carries a default', () => {
      expect(() => StateModel.build({ x: { type: 'str', required: true, default: 'a' } })).toThrow(
        "State field 'x' is required and cannot have a default",
      );
    });

    it('rejects an unparseable type at build time', () => {
      expect(() => StateModel.build({ x: 'tuple' })).toThrow("State field 'x': Invalid type 'tuple': Unknown type");
    });

    it('rejects a default that does not match its type', () => {
      expect(() => StateModel.build({ x: { type: 'int', default: 'one' } })).toThrow(
        "State field 'x' has a default that does not match type int",
      );
    });

    it('rejects an empty declaration', () => {
      expect(() => StateModel.build({})).toThrow('State must declare at least one field');
    });
  });
});
