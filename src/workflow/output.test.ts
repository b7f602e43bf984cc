import { describe, expect, it } from 'vitest';
import { OutputValidationError, SchemaBuildError } from './errors.js';
import { buildOutputModel } from './output.js';

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('buildOutputModel', () => {
  const model = buildOutputModel('review', {
    type: 'object',
    fields: [
      { name: 'summary', type: 'str' },
      { name: 'score', type: 'float' },
    ],
  });

  it('accepts a conforming payload unchanged', () => {
    expect(model.validate({ summary: 'fine', score: 0.5 })).toEqual({ summary: 'fine', score: 0.5 });
  });

  it('rejects a payload missing a declared field', () => {
    const error = caught(() => model.validate({ summary: 'fine' }));

    expect(error).toBeInstanceOf(OutputValidationError);
    expect(error instanceof OutputValidationError ? [error.nodeId, error.field, error.actual] : []).toEqual([
      'review',
      'score',
      'missing',
    ]);
  });

  it('rejects fields the schema does not declare', () => {
    const error = caught(() => model.validate({ summary: 'fine', score: 1, mood: 'happy' }));

    expect(error instanceof OutputValidationError ? error.field : undefined).toBe('mood');
  });

  it('normalizes numbers and booleans into string fields only', () => {
    expect(model.validate({ summary: 42, score: 2 })).toEqual({ summary: '42', score: 2 });
    expect(() => model.validate({ summary: 'x', score: '2' })).toThrow(
      "Node 'review': output field 'score' expected float, got str",
    );
  });

  it('describes the payload as a JSON Schema', () => {
    expect(model.shape).toEqual({
      type: 'object',
      properties: { summary: { type: 'string' }, score: { type: 'number' } },
      required: ['summary', 'score'],
      additionalProperties: false,
    });
  });

  describe('simple outputs', () => {
    it('wraps a bare value in the result field', () => {
      const simple = buildOutputModel('write', { type: 'str' });

      expect(simple.kind).toBe('simple');
      expect(simple.validate('hello')).toEqual({ result: 'hello' });
      expect(simple.validate({ result: 'hi' })).toEqual({ result: 'hi' });
    });

    it('reports the index of a bad list element', () => {
      const list = buildOutputModel('count', { type: 'list[int]' });
      const error = caught(() => list.validate([1, 'two']));

      expect(error instanceof OutputValidationError ? [error.field, error.expected, error.actual] : []).toEqual([
        'result[1]',
        'int',
        'str',
      ]);
    });

    it('accepts a dict output bare or in its envelope', () => {
      const dict = buildOutputModel('tally', { type: 'dict' });

      expect(dict.validate({ a: 1 })).toEqual({ result: { a: 1 } });
      expect(dict.validate({ result: 1, other: 2 })).toEqual({ result: { result: 1, other: 2 } });
      expect(dict.validate({ result: { a: 1 } })).toEqual({ result: { a: 1 } });
    });

    it('always wraps values returned by code', () => {
      const dict = buildOutputModel('tally', { type: 'dict' });
      const text = buildOutputModel('echo', { type: 'str' });

      expect(dict.validateValue({ result: { a: 1 } })).toEqual({ result: { result: { a: 1 } } });
      expect(text.validateValue('plain')).toEqual({ result: 'plain' });
      expect(() => text.validateValue({ result: 'x' })).toThrow(
        "Node 'echo': output field 'result' expected str, got dict",
      );
    });

    it('does not coerce strings into integers', () => {
      const integer = buildOutputModel('n', { type: 'int' });

      expect(() => integer.validate('3')).toThrow(OutputValidationError);
      expect(integer.validate(3)).toEqual({ result: 3 });
    });
  });

  it('rejects an object schema without fields', () => {
    expect(() => buildOutputModel('empty', { type: 'object' })).toThrow(SchemaBuildError);
  });

  it('rejects nested object fields', () => {
    expect(() =>
      buildOutputModel('nested', { type: 'object', fields: [{ name: 'inner', type: 'object' }] }),
    ).toThrow("Node 'nested' output_schema: nested object field 'inner' is not supported in outputs");
  });
});
