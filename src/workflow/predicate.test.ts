import { describe, expect, it } from 'vitest';
import { PredicateError } from './errors.js';
import { evaluatePredicate, parsePredicate } from './predicate.js';

function check(source: string, state: Record<string, unknown>): boolean {
  return evaluatePredicate(parsePredicate(source), state);
}

describe('predicates', () => {
  const state = { score: 0.85, count: 3, status: 'done', tags: ['x'], meta: { level: 2 }, ok: false };

  it('compares numbers and strings', () => {
    expect(check('score >= 0.8', state)).toBe(true);
    expect(check('count < 3', state)).toBe(false);
    expect(check("status == 'done'", state)).toBe(true);
    expect(check('status != "done"', state)).toBe(false);
  });

  it('combines with boolean operators by precedence', () => {
    expect(check('count > 5 or score > 0.5 and not ok', state)).toBe(true);
    expect(check('(count > 5 or score > 0.5) && ok', state)).toBe(false);
    expect(check('!ok', state)).toBe(true);
  });

  it('evaluates arithmetic before comparing', () => {
    expect(check('count * 2 + 1 == 7', state)).toBe(true);
    expect(check('meta.level - 3 == -1', state)).toBe(true);
  });

  it('treats equality as strict', () => {
    expect(check("count == '3'", state)).toBe(false);
  });

  it('reads a state. prefix as the bare path', () => {
    expect(parsePredicate('state.meta.level > 1').paths).toEqual(['meta.level']);
    expect(check('state.meta.level > 1', state)).toBe(true);
  });

  it('treats a missing path as null', () => {
    expect(check('missing == null', state)).toBe(true);
    expect(check('missing > 1', state)).toBe(false);
  });

  it('uses collection truthiness', () => {
    expect(check('tags', state)).toBe(true);
    expect(check('tags', { tags: [] })).toBe(false);
  });

  it('refuses dunder and code-execution identifiers', () => {
    expect(() => parsePredicate('__class__ == 1')).toThrow(PredicateError);
    expect(() => parsePredicate('x.constructor')).toThrow("Forbidden identifier 'x.constructor'");
    expect(() => parsePredicate('eval')).toThrow(PredicateError);
  });

  it('rejects malformed expressions', () => {
    expect(() => parsePredicate('count >')).toThrow('Unexpected end of expression');
    expect(() => parsePredicate('(count > 1')).toThrow("Missing ')'");
    expect(() => parsePredicate('count ; 1')).toThrow("Unexpected character ';'");
  });

  it('fails on division by zero at evaluation time', () => {
    expect(() => check('count / 0 > 1', state)).toThrow('Division by zero');
  });
});
