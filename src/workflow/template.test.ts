import { describe, expect, it } from 'vitest';
import { TemplateResolutionError } from './errors.js';
import { extractVariables, resolveInputs, resolveTemplate } from './template.js';

describe('resolveTemplate', () => {
  const state = { topic: 'from-state', metadata: { flags: { level: 3 } }, items: ['a', 'b'] };

  it('prefers the node input over state for the same name', () => {
    expect(resolveTemplate('About {topic}', { topic: 'from-input' }, state)).toBe('About from-input');
  });

  it('skips the inputs for an explicit state path', () => {
    expect(resolveTemplate('{state.topic}', { topic: 'from-input' }, state)).toBe('from-state');
  });

  it('resolves nested paths and list indices', () => {
    expect(resolveTemplate('level {metadata.flags.level}, first {items.0}', {}, state)).toBe('level 3, first a');
  });

  it('stringifies collections as JSON', () => {
    expect(resolveTemplate('{items}', {}, state)).toBe('["a","b"]');
  });

  it('names the missing path with a suggestion and the known paths', () => {
    let error: unknown;
    try {
      resolveTemplate('{topc}', {}, { topic: 'x', count: 1 });
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(TemplateResolutionError);
    if (error instanceof TemplateResolutionError) {
      expect(error.path).toBe('topc');
      expect(error.closestMatch).toBe('topic');
      expect(error.availablePaths).toEqual(['count', 'topic']);
    }
  });
});

describe('resolveInputs', () => {
  it('binds the raw value for a lone placeholder and a string otherwise', () => {
    const state = { count: 4, tags: ['x'] };
    const inputs = resolveInputs({ n: '{count}', label: 'count={state.count}', tags: '{state.tags}' }, state);

    expect(inputs).toEqual({ n: 4, label: 'count=4', tags: ['x'] });
    expect(inputs.tags).not.toBe(state.tags);
  });
});

describe('extractVariables', () => {
  it('lists each placeholder once', () => {
    expect(extractVariables('{a} and {b.c} and {a}')).toEqual(['a', 'b.c']);
  });
});
