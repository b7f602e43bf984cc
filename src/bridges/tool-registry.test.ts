import { describe, expect, it } from 'vitest';
import { ToolNotFoundError } from '../workflow/errors.js';
import type { Tool } from './capabilities.js';
import { InMemoryToolRegistry } from './tool-registry.js';

function tool(name: string): Tool {
  return { name, invoke: async () => name };
}

describe('InMemoryToolRegistry', () => {
  it('returns registered tools by name', () => {
    const registry = new InMemoryToolRegistry([tool('search'), tool('calculator')]);

    expect(registry.get('search').name).toBe('search');
    expect(registry.names()).toEqual(['calculator', 'search']);
    expect(registry.has('weather')).toBe(false);
  });

  it('refuses a second tool with the same name', () => {
    const registry = new InMemoryToolRegistry([tool('search')]);

    expect(() => registry.register(tool('search'))).toThrow("Tool 'search' is already registered");
  });

  it('suggests the closest name for a missing tool', () => {
    const registry = new InMemoryToolRegistry([tool('search'), tool('calculator')]);

    let caught: unknown;
    try {
      registry.get('serch');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ToolNotFoundError);
    expect(caught instanceof ToolNotFoundError ? caught.suggestion : undefined).toBe(
      "Did you mean 'search'? Available: calculator, search",
    );
  });
});
