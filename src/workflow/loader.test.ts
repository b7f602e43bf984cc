import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { SpecLoadError, SpecValidationError } from './errors.js';
import { formatFor, loadWorkflowFile, parseWorkflowDocument } from './loader.js';

const YAML_DOCUMENT = `
schema_version: "1.0"
flow:
  name: greet
state:
  fields:
    name: { type: str, required: true }
    greeting: { type: str }
nodes:
  - id: hello
    prompt: "Say hello to {name}"
    output_schema: { type: str }
    outputs: [greeting]
edges:
  - { from: START, to: hello }
  - { from: hello, to: END }
`;

describe('formatFor', () => {
  it('maps extensions to formats', () => {
    expect(formatFor('flow.yaml')).toBe('yaml');
    expect(formatFor('flow.YML')).toBe('yaml');
    expect(formatFor('flow.json')).toBe('json');
    expect(() => formatFor('flow.toml')).toThrow("Unsupported workflow file extension '.toml'");
  });
});

describe('parseWorkflowDocument', () => {
  it('parses and validates YAML', () => {
    const spec = parseWorkflowDocument(YAML_DOCUMENT, 'yaml');

    expect(spec.flow.name).toBe('greet');
    expect(spec.nodes.map((node) => node.id)).toEqual(['hello']);
    expect(spec.edges[0]).toEqual({ from: 'START', to: 'hello' });
  });

  it('names the source when the text does not parse', () => {
    expect(() => parseWorkflowDocument('{ nope', 'json', 'broken.json')).toThrow(
      /^Failed to parse JSON in broken\.json: /,
    );
  });

  it('rejects an empty document', () => {
    expect(() => parseWorkflowDocument('', 'yaml', 'empty.yaml')).toThrow('Workflow document empty.yaml is empty');
  });

  it('lists schema issues with their paths', () => {
    let caught: unknown;
    try {
      parseWorkflowDocument('{"schema_version":"1.0","flow":{"name":"x"},"state":{"fields":{}},"nodes":[],"edges":[]}', 'json');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SpecValidationError);
    expect(caught instanceof SpecValidationError ? caught.issues : []).toEqual([
      'nodes: Workflow must have at least one node',
      'edges: Workflow must have at least one edge',
    ]);
  });
});

describe('loadWorkflowFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flowgraph-specs-'));
    await writeFile(join(dir, 'greet.yaml'), YAML_DOCUMENT);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a workflow file from disk', async () => {
    const spec = await loadWorkflowFile(join(dir, 'greet.yaml'));

    expect(spec.flow.name).toBe('greet');
  });

  it('wraps a missing file in SpecLoadError', async () => {
    await expect(loadWorkflowFile(join(dir, 'missing.yaml'))).rejects.toBeInstanceOf(SpecLoadError);
  });
});
