/**
 * Workflow document loading.
 *
 * Reads a YAML or JSON workflow file, parses it and validates it against the
 * document schema. Compilation is a separate step (see GraphCompiler).
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.js';
import { describeError, SpecLoadError } from './errors.js';
import { parseWorkflowSpec, type WorkflowSpec } from './schema.js';

export type DocumentFormat = 'yaml' | 'json';

export function formatFor(filePath: string): DocumentFormat {
  const extension = extname(filePath).toLowerCase();
  if (extension === '.json') return 'json';
  if (extension === '.yaml' || extension === '.yml') return 'yaml';
  throw new SpecLoadError(`Unsupported workflow file extension '${extension || '(none)'}'; use .yaml, .yml or .json`, filePath);
}

/** Parse document text in the given format into a validated workflow document. */
export function parseWorkflowDocument(content: string, format: DocumentFormat, source = '<inline>'): WorkflowSpec {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new SpecLoadError(`Failed to parse ${format.toUpperCase()} in ${source}: ${describeError(error)}`, source, {
      cause: error,
    });
  }
  if (raw === null || raw === undefined) {
    throw new SpecLoadError(`Workflow document ${source} is empty`, source);
  }
  return parseWorkflowSpec(raw);
}

export async function loadWorkflowFile(filePath: string): Promise<WorkflowSpec> {
  const format = formatFor(filePath);
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new SpecLoadError(`Cannot read workflow file ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
  const spec = parseWorkflowDocument(content, format, filePath);
  logger.debug('Loaded workflow document', { filePath, name: spec.flow.name, nodes: spec.nodes.length });
  return spec;
}
