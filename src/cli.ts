#!/usr/bin/env node
import { pathToFileURL } from 'url';
import { OpenAICompatibleLlm } from './bridges/llm-http.js';
import { SubprocessSandbox } from './bridges/sandbox.js';
import { InMemoryToolRegistry } from './bridges/tool-registry.js';
import { config } from './utils/config.js';
import { logger } from './utils/logger.js';
import { GracefulShutdown } from './utils/shutdown.js';
import { renderMermaid, type CompiledGraph } from './workflow/builder.js';
import { WorkflowEngine } from './workflow/engine.js';
import { describeError } from './workflow/errors.js';
import { loadWorkflowFile } from './workflow/loader.js';
import type { StateValues } from './workflow/state.js';
import { FileRecordStore } from './workflow/store.js';

const USAGE = `Usage:
  flowgraph validate <workflow.yaml>
  flowgraph graph <workflow.yaml>
  flowgraph run <workflow.yaml> [--input key=value]... [--timeout ms]
  flowgraph trace <run-id>`;

export interface CliArgs {
  command?: string;
  target?: string;
  inputs: Record<string, string>;
  timeoutMs?: number;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const out: CliArgs = { inputs: {}, help: false };
  const positional: string[] = [];

  const addInput = (pair: string): void => {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid --input '${pair}', expected key=value`);
    }
    out.inputs[pair.slice(0, eq)] = pair.slice(eq + 1);
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--help' || arg === '-h') out.help = true;
    else if (arg.startsWith('--input=')) addInput(arg.slice('--input='.length));
    else if (arg === '--input') addInput(argv[++i] ?? '');
    else if (arg.startsWith('--timeout=') || arg === '--timeout') {
      const raw = arg === '--timeout' ? argv[++i] ?? '' : arg.slice('--timeout='.length);
      const timeoutMs = Number(raw);
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        throw new Error(`Invalid --timeout '${raw}', expected a positive number of milliseconds`);
      }
      out.timeoutMs = timeoutMs;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option '${arg}'`);
    } else positional.push(arg);
  }

  [out.command, out.target] = positional;
  return out;
}

/** String fields take the raw text; every other type is read as JSON. */
export function coerceInputs(graph: CompiledGraph, raw: Record<string, string>): Record<string, unknown> {
  const inputs: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const field = graph.stateModel.field(key);
    if (!field || field.type.kind === 'str') {
      inputs[key] = value;
      continue;
    }
    try {
      inputs[key] = JSON.parse(value);
    } catch {
      inputs[key] = value;
    }
  }
  return inputs;
}

async function compileFile(engine: WorkflowEngine, file: string): Promise<CompiledGraph> {
  return engine.compile(await loadWorkflowFile(file));
}

async function runWorkflow(engine: WorkflowEngine, file: string, args: CliArgs): Promise<number> {
  const graph = await compileFile(engine, file);
  const shutdown = new GracefulShutdown();
  shutdown.registerHandler(
    'cancel-runs',
    () => {
      for (const runId of engine.activeRuns()) {
        engine.cancel(runId);
      }
    },
    100,
  );
  shutdown.registerHandler('flush-records', () => engine.drain(), 50);

  engine.onEvent((event) => {
    if (event.type === 'node_completed' || event.type === 'node_failed') {
      logger.info(`${event.nodeId} ${event.type === 'node_completed' ? 'completed' : 'failed'}`, {
        durationMs: event.record.durationMs,
        attempts: event.record.attempts,
      });
    }
  });

  try {
    const outcome = await engine.execute(graph, coerceInputs(graph, args.inputs), {
      mode: 'sync',
      timeoutMs: args.timeoutMs,
    });
    let runId: string;
    let state: StateValues;
    if (outcome.status === 'pending') {
      runId = outcome.handle.runId;
      logger.info(`Run ${runId} is still going after ${args.timeoutMs}ms; waiting for it in the background`);
      state = await outcome.handle.result();
    } else {
      runId = outcome.runId;
      state = outcome.state;
    }

    console.log(JSON.stringify({ runId, state, bottlenecks: engine.bottlenecks(runId), costs: engine.costs(runId) }, null, 2));
    return 0;
  } finally {
    shutdown.dispose();
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return 2;
  }

  if (args.help || !args.command || !args.target) {
    console.log(USAGE);
    return args.help ? 0 : 2;
  }

  const engine = new WorkflowEngine({
    llm: new OpenAICompatibleLlm(),
    tools: new InMemoryToolRegistry(),
    sandbox: new SubprocessSandbox(),
    sink: new FileRecordStore(config.storage.runsDir),
  });

  try {
    switch (args.command) {
      case 'validate': {
        const graph = await compileFile(engine, args.target);
        console.log(`Workflow '${graph.name}' is valid: ${graph.nodes.size} nodes, ${graph.edges.size} edges`);
        return 0;
      }
      case 'graph':
        console.log(renderMermaid(await compileFile(engine, args.target)));
        return 0;
      case 'run':
        return await runWorkflow(engine, args.target, args);
      case 'trace': {
        const entries = await new FileRecordStore(config.storage.runsDir).read(args.target);
        console.log(JSON.stringify(entries, null, 2));
        return entries.length > 0 ? 0 : 1;
      }
      default:
        console.error(`Unknown command '${args.command}'`);
        console.error(USAGE);
        return 2;
    }
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error(`Fatal: ${describeError(error)}`);
      process.exitCode = 1;
    });
}
