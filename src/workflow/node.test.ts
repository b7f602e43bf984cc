import { describe, expect, it, vi } from 'vitest';
import type {
  LlmCapability,
  LlmRequest,
  LlmResponse,
  SandboxCapability,
  SandboxLimits,
  SandboxResult,
} from '../bridges/capabilities.js';
import { TablePricing } from '../bridges/pricing.js';
import { compileWorkflow, type CompiledNode } from './builder.js';
import { CostAggregator } from './cost.js';
import { CapabilityError, NodeExecutionError, RunCancelledError } from './errors.js';
import { Profiler } from './monitor.js';
import {
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  isTransientFailure,
  mergeLlmConfig,
  NodeExecutor,
  type NodeExecutorOptions,
} from './node.js';
import type { WorkflowSpecInput } from './schema.js';
import type { ExecutionRecord } from './types.js';

type NodeInput = WorkflowSpecInput['nodes'][number];

const USAGE = { inputTokens: 1000, outputTokens: 1000, totalTokens: 2000 };

function compileNode(declaration: NodeInput): CompiledNode {
  const graph = compileWorkflow({
    schema_version: '1.0',
    flow: { name: 'node-test' },
    state: {
      fields: {
        topic: { type: 'str', required: true },
        draft: { type: 'str' },
        summary: { type: 'str' },
        score: { type: 'float' },
        count: { type: 'int', default: 3 },
        total: { type: 'int' },
        stats: { type: 'dict' },
      },
    },
    nodes: [declaration],
    edges: [
      { from: 'START', to: declaration.id },
      { from: declaration.id, to: 'END' },
    ],
  });
  const node = graph.nodes.get(declaration.id);
  if (!node) throw new Error(`node ${declaration.id} did not compile`);
  return node;
}

function setup(llm: LlmCapability, overrides: Partial<NodeExecutorOptions> = {}) {
  const records: ExecutionRecord[] = [];
  const costs = new CostAggregator(
    new TablePricing({
      unit: 'usd_per_1k_tokens',
      free_providers: [],
      providers: { openai: { 'gpt-4o-mini': { input: 0.00015, output: 0.0006 } } },
    }),
  );
  const profiler = new Profiler();
  const executor = new NodeExecutor({
    runId: 'run-1',
    llm,
    llmDefaults: { provider: 'openai', model: 'gpt-4o-mini' },
    retry: { ...DEFAULT_RETRY_POLICY, backoffMs: 0, maxBackoffMs: 0, validationDelayMs: 0 },
    timeoutMs: 1000,
    costs,
    profiler,
    commit: (record) => records.push(record),
    ...overrides,
  });
  return { executor, records, costs, profiler };
}

function fakeLlm() {
  const invoke = vi.fn<[LlmRequest], Promise<LlmResponse>>();
  const llm: LlmCapability = { invoke };
  return { invoke, llm };
}

const state = Object.freeze({ topic: 'graphs', draft: '', summary: '', score: 0, count: 3, total: 0 });
const live = (): AbortSignal => new AbortController().signal;

describe('NodeExecutor', () => {
  const write = compileNode({ id: 'write', prompt: 'Write about {topic}', output_schema: { type: 'str' }, outputs: ['draft'] });
  const review = compileNode({
    id: 'review',
    prompt: 'Review {draft}',
    output_schema: {
      type: 'object',
      fields: [
        { name: 'summary', type: 'str' },
        { name: 'score', type: 'float' },
      ],
    },
    outputs: ['summary', 'score'],
  });

  it('resolves the prompt, maps the output and commits one record', async () => {
    const { invoke, llm } = fakeLlm();
    invoke.mockResolvedValue({ payload: 'a first draft', usage: USAGE });
    const { executor, records, profiler } = setup(llm);

    const updates = await executor.execute(write, { state, signal: live() });

    expect(updates).toEqual({ draft: 'a first draft' });
    expect(invoke.mock.calls[0]?.[0].prompt).toBe('Write about graphs');
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      runId: 'run-1',
      nodeId: 'write',
      attempts: 1,
      usage: USAGE,
      cost: { provider: 'openai', model: 'gpt-4o-mini', costUsd: 0.00075 },
    });
    expect(records[0]?.error).toBeUndefined();
    expect(profiler.timings().map((timing) => timing.nodeId)).toEqual(['write']);
  });

  it('retries invalid output with the validation error added to the prompt', async () => {
    const { invoke, llm } = fakeLlm();
    invoke
      .mockResolvedValueOnce({ payload: { summary: 'short' }, usage: USAGE })
      .mockResolvedValueOnce({ payload: { summary: 'short', score: 0.9 }, usage: USAGE });
    const { executor, records } = setup(llm);

    const updates = await executor.execute(review, { state, signal: live() });

    expect(updates).toEqual({ summary: 'short', score: 0.9 });
    expect(invoke).toHaveBeenCalledTimes(2);
    const retried = invoke.mock.calls[1]?.[0].prompt ?? '';
    expect(retried.startsWith('Review \n\n')).toBe(true);
    expect(retried).toContain(
      "Previous attempt failed validation: Node 'review': output field 'score' expected float, got missing",
    );
    expect(records).toHaveLength(1);
    expect(records[0]?.attempts).toBe(2);
    expect(records[0]?.usage).toEqual({ inputTokens: 2000, outputTokens: 2000, totalTokens: 4000 });
  });

  it('fails in the validate phase once attempts run out', async () => {
    const { invoke, llm } = fakeLlm();
    invoke.mockResolvedValue({ payload: { summary: 'short' }, usage: USAGE });
    const { executor, records } = setup(llm);

    const failure = await executor.execute(review, { state, signal: live() }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(NodeExecutionError);
    if (failure instanceof NodeExecutionError) {
      expect(failure.phase).toBe('validate');
      expect(failure.attempts).toBe(3);
    }
    expect(invoke).toHaveBeenCalledTimes(3);
    expect(records).toHaveLength(1);
    expect(records[0]?.error).toMatchObject({ phase: 'validate', name: 'OutputValidationError' });
  });

  it('backs off and retries transient failures', async () => {
    const { invoke, llm } = fakeLlm();
    invoke
      .mockRejectedValueOnce(new CapabilityError('HTTP 503: overloaded', true))
      .mockResolvedValueOnce({ payload: 'recovered', usage: USAGE });
    const { executor, records } = setup(llm);

    await expect(executor.execute(write, { state, signal: live() })).resolves.toEqual({ draft: 'recovered' });
    expect(invoke).toHaveBeenCalledTimes(2);
    expect(records[0]?.attempts).toBe(2);
  });

  it('does not retry permanent failures', async () => {
    const { invoke, llm } = fakeLlm();
    invoke.mockRejectedValue(new CapabilityError('HTTP 401: bad key', false));
    const { executor, records } = setup(llm);

    await expect(executor.execute(write, { state, signal: live() })).rejects.toThrow(
      "Node 'write' failed during invoke: HTTP 401: bad key",
    );
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(records).toHaveLength(1);
    expect(records[0]?.error).toMatchObject({ phase: 'invoke', name: 'CapabilityError' });
  });

  it('lets a node cap its own attempts', async () => {
    const { invoke, llm } = fakeLlm();
    invoke.mockRejectedValue(new CapabilityError('HTTP 429: slow down', true));
    const once = compileNode({
      id: 'write',
      prompt: 'Write about {topic}',
      output_schema: { type: 'str' },
      outputs: ['draft'],
      retry: { max_attempts: 1 },
    });
    const { executor } = setup(llm);

    await expect(executor.execute(once, { state, signal: live() })).rejects.toBeInstanceOf(NodeExecutionError);
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('commits nothing when the run is cancelled mid-call', async () => {
    const controller = new AbortController();
    const { invoke, llm } = fakeLlm();
    invoke.mockImplementation(async () => {
      controller.abort();
      return { payload: 'too late', usage: USAGE };
    });
    const { executor, records, costs } = setup(llm);

    await expect(executor.execute(write, { state, signal: controller.signal })).rejects.toBeInstanceOf(
      RunCancelledError,
    );
    expect(records).toHaveLength(0);
    expect(costs.summary().totalCalls).toBe(0);
  });

  it('records the iteration it was given', async () => {
    const { invoke, llm } = fakeLlm();
    invoke.mockResolvedValue({ payload: 'again', usage: USAGE });
    const { executor, records } = setup(llm);

    await executor.execute(write, { state, signal: live(), iteration: 2 });

    expect(records[0]?.iteration).toBe(2);
  });

  describe('tools', () => {
    it('skips a missing tool marked continue', async () => {
      const { invoke, llm } = fakeLlm();
      invoke.mockResolvedValue({ payload: 'no tools needed', usage: USAGE });
      const node = compileNode({
        id: 'write',
        prompt: 'Write about {topic}',
        output_schema: { type: 'str' },
        outputs: ['draft'],
        tools: [{ name: 'search', on_error: 'continue' }],
      });
      const { executor } = setup(llm);

      await executor.execute(node, { state, signal: live() });

      expect(invoke.mock.calls[0]?.[0].tools).toEqual([]);
    });

    it('fails in the resolve phase for a missing required tool', async () => {
      const { invoke, llm } = fakeLlm();
      const node = compileNode({
        id: 'write',
        prompt: 'Write about {topic}',
        output_schema: { type: 'str' },
        outputs: ['draft'],
        tools: ['search'],
      });
      const { executor, records } = setup(llm);

      await expect(executor.execute(node, { state, signal: live() })).rejects.toThrow(
        "Node 'write' failed during resolve: Tool 'search' not found in registry",
      );
      expect(invoke).not.toHaveBeenCalled();
      expect(records[0]?.error?.phase).toBe('resolve');
    });
  });

  describe('code nodes', () => {
    const doubler = compileNode({ id: 'double', code: 'return count * 2', output_schema: { type: 'int' }, outputs: ['total'] });

    it('runs code in the sandbox with state bound by name', async () => {
      const run = vi.fn<[string, Record<string, unknown>, SandboxLimits, AbortSignal?], Promise<SandboxResult>>();
      run.mockResolvedValue({ output: 6 });
      const sandbox: SandboxCapability = { run };
      const { llm } = fakeLlm();
      const { executor, records } = setup(llm, { sandbox });

      const updates = await executor.execute(doubler, { state, signal: live() });

      expect(updates).toEqual({ total: 6 });
      expect(run.mock.calls[0]?.[0]).toBe('return count * 2');
      expect(run.mock.calls[0]?.[1]).toMatchObject({ count: 3, topic: 'graphs' });
      expect(run.mock.calls[0]?.[2]).toEqual({ timeoutMs: 30000, memoryMb: 512 });
      expect(records[0]?.cost).toEqual({ provider: 'sandbox', model: 'sandbox', costUsd: 0 });
    });

    it('stores a returned dict whole in a dict output', async () => {
      const counter = compileNode({
        id: 'tally',
        code: 'return { words: 2, result: 1 };',
        output_schema: { type: 'dict' },
        outputs: ['stats'],
      });
      const sandbox: SandboxCapability = { run: async () => ({ output: { words: 2, result: 1 } }) };
      const { llm } = fakeLlm();
      const { executor } = setup(llm, { sandbox });

      await expect(executor.execute(counter, { state, signal: live() })).resolves.toEqual({
        stats: { words: 2, result: 1 },
      });
    });

    it('aborts the sandbox call when the run is cancelled', async () => {
      const controller = new AbortController();
      let seen: AbortSignal | undefined;
      const sandbox: SandboxCapability = {
        run: (_code, _bindings, _limits, signal) =>
          new Promise<SandboxResult>((_, reject) => {
            seen = signal;
            signal?.addEventListener('abort', () => reject(new Error('Sandbox run was cancelled')));
          }),
      };
      const { llm } = fakeLlm();
      const { executor, records } = setup(llm, { sandbox });

      const running = executor.execute(doubler, { state, signal: controller.signal });
      controller.abort();

      await expect(running).rejects.toBeInstanceOf(RunCancelledError);
      expect(seen?.aborted).toBe(true);
      expect(records).toHaveLength(0);
    });

    it('fails when no sandbox is configured', async () => {
      const { llm } = fakeLlm();
      const { executor } = setup(llm);

      await expect(executor.execute(doubler, { state, signal: live() })).rejects.toThrow(
        'No sandbox capability configured',
      );
    });
  });
});

describe('retry helpers', () => {
  it('grows the backoff geometrically up to the cap', () => {
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 1)).toBe(1000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 3)).toBe(4000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 10)).toBe(30000);
  });

  it('classifies failures by flag or by message', () => {
    expect(isTransientFailure(new CapabilityError('boom', true))).toBe(true);
    expect(isTransientFailure(new CapabilityError('Rate limit', false))).toBe(false);
    expect(isTransientFailure(new Error('Rate limit exceeded'))).toBe(true);
    expect(isTransientFailure(new Error('bad request'))).toBe(false);
  });

  it('merges only the keys an override sets', () => {
    expect(
      mergeLlmConfig({ provider: 'openai', model: 'gpt-4o-mini', temperature: 0.7 }, { model: 'gpt-4o' }, { temperature: 0 }),
    ).toEqual({ provider: 'openai', model: 'gpt-4o', temperature: 0 });
  });
});
