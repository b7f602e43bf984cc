import type {
  LlmCapability,
  LlmConfig,
  LlmResponse,
  SandboxCapability,
  SandboxLimits,
  Tool,
  ToolRegistry,
} from '../bridges/capabilities.js';
import { resolveSandboxLimits } from '../bridges/sandbox.js';
import { sleep, withDeadline } from '../utils/abort.js';
import { logger } from '../utils/logger.js';
import type { CompiledNode } from './builder.js';
import type { CostAggregator } from './cost.js';
import {
  CapabilityError,
  describeError,
  NodeExecutionError,
  OutputValidationError,
  RunCancelledError,
  SafetyError,
  ToolNotFoundError,
  type ExecutionPhase,
} from './errors.js';
import type { Profiler } from './monitor.js';
import { SIMPLE_OUTPUT_FIELD } from './output.js';
import type { StateValues } from './state.js';
import { resolveInputs, resolveTemplate } from './template.js';
import { addUsage, EMPTY_USAGE, type ExecutionRecord, type TokenUsage } from './types.js';

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
  validationDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 1000,
  backoffMultiplier: 2,
  maxBackoffMs: 30000,
  validationDelayMs: 500,
};

export const SANDBOX_PROVIDER = 'sandbox';

const TRANSIENT_PATTERN = /rate limit|too many requests|timeout|timed out|temporarily unavailable|\b(429|502|503|504)\b|ECONNRESET/i;

export function isTransientFailure(error: unknown): boolean {
  if (error instanceof CapabilityError) {
    return error.transient;
  }
  return TRANSIENT_PATTERN.test(describeError(error));
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.backoffMs * policy.backoffMultiplier ** (attempt - 1), policy.maxBackoffMs);
}

/** Later layers win, but only for keys they actually set. */
export function mergeLlmConfig(base: LlmConfig, ...overrides: Partial<LlmConfig>[]): LlmConfig {
  const merged: LlmConfig = { ...base };
  for (const override of overrides) {
    if (override.provider !== undefined) merged.provider = override.provider;
    if (override.model !== undefined) merged.model = override.model;
    if (override.temperature !== undefined) merged.temperature = override.temperature;
    if (override.maxTokens !== undefined) merged.maxTokens = override.maxTokens;
    if (override.apiBase !== undefined) merged.apiBase = override.apiBase;
  }
  return merged;
}

export interface NodeExecutorOptions {
  runId: string;
  llm: LlmCapability;
  tools?: ToolRegistry;
  sandbox?: SandboxCapability;
  llmDefaults: LlmConfig;
  retry: RetryPolicy;
  timeoutMs: number;
  costs: CostAggregator;
  profiler: Profiler;
  commit: (record: ExecutionRecord) => void;
}

export interface NodeInvocation {
  state: StateValues;
  signal: AbortSignal;
  iteration?: number;
  /** Values bound beside the node's own inputs, such as `item` and `index` on a mapped node. */
  extraInputs?: Record<string, unknown>;
}

interface Progress {
  attempts: number;
  usage: TokenUsage;
  provider: string;
  model: string;
}

/**
 * Runs one node: resolve, invoke, validate, retry, record.
 *
 * One executor serves one run, so the cost aggregator and profiler it writes
 * to never mix telemetry across runs. Every invocation that is not cancelled
 * commits exactly one ExecutionRecord, failed ones included.
 */
export class NodeExecutor {
  constructor(private readonly options: NodeExecutorOptions) {}

  async execute(node: CompiledNode, invocation: NodeInvocation): Promise<Record<string, unknown>> {
    const startedAt = new Date();
    const config = mergeLlmConfig(this.options.llmDefaults, node.llm);
    const progress: Progress = {
      attempts: 0,
      usage: EMPTY_USAGE,
      provider: node.code !== undefined ? SANDBOX_PROVIDER : config.provider,
      model: node.code !== undefined ? SANDBOX_PROVIDER : config.model,
    };

    try {
      const updates = await this.run(node, invocation, config, progress);
      if (invocation.signal.aborted) {
        throw new RunCancelledError(this.options.runId);
      }
      this.finish(node, invocation, startedAt, progress);
      return updates;
    } catch (error) {
      if (error instanceof RunCancelledError || invocation.signal.aborted) {
        throw error instanceof RunCancelledError ? error : new RunCancelledError(this.options.runId);
      }
      const failure =
        error instanceof NodeExecutionError
          ? error
          : new NodeExecutionError(node.id, 'invoke', error, Math.max(progress.attempts, 1));
      this.finish(node, invocation, startedAt, progress, failure);
      throw failure;
    }
  }

  private async run(
    node: CompiledNode,
    invocation: NodeInvocation,
    config: LlmConfig,
    progress: Progress,
  ): Promise<Record<string, unknown>> {
    let inputs: Record<string, unknown>;
    let prompt: string;
    let tools: Tool[];
    try {
      inputs = { ...resolveInputs(node.inputs, invocation.state), ...invocation.extraInputs };
      prompt = node.prompt !== undefined ? resolveTemplate(node.prompt, inputs, invocation.state) : '';
      tools = this.acquireTools(node);
    } catch (error) {
      throw new NodeExecutionError(node.id, 'resolve', error);
    }

    if (node.code !== undefined) {
      progress.attempts = 1;
      return this.runCode(node, node.code, { ...structuredClone({ ...invocation.state }), ...inputs }, invocation);
    }
    return this.runLlm(node, prompt, tools, config, invocation, progress);
  }

  private acquireTools(node: CompiledNode): Tool[] {
    const acquired: Tool[] = [];
    for (const binding of node.tools) {
      try {
        if (!this.options.tools) {
          throw new ToolNotFoundError(binding.name, []);
        }
        acquired.push(this.options.tools.get(binding.name));
      } catch (error) {
        if (binding.onError === 'continue') {
          logger.warn('Skipping unavailable tool', { nodeId: node.id, tool: binding.name, error: describeError(error) });
          continue;
        }
        throw error;
      }
    }
    return acquired;
  }

  private async runCode(
    node: CompiledNode,
    code: string,
    bindings: Record<string, unknown>,
    invocation: NodeInvocation,
  ): Promise<Record<string, unknown>> {
    const sandbox = this.options.sandbox;
    if (!sandbox) {
      throw new NodeExecutionError(node.id, 'invoke', new CapabilityError('No sandbox capability configured', false));
    }
    const limits: SandboxLimits = resolveSandboxLimits(node.sandbox);

    let output: unknown;
    try {
      const result = await withDeadline((signal) => sandbox.run(code, bindings, limits, signal), {
        timeoutMs: limits.timeoutMs,
        signal: invocation.signal,
        onTimeout: () => new SafetyError(`Code execution exceeded ${limits.timeoutMs}ms`),
        onAbort: () => new RunCancelledError(this.options.runId),
      });
      output = result.output;
    } catch (error) {
      if (error instanceof RunCancelledError) throw error;
      throw new NodeExecutionError(node.id, 'invoke', error);
    }

    try {
      return this.mapOutputs(node, node.outputModel.validateValue(output));
    } catch (error) {
      throw new NodeExecutionError(node.id, 'validate', error);
    }
  }

  private async runLlm(
    node: CompiledNode,
    basePrompt: string,
    tools: Tool[],
    config: LlmConfig,
    invocation: NodeInvocation,
    progress: Progress,
  ): Promise<Record<string, unknown>> {
    const policy = this.options.retry;
    const maxAttempts = Math.max(1, node.maxAttempts ?? policy.maxAttempts);
    const cancelled = (): RunCancelledError => new RunCancelledError(this.options.runId);
    let prompt = basePrompt;
    let lastError: unknown;
    let lastPhase: ExecutionPhase = 'invoke';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      progress.attempts = attempt;

      let response: LlmResponse;
      try {
        response = await withDeadline(
          (signal) => this.options.llm.invoke({ prompt, outputShape: node.outputModel.shape, tools, config, signal }),
          {
            timeoutMs: this.options.timeoutMs,
            signal: invocation.signal,
            onTimeout: () => new CapabilityError(`LLM call timed out after ${this.options.timeoutMs}ms`, true),
            onAbort: cancelled,
          },
        );
      } catch (error) {
        if (error instanceof RunCancelledError || invocation.signal.aborted) throw cancelled();
        if (!isTransientFailure(error)) {
          throw new NodeExecutionError(node.id, 'invoke', error, attempt);
        }
        lastError = error;
        lastPhase = 'invoke';
        if (attempt < maxAttempts) {
          const delay = backoffDelay(policy, attempt);
          logger.warn(`Node ${node.id} hit a transient failure, retrying (${attempt}/${maxAttempts})`, {
            delayMs: delay,
            error: describeError(error),
          });
          await sleep(delay, invocation.signal, cancelled);
        }
        continue;
      }

      progress.usage = addUsage(progress.usage, response.usage);

      try {
        return this.mapOutputs(node, node.outputModel.validate(response.payload));
      } catch (error) {
        if (!(error instanceof OutputValidationError)) throw error;
        lastError = error;
        lastPhase = 'validate';
        if (attempt < maxAttempts) {
          logger.warn(`Node ${node.id} returned invalid output, retrying (${attempt}/${maxAttempts})`, {
            field: error.field,
            expected: error.expected,
            actual: error.actual,
          });
          prompt = amendPrompt(basePrompt, error, node);
          await sleep(policy.validationDelayMs * attempt, invocation.signal, cancelled);
        }
      }
    }

    throw new NodeExecutionError(node.id, lastPhase, lastError, maxAttempts);
  }

  private mapOutputs(node: CompiledNode, validated: Record<string, unknown>): Record<string, unknown> {
    if (node.collectInto !== undefined) {
      const value = node.outputModel.kind === 'simple' ? validated[SIMPLE_OUTPUT_FIELD] : validated;
      return { [node.collectInto]: value };
    }
    if (node.outputModel.kind === 'simple') {
      const [target] = node.outputs;
      return target ? { [target]: validated[SIMPLE_OUTPUT_FIELD] } : {};
    }
    return Object.fromEntries(node.outputs.map((output) => [output, validated[output]]));
  }

  private finish(
    node: CompiledNode,
    invocation: NodeInvocation,
    startedAt: Date,
    progress: Progress,
    failure?: NodeExecutionError,
  ): void {
    const endedAt = new Date();
    const durationMs = endedAt.getTime() - startedAt.getTime();
    const cost = this.options.costs.record(progress.provider, progress.model, progress.usage);

    const record: ExecutionRecord = {
      runId: this.options.runId,
      nodeId: node.id,
      startedAt: startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs,
      attempts: Math.max(progress.attempts, 1),
      usage: progress.usage,
      cost,
      ...(invocation.iteration !== undefined ? { iteration: invocation.iteration } : {}),
      ...(failure
        ? {
            error: {
              phase: failure.phase,
              name: failure.cause instanceof Error ? failure.cause.name : failure.name,
              message: failure.message,
            },
          }
        : {}),
    };

    this.options.profiler.record(node.id, durationMs, cost.costUsd);
    this.options.commit(Object.freeze(record));
  }
}

function amendPrompt(basePrompt: string, error: OutputValidationError, node: CompiledNode): string {
  return [
    basePrompt,
    '',
    `Previous attempt failed validation: ${error.message}`,
    'Please ensure the response matches the required schema exactly:',
    JSON.stringify(node.outputModel.shape),
  ].join('\n');
}
