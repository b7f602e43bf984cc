import { v4 as uuidv4 } from 'uuid';
import type {
  LlmCapability,
  LlmConfig,
  PersistedEntry,
  PricingCapability,
  RecordSink,
  SandboxCapability,
  ToolRegistry,
} from '../bridges/capabilities.js';
import { TablePricing } from '../bridges/pricing.js';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { GraphCompiler, type CompiledEdge, type CompiledGraph, type CompiledNode, type JoinMode } from './builder.js';
import { CostAggregator } from './cost.js';
import {
  describeError,
  GraphStructureError,
  NodeExecutionError,
  QualityGateError,
  RunCancelledError,
  WorkflowError,
} from './errors.js';
import { checkGates } from './gates.js';
import { Profiler } from './monitor.js';
import { mergeLlmConfig, NodeExecutor, type RetryPolicy } from './node.js';
import { evaluatePredicate } from './predicate.js';
import { END, START } from './schema.js';
import type { StateValues } from './state.js';
import type {
  BottleneckSummary,
  CostSummary,
  EventCallback,
  ExecutionRecord,
  RunState,
  RunStatus,
  WorkflowEvent,
} from './types.js';

export interface WorkflowEngineOptions {
  llm: LlmCapability;
  tools?: ToolRegistry;
  sandbox?: SandboxCapability;
  pricing?: PricingCapability;
  sink?: RecordSink;
  /** Engine-wide retry settings; a workflow's `max_retries` still sets the attempt count. */
  retry?: Partial<RetryPolicy>;
  llmDefaults?: Partial<LlmConfig>;
  timeoutMs?: number;
  bottleneckThreshold?: number;
  /** Finished runs kept for trace, bottlenecks and costs; the oldest are dropped first. */
  retainedRuns?: number;
}

export type ExecutionMode = 'sync' | 'async';

export interface ExecuteOptions {
  mode?: ExecutionMode;
  /** Sync mode only: how long to wait before handing back a JobHandle. The run keeps going either way. */
  timeoutMs?: number;
}

export type ExecuteResult =
  | { status: 'completed'; runId: string; state: StateValues }
  | { status: 'pending'; handle: JobHandle };

export class JobHandle {
  constructor(
    readonly runId: string,
    private readonly engine: WorkflowEngine,
  ) {}

  status(): RunStatus {
    return this.engine.status(this);
  }

  result(): Promise<StateValues> {
    return this.engine.result(this.runId);
  }

  cancel(): boolean {
    return this.engine.cancel(this.runId);
  }
}

interface Run {
  id: string;
  graph: CompiledGraph;
  state: RunState;
  controller: AbortController;
  startedAt: number;
  records: ExecutionRecord[];
  profiler: Profiler;
  costs: CostAggregator;
  writes: Promise<void>;
  promise: Promise<StateValues>;
}

/** Per-path traversal context. Parallel branches get their own loop counters. */
interface Scope {
  signal: AbortSignal;
  loopCounters: Map<string, number>;
  visits: Map<string, number>;
  /** Inside a branch: every field the branch wrote, with the value it left there. */
  written?: Record<string, unknown>;
}

interface Branch<T> {
  label: string;
  run: (signal: AbortSignal) => Promise<T>;
}

interface Step {
  next: string;
  state: StateValues;
}

const TERMINAL_STATES: ReadonlySet<RunState> = new Set(['completed', 'failed', 'cancelled']);

/**
 * Walks compiled workflow graphs. Each run owns its abort controller, profiler,
 * cost aggregator and record list; nothing is shared between runs.
 */
export class WorkflowEngine {
  private readonly runs = new Map<string, Run>();
  private readonly finishedOrder: string[] = [];
  private readonly eventCallbacks: EventCallback[] = [];
  private readonly pricing: PricingCapability;

  constructor(private readonly options: WorkflowEngineOptions) {
    this.pricing = options.pricing ?? new TablePricing();
  }

  compile(spec: unknown): CompiledGraph {
    return GraphCompiler.compile(spec);
  }

  onEvent(callback: EventCallback): void {
    this.eventCallbacks.push(callback);
  }

  private emit(event: WorkflowEvent): void {
    for (const callback of this.eventCallbacks) {
      try {
        callback(event);
      } catch (error) {
        logger.warn('Event callback threw', { type: event.type, error: describeError(error) });
      }
    }
  }

  async execute(
    graph: CompiledGraph,
    inputs: Record<string, unknown> = {},
    options: ExecuteOptions = {},
  ): Promise<ExecuteResult> {
    const initial = graph.stateModel.create(inputs);
    const run = this.start(graph, initial);
    const handle = new JobHandle(run.id, this);

    if (options.mode === 'async') {
      return { status: 'pending', handle };
    }
    if (options.timeoutMs === undefined) {
      return { status: 'completed', runId: run.id, state: await run.promise };
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), options.timeoutMs);
    });
    try {
      const state = await Promise.race([run.promise, timedOut]);
      if (state === null) {
        logger.info(`Run ${run.id} still running after ${options.timeoutMs}ms, returning a handle`);
        return { status: 'pending', handle };
      }
      return { status: 'completed', runId: run.id, state };
    } finally {
      clearTimeout(timer);
    }
  }

  status(handle: JobHandle | string): RunStatus {
    const state = this.requireRun(typeof handle === 'string' ? handle : handle.runId).state;
    return state === 'ready' || state === 'running' ? 'pending' : state;
  }

  runState(runId: string): RunState {
    return this.requireRun(runId).state;
  }

  result(runId: string): Promise<StateValues> {
    return this.requireRun(runId).promise;
  }

  trace(runId: string): ExecutionRecord[] {
    return [...this.requireRun(runId).records];
  }

  bottlenecks(runId: string, threshold?: number): BottleneckSummary {
    const run = this.requireRun(runId);
    return { runId, ...run.profiler.summary(threshold ?? this.threshold()) };
  }

  costs(runId: string): CostSummary {
    return this.requireRun(runId).costs.summary();
  }

  /** Returns false when the run had already finished. */
  cancel(runId: string): boolean {
    const run = this.requireRun(runId);
    if (TERMINAL_STATES.has(run.state)) {
      return false;
    }
    logger.info(`Cancelling run ${runId}`);
    run.state = 'cancelled';
    run.controller.abort();
    return true;
  }

  /** Resolves once every known run has settled and its sink writes have landed. */
  async drain(): Promise<void> {
    await Promise.allSettled(
      [...this.runs.values()].map((run) =>
        run.promise.then(
          () => run.writes,
          () => run.writes,
        ),
      ),
    );
  }

  /** Ids of runs that are still going. */
  activeRuns(): string[] {
    return [...this.runs.values()].filter((run) => !TERMINAL_STATES.has(run.state)).map((run) => run.id);
  }

  private requireRun(runId: string): Run {
    const run = this.runs.get(runId);
    if (!run) {
      throw new WorkflowError(
        `Unknown run id: ${runId}`,
        'Finished runs are only kept in memory for a while; read older ones from the record sink',
      );
    }
    return run;
  }

  private threshold(): number {
    return this.options.bottleneckThreshold ?? config.profiler.bottleneckThreshold;
  }

  private start(graph: CompiledGraph, initial: StateValues): Run {
    const run: Run = {
      id: uuidv4(),
      graph,
      state: 'ready',
      controller: new AbortController(),
      startedAt: Date.now(),
      records: [],
      profiler: new Profiler(),
      costs: new CostAggregator(this.pricing),
      writes: Promise.resolve(),
      promise: Promise.resolve(initial),
    };
    this.runs.set(run.id, run);

    run.promise = this.drive(run, initial);
    run.promise.catch((error: unknown) => {
      logger.debug(`Run ${run.id} settled with an error`, { error: describeError(error) });
    });
    return run;
  }

  private retryPolicy(graph: CompiledGraph): RetryPolicy {
    const policy: RetryPolicy = {
      maxAttempts: config.execution.maxRetries,
      backoffMs: config.execution.backoffMs,
      backoffMultiplier: config.execution.backoffMultiplier,
      maxBackoffMs: config.execution.maxBackoffMs,
      validationDelayMs: config.execution.validationDelayMs,
      ...this.options.retry,
    };
    if (graph.execution.maxRetries !== undefined) {
      policy.maxAttempts = graph.execution.maxRetries;
    }
    policy.maxAttempts = Math.max(1, policy.maxAttempts);
    return policy;
  }

  private async drive(run: Run, initial: StateValues): Promise<StateValues> {
    const { graph } = run;
    run.state = 'running';
    this.emit({ type: 'workflow_started', runId: run.id, workflow: graph.name, timestamp: new Date().toISOString() });
    this.persist(run, { kind: 'run_status', status: 'running' });
    logger.info(`Starting workflow ${graph.name}`, { runId: run.id });

    const executor = new NodeExecutor({
      runId: run.id,
      llm: this.options.llm,
      tools: this.options.tools,
      sandbox: this.options.sandbox,
      llmDefaults: mergeLlmConfig(
        { provider: config.llm.provider, model: config.llm.model, temperature: config.llm.temperature },
        this.options.llmDefaults ?? {},
        graph.llmDefaults,
      ),
      retry: this.retryPolicy(graph),
      timeoutMs: graph.execution.timeoutMs ?? this.options.timeoutMs ?? config.execution.timeoutMs,
      costs: run.costs,
      profiler: run.profiler,
      commit: (record) => this.commit(run, record),
    });

    try {
      const scope: Scope = { signal: run.controller.signal, loopCounters: new Map(), visits: new Map() };
      const final = await this.walk(run, executor, START, initial, scope, END);
      if (run.controller.signal.aborted) {
        throw new RunCancelledError(run.id);
      }
      this.enforceGates(run);

      run.state = 'completed';
      this.finish(run, 'completed');
      await run.writes;
      logger.info(`Workflow ${graph.name} completed`, { runId: run.id, nodes: run.records.length });
      return final;
    } catch (error) {
      const cancelled = run.controller.signal.aborted || error instanceof RunCancelledError;
      const failure = cancelled && !(error instanceof RunCancelledError) ? new RunCancelledError(run.id) : error;
      run.state = cancelled ? 'cancelled' : 'failed';
      this.finish(run, run.state, describeError(failure));
      await run.writes;
      if (cancelled) {
        logger.warn(`Workflow ${graph.name} cancelled`, { runId: run.id, committed: run.records.length });
      } else {
        logger.error(`Workflow ${graph.name} failed`, { runId: run.id, error: describeError(failure) });
      }
      throw failure;
    } finally {
      this.retire(run);
    }
  }

  private retire(run: Run): void {
    this.finishedOrder.push(run.id);
    const limit = Math.max(1, this.options.retainedRuns ?? config.execution.retainedRuns);
    while (this.finishedOrder.length > limit) {
      const oldest = this.finishedOrder.shift();
      if (oldest !== undefined) {
        this.runs.delete(oldest);
        logger.debug(`Dropped finished run ${oldest} from memory`);
      }
    }
  }

  private finish(run: Run, state: RunState, error?: string): void {
    this.emit({
      type: 'workflow_completed',
      runId: run.id,
      state,
      ...(error !== undefined ? { error } : {}),
      timestamp: new Date().toISOString(),
    });
    this.persist(run, { kind: 'bottleneck_summary', summary: this.bottlenecks(run.id) });
    this.persist(run, { kind: 'run_status', status: state, ...(error !== undefined ? { error } : {}) });
  }

  private commit(run: Run, record: ExecutionRecord): void {
    run.records.push(record);
    const timestamp = record.endedAt;
    if (record.error) {
      this.emit({ type: 'node_failed', runId: run.id, nodeId: record.nodeId, record, error: record.error.message, timestamp });
    } else {
      this.emit({ type: 'node_completed', runId: run.id, nodeId: record.nodeId, record, timestamp });
    }
    this.persist(run, { kind: 'execution_record', record });
  }

  /** Sink writes are chained so they land in commit order; a failed write is logged and skipped. */
  private persist(run: Run, entry: PersistedEntry): void {
    const sink = this.options.sink;
    if (!sink) return;
    run.writes = run.writes
      .then(() => sink.append(run.id, entry))
      .catch((error: unknown) => {
        logger.warn('Failed to persist run entry', { runId: run.id, kind: entry.kind, error: describeError(error) });
      });
  }

  private enforceGates(run: Run): void {
    const gates = run.graph.gates;
    if (!gates || gates.gates.length === 0) return;

    const costs = run.costs.summary();
    const results = checkGates(
      {
        cost_usd: costs.totalCostUsd,
        duration_ms: Date.now() - run.startedAt,
        total_tokens: costs.totalTokens,
        total_calls: costs.totalCalls,
      },
      gates.gates,
    );
    const failed = results.filter((result) => !result.passed);
    if (failed.length === 0) return;

    if (gates.onFail === 'fail') {
      throw new QualityGateError(failed.map(({ metric, message }) => ({ metric, message })));
    }
    for (const gate of failed) {
      logger.warn(`Quality gate '${gate.metric}' failed: ${gate.message}`, { runId: run.id });
    }
  }

  /** Runs from `entry` until reaching `stop` (END, or a parallel join) and returns the state there. */
  private async walk(
    run: Run,
    executor: NodeExecutor,
    entry: string,
    initial: StateValues,
    scope: Scope,
    stop: string,
  ): Promise<StateValues> {
    let current = entry;
    let state = initial;

    while (current !== stop && current !== END) {
      if (scope.signal.aborted) {
        throw new RunCancelledError(run.id);
      }
      if (current !== START) {
        state = await this.visit(run, executor, current, state, scope);
      }
      const edge = run.graph.edges.get(current);
      if (!edge) {
        throw new GraphStructureError(`Node '${current}' has no outgoing edge`);
      }
      const step = await this.follow(run, executor, edge, state, scope);
      current = step.next;
      state = step.state;
    }
    return state;
  }

  private requireNode(run: Run, nodeId: string): CompiledNode {
    const node = run.graph.nodes.get(nodeId);
    if (!node) {
      throw new GraphStructureError(`Unknown node '${nodeId}'`);
    }
    return node;
  }

  /** 0-based visit number for nodes on a loop body, undefined elsewhere. */
  private nextIteration(run: Run, nodeId: string, scope: Scope): number | undefined {
    if (!run.graph.loopNodes.has(nodeId)) return undefined;
    const iteration = scope.visits.get(nodeId) ?? 0;
    scope.visits.set(nodeId, iteration + 1);
    return iteration;
  }

  private emitStarted(run: Run, nodeId: string, iteration: number | undefined): void {
    this.emit({
      type: 'node_started',
      runId: run.id,
      nodeId,
      ...(iteration !== undefined ? { iteration } : {}),
      timestamp: new Date().toISOString(),
    });
  }

  private async visit(
    run: Run,
    executor: NodeExecutor,
    nodeId: string,
    state: StateValues,
    scope: Scope,
  ): Promise<StateValues> {
    const node = this.requireNode(run, nodeId);
    const iteration = this.nextIteration(run, nodeId, scope);
    this.emitStarted(run, nodeId, iteration);

    const updates = await executor.execute(node, { state, signal: scope.signal, iteration });
    let next: StateValues;
    try {
      next = run.graph.stateModel.apply(state, updates);
    } catch (error) {
      throw new NodeExecutionError(nodeId, 'validate', error);
    }
    noteWrites(scope, next, Object.keys(updates));
    return next;
  }

  private async follow(
    run: Run,
    executor: NodeExecutor,
    edge: CompiledEdge,
    state: StateValues,
    scope: Scope,
  ): Promise<Step> {
    switch (edge.kind) {
      case 'linear':
        return { next: edge.to, state };

      case 'conditional': {
        try {
          const route = edge.routes.find((candidate) => evaluatePredicate(candidate.predicate, state));
          return { next: route ? route.to : edge.defaultTo, state };
        } catch (error) {
          throw new NodeExecutionError(edge.from, 'resolve', error);
        }
      }

      case 'loop': {
        const count = (scope.loopCounters.get(edge.from) ?? 0) + 1;
        let done: boolean;
        try {
          done = evaluatePredicate(edge.until, state);
        } catch (error) {
          throw new NodeExecutionError(edge.from, 'resolve', error);
        }
        if (done || count >= edge.maxIterations) {
          if (!done) {
            logger.info(`Loop on '${edge.from}' reached max_iterations (${edge.maxIterations})`, { runId: run.id });
          }
          scope.loopCounters.delete(edge.from);
          return { next: edge.exitTo, state };
        }
        scope.loopCounters.set(edge.from, count);
        return { next: edge.target, state };
      }

      case 'parallel':
        return { next: edge.join, state: await this.fanOut(run, executor, edge, state, scope) };

      case 'map':
        return { next: edge.join, state: await this.mapOver(run, executor, edge, state, scope) };
    }
  }

  /**
   * Runs branches concurrently and waits for all of them. Under all_or_nothing
   * the first failure aborts the rest; either way the first failure that is not
   * a cancellation, in declaration order, fails the join.
   */
  private async settleBranches<T>(run: Run, scope: Scope, joinMode: JoinMode, branches: Branch<T>[]): Promise<T[]> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    scope.signal.addEventListener('abort', forwardAbort, { once: true });
    if (scope.signal.aborted) {
      controller.abort();
    }

    try {
      const settled = await Promise.allSettled(
        branches.map(async (branch) => {
          try {
            return await branch.run(controller.signal);
          } catch (error) {
            if (joinMode === 'all_or_nothing' && !controller.signal.aborted) {
              logger.warn(`Branch '${branch.label}' failed, aborting its siblings`, { runId: run.id });
              controller.abort();
            }
            throw error;
          }
        }),
      );

      if (scope.signal.aborted) {
        throw new RunCancelledError(run.id);
      }

      const values: T[] = [];
      const failures: unknown[] = [];
      for (const outcome of settled) {
        if (outcome.status === 'fulfilled') {
          values.push(outcome.value);
        } else {
          failures.push(outcome.reason);
        }
      }
      if (failures.length > 0) {
        throw failures.find((reason) => !(reason instanceof RunCancelledError)) ?? failures[0];
      }
      return values;
    } finally {
      scope.signal.removeEventListener('abort', forwardAbort);
    }
  }

  /** Walks every branch against its own snapshot of `state`, then merges their writes in declaration order. */
  private async fanOut(
    run: Run,
    executor: NodeExecutor,
    edge: Extract<CompiledEdge, { kind: 'parallel' }>,
    state: StateValues,
    scope: Scope,
  ): Promise<StateValues> {
    const model = run.graph.stateModel;
    const writes = await this.settleBranches(
      run,
      scope,
      edge.joinMode,
      edge.targets.map(
        (target): Branch<Record<string, unknown>> => ({
          label: target,
          run: async (signal) => {
            const written: Record<string, unknown> = {};
            // Visit counts are shared so a loop body that fans out keeps numbering its branch nodes.
            const branchScope: Scope = {
              signal,
              loopCounters: new Map(scope.loopCounters),
              visits: scope.visits,
              written,
            };
            await this.walk(run, executor, target, model.snapshot(state), branchScope, edge.join);
            return written;
          },
        }),
      ),
    );

    let merged = state;
    for (const written of writes) {
      merged = model.apply(merged, written);
      noteWrites(scope, merged, Object.keys(written));
    }
    return merged;
  }

  /** Runs the mapped node once per item and stores the results, in item order, in the collect field. */
  private async mapOver(
    run: Run,
    executor: NodeExecutor,
    edge: Extract<CompiledEdge, { kind: 'map' }>,
    state: StateValues,
    scope: Scope,
  ): Promise<StateValues> {
    const model = run.graph.stateModel;
    const node = this.requireNode(run, edge.target);
    const source = state[edge.itemsField];
    const items: unknown[] = Array.isArray(source) ? source : [];
    const iteration = this.nextIteration(run, edge.target, scope);
    logger.debug(`Mapping '${edge.target}' over ${items.length} item(s) of '${edge.itemsField}'`, { runId: run.id });

    const results = await this.settleBranches(
      run,
      scope,
      edge.joinMode,
      items.map(
        (item, index): Branch<unknown> => ({
          label: `${edge.target}[${index}]`,
          run: async (signal) => {
            this.emitStarted(run, edge.target, iteration);
            const updates = await executor.execute(node, {
              state: model.snapshot(state),
              signal,
              iteration,
              extraInputs: { item: structuredClone(item), index },
            });
            return updates[edge.collectField];
          },
        }),
      ),
    );

    let next: StateValues;
    try {
      next = model.apply(state, { [edge.collectField]: results });
    } catch (error) {
      throw new NodeExecutionError(edge.target, 'validate', error);
    }
    noteWrites(scope, next, [edge.collectField]);
    return next;
  }
}

function noteWrites(scope: Scope, state: StateValues, fields: string[]): void {
  if (!scope.written) return;
  for (const field of fields) {
    scope.written[field] = state[field];
  }
}
