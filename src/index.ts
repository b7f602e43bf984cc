export * from './bridges/capabilities.js';
export { OpenAICompatibleLlm, MAX_TOOL_ROUNDS, type OpenAICompatibleLlmOptions } from './bridges/llm-http.js';
export { TablePricing, loadPricingTable, pricingTableSchema, DEFAULT_PRICING_PATH, type PricingTable } from './bridges/pricing.js';
export { SubprocessSandbox, SANDBOX_PRESETS, resolveSandboxLimits, screenCode, type SandboxPreset } from './bridges/sandbox.js';
export { InMemoryToolRegistry } from './bridges/tool-registry.js';
export { ConvexRecordSink } from './api/convex.js';

export { config } from './utils/config.js';
export { logger } from './utils/logger.js';
export { GracefulShutdown } from './utils/shutdown.js';

export {
  GraphCompiler,
  compileWorkflow,
  renderMermaid,
  type CompiledEdge,
  type CompiledGraph,
  type CompiledNode,
  type JoinMode,
} from './workflow/builder.js';
export { CostAggregator, detectProvider, FREE_PROVIDERS, UNKNOWN_PROVIDER } from './workflow/cost.js';
export {
  WorkflowEngine,
  JobHandle,
  type ExecuteOptions,
  type ExecuteResult,
  type ExecutionMode,
  type WorkflowEngineOptions,
} from './workflow/engine.js';
export * from './workflow/errors.js';
export { checkGates, type GateMetrics, type GateResult } from './workflow/gates.js';
export { loadWorkflowFile, parseWorkflowDocument } from './workflow/loader.js';
export { Profiler, DEFAULT_BOTTLENECK_THRESHOLD } from './workflow/monitor.js';
export { NodeExecutor, DEFAULT_RETRY_POLICY, type RetryPolicy } from './workflow/node.js';
export { buildOutputModel, type OutputModel, type OutputShape } from './workflow/output.js';
export { parsePredicate, evaluatePredicate, type Predicate } from './workflow/predicate.js';
export { START, END, parseWorkflowSpec, workflowSpecSchema, type WorkflowSpec, type WorkflowSpecInput } from './workflow/schema.js';
export { StateModel, type StateValues } from './workflow/state.js';
export { FileRecordStore } from './workflow/store.js';
export { resolveTemplate } from './workflow/template.js';
export { parseTypeString, type TypeDescriptor } from './workflow/type-descriptor.js';
export type * from './workflow/types.js';
