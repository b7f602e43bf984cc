import type { OutputShape } from '../workflow/output.js';
import type {
  BottleneckSummary,
  ExecutionRecord,
  RunState,
  TokenUsage,
} from '../workflow/types.js';

export interface LlmConfig {
  provider: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  apiBase?: string;
}

export interface Tool {
  name: string;
  description?: string;
  /** JSON Schema of the tool's arguments. */
  parameters?: Record<string, unknown>;
  invoke(args: Record<string, unknown>): Promise<unknown>;
}

export interface LlmRequest {
  prompt: string;
  outputShape: OutputShape;
  tools: Tool[];
  config: LlmConfig;
  signal?: AbortSignal;
}

export interface LlmResponse {
  payload: unknown;
  usage: TokenUsage;
}

/** Failures should be thrown as CapabilityError with `transient` set. */
export interface LlmCapability {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

export interface ToolRegistry {
  get(name: string): Tool;
}

export interface PricingCapability {
  estimate(provider: string, model: string, usage: TokenUsage): number;
}

export interface SandboxLimits {
  timeoutMs: number;
  memoryMb: number;
}

export interface SandboxResult {
  output: unknown;
  stdout?: string;
  stderr?: string;
}

/**
 * Implementations throw SafetyError on a policy violation and stop the code
 * as soon as `signal` aborts.
 */
export interface SandboxCapability {
  run(code: string, bindings: Record<string, unknown>, limits: SandboxLimits, signal?: AbortSignal): Promise<SandboxResult>;
}

export type PersistedEntry =
  | { kind: 'execution_record'; record: ExecutionRecord }
  | { kind: 'bottleneck_summary'; summary: BottleneckSummary }
  | { kind: 'run_status'; status: RunState; error?: string };

/** Append-only persistence keyed by run id. */
export interface RecordSink {
  append(runId: string, entry: PersistedEntry): Promise<void>;
}
