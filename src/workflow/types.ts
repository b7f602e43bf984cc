import type { ExecutionPhase } from './errors.js';

export type RunState = 'ready' | 'running' | 'completed' | 'failed' | 'cancelled';

export type RunStatus = 'pending' | 'completed' | 'failed' | 'cancelled';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface CostEstimate {
  provider: string;
  model: string;
  costUsd: number;
}

export interface ExecutionRecord {
  runId: string;
  nodeId: string;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  attempts: number;
  usage: TokenUsage;
  cost: CostEstimate;
  iteration?: number;
  error?: {
    phase: ExecutionPhase;
    name: string;
    message: string;
  };
}

export interface NodeTiming {
  nodeId: string;
  callCount: number;
  totalDurationMs: number;
  avgDurationMs: number;
  totalCostUsd: number;
}

export interface Bottleneck {
  nodeId: string;
  totalDurationMs: number;
  percentOfTotal: number;
  callCount: number;
}

export interface BottleneckSummary {
  runId?: string;
  totalTimeMs: number;
  nodeCount: number;
  thresholdPercent: number;
  slowestNode: string | null;
  nodes: NodeTiming[];
  bottlenecks: Bottleneck[];
}

export interface CostBucket {
  costUsd: number;
  totalTokens: number;
  calls: number;
}

export interface CostSummary {
  totalCostUsd: number;
  totalTokens: number;
  totalCalls: number;
  byProvider: Record<string, CostBucket>;
  byModel: Record<string, CostBucket>;
}

export type WorkflowEvent =
  | { type: 'workflow_started'; runId: string; workflow: string; timestamp: string }
  | { type: 'node_started'; runId: string; nodeId: string; iteration?: number; timestamp: string }
  | { type: 'node_completed'; runId: string; nodeId: string; record: ExecutionRecord; timestamp: string }
  | { type: 'node_failed'; runId: string; nodeId: string; record: ExecutionRecord; error: string; timestamp: string }
  | { type: 'workflow_completed'; runId: string; state: RunState; error?: string; timestamp: string };

export type EventCallback = (event: WorkflowEvent) => void;

export const EMPTY_USAGE: TokenUsage = Object.freeze({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });

export function addUsage(left: TokenUsage, right: TokenUsage): TokenUsage {
  return {
    inputTokens: left.inputTokens + right.inputTokens,
    outputTokens: left.outputTokens + right.outputTokens,
    totalTokens: left.totalTokens + right.totalTokens,
  };
}
