import { appendFile, mkdir, readFile, readdir } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { PersistedEntry, RecordSink } from '../bridges/capabilities.js';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';

const usageSchema = z.object({
  inputTokens: z.number(),
  outputTokens: z.number(),
  totalTokens: z.number(),
});

const executionRecordSchema = z.object({
  runId: z.string(),
  nodeId: z.string(),
  startedAt: z.string(),
  endedAt: z.string(),
  durationMs: z.number(),
  attempts: z.number(),
  usage: usageSchema,
  cost: z.object({ provider: z.string(), model: z.string(), costUsd: z.number() }),
  iteration: z.number().optional(),
  error: z
    .object({
      phase: z.enum(['resolve', 'invoke', 'validate']),
      name: z.string(),
      message: z.string(),
    })
    .optional(),
});

const bottleneckSummarySchema = z.object({
  runId: z.string().optional(),
  totalTimeMs: z.number(),
  nodeCount: z.number(),
  thresholdPercent: z.number(),
  slowestNode: z.string().nullable(),
  nodes: z.array(
    z.object({
      nodeId: z.string(),
      callCount: z.number(),
      totalDurationMs: z.number(),
      avgDurationMs: z.number(),
      totalCostUsd: z.number(),
    }),
  ),
  bottlenecks: z.array(
    z.object({
      nodeId: z.string(),
      totalDurationMs: z.number(),
      percentOfTotal: z.number(),
      callCount: z.number(),
    }),
  ),
});

export const persistedEntrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('execution_record'), record: executionRecordSchema }),
  z.object({ kind: z.literal('bottleneck_summary'), summary: bottleneckSummarySchema }),
  z.object({
    kind: z.literal('run_status'),
    status: z.enum(['ready', 'running', 'completed', 'failed', 'cancelled']),
    error: z.string().optional(),
  }),
]);

/**
 * Append-only JSON Lines file per run under the runs directory. Entries are
 * written in commit order and never rewritten.
 */
export class FileRecordStore implements RecordSink {
  private readonly runsDir: string;

  constructor(baseDir: string = config.storage.runsDir) {
    this.runsDir = baseDir;
  }

  async initialize(): Promise<void> {
    await mkdir(this.runsDir, { recursive: true });
  }

  private runPath(runId: string): string {
    if (!/^[A-Za-z0-9_-]+$/.test(runId)) {
      throw new Error(`Invalid run id: ${runId}`);
    }
    return join(this.runsDir, `${runId}.jsonl`);
  }

  async append(runId: string, entry: PersistedEntry): Promise<void> {
    const path = this.runPath(runId);
    await this.initialize();
    await appendFile(path, `${JSON.stringify(entry)}\n`, 'utf8');
  }

  /** Entries for a run in write order; an unknown run reads as empty. Malformed lines are skipped. */
  async read(runId: string): Promise<PersistedEntry[]> {
    let content: string;
    try {
      content = await readFile(this.runPath(runId), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const entries: PersistedEntry[] = [];
    content.split('\n').forEach((line, index) => {
      if (line.trim() === '') return;
      try {
        const parsed = persistedEntrySchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          entries.push(parsed.data);
          return;
        }
      } catch {
        // falls through to the warning below
      }
      logger.warn('Skipping malformed run log line', { runId, line: index + 1 });
    });
    return entries;
  }

  async listRuns(): Promise<string[]> {
    await this.initialize();
    const files = await readdir(this.runsDir);
    return files
      .filter((file) => file.endsWith('.jsonl'))
      .map((file) => file.slice(0, -'.jsonl'.length))
      .sort();
  }
}
