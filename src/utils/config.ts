import 'dotenv/config';
import { join } from 'path';

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  llm: {
    provider: process.env.WORKFLOW_LLM_PROVIDER || 'openai',
    model: process.env.WORKFLOW_LLM_MODEL || 'gpt-4o-mini',
    apiKey: process.env.OPENAI_API_KEY || '',
    baseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
    temperature: numberFromEnv('WORKFLOW_LLM_TEMPERATURE', 0.7),
  },
  execution: {
    timeoutMs: numberFromEnv('WORKFLOW_TIMEOUT_MS', 120000),
    maxRetries: numberFromEnv('WORKFLOW_MAX_RETRIES', 3),
    backoffMs: 1000,
    backoffMultiplier: 2,
    maxBackoffMs: 30000,
    validationDelayMs: 500,
    retainedRuns: numberFromEnv('WORKFLOW_RETAINED_RUNS', 100),
  },
  profiler: {
    bottleneckThreshold: numberFromEnv('WORKFLOW_BOTTLENECK_THRESHOLD', 50),
  },
  storage: {
    runsDir: process.env.WORKFLOW_RUNS_DIR || join(process.cwd(), 'workspace', 'runs'),
  },
  convex: {
    deploymentUrl: process.env.CONVEX_URL || '',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    file: process.env.LOG_FILE || '',
  },
};
