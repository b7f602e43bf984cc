import type { PricingCapability } from '../bridges/capabilities.js';
import { roundUsd } from '../bridges/pricing.js';
import { logger } from '../utils/logger.js';
import { describeError } from './errors.js';
import type { CostBucket, CostEstimate, CostSummary, TokenUsage } from './types.js';

export const UNKNOWN_PROVIDER = 'unknown';

const PREFIX_PROVIDERS: Record<string, string> = {
  openai: 'openai',
  anthropic: 'anthropic',
  google: 'google',
  gemini: 'google',
  ollama: 'ollama',
  ollama_chat: 'ollama',
};

/** Providers that never bill, whatever the pricing table says. */
export const FREE_PROVIDERS: ReadonlySet<string> = new Set(['ollama', 'sandbox']);

const LOCAL_MODEL_FAMILIES = ['llama', 'mistral', 'qwen', 'phi', 'gemma', 'deepseek'];

/**
 * Work out which provider serves a model. A `provider/model` prefix wins,
 * then well-known model families; anything else is "unknown".
 */
export function detectProvider(model: string): string {
  const lower = model.toLowerCase();
  if (lower.includes('/')) {
    const mapped = PREFIX_PROVIDERS[lower.slice(0, lower.indexOf('/'))];
    if (mapped) return mapped;
  }
  if (lower.startsWith('gpt-') || lower.startsWith('o1') || lower.startsWith('o3')) return 'openai';
  if (lower.startsWith('claude-')) return 'anthropic';
  if (lower.includes('gemini')) return 'google';
  if (LOCAL_MODEL_FAMILIES.some((family) => lower.startsWith(family))) return 'ollama';
  return UNKNOWN_PROVIDER;
}

export function normalizeProvider(provider: string | undefined, model: string): string {
  const explicit = provider?.trim().toLowerCase();
  if (explicit) {
    return PREFIX_PROVIDERS[explicit] ?? explicit;
  }
  return detectProvider(model);
}

function emptyBucket(): CostBucket {
  return { costUsd: 0, totalTokens: 0, calls: 0 };
}

/**
 * Per-run cost totals by provider and by provider/model pair.
 *
 * `record` never awaits, so concurrent branches of one run cannot interleave
 * inside an update.
 */
export class CostAggregator {
  private readonly byProvider = new Map<string, CostBucket>();
  private readonly byModel = new Map<string, CostBucket>();
  private totalCostUsd = 0;
  private totalTokens = 0;
  private totalCalls = 0;

  constructor(
    private readonly pricing: PricingCapability,
    private readonly knownProviders: ReadonlySet<string> = new Set(['openai', 'anthropic', 'google', ...FREE_PROVIDERS]),
  ) {}

  record(provider: string | undefined, model: string, usage: TokenUsage): CostEstimate {
    const detected = normalizeProvider(provider, model);
    const bucketName = this.knownProviders.has(detected) ? detected : UNKNOWN_PROVIDER;

    let costUsd = 0;
    if (bucketName !== UNKNOWN_PROVIDER && !FREE_PROVIDERS.has(bucketName)) {
      try {
        costUsd = roundUsd(this.pricing.estimate(detected, model, usage));
      } catch (error) {
        logger.warn('Pricing capability failed, recording zero cost', {
          provider: detected,
          model,
          error: describeError(error),
        });
      }
    }

    this.add(this.byProvider, bucketName, costUsd, usage.totalTokens);
    this.add(this.byModel, `${bucketName}/${model}`, costUsd, usage.totalTokens);
    this.totalCostUsd = roundUsd(this.totalCostUsd + costUsd);
    this.totalTokens += usage.totalTokens;
    this.totalCalls += 1;

    return { provider: bucketName, model, costUsd };
  }

  private add(buckets: Map<string, CostBucket>, key: string, costUsd: number, tokens: number): void {
    const bucket = buckets.get(key) ?? emptyBucket();
    buckets.set(key, {
      costUsd: roundUsd(bucket.costUsd + costUsd),
      totalTokens: bucket.totalTokens + tokens,
      calls: bucket.calls + 1,
    });
  }

  summary(): CostSummary {
    return {
      totalCostUsd: this.totalCostUsd,
      totalTokens: this.totalTokens,
      totalCalls: this.totalCalls,
      byProvider: Object.fromEntries(this.byProvider),
      byModel: Object.fromEntries(this.byModel),
    };
  }
}
