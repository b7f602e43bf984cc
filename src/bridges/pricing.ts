import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { TokenUsage } from '../workflow/types.js';
import type { PricingCapability } from './capabilities.js';

const modelPriceSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
});

export const pricingTableSchema = z.object({
  unit: z.literal('usd_per_1k_tokens'),
  free_providers: z.array(z.string()).default([]),
  providers: z.record(z.record(modelPriceSchema)),
});

export type PricingTable = z.infer<typeof pricingTableSchema>;
export type ModelPrice = z.infer<typeof modelPriceSchema>;

export const DEFAULT_PRICING_PATH = fileURLToPath(new URL('../../data/pricing.json', import.meta.url));

export function loadPricingTable(path: string = DEFAULT_PRICING_PATH): PricingTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return pricingTableSchema.parse(raw);
}

export function roundUsd(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/** Per-1K-token prices, matched on the exact model name or its longest known prefix. */
export class TablePricing implements PricingCapability {
  private readonly table: PricingTable;
  private readonly warned = new Set<string>();

  constructor(table: PricingTable = loadPricingTable()) {
    this.table = table;
  }

  priceFor(provider: string, model: string): ModelPrice | undefined {
    const models = this.table.providers[provider];
    if (!models) {
      return undefined;
    }
    const name = model.includes('/') ? model.slice(model.indexOf('/') + 1) : model;
    const exact = models[name];
    if (exact) {
      return exact;
    }
    const prefix = Object.keys(models)
      .filter((known) => name.startsWith(known))
      .sort((a, b) => b.length - a.length)[0];
    return prefix ? models[prefix] : undefined;
  }

  estimate(provider: string, model: string, usage: TokenUsage): number {
    if (this.table.free_providers.includes(provider)) {
      return 0;
    }
    const price = this.priceFor(provider, model);
    if (!price) {
      const key = `${provider}/${model}`;
      if (!this.warned.has(key)) {
        this.warned.add(key);
        logger.warn('No pricing entry for model, reporting zero cost', { provider, model });
      }
      return 0;
    }
    return roundUsd((usage.inputTokens / 1000) * price.input + (usage.outputTokens / 1000) * price.output);
  }
}
