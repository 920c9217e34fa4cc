/**
 * Cost estimation against caller-supplied pricing.
 * No prices are bundled; unknown models yield `null`.
 */

import type { TokenUsageSnapshot } from '../types/session';

/** USD per million tokens. */
export interface ModelPricing {
  input: number;
  output: number;
  cacheRead?: number;
  cacheWrite?: number;
}

export type PricingTable = Record<string, ModelPricing>;

export type PricingLookup = (model: string) => ModelPricing | undefined;

/** Looks up exact model ids first, then the longest table key the model starts with. */
export function pricingFromTable(table: PricingTable): PricingLookup {
  const keys = Object.keys(table).sort((a, b) => b.length - a.length);
  return (model: string) => {
    if (Object.hasOwn(table, model)) return table[model];
    const key = keys.find(k => model.startsWith(k));
    return key === undefined ? undefined : table[key];
  };
}

export function estimateCost(
  usage: TokenUsageSnapshot,
  model: string,
  lookup: PricingLookup,
): number | null {
  const pricing = lookup(model);
  if (!pricing) return null;
  const perToken = (rate: number) => rate / 1_000_000;
  return (
    usage.input_tokens * perToken(pricing.input) +
    usage.output_tokens * perToken(pricing.output) +
    usage.cache_read_tokens * perToken(pricing.cacheRead ?? pricing.input) +
    usage.cache_created_tokens * perToken(pricing.cacheWrite ?? pricing.input)
  );
}
