import type { TokenUsage } from '../types.js';

/**
 * Pricing per million tokens, in USD.
 */
export interface ModelPricing {
  promptPerMillion: number;
  completionPerMillion: number;
}

export interface PricingLookup {
  pricing: ModelPricing;
  /** Registry key that matched, undefined when the default was used */
  matchedModel?: string;
}

/**
 * Models used by the web agent, with list pricing.
 * Provider-prefixed and bare ids are both listed because traces use either.
 */
const DEFAULT_PRICING: Array<[string, ModelPricing]> = [
  ['openai/gpt-4o-mini', { promptPerMillion: 0.15, completionPerMillion: 0.6 }],
  ['gpt-4o-mini', { promptPerMillion: 0.15, completionPerMillion: 0.6 }],
  ['openai/gpt-5', { promptPerMillion: 15.0, completionPerMillion: 60.0 }],
  ['gpt-5', { promptPerMillion: 15.0, completionPerMillion: 60.0 }],
  ['openai/gpt-5-mini', { promptPerMillion: 0.15, completionPerMillion: 0.6 }],
  ['gpt-5-mini', { promptPerMillion: 0.15, completionPerMillion: 0.6 }],
  ['claude-sonnet-4-20250514', { promptPerMillion: 3.0, completionPerMillion: 15.0 }],
  ['claude-sonnet-4', { promptPerMillion: 3.0, completionPerMillion: 15.0 }],
  ['bedrock/global.anthropic.claude-sonnet-4-5-20250929-v1:0', { promptPerMillion: 3.0, completionPerMillion: 15.0 }],
  ['bedrock/claude-sonnet-4', { promptPerMillion: 3.0, completionPerMillion: 15.0 }],
  ['bedrock/global.anthropic.claude-haiku-4-5-20251001-v1:0', { promptPerMillion: 0.8, completionPerMillion: 4.0 }],
  ['claude-haiku-4-5', { promptPerMillion: 0.8, completionPerMillion: 4.0 }],
  ['openai/text-embedding-3-small', { promptPerMillion: 0.02, completionPerMillion: 0 }],
  ['text-embedding-3-small', { promptPerMillion: 0.02, completionPerMillion: 0 }],
  ['bedrock/cohere.embed-english-v3', { promptPerMillion: 0.1, completionPerMillion: 0 }],
];

/** Used when a model is not in the registry */
const FALLBACK_PRICING: ModelPricing = { promptPerMillion: 1.0, completionPerMillion: 1.0 };

/**
 * Registry of model pricing.
 */
export class ModelRegistry {
  private models: Map<string, ModelPricing>;

  constructor(entries: Array<[string, ModelPricing]> = DEFAULT_PRICING) {
    this.models = new Map(entries);
  }

  setModel(modelId: string, pricing: ModelPricing): void {
    this.models.set(modelId, pricing);
  }

  /**
   * Find pricing for a model: exact id first, then the first registered id
   * that contains or is contained in the given one.
   */
  lookup(modelId: string): PricingLookup {
    const exact = this.models.get(modelId);
    if (exact) {
      return { pricing: exact, matchedModel: modelId };
    }

    for (const [key, pricing] of this.models) {
      if (key.includes(modelId) || modelId.includes(key)) {
        return { pricing, matchedModel: key };
      }
    }

    return { pricing: FALLBACK_PRICING };
  }

  /**
   * Cost in USD of one call.
   */
  calculateCost(modelId: string | undefined, usage: TokenUsage): number {
    const { pricing } = modelId ? this.lookup(modelId) : { pricing: FALLBACK_PRICING };
    const promptCost = (usage.promptTokens * pricing.promptPerMillion) / 1_000_000;
    const completionCost = (usage.completionTokens * pricing.completionPerMillion) / 1_000_000;
    return promptCost + completionCost;
  }
}

/**
 * Format a USD amount with precision suited to its magnitude.
 */
export function formatCost(cost: number): string {
  if (cost < 0.001) return `$${cost.toFixed(6)}`;
  if (cost < 0.01) return `$${cost.toFixed(5)}`;
  return `$${cost.toFixed(4)}`;
}

export const modelRegistry = new ModelRegistry();
