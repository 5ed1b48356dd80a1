/** USD per one million tokens. */
export type ModelPricing = { input: number; output: number };

export const DEFAULT_MODEL_PRICING: Readonly<Record<string, ModelPricing>> = {
  'gpt-4': { input: 30, output: 60 },
  'gpt-4-turbo': { input: 10, output: 30 },
  'gpt-3.5-turbo': { input: 0.5, output: 1.5 },
  'claude-3-opus': { input: 15, output: 75 },
  'claude-3-sonnet': { input: 3, output: 15 },
  'claude-3-haiku': { input: 0.25, output: 1.25 },
  'llama-3': { input: 0, output: 0 },
};

type ModelUsage = { cost: number; tokens: { input: number; output: number } };

export type CostSummary = {
  total_cost: number;
  by_model: Record<string, ModelUsage>;
};

const TOKENS_PER_UNIT = 1_000_000;

/** Accumulates model spend. Models without a price cost nothing. */
export class CostTracker {
  private readonly pricing: Map<string, ModelPricing>;
  private readonly usage = new Map<string, ModelUsage>();

  constructor(pricing: Record<string, ModelPricing> = {}) {
    this.pricing = new Map(
      Object.entries({ ...DEFAULT_MODEL_PRICING, ...pricing }),
    );
  }

  estimateCost(model: string, inputTokens: number, outputTokens: number): number {
    const price = this.pricing.get(model);
    if (!price) {
      return 0;
    }
    return (
      (inputTokens / TOKENS_PER_UNIT) * price.input +
      (outputTokens / TOKENS_PER_UNIT) * price.output
    );
  }

  /** Returns the cost of this call. */
  record(model: string, inputTokens: number, outputTokens: number): number {
    const cost = this.estimateCost(model, inputTokens, outputTokens);
    const entry = this.usage.get(model) ?? {
      cost: 0,
      tokens: { input: 0, output: 0 },
    };
    entry.cost += cost;
    entry.tokens.input += inputTokens;
    entry.tokens.output += outputTokens;
    this.usage.set(model, entry);
    return cost;
  }

  getSummary(): CostSummary {
    let total = 0;
    const byModel: Record<string, ModelUsage> = {};
    for (const [model, entry] of this.usage) {
      total += entry.cost;
      byModel[model] = { cost: entry.cost, tokens: { ...entry.tokens } };
    }
    return { total_cost: total, by_model: byModel };
  }

  reset(): void {
    this.usage.clear();
  }
}
