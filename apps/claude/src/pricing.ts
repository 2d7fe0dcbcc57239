import type {
	ModelPricing,
	ModelTier,
	PricingOverrides,
	PricingSource,
	TierRates,
	TokenCounts,
} from './_types.ts';
import { COST_DECIMALS, MILLION } from './_consts.ts';

export const DEFAULT_TIER: ModelTier = 'sonnet';

export const DEFAULT_TIER_RATES = {
	opus: {
		inputCostPerMToken: 15,
		outputCostPerMToken: 75,
		cacheCreationCostPerMToken: 18.75,
		cacheReadCostPerMToken: 1.5,
	},
	sonnet: {
		inputCostPerMToken: 3,
		outputCostPerMToken: 15,
		cacheCreationCostPerMToken: 3.75,
		cacheReadCostPerMToken: 0.3,
	},
	haiku: {
		inputCostPerMToken: 0.8,
		outputCostPerMToken: 4,
		cacheCreationCostPerMToken: 1,
		cacheReadCostPerMToken: 0.08,
	},
} as const satisfies Record<ModelTier, TierRates>;

const MODEL_TIERS: readonly ModelTier[] = ['opus', 'sonnet', 'haiku'];

/**
 * Classifies a model identifier by case-insensitive substring.
 * Anything that is neither opus nor haiku, including an empty string, prices as the default tier.
 */
export function classifyModel(model: string | null | undefined): ModelTier {
	const lower = (model ?? '').toLowerCase();
	if (lower.includes('opus')) {
		return 'opus';
	}
	if (lower.includes('haiku')) {
		return 'haiku';
	}
	return DEFAULT_TIER;
}

export function roundCost(value: number): number {
	const factor = 10 ** COST_DECIMALS;
	return Math.round(value * factor) / factor;
}

export function calculateCostUSD(usage: TokenCounts, rates: TierRates): number {
	const cost =
		(usage.inputTokens / MILLION) * rates.inputCostPerMToken +
		(usage.outputTokens / MILLION) * rates.outputCostPerMToken +
		(usage.cacheCreationTokens / MILLION) * rates.cacheCreationCostPerMToken +
		(usage.cacheReadTokens / MILLION) * rates.cacheReadCostPerMToken;
	return roundCost(cost);
}

function mergeRates(base: TierRates, override: Partial<TierRates> | undefined): TierRates {
	if (override == null) {
		return { ...base };
	}
	return {
		inputCostPerMToken: override.inputCostPerMToken ?? base.inputCostPerMToken,
		outputCostPerMToken: override.outputCostPerMToken ?? base.outputCostPerMToken,
		cacheCreationCostPerMToken:
			override.cacheCreationCostPerMToken ?? base.cacheCreationCostPerMToken,
		cacheReadCostPerMToken: override.cacheReadCostPerMToken ?? base.cacheReadCostPerMToken,
	};
}

export class TieredPricingSource implements PricingSource {
	private readonly rates: Map<ModelTier, TierRates>;

	constructor(overrides: PricingOverrides = {}) {
		this.rates = new Map(
			MODEL_TIERS.map((tier): [ModelTier, TierRates] => [
				tier,
				mergeRates(DEFAULT_TIER_RATES[tier], overrides[tier]),
			]),
		);
	}

	getPricing(model: string): ModelPricing {
		const tier = classifyModel(model);
		const rates = this.rates.get(tier) ?? DEFAULT_TIER_RATES[DEFAULT_TIER];
		return { ...rates, tier };
	}

	cost(model: string, usage: TokenCounts): number {
		return calculateCostUSD(usage, this.getPricing(model));
	}
}

if (import.meta.vitest != null) {
	describe('classifyModel', () => {
		it('matches tiers by case-insensitive substring', () => {
			expect(classifyModel('claude-opus-4-1-20250805')).toBe('opus');
			expect(classifyModel('Claude-3-5-HAIKU-20241022')).toBe('haiku');
			expect(classifyModel('claude-sonnet-4-20250514')).toBe('sonnet');
		});

		it('falls back to the default tier for unknown or empty identifiers', () => {
			expect(classifyModel('mystery-model-v9')).toBe('sonnet');
			expect(classifyModel('')).toBe('sonnet');
			expect(classifyModel(undefined)).toBe('sonnet');
		});
	});

	describe('calculateCostUSD', () => {
		it('sums every token category at per-million rates', () => {
			const cost = calculateCostUSD(
				{
					inputTokens: 1_000,
					outputTokens: 500,
					cacheCreationTokens: 2_000,
					cacheReadTokens: 10_000,
				},
				DEFAULT_TIER_RATES.opus,
			);
			// 1000 @ 15 + 500 @ 75 + 2000 @ 18.75 + 10000 @ 1.5
			expect(cost).toBeCloseTo(0.015 + 0.0375 + 0.0375 + 0.015, 10);
		});

		it('rounds to six decimal places', () => {
			const cost = calculateCostUSD(
				{ inputTokens: 1, outputTokens: 0, cacheCreationTokens: 0, cacheReadTokens: 1 },
				DEFAULT_TIER_RATES.haiku,
			);
			// 0.0000008 + 0.00000008 = 0.00000088, rounded to 0.000001
			expect(cost).toBe(0.000001);
		});
	});

	describe('TieredPricingSource', () => {
		it('prices an unknown model at the default tier without error', () => {
			const source = new TieredPricingSource();
			const pricing = source.getPricing('mystery-model-v9');
			expect(pricing.tier).toBe('sonnet');
			expect(pricing.inputCostPerMToken).toBe(3);
			expect(
				source.cost('mystery-model-v9', {
					inputTokens: 1_000_000,
					outputTokens: 0,
					cacheCreationTokens: 0,
					cacheReadTokens: 0,
				}),
			).toBe(3);
		});

		it('applies partial per-tier overrides', () => {
			const source = new TieredPricingSource({ opus: { outputCostPerMToken: 50 } });
			const pricing = source.getPricing('claude-opus-4');
			expect(pricing.outputCostPerMToken).toBe(50);
			expect(pricing.inputCostPerMToken).toBe(15);
			expect(source.getPricing('claude-haiku').outputCostPerMToken).toBe(4);
		});
	});
}
