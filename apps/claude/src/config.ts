import type { Degraded, PlanName, PlanPreset, PricingOverrides, WindowConfig } from './_types.ts';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_PLAN } from './_consts.ts';

export const PLAN_PRESETS = {
	pro: { name: 'Pro', windowHours: 5, costLimit: 18, messageLimit: 250 },
	max_5x: { name: 'Max 5x', windowHours: 5, costLimit: 35, messageLimit: 1_000 },
	max_20x: { name: 'Max 20x', windowHours: 5, costLimit: 140, messageLimit: 2_000 },
} as const satisfies Record<PlanName, PlanPreset>;

const rateSchema = z.number().finite().nonnegative().optional();

const tierRatesSchema = z.object({
	input: rateSchema,
	output: rateSchema,
	cacheCreation: rateSchema,
	cacheRead: rateSchema,
});

export const configFileSchema = z.object({
	plan: z.string().optional(),
	windowHours: z.number().finite().optional(),
	costLimit: z.number().finite().optional(),
	messageLimit: z.number().finite().optional(),
	pricing: z
		.object({
			opus: tierRatesSchema.optional(),
			sonnet: tierRatesSchema.optional(),
			haiku: tierRatesSchema.optional(),
		})
		.optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export type ConfigDegradedReason = 'config-missing' | 'config-unreadable' | 'config-invalid';

export type LoadedConfig = {
	config: WindowConfig;
	degraded: Degraded<ConfigDegradedReason> | null;
};

function isPlanName(value: string): value is PlanName {
	return Object.hasOwn(PLAN_PRESETS, value);
}

export function resolvePlan(plan: string | undefined): PlanName {
	return plan != null && isPlanName(plan) ? plan : DEFAULT_PLAN;
}

function toPricingOverrides(pricing: ConfigFile['pricing']): PricingOverrides {
	const overrides: PricingOverrides = {};
	if (pricing == null) {
		return overrides;
	}
	for (const tier of ['opus', 'sonnet', 'haiku'] as const) {
		const rates = pricing[tier];
		if (rates == null) {
			continue;
		}
		overrides[tier] = {
			inputCostPerMToken: rates.input,
			outputCostPerMToken: rates.output,
			cacheCreationCostPerMToken: rates.cacheCreation,
			cacheReadCostPerMToken: rates.cacheRead,
		};
	}
	return overrides;
}

/**
 * Fills every field the config file leaves out from the plan preset. Unknown plans use `pro`.
 */
export function resolveWindowConfig(file: ConfigFile = {}): WindowConfig {
	const plan = resolvePlan(file.plan);
	const preset = PLAN_PRESETS[plan];
	return {
		plan,
		windowHours: file.windowHours ?? preset.windowHours,
		costLimit: file.costLimit ?? preset.costLimit,
		messageLimit: file.messageLimit ?? preset.messageLimit,
		pricingOverrides: toPricingOverrides(file.pricing),
	};
}

/**
 * Parses raw config JSON. A document that fails validation falls back to the default preset.
 */
export function parseWindowConfig(raw: unknown): LoadedConfig {
	const parsed = configFileSchema.safeParse(raw);
	if (!parsed.success) {
		return {
			config: resolveWindowConfig(),
			degraded: {
				reason: 'config-invalid',
				message: parsed.error.issues
					.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
					.join('; '),
			},
		};
	}
	return { config: resolveWindowConfig(parsed.data), degraded: null };
}

export function loadWindowConfig(configPath: string): LoadedConfig {
	let content: string;
	try {
		content = readFileSync(configPath, 'utf-8');
	} catch (error) {
		const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
		return {
			config: resolveWindowConfig(),
			degraded: {
				reason: missing ? 'config-missing' : 'config-unreadable',
				message: error instanceof Error ? error.message : String(error),
			},
		};
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		return {
			config: resolveWindowConfig(),
			degraded: {
				reason: 'config-invalid',
				message: error instanceof Error ? error.message : String(error),
			},
		};
	}
	return parseWindowConfig(raw);
}

if (import.meta.vitest != null) {
	describe('resolveWindowConfig', () => {
		it('uses the pro preset when nothing is configured', () => {
			expect(resolveWindowConfig()).toEqual({
				plan: 'pro',
				windowHours: 5,
				costLimit: 18,
				messageLimit: 250,
				pricingOverrides: {},
			});
		});

		it('lets explicit fields override the selected preset', () => {
			const config = resolveWindowConfig({ plan: 'max_20x', costLimit: 100 });
			expect(config.plan).toBe('max_20x');
			expect(config.costLimit).toBe(100);
			expect(config.messageLimit).toBe(2_000);
		});

		it('falls back to pro for an unknown plan but keeps other fields', () => {
			const config = resolveWindowConfig({ plan: 'enterprise', windowHours: 3 });
			expect(config.plan).toBe('pro');
			expect(config.windowHours).toBe(3);
			expect(config.costLimit).toBe(18);
		});

		it('maps per-tier pricing overrides', () => {
			const config = resolveWindowConfig({ pricing: { opus: { output: 50 } } });
			expect(config.pricingOverrides).toEqual({
				opus: {
					inputCostPerMToken: undefined,
					outputCostPerMToken: 50,
					cacheCreationCostPerMToken: undefined,
					cacheReadCostPerMToken: undefined,
				},
			});
		});
	});

	describe('parseWindowConfig', () => {
		it('marks an invalid document as degraded and uses the default preset', () => {
			const loaded = parseWindowConfig({ plan: 'max_5x', costLimit: 'lots' });
			expect(loaded.degraded?.reason).toBe('config-invalid');
			expect(loaded.degraded?.message).toContain('costLimit');
			expect(loaded.config.plan).toBe('pro');
		});

		it('accepts a non-positive window without complaint', () => {
			const loaded = parseWindowConfig({ windowHours: 0 });
			expect(loaded.degraded).toBeNull();
			expect(loaded.config.windowHours).toBe(0);
		});
	});

	describe('loadWindowConfig', () => {
		it('reports a missing file and returns the preset', () => {
			const loaded = loadWindowConfig('/nonexistent/usage-window/config.json');
			expect(loaded.degraded?.reason).toBe('config-missing');
			expect(loaded.config.costLimit).toBe(18);
		});
	});
}
