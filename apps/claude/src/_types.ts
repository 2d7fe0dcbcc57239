export type TokenCounts = {
	inputTokens: number;
	outputTokens: number;
	cacheCreationTokens: number;
	cacheReadTokens: number;
};

export type UsageEvent = TokenCounts & {
	timestamp: string;
	totalTokens: number;
	model: string;
	costUSD: number;
};

export type SessionOffsets = Record<string, number>;

export type TokenLedger = {
	events: UsageEvent[];
	sessionOffsets: SessionOffsets;
};

export type ModelTier = 'opus' | 'sonnet' | 'haiku';

export type TierRates = {
	inputCostPerMToken: number;
	outputCostPerMToken: number;
	cacheCreationCostPerMToken: number;
	cacheReadCostPerMToken: number;
};

export type PricingOverrides = Partial<Record<ModelTier, Partial<TierRates>>>;

export type ModelPricing = TierRates & {
	tier: ModelTier;
};

export type PricingSource = {
	getPricing: (model: string) => ModelPricing;
};

export type PlanName = 'pro' | 'max_5x' | 'max_20x';

export type PlanPreset = {
	name: string;
	windowHours: number;
	costLimit: number;
	messageLimit: number;
};

export type WindowConfig = {
	plan: PlanName;
	windowHours: number;
	costLimit: number;
	messageLimit: number;
	pricingOverrides: PricingOverrides;
};

export type Severity = 'normal' | 'warning' | 'critical';

export type TokenLimitSource = 'observed' | 'default';

export type WindowSnapshot = {
	windowHours: number;
	activeEvents: number;
	tokensUsed: number;
	costUsed: number;
	messagesUsed: number;
	costPerToken: number;
	tokenLimitSource: TokenLimitSource;
	tokenLimit: number;
	costLimit: number;
	messageLimit: number;
	pctTokens: number;
	pctCost: number;
	pctMessages: number;
	severity: Severity;
	rechargeSeconds: number;
	rechargeTokens: number;
	rechargeCost: number;
	fullClearSeconds: number;
};

/**
 * Marker attached to a result that fell back to a default instead of failing.
 */
export type Degraded<Reason extends string = string> = {
	reason: Reason;
	message: string;
};
