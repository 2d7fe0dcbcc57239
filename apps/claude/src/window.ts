import type {
	Severity,
	TokenLedger,
	TokenLimitSource,
	UsageEvent,
	WindowConfig,
	WindowSnapshot,
} from './_types.ts';
import {
	CRITICAL_THRESHOLD_PCT,
	DEFAULT_COST_PER_TOKEN,
	MS_PER_HOUR,
	MS_PER_SECOND,
	WARNING_THRESHOLD_PCT,
} from './_consts.ts';
import { roundCost } from './pricing.ts';

type TimedEvent = {
	event: UsageEvent;
	ms: number;
};

export type WindowLimits = Pick<WindowConfig, 'windowHours' | 'costLimit' | 'messageLimit'>;

/**
 * Percentage of `limit`; a non-positive limit yields zero.
 */
function percentOf(value: number, limit: number): number {
	if (!(limit > 0)) {
		return 0;
	}
	return (value * 100) / limit;
}

export function severityFor(pct: number): Severity {
	if (pct >= CRITICAL_THRESHOLD_PCT) {
		return 'critical';
	}
	if (pct >= WARNING_THRESHOLD_PCT) {
		return 'warning';
	}
	return 'normal';
}

function secondsUntil(targetMs: number, nowMs: number): number {
	return Math.max(0, Math.floor((targetMs - nowMs) / MS_PER_SECOND));
}

/**
 * Events with `timestamp > now - windowHours`, oldest first. Empty for a non-positive window.
 */
export function selectActiveEvents(
	events: readonly UsageEvent[],
	now: Date,
	windowHours: number,
): TimedEvent[] {
	if (!(windowHours > 0)) {
		return [];
	}
	const windowStart = now.getTime() - windowHours * MS_PER_HOUR;
	return events
		.map((event) => ({ event, ms: Date.parse(event.timestamp) }))
		.filter((timed) => !Number.isNaN(timed.ms) && timed.ms > windowStart)
		.sort((a, b) => a.ms - b.ms);
}

/**
 * Derives the token ceiling from the cost limit and the observed cost per token.
 * Recomputed on every call so a switch between tiers shows up immediately.
 */
export function deriveTokenLimit(
	costLimit: number,
	tokensUsed: number,
	costUsed: number,
): { tokenLimit: number; costPerToken: number; source: TokenLimitSource } {
	const observed = tokensUsed > 0 ? costUsed / tokensUsed : 0;
	const source: TokenLimitSource = observed > 0 ? 'observed' : 'default';
	const costPerToken = source === 'observed' ? observed : DEFAULT_COST_PER_TOKEN;
	const tokenLimit = costLimit > 0 ? Math.round(costLimit / costPerToken) : 0;
	return { tokenLimit, costPerToken, source };
}

export function computeWindowSnapshot(
	ledger: TokenLedger,
	now: Date,
	limits: WindowLimits,
): WindowSnapshot {
	const nowMs = now.getTime();
	const windowMs = Math.max(limits.windowHours, 0) * MS_PER_HOUR;
	const active = selectActiveEvents(ledger.events, now, limits.windowHours);

	let tokensUsed = 0;
	let rawCost = 0;
	for (const { event } of active) {
		tokensUsed += event.totalTokens;
		rawCost += event.costUSD;
	}
	const costUsed = roundCost(rawCost);
	const messagesUsed = active.length;

	const { tokenLimit, costPerToken, source } = deriveTokenLimit(
		limits.costLimit,
		tokensUsed,
		costUsed,
	);

	const pctTokens = percentOf(tokensUsed, tokenLimit);
	const pctCost = percentOf(costUsed, limits.costLimit);
	const pctMessages = percentOf(messagesUsed, limits.messageLimit);

	let rechargeSeconds = 0;
	let rechargeTokens = 0;
	let rechargeCost = 0;
	let fullClearSeconds = 0;

	const oldest = active.at(0);
	const newest = active.at(-1);
	if (oldest != null && newest != null) {
		rechargeSeconds = secondsUntil(oldest.ms + windowMs, nowMs);
		rechargeTokens = oldest.event.totalTokens;
		rechargeCost = oldest.event.costUSD;
		fullClearSeconds = secondsUntil(newest.ms + windowMs, nowMs);
	}

	return {
		windowHours: limits.windowHours,
		activeEvents: active.length,
		tokensUsed,
		costUsed,
		messagesUsed,
		costPerToken,
		tokenLimitSource: source,
		tokenLimit,
		costLimit: limits.costLimit,
		messageLimit: limits.messageLimit,
		pctTokens,
		pctCost,
		pctMessages,
		severity: severityFor(Math.max(pctTokens, pctCost, pctMessages)),
		rechargeSeconds,
		rechargeTokens,
		rechargeCost: roundCost(rechargeCost),
		fullClearSeconds,
	};
}

if (import.meta.vitest != null) {
	const now = new Date('2025-09-11T12:00:00.000Z');
	const hoursAgo = (hours: number): string =>
		new Date(now.getTime() - hours * MS_PER_HOUR).toISOString();

	function usageEvent(timestamp: string, totalTokens: number, costUSD: number): UsageEvent {
		return {
			timestamp,
			inputTokens: totalTokens,
			outputTokens: 0,
			cacheCreationTokens: 0,
			cacheReadTokens: 0,
			totalTokens,
			model: 'claude-sonnet-4',
			costUSD,
		};
	}

	const limits: WindowLimits = { windowHours: 5, costLimit: 18, messageLimit: 250 };

	describe('computeWindowSnapshot', () => {
		const ledger: TokenLedger = {
			events: [
				usageEvent(hoursAgo(1), 3_000, 0.03),
				usageEvent(hoursAgo(6), 1_000, 0.01),
				usageEvent(hoursAgo(4), 2_000, 0.02),
			],
			sessionOffsets: {},
		};

		it('counts only events inside the window', () => {
			const snapshot = computeWindowSnapshot(ledger, now, limits);
			expect(snapshot.tokensUsed).toBe(5_000);
			expect(snapshot.costUsed).toBe(0.05);
			expect(snapshot.messagesUsed).toBe(2);
			expect(snapshot.activeEvents).toBe(2);
		});

		it('schedules the next recharge and the full clear', () => {
			const snapshot = computeWindowSnapshot(ledger, now, limits);
			expect(snapshot.rechargeSeconds).toBe(3_600);
			expect(snapshot.rechargeTokens).toBe(2_000);
			expect(snapshot.rechargeCost).toBe(0.02);
			expect(snapshot.fullClearSeconds).toBe(4 * 3_600);
		});

		it('counts down as time passes', () => {
			const later = new Date(now.getTime() + 90 * MS_PER_SECOND);
			const snapshot = computeWindowSnapshot(ledger, later, limits);
			expect(snapshot.rechargeSeconds).toBe(3_600 - 90);
			expect(snapshot.fullClearSeconds).toBe(4 * 3_600 - 90);
		});

		it('sorts events recorded out of order before windowing', () => {
			const snapshot = computeWindowSnapshot(
				{ events: [...ledger.events].reverse(), sessionOffsets: {} },
				now,
				limits,
			);
			expect(snapshot.rechargeTokens).toBe(2_000);
		});

		it('reports an empty window as fully recharged', () => {
			const snapshot = computeWindowSnapshot({ events: [], sessionOffsets: {} }, now, limits);
			expect(snapshot).toMatchObject({
				tokensUsed: 0,
				costUsed: 0,
				messagesUsed: 0,
				rechargeSeconds: 0,
				rechargeTokens: 0,
				rechargeCost: 0,
				fullClearSeconds: 0,
				severity: 'normal',
				tokenLimitSource: 'default',
				tokenLimit: 2_000_000,
			});
		});

		it('reports only the oldest event when several share its timestamp', () => {
			const snapshot = computeWindowSnapshot(
				{
					events: [
						usageEvent(hoursAgo(4), 100, 0.01),
						usageEvent(hoursAgo(4), 900, 0.01),
						usageEvent(hoursAgo(1), 50, 0.005),
					],
					sessionOffsets: {},
				},
				now,
				limits,
			);
			expect(snapshot.rechargeSeconds).toBe(3_600);
			expect(snapshot.rechargeTokens).toBe(100);
			expect(snapshot.rechargeCost).toBe(0.01);
		});

		it('excludes an event exactly one window old', () => {
			const snapshot = computeWindowSnapshot(
				{ events: [usageEvent(hoursAgo(5), 100, 0.001)], sessionOffsets: {} },
				now,
				limits,
			);
			expect(snapshot.activeEvents).toBe(0);
		});

		it('rounds a sub-second countdown down to zero', () => {
			const almostNow = new Date(now.getTime() - 500);
			const snapshot = computeWindowSnapshot(
				{ events: [usageEvent(hoursAgo(5), 100, 0.001)], sessionOffsets: {} },
				almostNow,
				limits,
			);
			expect(snapshot.activeEvents).toBe(1);
			expect(snapshot.rechargeSeconds).toBe(0);
			expect(snapshot.fullClearSeconds).toBe(0);
		});

		it('keeps a future-dated event in the window with a finite countdown', () => {
			const ahead = new Date(now.getTime() + MS_PER_HOUR).toISOString();
			const snapshot = computeWindowSnapshot(
				{ events: [usageEvent(ahead, 100, 0.001)], sessionOffsets: {} },
				now,
				limits,
			);
			expect(snapshot.activeEvents).toBe(1);
			expect(snapshot.rechargeSeconds).toBe(6 * 3_600);
		});
	});

	describe('deriveTokenLimit', () => {
		it('uses the observed cost per token of the active window', () => {
			expect(deriveTokenLimit(18, 100_000, 1)).toEqual({
				tokenLimit: 1_800_000,
				costPerToken: 0.00001,
				source: 'observed',
			});
		});

		it('tracks a switch to a more expensive tier immediately', () => {
			const cheap = deriveTokenLimit(18, 100_000, 0.3);
			const expensive = deriveTokenLimit(18, 100_000, 1.5);
			expect(expensive.tokenLimit).toBeLessThan(cheap.tokenLimit);
			expect(expensive.tokenLimit).toBe(1_200_000);
		});

		it('falls back to the default rate without usage or without cost', () => {
			expect(deriveTokenLimit(18, 0, 0).source).toBe('default');
			expect(deriveTokenLimit(18, 500, 0)).toEqual({
				tokenLimit: 2_000_000,
				costPerToken: DEFAULT_COST_PER_TOKEN,
				source: 'default',
			});
		});

		it('yields no ceiling for a non-positive cost limit', () => {
			expect(deriveTokenLimit(0, 100_000, 1).tokenLimit).toBe(0);
			expect(deriveTokenLimit(-5, 100_000, 1).tokenLimit).toBe(0);
		});
	});

	describe('zero guards', () => {
		const ledger: TokenLedger = {
			events: [usageEvent(hoursAgo(1), 1_000, 0.5)],
			sessionOffsets: {},
		};

		it('returns zero percentages for a zero-length window', () => {
			const snapshot = computeWindowSnapshot(ledger, now, { ...limits, windowHours: 0 });
			expect(snapshot.pctTokens).toBe(0);
			expect(snapshot.pctCost).toBe(0);
			expect(snapshot.pctMessages).toBe(0);
			expect(snapshot.rechargeSeconds).toBe(0);
		});

		it('returns zero percentages against non-positive limits', () => {
			const snapshot = computeWindowSnapshot(ledger, now, {
				windowHours: 5,
				costLimit: 0,
				messageLimit: -1,
			});
			expect(snapshot.tokenLimit).toBe(0);
			expect(snapshot.pctTokens).toBe(0);
			expect(snapshot.pctCost).toBe(0);
			expect(snapshot.pctMessages).toBe(0);
			expect(snapshot.severity).toBe('normal');
		});
	});

	describe('severity', () => {
		it('bands inclusively at 70 and 90 percent', () => {
			expect(severityFor(69.99)).toBe('normal');
			expect(severityFor(70)).toBe('warning');
			expect(severityFor(89.99)).toBe('warning');
			expect(severityFor(90)).toBe('critical');
		});

		it('takes the highest of tokens, cost and messages', () => {
			const events = Array.from({ length: 9 }, (_, index) =>
				usageEvent(hoursAgo(1 + index / 10), 10, 0.0001),
			);
			const snapshot = computeWindowSnapshot({ events, sessionOffsets: {} }, now, {
				windowHours: 5,
				costLimit: 18,
				messageLimit: 10,
			});
			expect(snapshot.pctMessages).toBe(90);
			expect(snapshot.pctCost).toBeLessThan(1);
			expect(snapshot.severity).toBe('critical');
		});
	});
}
