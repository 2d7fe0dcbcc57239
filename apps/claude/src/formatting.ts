const PROGRESS_FILLED = '█';
const PROGRESS_EMPTY = '░';

export function formatTokens(tokens: number): string {
	if (tokens >= 1_000_000) {
		return `${(tokens / 1_000_000).toFixed(1)}M`;
	}
	if (tokens >= 1_000) {
		return `${(tokens / 1_000).toFixed(1)}K`;
	}
	return String(tokens);
}

export function formatNumber(value: number): string {
	return value.toLocaleString('en-US');
}

export function formatCurrency(amount: number): string {
	return `$${amount.toFixed(2)}`;
}

export function formatPercent(pct: number): string {
	return `${pct.toFixed(1)}%`;
}

/**
 * `1h 05m 03s`, `4m 09s` or `7s`; `compact` drops the spaces for the one-line summary.
 */
export function formatCountdown(seconds: number, compact = false): string {
	const total = Math.floor(seconds);
	if (total <= 0) {
		return '0s';
	}
	const hours = Math.floor(total / 3_600);
	const minutes = Math.floor((total % 3_600) / 60);
	const secs = total % 60;
	const pad = (value: number): string => String(value).padStart(2, '0');
	const separator = compact ? '' : ' ';
	if (hours > 0) {
		return [`${hours}h`, `${pad(minutes)}m`, `${pad(secs)}s`].join(separator);
	}
	if (minutes > 0) {
		return [`${minutes}m`, `${pad(secs)}s`].join(separator);
	}
	return `${secs}s`;
}

export function makeProgressBar(pct: number, width = 20): string {
	const clamped = Math.min(Math.max(pct, 0), 100);
	const filled = Math.floor((width * clamped) / 100);
	return PROGRESS_FILLED.repeat(filled) + PROGRESS_EMPTY.repeat(width - filled);
}

if (import.meta.vitest != null) {
	describe('formatTokens', () => {
		it('abbreviates thousands and millions', () => {
			expect(formatTokens(999)).toBe('999');
			expect(formatTokens(12_345)).toBe('12.3K');
			expect(formatTokens(1_800_000)).toBe('1.8M');
		});
	});

	describe('formatCountdown', () => {
		it('renders hours, minutes and seconds', () => {
			expect(formatCountdown(3_903)).toBe('1h 05m 03s');
			expect(formatCountdown(249)).toBe('4m 09s');
			expect(formatCountdown(7)).toBe('7s');
		});

		it('drops spaces in compact form', () => {
			expect(formatCountdown(3_903, true)).toBe('1h05m03s');
		});

		it('never renders a negative countdown', () => {
			expect(formatCountdown(-30)).toBe('0s');
		});
	});

	describe('makeProgressBar', () => {
		it('fills proportionally and clamps above 100 percent', () => {
			expect(makeProgressBar(50, 10)).toBe('█████░░░░░');
			expect(makeProgressBar(250, 4)).toBe('████');
			expect(makeProgressBar(0, 3)).toBe('░░░');
		});
	});

	describe('formatCurrency', () => {
		it('shows two decimals', () => {
			expect(formatCurrency(1.005)).toBe('$1.00');
			expect(formatCurrency(18)).toBe('$18.00');
		});
	});
}
