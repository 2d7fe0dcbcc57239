import type { ClaudeHomeFixture } from './_fixtures.ts';
import { assistantLine, createClaudeHome, userLine } from './_fixtures.ts';
import { extractEventsFromLines, extractNewEvents } from './extractor.ts';
import { TieredPricingSource } from './pricing.ts';

const pricingSource = new TieredPricingSource();

describe('extractEventsFromLines', () => {
	const lines = [
		userLine('2025-09-11T02:59:00.000Z'),
		assistantLine({
			timestamp: '2025-09-11T03:00:00.000Z',
			messageId: 'msg_1',
			requestId: 'req_1',
			inputTokens: 1_000,
			outputTokens: 500,
		}),
		'{not json',
		assistantLine({
			timestamp: '2025-09-11T03:01:00.000Z',
			messageId: 'msg_1',
			requestId: 'req_1',
			inputTokens: 1_000,
			outputTokens: 500,
		}),
		assistantLine({
			timestamp: '2025-09-11T03:02:00.000Z',
			messageId: 'msg_2',
			requestId: 'req_2',
		}),
		assistantLine({
			timestamp: '2025-09-11T03:03:00.000Z',
			model: 'claude-opus-4-1',
			cacheReadTokens: 2_000,
		}),
	];

	it('extracts priced events, skipping duplicates, zero usage and malformed lines', () => {
		const result = extractEventsFromLines(lines, -1, pricingSource);

		expect(result.events).toEqual([
			{
				timestamp: '2025-09-11T03:00:00.000Z',
				inputTokens: 1_000,
				outputTokens: 500,
				cacheCreationTokens: 0,
				cacheReadTokens: 0,
				totalTokens: 1_500,
				model: 'claude-sonnet-4-20250514',
				// 1000 @ 3 + 500 @ 15
				costUSD: 0.0105,
			},
			{
				timestamp: '2025-09-11T03:03:00.000Z',
				inputTokens: 0,
				outputTokens: 0,
				cacheCreationTokens: 0,
				cacheReadTokens: 2_000,
				totalTokens: 2_000,
				model: 'claude-opus-4-1',
				// 2000 @ 1.5
				costUSD: 0.003,
			},
		]);
		expect(result.lastLineIndex).toBe(5);
		expect(result.linesRead).toBe(6);
		expect(result.skippedLines).toBe(1);
		expect(result.duplicates).toBe(1);
		expect(result.degraded).toBeNull();
	});

	it('resumes after the saved offset without re-reading earlier lines', () => {
		const result = extractEventsFromLines(lines, 3, pricingSource);

		expect(result.linesRead).toBe(2);
		expect(result.events.map((event) => event.timestamp)).toEqual(['2025-09-11T03:03:00.000Z']);
		expect(result.lastLineIndex).toBe(5);
		expect(result.skippedLines).toBe(0);
	});

	it('keeps the offset when there is nothing new', () => {
		const result = extractEventsFromLines(lines, 5, pricingSource);

		expect(result.events).toEqual([]);
		expect(result.linesRead).toBe(0);
		expect(result.lastLineIndex).toBe(5);
	});

	it('advances the offset over lines that carry no usage', () => {
		const result = extractEventsFromLines(
			[userLine('2025-09-11T03:00:00.000Z'), 'garbage'],
			-1,
			pricingSource,
		);

		expect(result.events).toEqual([]);
		expect(result.lastLineIndex).toBe(1);
	});

	it('deduplicates against a shared key set', () => {
		const seenKeys = new Set(['msg_1:req_1']);
		const result = extractEventsFromLines(lines, -1, pricingSource, seenKeys);

		expect(result.duplicates).toBe(2);
		expect(result.events).toHaveLength(1);
		expect(seenKeys.has('msg_2:req_2')).toBe(true);
	});
});

describe('extractNewEvents', () => {
	let home: ClaudeHomeFixture;

	beforeEach(() => {
		home = createClaudeHome();
	});

	afterEach(() => {
		home.cleanup();
	});

	it('locates the session log under any project directory', () => {
		home.writeSession('-home-user-project', 'session-a', [
			assistantLine({ timestamp: '2025-09-11T03:00:00.000Z', inputTokens: 10 }),
		]);

		const result = extractNewEvents('session-a', -1, {
			projectsDirs: [home.projectsDir],
			pricingSource,
		});

		expect(result.events).toHaveLength(1);
		expect(result.events[0]?.totalTokens).toBe(10);
		expect(result.lastLineIndex).toBe(0);
	});

	it('returns an empty degraded result when the log does not exist', () => {
		const result = extractNewEvents('missing-session', 7, {
			projectsDirs: [home.projectsDir, `${home.root}/nowhere`],
			pricingSource,
		});

		expect(result.events).toEqual([]);
		expect(result.lastLineIndex).toBe(7);
		expect(result.degraded?.reason).toBe('session-log-missing');
	});

	it('refuses session ids that would escape the projects directory', () => {
		const result = extractNewEvents('../dashboard', -1, {
			projectsDirs: [home.projectsDir],
			pricingSource,
		});

		expect(result.degraded?.reason).toBe('session-log-missing');
	});

	it('reports an unreadable log as degraded', () => {
		const result = extractNewEvents('session-b', 2, {
			projectsDirs: [home.projectsDir],
			pricingSource,
			filePath: `${home.projectsDir}/does-not-exist.jsonl`,
		});

		expect(result.lastLineIndex).toBe(2);
		expect(result.degraded?.reason).toBe('session-log-unreadable');
	});
});
