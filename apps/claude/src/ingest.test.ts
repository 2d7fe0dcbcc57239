import type { ClaudeHomeFixture } from './_fixtures.ts';
import type { WindowConfig } from './_types.ts';
import type { LedgerContext } from './paths.ts';
import { appendFileSync, existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { assistantLine, createClaudeHome, userLine } from './_fixtures.ts';
import { ingest } from './ingest.ts';
import { LedgerStore } from './ledger-store.ts';

const config: WindowConfig = {
	plan: 'pro',
	windowHours: 5,
	costLimit: 18,
	messageLimit: 250,
	pricingOverrides: {},
};

const now = new Date('2025-09-11T12:00:00.000Z');

describe('ingest', () => {
	let home: ClaudeHomeFixture;
	let context: LedgerContext;

	beforeEach(() => {
		home = createClaudeHome();
		context = {
			dashboardDir: home.dashboardDir,
			ledgerPath: home.ledgerPath,
			configPath: home.configPath,
			projectsDirs: [home.projectsDir],
		};
	});

	afterEach(() => {
		home.cleanup();
	});

	it('is a no-op for a missing or blank session id', () => {
		expect(ingest(undefined, context, { config, now }).status).toBe('skipped');
		expect(ingest('   ', context, { config, now }).status).toBe('skipped');
		expect(existsSync(home.ledgerPath)).toBe(false);
	});

	it('reads a new session from the start and persists events and offset', () => {
		home.writeSession('project', 'session-a', [
			userLine('2025-09-11T10:59:00.000Z'),
			assistantLine({
				timestamp: '2025-09-11T11:00:00.000Z',
				messageId: 'msg_1',
				requestId: 'req_1',
				inputTokens: 1_000,
				outputTokens: 500,
			}),
		]);

		const outcome = ingest('session-a', context, { config, now });

		expect(outcome).toMatchObject({
			status: 'written',
			eventsAdded: 1,
			previousLineIndex: -1,
			lastLineIndex: 1,
			degraded: [],
		});
		const ledger = new LedgerStore(home.ledgerPath).load();
		expect(ledger.sessionOffsets).toEqual({ 'session-a': 1 });
		expect(ledger.events.map((event) => event.totalTokens)).toEqual([1_500]);
	});

	it('leaves the ledger untouched when re-run without new lines', () => {
		home.writeSession('project', 'session-a', [
			assistantLine({ timestamp: '2025-09-11T11:00:00.000Z', inputTokens: 100 }),
		]);
		ingest('session-a', context, { config, now });
		const before = readFileSync(home.ledgerPath, 'utf-8');
		const modifiedBefore = statSync(home.ledgerPath).mtimeMs;

		const outcome = ingest('session-a', context, { config, now });

		expect(outcome.status).toBe('unchanged');
		expect(readFileSync(home.ledgerPath, 'utf-8')).toBe(before);
		expect(statSync(home.ledgerPath).mtimeMs).toBe(modifiedBefore);
	});

	it('persists an advanced offset even when the new lines carry no usage', () => {
		home.writeSession('project', 'session-a', [
			assistantLine({ timestamp: '2025-09-11T11:00:00.000Z', inputTokens: 100 }),
		]);
		ingest('session-a', context, { config, now });
		home.appendSession('project', 'session-a', [userLine('2025-09-11T11:05:00.000Z'), '{broken']);

		const outcome = ingest('session-a', context, { config, now });

		expect(outcome.status).toBe('written');
		expect(outcome.eventsAdded).toBe(0);
		expect(new LedgerStore(home.ledgerPath).load().sessionOffsets['session-a']).toBe(2);
	});

	it('only reads lines appended since the previous run', () => {
		home.writeSession('project', 'session-a', [
			assistantLine({ timestamp: '2025-09-11T11:00:00.000Z', inputTokens: 100 }),
		]);
		ingest('session-a', context, { config, now });
		home.appendSession('project', 'session-a', [
			assistantLine({ timestamp: '2025-09-11T11:10:00.000Z', inputTokens: 200 }),
		]);

		const outcome = ingest('session-a', context, { config, now });

		expect(outcome.eventsAdded).toBe(1);
		expect(outcome.previousLineIndex).toBe(0);
		expect(outcome.lastLineIndex).toBe(1);
		const ledger = new LedgerStore(home.ledgerPath).load();
		expect(ledger.events.map((event) => event.totalTokens)).toEqual([100, 200]);
	});

	it('counts a line that was still being written on the previous run', () => {
		const line = assistantLine({
			timestamp: '2025-09-11T11:00:00.000Z',
			messageId: 'msg_1',
			requestId: 'req_1',
			inputTokens: 300,
		});
		home.writeSession('project', 'session-a', [userLine('2025-09-11T10:59:00.000Z')]);
		const filePath = path.join(home.projectsDir, 'project', 'session-a.jsonl');
		appendFileSync(filePath, line.slice(0, 20));

		const partial = ingest('session-a', context, { config, now });

		expect(partial).toMatchObject({ status: 'written', eventsAdded: 0, lastLineIndex: 0 });

		appendFileSync(filePath, `${line.slice(20)}\n`);
		const completed = ingest('session-a', context, { config, now });

		expect(completed).toMatchObject({
			status: 'written',
			eventsAdded: 1,
			previousLineIndex: 0,
			lastLineIndex: 1,
		});
		const ledger = new LedgerStore(home.ledgerPath).load();
		expect(ledger.events.map((event) => event.totalTokens)).toEqual([300]);
		expect(ledger.sessionOffsets).toEqual({ 'session-a': 1 });
	});

	it('never moves the offset backwards when the log shrinks', () => {
		home.writeSession('project', 'session-a', [
			userLine('2025-09-11T11:00:00.000Z'),
			userLine('2025-09-11T11:01:00.000Z'),
			userLine('2025-09-11T11:02:00.000Z'),
		]);
		ingest('session-a', context, { config, now });
		home.writeSession('project', 'session-a', [userLine('2025-09-11T11:03:00.000Z')]);

		const outcome = ingest('session-a', context, { config, now });

		expect(outcome.status).toBe('unchanged');
		expect(new LedgerStore(home.ledgerPath).load().sessionOffsets['session-a']).toBe(2);
	});

	it('prunes events older than twice the window on write', () => {
		home.writeSession('project', 'session-a', [
			assistantLine({ timestamp: '2025-09-11T01:59:59.000Z', inputTokens: 1 }),
			assistantLine({ timestamp: '2025-09-11T02:00:01.000Z', inputTokens: 2 }),
		]);

		const outcome = ingest('session-a', context, { config, now });

		expect(outcome.pruned).toBe(1);
		const ledger = new LedgerStore(home.ledgerPath).load();
		expect(ledger.events.map((event) => event.totalTokens)).toEqual([2]);
	});

	it('reports a missing session log without writing', () => {
		const outcome = ingest('ghost', context, { config, now });

		expect(outcome.status).toBe('unchanged');
		expect(outcome.degraded.map((entry) => entry.reason)).toEqual(['session-log-missing']);
		expect(existsSync(home.ledgerPath)).toBe(false);
	});

	it('recovers from a corrupt ledger by starting over', () => {
		mkdirSync(home.dashboardDir, { recursive: true });
		writeFileSync(home.ledgerPath, '{"events": [');
		home.writeSession('project', 'session-a', [
			assistantLine({ timestamp: '2025-09-11T11:00:00.000Z', inputTokens: 100 }),
		]);

		const outcome = ingest('session-a', context, { config, now });

		expect(outcome.status).toBe('written');
		expect(outcome.degraded.map((entry) => entry.reason)).toEqual(['ledger-corrupt']);
		expect(new LedgerStore(home.ledgerPath).load().events).toHaveLength(1);
	});

	it('reads the window and pricing from the config file when none is passed', () => {
		mkdirSync(home.dashboardDir, { recursive: true });
		writeFileSync(
			home.configPath,
			JSON.stringify({ windowHours: 1, pricing: { sonnet: { input: 10 } } }),
		);
		home.writeSession('project', 'session-a', [
			assistantLine({ timestamp: '2025-09-11T09:00:00.000Z', inputTokens: 1_000_000 }),
			assistantLine({ timestamp: '2025-09-11T11:30:00.000Z', inputTokens: 1_000_000 }),
		]);

		const outcome = ingest('session-a', context, { now });

		// horizon = 2 x 1h, so the 09:00 event is dropped
		expect(outcome.pruned).toBe(1);
		const ledger = new LedgerStore(home.ledgerPath).load();
		expect(ledger.events.map((event) => event.costUSD)).toEqual([10]);
	});

	it('reports a failed write without throwing', () => {
		mkdirSync(home.ledgerPath, { recursive: true });
		home.writeSession('project', 'session-a', [
			assistantLine({ timestamp: '2025-09-11T11:00:00.000Z', inputTokens: 100 }),
		]);

		const outcome = ingest('session-a', context, { config, now });

		expect(outcome.status).toBe('write-failed');
		expect(outcome.degraded.map((entry) => entry.reason)).toContain('ledger-write-failed');
	});
});
