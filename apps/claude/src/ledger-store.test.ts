import type { UsageEvent } from './_types.ts';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Result } from '@praha/byethrow';
import { LedgerStore, parseLedgerFile, pruneEvents } from './ledger-store.ts';

function usageEvent(timestamp: string, totalTokens = 100): UsageEvent {
	return {
		timestamp,
		inputTokens: totalTokens,
		outputTokens: 0,
		cacheCreationTokens: 0,
		cacheReadTokens: 0,
		totalTokens,
		model: 'claude-sonnet-4',
		costUSD: 0.0003,
	};
}

describe('LedgerStore', () => {
	let dir: string;
	let ledgerPath: string;

	beforeEach(() => {
		dir = mkdtempSync(path.join(tmpdir(), 'usage-window-ledger-'));
		ledgerPath = path.join(dir, 'dashboard', 'usage.json');
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it('loads an empty ledger when the file is missing', () => {
		const store = new LedgerStore(ledgerPath);

		expect(store.load()).toEqual({ events: [], sessionOffsets: {} });
		expect(store.loadResult()?.degraded?.reason).toBe('ledger-missing');
	});

	it('loads an empty ledger from a half-written file', () => {
		mkdirSync(path.dirname(ledgerPath), { recursive: true });
		writeFileSync(ledgerPath, '{"events": [{"timestamp": "2025-09-11T03:00:00.000Z"');
		const store = new LedgerStore(ledgerPath);

		expect(store.load()).toEqual({ events: [], sessionOffsets: {} });
		expect(store.loadResult()?.degraded?.reason).toBe('ledger-corrupt');
	});

	it('treats a document of the wrong shape as corrupt', () => {
		mkdirSync(path.dirname(ledgerPath), { recursive: true });
		writeFileSync(ledgerPath, '[1, 2, 3]');
		const store = new LedgerStore(ledgerPath);

		expect(store.load().events).toEqual([]);
		expect(store.loadResult()?.degraded?.reason).toBe('ledger-corrupt');
	});

	it('persists events and offsets under the documented keys', () => {
		const store = new LedgerStore(ledgerPath);
		store.load();
		store.append('session-a', [usageEvent('2025-09-11T03:00:00.000Z')], 4);

		const saved = store.save();

		expect(Result.isSuccess(saved)).toBe(true);
		const onDisk: unknown = JSON.parse(readFileSync(ledgerPath, 'utf-8'));
		expect(onDisk).toEqual({
			events: [usageEvent('2025-09-11T03:00:00.000Z')],
			session_offsets: { 'session-a': 4 },
		});

		const reloaded = new LedgerStore(ledgerPath);
		expect(reloaded.load()).toEqual({
			events: [usageEvent('2025-09-11T03:00:00.000Z')],
			sessionOffsets: { 'session-a': 4 },
		});
		expect(reloaded.loadResult()?.degraded).toBeNull();
	});

	it('records the offset even when no events were produced', () => {
		const store = new LedgerStore(ledgerPath);
		store.append('session-a', [], 9);

		expect(store.offsetFor('session-a')).toBe(9);
		expect(store.offsetFor('session-b')).toBe(-1);
	});

	it('never moves an offset backwards', () => {
		const store = new LedgerStore(ledgerPath);
		store.append('session-a', [], 9);
		store.append('session-a', [], 3);

		expect(store.offsetFor('session-a')).toBe(9);
	});

	it('prunes at twice the window and keeps offsets', () => {
		const now = new Date('2025-09-11T12:00:00.000Z');
		const store = new LedgerStore(ledgerPath);
		// cutoff = now - 10h = 02:00:00
		store.append(
			'session-a',
			[
				usageEvent('2025-09-11T01:59:59.000Z'),
				usageEvent('2025-09-11T02:00:00.000Z'),
				usageEvent('2025-09-11T02:00:01.000Z'),
			],
			2,
		);

		const removed = store.prune(5, now);

		expect(removed).toBe(2);
		expect(store.snapshot().events.map((event) => event.timestamp)).toEqual([
			'2025-09-11T02:00:01.000Z',
		]);
		expect(store.offsetFor('session-a')).toBe(2);
	});

	it('resets counted usage but keeps offsets', () => {
		const store = new LedgerStore(ledgerPath);
		store.append('session-a', [usageEvent('2025-09-11T03:00:00.000Z')], 5);

		store.reset();

		expect(store.snapshot()).toEqual({ events: [], sessionOffsets: { 'session-a': 5 } });
	});

	it('reports a failed write instead of throwing', () => {
		mkdirSync(ledgerPath, { recursive: true });
		const store = new LedgerStore(ledgerPath);

		const saved = store.save();

		expect(Result.isFailure(saved)).toBe(true);
		if (Result.isFailure(saved)) {
			expect(saved.error.reason).toBe('ledger-write-failed');
		}
	});
});

describe('parseLedgerFile', () => {
	it('drops invalid stored events and offsets individually', () => {
		const result = parseLedgerFile({
			events: [
				usageEvent('2025-09-11T03:00:00.000Z'),
				{ ...usageEvent('2025-09-11T03:00:00.000Z'), totalTokens: 0 },
				{ ...usageEvent('not a date') },
				'junk',
			],
			session_offsets: { good: 3, bad: 'three', negative: -5 },
		});

		expect(Result.isSuccess(result)).toBe(true);
		if (Result.isSuccess(result)) {
			expect(result.value.ledger.events).toHaveLength(1);
			expect(result.value.ledger.sessionOffsets).toEqual({ good: 3 });
			expect(result.value.droppedEvents).toBe(3);
			expect(result.value.droppedOffsets).toBe(2);
		}
	});

	it('defaults missing sections to empty', () => {
		const result = parseLedgerFile({});

		expect(Result.isSuccess(result) && result.value.ledger).toEqual({
			events: [],
			sessionOffsets: {},
		});
	});
});

describe('pruneEvents', () => {
	it('treats a non-positive window as a zero-length horizon', () => {
		const now = new Date('2025-09-11T12:00:00.000Z');
		const events = [usageEvent('2025-09-11T11:59:59.000Z'), usageEvent('2025-09-11T12:00:01.000Z')];

		expect(pruneEvents(events, -3, now).map((event) => event.timestamp)).toEqual([
			'2025-09-11T12:00:01.000Z',
		]);
	});
});
