import type { Degraded, SessionOffsets, TokenLedger, UsageEvent } from './_types.ts';
import { mkdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { Result } from '@praha/byethrow';
import writeFileAtomic from 'write-file-atomic';
import { z } from 'zod';
import { MS_PER_HOUR, PRUNE_WINDOW_MULTIPLIER } from './_consts.ts';
import { logger } from './logger.ts';

export type LedgerDegradedReason = 'ledger-missing' | 'ledger-unreadable' | 'ledger-corrupt';

export type LedgerWriteFailure = Degraded<'ledger-write-failed'>;

export type LedgerReadSuccess = {
	ledger: TokenLedger;
	droppedEvents: number;
	droppedOffsets: number;
};

export type LedgerLoadResult = LedgerReadSuccess & {
	degraded: Degraded<LedgerDegradedReason> | null;
};

const tokenCountSchema = z.number().int().nonnegative();

export const usageEventSchema = z.object({
	timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
		message: 'timestamp is not a valid date',
	}),
	inputTokens: tokenCountSchema,
	outputTokens: tokenCountSchema,
	cacheCreationTokens: tokenCountSchema,
	cacheReadTokens: tokenCountSchema,
	totalTokens: z.number().int().positive(),
	model: z.string().default(''),
	costUSD: z.number().nonnegative(),
});

const ledgerFileSchema = z.object({
	events: z.array(z.unknown()).default([]),
	session_offsets: z.record(z.unknown()).default({}),
});

const offsetSchema = z.number().int().min(-1);

type LedgerFile = {
	events: UsageEvent[];
	session_offsets: SessionOffsets;
};

export function createEmptyLedger(): TokenLedger {
	return { events: [], sessionOffsets: {} };
}

function toLedgerFile(ledger: TokenLedger): LedgerFile {
	return { events: ledger.events, session_offsets: ledger.sessionOffsets };
}

/**
 * Validates a parsed ledger file. Stored events and offsets that fail validation are dropped
 * one by one; only a structurally wrong document fails as a whole.
 */
export function parseLedgerFile(value: unknown): Result.Result<LedgerReadSuccess, string> {
	const parsed = ledgerFileSchema.safeParse(value);
	if (!parsed.success) {
		return Result.fail(parsed.error.issues.map((issue) => issue.message).join('; '));
	}

	const ledger = createEmptyLedger();
	let droppedEvents = 0;
	for (const candidate of parsed.data.events) {
		const event = usageEventSchema.safeParse(candidate);
		if (event.success) {
			ledger.events.push(event.data);
		} else {
			droppedEvents += 1;
		}
	}

	let droppedOffsets = 0;
	for (const [sessionId, candidate] of Object.entries(parsed.data.session_offsets)) {
		const offset = offsetSchema.safeParse(candidate);
		if (offset.success) {
			ledger.sessionOffsets[sessionId] = offset.data;
		} else {
			droppedOffsets += 1;
		}
	}

	return Result.succeed({ ledger, droppedEvents, droppedOffsets });
}

/**
 * Reads the ledger file. Every failure is a degraded read, never an exception:
 * the display path reads far more often than the hook writes and may race a rename.
 */
export function readLedgerFile(
	ledgerPath: string,
): Result.Result<LedgerReadSuccess, Degraded<LedgerDegradedReason>> {
	let content: string;
	try {
		content = readFileSync(ledgerPath, 'utf-8');
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return Result.fail({ reason: 'ledger-missing', message: `No ledger at ${ledgerPath}` });
		}
		return Result.fail({
			reason: 'ledger-unreadable',
			message: error instanceof Error ? error.message : String(error),
		});
	}

	let json: unknown;
	try {
		json = JSON.parse(content);
	} catch (error) {
		return Result.fail({
			reason: 'ledger-corrupt',
			message: error instanceof Error ? error.message : String(error),
		});
	}

	const parsed = parseLedgerFile(json);
	if (Result.isFailure(parsed)) {
		return Result.fail({ reason: 'ledger-corrupt', message: parsed.error });
	}
	return parsed;
}

function pruneCutoff(windowHours: number, now: Date): number {
	return now.getTime() - PRUNE_WINDOW_MULTIPLIER * Math.max(windowHours, 0) * MS_PER_HOUR;
}

/**
 * Keeps events strictly newer than `now - 2 * windowHours`.
 */
export function pruneEvents(events: UsageEvent[], windowHours: number, now: Date): UsageEvent[] {
	const cutoff = pruneCutoff(windowHours, now);
	return events.filter((event) => Date.parse(event.timestamp) > cutoff);
}

export class LedgerStore {
	private ledger: TokenLedger = createEmptyLedger();
	private lastLoad: LedgerLoadResult | null = null;

	constructor(readonly ledgerPath: string) {}

	/**
	 * Loads the ledger, falling back to an empty one when the file is missing or does not parse.
	 */
	load(): TokenLedger {
		const result = readLedgerFile(this.ledgerPath);
		if (Result.isFailure(result)) {
			logger.debug(`Using an empty ledger (${result.error.reason}): ${result.error.message}`);
			this.ledger = createEmptyLedger();
			this.lastLoad = {
				ledger: this.ledger,
				droppedEvents: 0,
				droppedOffsets: 0,
				degraded: result.error,
			};
			return this.ledger;
		}

		const { ledger, droppedEvents, droppedOffsets } = result.value;
		if (droppedEvents > 0 || droppedOffsets > 0) {
			logger.debug(
				`Dropped ${droppedEvents} invalid event(s) and ${droppedOffsets} invalid offset(s) from ${this.ledgerPath}`,
			);
		}
		this.ledger = ledger;
		this.lastLoad = { ...result.value, degraded: null };
		return this.ledger;
	}

	loadResult(): LedgerLoadResult | null {
		return this.lastLoad;
	}

	snapshot(): TokenLedger {
		return this.ledger;
	}

	offsetFor(sessionId: string): number {
		return this.ledger.sessionOffsets[sessionId] ?? -1;
	}

	/**
	 * Records the session offset even when `events` is empty. Offsets never move backwards.
	 */
	append(sessionId: string, events: readonly UsageEvent[], lastLineIndex: number): void {
		this.ledger.sessionOffsets[sessionId] = Math.max(this.offsetFor(sessionId), lastLineIndex);
		this.ledger.events.push(...events);
	}

	/**
	 * Removes events at or before `now - 2 * windowHours` and returns how many were removed.
	 * Session offsets are kept.
	 */
	prune(windowHours: number, now: Date = new Date()): number {
		const before = this.ledger.events.length;
		this.ledger.events = pruneEvents(this.ledger.events, windowHours, now);
		return before - this.ledger.events.length;
	}

	/**
	 * Clears counted usage while keeping offsets, so lines already read are not counted again.
	 */
	reset(): void {
		this.ledger = { events: [], sessionOffsets: { ...this.ledger.sessionOffsets } };
	}

	/**
	 * Replaces the backing file in one rename. A crash mid-write leaves the previous file intact.
	 */
	save(ledger: TokenLedger = this.ledger): Result.Result<string, LedgerWriteFailure> {
		try {
			mkdirSync(path.dirname(this.ledgerPath), { recursive: true });
			writeFileAtomic.sync(this.ledgerPath, `${JSON.stringify(toLedgerFile(ledger), null, 2)}\n`);
		} catch (error) {
			return Result.fail({
				reason: 'ledger-write-failed',
				message: error instanceof Error ? error.message : String(error),
			});
		}
		this.ledger = ledger;
		return Result.succeed(this.ledgerPath);
	}
}
