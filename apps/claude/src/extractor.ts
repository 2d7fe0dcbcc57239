import type { Degraded, PricingSource, UsageEvent } from './_types.ts';
import type { SessionLogDegradedReason, UsageRecord } from './session-log.ts';
import { Result } from '@praha/byethrow';
import { logger } from './logger.ts';
import { calculateCostUSD } from './pricing.ts';
import { findSessionFile, parseUsageLine, readSessionLines } from './session-log.ts';

export type ExtractOptions = {
	projectsDirs: readonly string[];
	pricingSource: PricingSource;
	/**
	 * Composite keys already seen. A backfill passes one set across every session it scans.
	 */
	seenKeys?: Set<string>;
	/**
	 * Skip the lookup under the projects directories and read this file.
	 */
	filePath?: string;
};

export type ExtractionResult = {
	events: UsageEvent[];
	lastLineIndex: number;
	linesRead: number;
	skippedLines: number;
	duplicates: number;
	degraded: Degraded<SessionLogDegradedReason> | null;
};

export function createUsageEvent(record: UsageRecord, pricingSource: PricingSource): UsageEvent {
	const totalTokens =
		record.inputTokens + record.outputTokens + record.cacheCreationTokens + record.cacheReadTokens;
	return {
		timestamp: record.timestamp,
		inputTokens: record.inputTokens,
		outputTokens: record.outputTokens,
		cacheCreationTokens: record.cacheCreationTokens,
		cacheReadTokens: record.cacheReadTokens,
		totalTokens,
		model: record.model,
		costUSD: calculateCostUSD(record, pricingSource.getPricing(record.model)),
	};
}

/**
 * Extracts priced events from the lines after `lastLineIndex`.
 * Earlier lines are never parsed; a malformed line is counted and skipped.
 */
export function extractEventsFromLines(
	lines: readonly string[],
	lastLineIndex: number,
	pricingSource: PricingSource,
	seenKeys: Set<string> = new Set(),
): ExtractionResult {
	const result: ExtractionResult = {
		events: [],
		lastLineIndex,
		linesRead: 0,
		skippedLines: 0,
		duplicates: 0,
		degraded: null,
	};

	const start = Math.max(lastLineIndex + 1, 0);
	for (const [offset, line] of lines.slice(start).entries()) {
		result.lastLineIndex = start + offset;
		result.linesRead += 1;

		const parsed = parseUsageLine(line);
		if (Result.isFailure(parsed)) {
			result.skippedLines += 1;
			continue;
		}

		const record = parsed.value;
		if (record == null) {
			continue;
		}

		if (record.dedupKey != null) {
			if (seenKeys.has(record.dedupKey)) {
				result.duplicates += 1;
				continue;
			}
			seenKeys.add(record.dedupKey);
		}

		const event = createUsageEvent(record, pricingSource);
		if (event.totalTokens === 0) {
			continue;
		}
		result.events.push(event);
	}

	return result;
}

/**
 * Reads the new tail of one session log.
 * A missing or unreadable log is a normal race with the writer: no events, offset unchanged.
 */
export function extractNewEvents(
	sessionId: string,
	lastLineIndex: number,
	options: ExtractOptions,
): ExtractionResult {
	const located =
		options.filePath != null
			? Result.succeed(options.filePath)
			: findSessionFile(sessionId, options.projectsDirs);
	if (Result.isFailure(located)) {
		logger.debug(located.error.message);
		return emptyExtraction(lastLineIndex, located.error);
	}

	const lines = readSessionLines(located.value);
	if (Result.isFailure(lines)) {
		logger.debug(`Could not read ${located.value}: ${lines.error.message}`);
		return emptyExtraction(lastLineIndex, lines.error);
	}

	const extraction = extractEventsFromLines(
		lines.value,
		lastLineIndex,
		options.pricingSource,
		options.seenKeys,
	);
	if (extraction.skippedLines > 0) {
		logger.debug(`Skipped ${extraction.skippedLines} malformed line(s) in ${located.value}`);
	}
	return extraction;
}

function emptyExtraction(
	lastLineIndex: number,
	degraded: Degraded<SessionLogDegradedReason>,
): ExtractionResult {
	return {
		events: [],
		lastLineIndex,
		linesRead: 0,
		skippedLines: 0,
		duplicates: 0,
		degraded,
	};
}
