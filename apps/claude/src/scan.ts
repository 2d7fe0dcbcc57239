import type { Degraded, PricingSource, TokenLedger } from './_types.ts';
import type { LedgerContext } from './paths.ts';
import { extractNewEvents } from './extractor.ts';
import { createEmptyLedger, pruneEvents } from './ledger-store.ts';
import { logger } from './logger.ts';
import { TieredPricingSource } from './pricing.ts';
import { listSessionFiles } from './session-log.ts';

export type ScanOptions = {
	pricingSource?: PricingSource;
	now?: Date;
};

export type ScanReport = {
	ledger: TokenLedger;
	sessions: number;
	linesRead: number;
	skippedLines: number;
	duplicates: number;
	pruned: number;
	degraded: Degraded[];
};

/**
 * Cold-start population: reads every line of every known session with one dedup set
 * across all of them, records each session's last line and prunes at the ledger horizon.
 */
export function scanSessions(
	windowHours: number,
	context: LedgerContext,
	options: ScanOptions = {},
): ScanReport {
	const pricingSource = options.pricingSource ?? new TieredPricingSource();
	const seenKeys = new Set<string>();
	const ledger = createEmptyLedger();
	const report: ScanReport = {
		ledger,
		sessions: 0,
		linesRead: 0,
		skippedLines: 0,
		duplicates: 0,
		pruned: 0,
		degraded: [],
	};

	for (const { sessionId, filePath } of listSessionFiles(context.projectsDirs)) {
		const extraction = extractNewEvents(sessionId, -1, {
			projectsDirs: context.projectsDirs,
			pricingSource,
			seenKeys,
			filePath,
		});
		if (extraction.degraded != null) {
			report.degraded.push(extraction.degraded);
			continue;
		}

		report.sessions += 1;
		report.linesRead += extraction.linesRead;
		report.skippedLines += extraction.skippedLines;
		report.duplicates += extraction.duplicates;
		ledger.events.push(...extraction.events);
		ledger.sessionOffsets[sessionId] = extraction.lastLineIndex;
	}

	const before = ledger.events.length;
	ledger.events = pruneEvents(ledger.events, windowHours, options.now ?? new Date());
	report.pruned = before - ledger.events.length;

	logger.debug(
		`Scanned ${report.sessions} session(s): ${ledger.events.length} event(s) kept, ${report.duplicates} duplicate(s)`,
	);
	return report;
}

export function scanAllSessions(
	windowHours: number,
	context: LedgerContext,
	options: ScanOptions = {},
): TokenLedger {
	return scanSessions(windowHours, context, options).ledger;
}
