import type { Degraded, PricingSource, WindowConfig } from './_types.ts';
import type { LedgerContext } from './paths.ts';
import { Result } from '@praha/byethrow';
import { loadWindowConfig } from './config.ts';
import { extractNewEvents } from './extractor.ts';
import { LedgerStore } from './ledger-store.ts';
import { logger } from './logger.ts';
import { TieredPricingSource } from './pricing.ts';

export type IngestOptions = {
	config?: WindowConfig;
	pricingSource?: PricingSource;
	now?: Date;
};

export type IngestStatus = 'skipped' | 'unchanged' | 'written' | 'write-failed';

export type IngestOutcome = {
	status: IngestStatus;
	sessionId: string;
	eventsAdded: number;
	pruned: number;
	previousLineIndex: number;
	lastLineIndex: number;
	degraded: Degraded[];
};

/**
 * One unit of work per assistant turn: read the session's new lines and persist them.
 * The ledger is rewritten only when events were produced or the offset advanced. Never throws.
 */
export function ingest(
	sessionId: string | null | undefined,
	context: LedgerContext,
	options: IngestOptions = {},
): IngestOutcome {
	const id = sessionId?.trim() ?? '';
	if (id === '') {
		return {
			status: 'skipped',
			sessionId: id,
			eventsAdded: 0,
			pruned: 0,
			previousLineIndex: -1,
			lastLineIndex: -1,
			degraded: [],
		};
	}

	const degraded: Degraded[] = [];
	let config = options.config;
	if (config == null) {
		const loaded = loadWindowConfig(context.configPath);
		if (loaded.degraded != null && loaded.degraded.reason !== 'config-missing') {
			degraded.push(loaded.degraded);
		}
		config = loaded.config;
	}

	const store = new LedgerStore(context.ledgerPath);
	store.load();
	const ledgerDegraded = store.loadResult()?.degraded;
	if (ledgerDegraded != null && ledgerDegraded.reason !== 'ledger-missing') {
		degraded.push(ledgerDegraded);
	}

	const previousLineIndex = store.offsetFor(id);
	const extraction = extractNewEvents(id, previousLineIndex, {
		projectsDirs: context.projectsDirs,
		pricingSource: options.pricingSource ?? new TieredPricingSource(config.pricingOverrides),
	});
	if (extraction.degraded != null) {
		degraded.push(extraction.degraded);
	}

	const outcome: IngestOutcome = {
		status: 'unchanged',
		sessionId: id,
		eventsAdded: extraction.events.length,
		pruned: 0,
		previousLineIndex,
		lastLineIndex: Math.max(previousLineIndex, extraction.lastLineIndex),
		degraded,
	};

	if (extraction.events.length === 0 && extraction.lastLineIndex <= previousLineIndex) {
		return outcome;
	}

	store.append(id, extraction.events, extraction.lastLineIndex);
	outcome.pruned = store.prune(config.windowHours, options.now ?? new Date());

	const saved = store.save();
	if (Result.isFailure(saved)) {
		logger.debug(`Could not write ${context.ledgerPath}: ${saved.error.message}`);
		degraded.push(saved.error);
		outcome.status = 'write-failed';
		return outcome;
	}

	outcome.status = 'written';
	return outcome;
}
