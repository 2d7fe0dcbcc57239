export type * from './_types.ts';
export {
	loadWindowConfig,
	parseWindowConfig,
	PLAN_PRESETS,
	resolvePlan,
	resolveWindowConfig,
} from './config.ts';
export type { ConfigDegradedReason, LoadedConfig } from './config.ts';
export { createUsageEvent, extractEventsFromLines, extractNewEvents } from './extractor.ts';
export type { ExtractionResult, ExtractOptions } from './extractor.ts';
export { parseHookInput, readHookInput, readHookSessionId } from './hook-input.ts';
export { ingest } from './ingest.ts';
export type { IngestOptions, IngestOutcome, IngestStatus } from './ingest.ts';
export { createEmptyLedger, LedgerStore, parseLedgerFile, pruneEvents } from './ledger-store.ts';
export type { LedgerDegradedReason, LedgerLoadResult, LedgerWriteFailure } from './ledger-store.ts';
export { createLedgerContext, getClaudeDirs } from './paths.ts';
export type { LedgerContext } from './paths.ts';
export {
	calculateCostUSD,
	classifyModel,
	DEFAULT_TIER_RATES,
	TieredPricingSource,
} from './pricing.ts';
export { scanAllSessions, scanSessions } from './scan.ts';
export type { ScanOptions, ScanReport } from './scan.ts';
export {
	computeWindowSnapshot,
	deriveTokenLimit,
	selectActiveEvents,
	severityFor,
} from './window.ts';
export type { WindowLimits } from './window.ts';
