import process from 'node:process';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import { sharedArgs } from '../_shared-args.ts';
import { loadWindowConfig } from '../config.ts';
import { formatNumber } from '../formatting.ts';
import { LedgerStore } from '../ledger-store.ts';
import { log, logger } from '../logger.ts';
import { createLedgerContext } from '../paths.ts';
import { TieredPricingSource } from '../pricing.ts';
import { scanSessions } from '../scan.ts';

export const scanCommand = define({
	name: 'scan',
	description: 'Rebuild the ledger from every Claude Code session log',
	args: sharedArgs,
	run(ctx) {
		const jsonOutput = Boolean(ctx.values.json);
		if (jsonOutput) {
			logger.level = 0;
		}

		const context = createLedgerContext();
		const { config } = loadWindowConfig(context.configPath);

		logger.info(`Scanning sessions (last ${config.windowHours * 2}h)...`);
		const report = scanSessions(config.windowHours, context, {
			pricingSource: new TieredPricingSource(config.pricingOverrides),
		});

		const saved = new LedgerStore(context.ledgerPath).save(report.ledger);
		if (Result.isFailure(saved)) {
			logger.error(`Could not write ${context.ledgerPath}: ${saved.error.message}`);
			process.exitCode = 1;
			return;
		}

		const totalTokens = report.ledger.events.reduce((sum, event) => sum + event.totalTokens, 0);
		if (jsonOutput) {
			log(
				JSON.stringify(
					{
						sessions: report.sessions,
						events: report.ledger.events.length,
						totalTokens,
						duplicates: report.duplicates,
						skippedLines: report.skippedLines,
						ledgerPath: saved.value,
					},
					null,
					2,
				),
			);
			return;
		}

		log(
			`Found ${formatNumber(report.ledger.events.length)} interactions, ${formatNumber(totalTokens)} tokens across ${report.sessions} session(s)`,
		);
		if (report.duplicates > 0 || report.skippedLines > 0) {
			logger.info(
				`Skipped ${report.duplicates} duplicate record(s) and ${report.skippedLines} malformed line(s)`,
			);
		}
	},
});
