import { define } from 'gunshi';
import { sharedArgs } from '../_shared-args.ts';
import { loadWindowConfig, PLAN_PRESETS } from '../config.ts';
import { formatCurrency, formatNumber } from '../formatting.ts';
import { log, logger } from '../logger.ts';
import { createLedgerContext } from '../paths.ts';
import { TieredPricingSource } from '../pricing.ts';

export const configCommand = define({
	name: 'config',
	description: 'Show the resolved window configuration and storage paths',
	args: sharedArgs,
	run(ctx) {
		const jsonOutput = Boolean(ctx.values.json);
		if (jsonOutput) {
			logger.level = 0;
		}

		const context = createLedgerContext();
		const { config, degraded } = loadWindowConfig(context.configPath);
		if (degraded != null && degraded.reason !== 'config-missing') {
			logger.warn(`Ignoring ${context.configPath} (${degraded.message}); using the pro preset`);
		}

		const pricingSource = new TieredPricingSource(config.pricingOverrides);
		const pricing = {
			opus: pricingSource.getPricing('opus'),
			sonnet: pricingSource.getPricing('sonnet'),
			haiku: pricingSource.getPricing('haiku'),
		};

		if (jsonOutput) {
			log(JSON.stringify({ config, pricing, context }, null, 2));
			return;
		}

		log(`Plan:          ${PLAN_PRESETS[config.plan].name}`);
		log(`Window:        ${config.windowHours}h`);
		log(`Cost limit:    ${formatCurrency(config.costLimit)}`);
		log(`Message limit: ${formatNumber(config.messageLimit)}`);
		log('');
		for (const [tier, rates] of Object.entries(pricing)) {
			log(
				`${tier.padEnd(7)} in ${rates.inputCostPerMToken} / out ${rates.outputCostPerMToken} / cache write ${rates.cacheCreationCostPerMToken} / cache read ${rates.cacheReadCostPerMToken} per MTok`,
			);
		}
		log('');
		log(`Ledger:        ${context.ledgerPath}`);
		log(`Config:        ${context.configPath}`);
		for (const projectsDir of context.projectsDirs) {
			log(`Sessions:      ${projectsDir}`);
		}
	},
});
