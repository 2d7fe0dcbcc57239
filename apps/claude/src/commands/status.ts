import type { Severity, WindowConfig, WindowSnapshot } from '../_types.ts';
import { define } from 'gunshi';
import pc from 'picocolors';
import { sharedArgs } from '../_shared-args.ts';
import { loadWindowConfig, PLAN_PRESETS } from '../config.ts';
import {
	formatCountdown,
	formatCurrency,
	formatNumber,
	formatPercent,
	formatTokens,
	makeProgressBar,
} from '../formatting.ts';
import { LedgerStore } from '../ledger-store.ts';
import { log, logger } from '../logger.ts';
import { createLedgerContext } from '../paths.ts';
import { computeWindowSnapshot } from '../window.ts';

function paintFor(severity: Severity): (text: string) => string {
	switch (severity) {
		case 'critical':
			return pc.red;
		case 'warning':
			return pc.yellow;
		case 'normal':
			return pc.green;
	}
}

function renderSummaryLine(snapshot: WindowSnapshot): string {
	const paint = paintFor(snapshot.severity);
	const usage = `${formatTokens(snapshot.tokensUsed)}/${formatTokens(snapshot.tokenLimit)}`;
	const countdown =
		snapshot.rechargeSeconds > 0 ? ` · ⏱ ${formatCountdown(snapshot.rechargeSeconds, true)}` : '';
	return `${paint('⚡')} ${usage}${countdown}`;
}

function renderDetails(snapshot: WindowSnapshot, config: WindowConfig): void {
	const paint = paintFor(snapshot.severity);
	const highest = Math.max(snapshot.pctTokens, snapshot.pctCost, snapshot.pctMessages);

	logger.box(
		`Claude Usage Window - ${PLAN_PRESETS[config.plan].name} (${config.windowHours}h rolling)`,
	);

	log(`${paint(makeProgressBar(highest))} ${paint(formatPercent(highest))}`);
	log('');
	const tokenNote = snapshot.tokenLimitSource === 'default' ? pc.dim(' (default rate)') : '';
	log(
		`Tokens:    ${formatNumber(snapshot.tokensUsed)} / ${formatNumber(snapshot.tokenLimit)} (${formatPercent(snapshot.pctTokens)})${tokenNote}`,
	);
	log(
		`Cost:      ${formatCurrency(snapshot.costUsed)} / ${formatCurrency(snapshot.costLimit)} (${formatPercent(snapshot.pctCost)})`,
	);
	log(
		`Messages:  ${formatNumber(snapshot.messagesUsed)} / ${formatNumber(snapshot.messageLimit)} (${formatPercent(snapshot.pctMessages)})`,
	);
	log('');

	if (snapshot.rechargeSeconds > 0) {
		log(
			pc.cyan(
				`Next +${formatTokens(snapshot.rechargeTokens)} (${formatCurrency(snapshot.rechargeCost)}) in ${formatCountdown(snapshot.rechargeSeconds)}`,
			),
		);
	} else {
		log(pc.green('No active usage - fully recharged'));
	}
	if (snapshot.fullClearSeconds > 0) {
		log(pc.dim(`Full recharge in ${formatCountdown(snapshot.fullClearSeconds)}`));
	}
}

export const statusCommand = define({
	name: 'status',
	description: 'Show usage in the current rolling window',
	args: {
		...sharedArgs,
		compact: {
			type: 'boolean',
			short: 'c',
			description: 'Print a single summary line',
			default: false,
		},
	},
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

		const store = new LedgerStore(context.ledgerPath);
		const ledger = store.load();
		const snapshot = computeWindowSnapshot(ledger, new Date(), config);

		if (jsonOutput) {
			log(JSON.stringify({ plan: config.plan, snapshot }, null, 2));
			return;
		}

		if (ctx.values.compact) {
			log(renderSummaryLine(snapshot));
			return;
		}

		renderDetails(snapshot, config);
	},
});
