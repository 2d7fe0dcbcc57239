import { define } from 'gunshi';
import { readHookSessionId } from '../hook-input.ts';
import { ingest } from '../ingest.ts';
import { logger } from '../logger.ts';
import { createLedgerContext } from '../paths.ts';

export const trackCommand = define({
	name: 'track',
	description: 'Record new usage for one session (run as a Claude Code Stop hook)',
	args: {
		session: {
			type: 'string',
			short: 's',
			description: 'Session id; read from the hook payload on stdin when omitted',
		},
	},
	async run(ctx) {
		// The hook runs unattended on every turn: every outcome exits 0.
		const sessionId = ctx.values.session ?? (await readHookSessionId());
		const outcome = ingest(sessionId, createLedgerContext());

		for (const degraded of outcome.degraded) {
			logger.debug(`${degraded.reason}: ${degraded.message}`);
		}
		logger.debug(
			`track ${outcome.sessionId || '(none)'}: ${outcome.status}, +${outcome.eventsAdded} event(s), line ${outcome.lastLineIndex}`,
		);
	},
});
