import process from 'node:process';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import { LedgerStore } from '../ledger-store.ts';
import { logger } from '../logger.ts';
import { createLedgerContext } from '../paths.ts';

export const resetCommand = define({
	name: 'reset',
	description: 'Clear counted usage; lines already read are not counted again',
	run() {
		const context = createLedgerContext();
		const store = new LedgerStore(context.ledgerPath);
		store.load();
		store.reset();

		const saved = store.save();
		if (Result.isFailure(saved)) {
			logger.error(`Could not write ${context.ledgerPath}: ${saved.error.message}`);
			process.exitCode = 1;
			return;
		}
		logger.success('Usage counter reset');
	},
});
