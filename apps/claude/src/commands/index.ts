import process from 'node:process';
import { cli } from 'gunshi';
import { description, version } from '../../package.json';
import { configCommand } from './config.ts';
import { resetCommand } from './reset.ts';
import { scanCommand } from './scan.ts';
import { statusCommand } from './status.ts';
import { trackCommand } from './track.ts';

const PROGRAM_NAME = 'usage-window';

const subCommandUnion = [
	['status', statusCommand],
	['track', trackCommand],
	['scan', scanCommand],
	['reset', resetCommand],
	['config', configCommand],
] as const;

const subCommands = new Map<
	(typeof subCommandUnion)[number][0],
	(typeof subCommandUnion)[number][1]
>(subCommandUnion);

const mainCommand = statusCommand;

export async function run(): Promise<void> {
	await cli(process.argv.slice(2), mainCommand, {
		name: PROGRAM_NAME,
		version,
		description,
		subCommands,
		renderHeader: null,
	});
}
