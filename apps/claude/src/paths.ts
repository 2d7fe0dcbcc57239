import { homedir } from 'node:os';
import path from 'node:path';
import process from 'node:process';
import {
	CLAUDE_CONFIG_DIR_ENV,
	CLAUDE_PROJECTS_DIR_NAME,
	CONFIG_FILE_NAME,
	DASHBOARD_DIR_NAME,
	LEDGER_FILE_NAME,
	USAGE_WINDOW_DIR_ENV,
} from './_consts.ts';

/**
 * Storage locations for one run, resolved once at startup and passed down.
 */
export type LedgerContext = {
	dashboardDir: string;
	ledgerPath: string;
	configPath: string;
	projectsDirs: string[];
};

export type LedgerContextOptions = {
	env?: NodeJS.ProcessEnv;
	home?: string;
	dashboardDir?: string;
	claudeDirs?: string[];
};

/**
 * Claude data directories: `CLAUDE_CONFIG_DIR` (comma separated) or the two default locations.
 */
export function getClaudeDirs(env: NodeJS.ProcessEnv = process.env, home = homedir()): string[] {
	const configured = env[CLAUDE_CONFIG_DIR_ENV]?.trim();
	if (configured != null && configured !== '') {
		return configured
			.split(',')
			.map((dir) => dir.trim())
			.filter((dir) => dir !== '')
			.map((dir) => path.resolve(dir));
	}
	return [path.join(home, '.claude'), path.join(home, '.config', 'claude')];
}

export function createLedgerContext(options: LedgerContextOptions = {}): LedgerContext {
	const env = options.env ?? process.env;
	const home = options.home ?? homedir();
	const claudeDirs = options.claudeDirs ?? getClaudeDirs(env, home);

	const envDashboardDir = env[USAGE_WINDOW_DIR_ENV]?.trim();
	const dashboardDir =
		options.dashboardDir ??
		(envDashboardDir != null && envDashboardDir !== ''
			? path.resolve(envDashboardDir)
			: path.join(home, '.claude', DASHBOARD_DIR_NAME));

	return {
		dashboardDir,
		ledgerPath: path.join(dashboardDir, LEDGER_FILE_NAME),
		configPath: path.join(dashboardDir, CONFIG_FILE_NAME),
		projectsDirs: claudeDirs.map((dir) => path.join(dir, CLAUDE_PROJECTS_DIR_NAME)),
	};
}

if (import.meta.vitest != null) {
	describe('getClaudeDirs', () => {
		it('uses both default locations under the home directory', () => {
			expect(getClaudeDirs({}, '/home/test')).toEqual([
				'/home/test/.claude',
				'/home/test/.config/claude',
			]);
		});

		it('splits CLAUDE_CONFIG_DIR on commas', () => {
			expect(getClaudeDirs({ CLAUDE_CONFIG_DIR: '/a/claude, /b/claude ,' }, '/home/test')).toEqual([
				'/a/claude',
				'/b/claude',
			]);
		});
	});

	describe('createLedgerContext', () => {
		it('places the ledger and config in the dashboard directory', () => {
			expect(createLedgerContext({ env: {}, home: '/home/test' })).toEqual({
				dashboardDir: '/home/test/.claude/dashboard',
				ledgerPath: '/home/test/.claude/dashboard/usage.json',
				configPath: '/home/test/.claude/dashboard/config.json',
				projectsDirs: ['/home/test/.claude/projects', '/home/test/.config/claude/projects'],
			});
		});

		it('honours USAGE_WINDOW_DIR', () => {
			const context = createLedgerContext({
				env: { USAGE_WINDOW_DIR: '/var/lib/usage-window' },
				home: '/home/test',
			});
			expect(context.ledgerPath).toBe('/var/lib/usage-window/usage.json');
		});
	});
}
