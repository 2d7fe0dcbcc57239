import { appendFileSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

export type AssistantLineOptions = {
	timestamp: string;
	messageId?: string;
	requestId?: string;
	model?: string;
	inputTokens?: number;
	outputTokens?: number;
	cacheCreationTokens?: number;
	cacheReadTokens?: number;
};

export function assistantLine(options: AssistantLineOptions): string {
	return JSON.stringify({
		type: 'assistant',
		timestamp: options.timestamp,
		requestId: options.requestId,
		message: {
			id: options.messageId,
			model: options.model ?? 'claude-sonnet-4-20250514',
			role: 'assistant',
			usage: {
				input_tokens: options.inputTokens ?? 0,
				output_tokens: options.outputTokens ?? 0,
				cache_creation_input_tokens: options.cacheCreationTokens ?? 0,
				cache_read_input_tokens: options.cacheReadTokens ?? 0,
			},
		},
	});
}

export function userLine(timestamp: string): string {
	return JSON.stringify({
		type: 'user',
		timestamp,
		message: { role: 'user', content: 'hello' },
	});
}

export type ClaudeHomeFixture = {
	root: string;
	projectsDir: string;
	dashboardDir: string;
	ledgerPath: string;
	configPath: string;
	writeSession: (project: string, sessionId: string, lines: string[]) => string;
	appendSession: (project: string, sessionId: string, lines: string[]) => void;
	cleanup: () => void;
};

/**
 * Creates a throwaway `~/.claude`-shaped directory.
 */
export function createClaudeHome(): ClaudeHomeFixture {
	const root = mkdtempSync(path.join(tmpdir(), 'usage-window-'));
	const projectsDir = path.join(root, 'projects');
	const dashboardDir = path.join(root, 'dashboard');
	mkdirSync(projectsDir, { recursive: true });

	const sessionPath = (project: string, sessionId: string): string => {
		const projectDir = path.join(projectsDir, project);
		mkdirSync(projectDir, { recursive: true });
		return path.join(projectDir, `${sessionId}.jsonl`);
	};

	return {
		root,
		projectsDir,
		dashboardDir,
		ledgerPath: path.join(dashboardDir, 'usage.json'),
		configPath: path.join(dashboardDir, 'config.json'),
		writeSession(project, sessionId, lines) {
			const filePath = sessionPath(project, sessionId);
			writeFileSync(filePath, lines.map((line) => `${line}\n`).join(''));
			return filePath;
		},
		appendSession(project, sessionId, lines) {
			appendFileSync(sessionPath(project, sessionId), lines.map((line) => `${line}\n`).join(''));
		},
		cleanup() {
			rmSync(root, { recursive: true, force: true });
		},
	};
}
