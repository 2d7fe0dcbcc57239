import type { Dirent } from 'node:fs';
import type { Degraded, TokenCounts } from './_types.ts';
import { existsSync, readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { Result } from '@praha/byethrow';
import { z } from 'zod';
import { MS_PER_SECOND, SESSION_FILE_EXTENSION } from './_consts.ts';

const tokenCountSchema = z.number().int().nonnegative().nullish();

const usageSchema = z
	.object({
		input_tokens: tokenCountSchema,
		output_tokens: tokenCountSchema,
		cache_creation_input_tokens: tokenCountSchema,
		cache_read_input_tokens: tokenCountSchema,
	})
	.passthrough();

export const sessionLogEntrySchema = z
	.object({
		type: z.string().nullish(),
		timestamp: z.string().nullish(),
		requestId: z.string().nullish(),
		message: z
			.object({
				id: z.string().nullish(),
				model: z.string().nullish(),
				usage: usageSchema.nullish(),
			})
			.passthrough()
			.nullish(),
	})
	.passthrough();

/**
 * Usage carried by one eligible assistant line, before pricing.
 */
export type UsageRecord = TokenCounts & {
	timestamp: string;
	model: string;
	dedupKey: string | null;
};

export type SessionFile = {
	sessionId: string;
	filePath: string;
};

export type SessionLogDegradedReason = 'session-log-missing' | 'session-log-unreadable';

export type MalformedLine = Degraded<'malformed-line'>;

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

/**
 * Normalizes a log timestamp to an ISO UTC string with whole seconds.
 * Values with `Z` or an explicit offset are absolute; a naive date-time is read as local wall time.
 */
export function normalizeTimestamp(raw: string): string | null {
	const trimmed = raw.trim();
	if (!ISO_DATE_PREFIX.test(trimmed)) {
		return null;
	}
	const ms = Date.parse(trimmed);
	if (Number.isNaN(ms)) {
		return null;
	}
	return new Date(Math.floor(ms / MS_PER_SECOND) * MS_PER_SECOND).toISOString();
}

export function createDedupKey(
	messageId: string | null | undefined,
	requestId: string | null | undefined,
): string | null {
	if (messageId == null || messageId === '' || requestId == null || requestId === '') {
		return null;
	}
	return `${messageId}:${requestId}`;
}

function parseJson(line: string): Result.Result<unknown, MalformedLine> {
	try {
		const value: unknown = JSON.parse(line);
		return Result.succeed(value);
	} catch (error) {
		return Result.fail({
			reason: 'malformed-line',
			message: error instanceof Error ? error.message : String(error),
		});
	}
}

/**
 * Parses one JSONL line. Fails on malformed input; succeeds with `null` for lines that are
 * well-formed but carry no assistant usage.
 */
export function parseUsageLine(line: string): Result.Result<UsageRecord | null, MalformedLine> {
	const json = parseJson(line);
	if (Result.isFailure(json)) {
		return json;
	}

	const parsed = sessionLogEntrySchema.safeParse(json.value);
	if (!parsed.success) {
		return Result.fail({
			reason: 'malformed-line',
			message: parsed.error.issues.map((issue) => issue.message).join('; '),
		});
	}

	const entry = parsed.data;
	const usage = entry.message?.usage;
	if (entry.type !== 'assistant' || usage == null || Object.keys(usage).length === 0) {
		return Result.succeed(null);
	}
	if (entry.timestamp == null) {
		return Result.succeed(null);
	}

	const timestamp = normalizeTimestamp(entry.timestamp);
	if (timestamp == null) {
		return Result.succeed(null);
	}

	return Result.succeed({
		timestamp,
		model: entry.message?.model ?? '',
		dedupKey: createDedupKey(entry.message?.id, entry.requestId),
		inputTokens: usage.input_tokens ?? 0,
		outputTokens: usage.output_tokens ?? 0,
		cacheCreationTokens: usage.cache_creation_input_tokens ?? 0,
		cacheReadTokens: usage.cache_read_input_tokens ?? 0,
	});
}

function isSafeSessionId(sessionId: string): boolean {
	return (
		sessionId !== '' &&
		sessionId !== '..' &&
		!sessionId.includes('/') &&
		!sessionId.includes('\\')
	);
}

function readDirectories(dir: string): Dirent[] {
	try {
		return readdirSync(dir, { withFileTypes: true }).filter((entry) => entry.isDirectory());
	} catch {
		return [];
	}
}

/**
 * Finds `<projectsDir>/<project>/<sessionId>.jsonl`, first match wins.
 */
export function findSessionFile(
	sessionId: string,
	projectsDirs: readonly string[],
): Result.Result<string, Degraded<SessionLogDegradedReason>> {
	if (isSafeSessionId(sessionId)) {
		const fileName = `${sessionId}${SESSION_FILE_EXTENSION}`;
		for (const projectsDir of projectsDirs) {
			for (const project of readDirectories(projectsDir)) {
				const candidate = path.join(projectsDir, project.name, fileName);
				if (existsSync(candidate)) {
					return Result.succeed(candidate);
				}
			}
		}
	}
	return Result.fail({
		reason: 'session-log-missing',
		message: `Session log not found for ${sessionId}`,
	});
}

/**
 * Lists every session log one level below each projects directory.
 * A session id seen in an earlier directory shadows later ones, matching `findSessionFile`.
 */
export function listSessionFiles(projectsDirs: readonly string[]): SessionFile[] {
	const files: SessionFile[] = [];
	const seen = new Set<string>();
	for (const projectsDir of projectsDirs) {
		for (const project of readDirectories(projectsDir)) {
			const projectDir = path.join(projectsDir, project.name);
			let entries: Dirent[];
			try {
				entries = readdirSync(projectDir, { withFileTypes: true });
			} catch {
				continue;
			}
			for (const entry of entries) {
				if (!entry.isFile() || !entry.name.endsWith(SESSION_FILE_EXTENSION)) {
					continue;
				}
				const sessionId = entry.name.slice(0, -SESSION_FILE_EXTENSION.length);
				if (sessionId === '' || seen.has(sessionId)) {
					continue;
				}
				seen.add(sessionId);
				files.push({ sessionId, filePath: path.join(projectDir, entry.name) });
			}
		}
	}
	return files;
}

/**
 * Splits a session log into newline-terminated lines.
 * A trailing segment without its newline is still being written and is left for a later read.
 */
export function splitLines(content: string): string[] {
	const lines = content.split(/\r?\n/);
	lines.pop();
	return lines;
}

export function readSessionLines(
	filePath: string,
): Result.Result<string[], Degraded<SessionLogDegradedReason>> {
	try {
		return Result.succeed(splitLines(readFileSync(filePath, 'utf-8')));
	} catch (error) {
		return Result.fail({
			reason: 'session-log-unreadable',
			message: error instanceof Error ? error.message : String(error),
		});
	}
}

if (import.meta.vitest != null) {
	describe('normalizeTimestamp', () => {
		it('keeps UTC instants and truncates to whole seconds', () => {
			expect(normalizeTimestamp('2025-09-11T03:00:00.789Z')).toBe('2025-09-11T03:00:00.000Z');
		});

		it('converts explicit offsets to UTC', () => {
			expect(normalizeTimestamp('2025-09-11T05:30:00+02:00')).toBe('2025-09-11T03:30:00.000Z');
		});

		it('reads naive values as local wall time', () => {
			expect(normalizeTimestamp('2025-03-01T10:00:00')).toBe(
				new Date(2025, 2, 1, 10, 0, 0).toISOString(),
			);
		});

		it('rejects values that are not ISO dates', () => {
			expect(normalizeTimestamp('yesterday')).toBeNull();
			expect(normalizeTimestamp('2025-13-45T99:00:00Z')).toBeNull();
		});
	});

	describe('splitLines', () => {
		it('returns only newline-terminated lines', () => {
			expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
			expect(splitLines('a\r\n\nb\n')).toEqual(['a', '', 'b']);
			expect(splitLines('')).toEqual([]);
		});

		it('leaves an unterminated last line for a later read', () => {
			expect(splitLines('a\n{"type":"assis')).toEqual(['a']);
			expect(splitLines('{"type":"assis')).toEqual([]);
		});
	});

	describe('parseUsageLine', () => {
		const assistantLine = {
			type: 'assistant',
			timestamp: '2025-09-11T03:00:00.000Z',
			requestId: 'req_1',
			message: {
				id: 'msg_1',
				model: 'claude-sonnet-4-20250514',
				usage: {
					input_tokens: 10,
					output_tokens: 20,
					cache_creation_input_tokens: 30,
					cache_read_input_tokens: 40,
				},
			},
		};

		it('extracts usage, model and the composite dedup key', () => {
			const result = parseUsageLine(JSON.stringify(assistantLine));
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value).toEqual({
					timestamp: '2025-09-11T03:00:00.000Z',
					model: 'claude-sonnet-4-20250514',
					dedupKey: 'msg_1:req_1',
					inputTokens: 10,
					outputTokens: 20,
					cacheCreationTokens: 30,
					cacheReadTokens: 40,
				});
			}
		});

		it('returns null for user lines and empty usage blocks', () => {
			const userLine = parseUsageLine(JSON.stringify({ ...assistantLine, type: 'user' }));
			const emptyUsage = parseUsageLine(
				JSON.stringify({ ...assistantLine, message: { id: 'msg_2', usage: {} } }),
			);
			const noTimestamp = parseUsageLine(JSON.stringify({ ...assistantLine, timestamp: undefined }));
			for (const result of [userLine, emptyUsage, noTimestamp]) {
				expect(Result.isSuccess(result) && result.value === null).toBe(true);
			}
		});

		it('omits the dedup key when either identifier is missing', () => {
			const result = parseUsageLine(JSON.stringify({ ...assistantLine, requestId: undefined }));
			expect(Result.isSuccess(result) && result.value?.dedupKey).toBeNull();
		});

		it('fails on malformed JSON and on invalid token counts', () => {
			expect(Result.isFailure(parseUsageLine('{"type":"assistant"'))).toBe(true);
			const negative = parseUsageLine(
				JSON.stringify({
					...assistantLine,
					message: { ...assistantLine.message, usage: { input_tokens: -1 } },
				}),
			);
			expect(Result.isFailure(negative)).toBe(true);
		});
	});
}
