import { Buffer } from 'node:buffer';
import process from 'node:process';
import { z } from 'zod';
import { logger } from './logger.ts';

const hookInputSchema = z
	.object({
		session_id: z.string().nullish(),
	})
	.passthrough();

/**
 * Extracts the session id from a Claude Code hook payload. Anything unusable yields `null`.
 */
export function parseHookInput(raw: string): string | null {
	if (raw.trim() === '') {
		return null;
	}
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch {
		return null;
	}
	const parsed = hookInputSchema.safeParse(json);
	if (!parsed.success) {
		return null;
	}
	const sessionId = parsed.data.session_id?.trim();
	return sessionId == null || sessionId === '' ? null : sessionId;
}

/**
 * Reads the hook payload from stdin. An interactive terminal has no payload.
 */
export async function readHookInput(
	stream: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
): Promise<string> {
	if (stream.isTTY === true) {
		return '';
	}
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
	}
	return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Session id from the hook payload on `stream`. A failed read yields `null` like an unusable payload.
 */
export async function readHookSessionId(
	stream: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
): Promise<string | null> {
	try {
		return parseHookInput(await readHookInput(stream));
	} catch (error) {
		logger.debug(
			`Could not read the hook payload: ${error instanceof Error ? error.message : String(error)}`,
		);
		return null;
	}
}

if (import.meta.vitest != null) {
	const { Readable } = await import('node:stream');

	describe('parseHookInput', () => {
		it('reads session_id from the Stop hook payload', () => {
			expect(
				parseHookInput(
					JSON.stringify({
						session_id: 'b7f3c9a2-1111-4e6f-9d2a-000000000001',
						transcript_path: '/tmp/transcript.jsonl',
						hook_event_name: 'Stop',
					}),
				),
			).toBe('b7f3c9a2-1111-4e6f-9d2a-000000000001');
		});

		it('returns null for empty, malformed or id-less payloads', () => {
			expect(parseHookInput('')).toBeNull();
			expect(parseHookInput('{"session_id":')).toBeNull();
			expect(parseHookInput('{"cwd":"/tmp"}')).toBeNull();
			expect(parseHookInput('{"session_id":"  "}')).toBeNull();
			expect(parseHookInput('{"session_id":42}')).toBeNull();
			expect(parseHookInput('[]')).toBeNull();
		});
	});

	describe('readHookInput', () => {
		it('concatenates every chunk from the stream', async () => {
			const stream = Readable.from(['{"session_id":', '"abc"}']);
			await expect(readHookInput(stream)).resolves.toBe('{"session_id":"abc"}');
		});
	});

	describe('readHookSessionId', () => {
		it('reads the session id from the stream', async () => {
			const stream = Readable.from(['{"session_id":"abc"}']);
			await expect(readHookSessionId(stream)).resolves.toBe('abc');
		});

		it('yields null when the stream fails', async () => {
			const stream = new Readable({
				read() {
					this.destroy(new Error('stdin closed'));
				},
			});
			await expect(readHookSessionId(stream)).resolves.toBeNull();
		});
	});
}
