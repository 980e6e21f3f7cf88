/**
 * @fileoverview Streaming reader for usage log files
 *
 * Files are checked against the whole-file ceiling with `stat` before they are
 * opened, then read line by line so that only one line is held at a time.
 */

import type { RecordOrigin, UsageEntry } from './_record-parser.ts';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { Result } from '@praha/byethrow';
import { MAX_FILE_BYTES } from './_consts.ts';
import { FileTooLargeError } from './_errors.ts';
import { parseUsageLine } from './_record-parser.ts';
import { logger } from './logger.ts';

export type UsageFileContents = {
	entries: UsageEntry[];
	/** Lines rejected as malformed */
	skippedLines: number;
};

export type ReadUsageFileOptions = {
	maxFileBytes?: number;
};

/**
 * Stream a file and hand each non-empty line to `onLine` with its 1-based number
 */
export async function processFileLines(
	filePath: string,
	onLine: (line: string, lineNumber: number) => void,
): Promise<void> {
	const stream = createReadStream(filePath, { encoding: 'utf-8' });
	const rl = createInterface({
		input: stream,
		crlfDelay: Infinity,
	});

	let lineNumber = 0;
	try {
		for await (const line of rl) {
			lineNumber++;
			if (line.trim().length > 0) {
				onLine(line, lineNumber);
			}
		}
	}
	finally {
		rl.close();
		stream.destroy();
	}
}

/**
 * Reads and parses one usage log file
 * @param filePath - Canonical, validated path
 * @param fileIndex - Position of the file in discovery order
 */
export async function readUsageFile(
	filePath: string,
	fileIndex: number,
	options: ReadUsageFileOptions = {},
): Result.ResultAsync<UsageFileContents, FileTooLargeError | Error> {
	const maxFileBytes = options.maxFileBytes ?? MAX_FILE_BYTES;

	const stats = await Result.try({
		try: async () => stat(filePath),
		catch: error => error instanceof Error ? error : new Error(String(error)),
	})();
	if (Result.isFailure(stats)) {
		return stats;
	}
	if (stats.value.size > maxFileBytes) {
		return Result.fail(new FileTooLargeError(filePath, stats.value.size, maxFileBytes));
	}

	const entries: UsageEntry[] = [];
	let skippedLines = 0;

	const read = await Result.try({
		try: async () => processFileLines(filePath, (line, lineNumber) => {
			const origin: RecordOrigin = { sourceFile: filePath, fileIndex, lineNumber };
			const parsed = parseUsageLine(line, origin);
			if (Result.isFailure(parsed)) {
				skippedLines++;
				logger.debug(`Skipping ${filePath}:${lineNumber}: ${parsed.error.reason} (${parsed.error.message})`);
				return;
			}
			if (parsed.value != null) {
				entries.push(parsed.value);
			}
		}),
		catch: error => error instanceof Error ? error : new Error(String(error)),
	})();
	if (Result.isFailure(read)) {
		return read;
	}

	return Result.succeed({ entries, skippedLines });
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createFixture } = await import('fs-fixture');

	const line = (timestamp: string, messageId: string, input: number): string => JSON.stringify({
		timestamp,
		requestId: `req_${messageId}`,
		message: { id: messageId, model: 'claude-sonnet-4-20250514', usage: { input_tokens: input, output_tokens: 0 } },
	});

	describe('readUsageFile', () => {
		it('parses valid lines and counts malformed ones with line numbers', async () => {
			await using fixture = await createFixture({
				'session.jsonl': [
					line('2025-01-10T10:00:00Z', 'msg_1', 10),
					'',
					'{"timestamp": broken',
					JSON.stringify({ type: 'summary', summary: 'notes' }),
					line('2025-01-10T10:05:00Z', 'msg_2', 20),
				].join('\r\n'),
			});

			const result = await readUsageFile(fixture.getPath('session.jsonl'), 3);
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value.skippedLines).toBe(1);
				expect(result.value.entries.map(entry => [entry.inputTokens, entry.lineNumber, entry.fileIndex])).toEqual([
					[10, 1, 3],
					[20, 5, 3],
				]);
			}
		});

		it('skips a file one byte over the ceiling before reading any line', async () => {
			await using fixture = await createFixture({ 'huge.jsonl': '' });
			const { truncate } = await import('node:fs/promises');
			// Sparse file: the size is reported without writing 50 MiB
			await truncate(fixture.getPath('huge.jsonl'), MAX_FILE_BYTES + 1);

			const result = await readUsageFile(fixture.getPath('huge.jsonl'), 0);
			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error).toBeInstanceOf(FileTooLargeError);
			}
		});

		it('fails for a missing file', async () => {
			await using fixture = await createFixture({});
			const result = await readUsageFile(fixture.getPath('gone.jsonl'), 0);
			expect(Result.isFailure(result)).toBe(true);
		});
	});
}
