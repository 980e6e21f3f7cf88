import type { UsageEntry } from './_record-parser.ts';
import { sort } from 'fast-sort';
import { logger } from './logger.ts';

/**
 * Create a unique identifier for deduplication using message ID and request ID.
 * Entries carrying neither identifier have no key and are always kept.
 */
export function createUniqueHash(entry: Pick<UsageEntry, 'messageId' | 'requestId'>): string | null {
	if (entry.messageId == null && entry.requestId == null) {
		return null;
	}
	return `${entry.messageId ?? ''}:${entry.requestId ?? ''}`;
}

/**
 * Orders entries by timestamp, then discovery order of their file, then line,
 * and keeps only the first occurrence of each deduplication key.
 * The result does not depend on the order of the input.
 */
export function sortAndDeduplicate(entries: readonly UsageEntry[]): UsageEntry[] {
	const sorted = sort([...entries]).asc([
		entry => entry.timestamp.getTime(),
		entry => entry.fileIndex,
		entry => entry.lineNumber,
	]);

	const processedHashes = new Set<string>();
	const unique: UsageEntry[] = [];
	for (const entry of sorted) {
		const uniqueHash = createUniqueHash(entry);
		if (uniqueHash != null) {
			if (processedHashes.has(uniqueHash)) {
				continue;
			}
			processedHashes.add(uniqueHash);
		}
		unique.push(entry);
	}

	const duplicates = sorted.length - unique.length;
	if (duplicates > 0) {
		logger.debug(`Dropped ${duplicates} duplicate usage entries`);
	}
	return unique;
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createMessageId, createModelName, createRequestId } = await import('./_types.ts');

	const entry = (
		minute: number,
		fileIndex: number,
		lineNumber: number,
		ids: { messageId?: string; requestId?: string },
		inputTokens = 1,
	): UsageEntry => ({
		timestamp: new Date(Date.UTC(2025, 0, 10, 10, minute)),
		model: createModelName('claude-sonnet-4-20250514'),
		inputTokens,
		outputTokens: 0,
		cacheCreationTokens: 0,
		cacheReadTokens: 0,
		...(ids.messageId != null ? { messageId: createMessageId(ids.messageId) } : {}),
		...(ids.requestId != null ? { requestId: createRequestId(ids.requestId) } : {}),
		sourceFile: `/data/${fileIndex}.jsonl`,
		fileIndex,
		lineNumber,
	});

	describe('createUniqueHash', () => {
		it('joins both identifiers', () => {
			expect(createUniqueHash(entry(0, 0, 1, { messageId: 'msg_1', requestId: 'req_1' }))).toBe('msg_1:req_1');
		});

		it('keys on a single identifier when the other is missing', () => {
			expect(createUniqueHash(entry(0, 0, 1, { messageId: 'msg_1' }))).toBe('msg_1:');
		});

		it('returns null without identifiers', () => {
			expect(createUniqueHash(entry(0, 0, 1, {}))).toBeNull();
		});
	});

	describe('sortAndDeduplicate', () => {
		it('keeps the earliest copy of a duplicate regardless of input order', () => {
			const a1 = entry(5, 0, 3, { messageId: 'msg_a', requestId: 'req_a' }, 100);
			const a2 = entry(5, 1, 1, { messageId: 'msg_a', requestId: 'req_a' }, 100);
			const b = entry(7, 1, 2, { messageId: 'msg_b', requestId: 'req_b' }, 50);

			const forward = sortAndDeduplicate([a1, a2, b]);
			const backward = sortAndDeduplicate([b, a2, a1]);

			expect(forward).toEqual([a1, b]);
			expect(backward).toEqual(forward);
			expect(forward[0]).toBe(a1);
		});

		it('orders ties by file then line', () => {
			const late = entry(0, 2, 1, { messageId: 'm3' });
			const early = entry(0, 1, 9, { messageId: 'm2' });
			const earliest = entry(0, 1, 2, { messageId: 'm1' });
			expect(sortAndDeduplicate([late, early, earliest])).toEqual([earliest, early, late]);
		});

		it('never merges entries without identifiers', () => {
			const first = entry(1, 0, 1, {});
			const second = entry(1, 0, 2, {});
			expect(sortAndDeduplicate([second, first])).toEqual([first, second]);
		});
	});
}
