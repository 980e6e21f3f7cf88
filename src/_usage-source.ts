/**
 * @fileoverview Usage sources
 *
 * A usage source produces the raw entries for one pipeline pass. The monitor
 * picks one implementation at startup: log files discovered on disk, or a
 * deterministic synthetic stream for demos and tests.
 *
 * @module _usage-source
 */

import type { MonitorConfig } from './_config.ts';
import type { UsageEntry } from './_record-parser.ts';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import { glob } from 'tinyglobby';
import { USAGE_DATA_GLOB_PATTERN } from './_consts.ts';
import { FileTooLargeError } from './_errors.ts';
import { readUsageFile } from './_file-reader.ts';
import { defaultAllowedRoots, discoverUsageRoots, validatePath } from './_path-validator.ts';
import { createMessageId, createModelName, createRequestId } from './_types.ts';
import { logger } from './logger.ts';

export type UsageSource = {
	readonly kind: 'files' | 'mock';
	/** Directories worth watching for changes; empty when there is nothing on disk */
	listWatchRoots: () => string[];
	/** Reads every entry currently available, in no particular order */
	loadEntries: () => Promise<UsageEntry[]>;
};

export type FileUsageSourceOptions = {
	config: Pick<MonitorConfig, 'dataPaths' | 'allowedRoots'>;
	env?: NodeJS.ProcessEnv;
};

/**
 * Lists usage files under the roots in discovery order: roots in priority
 * order, files sorted by path within a root, each canonical file once
 */
export async function globUsageFiles(roots: readonly string[], allowedRoots: readonly string[]): Promise<string[]> {
	const files: string[] = [];
	const seen = new Set<string>();

	for (const root of roots) {
		const found = await glob([USAGE_DATA_GLOB_PATTERN], {
			cwd: root,
			absolute: true,
			followSymbolicLinks: false,
		});
		for (const file of found.sort()) {
			const validated = validatePath(file, { allowedRoots });
			if (Result.isFailure(validated)) {
				logger.warn(`Skipping usage file: ${validated.error.message}`);
				continue;
			}
			if (!seen.has(validated.value)) {
				seen.add(validated.value);
				files.push(validated.value);
			}
		}
	}

	return files;
}

export function createFileUsageSource({ config, env = process.env }: FileUsageSourceOptions): UsageSource {
	const allowedRoots = defaultAllowedRoots(config);

	return {
		kind: 'files',
		listWatchRoots: () => discoverUsageRoots(config, env),
		async loadEntries() {
			const roots = discoverUsageRoots(config, env);
			if (roots.length === 0) {
				logger.debug('No usage data directories found');
				return [];
			}

			const files = await globUsageFiles(roots, allowedRoots);
			const entries: UsageEntry[] = [];
			let skippedLines = 0;

			for (const [fileIndex, file] of files.entries()) {
				const result = await readUsageFile(file, fileIndex);
				if (Result.isFailure(result)) {
					if (result.error instanceof FileTooLargeError) {
						logger.warn(`Skipping ${file}: ${result.error.message}`);
					}
					else {
						logger.debug(`Skipping ${file}: ${result.error.message}`);
					}
					continue;
				}
				entries.push(...result.value.entries);
				skippedLines += result.value.skippedLines;
			}

			logger.debug(`Read ${entries.length} usage entries from ${files.length} files (${skippedLines} malformed lines)`);
			return entries;
		},
	};
}

export type MockUsageSourceOptions = {
	now?: () => Date;
	seed?: number;
	/** Minutes between synthetic entries */
	intervalMinutes?: number;
	/** How far back the synthetic stream reaches */
	spanMinutes?: number;
};

const MOCK_MODELS = ['claude-sonnet-4-20250514', 'claude-opus-4-20250514'] as const;

/**
 * Deterministic synthetic usage: one entry every `intervalMinutes` over the
 * last `spanMinutes`, with token counts from a seeded generator.
 * Entries sit on a fixed grid so repeated loads return the same records.
 */
export function createMockUsageSource({
	now = () => new Date(),
	seed = 7,
	intervalMinutes = 3,
	spanMinutes = 120,
}: MockUsageSourceOptions = {}): UsageSource {
	const intervalMs = intervalMinutes * 60_000;

	const tokensAt = (slot: number, salt: number, max: number): number => {
		// Integer hash of (seed, slot, salt) so every slot always yields the same counts
		let value = (seed * 2_654_435_761 + slot * 40_503 + salt * 9_973) >>> 0;
		value = Math.imul(value ^ (value >>> 16), 0x45D9F3B) >>> 0;
		value = (value ^ (value >>> 16)) >>> 0;
		return value % max;
	};

	return {
		kind: 'mock',
		listWatchRoots: () => [],
		async loadEntries() {
			const lastSlot = Math.floor(now().getTime() / intervalMs);
			const firstSlot = lastSlot - Math.floor(spanMinutes / intervalMinutes) + 1;
			const entries: UsageEntry[] = [];

			for (let slot = firstSlot; slot <= lastSlot; slot++) {
				entries.push(Object.freeze({
					timestamp: new Date(slot * intervalMs),
					model: createModelName(MOCK_MODELS[tokensAt(slot, 5, MOCK_MODELS.length)] ?? MOCK_MODELS[0]),
					inputTokens: 50 + tokensAt(slot, 1, 450),
					outputTokens: 20 + tokensAt(slot, 2, 280),
					cacheCreationTokens: tokensAt(slot, 3, 100),
					cacheReadTokens: tokensAt(slot, 4, 200),
					messageId: createMessageId(`mock_msg_${slot}`),
					requestId: createRequestId(`mock_req_${slot}`),
					sourceFile: 'mock',
					fileIndex: 0,
					lineNumber: slot - firstSlot + 1,
				}));
			}

			return entries;
		},
	};
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createFixture } = await import('fs-fixture');
	const path = await import('node:path');
	const { realpathSync } = await import('node:fs');

	const line = (timestamp: string, messageId: string, input: number): string => JSON.stringify({
		timestamp,
		requestId: `req_${messageId}`,
		message: { id: messageId, model: 'claude-sonnet-4-20250514', usage: { input_tokens: input, output_tokens: 0 } },
	});

	describe('createFileUsageSource', () => {
		it('reads every jsonl file under the configured roots', async () => {
			await using fixture = await createFixture({
				'projects/alpha/one.jsonl': line('2025-01-10T10:00:00Z', 'msg_1', 10),
				'projects/beta/two.jsonl': `${line('2025-01-10T10:01:00Z', 'msg_2', 20)}\n${line('2025-01-10T10:02:00Z', 'msg_3', 30)}`,
				'projects/beta/notes.txt': 'ignored',
			});
			const source = createFileUsageSource({
				config: { dataPaths: [fixture.getPath('projects')], allowedRoots: [fixture.path] },
				env: {},
			});

			const entries = await source.loadEntries();
			const base = realpathSync(fixture.path);
			expect(entries.map(entry => [entry.inputTokens, entry.fileIndex, entry.sourceFile])).toEqual([
				[10, 0, path.join(base, 'projects', 'alpha', 'one.jsonl')],
				[20, 1, path.join(base, 'projects', 'beta', 'two.jsonl')],
				[30, 1, path.join(base, 'projects', 'beta', 'two.jsonl')],
			]);
			expect(source.listWatchRoots()).toEqual([path.join(base, 'projects')]);
		});

		it('reads a file reachable from two roots once', async () => {
			await using fixture = await createFixture({
				'projects/alpha/one.jsonl': line('2025-01-10T10:00:00Z', 'msg_1', 10),
			});
			const source = createFileUsageSource({
				config: { dataPaths: [fixture.getPath('projects'), fixture.getPath('projects/alpha')], allowedRoots: [fixture.path] },
				env: {},
			});
			const entries = await source.loadEntries();
			expect(entries).toHaveLength(1);
		});
	});

	describe('createMockUsageSource', () => {
		it('produces the same entries for the same clock', async () => {
			const now = (): Date => new Date(Date.UTC(2025, 0, 10, 12, 0, 0));
			const first = await createMockUsageSource({ now }).loadEntries();
			const second = await createMockUsageSource({ now }).loadEntries();
			expect(first).toHaveLength(40);
			expect(second).toEqual(first);
			expect(first.at(-1)?.timestamp).toEqual(now());
			expect(first.every(entry => entry.inputTokens >= 50 && entry.inputTokens < 500)).toBe(true);
		});
	});
}
