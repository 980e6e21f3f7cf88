/**
 * @fileoverview One ingestion-and-derivation pass
 *
 * A pass reads every entry from the usage source, orders and deduplicates them,
 * derives the current window, folds it into the session tracker and computes
 * metrics. The resulting snapshot is frozen before it is returned.
 *
 * @module _pipeline
 */

import type { MonitorConfig } from './_config.ts';
import type { ModelUsage, UsageMetrics, UsagePoint } from './_metrics.ts';
import type { UsageEntry } from './_record-parser.ts';
import type { ObservedSession, SessionDerivation } from './_session-derivation.ts';
import type { SessionTracker } from './_session-tracker.ts';
import type { UsageSource } from './_usage-source.ts';
import { sortAndDeduplicate } from './_dedupe.ts';
import { buildModelBreakdown, buildUsageTimeline, calculateUsageMetrics } from './_metrics.ts';
import { deriveObservedSession } from './_session-derivation.ts';
import { logger } from './logger.ts';

export type SessionSnapshot = Readonly<{
	session: ObservedSession;
	metrics: UsageMetrics;
	/** Cumulative usage over the window; empty when the window had no entries this pass */
	timeline: readonly UsagePoint[];
	/** Per-model usage in the window, largest first */
	modelBreakdown: readonly ModelUsage[];
	generatedAt: Date;
}>;

export type PassResult = Readonly<{
	/** Current session with metrics, or null when the window had no entries this pass */
	snapshot: SessionSnapshot | null;
	/** Session closed by this pass, if the window moved */
	closedSession: ObservedSession | null;
	skewedEntries: readonly UsageEntry[];
	entryCount: number;
}>;

/**
 * Pure part of a pass: derivation and timeline from raw entries
 */
export function deriveUsageState(
	entries: readonly UsageEntry[],
	now: Date,
	config: MonitorConfig,
): { derivation: SessionDerivation; timeline: UsagePoint[]; modelBreakdown: ModelUsage[] } {
	const sorted = sortAndDeduplicate(entries);
	const derivation = deriveObservedSession(sorted, { now, config });
	if (derivation.state !== 'observed') {
		return { derivation, timeline: [], modelBreakdown: [] };
	}
	return {
		derivation,
		timeline: buildUsageTimeline(derivation.windowEntries, derivation.session.startTime),
		modelBreakdown: buildModelBreakdown(derivation.windowEntries),
	};
}

export function createSnapshot(
	session: ObservedSession,
	timeline: readonly UsagePoint[],
	now: Date,
	config: MonitorConfig,
	modelBreakdown: readonly ModelUsage[] = [],
): SessionSnapshot {
	return Object.freeze({
		session,
		metrics: calculateUsageMetrics(session, now, config),
		timeline: Object.freeze([...timeline]),
		modelBreakdown: Object.freeze([...modelBreakdown]),
		generatedAt: now,
	});
}

/**
 * Runs one full pass and records the derived session in `tracker`.
 * A pass without entries in the window publishes no snapshot; the tracker keeps
 * its current session so a later window can still close it.
 */
export async function runUsagePass({ source, tracker, config, now }: {
	source: UsageSource;
	tracker: SessionTracker;
	config: MonitorConfig;
	now: Date;
}): Promise<PassResult> {
	const entries = await source.loadEntries();
	const { derivation, timeline, modelBreakdown } = deriveUsageState(entries, now, config);

	if (derivation.skewedEntries.length > 0) {
		logger.debug(`Ignoring ${derivation.skewedEntries.length} entries dated after ${now.toISOString()}`);
	}

	const derived = derivation.state === 'observed' ? derivation.session : null;
	if (derived == null) {
		logger.info('No usage data found in the current window');
	}
	const closedSession = tracker.observe(derived);

	const current = derived != null ? tracker.current : null;
	const snapshot = current != null
		? createSnapshot(current, timeline, now, config, modelBreakdown)
		: null;

	return Object.freeze({
		snapshot,
		closedSession,
		skewedEntries: derivation.skewedEntries,
		entryCount: entries.length,
	});
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createFixture } = await import('fs-fixture');
	const { createMonitorConfig } = await import('./_config.ts');
	const { createSessionTracker } = await import('./_session-tracker.ts');
	const { createFileUsageSource } = await import('./_usage-source.ts');

	const record = (timestamp: string, messageId: string, requestId: string, inputTokens: number, outputTokens: number): string =>
		JSON.stringify({
			timestamp,
			requestId,
			message: {
				id: messageId,
				model: 'claude-sonnet-4-20250514',
				usage: { input_tokens: inputTokens, output_tokens: outputTokens },
			},
		});

	const A = record('2025-01-10T10:00:00Z', 'msg_a', 'req_a', 80, 20);
	const B = record('2025-01-10T10:10:00Z', 'msg_b', 'req_b', 30, 20);

	const sourceFor = (root: string, allowedRoot: string): ReturnType<typeof createFileUsageSource> =>
		createFileUsageSource({ config: { dataPaths: [root], allowedRoots: [allowedRoot] }, env: {} });

	describe('runUsagePass', () => {
		it('counts a record duplicated across two files once', async () => {
			await using fixture = await createFixture({
				'projects/one/first.jsonl': A,
				'projects/two/second.jsonl': `${A}\n${B}`,
			});
			const config = createMonitorConfig();
			const result = await runUsagePass({
				source: sourceFor(fixture.getPath('projects'), fixture.path),
				tracker: createSessionTracker(),
				config,
				now: new Date('2025-01-10T10:30:00Z'),
			});

			expect(result.entryCount).toBe(3);
			expect(result.snapshot?.session.tokensUsed).toBe(150);
			expect(result.snapshot?.session.entryCount).toBe(2);
			expect(result.snapshot?.timeline.map(point => point.tokensUsed)).toEqual([0, 100, 150]);
		});

		it('gives identical results for repeated passes over unchanged files', async () => {
			await using fixture = await createFixture({
				'projects/one/first.jsonl': `${B}\n${A}`,
				'projects/two/second.jsonl': A,
			});
			const config = createMonitorConfig();
			const now = new Date('2025-01-10T11:00:00Z');
			const source = sourceFor(fixture.getPath('projects'), fixture.path);
			const tracker = createSessionTracker();

			const first = await runUsagePass({ source, tracker, config, now });
			const second = await runUsagePass({ source, tracker, config, now });

			expect(second.snapshot).toEqual(first.snapshot);
			expect(tracker.history).toEqual([]);
		});

		it('moves the earlier window to history only once a later window replaces it', async () => {
			const config = createMonitorConfig();
			const tracker = createSessionTracker();
			const early = record('2025-01-10T00:00:00Z', 'msg_1', 'req_1', 100, 0);
			const late = record('2025-01-10T05:01:00Z', 'msg_2', 'req_2', 40, 0);

			await using fixture = await createFixture({ 'projects/p/s.jsonl': early });
			const source = sourceFor(fixture.getPath('projects'), fixture.path);

			const before = await runUsagePass({ source, tracker, config, now: new Date('2025-01-10T01:00:00Z') });
			expect(before.snapshot?.session.startTime).toEqual(new Date('2025-01-10T00:00:00Z'));
			expect(tracker.history).toEqual([]);

			const { appendFile } = await import('node:fs/promises');
			await appendFile(fixture.getPath('projects/p/s.jsonl'), `\n${late}`);

			const after = await runUsagePass({ source, tracker, config, now: new Date('2025-01-10T05:02:00Z') });
			expect(after.snapshot?.session.startTime).toEqual(new Date('2025-01-10T05:01:00Z'));
			expect(after.snapshot?.session.tokensUsed).toBe(40);
			expect(after.closedSession?.tokensUsed).toBe(100);
			expect(tracker.history.map(session => session.endTime)).toEqual([new Date('2025-01-10T05:00:00Z')]);
		});

		it('publishes no snapshot once the window has no entries', async () => {
			await using fixture = await createFixture({ 'projects/p/s.jsonl': `${A}\n${B}` });
			const config = createMonitorConfig();
			const tracker = createSessionTracker();
			const source = sourceFor(fixture.getPath('projects'), fixture.path);

			const observed = await runUsagePass({ source, tracker, config, now: new Date('2025-01-10T10:30:00Z') });
			expect(observed.snapshot?.session.tokensUsed).toBe(150);

			const { rm } = await import('node:fs/promises');
			await rm(fixture.getPath('projects/p/s.jsonl'));

			const empty = await runUsagePass({ source, tracker, config, now: new Date('2025-01-10T10:40:00Z') });
			expect(empty.snapshot).toBeNull();
			expect(empty.closedSession).toBeNull();
			expect(empty.entryCount).toBe(0);
			expect(tracker.current?.id).toBe('observed-1736503200');
			expect(tracker.history).toEqual([]);
		});

		it('breaks usage down by model', async () => {
			const opus = JSON.stringify({
				timestamp: '2025-01-10T10:20:00Z',
				requestId: 'req_c',
				message: { id: 'msg_c', model: 'claude-opus-4-20250514', usage: { input_tokens: 500, output_tokens: 100 } },
			});
			await using fixture = await createFixture({ 'projects/p/s.jsonl': `${A}\n${B}\n${opus}` });
			const result = await runUsagePass({
				source: sourceFor(fixture.getPath('projects'), fixture.path),
				tracker: createSessionTracker(),
				config: createMonitorConfig(),
				now: new Date('2025-01-10T10:30:00Z'),
			});

			expect(result.snapshot?.modelBreakdown).toEqual([
				{ model: 'claude-opus-4-20250514', tokensUsed: 600, entryCount: 1 },
				{ model: 'claude-sonnet-4-20250514', tokensUsed: 150, entryCount: 2 },
			]);
		});
	});

	describe('deriveUsageState', () => {
		it('produces no timeline without entries', () => {
			const { derivation, timeline } = deriveUsageState([], new Date(), createMonitorConfig());
			expect(derivation.state).toBe('inactive');
			expect(timeline).toEqual([]);
		});
	});
}
