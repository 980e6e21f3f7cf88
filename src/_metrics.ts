/**
 * @fileoverview Usage metrics for an observed session
 *
 * Metrics are a pure function of the session and the current time; nothing is
 * carried over between ticks.
 *
 * @module _metrics
 */

import type { MonitorConfig } from './_config.ts';
import type { UsageEntry } from './_record-parser.ts';
import type { ObservedSession } from './_session-derivation.ts';
import type { ModelName } from './_types.ts';
import { sort } from 'fast-sort';
import { MAX_TIMELINE_POINTS, SAMPLED_TIMELINE_POINTS } from './_consts.ts';
import { getSessionDurationMs, getTotalTokens } from './_session-derivation.ts';

/**
 * Usage rates at or below this are treated as zero
 */
const RATE_EPSILON = 1e-9;

export type ProjectedDepletion =
	| { kind: 'at'; at: Date }
	| { kind: 'now' }
	| { kind: 'unbounded' };

export type UsageMetrics = Readonly<{
	/** Tokens per minute since the window started */
	usageRate: number;
	/** Fraction of the window elapsed, 0-1 */
	sessionProgress: number;
	/** How far below the even-pace rate usage runs, 0-1 */
	efficiencyScore: number;
	projectedDepletion: ProjectedDepletion;
	cacheHitRate: number;
	/** Cache creation tokens per minute */
	cacheCreationRate: number;
	minutesElapsed: number;
	minutesRemaining: number;
	limitUtilization: number;
	exceedsWarningThreshold: boolean;
	inputOutputRatio: number;
}>;

export type UsagePoint = Readonly<{
	timestamp: Date;
	tokensUsed: number;
}>;

export type ModelUsage = Readonly<{
	model: ModelName;
	tokensUsed: number;
	entryCount: number;
}>;

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export function projectDepletion(
	tokensUsed: number,
	tokensLimit: number,
	usageRate: number,
	now: Date,
): ProjectedDepletion {
	if (tokensUsed >= tokensLimit) {
		return { kind: 'now' };
	}
	if (usageRate <= RATE_EPSILON) {
		return { kind: 'unbounded' };
	}
	const minutesLeft = (tokensLimit - tokensUsed) / usageRate;
	return { kind: 'at', at: new Date(now.getTime() + minutesLeft * 60_000) };
}

/**
 * Calculates all metrics for `session` as of `now`
 */
export function calculateUsageMetrics(
	session: ObservedSession,
	now: Date,
	config: Pick<MonitorConfig, 'warningThreshold' | 'sessionDurationHours' | 'sessionGranularityMs'>,
): UsageMetrics {
	const sessionMinutes = getSessionDurationMs(config) / 60_000;
	const minutesElapsed = (now.getTime() - session.startTime.getTime()) / 60_000;
	const minutesForRates = Math.max(1, minutesElapsed);
	const usageRate = session.tokensUsed / minutesForRates;

	const evenPaceRate = session.tokensLimit / sessionMinutes;
	const efficiencyScore = usageRate === 0 ? 1 : clamp(evenPaceRate / usageRate, 0, 1);

	const { inputTokens, outputTokens, cacheCreationTokens, cacheReadTokens } = session.tokenCounts;
	const limitUtilization = session.tokensLimit > 0 ? session.tokensUsed / session.tokensLimit : 0;

	return Object.freeze({
		usageRate,
		sessionProgress: clamp(minutesElapsed / sessionMinutes, 0, 1),
		efficiencyScore,
		projectedDepletion: projectDepletion(session.tokensUsed, session.tokensLimit, usageRate, now),
		cacheHitRate: cacheReadTokens / Math.max(1, inputTokens + cacheReadTokens),
		cacheCreationRate: cacheCreationTokens / minutesForRates,
		minutesElapsed,
		minutesRemaining: Math.max(0, (session.resetTime.getTime() - now.getTime()) / 60_000),
		limitUtilization,
		exceedsWarningThreshold: limitUtilization >= config.warningThreshold,
		inputOutputRatio: outputTokens > 0 ? inputTokens / outputTokens : 0,
	});
}

/**
 * Cumulative usage over the window, starting at zero at the window start.
 * Long series are thinned to roughly {@link SAMPLED_TIMELINE_POINTS} points, always keeping the last one.
 */
export function buildUsageTimeline(windowEntries: readonly UsageEntry[], startTime: Date): UsagePoint[] {
	const points: UsagePoint[] = [{ timestamp: startTime, tokensUsed: 0 }];
	let cumulative = 0;
	for (const entry of windowEntries) {
		cumulative += getTotalTokens(entry);
		points.push({ timestamp: entry.timestamp, tokensUsed: cumulative });
	}

	if (points.length <= MAX_TIMELINE_POINTS) {
		return points;
	}

	const step = Math.ceil(points.length / SAMPLED_TIMELINE_POINTS);
	const sampled = points.filter((_, index) => index % step === 0);
	const last = points.at(-1);
	if (last != null && sampled.at(-1) !== last) {
		sampled.push(last);
	}
	return sampled;
}

/**
 * Tokens and entry count per model, largest first; ties are ordered by model name
 */
export function buildModelBreakdown(windowEntries: readonly UsageEntry[]): ModelUsage[] {
	const byModel = new Map<ModelName, { tokensUsed: number; entryCount: number }>();
	for (const entry of windowEntries) {
		const usage = byModel.get(entry.model) ?? { tokensUsed: 0, entryCount: 0 };
		usage.tokensUsed += getTotalTokens(entry);
		usage.entryCount += 1;
		byModel.set(entry.model, usage);
	}

	const breakdown = Array.from(byModel, ([model, usage]) => Object.freeze({ model, ...usage }));
	return sort(breakdown).by([
		{ desc: usage => usage.tokensUsed },
		{ asc: usage => usage.model },
	]);
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createMonitorConfig } = await import('./_config.ts');
	const { createModelName, createSessionId } = await import('./_types.ts');

	const T0 = Date.UTC(2025, 0, 10, 0, 0, 0);
	const MINUTE = 60_000;
	const config = createMonitorConfig();

	const session = (overrides: Partial<ObservedSession> = {}): ObservedSession => ({
		id: createSessionId(`observed-${T0 / 1000}`),
		startTime: new Date(T0),
		resetTime: new Date(T0 + 300 * MINUTE),
		tokensUsed: 6_000,
		tokensLimit: 40_000,
		planType: 'pro',
		isActive: true,
		endTime: null,
		tokenCounts: { inputTokens: 3_000, outputTokens: 1_500, cacheCreationTokens: 500, cacheReadTokens: 1_000 },
		entryCount: 4,
		models: [],
		...overrides,
	});

	describe('calculateUsageMetrics', () => {
		it('computes rates one hour into the window', () => {
			const metrics = calculateUsageMetrics(session(), new Date(T0 + 60 * MINUTE), config);
			expect(metrics.minutesElapsed).toBe(60);
			expect(metrics.usageRate).toBe(100);
			expect(metrics.sessionProgress).toBeCloseTo(0.2);
			expect(metrics.efficiencyScore).toBe(1);
			expect(metrics.cacheHitRate).toBe(0.25);
			expect(metrics.cacheCreationRate).toBeCloseTo(500 / 60);
			expect(metrics.minutesRemaining).toBe(240);
			expect(metrics.limitUtilization).toBe(0.15);
			expect(metrics.exceedsWarningThreshold).toBe(false);
			expect(metrics.inputOutputRatio).toBe(2);
			// (40000 - 6000) / 100 = 340 minutes ahead
			expect(metrics.projectedDepletion).toEqual({ kind: 'at', at: new Date(T0 + 400 * MINUTE) });
		});

		it('scores efficiency against the even-pace rate', () => {
			const metrics = calculateUsageMetrics(session({ tokensUsed: 16_000 }), new Date(T0 + 60 * MINUTE), config);
			// even pace 40000 / 300 = 133.33, rate 266.67
			expect(metrics.efficiencyScore).toBeCloseTo(0.5);
		});

		it('gives full efficiency and unbounded depletion with no usage', () => {
			const metrics = calculateUsageMetrics(
				session({ tokensUsed: 0, tokenCounts: { inputTokens: 0, outputTokens: 0, cacheCreationTokens: 0, cacheReadTokens: 0 } }),
				new Date(T0 + 10 * MINUTE),
				config,
			);
			expect(metrics.usageRate).toBe(0);
			expect(metrics.efficiencyScore).toBe(1);
			expect(metrics.projectedDepletion).toEqual({ kind: 'unbounded' });
			expect(metrics.cacheHitRate).toBe(0);
			expect(metrics.inputOutputRatio).toBe(0);
		});

		it('reports depletion now once the limit is reached', () => {
			const metrics = calculateUsageMetrics(session({ tokensUsed: 40_000 }), new Date(T0 + 60 * MINUTE), config);
			expect(metrics.projectedDepletion).toEqual({ kind: 'now' });
			expect(metrics.exceedsWarningThreshold).toBe(true);
		});

		it('uses at least one minute for rates and clamps progress', () => {
			const early = calculateUsageMetrics(session(), new Date(T0 + 10_000), config);
			expect(early.usageRate).toBe(6_000);

			const late = calculateUsageMetrics(session(), new Date(T0 + 400 * MINUTE), config);
			expect(late.sessionProgress).toBe(1);
			expect(late.minutesRemaining).toBe(0);

			const skewed = calculateUsageMetrics(session(), new Date(T0 - MINUTE), config);
			expect(skewed.sessionProgress).toBe(0);
		});
	});

	describe('buildUsageTimeline', () => {
		const entry = (minute: number, tokens: number): UsageEntry => ({
			timestamp: new Date(T0 + minute * MINUTE),
			model: createModelName('claude-sonnet-4-20250514'),
			inputTokens: tokens,
			outputTokens: 0,
			cacheCreationTokens: 0,
			cacheReadTokens: 0,
			sourceFile: '/data/a.jsonl',
			fileIndex: 0,
			lineNumber: minute + 1,
		});

		it('accumulates from zero at the window start', () => {
			const timeline = buildUsageTimeline([entry(1, 10), entry(2, 5)], new Date(T0));
			expect(timeline.map(point => point.tokensUsed)).toEqual([0, 10, 15]);
			expect(timeline[0]?.timestamp).toEqual(new Date(T0));
		});

		it('samples long series and keeps the final point', () => {
			const entries = Array.from({ length: 150 }, (_, index) => entry(index, 1));
			const timeline = buildUsageTimeline(entries, new Date(T0));
			// 151 points, step 4: indices 0, 4, ..., 148 plus the last point
			expect(timeline).toHaveLength(39);
			expect(timeline.at(-1)?.tokensUsed).toBe(150);
		});
	});

	describe('buildModelBreakdown', () => {
		const entry = (model: string, inputTokens: number, outputTokens: number): UsageEntry => ({
			timestamp: new Date(T0),
			model: createModelName(model),
			inputTokens,
			outputTokens,
			cacheCreationTokens: 0,
			cacheReadTokens: 0,
			sourceFile: '/data/a.jsonl',
			fileIndex: 0,
			lineNumber: 1,
		});

		it('totals tokens and entries per model, largest first', () => {
			const breakdown = buildModelBreakdown([
				entry('claude-sonnet-4-20250514', 100, 20),
				entry('claude-opus-4-20250514', 300, 50),
				entry('claude-sonnet-4-20250514', 200, 30),
				entry('claude-haiku-3-20240307', 10, 0),
			]);

			expect(breakdown).toEqual([
				{ model: 'claude-opus-4-20250514', tokensUsed: 350, entryCount: 1 },
				{ model: 'claude-sonnet-4-20250514', tokensUsed: 350, entryCount: 2 },
				{ model: 'claude-haiku-3-20240307', tokensUsed: 10, entryCount: 1 },
			]);
		});

		it('is empty without entries', () => {
			expect(buildModelBreakdown([])).toEqual([]);
		});
	});
}
