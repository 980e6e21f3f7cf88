/**
 * @fileoverview Observed session derivation
 *
 * An observed session is the trailing window of usage ending at the latest
 * entry. Working backward from that entry, every entry less than one session
 * duration older (compared at session granularity) belongs to the window; the
 * window starts at the earliest of them. Entries dated further in the future
 * than the clock skew tolerance are set aside and never anchor a window.
 *
 * @module _session-derivation
 */

import type { MonitorConfig } from './_config.ts';
import type { TokenCounts, UsageEntry } from './_record-parser.ts';
import type { ModelName, PlanHint, PlanName, PlanType, SessionId } from './_types.ts';
import { uniq } from 'es-toolkit';
import { createSessionId, PLAN_TOKEN_LIMITS } from './_types.ts';

/**
 * Derived, read-only approximation of one usage window
 */
export type ObservedSession = Readonly<{
	id: SessionId;
	startTime: Date;
	resetTime: Date;
	tokensUsed: number;
	tokensLimit: number;
	planType: PlanType;
	/** Whether `now` was before `resetTime` when the session was derived */
	isActive: boolean;
	/** Set once a newer window supersedes this one */
	endTime: Date | null;
	tokenCounts: Readonly<TokenCounts>;
	entryCount: number;
	models: readonly ModelName[];
}>;

export type SessionDerivation =
	| Readonly<{
		state: 'inactive';
		skewedEntries: readonly UsageEntry[];
	}>
	| Readonly<{
		state: 'observed';
		session: ObservedSession;
		/** Entries inside the window, in timestamp order */
		windowEntries: readonly UsageEntry[];
		skewedEntries: readonly UsageEntry[];
	}>;

export type DerivationOptions = {
	now: Date;
	config: Pick<
		MonitorConfig,
		'planHint' | 'customLimits' | 'sessionDurationHours' | 'sessionGranularityMs' | 'clockSkewToleranceMs'
	>;
};

/**
 * Floors a timestamp to a multiple of `granularityMs`
 */
export function floorToGranularity(timestamp: Date, granularityMs: number): Date {
	return new Date(Math.floor(timestamp.getTime() / granularityMs) * granularityMs);
}

/**
 * Session duration in milliseconds, rounded down to a whole number of granules
 */
export function getSessionDurationMs(config: Pick<MonitorConfig, 'sessionDurationHours' | 'sessionGranularityMs'>): number {
	const granularityMs = config.sessionGranularityMs;
	const durationMs = config.sessionDurationHours * 60 * 60 * 1000;
	return Math.max(granularityMs, Math.floor(durationMs / granularityMs) * granularityMs);
}

export function sumTokenCounts(entries: readonly TokenCounts[]): TokenCounts {
	const totals: TokenCounts = {
		inputTokens: 0,
		outputTokens: 0,
		cacheCreationTokens: 0,
		cacheReadTokens: 0,
	};
	for (const entry of entries) {
		totals.inputTokens += entry.inputTokens;
		totals.outputTokens += entry.outputTokens;
		totals.cacheCreationTokens += entry.cacheCreationTokens;
		totals.cacheReadTokens += entry.cacheReadTokens;
	}
	return totals;
}

export function getTotalTokens(counts: TokenCounts): number {
	return counts.inputTokens + counts.outputTokens + counts.cacheCreationTokens + counts.cacheReadTokens;
}

/**
 * Infers the plan from how heavily the current window is used
 */
export function detectPlanType(tokensUsed: number, entryCount: number): PlanName {
	if (tokensUsed > 20_000) {
		return 'max20';
	}
	if (tokensUsed > 10_000 || entryCount > 20) {
		return 'pro';
	}
	return 'max5';
}

export function resolvePlanType(hint: PlanHint, tokensUsed: number, entryCount: number): PlanType {
	return hint === 'auto' ? detectPlanType(tokensUsed, entryCount) : hint;
}

export function getPlanTokenLimit(plan: PlanType, customLimits: MonitorConfig['customLimits'] = {}): number {
	if (typeof plan === 'object') {
		return plan.custom;
	}
	return customLimits[plan] ?? PLAN_TOKEN_LIMITS[plan];
}

/**
 * Derives the current observed session from entries sorted by timestamp
 */
export function deriveObservedSession(
	sortedEntries: readonly UsageEntry[],
	{ now, config }: DerivationOptions,
): SessionDerivation {
	const skewCutoff = now.getTime() + config.clockSkewToleranceMs;
	const accepted: UsageEntry[] = [];
	const skewedEntries: UsageEntry[] = [];
	for (const entry of sortedEntries) {
		(entry.timestamp.getTime() > skewCutoff ? skewedEntries : accepted).push(entry);
	}

	const latest = accepted.at(-1);
	if (latest == null) {
		return { state: 'inactive', skewedEntries };
	}

	const granularityMs = config.sessionGranularityMs;
	const durationMs = getSessionDurationMs(config);
	const lowerBound = floorToGranularity(latest.timestamp, granularityMs).getTime() - durationMs;

	let firstIndex = accepted.length - 1;
	while (firstIndex > 0) {
		const previous = accepted[firstIndex - 1];
		if (previous == null || floorToGranularity(previous.timestamp, granularityMs).getTime() <= lowerBound) {
			break;
		}
		firstIndex--;
	}

	const windowEntries = accepted.slice(firstIndex);
	const startTime = floorToGranularity(windowEntries[0]?.timestamp ?? latest.timestamp, granularityMs);
	const resetTime = new Date(startTime.getTime() + durationMs);
	const tokenCounts = sumTokenCounts(windowEntries);
	const tokensUsed = getTotalTokens(tokenCounts);
	const planType = resolvePlanType(config.planHint, tokensUsed, windowEntries.length);

	const session: ObservedSession = Object.freeze({
		id: createSessionId(`observed-${Math.floor(startTime.getTime() / 1000)}`),
		startTime,
		resetTime,
		tokensUsed,
		tokensLimit: getPlanTokenLimit(planType, config.customLimits),
		planType,
		isActive: now.getTime() < resetTime.getTime(),
		endTime: null,
		tokenCounts: Object.freeze(tokenCounts),
		entryCount: windowEntries.length,
		models: Object.freeze(uniq(windowEntries.map(entry => entry.model))),
	});

	return { state: 'observed', session, windowEntries, skewedEntries };
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createModelName } = await import('./_types.ts');
	const { createMonitorConfig } = await import('./_config.ts');

	const HOUR = 60 * 60 * 1000;
	const MINUTE = 60 * 1000;
	const T0 = Date.UTC(2025, 0, 10, 0, 0, 0);
	const config = createMonitorConfig();

	const entry = (offsetMs: number, tokens: number, lineNumber = 1): UsageEntry => ({
		timestamp: new Date(T0 + offsetMs),
		model: createModelName('claude-sonnet-4-20250514'),
		inputTokens: tokens,
		outputTokens: 0,
		cacheCreationTokens: 0,
		cacheReadTokens: 0,
		sourceFile: '/data/a.jsonl',
		fileIndex: 0,
		lineNumber,
	});

	describe('deriveObservedSession', () => {
		it('is inactive without entries', () => {
			const result = deriveObservedSession([], { now: new Date(T0), config });
			expect(result.state).toBe('inactive');
		});

		it('anchors a new window when the latest entry is more than five hours after the first', () => {
			const entries = [entry(0, 100), entry(5 * HOUR + MINUTE, 40, 2)];
			const result = deriveObservedSession(entries, { now: new Date(T0 + 5 * HOUR + 2 * MINUTE), config });
			expect(result.state).toBe('observed');
			if (result.state === 'observed') {
				expect(result.session.startTime).toEqual(new Date(T0 + 5 * HOUR + MINUTE));
				expect(result.session.resetTime).toEqual(new Date(T0 + 10 * HOUR + MINUTE));
				expect(result.session.tokensUsed).toBe(40);
				expect(result.session.id).toBe(`observed-${(T0 + 5 * HOUR + MINUTE) / 1000}`);
				expect(result.windowEntries).toHaveLength(1);
			}
		});

		it('keeps an entry just under five hours old in the window', () => {
			const entries = [entry(0, 100), entry(5 * HOUR - 1000, 40, 2)];
			const result = deriveObservedSession(entries, { now: new Date(T0 + 5 * HOUR), config });
			expect(result.state === 'observed' && result.session.tokensUsed).toBe(140);
			expect(result.state === 'observed' && result.session.startTime).toEqual(new Date(T0));
		});

		it('excludes an entry exactly five hours older than the latest', () => {
			const entries = [entry(0, 100), entry(5 * HOUR, 40, 2)];
			const result = deriveObservedSession(entries, { now: new Date(T0 + 5 * HOUR), config });
			expect(result.state === 'observed' && result.session.tokensUsed).toBe(40);
		});

		it('sets aside entries beyond the clock skew tolerance', () => {
			const now = new Date(T0 + HOUR);
			const entries = [entry(0, 100), entry(HOUR + 30 * 1000, 10, 2), entry(3 * HOUR, 999, 3)];
			const result = deriveObservedSession(entries, { now, config });
			expect(result.state).toBe('observed');
			if (result.state === 'observed') {
				expect(result.session.tokensUsed).toBe(110);
				expect(result.skewedEntries.map(e => e.inputTokens)).toEqual([999]);
			}
		});

		it('is inactive when every entry is in the future', () => {
			const result = deriveObservedSession([entry(2 * HOUR, 10)], { now: new Date(T0), config });
			expect(result.state).toBe('inactive');
			expect(result.skewedEntries).toHaveLength(1);
		});

		it('floors the start to whole seconds', () => {
			const result = deriveObservedSession([entry(1500, 10)], { now: new Date(T0 + MINUTE), config });
			expect(result.state === 'observed' && result.session.startTime).toEqual(new Date(T0 + 1000));
		});

		it('reports isActive from now versus reset time', () => {
			const result = deriveObservedSession([entry(0, 10)], { now: new Date(T0 + 6 * HOUR), config });
			expect(result.state === 'observed' && result.session.isActive).toBe(false);
		});

		it('uses the plan hint or detects the plan', () => {
			const small = deriveObservedSession([entry(0, 5_000)], { now: new Date(T0), config });
			expect(small.state === 'observed' && small.session.planType).toBe('max5');
			expect(small.state === 'observed' && small.session.tokensLimit).toBe(20_000);

			const fixed = deriveObservedSession([entry(0, 5_000)], {
				now: new Date(T0),
				config: createMonitorConfig({ planHint: 'pro', customLimits: { pro: 55_000 } }),
			});
			expect(fixed.state === 'observed' && fixed.session.tokensLimit).toBe(55_000);
		});

		it('matches a brute-force window sum on random inputs', () => {
			let seed = 42;
			const random = (): number => {
				seed = (seed * 1_103_515_245 + 12_345) % 2_147_483_648;
				return seed / 2_147_483_648;
			};

			for (let round = 0; round < 200; round++) {
				const count = 1 + Math.floor(random() * 30);
				const entries = Array.from({ length: count }, (_, index) =>
					entry(Math.floor(random() * 24 * HOUR), 1 + Math.floor(random() * 1000), index + 1))
					.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
				const now = new Date(T0 + 24 * HOUR);

				const result = deriveObservedSession(entries, { now, config });
				expect(result.state).toBe('observed');
				if (result.state !== 'observed') {
					continue;
				}

				const start = result.session.startTime.getTime();
				const expected = entries
					.filter(e => e.timestamp.getTime() >= start && e.timestamp.getTime() < start + 5 * HOUR)
					.reduce((sum, e) => sum + e.inputTokens, 0);
				expect(result.session.tokensUsed).toBe(expected);
				expect(result.windowEntries.at(-1)).toBe(entries.at(-1));
			}
		});
	});

	describe('detectPlanType', () => {
		it('follows the usage thresholds', () => {
			expect(detectPlanType(20_001, 1)).toBe('max20');
			expect(detectPlanType(10_001, 1)).toBe('pro');
			expect(detectPlanType(100, 21)).toBe('pro');
			expect(detectPlanType(100, 20)).toBe('max5');
		});
	});
}
