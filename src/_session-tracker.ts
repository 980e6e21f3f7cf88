/**
 * Session tracker holding the current observed session and the closed ones
 */

import type { ObservedSession } from './_session-derivation.ts';
import { logger } from './logger.ts';

export type SessionTracker = {
	readonly current: ObservedSession | null;
	/** Closed sessions, oldest first; never rewritten */
	readonly history: readonly ObservedSession[];
	/**
	 * Records the session derived in the latest pass
	 * @returns The session that was closed by this observation, if any
	 */
	observe: (derived: ObservedSession | null) => ObservedSession | null;
};

/**
 * Marks a superseded session as ended at its reset time
 */
export function closeSession(session: ObservedSession): ObservedSession {
	return Object.freeze({
		...session,
		isActive: false,
		endTime: session.endTime ?? session.resetTime,
	});
}

/**
 * Creates a tracker, optionally seeded from persisted state
 */
export function createSessionTracker(seed: {
	current?: ObservedSession | null;
	history?: readonly ObservedSession[];
} = {}): SessionTracker {
	let current: ObservedSession | null = seed.current ?? null;
	let history: readonly ObservedSession[] = Object.freeze([...(seed.history ?? [])].map(closeSession));

	return {
		get current() {
			return current;
		},
		get history() {
			return history;
		},
		observe(derived) {
			if (derived == null) {
				return null;
			}

			if (current == null) {
				current = derived;
				return null;
			}

			if (current.startTime.getTime() !== derived.startTime.getTime()) {
				const closed = closeSession(current);
				history = Object.freeze([...history, closed]);
				current = derived;
				logger.debug(`Closed observed session ${closed.id} with ${closed.tokensUsed} tokens`);
				return closed;
			}

			if (derived.tokensUsed < current.tokensUsed) {
				// Same window with fewer tokens means a log shrank; keep the tallies already reported
				logger.debug(`Usage for ${current.id} dropped from ${current.tokensUsed} to ${derived.tokensUsed}; keeping previous totals`);
				current = Object.freeze({
					...derived,
					tokensUsed: current.tokensUsed,
					tokensLimit: current.tokensLimit,
					planType: current.planType,
					tokenCounts: current.tokenCounts,
					entryCount: current.entryCount,
					models: current.models,
				});
				return null;
			}

			current = derived;
			return null;
		},
	};
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createSessionId } = await import('./_types.ts');

	const HOUR = 60 * 60 * 1000;
	const T0 = Date.UTC(2025, 0, 10, 0, 0, 0);

	const session = (startOffsetMs: number, tokensUsed: number): ObservedSession => ({
		id: createSessionId(`observed-${(T0 + startOffsetMs) / 1000}`),
		startTime: new Date(T0 + startOffsetMs),
		resetTime: new Date(T0 + startOffsetMs + 5 * HOUR),
		tokensUsed,
		tokensLimit: 40_000,
		planType: 'pro',
		isActive: true,
		endTime: null,
		tokenCounts: { inputTokens: tokensUsed, outputTokens: 0, cacheCreationTokens: 0, cacheReadTokens: 0 },
		entryCount: 1,
		models: [],
	});

	describe('createSessionTracker', () => {
		it('adopts the first derived session without history', () => {
			const tracker = createSessionTracker();
			expect(tracker.observe(session(0, 10))).toBeNull();
			expect(tracker.current?.tokensUsed).toBe(10);
			expect(tracker.history).toEqual([]);
		});

		it('closes the previous session when the window moves', () => {
			const tracker = createSessionTracker();
			tracker.observe(session(0, 100));
			const closed = tracker.observe(session(5 * HOUR + 60_000, 40));

			expect(closed?.endTime).toEqual(new Date(T0 + 5 * HOUR));
			expect(closed?.isActive).toBe(false);
			expect(tracker.history).toHaveLength(1);
			expect(tracker.history[0]?.tokensUsed).toBe(100);
			expect(Object.isFrozen(tracker.history)).toBe(true);
			expect(Object.isFrozen(tracker.history[0])).toBe(true);
			expect(tracker.current?.tokensUsed).toBe(40);
		});

		it('keeps the current session when a pass finds no entries', () => {
			const tracker = createSessionTracker();
			tracker.observe(session(0, 100));
			expect(tracker.observe(null)).toBeNull();
			expect(tracker.current?.tokensUsed).toBe(100);
		});

		it('never lowers the token count of an unchanged window', () => {
			const tracker = createSessionTracker();
			tracker.observe(session(0, 100));
			tracker.observe(session(0, 60));
			expect(tracker.current?.tokensUsed).toBe(100);
			tracker.observe(session(0, 130));
			expect(tracker.current?.tokensUsed).toBe(130);
		});

		it('keeps the plan of the retained totals when a window shrinks', () => {
			const tracker = createSessionTracker();
			tracker.observe({ ...session(0, 24_000), planType: 'max20', tokensLimit: 100_000 });
			tracker.observe({ ...session(0, 8000), planType: 'max5', tokensLimit: 20_000 });

			expect(tracker.current?.tokensUsed).toBe(24_000);
			expect(tracker.current?.planType).toBe('max20');
			expect(tracker.current?.tokensLimit).toBe(100_000);
		});

		it('treats seeded history as closed and appends after it', () => {
			const tracker = createSessionTracker({ current: session(10 * HOUR, 5), history: [session(0, 1)] });
			expect(tracker.history[0]?.endTime).toEqual(new Date(T0 + 5 * HOUR));
			tracker.observe(session(16 * HOUR, 7));
			expect(tracker.history.map(s => s.tokensUsed)).toEqual([1, 5]);
		});
	});
}
