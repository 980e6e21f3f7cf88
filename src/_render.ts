/**
 * @fileoverview Plain-text rendering of snapshots and session history
 *
 * Every function returns lines instead of writing them, so commands decide
 * where output goes and tests can compare text directly.
 *
 * @module _render
 */

import type { ModelUsage, ProjectedDepletion } from './_metrics.ts';
import type { SessionSnapshot } from './_pipeline.ts';
import type { ObservedSession } from './_session-derivation.ts';
import pc from 'picocolors';
import prettyMs from 'pretty-ms';
import { formatPlanType } from './_types.ts';

const PROGRESS_BAR_WIDTH = 30;
const SPARKLINE_WIDTH = 40;
const SPARK_CHARS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'] as const;
const LABEL_WIDTH = 11;

export function formatNumber(num: number): string {
	return num.toLocaleString('en-US');
}

/**
 * Whole minutes as `1h 30m`; anything under a minute is `0m`
 */
export function formatDuration(milliseconds: number): string {
	const minutes = Math.max(0, Math.round(milliseconds / 60_000));
	if (minutes === 0) {
		return '0m';
	}
	return prettyMs(minutes * 60_000, { unitCount: 2 });
}

export function formatModelName(modelName: string): string {
	// claude-sonnet-4-20250514 -> sonnet-4
	const match = modelName.match(/^claude-(\w+)-(\d+)-\d+$/);
	if (match?.[1] != null && match[2] != null) {
		return `${match[1]}-${match[2]}`;
	}
	return modelName;
}

const formatClock = (date: Date): string =>
	date.toLocaleTimeString('en-US', { hour: '2-digit', minute: '2-digit', hour12: false });

/**
 * `[████░░░░] 12.5%`, turning yellow at `warningThreshold` and red once full
 */
export function createProgressBar(
	value: number,
	max: number,
	{ width = PROGRESS_BAR_WIDTH, warningThreshold = 0.85 }: { width?: number; warningThreshold?: number } = {},
): string {
	const ratio = max > 0 ? Math.min(1, Math.max(0, value / max)) : 0;
	const filledWidth = Math.round(ratio * width);
	const color = ratio >= 1 ? pc.red : ratio >= warningThreshold ? pc.yellow : pc.green;

	const filled = color('█'.repeat(filledWidth));
	const empty = pc.dim('░'.repeat(width - filledWidth));
	return `[${filled}${empty}] ${(ratio * 100).toFixed(1)}%`;
}

/**
 * One character per sampled value, scaled to the largest value
 */
export function renderSparkline(values: readonly number[], width = SPARKLINE_WIDTH): string {
	if (values.length === 0) {
		return '';
	}

	const sampled = values.length <= width
		? values
		: Array.from({ length: width }, (_, index) => values[Math.floor(index * (values.length - 1) / (width - 1))] ?? 0);
	const max = Math.max(...sampled);
	const top = SPARK_CHARS.length - 1;

	return sampled
		.map(value => SPARK_CHARS[max > 0 ? Math.round((value / max) * top) : 0] ?? SPARK_CHARS[0])
		.join('');
}

export function formatDepletion(depletion: ProjectedDepletion, now: Date, resetTime: Date): string {
	switch (depletion.kind) {
		case 'now':
			return pc.red('limit reached');
		case 'unbounded':
			return 'not projected';
		case 'at':
			if (depletion.at.getTime() >= resetTime.getTime()) {
				return pc.green('after reset');
			}
			return pc.yellow(`in ${formatDuration(depletion.at.getTime() - now.getTime())} (${formatClock(depletion.at)})`);
	}
}

/**
 * `sonnet-4 1,200 (3)` per model, or the bare names when no breakdown is known
 */
export function formatModelBreakdown(breakdown: readonly ModelUsage[], models: readonly string[]): string {
	if (breakdown.length > 0) {
		return breakdown
			.map(usage => `${formatModelName(usage.model)} ${formatNumber(usage.tokensUsed)} (${usage.entryCount})`)
			.join(', ');
	}
	return models.length > 0 ? models.map(formatModelName).join(', ') : '-';
}

const row = (label: string, value: string): string => `${pc.gray(label.padEnd(LABEL_WIDTH))}${value}`;

/**
 * Status block for the current session
 */
export function renderSnapshot(snapshot: SessionSnapshot, { warningThreshold = 0.85 }: { warningThreshold?: number } = {}): string[] {
	const { session, metrics, timeline, modelBreakdown, generatedAt } = snapshot;
	const state = session.isActive ? pc.green('active') : pc.dim('ended');

	const lines = [
		`${pc.bold('Observed session')} ${session.id} (${formatPlanType(session.planType)}, ${state})`,
		row('Tokens', `${createProgressBar(session.tokensUsed, session.tokensLimit, { warningThreshold })}  ${formatNumber(session.tokensUsed)} / ${formatNumber(session.tokensLimit)}`),
		row('Time', `${createProgressBar(metrics.sessionProgress, 1, { warningThreshold: 1 })}  ${formatDuration(metrics.minutesElapsed * 60_000)} elapsed, ${formatDuration(metrics.minutesRemaining * 60_000)} left (resets ${formatClock(session.resetTime)})`),
		row('Burn rate', `${metrics.usageRate.toFixed(1)} tokens/min`),
		row('Efficiency', `${(metrics.efficiencyScore * 100).toFixed(0)}%`),
		row('Cache hit', `${(metrics.cacheHitRate * 100).toFixed(1)}%`),
		row('Depletion', formatDepletion(metrics.projectedDepletion, generatedAt, session.resetTime)),
		row('Models', formatModelBreakdown(modelBreakdown, session.models)),
	];

	if (timeline.length > 1) {
		lines.push(row('Usage', pc.cyan(renderSparkline(timeline.map(point => point.tokensUsed)))));
	}
	if (metrics.exceedsWarningThreshold) {
		lines.push(pc.yellow(`Token usage is at ${(metrics.limitUtilization * 100).toFixed(1)}% of the ${formatPlanType(session.planType)} limit`));
	}
	return lines;
}

export function renderWaiting(): string[] {
	return [
		pc.bold('No usage in the current window'),
		pc.dim('Waiting for new activity...'),
	];
}

const formatUtc = (date: Date): string => `${date.toISOString().slice(0, 16).replace('T', ' ')}Z`;

/**
 * One row per session, in the order given
 */
export function renderHistory(sessions: readonly ObservedSession[]): string[] {
	if (sessions.length === 0) {
		return [pc.dim('No observed sessions yet')];
	}

	const header = ['Started (UTC)'.padEnd(18), 'Plan'.padEnd(12), 'Tokens'.padStart(12), 'Limit'.padStart(12), 'Used'.padStart(8)].join('  ');
	const rows = sessions.map((session) => {
		const used = session.tokensLimit > 0 ? `${((session.tokensUsed / session.tokensLimit) * 100).toFixed(1)}%` : '-';
		return [
			formatUtc(session.startTime).padEnd(18),
			formatPlanType(session.planType).padEnd(12),
			formatNumber(session.tokensUsed).padStart(12),
			formatNumber(session.tokensLimit).padStart(12),
			used.padStart(8),
		].join('  ');
	});

	return [pc.bold(header), ...rows];
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { stripVTControlCharacters } = await import('node:util');
	const { createMonitorConfig } = await import('./_config.ts');
	const { createSnapshot } = await import('./_pipeline.ts');
	const { createModelName, createSessionId } = await import('./_types.ts');

	const plain = (lines: string[]): string[] => lines.map(line => stripVTControlCharacters(line));

	const session = (overrides: Partial<ObservedSession> = {}): ObservedSession => ({
		id: createSessionId('observed-1736503200'),
		startTime: new Date('2025-01-10T10:00:00Z'),
		resetTime: new Date('2025-01-10T15:00:00Z'),
		tokensUsed: 1200,
		tokensLimit: 40_000,
		planType: 'pro',
		isActive: true,
		endTime: null,
		tokenCounts: { inputTokens: 1000, outputTokens: 200, cacheCreationTokens: 0, cacheReadTokens: 0 },
		entryCount: 3,
		models: [createModelName('claude-sonnet-4-20250514')],
		...overrides,
	});

	describe('formatDuration', () => {
		it('rounds to whole minutes', () => {
			expect(formatDuration(5_400_000)).toBe('1h 30m');
			expect(formatDuration(3_600_000)).toBe('1h');
			expect(formatDuration(29_000)).toBe('0m');
			expect(formatDuration(-60_000)).toBe('0m');
		});
	});

	describe('createProgressBar', () => {
		it('fills in proportion to the value', () => {
			expect(stripVTControlCharacters(createProgressBar(10_000, 40_000, { width: 20 })))
				.toBe(`[${'█'.repeat(5)}${'░'.repeat(15)}] 25.0%`);
		});

		it('caps at full and handles a zero maximum', () => {
			expect(stripVTControlCharacters(createProgressBar(50, 40, { width: 4 }))).toBe('[████] 100.0%');
			expect(stripVTControlCharacters(createProgressBar(5, 0, { width: 4 }))).toBe('[░░░░] 0.0%');
		});
	});

	describe('renderSparkline', () => {
		it('scales values to the largest one', () => {
			expect(renderSparkline([0, 100, 150])).toBe('▁▆█');
		});

		it('samples long series down to the width', () => {
			expect(renderSparkline(Array.from({ length: 100 }, (_, index) => index), 5)).toHaveLength(5);
			expect(renderSparkline([])).toBe('');
		});
	});

	describe('renderSnapshot', () => {
		it('renders the session status block', () => {
			const now = new Date('2025-01-10T11:00:00Z');
			const snapshot = createSnapshot(session(), [], now, createMonitorConfig());
			const lines = plain(renderSnapshot(snapshot));

			expect(lines[0]).toBe('Observed session observed-1736503200 (Pro, active)');
			expect(lines[1]).toBe(`Tokens     [█${'░'.repeat(29)}] 3.0%  1,200 / 40,000`);
			expect(lines[2]?.startsWith(`Time       [${'█'.repeat(6)}${'░'.repeat(24)}] 20.0%  1h elapsed, 4h left`)).toBe(true);
			expect(lines.slice(3)).toEqual([
				'Burn rate  20.0 tokens/min',
				'Efficiency 100%',
				'Cache hit  0.0%',
				'Depletion  after reset',
				'Models     sonnet-4',
			]);
		});

		it('lists tokens and entries per model', () => {
			const snapshot = createSnapshot(session(), [], new Date('2025-01-10T11:00:00Z'), createMonitorConfig(), [
				{ model: createModelName('claude-opus-4-20250514'), tokensUsed: 900, entryCount: 1 },
				{ model: createModelName('claude-sonnet-4-20250514'), tokensUsed: 300, entryCount: 2 },
			]);
			expect(plain(renderSnapshot(snapshot)).at(-1)).toBe('Models     opus-4 900 (1), sonnet-4 300 (2)');
		});

		it('adds the usage trend and a warning near the limit', () => {
			const now = new Date('2025-01-10T11:00:00Z');
			const snapshot = createSnapshot(
				session({ tokensUsed: 36_000 }),
				[{ timestamp: new Date('2025-01-10T10:00:00Z'), tokensUsed: 0 }, { timestamp: now, tokensUsed: 36_000 }],
				now,
				createMonitorConfig(),
			);
			const lines = plain(renderSnapshot(snapshot));

			expect(lines.at(-2)).toBe('Usage      ▁█');
			expect(lines.at(-1)).toBe('Token usage is at 90.0% of the Pro limit');
		});
	});

	describe('renderHistory', () => {
		it('lists sessions in order', () => {
			const lines = plain(renderHistory([session({ endTime: new Date('2025-01-10T15:00:00Z'), isActive: false, planType: { custom: 5000 }, tokensLimit: 5000 })]));
			expect(lines).toEqual([
				'Started (UTC)       Plan                Tokens         Limit      Used',
				'2025-01-10 10:00Z   Custom(5000)         1,200         5,000     24.0%',
			]);
		});

		it('says so when there is no history', () => {
			expect(plain(renderHistory([]))).toEqual(['No observed sessions yet']);
		});
	});
}
