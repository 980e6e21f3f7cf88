/**
 * @fileoverview Persistence of observed sessions
 *
 * Sessions are stored as a JSON array of snake_case records so the file stays
 * readable by other tools. Reads are validated; an unreadable file is treated
 * as empty state.
 *
 * @module _session-store
 */

import type { ObservedSession } from './_session-derivation.ts';
import type { PlanType } from './_types.ts';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import { sort } from 'fast-sort';
import * as v from 'valibot';
import { DEFAULT_STATE_DIR, SESSION_STATE_FILE_NAME } from './_consts.ts';
import { modelNameSchema, rfc3339DateSchema, sessionIdSchema } from './_types.ts';
import { logger } from './logger.ts';

const countSchema = v.pipe(v.number(), v.integer(), v.minValue(0));

const planTypeRecordSchema = v.union([
	v.picklist(['Pro', 'Max5', 'Max20']),
	v.object({ Custom: v.pipe(countSchema, v.minValue(1)) }),
]);

const sessionRecordSchema = v.object({
	id: sessionIdSchema,
	plan_type: planTypeRecordSchema,
	tokens_used: countSchema,
	tokens_limit: countSchema,
	start_time: rfc3339DateSchema,
	reset_time: rfc3339DateSchema,
	is_active: v.boolean(),
	end_time: v.nullable(rfc3339DateSchema),
	token_counts: v.optional(v.object({
		input_tokens: countSchema,
		output_tokens: countSchema,
		cache_creation_tokens: countSchema,
		cache_read_tokens: countSchema,
	})),
	entry_count: v.optional(countSchema),
	models: v.optional(v.array(modelNameSchema)),
});

const sessionFileSchema = v.array(sessionRecordSchema);

type PlanTypeRecord = v.InferInput<typeof planTypeRecordSchema>;
type SessionRecord = v.InferInput<typeof sessionRecordSchema>;

export type StoredSessions = {
	current: ObservedSession | null;
	history: ObservedSession[];
};

export type SessionStore = {
	readonly filePath: string;
	load: () => Promise<StoredSessions>;
	save: (state: { current: ObservedSession | null; history: readonly ObservedSession[] }) => Promise<void>;
};

function toPlanTypeRecord(plan: PlanType): PlanTypeRecord {
	switch (plan) {
		case 'pro':
			return 'Pro';
		case 'max5':
			return 'Max5';
		case 'max20':
			return 'Max20';
		default:
			return { Custom: plan.custom };
	}
}

function fromPlanTypeRecord(plan: v.InferOutput<typeof planTypeRecordSchema>): PlanType {
	switch (plan) {
		case 'Pro':
			return 'pro';
		case 'Max5':
			return 'max5';
		case 'Max20':
			return 'max20';
		default:
			return { custom: plan.Custom };
	}
}

export function toSessionRecord(session: ObservedSession): SessionRecord {
	return {
		id: session.id,
		plan_type: toPlanTypeRecord(session.planType),
		tokens_used: session.tokensUsed,
		tokens_limit: session.tokensLimit,
		start_time: session.startTime.toISOString(),
		reset_time: session.resetTime.toISOString(),
		is_active: session.isActive,
		end_time: session.endTime?.toISOString() ?? null,
		token_counts: {
			input_tokens: session.tokenCounts.inputTokens,
			output_tokens: session.tokenCounts.outputTokens,
			cache_creation_tokens: session.tokenCounts.cacheCreationTokens,
			cache_read_tokens: session.tokenCounts.cacheReadTokens,
		},
		entry_count: session.entryCount,
		models: [...session.models],
	};
}

function fromSessionRecord(record: v.InferOutput<typeof sessionRecordSchema>): ObservedSession {
	const counts = record.token_counts;
	return Object.freeze({
		id: record.id,
		startTime: record.start_time,
		resetTime: record.reset_time,
		tokensUsed: record.tokens_used,
		tokensLimit: record.tokens_limit,
		planType: fromPlanTypeRecord(record.plan_type),
		isActive: record.is_active,
		endTime: record.end_time,
		tokenCounts: Object.freeze({
			inputTokens: counts?.input_tokens ?? 0,
			outputTokens: counts?.output_tokens ?? 0,
			cacheCreationTokens: counts?.cache_creation_tokens ?? 0,
			cacheReadTokens: counts?.cache_read_tokens ?? 0,
		}),
		entryCount: record.entry_count ?? 0,
		models: Object.freeze(record.models ?? []),
	});
}

/**
 * Splits stored records into history (ended sessions) and the last open session
 */
export function parseStoredSessions(data: unknown): Result.Result<StoredSessions, Error> {
	const parsed = v.safeParse(sessionFileSchema, data);
	if (!parsed.success) {
		return Result.fail(new Error(parsed.issues.map(issue => issue.message).join('; ')));
	}

	const history: ObservedSession[] = [];
	let current: ObservedSession | null = null;
	for (const record of parsed.output) {
		const session = fromSessionRecord(record);
		if (session.endTime != null) {
			history.push(session);
		}
		else {
			current = session;
		}
	}
	return Result.succeed({ current, history });
}

/**
 * The `limit` most recently started sessions, newest first
 */
export function listRecentSessions({ current, history }: StoredSessions, limit: number): ObservedSession[] {
	const sessions = current != null ? [...history, current] : [...history];
	return sort(sessions).desc(session => session.startTime.getTime()).slice(0, limit);
}

export function createSessionStore(
	filePath: string = path.join(DEFAULT_STATE_DIR, SESSION_STATE_FILE_NAME),
): SessionStore {
	return {
		filePath,
		async load() {
			const content = await Result.try({
				try: async () => readFile(filePath, 'utf-8'),
				catch: error => error,
			})();
			if (Result.isFailure(content)) {
				logger.debug(`No stored sessions at ${filePath}`);
				return { current: null, history: [] };
			}

			const stored = Result.pipe(
				Result.try({
					try: () => JSON.parse(content.value) as unknown,
					catch: error => error instanceof Error ? error : new Error(String(error)),
				})(),
				Result.andThen(parseStoredSessions),
			);
			if (Result.isFailure(stored)) {
				logger.warn(`Ignoring stored sessions at ${filePath}: ${stored.error.message}`);
				return { current: null, history: [] };
			}
			return stored.value;
		},
		async save({ current, history }) {
			const records = [...history, ...(current != null ? [current] : [])].map(toSessionRecord);
			await mkdir(path.dirname(filePath), { recursive: true });
			const temporaryPath = `${filePath}.${process.pid}.tmp`;
			await writeFile(temporaryPath, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
			await rename(temporaryPath, filePath);
		},
	};
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createFixture } = await import('fs-fixture');
	const { createModelName } = await import('./_types.ts');
	const { closeSession } = await import('./_session-tracker.ts');

	const HOUR = 60 * 60 * 1000;
	const T0 = Date.UTC(2025, 0, 10, 0, 0, 0);

	const session = (startOffsetMs: number, tokensUsed: number, planType: PlanType): ObservedSession => ({
		id: v.parse(sessionIdSchema, `observed-${(T0 + startOffsetMs) / 1000}`),
		startTime: new Date(T0 + startOffsetMs),
		resetTime: new Date(T0 + startOffsetMs + 5 * HOUR),
		tokensUsed,
		tokensLimit: 40_000,
		planType,
		isActive: true,
		endTime: null,
		tokenCounts: { inputTokens: tokensUsed, outputTokens: 0, cacheCreationTokens: 0, cacheReadTokens: 0 },
		entryCount: 2,
		models: [createModelName('claude-sonnet-4-20250514')],
	});

	describe('createSessionStore', () => {
		it('saves and restores history and the current session', async () => {
			await using fixture = await createFixture({});
			const store = createSessionStore(fixture.getPath('state/observed_sessions.json'));
			const closed = closeSession(session(0, 100, { custom: 5000 }));
			const current = session(6 * HOUR, 40, 'max20');

			await store.save({ current, history: [closed] });
			const loaded = await store.load();

			expect(loaded.history).toEqual([closed]);
			expect(loaded.current).toEqual(current);
		});

		it('writes the documented record shape', async () => {
			await using fixture = await createFixture({});
			const store = createSessionStore(fixture.getPath('observed_sessions.json'));
			await store.save({ current: null, history: [closeSession(session(0, 100, 'pro'))] });

			const raw = JSON.parse(await readFile(fixture.getPath('observed_sessions.json'), 'utf-8')) as unknown;
			expect(raw).toEqual([{
				id: `observed-${T0 / 1000}`,
				plan_type: 'Pro',
				tokens_used: 100,
				tokens_limit: 40_000,
				start_time: '2025-01-10T00:00:00.000Z',
				reset_time: '2025-01-10T05:00:00.000Z',
				is_active: false,
				end_time: '2025-01-10T05:00:00.000Z',
				token_counts: { input_tokens: 100, output_tokens: 0, cache_creation_tokens: 0, cache_read_tokens: 0 },
				entry_count: 2,
				models: ['claude-sonnet-4-20250514'],
			}]);
		});

		it('reads minimal records without breakdowns', async () => {
			await using fixture = await createFixture({
				'observed_sessions.json': JSON.stringify([{
					id: 'observed-1736467200',
					plan_type: { Custom: 1234 },
					tokens_used: 10,
					tokens_limit: 1234,
					start_time: '2025-01-10T00:00:00Z',
					reset_time: '2025-01-10T05:00:00Z',
					is_active: true,
					end_time: null,
				}]),
			});
			const loaded = await createSessionStore(fixture.getPath('observed_sessions.json')).load();
			expect(loaded.history).toEqual([]);
			expect(loaded.current?.planType).toEqual({ custom: 1234 });
			expect(loaded.current?.tokenCounts.inputTokens).toBe(0);
		});

		it('lists the most recent sessions first', () => {
			const history = [0, 6, 12].map(hours => closeSession(session(hours * HOUR, hours * 10, 'pro')));
			const current = session(18 * HOUR, 500, 'pro');

			expect(listRecentSessions({ current, history }, 2).map(item => item.tokensUsed)).toEqual([500, 120]);
			expect(listRecentSessions({ current: null, history }, 10).map(item => item.tokensUsed)).toEqual([120, 60, 0]);
		});

		it('treats missing or invalid files as empty', async () => {
			await using fixture = await createFixture({
				'broken.json': '[{"id": ',
				'wrong.json': JSON.stringify([{ id: 'session-1' }]),
			});
			for (const name of ['missing.json', 'broken.json', 'wrong.json']) {
				const loaded = await createSessionStore(fixture.getPath(name)).load();
				expect(loaded).toEqual({ current: null, history: [] });
			}
		});
	});
}
