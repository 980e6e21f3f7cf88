import type { TupleToUnion } from 'type-fest';
import * as v from 'valibot';

/**
 * Branded Valibot schemas for identifiers read from usage records.
 */

export const modelNameSchema = v.pipe(
	v.string(),
	v.minLength(1, 'Model name cannot be empty'),
	v.brand('ModelName'),
);

export const messageIdSchema = v.pipe(
	v.string(),
	v.minLength(1, 'Message ID cannot be empty'),
	v.brand('MessageId'),
);

export const requestIdSchema = v.pipe(
	v.string(),
	v.minLength(1, 'Request ID cannot be empty'),
	v.brand('RequestId'),
);

export const sessionIdSchema = v.pipe(
	v.string(),
	v.regex(/^observed-\d+$/, 'Session ID must look like observed-<seconds>'),
	v.brand('SessionId'),
);

/**
 * RFC 3339 date-time, e.g. 2025-01-10T10:00:00Z or 2025-01-10T19:00:00.123+09:00
 */
const rfc3339Regex = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/i;
export const rfc3339DateSchema = v.pipe(
	v.string(),
	v.regex(rfc3339Regex, 'Timestamp must be RFC 3339'),
	v.transform(value => new Date(value)),
	v.check(date => !Number.isNaN(date.getTime()), 'Timestamp is out of range'),
);

export type ModelName = v.InferOutput<typeof modelNameSchema>;
export type MessageId = v.InferOutput<typeof messageIdSchema>;
export type RequestId = v.InferOutput<typeof requestIdSchema>;
export type SessionId = v.InferOutput<typeof sessionIdSchema>;

export const createModelName = (value: string): ModelName => v.parse(modelNameSchema, value);
export const createMessageId = (value: string): MessageId => v.parse(messageIdSchema, value);
export const createRequestId = (value: string): RequestId => v.parse(requestIdSchema, value);
export const createSessionId = (value: string): SessionId => v.parse(sessionIdSchema, value);

/**
 * Named subscription plans and their per-window token limits
 */
export const PLAN_NAMES = ['pro', 'max5', 'max20'] as const;
export type PlanName = TupleToUnion<typeof PLAN_NAMES>;

export const PLAN_TOKEN_LIMITS = {
	pro: 40_000,
	max5: 20_000,
	max20: 100_000,
} as const satisfies Record<PlanName, number>;

/**
 * A named plan or a custom per-window limit
 */
export type PlanType = PlanName | { custom: number };

/**
 * Plan requested by the user; `auto` infers it from the observed window
 */
export type PlanHint = PlanType | 'auto';

/**
 * Parses a plan argument such as `pro`, `max20`, `auto` or `custom:50000`
 */
export function parsePlanHint(value: string): PlanHint | undefined {
	const normalized = value.trim().toLowerCase();
	if (normalized === 'auto') {
		return 'auto';
	}
	const named = PLAN_NAMES.find(plan => plan === normalized);
	if (named != null) {
		return named;
	}
	const match = /^custom:(\d+)$/.exec(normalized);
	if (match?.[1] != null) {
		const limit = Number.parseInt(match[1], 10);
		return limit > 0 ? { custom: limit } : undefined;
	}
	return undefined;
}

/**
 * Human-readable plan label, e.g. `Max20` or `Custom(50000)`
 */
export function formatPlanType(plan: PlanType): string {
	switch (plan) {
		case 'pro':
			return 'Pro';
		case 'max5':
			return 'Max5';
		case 'max20':
			return 'Max20';
		default:
			return `Custom(${plan.custom})`;
	}
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;

	describe('parsePlanHint', () => {
		it('accepts named plans case-insensitively', () => {
			expect(parsePlanHint('Max20')).toBe('max20');
			expect(parsePlanHint(' pro ')).toBe('pro');
			expect(parsePlanHint('auto')).toBe('auto');
		});

		it('accepts custom limits', () => {
			expect(parsePlanHint('custom:50000')).toEqual({ custom: 50000 });
		});

		it('rejects unknown plans and zero limits', () => {
			expect(parsePlanHint('team')).toBeUndefined();
			expect(parsePlanHint('custom:0')).toBeUndefined();
		});
	});

	describe('rfc3339DateSchema', () => {
		it('parses offsets and fractional seconds', () => {
			const result = v.safeParse(rfc3339DateSchema, '2025-01-10T19:00:00.500+09:00');
			expect(result.success).toBe(true);
			if (result.success) {
				expect(result.output.toISOString()).toBe('2025-01-10T10:00:00.500Z');
			}
		});

		it('rejects dates without a zone', () => {
			expect(v.safeParse(rfc3339DateSchema, '2025-01-10T10:00:00').success).toBe(false);
			expect(v.safeParse(rfc3339DateSchema, '2025-01-10').success).toBe(false);
		});
	});

	it('formats plan labels', () => {
		expect(formatPlanType('max5')).toBe('Max5');
		expect(formatPlanType({ custom: 1234 })).toBe('Custom(1234)');
	});
}
