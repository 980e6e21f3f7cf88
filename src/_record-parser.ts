/**
 * @fileoverview JSONL record parser
 *
 * Turns one untrusted log line into a {@link UsageEntry}. Size and nesting limits
 * are enforced before `JSON.parse` sees the line. Records that are valid JSON but
 * not usage events (summaries, tool results without usage) yield `null`.
 *
 * @module _record-parser
 */

import type { MessageId, ModelName, RequestId } from './_types.ts';
import { Result } from '@praha/byethrow';
import * as v from 'valibot';
import { MAX_JSON_DEPTH, MAX_LINE_BYTES, UNKNOWN_MODEL } from './_consts.ts';
import { MalformedRecordError } from './_errors.ts';
import {
	messageIdSchema,
	modelNameSchema,
	requestIdSchema,
	rfc3339DateSchema,
} from './_types.ts';

/**
 * Per-field token counts of one entry or aggregate
 */
export type TokenCounts = {
	inputTokens: number;
	outputTokens: number;
	cacheCreationTokens: number;
	cacheReadTokens: number;
};

/**
 * One validated usage event
 */
export type UsageEntry = Readonly<TokenCounts & {
	timestamp: Date;
	model: ModelName;
	messageId?: MessageId;
	requestId?: RequestId;
	/** Canonical path of the file the entry was read from */
	sourceFile: string;
	/** Position of the file in discovery order */
	fileIndex: number;
	/** 1-based line number within the file */
	lineNumber: number;
}>;

/**
 * Where a line came from
 */
export type RecordOrigin = {
	sourceFile: string;
	fileIndex: number;
	lineNumber: number;
};

const tokenCountSchema = v.optional(v.pipe(v.number(), v.integer(), v.minValue(0)), 0);

const usageSchema = v.object({
	input_tokens: tokenCountSchema,
	output_tokens: tokenCountSchema,
	cache_creation_input_tokens: tokenCountSchema,
	cache_read_input_tokens: tokenCountSchema,
});

const optionalIdSchema = v.optional(v.unknown());

/**
 * Loose view of a log record; only the fields used for usage are typed
 */
const recordSchema = v.looseObject({
	type: v.optional(v.unknown()),
	timestamp: v.optional(v.unknown()),
	model: optionalIdSchema,
	message_id: optionalIdSchema,
	requestId: optionalIdSchema,
	request_id: optionalIdSchema,
	usage: v.optional(v.unknown()),
	message: v.optional(v.unknown()),
});

const messageSchema = v.looseObject({
	id: optionalIdSchema,
	model: optionalIdSchema,
	usage: v.optional(v.unknown()),
});

/**
 * Maximum object/array nesting of a JSON text, stopping as soon as `limit` is exceeded.
 * Brackets inside string literals are ignored.
 * @returns The depth reached, or `limit + 1` when the text nests deeper
 */
export function measureJsonDepth(text: string, limit: number = MAX_JSON_DEPTH): number {
	let depth = 0;
	let maxDepth = 0;
	let inString = false;
	let escaped = false;

	for (let index = 0; index < text.length; index++) {
		const char = text.charCodeAt(index);
		if (inString) {
			if (escaped) {
				escaped = false;
			}
			else if (char === 0x5C /* \ */) {
				escaped = true;
			}
			else if (char === 0x22 /* " */) {
				inString = false;
			}
			continue;
		}

		if (char === 0x22) {
			inString = true;
		}
		else if (char === 0x7B /* { */ || char === 0x5B /* [ */) {
			depth++;
			if (depth > limit) {
				return limit + 1;
			}
			maxDepth = Math.max(maxDepth, depth);
		}
		else if (char === 0x7D /* } */ || char === 0x5D /* ] */) {
			depth--;
		}
	}

	return maxDepth;
}

function pickId<T>(schema: v.GenericSchema<string, T>, ...candidates: unknown[]): T | undefined {
	for (const candidate of candidates) {
		const parsed = v.safeParse(schema, candidate);
		if (parsed.success) {
			return parsed.output;
		}
	}
	return undefined;
}

function hasTokenFields(usage: unknown): boolean {
	return v.is(v.looseObject({}), usage) && ('input_tokens' in usage || 'output_tokens' in usage);
}

function malformed(reason: MalformedRecordError['reason'], message: string): Result.Result<never, MalformedRecordError> {
	return Result.fail(new MalformedRecordError(reason, message));
}

/**
 * Parses one JSONL line
 * @returns The entry, `null` for records that are not usage events, or a MalformedRecordError
 */
export function parseUsageLine(
	line: string,
	origin: RecordOrigin,
): Result.Result<UsageEntry | null, MalformedRecordError> {
	const size = Buffer.byteLength(line, 'utf8');
	if (size > MAX_LINE_BYTES) {
		return malformed('line-too-large', `line is ${size} bytes, above the ${MAX_LINE_BYTES} byte limit`);
	}

	if (measureJsonDepth(line) > MAX_JSON_DEPTH) {
		return malformed('too-deep', `nesting exceeds depth ${MAX_JSON_DEPTH}`);
	}

	const json = Result.try({
		try: () => JSON.parse(line) as unknown,
		catch: error => new MalformedRecordError('invalid-json', error instanceof Error ? error.message : String(error)),
	})();
	if (Result.isFailure(json)) {
		return json;
	}

	const record = v.safeParse(recordSchema, json.value);
	if (!record.success || Array.isArray(json.value)) {
		return malformed('not-an-object', 'record is not a JSON object');
	}
	const data = record.output;

	if (data.type === 'summary') {
		return Result.succeed(null);
	}

	const message = v.safeParse(messageSchema, data.message);
	const nested = message.success ? message.output : undefined;
	const rawUsage = hasTokenFields(nested?.usage) ? nested?.usage : data.usage;
	if (!hasTokenFields(rawUsage)) {
		return Result.succeed(null);
	}

	const usage = v.safeParse(usageSchema, rawUsage);
	if (!usage.success) {
		return malformed('invalid-usage', `invalid token counts: ${usage.issues.map(issue => issue.message).join('; ')}`);
	}

	const timestamp = v.safeParse(rfc3339DateSchema, data.timestamp);
	if (!timestamp.success) {
		return malformed('invalid-timestamp', 'missing or non-RFC 3339 timestamp');
	}

	const model = pickId(modelNameSchema, nested?.model, data.model)
		?? v.parse(modelNameSchema, UNKNOWN_MODEL);
	const messageId = pickId(messageIdSchema, nested?.id, data.message_id);
	const requestId = pickId(requestIdSchema, data.requestId, data.request_id);

	return Result.succeed(Object.freeze({
		timestamp: timestamp.output,
		model,
		inputTokens: usage.output.input_tokens,
		outputTokens: usage.output.output_tokens,
		cacheCreationTokens: usage.output.cache_creation_input_tokens,
		cacheReadTokens: usage.output.cache_read_input_tokens,
		...(messageId != null ? { messageId } : {}),
		...(requestId != null ? { requestId } : {}),
		...origin,
	}));
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;

	const origin: RecordOrigin = { sourceFile: '/data/session.jsonl', fileIndex: 0, lineNumber: 1 };

	const usageLine = (extra: Record<string, unknown> = {}): string => JSON.stringify({
		timestamp: '2025-01-10T10:00:00.000Z',
		requestId: 'req_1',
		message: {
			id: 'msg_1',
			model: 'claude-sonnet-4-20250514',
			usage: {
				input_tokens: 100,
				output_tokens: 50,
				cache_creation_input_tokens: 10,
				cache_read_input_tokens: 5,
			},
		},
		...extra,
	});

	const nestedArray = (depth: number): string => `${'['.repeat(depth)}${']'.repeat(depth)}`;

	describe('measureJsonDepth', () => {
		it('counts objects and arrays', () => {
			expect(measureJsonDepth('{"a":[{"b":1}]}')).toBe(3);
			expect(measureJsonDepth('42')).toBe(0);
		});

		it('ignores brackets inside strings, including escaped quotes', () => {
			expect(measureJsonDepth('{"a":"[[[{{{\\"]]]"}')).toBe(1);
		});

		it('stops at the first bracket past the limit', () => {
			expect(measureJsonDepth(nestedArray(1000), 32)).toBe(33);
		});
	});

	describe('parseUsageLine', () => {
		it('parses a usage event', () => {
			const result = parseUsageLine(usageLine(), origin);
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value).toEqual({
					timestamp: new Date('2025-01-10T10:00:00.000Z'),
					model: 'claude-sonnet-4-20250514',
					inputTokens: 100,
					outputTokens: 50,
					cacheCreationTokens: 10,
					cacheReadTokens: 5,
					messageId: 'msg_1',
					requestId: 'req_1',
					sourceFile: '/data/session.jsonl',
					fileIndex: 0,
					lineNumber: 1,
				});
				expect(Object.isFrozen(result.value)).toBe(true);
			}
		});

		it('accepts depth 31 and rejects depth 33', () => {
			// The outer record object is depth 1, so n nested arrays reach depth n + 1
			const shallow = parseUsageLine(usageLine({ extra: JSON.parse(nestedArray(30)) as unknown }), origin);
			expect(Result.isSuccess(shallow) && shallow.value?.inputTokens).toBe(100);

			const deep = parseUsageLine(usageLine({ extra: JSON.parse(nestedArray(32)) as unknown }), origin);
			expect(Result.isFailure(deep) && deep.error.reason).toBe('too-deep');
		});

		it('rejects a line one byte over 1 MiB', () => {
			const base = usageLine({ padding: '' });
			const padding = 'x'.repeat(MAX_LINE_BYTES + 1 - Buffer.byteLength(base, 'utf8'));
			const line = usageLine({ padding });
			expect(Buffer.byteLength(line, 'utf8')).toBe(MAX_LINE_BYTES + 1);

			const result = parseUsageLine(line, origin);
			expect(Result.isFailure(result) && result.error.reason).toBe('line-too-large');
		});

		it('reports invalid JSON and non-object records', () => {
			const broken = parseUsageLine('{"timestamp": ', origin);
			expect(Result.isFailure(broken) && broken.error.reason).toBe('invalid-json');

			const scalar = parseUsageLine('[1, 2]', origin);
			expect(Result.isFailure(scalar) && scalar.error.reason).toBe('not-an-object');
		});

		it('skips summaries and records without usage', () => {
			const summary = parseUsageLine(JSON.stringify({ type: 'summary', summary: 'Refactor', usage: { input_tokens: 1 } }), origin);
			expect(Result.isSuccess(summary) && summary.value).toBeNull();

			const userTurn = parseUsageLine(JSON.stringify({ type: 'user', timestamp: '2025-01-10T10:00:00Z', message: { role: 'user' } }), origin);
			expect(Result.isSuccess(userTurn) && userTurn.value).toBeNull();
		});

		it('rejects negative or fractional token counts', () => {
			const result = parseUsageLine(JSON.stringify({
				timestamp: '2025-01-10T10:00:00Z',
				message: { usage: { input_tokens: -1, output_tokens: 2.5 } },
			}), origin);
			expect(Result.isFailure(result) && result.error.reason).toBe('invalid-usage');
		});

		it('rejects a missing or malformed timestamp', () => {
			const missing = parseUsageLine(JSON.stringify({ message: { usage: { input_tokens: 1 } } }), origin);
			expect(Result.isFailure(missing) && missing.error.reason).toBe('invalid-timestamp');

			const local = parseUsageLine(usageLine({ timestamp: '2025-01-10 10:00' }), origin);
			expect(Result.isFailure(local) && local.error.reason).toBe('invalid-timestamp');
		});

		it('falls back to top-level fields and defaults missing cache counts', () => {
			const result = parseUsageLine(JSON.stringify({
				timestamp: '2025-01-10T10:00:00Z',
				model: 'claude-opus-4-20250514',
				message_id: 'msg_top',
				request_id: 'req_top',
				usage: { input_tokens: 7, output_tokens: 3 },
			}), origin);
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value).toMatchObject({
					model: 'claude-opus-4-20250514',
					messageId: 'msg_top',
					requestId: 'req_top',
					inputTokens: 7,
					outputTokens: 3,
					cacheCreationTokens: 0,
					cacheReadTokens: 0,
				});
			}
		});

		it('uses the unknown model and omits empty identifiers', () => {
			const result = parseUsageLine(JSON.stringify({
				timestamp: '2025-01-10T10:00:00Z',
				requestId: '',
				message: { id: '', usage: { output_tokens: 4 } },
			}), origin);
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result) && result.value != null) {
				expect(result.value.model).toBe('unknown');
				expect(result.value.messageId).toBeUndefined();
				expect(result.value.requestId).toBeUndefined();
				expect('messageId' in result.value).toBe(false);
			}
		});
	});
}
