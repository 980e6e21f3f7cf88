import { define } from 'gunshi';
import { renderHistory } from '../_render.ts';
import { createSessionStore, listRecentSessions, toSessionRecord } from '../_session-store.ts';
import { sharedArgs } from '../_shared-args.ts';
import { log } from '../logger.ts';
import { applyLogLevel } from './_context.ts';

const DEFAULT_HISTORY_LIMIT = 10;

export function parseLimitArg(value: string): number {
	const limit = Number(value);
	if (!Number.isInteger(limit) || limit < 1) {
		throw new TypeError(`Invalid limit: ${value}. Must be a positive integer.`);
	}
	return limit;
}

export const historyCommand = define({
	name: 'history',
	description: 'List stored observed sessions, newest first',
	args: {
		stateFile: sharedArgs.stateFile,
		limit: {
			type: 'custom',
			short: 'l',
			description: `Number of sessions to list (default: ${DEFAULT_HISTORY_LIMIT})`,
			parse: parseLimitArg,
			default: DEFAULT_HISTORY_LIMIT,
		},
		json: sharedArgs.json,
		debug: sharedArgs.debug,
	},
	toKebab: true,
	async run(ctx) {
		applyLogLevel({ debug: ctx.values.debug, quiet: ctx.values.json });

		const stored = await createSessionStore(ctx.values.stateFile).load();
		const sessions = listRecentSessions(stored, ctx.values.limit);

		if (ctx.values.json) {
			log(JSON.stringify({ sessions: sessions.map(toSessionRecord) }, null, 2));
			return;
		}
		log(renderHistory(sessions).join('\n'));
	},
});

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;

	describe('parseLimitArg', () => {
		it('accepts positive integers', () => {
			expect(parseLimitArg('3')).toBe(3);
		});

		it('rejects zero, fractions and words', () => {
			for (const value of ['0', '2.5', 'all']) {
				expect(() => parseLimitArg(value)).toThrow(`Invalid limit: ${value}. Must be a positive integer.`);
			}
		});
	});
}
