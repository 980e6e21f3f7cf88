import type { Args } from 'gunshi';
import type { PlanHint } from './_types.ts';
import { DEFAULT_SESSION_DURATION_HOURS } from './_consts.ts';
import { parsePlanHint } from './_types.ts';

const parsePlanArg = (value: string): PlanHint => {
	const plan = parsePlanHint(value);
	if (plan == null) {
		throw new TypeError(`Invalid plan: ${value}. Must be auto, pro, max5, max20 or custom:<limit>.`);
	}
	return plan;
};

export const sharedArgs = {
	plan: {
		type: 'custom',
		description: 'Plan used for the token limit (auto, pro, max5, max20 or custom:<limit>)',
		parse: parsePlanArg,
	},
	path: {
		type: 'string',
		short: 'p',
		description: 'Directory with usage logs; replaces the default locations',
	},
	config: {
		type: 'string',
		description: 'Path to a JSON configuration file',
	},
	stateFile: {
		type: 'string',
		description: 'Path to the stored sessions file',
	},
	sessionLength: {
		type: 'number',
		short: 'n',
		description: `Session window in hours (default: ${DEFAULT_SESSION_DURATION_HOURS})`,
	},
	mock: {
		type: 'boolean',
		description: 'Use generated usage data instead of local logs',
		default: false,
	},
	json: {
		type: 'boolean',
		short: 'j',
		description: 'Output as JSON',
		default: false,
	},
	debug: {
		type: 'boolean',
		short: 'd',
		description: 'Show debug logs',
		default: false,
	},
	color: { // --color and FORCE_COLOR=1 is handled by picocolors
		type: 'boolean',
		description: 'Enable colored output (default: auto). FORCE_COLOR=1 has the same effect.',
	},
	noColor: { // --no-color and NO_COLOR=1 is handled by picocolors
		type: 'boolean',
		description: 'Disable colored output (default: auto). NO_COLOR=1 has the same effect.',
	},
} as const satisfies Args;
