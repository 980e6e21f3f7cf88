import type { MonitorConfig, MonitorConfigInput } from '../_config.ts';
import type { SessionStore } from '../_session-store.ts';
import type { PlanHint } from '../_types.ts';
import type { UsageSource } from '../_usage-source.ts';
import { Result } from '@praha/byethrow';
import * as v from 'valibot';
import { createMonitorConfig, loadConfigFile, mergeConfigInputs } from '../_config.ts';
import { createSessionStore } from '../_session-store.ts';
import { createFileUsageSource, createMockUsageSource } from '../_usage-source.ts';
import { logger } from '../logger.ts';

export type CommandValues = {
	plan?: PlanHint;
	path?: string;
	config?: string;
	stateFile?: string;
	sessionLength?: number;
	interval?: number;
	mock: boolean;
	json: boolean;
	debug: boolean;
};

export type CommandContext = {
	config: MonitorConfig;
	source: UsageSource;
	store: SessionStore;
};

/**
 * Config layer for flags; unset flags stay undefined so file values survive the merge
 */
export function flagsToConfigInput(values: CommandValues): MonitorConfigInput {
	return {
		planHint: values.plan,
		updateIntervalSeconds: values.interval,
		sessionDurationHours: values.sessionLength,
		dataPaths: values.path != null ? [values.path] : undefined,
	};
}

/**
 * Builds config from file and flags, then picks the usage source once
 */
export function resolveCommandContext(
	values: CommandValues,
	{ store = createSessionStore(values.stateFile), env }: { store?: SessionStore; env?: NodeJS.ProcessEnv } = {},
): Result.Result<CommandContext, Error> {
	const fileConfig = loadConfigFile(values.config);
	const config = Result.try({
		try: () => createMonitorConfig(mergeConfigInputs(fileConfig, flagsToConfigInput(values))),
		catch: error => v.isValiError(error)
			? new Error(`Invalid configuration: ${error.issues.map(issue => issue.message).join('; ')}`)
			: new Error(String(error)),
	})();
	if (Result.isFailure(config)) {
		return config;
	}

	const source = values.mock
		? createMockUsageSource()
		: createFileUsageSource({ config: config.value, env });
	return Result.succeed({ config: config.value, source, store });
}

/**
 * `--debug` shows debug logs; JSON output and full-screen rendering silence the logger otherwise
 */
export function applyLogLevel({ debug, quiet }: { debug: boolean; quiet: boolean }): void {
	if (debug) {
		logger.level = 4;
	}
	else if (quiet) {
		logger.level = 0;
	}
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createFixture } = await import('fs-fixture');

	const defaults: CommandValues = { mock: false, json: false, debug: false };
	const store = createSessionStore('/nonexistent/observed_sessions.json');

	describe('resolveCommandContext', () => {
		it('lets flags override the config file', async () => {
			await using fixture = await createFixture({
				'config.json': JSON.stringify({ planHint: 'max5', updateIntervalSeconds: 10, warningThreshold: 0.5 }),
			});
			const result = resolveCommandContext(
				{ ...defaults, config: fixture.getPath('config.json'), interval: 2, path: '/data/logs' },
				{ store, env: {} },
			);

			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value.config.planHint).toBe('max5');
				expect(result.value.config.updateIntervalSeconds).toBe(2);
				expect(result.value.config.warningThreshold).toBe(0.5);
				expect(result.value.config.dataPaths).toEqual(['/data/logs']);
				expect(result.value.source.kind).toBe('files');
			}
		});

		it('selects the mock source', async () => {
			await using fixture = await createFixture({ 'config.json': '{}' });
			const result = resolveCommandContext({ ...defaults, mock: true, config: fixture.getPath('config.json') }, { store, env: {} });
			expect(Result.isSuccess(result) && result.value.source.kind).toBe('mock');
		});

		it('rejects out-of-range flag values', async () => {
			await using fixture = await createFixture({ 'config.json': '{}' });
			const result = resolveCommandContext({ ...defaults, sessionLength: 0, config: fixture.getPath('config.json') }, { store, env: {} });
			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error.message.startsWith('Invalid configuration:')).toBe(true);
			}
		});
	});

	describe('flagsToConfigInput', () => {
		it('leaves unset flags undefined', () => {
			expect(mergeConfigInputs({ planHint: 'pro' }, flagsToConfigInput(defaults))).toEqual({ planHint: 'pro' });
		});
	});
}
