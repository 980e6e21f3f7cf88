/**
 * @fileoverview Monitor configuration
 *
 * The configuration is an explicit, frozen value handed to every stage that
 * needs it. It is assembled from defaults, an optional JSON file and CLI flags,
 * in that order of precedence (later wins).
 *
 * @module _config
 */

import type { PlanHint } from './_types.ts';
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { Result } from '@praha/byethrow';
import { omitBy } from 'es-toolkit';
import * as v from 'valibot';
import { CONFIG_FILE_NAME, CONFIG_SEARCH_DIRS, DEFAULT_SESSION_DURATION_HOURS } from './_consts.ts';
import { parsePlanHint } from './_types.ts';
import { logger } from './logger.ts';

const positiveIntegerSchema = v.pipe(v.number(), v.integer(), v.minValue(1));

const planHintSchema = v.union([
	v.pipe(
		v.string(),
		v.check(value => parsePlanHint(value) != null, 'Plan must be auto, pro, max5, max20 or custom:<limit>'),
		v.transform((value): PlanHint => parsePlanHint(value) ?? 'auto'),
	),
	v.object({ custom: positiveIntegerSchema }),
]);

const configEntries = {
	planHint: planHintSchema,
	updateIntervalSeconds: v.pipe(v.number(), v.minValue(0.1)),
	warningThreshold: v.pipe(v.number(), v.minValue(0), v.maxValue(1)),
	sessionDurationHours: v.pipe(v.number(), v.gtValue(0)),
	sessionGranularityMs: positiveIntegerSchema,
	clockSkewToleranceMs: v.pipe(v.number(), v.minValue(0)),
	debounceMs: v.pipe(v.number(), v.minValue(0)),
	customLimits: v.object({
		pro: v.optional(positiveIntegerSchema),
		max5: v.optional(positiveIntegerSchema),
		max20: v.optional(positiveIntegerSchema),
	}),
	dataPaths: v.array(v.string()),
	allowedRoots: v.array(v.string()),
};

/**
 * Shape of one config layer (file or flags); every field optional
 */
export const monitorConfigInputSchema = v.partial(v.object(configEntries));

export const monitorConfigSchema = v.object({
	planHint: v.optional(configEntries.planHint, 'auto'),
	updateIntervalSeconds: v.optional(configEntries.updateIntervalSeconds, 3),
	warningThreshold: v.optional(configEntries.warningThreshold, 0.85),
	sessionDurationHours: v.optional(configEntries.sessionDurationHours, DEFAULT_SESSION_DURATION_HOURS),
	sessionGranularityMs: v.optional(configEntries.sessionGranularityMs, 1000),
	clockSkewToleranceMs: v.optional(configEntries.clockSkewToleranceMs, 60_000),
	debounceMs: v.optional(configEntries.debounceMs, 300),
	customLimits: v.optional(configEntries.customLimits, {}),
	dataPaths: v.optional(configEntries.dataPaths, []),
	allowedRoots: v.optional(configEntries.allowedRoots, []),
});

export type MonitorConfig = Readonly<v.InferOutput<typeof monitorConfigSchema>>;
export type MonitorConfigInput = v.InferInput<typeof monitorConfigInputSchema>;

/**
 * Builds a validated config from partial input; throws a ValiError on invalid values
 */
export function createMonitorConfig(input: MonitorConfigInput = {}): MonitorConfig {
	return Object.freeze(v.parse(monitorConfigSchema, input));
}

/**
 * Merges layered inputs, skipping undefined values so flags left unset keep the file's value
 */
export function mergeConfigInputs(...layers: Array<MonitorConfigInput | undefined>): MonitorConfigInput {
	let merged: MonitorConfigInput = {};
	for (const layer of layers) {
		if (layer != null) {
			merged = { ...merged, ...omitBy(layer, value => value === undefined) };
		}
	}
	return merged;
}

/**
 * Reads and validates one config file
 */
export function validateConfigFile(filePath: string): Result.Result<MonitorConfigInput, Error> {
	if (!existsSync(filePath)) {
		return Result.fail(new Error(`Configuration file does not exist: ${filePath}`));
	}

	return Result.try({
		try: () => {
			const content = readFileSync(filePath, 'utf-8');
			const data = JSON.parse(content) as unknown;
			const parsed = v.safeParse(monitorConfigInputSchema, data);
			if (!parsed.success) {
				throw new Error(parsed.issues.map(issue => issue.message).join('; '));
			}
			return parsed.output;
		},
		catch: error => error instanceof Error ? error : new Error(String(error)),
	})();
}

/**
 * Loads the config file at `configPath`, or the first one found in the search directories
 * @returns Config input, or undefined when no usable file exists
 */
export function loadConfigFile(configPath?: string): MonitorConfigInput | undefined {
	const candidates = configPath != null
		? [configPath]
		: CONFIG_SEARCH_DIRS.map(dir => path.join(dir, CONFIG_FILE_NAME));

	for (const candidate of candidates) {
		if (configPath == null && !existsSync(candidate)) {
			continue;
		}
		const result = validateConfigFile(candidate);
		if (Result.isSuccess(result)) {
			logger.debug(`Loaded configuration from ${candidate}`);
			return result.value;
		}
		logger.warn(`Ignoring configuration file at ${candidate}: ${result.error.message}`);
	}

	return undefined;
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createFixture } = await import('fs-fixture');

	describe('createMonitorConfig', () => {
		it('fills in defaults', () => {
			const config = createMonitorConfig();
			expect(config.planHint).toBe('auto');
			expect(config.updateIntervalSeconds).toBe(3);
			expect(config.warningThreshold).toBe(0.85);
			expect(config.sessionDurationHours).toBe(5);
			expect(config.clockSkewToleranceMs).toBe(60_000);
			expect(config.customLimits).toEqual({});
			expect(Object.isFrozen(config)).toBe(true);
		});

		it('parses plan strings and objects', () => {
			expect(createMonitorConfig({ planHint: 'custom:5000' }).planHint).toEqual({ custom: 5000 });
			expect(createMonitorConfig({ planHint: { custom: 7 } }).planHint).toEqual({ custom: 7 });
			expect(createMonitorConfig({ planHint: 'MAX5' }).planHint).toBe('max5');
		});

		it('rejects out-of-range values', () => {
			expect(() => createMonitorConfig({ warningThreshold: 1.5 })).toThrow();
			expect(() => createMonitorConfig({ planHint: 'enterprise' })).toThrow();
		});
	});

	describe('mergeConfigInputs', () => {
		it('lets later layers win and ignores undefined values', () => {
			const merged = mergeConfigInputs(
				{ planHint: 'pro', updateIntervalSeconds: 10 },
				{ planHint: undefined, updateIntervalSeconds: 1 },
			);
			expect(createMonitorConfig(merged).planHint).toBe('pro');
			expect(createMonitorConfig(merged).updateIntervalSeconds).toBe(1);
		});
	});

	describe('loadConfigFile', () => {
		it('loads a valid file', async () => {
			await using fixture = await createFixture({
				'config.json': JSON.stringify({ planHint: 'max20', warningThreshold: 0.5 }),
			});
			const loaded = loadConfigFile(fixture.getPath('config.json'));
			expect(loaded).toEqual({ planHint: 'max20', warningThreshold: 0.5 });
		});

		it('returns undefined for invalid JSON or values', async () => {
			await using fixture = await createFixture({
				'broken.json': '{ planHint: ',
				'invalid.json': JSON.stringify({ updateIntervalSeconds: -1 }),
			});
			expect(loadConfigFile(fixture.getPath('broken.json'))).toBeUndefined();
			expect(loadConfigFile(fixture.getPath('invalid.json'))).toBeUndefined();
		});

		it('returns undefined for a missing explicit path', () => {
			expect(loadConfigFile('/nonexistent/tokenmeter/config.json')).toBeUndefined();
		});
	});
}
