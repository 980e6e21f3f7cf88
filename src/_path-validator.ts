/**
 * @fileoverview Path validation and data root discovery
 *
 * Every path that reaches `open` passes through {@link validatePath} first: data
 * roots from the environment or config, and each discovered log file. Symlinks
 * are resolved before the containment check, so a link under the home directory
 * that points elsewhere is rejected.
 *
 * @module _path-validator
 */

import type { MonitorConfig } from './_config.ts';
import { realpathSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import { isDirectorySync } from 'path-type';
import {
	DATA_PATH_ENV,
	DATA_PATHS_ENV,
	DEFAULT_DATA_PATHS,
	MAX_PATH_LENGTH,
	SYSTEM_DATA_ROOTS,
	USER_HOME_DIR,
} from './_consts.ts';
import { InvalidPathError } from './_errors.ts';
import { logger } from './logger.ts';

export type PathValidationOptions = {
	/** Canonical directories a validated path must resolve into */
	allowedRoots: readonly string[];
};

function canonicalizeRoot(root: string): string {
	const resolved = path.resolve(root);
	return Result.unwrap(
		Result.try({
			try: () => realpathSync(resolved),
			catch: error => error,
		})(),
		resolved,
	);
}

/**
 * Allowed roots: the home directory, the system data directories and any extra
 * roots from config, each canonicalized when it exists
 */
export function defaultAllowedRoots(config?: Pick<MonitorConfig, 'allowedRoots'>): string[] {
	const roots = [USER_HOME_DIR, ...SYSTEM_DATA_ROOTS, ...(config?.allowedRoots ?? [])];
	return [...new Set(roots.map(canonicalizeRoot))];
}

function isWithin(root: string, candidate: string): boolean {
	const relative = path.relative(root, candidate);
	const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
	return !escapes && !path.isAbsolute(relative);
}

function hasTraversalSegment(candidate: string): boolean {
	return candidate.split(/[/\\]/).includes('..');
}

/**
 * Validates a candidate path and returns its canonical form
 */
export function validatePath(
	candidate: string,
	options: PathValidationOptions,
): Result.Result<string, InvalidPathError> {
	if (candidate.trim() === '') {
		return Result.fail(new InvalidPathError(candidate, 'empty', 'Path is empty'));
	}
	if (candidate.includes('\0')) {
		return Result.fail(new InvalidPathError(candidate, 'null-byte', 'Path contains a NUL byte'));
	}
	if (Buffer.byteLength(candidate, 'utf8') > MAX_PATH_LENGTH) {
		return Result.fail(new InvalidPathError(candidate, 'too-long', `Path exceeds ${MAX_PATH_LENGTH} bytes`));
	}
	if (hasTraversalSegment(candidate)) {
		return Result.fail(new InvalidPathError(candidate, 'traversal', `Path contains a '..' segment: ${candidate}`));
	}

	const canonical = Result.try({
		try: () => realpathSync(path.resolve(candidate)),
		catch: error => new InvalidPathError(
			candidate,
			'unresolvable',
			`Cannot resolve ${candidate}: ${error instanceof Error ? error.message : String(error)}`,
		),
	})();
	if (Result.isFailure(canonical)) {
		return canonical;
	}

	if (!options.allowedRoots.some(root => isWithin(root, canonical.value))) {
		return Result.fail(new InvalidPathError(
			candidate,
			'outside-allowed-roots',
			`${canonical.value} is outside the allowed directories`,
		));
	}

	return Result.succeed(canonical.value);
}

/**
 * Candidate data roots in priority order: the path list variable, the single
 * path variable, then configured paths. The default locations are used only
 * when none of those is set.
 */
export function getCandidateDataPaths(
	config: Pick<MonitorConfig, 'dataPaths'>,
	env: NodeJS.ProcessEnv = process.env,
): string[] {
	const candidates: string[] = [];

	const listValue = (env[DATA_PATHS_ENV] ?? '').trim();
	if (listValue !== '') {
		candidates.push(...listValue.split(':').map(p => p.trim()).filter(p => p !== ''));
	}

	const singleValue = (env[DATA_PATH_ENV] ?? '').trim();
	if (singleValue !== '') {
		candidates.push(singleValue);
	}

	candidates.push(...config.dataPaths);
	return candidates.length > 0 ? candidates : [...DEFAULT_DATA_PATHS];
}

/**
 * Validated, existing data roots with duplicates removed
 */
export function discoverUsageRoots(
	config: Pick<MonitorConfig, 'dataPaths' | 'allowedRoots'>,
	env: NodeJS.ProcessEnv = process.env,
): string[] {
	const allowedRoots = defaultAllowedRoots(config);
	const roots: string[] = [];
	const seen = new Set<string>();

	for (const candidate of getCandidateDataPaths(config, env)) {
		const result = validatePath(candidate, { allowedRoots });
		if (Result.isFailure(result)) {
			if (result.error.reason === 'unresolvable') {
				logger.debug(`Data path not found, skipping: ${candidate}`);
			}
			else {
				logger.warn(`Skipping data path: ${result.error.message}`);
			}
			continue;
		}
		if (!isDirectorySync(result.value)) {
			logger.debug(`Data path is not a directory, skipping: ${result.value}`);
			continue;
		}
		if (!seen.has(result.value)) {
			seen.add(result.value);
			roots.push(result.value);
		}
	}

	return roots;
}

if (import.meta.vitest != null) {
	const { describe, it, expect } = import.meta.vitest;
	const { createFixture } = await import('fs-fixture');

	describe('validatePath', () => {
		it('canonicalizes paths inside an allowed root', async () => {
			await using fixture = await createFixture({ 'projects/a.jsonl': '' });
			const root = canonicalizeRoot(fixture.path);
			const result = validatePath(fixture.getPath('projects/a.jsonl'), { allowedRoots: [root] });
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value).toBe(path.join(root, 'projects', 'a.jsonl'));
			}
		});

		it('accepts entries whose names start with two dots', async () => {
			await using fixture = await createFixture({ '..cache/a.jsonl': '' });
			const root = canonicalizeRoot(fixture.path);
			const result = validatePath(fixture.getPath('..cache/a.jsonl'), { allowedRoots: [root] });
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value).toBe(path.join(root, '..cache', 'a.jsonl'));
			}
		});

		it('rejects parent-directory traversal before touching the file system', async () => {
			await using fixture = await createFixture({ 'projects/a.jsonl': '' });
			const result = validatePath(`${fixture.getPath('projects')}/../../etc`, {
				allowedRoots: [canonicalizeRoot(fixture.path)],
			});
			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error).toBeInstanceOf(InvalidPathError);
				expect(result.error.reason).toBe('traversal');
			}
		});

		it('rejects a bare relative traversal', () => {
			const result = validatePath('../../etc', { allowedRoots: ['/'] });
			expect(Result.isFailure(result) && result.error.reason).toBe('traversal');
		});

		it('rejects empty, NUL and overlong paths', () => {
			const options = { allowedRoots: ['/'] };
			const reasons = ['', '/tmp/a\0b', `/${'a'.repeat(MAX_PATH_LENGTH)}`].map((candidate) => {
				const result = validatePath(candidate, options);
				return Result.isFailure(result) ? result.error.reason : 'ok';
			});
			expect(reasons).toEqual(['empty', 'null-byte', 'too-long']);
		});

		it('rejects symlinks that resolve outside the allowed roots', async () => {
			await using outside = await createFixture({ 'secret.jsonl': '{}' });
			await using fixture = await createFixture({
				projects: {},
			});
			const { symlink } = await import('node:fs/promises');
			await symlink(outside.getPath('secret.jsonl'), fixture.getPath('projects/link.jsonl'));

			const result = validatePath(fixture.getPath('projects/link.jsonl'), {
				allowedRoots: [canonicalizeRoot(fixture.path)],
			});
			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error.reason).toBe('outside-allowed-roots');
			}
		});

		it('reports missing paths as unresolvable', async () => {
			await using fixture = await createFixture({});
			const result = validatePath(fixture.getPath('missing'), { allowedRoots: [canonicalizeRoot(fixture.path)] });
			expect(Result.isFailure(result) && result.error.reason).toBe('unresolvable');
		});
	});

	describe('getCandidateDataPaths', () => {
		it('orders env list, env single, then config', () => {
			const candidates = getCandidateDataPaths(
				{ dataPaths: ['/data/config'] },
				{ [DATA_PATHS_ENV]: '/data/a: /data/b ::', [DATA_PATH_ENV]: '/data/c' },
			);
			expect(candidates).toEqual(['/data/a', '/data/b', '/data/c', '/data/config']);
		});

		it('falls back to the default locations', () => {
			expect(getCandidateDataPaths({ dataPaths: [] }, {})).toEqual([...DEFAULT_DATA_PATHS]);
		});
	});

	describe('discoverUsageRoots', () => {
		it('keeps valid directories once and drops invalid candidates', async () => {
			await using fixture = await createFixture({
				'one/session.jsonl': '',
				'two/session.jsonl': '',
				'file.txt': 'not a directory',
			});
			const roots = discoverUsageRoots(
				{ dataPaths: [], allowedRoots: [fixture.path] },
				{
					[DATA_PATHS_ENV]: [
						fixture.getPath('one'),
						fixture.getPath('file.txt'),
						fixture.getPath('two'),
						fixture.getPath('one'),
					].join(':'),
					[DATA_PATH_ENV]: `${fixture.getPath('one')}/../two`,
				},
			);

			const base = canonicalizeRoot(fixture.path);
			expect(roots).toEqual([path.join(base, 'one'), path.join(base, 'two')]);
		});
	});
}
