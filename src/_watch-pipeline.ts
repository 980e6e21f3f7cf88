/**
 * @fileoverview File-system watch pipeline
 *
 * Turns change notifications under the data roots into debounced rescan
 * requests. When the watcher cannot be set up, or reports an error, it is
 * closed and replaced by a fixed-interval poll.
 *
 * @module _watch-pipeline
 */

import type { RescanReason } from './_rescan-channel.ts';
import chokidar from 'chokidar';
import { WatchInitFailedError } from './_errors.ts';
import { logger } from './logger.ts';

export type WatchEventType = 'add' | 'change';

export type WatchCallbacks = {
	onEvent: (type: WatchEventType, filePath: string) => void;
	onError: (error: unknown) => void;
	/** Called once the initial scan is done and changes are being reported */
	onReady?: () => void;
};

export type WatchHandle = {
	close: () => Promise<void>;
};

/**
 * Starts watching `roots`; may throw when the platform watcher is unavailable
 */
export type WatcherFactory = (roots: readonly string[], callbacks: WatchCallbacks) => WatchHandle;

export type WatchMode = 'idle' | 'watching' | 'polling' | 'closed';

export type UsageWatcherOptions = {
	roots: readonly string[];
	debounceMs: number;
	pollIntervalMs: number;
	onRescan: (reason: RescanReason, filePath?: string) => void;
	onReady?: () => void;
	createWatcher?: WatcherFactory;
};

const isUsageFile = (filePath: string): boolean => filePath.toLowerCase().endsWith('.jsonl');

export const createChokidarWatcher: WatcherFactory = (roots, callbacks) => {
	const watcher = chokidar.watch([...roots], {
		ignoreInitial: true,
		persistent: true,
		followSymlinks: false,
		ignored: (filePath, stats) => stats?.isFile() === true && !isUsageFile(filePath),
	});

	watcher.on('add', filePath => callbacks.onEvent('add', filePath));
	watcher.on('change', filePath => callbacks.onEvent('change', filePath));
	watcher.on('error', error => callbacks.onError(error));
	watcher.on('ready', () => callbacks.onReady?.());

	return {
		close: async () => watcher.close(),
	};
};

export class UsageWatcher implements AsyncDisposable {
	private readonly options: UsageWatcherOptions;
	private readonly debounceTimers = new Map<string, NodeJS.Timeout>();
	private watcher: WatchHandle | null = null;
	private pollTimer: NodeJS.Timeout | null = null;
	private pendingClose: Promise<void> | null = null;
	private currentMode: WatchMode = 'idle';

	constructor(options: UsageWatcherOptions) {
		this.options = options;
	}

	get mode(): WatchMode {
		return this.currentMode;
	}

	start(): void {
		if (this.currentMode !== 'idle') {
			return;
		}
		if (this.options.roots.length === 0) {
			logger.debug('No directories to watch; polling for usage changes');
			this.startPolling();
			return;
		}

		const createWatcher = this.options.createWatcher ?? createChokidarWatcher;
		try {
			this.watcher = createWatcher(this.options.roots, {
				onEvent: (type, filePath) => this.handleEvent(type, filePath),
				onError: error => this.fallBackToPolling(new WatchInitFailedError(error)),
				onReady: () => {
					if (this.currentMode === 'watching') {
						this.options.onReady?.();
					}
				},
			});
			this.currentMode = 'watching';
			logger.debug(`Watching ${this.options.roots.length} usage directories`);
		}
		catch (error) {
			this.fallBackToPolling(new WatchInitFailedError(error));
		}
	}

	private handleEvent(type: WatchEventType, filePath: string): void {
		if (this.currentMode !== 'watching' || !isUsageFile(filePath)) {
			return;
		}

		const existing = this.debounceTimers.get(filePath);
		if (existing != null) {
			clearTimeout(existing);
		}
		this.debounceTimers.set(filePath, setTimeout(() => {
			this.debounceTimers.delete(filePath);
			logger.debug(`Usage file ${type === 'add' ? 'added' : 'changed'}: ${filePath}`);
			this.options.onRescan('change', filePath);
		}, this.options.debounceMs));
	}

	private fallBackToPolling(error: WatchInitFailedError): void {
		if (this.currentMode === 'closed' || this.currentMode === 'polling') {
			return;
		}
		logger.warn(`${error.message}; polling every ${this.options.pollIntervalMs / 1000}s instead`);

		const watcher = this.watcher;
		this.watcher = null;
		if (watcher != null) {
			this.pendingClose = watcher.close().catch((closeError: unknown) => {
				logger.debug(`Failed to close file watcher: ${String(closeError)}`);
			});
		}
		this.clearDebounceTimers();
		this.startPolling();
	}

	private startPolling(): void {
		this.currentMode = 'polling';
		this.pollTimer = setInterval(() => {
			this.options.onRescan('poll');
		}, this.options.pollIntervalMs);
	}

	private clearDebounceTimers(): void {
		for (const timer of this.debounceTimers.values()) {
			clearTimeout(timer);
		}
		this.debounceTimers.clear();
	}

	/**
	 * Stops polling, drops pending debounced events and releases the watcher
	 */
	async close(): Promise<void> {
		if (this.currentMode === 'closed') {
			return;
		}
		this.currentMode = 'closed';
		this.clearDebounceTimers();
		if (this.pollTimer != null) {
			clearInterval(this.pollTimer);
			this.pollTimer = null;
		}

		const watcher = this.watcher;
		this.watcher = null;
		await watcher?.close();
		await this.pendingClose;
	}

	async [Symbol.asyncDispose](): Promise<void> {
		await this.close();
	}
}

if (import.meta.vitest != null) {
	const { describe, it, expect, vi, beforeEach, afterEach } = import.meta.vitest;

	type FakeWatcher = WatchCallbacks & { closed: boolean };

	const createFakeFactory = (): { factory: WatcherFactory; watchers: FakeWatcher[] } => {
		const watchers: FakeWatcher[] = [];
		const factory: WatcherFactory = (_roots, callbacks) => {
			const fake: FakeWatcher = { ...callbacks, closed: false };
			watchers.push(fake);
			return {
				close: async () => {
					fake.closed = true;
				},
			};
		};
		return { factory, watchers };
	};

	describe('UsageWatcher', () => {
		beforeEach(() => {
			vi.useFakeTimers();
		});

		afterEach(() => {
			vi.useRealTimers();
		});

		it('coalesces rapid events for one file into a single rescan', async () => {
			const { factory, watchers } = createFakeFactory();
			const onRescan = vi.fn();
			await using watcher = new UsageWatcher({
				roots: ['/data/projects'],
				debounceMs: 300,
				pollIntervalMs: 3000,
				onRescan,
				createWatcher: factory,
			});
			watcher.start();
			expect(watcher.mode).toBe('watching');

			const fake = watchers[0];
			fake?.onEvent('change', '/data/projects/a.jsonl');
			await vi.advanceTimersByTimeAsync(200);
			fake?.onEvent('change', '/data/projects/a.jsonl');
			fake?.onEvent('add', '/data/projects/b.jsonl');
			fake?.onEvent('change', '/data/projects/readme.md');
			await vi.advanceTimersByTimeAsync(299);
			expect(onRescan).not.toHaveBeenCalled();

			await vi.advanceTimersByTimeAsync(1);
			expect(onRescan.mock.calls).toEqual([
				['change', '/data/projects/a.jsonl'],
				['change', '/data/projects/b.jsonl'],
			]);
		});

		it('falls back to polling when the watcher cannot start', async () => {
			const onRescan = vi.fn();
			await using watcher = new UsageWatcher({
				roots: ['/data/projects'],
				debounceMs: 300,
				pollIntervalMs: 3000,
				onRescan,
				createWatcher: () => {
					throw new Error('ENOSPC: System limit for number of file watchers reached');
				},
			});
			watcher.start();
			expect(watcher.mode).toBe('polling');

			await vi.advanceTimersByTimeAsync(9000);
			expect(onRescan).toHaveBeenCalledTimes(3);
			expect(onRescan).toHaveBeenLastCalledWith('poll');
		});

		it('closes a failing watcher and polls instead', async () => {
			const { factory, watchers } = createFakeFactory();
			const onRescan = vi.fn();
			const watcher = new UsageWatcher({
				roots: ['/data/projects'],
				debounceMs: 300,
				pollIntervalMs: 1000,
				onRescan,
				createWatcher: factory,
			});
			watcher.start();
			watchers[0]?.onError(new Error('EMFILE'));

			expect(watcher.mode).toBe('polling');
			await vi.advanceTimersByTimeAsync(1000);
			expect(onRescan).toHaveBeenCalledWith('poll');

			await watcher.close();
			expect(watchers[0]?.closed).toBe(true);
		});

		it('releases the watcher and timers on close', async () => {
			const { factory, watchers } = createFakeFactory();
			const onRescan = vi.fn();
			const watcher = new UsageWatcher({
				roots: ['/data/projects'],
				debounceMs: 300,
				pollIntervalMs: 1000,
				onRescan,
				createWatcher: factory,
			});
			watcher.start();
			watchers[0]?.onEvent('change', '/data/projects/a.jsonl');

			await watcher.close();
			await vi.advanceTimersByTimeAsync(5000);

			expect(watcher.mode).toBe('closed');
			expect(watchers[0]?.closed).toBe(true);
			expect(onRescan).not.toHaveBeenCalled();
			expect(vi.getTimerCount()).toBe(0);
		});

		it('polls when there is nothing to watch', async () => {
			const onRescan = vi.fn();
			await using watcher = new UsageWatcher({ roots: [], debounceMs: 300, pollIntervalMs: 1000, onRescan });
			watcher.start();
			expect(watcher.mode).toBe('polling');
		});
	});
	describe('createChokidarWatcher', () => {
		it('turns an append to a usage file into a debounced rescan', async () => {
			const { createFixture } = await import('fs-fixture');
			const { appendFile } = await import('node:fs/promises');
			await using fixture = await createFixture({ 'projects/p/a.jsonl': '', 'projects/p/notes.txt': '' });
			const usageFile = fixture.getPath('projects/p/a.jsonl');
			const onRescan = vi.fn<(reason: RescanReason, filePath?: string) => void>();
			let ready = false;

			await using watcher = new UsageWatcher({
				roots: [fixture.getPath('projects')],
				debounceMs: 50,
				pollIntervalMs: 60_000,
				onRescan,
				onReady: () => {
					ready = true;
				},
			});
			watcher.start();
			await vi.waitFor(() => {
				expect(ready).toBe(true);
			}, { timeout: 4000, interval: 20 });

			await appendFile(fixture.getPath('projects/p/notes.txt'), 'note\n');
			await appendFile(usageFile, '{}\n');
			await vi.waitFor(() => {
				expect(onRescan).toHaveBeenCalledWith('change', usageFile);
			}, { timeout: 4000, interval: 20 });

			expect(watcher.mode).toBe('watching');
			expect(onRescan.mock.calls.every(([reason, filePath]) => reason === 'change' && filePath === usageFile)).toBe(true);
		}, 10_000);
	});
}
