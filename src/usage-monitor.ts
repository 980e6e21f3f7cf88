/**
 * @fileoverview Live usage monitor
 *
 * Owns the monitoring loop: it waits on the rescan channel (fed by the file
 * watcher, manual requests, or its own refresh timer), runs one pipeline pass
 * at a time and publishes the resulting snapshot. The watcher is created when
 * the loop starts and released before the loop resolves.
 *
 * @module usage-monitor
 */

import type { MonitorConfig } from './_config.ts';
import type { SessionSnapshot } from './_pipeline.ts';
import type { UsageEntry } from './_record-parser.ts';
import type { ObservedSession } from './_session-derivation.ts';
import type { SessionStore } from './_session-store.ts';
import type { SessionTracker } from './_session-tracker.ts';
import type { UsageSource } from './_usage-source.ts';
import type { WatcherFactory } from './_watch-pipeline.ts';
import { Result } from '@praha/byethrow';
import { runUsagePass } from './_pipeline.ts';
import { RescanChannel } from './_rescan-channel.ts';
import { createSessionTracker } from './_session-tracker.ts';
import { UsageWatcher } from './_watch-pipeline.ts';
import { logger } from './logger.ts';

export type UsageMonitorOptions = {
	source: UsageSource;
	config: MonitorConfig;
	/** Persists history and the current session after passes that change them */
	store?: SessionStore;
	clock?: () => Date;
	createWatcher?: WatcherFactory;
	/** Called after every successful pass */
	onSnapshot?: (snapshot: SessionSnapshot | null) => void;
};

const errorMessage = (error: unknown): string => error instanceof Error ? error.message : String(error);

export class UsageMonitor implements AsyncDisposable {
	private readonly source: UsageSource;
	private readonly config: MonitorConfig;
	private readonly store: SessionStore | undefined;
	private readonly clock: () => Date;
	private readonly createWatcher: WatcherFactory | undefined;
	private readonly onSnapshot: ((snapshot: SessionSnapshot | null) => void) | undefined;
	private readonly channel = new RescanChannel();

	private tracker: SessionTracker = createSessionTracker();
	private restoring: Promise<void> | null = null;
	private snapshot: SessionSnapshot | null = null;
	private skewedEntries: readonly UsageEntry[] = [];
	private lastPersisted: ObservedSession | null = null;
	private inFlight: Promise<SessionSnapshot | null> | null = null;
	private loop: Promise<void> | null = null;

	constructor(options: UsageMonitorOptions) {
		this.source = options.source;
		this.config = options.config;
		this.store = options.store;
		this.clock = options.clock ?? (() => new Date());
		this.createWatcher = options.createWatcher;
		this.onSnapshot = options.onSnapshot;
	}

	/**
	 * Latest published snapshot; `null` until a session is observed and whenever the last pass found no entries in the window
	 */
	getSnapshot(): SessionSnapshot | null {
		return this.snapshot;
	}

	/**
	 * Closed sessions, oldest first
	 */
	getHistory(): readonly ObservedSession[] {
		return this.tracker.history;
	}

	/**
	 * Entries from the last pass dated too far after the clock to be trusted
	 */
	getSkewedEntries(): readonly UsageEntry[] {
		return this.skewedEntries;
	}

	/**
	 * Asks the running loop for a pass as soon as possible
	 */
	requestRescan(): void {
		this.channel.request('manual');
	}

	/**
	 * Runs a pass now; joins the pass already in flight instead of starting another
	 */
	async refresh(): Promise<SessionSnapshot | null> {
		this.inFlight ??= this.runPass().finally(() => {
			this.inFlight = null;
		});
		return this.inFlight;
	}

	/**
	 * Runs the monitoring loop until {@link stop} is called or `signal` aborts
	 * @returns Promise settled once the loop has ended and the watcher is closed
	 */
	async start(signal?: AbortSignal): Promise<void> {
		this.loop ??= this.runLoop(signal);
		return this.loop;
	}

	async stop(): Promise<void> {
		this.channel.close();
		await this.loop;
		await this.inFlight;
	}

	async [Symbol.asyncDispose](): Promise<void> {
		await this.stop();
	}

	private async runLoop(signal?: AbortSignal): Promise<void> {
		const intervalMs = this.config.updateIntervalSeconds * 1000;
		await using watcher = this.source.kind === 'files'
			? new UsageWatcher({
				roots: this.source.listWatchRoots(),
				debounceMs: this.config.debounceMs,
				pollIntervalMs: intervalMs,
				onRescan: reason => this.channel.request(reason),
				createWatcher: this.createWatcher,
			})
			: null;

		watcher?.start();
		logger.info(`Monitoring ${this.source.kind === 'mock' ? 'mock' : 'local'} usage data`);

		await this.refresh();
		while (true) {
			const wakeup = await this.channel.next(intervalMs, signal);
			if (wakeup == null) {
				break;
			}
			await this.refresh();
		}

		logger.info('Usage monitor stopped');
	}

	private async restore(): Promise<void> {
		if (this.store == null) {
			return;
		}
		const stored = await this.store.load();
		this.tracker = createSessionTracker(stored);
		this.lastPersisted = stored.current;
		if (stored.history.length > 0 || stored.current != null) {
			logger.debug(`Restored ${stored.history.length} closed sessions from ${this.store.filePath}`);
		}
	}

	private async runPass(): Promise<SessionSnapshot | null> {
		this.restoring ??= this.restore();
		await this.restoring;

		const result = await Result.try({
			try: async () => runUsagePass({
				source: this.source,
				tracker: this.tracker,
				config: this.config,
				now: this.clock(),
			}),
			catch: error => error,
		})();

		if (Result.isFailure(result)) {
			logger.error(`Usage pass failed: ${errorMessage(result.error)}`);
			return this.snapshot;
		}

		const pass = result.value;
		this.snapshot = pass.snapshot;
		this.skewedEntries = pass.skewedEntries;
		if (pass.closedSession != null) {
			logger.info(`Session ${pass.closedSession.id} ended with ${pass.closedSession.tokensUsed} tokens`);
		}

		await this.persist(pass.closedSession != null);
		this.onSnapshot?.(pass.snapshot);
		return pass.snapshot;
	}

	private async persist(historyChanged: boolean): Promise<void> {
		const store = this.store;
		const current = this.tracker.current;
		if (store == null) {
			return;
		}
		const unchanged = !historyChanged
			&& current?.id === this.lastPersisted?.id
			&& current?.tokensUsed === this.lastPersisted?.tokensUsed;
		if (unchanged) {
			return;
		}

		const saved = await Result.try({
			try: async () => store.save({ current, history: this.tracker.history }),
			catch: error => error,
		})();
		if (Result.isFailure(saved)) {
			logger.warn(`Failed to save sessions to ${store.filePath}: ${errorMessage(saved.error)}`);
			return;
		}
		this.lastPersisted = current;
	}
}

if (import.meta.vitest != null) {
	const { describe, it, expect, vi } = import.meta.vitest;
	const { createFixture } = await import('fs-fixture');
	const { createMonitorConfig } = await import('./_config.ts');
	const { createFileUsageSource, createMockUsageSource } = await import('./_usage-source.ts');
	const { createSessionStore } = await import('./_session-store.ts');
	const { getTotalTokens, sumTokenCounts } = await import('./_session-derivation.ts');

	const NOW = new Date('2025-01-10T12:00:00Z');
	const clock = (): Date => NOW;

	const countingSource = (inner: UsageSource, kind: UsageSource['kind'] = inner.kind): UsageSource & { loads: number } => {
		const counted: UsageSource & { loads: number } = {
			kind,
			loads: 0,
			listWatchRoots: () => ['/data/projects'],
			async loadEntries() {
				counted.loads++;
				return inner.loadEntries();
			},
		};
		return counted;
	};

	describe('UsageMonitor', () => {
		it('publishes a frozen snapshot of the mock stream', async () => {
			const source = createMockUsageSource({ now: clock });
			await using monitor = new UsageMonitor({ source, config: createMonitorConfig(), clock });
			expect(monitor.getSnapshot()).toBeNull();

			const snapshot = await monitor.refresh();
			const entries = await source.loadEntries();

			expect(monitor.getSnapshot()).toBe(snapshot);
			expect(Object.isFrozen(snapshot)).toBe(true);
			expect(snapshot?.session.entryCount).toBe(40);
			expect(snapshot?.session.tokensUsed).toBe(getTotalTokens(sumTokenCounts(entries)));
			expect(snapshot?.generatedAt).toEqual(NOW);
			expect(monitor.getHistory()).toEqual([]);
			expect(monitor.getSkewedEntries()).toEqual([]);
		});

		it('joins concurrent refreshes into one pass', async () => {
			const source = countingSource(createMockUsageSource({ now: clock }));
			await using monitor = new UsageMonitor({ source, config: createMonitorConfig(), clock });

			const first = monitor.refresh();
			const second = monitor.refresh();
			expect(await second).toBe(await first);
			expect(source.loads).toBe(1);
		});

		it('keeps the last snapshot when a pass fails', async () => {
			const mock = createMockUsageSource({ now: clock });
			let fail = false;
			const source: UsageSource = {
				kind: 'mock',
				listWatchRoots: () => [],
				loadEntries: async () => {
					if (fail) {
						throw new Error('disk unavailable');
					}
					return mock.loadEntries();
				},
			};
			await using monitor = new UsageMonitor({ source, config: createMonitorConfig(), clock });
			const before = await monitor.refresh();
			fail = true;
			expect(await monitor.refresh()).toBe(before);
		});

		it('runs passes on start and on request, then releases the watcher on stop', async () => {
			const source = countingSource(createMockUsageSource({ now: clock }), 'files');
			const closed = vi.fn();
			const monitor = new UsageMonitor({
				source,
				config: createMonitorConfig({ updateIntervalSeconds: 600 }),
				clock,
				createWatcher: () => ({ close: async () => closed() }),
			});

			const running = monitor.start();
			await vi.waitFor(() => expect(source.loads).toBe(1));

			monitor.requestRescan();
			await vi.waitFor(() => expect(source.loads).toBe(2));

			await monitor.stop();
			await running;
			expect(closed).toHaveBeenCalledOnce();
			expect(source.loads).toBe(2);
		});

		it('stops when the signal aborts', async () => {
			const controller = new AbortController();
			const onSnapshot = vi.fn();
			const monitor = new UsageMonitor({
				source: createMockUsageSource({ now: clock }),
				config: createMonitorConfig({ updateIntervalSeconds: 600 }),
				clock,
				onSnapshot,
			});

			const running = monitor.start(controller.signal);
			await vi.waitFor(() => expect(onSnapshot).toHaveBeenCalledOnce());
			controller.abort();
			await expect(running).resolves.toBeUndefined();
		});

		it('restores stored history and saves the current session', async () => {
			await using fixture = await createFixture({
				'observed_sessions.json': JSON.stringify([{
					id: 'observed-1736467200',
					plan_type: 'Pro',
					tokens_used: 900,
					tokens_limit: 40000,
					start_time: '2025-01-10T00:00:00Z',
					reset_time: '2025-01-10T05:00:00Z',
					is_active: false,
					end_time: '2025-01-10T05:00:00Z',
				}]),
			});
			const store = createSessionStore(fixture.getPath('observed_sessions.json'));
			await using monitor = new UsageMonitor({
				source: createMockUsageSource({ now: clock }),
				config: createMonitorConfig(),
				store,
				clock,
			});

			const snapshot = await monitor.refresh();
			expect(monitor.getHistory().map(session => session.tokensUsed)).toEqual([900]);

			const saved = await store.load();
			expect(saved.history).toHaveLength(1);
			expect(saved.current?.id).toBe(snapshot?.session.id);
			expect(saved.current?.tokensUsed).toBe(snapshot?.session.tokensUsed);
		});

		it('publishes nothing for a stored open session when the logs are empty', async () => {
			await using fixture = await createFixture({
				'projects/.keep': '',
				'observed_sessions.json': JSON.stringify([{
					id: 'observed-1736503200',
					plan_type: 'Pro',
					tokens_used: 1200,
					tokens_limit: 40000,
					start_time: '2025-01-10T10:00:00Z',
					reset_time: '2025-01-10T15:00:00Z',
					is_active: true,
					end_time: null,
				}]),
			});
			const store = createSessionStore(fixture.getPath('observed_sessions.json'));
			const onSnapshot = vi.fn();
			await using monitor = new UsageMonitor({
				source: createFileUsageSource({
					config: { dataPaths: [fixture.getPath('projects')], allowedRoots: [fixture.path] },
					env: {},
				}),
				config: createMonitorConfig(),
				store,
				clock,
				onSnapshot,
			});

			expect(await monitor.refresh()).toBeNull();
			expect(monitor.getSnapshot()).toBeNull();
			expect(monitor.getHistory()).toEqual([]);
			expect(onSnapshot).toHaveBeenCalledWith(null);

			const saved = await store.load();
			expect(saved.current?.id).toBe('observed-1736503200');
			expect(saved.current?.tokensUsed).toBe(1200);
		});
	});
}
