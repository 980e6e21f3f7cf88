/**
 * Single-producer, single-consumer rescan signal.
 * Requests made while no one is waiting coalesce into one pending request.
 */

export type RescanReason = 'change' | 'poll' | 'manual';

export type RescanWakeup = RescanReason | 'tick';

export class RescanChannel implements Disposable {
	private pending: RescanReason | null = null;
	private waiter: ((wakeup: RescanWakeup | null) => void) | null = null;
	private closed = false;

	get hasPending(): boolean {
		return this.pending != null;
	}

	/**
	 * Posts a rescan request; never blocks
	 */
	request(reason: RescanReason): void {
		if (this.closed) {
			return;
		}
		if (this.waiter != null) {
			const wake = this.waiter;
			this.waiter = null;
			wake(reason);
			return;
		}
		this.pending ??= reason;
	}

	/**
	 * Waits for the next request, or `tick` after `timeoutMs`
	 * @returns `null` once the channel is closed or `signal` aborts
	 */
	async next(timeoutMs: number, signal?: AbortSignal): Promise<RescanWakeup | null> {
		if (this.pending != null) {
			const reason = this.pending;
			this.pending = null;
			return reason;
		}
		if (this.closed || signal?.aborted === true) {
			return null;
		}

		return new Promise<RescanWakeup | null>((resolve) => {
			const finish = (wakeup: RescanWakeup | null): void => {
				clearTimeout(timer);
				signal?.removeEventListener('abort', onAbort);
				this.waiter = null;
				resolve(wakeup);
			};
			const onAbort = (): void => finish(null);
			const timer = setTimeout(() => finish('tick'), timeoutMs);
			this.waiter = finish;
			signal?.addEventListener('abort', onAbort, { once: true });
		});
	}

	close(): void {
		this.closed = true;
		this.pending = null;
		const wake = this.waiter;
		this.waiter = null;
		wake?.(null);
	}

	[Symbol.dispose](): void {
		this.close();
	}
}

if (import.meta.vitest != null) {
	const { describe, it, expect, vi, afterEach } = import.meta.vitest;

	describe('RescanChannel', () => {
		afterEach(() => {
			vi.useRealTimers();
		});

		it('coalesces requests made while nobody waits', async () => {
			using channel = new RescanChannel();
			channel.request('change');
			channel.request('change');
			channel.request('poll');
			expect(await channel.next(1000)).toBe('change');
			expect(channel.hasPending).toBe(false);
		});

		it('wakes a waiting consumer', async () => {
			using channel = new RescanChannel();
			const wakeup = channel.next(60_000);
			channel.request('manual');
			expect(await wakeup).toBe('manual');
		});

		it('ticks after the timeout', async () => {
			vi.useFakeTimers();
			using channel = new RescanChannel();
			const wakeup = channel.next(3000);
			await vi.advanceTimersByTimeAsync(3000);
			expect(await wakeup).toBe('tick');
		});

		it('returns null on abort or close', async () => {
			using channel = new RescanChannel();
			const controller = new AbortController();
			const aborted = channel.next(60_000, controller.signal);
			controller.abort();
			expect(await aborted).toBeNull();

			const closed = channel.next(60_000);
			channel.close();
			expect(await closed).toBeNull();
			channel.request('change');
			expect(await channel.next(10)).toBeNull();
		});
	});
}
