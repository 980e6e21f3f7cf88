import type { SessionSnapshot } from '../_pipeline.ts';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import pc from 'picocolors';
import { renderSnapshot, renderWaiting } from '../_render.ts';
import { sharedArgs } from '../_shared-args.ts';
import { log, logger } from '../logger.ts';
import { UsageMonitor } from '../usage-monitor.ts';
import { applyLogLevel, resolveCommandContext } from './_context.ts';

const CLEAR_SCREEN = '\u001B[2J\u001B[H';

export const monitorCommand = define({
	name: 'monitor',
	description: 'Watch usage logs and show the current session live',
	args: {
		...sharedArgs,
		interval: {
			type: 'number',
			short: 'i',
			description: 'Refresh interval in seconds (default: 3)',
		},
	},
	toKebab: true,
	async run(ctx) {
		// The screen belongs to the renderer unless debug logs were asked for
		applyLogLevel({ debug: ctx.values.debug, quiet: true });

		const context = resolveCommandContext(ctx.values);
		if (Result.isFailure(context)) {
			logger.error(context.error.message);
			process.exit(1);
		}

		const { config, source, store } = context.value;
		const json = ctx.values.json;
		const draw = (snapshot: SessionSnapshot | null): void => {
			if (json) {
				log(JSON.stringify({ snapshot }));
				return;
			}
			const lines = snapshot != null
				? renderSnapshot(snapshot, { warningThreshold: config.warningThreshold })
				: renderWaiting();
			if (!ctx.values.debug) {
				process.stdout.write(CLEAR_SCREEN);
			}
			log([...lines, '', pc.dim(`Updating every ${config.updateIntervalSeconds}s. Press Ctrl+C to exit.`)].join('\n'));
		};

		const abortController = new AbortController();
		const shutdown = (): void => {
			abortController.abort();
		};
		process.once('SIGINT', shutdown);
		process.once('SIGTERM', shutdown);

		const monitor = new UsageMonitor({ source, config, store, onSnapshot: draw });
		try {
			await monitor.start(abortController.signal);
		}
		finally {
			process.off('SIGINT', shutdown);
			process.off('SIGTERM', shutdown);
		}
		logger.info('Live monitoring stopped.');
	},
});
