import process from 'node:process';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import pc from 'picocolors';
import { renderSnapshot, renderWaiting } from '../_render.ts';
import { sharedArgs } from '../_shared-args.ts';
import { log, logger } from '../logger.ts';
import { UsageMonitor } from '../usage-monitor.ts';
import { applyLogLevel, resolveCommandContext } from './_context.ts';

export const statusCommand = define({
	name: 'status',
	description: 'Show the current observed session once',
	args: sharedArgs,
	toKebab: true,
	async run(ctx) {
		applyLogLevel({ debug: ctx.values.debug, quiet: ctx.values.json });

		const context = resolveCommandContext(ctx.values);
		if (Result.isFailure(context)) {
			logger.error(context.error.message);
			process.exit(1);
		}

		const { config, source, store } = context.value;
		await using monitor = new UsageMonitor({ source, config, store });
		const snapshot = await monitor.refresh();
		const skipped = monitor.getSkewedEntries().length;

		if (ctx.values.json) {
			log(JSON.stringify({ snapshot, skewedEntryCount: skipped }, null, 2));
			return;
		}

		const lines = snapshot != null
			? renderSnapshot(snapshot, { warningThreshold: config.warningThreshold })
			: renderWaiting();
		log(lines.join('\n'));
		if (skipped > 0) {
			log(pc.dim(`${skipped} entries dated in the future were ignored`));
		}
	},
});
