import process from 'node:process';
import { cli } from 'gunshi';
import { description, name, version } from '../../package.json';
import { APP_NAME } from '../_consts.ts';
import { historyCommand } from './history.ts';
import { monitorCommand } from './monitor.ts';
import { statusCommand } from './status.ts';

export { historyCommand, monitorCommand, statusCommand };

/**
 * Command entries as tuple array
 */
export const subCommandUnion = [
	['monitor', monitorCommand],
	['status', statusCommand],
	['history', historyCommand],
] as const;

export type CommandName = typeof subCommandUnion[number][0];

const subCommands = new Map();
for (const [commandName, command] of subCommandUnion) {
	subCommands.set(commandName, command);
}

/**
 * Default command when no subcommand is specified
 */
const mainCommand = monitorCommand;

export async function run(): Promise<void> {
	// npx may pass the binary name through as the first argument
	let args = process.argv.slice(2);
	if (args[0] === APP_NAME) {
		args = args.slice(1);
	}

	await cli(args, mainCommand, {
		name,
		version,
		description,
		subCommands,
		renderHeader: null,
	});
}
