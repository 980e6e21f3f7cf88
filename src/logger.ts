/**
 * @fileoverview Logging utilities
 *
 * Provides the consola instance shared by the monitor, tagged with the package
 * name. `LOG_LEVEL` overrides the level (0 silent ... 5 trace).
 *
 * @module logger
 */

import type { ConsolaInstance } from 'consola';
import process from 'node:process';
import { consola } from 'consola';
import { name } from '../package.json';

export function createLogger(tag: string): ConsolaInstance {
	const instance: ConsolaInstance = consola.withTag(tag);

	if (process.env.LOG_LEVEL != null) {
		const level = Number.parseInt(process.env.LOG_LEVEL, 10);
		if (!Number.isNaN(level)) {
			instance.level = level;
		}
	}

	return instance;
}

/**
 * Application logger instance with package name tag
 */
export const logger: ConsolaInstance = createLogger(name);

/**
 * Direct console.log function for command output that should not be decorated
 */
// eslint-disable-next-line no-console
export const log = console.log;
