/**
 * @fileoverview Error types raised while ingesting usage logs
 *
 * None of these errors crash the monitor. They are returned as Result failures,
 * logged, and the offending path, line or watcher is skipped.
 *
 * @module _errors
 */

export type InvalidPathReason =
	| 'empty'
	| 'null-byte'
	| 'too-long'
	| 'traversal'
	| 'unresolvable'
	| 'outside-allowed-roots';

/**
 * A candidate data path failed validation and will not be opened
 */
export class InvalidPathError extends Error {
	readonly reason: InvalidPathReason;
	readonly path: string;

	constructor(path: string, reason: InvalidPathReason, message: string) {
		super(message);
		this.name = 'InvalidPathError';
		this.path = path;
		this.reason = reason;
	}
}

export type MalformedRecordReason =
	| 'line-too-large'
	| 'too-deep'
	| 'invalid-json'
	| 'not-an-object'
	| 'invalid-usage'
	| 'invalid-timestamp';

/**
 * One JSONL line could not be turned into a usage entry
 */
export class MalformedRecordError extends Error {
	readonly reason: MalformedRecordReason;

	constructor(reason: MalformedRecordReason, message: string) {
		super(message);
		this.name = 'MalformedRecordError';
		this.reason = reason;
	}
}

/**
 * A log file exceeds the whole-file ceiling and is skipped before parsing
 */
export class FileTooLargeError extends Error {
	readonly path: string;
	readonly size: number;
	readonly limit: number;

	constructor(path: string, size: number, limit: number) {
		super(`File ${path} is ${size} bytes, above the ${limit} byte limit`);
		this.name = 'FileTooLargeError';
		this.path = path;
		this.size = size;
		this.limit = limit;
	}
}

/**
 * The file-system watcher could not be set up or failed while running
 */
export class WatchInitFailedError extends Error {
	constructor(cause: unknown) {
		super(`File watcher failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
		this.name = 'WatchInitFailedError';
	}
}
