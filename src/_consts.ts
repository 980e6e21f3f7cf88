import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { xdgConfig, xdgData } from 'xdg-basedir';

/**
 * Package name used for config and data directory lookup
 */
export const APP_NAME = 'tokenmeter';

/**
 * User's home directory path
 */
export const USER_HOME_DIR = os.homedir();

/**
 * XDG config directory path, falling back to ~/.config
 */
const XDG_CONFIG_DIR = xdgConfig ?? path.join(USER_HOME_DIR, '.config');

/**
 * XDG data directory path, falling back to ~/.local/share
 */
const XDG_DATA_DIR = xdgData ?? path.join(USER_HOME_DIR, '.local', 'share');

/**
 * Environment variable holding a colon-separated list of data directories
 */
export const DATA_PATHS_ENV = 'CLAUDE_DATA_PATHS';

/**
 * Environment variable holding a single data directory
 */
export const DATA_PATH_ENV = 'CLAUDE_DATA_PATH';

/**
 * Default locations of the assistant's per-project JSONL logs
 */
export const DEFAULT_DATA_PATHS = [
	path.join(USER_HOME_DIR, '.claude', 'projects'),
	path.join(XDG_CONFIG_DIR, 'claude', 'projects'),
] as const;

/**
 * System-wide directories a data path may resolve into besides the home directory
 */
export const SYSTEM_DATA_ROOTS = [
	'/opt/claude',
	'/usr/local/share/claude',
	'/var/lib/claude',
] as const;

/**
 * Glob pattern for usage log files, relative to a data root
 */
export const USAGE_DATA_GLOB_PATTERN = '**/*.jsonl';

/**
 * Longest accepted path, in bytes
 */
export const MAX_PATH_LENGTH = 4096;

/**
 * Largest accepted JSON line (1 MiB)
 */
export const MAX_LINE_BYTES = 1024 * 1024;

/**
 * Deepest accepted object/array nesting in one record
 */
export const MAX_JSON_DEPTH = 32;

/**
 * Largest log file read at all (50 MiB)
 */
export const MAX_FILE_BYTES = 50 * 1024 * 1024;

/**
 * Default session duration in hours
 */
export const DEFAULT_SESSION_DURATION_HOURS = 5;

/**
 * Model name used when a record carries none
 */
export const UNKNOWN_MODEL = 'unknown';

/**
 * Timelines longer than this are downsampled
 */
export const MAX_TIMELINE_POINTS = 100;

/**
 * Approximate size of a downsampled timeline
 */
export const SAMPLED_TIMELINE_POINTS = 50;

export const CONFIG_FILE_NAME = 'config.json';

/**
 * Directories searched for the config file, in priority order
 */
export const CONFIG_SEARCH_DIRS = [
	path.join(process.cwd(), `.${APP_NAME}`),
	path.join(XDG_CONFIG_DIR, APP_NAME),
] as const;

/**
 * Directory and file name of persisted session state
 */
export const DEFAULT_STATE_DIR = path.join(XDG_DATA_DIR, APP_NAME);
export const SESSION_STATE_FILE_NAME = 'observed_sessions.json';
