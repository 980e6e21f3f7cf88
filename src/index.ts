#!/usr/bin/env node

/**
 * @fileoverview Entry point for the tokenmeter CLI
 *
 * Commands:
 * - monitor: live view of the current observed session (default)
 * - status: one pass, printed once
 * - history: stored sessions
 *
 * @module index
 */

import { run } from './commands/index.ts';

// eslint-disable-next-line antfu/no-top-level-await
await run();
