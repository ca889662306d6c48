// Central limits and defaults for the string analyzer MCP.
//
// INTERNAL values are properties of the request layer, not user preferences.
// USER-FACING values can be overridden via string-analyzer-config.json or env vars;
// each comes with the range config.ts clamps it to.

import os from 'os';
import path from 'path';

// ─── Internal ──────────────────────────────────────────────────────────────

/** Characters of a value echoed back in short confirmations before truncation. */
export const VALUE_PREVIEW_CHARS = 80;

/** Crash reports kept on disk; older ones are pruned on write. */
export const MAX_CRASH_FILES = 20;

// ─── User-facing defaults ──────────────────────────────────────────────────

/** Longest value accepted for analysis, in code points. */
export const DEFAULT_MAX_VALUE_LENGTH = 100_000;
export const MAX_VALUE_LENGTH_RANGE: readonly [number, number] = [1, 10_000_000];

/** Indentation of JSON tool responses. 0 = compact. */
export const DEFAULT_JSON_INDENT = 2;
export const JSON_INDENT_RANGE: readonly [number, number] = [0, 8];

/** Where crash reports are journaled. */
export const DEFAULT_CRASH_DIR = path.join(os.homedir(), '.string-analyzer-mcp', 'crashes');
