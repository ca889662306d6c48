// Crash journal: persistent, human-readable record of server failures.
//
// Design principles:
//   - Errors are data: crashes become structured records, not silent deaths
//   - Fail fast with meaningful messages: journal then die, don't zombie
//   - Every failure is visible on the next start, through string_health
//
// Layout of the crash directory (configurable, see config.ts):
//   crash-<timestamp>.json  — one file per crash (no write conflicts)
//   LATEST.json             — copy of the most recent crash

import { mkdirSync, readdirSync, unlinkSync, writeFileSync, promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { MAX_CRASH_FILES } from './thresholds.js';

export interface CrashReport {
  readonly timestamp: string;         // ISO 8601
  readonly pid: number;
  readonly error: string;
  readonly stack?: string;
  readonly type: CrashType;
  readonly context: CrashContext;
  readonly recovery: string[];
  readonly serverUptime: number;      // seconds since startup
}

export type CrashType =
  | 'uncaught-exception'
  | 'unhandled-rejection'
  | 'startup-failure'
  | 'transport-error'
  | 'unknown';

/** What the server was doing when it crashed */
export interface CrashContext {
  readonly phase: 'startup' | 'running' | 'shutdown';
  readonly lastToolCall?: string;
  readonly configSource?: string;
  readonly storedStrings?: number;
}

/** Shape check for reports read back from disk */
const crashReportSchema = z.object({
  timestamp: z.string(),
  pid: z.number(),
  error: z.string(),
  stack: z.string().optional(),
  type: z.enum(['uncaught-exception', 'unhandled-rejection', 'startup-failure', 'transport-error', 'unknown']),
  context: z.object({
    phase: z.enum(['startup', 'running', 'shutdown']),
    lastToolCall: z.string().optional(),
    configSource: z.string().optional(),
    storedStrings: z.number().optional(),
  }),
  recovery: z.array(z.string()),
  serverUptime: z.number(),
});

let serverStartTime = Date.now();

/** Reset the start time (called on startup) */
export function markServerStarted(): void {
  serverStartTime = Date.now();
}

function crashFileName(report: CrashReport): string {
  return `crash-${report.timestamp.replace(/[:.]/g, '-')}.json`;
}

/** Synchronous write for process exit handlers, where async work never completes.
 *  Returns the written path, or null when the journal itself could not be written. */
export function writeCrashReportSync(report: CrashReport, crashDir: string): string | null {
  const filepath = path.join(crashDir, crashFileName(report));
  try {
    mkdirSync(crashDir, { recursive: true });
    const content = JSON.stringify(report, null, 2);
    writeFileSync(filepath, content, 'utf-8');
    writeFileSync(path.join(crashDir, 'LATEST.json'), content, 'utf-8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[string-analyzer-mcp] Could not write crash report to ${crashDir}: ${message}\n`);
    return null;
  }
  try {
    pruneCrashFiles(crashDir);
  } catch (error: unknown) {
    // best-effort: the report is already on disk
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[string-analyzer-mcp] Could not prune old crash reports in ${crashDir}: ${message}\n`);
  }
  return filepath;
}

/** Keep the newest MAX_CRASH_FILES reports */
function pruneCrashFiles(crashDir: string): void {
  const files = readdirSync(crashDir)
    .filter(f => f.startsWith('crash-') && f.endsWith('.json'))
    .sort()
    .reverse();
  for (const old of files.slice(MAX_CRASH_FILES)) {
    unlinkSync(path.join(crashDir, old));
  }
}

export function buildCrashReport(
  error: unknown,
  type: CrashType,
  context: CrashContext,
): CrashReport {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    timestamp: new Date().toISOString(),
    pid: process.pid,
    error: message,
    stack,
    type,
    context,
    recovery: generateRecoverySteps(type, message),
    serverUptime: Math.round((Date.now() - serverStartTime) / 1000),
  };
}

function generateRecoverySteps(type: CrashType, message: string): string[] {
  const steps: string[] = ['Restart the MCP server from your client. Analyzed strings are in memory only and must be re-added.'];

  switch (type) {
    case 'startup-failure':
      if (message.includes('string-analyzer-config.json')) {
        steps.push('Check string-analyzer-config.json for syntax errors (invalid JSON).');
      }
      steps.push('Run the server directly (node dist/index.js) to see stderr output.');
      break;

    case 'uncaught-exception':
    case 'unhandled-rejection':
      steps.push('This is likely a bug in the server.');
      steps.push('If reproducible, note which tool call triggered it and report the issue.');
      if (message.includes('ENOSPC')) {
        steps.push('Disk is full — free space and restart.');
      }
      break;

    case 'transport-error':
      steps.push('The stdio channel to the MCP client broke, usually because the client restarted.');
      break;

    default:
      steps.push('Check the stack trace for details.');
  }

  return steps;
}

/** Read the most recent crash report, or null when there is none */
export async function readLatestCrash(crashDir: string): Promise<CrashReport | null> {
  let content: string;
  try {
    content = await fs.readFile(path.join(crashDir, 'LATEST.json'), 'utf-8');
  } catch {
    return null; // no crash recorded
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[string-analyzer-mcp] Ignoring corrupt LATEST.json in ${crashDir}: ${message}\n`);
    return null;
  }
  const result = crashReportSchema.safeParse(parsed);
  if (!result.success) {
    process.stderr.write(`[string-analyzer-mcp] Ignoring malformed LATEST.json in ${crashDir}: ${result.error.issues[0]?.message ?? 'invalid'}\n`);
    return null;
  }
  return result.data;
}

/** Clear the latest crash indicator (call after it has been shown) */
export async function clearLatestCrash(crashDir: string): Promise<void> {
  await fs.rm(path.join(crashDir, 'LATEST.json'), { force: true });
}

/** One-line crash summary for the health response */
export function formatCrashSummary(report: CrashReport, now: Date = new Date()): string {
  const age = Math.round((now.getTime() - new Date(report.timestamp).getTime()) / 1000 / 60);
  const ageStr = age < 60 ? `${age}m ago` : `${Math.round(age / 60)}h ago`;
  return `[!] Server crashed ${ageStr}: ${report.type} — ${report.error.substring(0, 100)}`;
}
