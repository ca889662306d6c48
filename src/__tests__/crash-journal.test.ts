// Tests for crash-journal.ts — crash report lifecycle: build, write, prune, read, clear, format.
// Uses real disk I/O in an isolated temp crash directory — no mocks.

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import {
  buildCrashReport,
  writeCrashReportSync,
  readLatestCrash,
  clearLatestCrash,
  formatCrashSummary,
  markServerStarted,
  type CrashReport,
  type CrashContext,
} from '../crash-journal.js';

describe('buildCrashReport', () => {
  it('builds a report from an Error', () => {
    markServerStarted();
    const context: CrashContext = { phase: 'running', lastToolCall: 'string_create', configSource: 'default' };
    const report = buildCrashReport(new Error('Test failure'), 'uncaught-exception', context);

    assert.strictEqual(report.error, 'Test failure');
    assert.ok(report.stack?.includes('Test failure'), 'Should include stack trace');
    assert.strictEqual(report.type, 'uncaught-exception');
    assert.strictEqual(report.context.lastToolCall, 'string_create');
    assert.strictEqual(report.pid, process.pid);
    assert.strictEqual(report.serverUptime, 0);
    assert.strictEqual(report.recovery[1], 'This is likely a bug in the server.');
  });

  it('builds a report from a non-Error value', () => {
    const report = buildCrashReport('string error', 'unknown', { phase: 'startup' });
    assert.strictEqual(report.error, 'string error');
    assert.strictEqual(report.stack, undefined, 'Non-Error has no stack');
    assert.strictEqual(report.recovery[1], 'Check the stack trace for details.');
  });

  it('adds a config hint for config startup failures', () => {
    const report = buildCrashReport(new Error('bad string-analyzer-config.json'), 'startup-failure', { phase: 'startup' });
    assert.strictEqual(report.recovery[1], 'Check string-analyzer-config.json for syntax errors (invalid JSON).');
  });
});

describe('crash journal on disk', () => {
  let crashDir: string;

  beforeEach(async () => {
    crashDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'string-analyzer-crash-test-')), 'crashes');
  });

  afterEach(async () => {
    await fs.rm(path.dirname(crashDir), { recursive: true, force: true });
  });

  it('writes, reads back, and clears the latest crash', async () => {
    const report = buildCrashReport(new Error('boom'), 'transport-error', { phase: 'running' });
    const filepath = writeCrashReportSync(report, crashDir);
    assert.ok(filepath);
    assert.strictEqual(path.dirname(filepath), crashDir);

    const latest = await readLatestCrash(crashDir);
    assert.deepStrictEqual(latest, report);

    await clearLatestCrash(crashDir);
    assert.strictEqual(await readLatestCrash(crashDir), null);
    // the per-crash file stays
    await fs.access(filepath);
  });

  it('returns null when nothing was journaled', async () => {
    assert.strictEqual(await readLatestCrash(crashDir), null);
  });

  it('ignores a corrupt LATEST.json', async () => {
    await fs.mkdir(crashDir, { recursive: true });
    await fs.writeFile(path.join(crashDir, 'LATEST.json'), '{ truncated');
    assert.strictEqual(await readLatestCrash(crashDir), null);
  });

  it('ignores a LATEST.json that is not a crash report', async () => {
    await fs.mkdir(crashDir, { recursive: true });
    await fs.writeFile(path.join(crashDir, 'LATEST.json'), '{}');
    assert.strictEqual(await readLatestCrash(crashDir), null);

    await fs.writeFile(path.join(crashDir, 'LATEST.json'), JSON.stringify({ error: 42, type: 'uncaught-exception' }));
    assert.strictEqual(await readLatestCrash(crashDir), null);
  });

  it('prunes old reports down to the newest ones', async () => {
    await fs.mkdir(crashDir, { recursive: true });
    for (let i = 10; i < 35; i++) {
      await fs.writeFile(path.join(crashDir, `crash-0-${i}.json`), '{}');
    }
    writeCrashReportSync(buildCrashReport(new Error('boom'), 'unknown', { phase: 'running' }), crashDir);
    const files = (await fs.readdir(crashDir)).filter(f => f.startsWith('crash-'));
    assert.strictEqual(files.length, 20);
    assert.ok(!files.includes('crash-0-10.json'));
  });

  it('still reports the written path when pruning fails', async () => {
    await fs.mkdir(crashDir, { recursive: true });
    // directories named like reports cannot be unlinked
    for (let i = 10; i < 31; i++) {
      await fs.mkdir(path.join(crashDir, `crash-0-${i}.json`));
    }
    const report = buildCrashReport(new Error('boom'), 'unknown', { phase: 'running' });
    const filepath = writeCrashReportSync(report, crashDir);
    assert.ok(filepath);
    assert.deepStrictEqual(await readLatestCrash(crashDir), report);
  });

  it('clearing twice is harmless', async () => {
    await clearLatestCrash(crashDir);
    await clearLatestCrash(crashDir);
  });
});

describe('formatting', () => {
  const report: CrashReport = {
    timestamp: '2026-05-01T10:00:00.000Z',
    pid: 1234,
    error: 'Cannot read properties of undefined',
    stack: 'Error: Cannot read properties of undefined\n    at handler (server.js:10:5)',
    type: 'uncaught-exception',
    context: { phase: 'running', lastToolCall: 'string_list' },
    recovery: ['Restart the server.'],
    serverUptime: 42,
  };

  it('formats a one-line summary with age in minutes', () => {
    const summary = formatCrashSummary(report, new Date('2026-05-01T10:30:00.000Z'));
    assert.strictEqual(summary, '[!] Server crashed 30m ago: uncaught-exception — Cannot read properties of undefined');
  });

  it('formats a one-line summary with age in hours', () => {
    const summary = formatCrashSummary(report, new Date('2026-05-01T13:00:00.000Z'));
    assert.strictEqual(summary, '[!] Server crashed 3h ago: uncaught-exception — Cannot read properties of undefined');
  });
});
