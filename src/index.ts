#!/usr/bin/env node

// String Analyzer MCP Server
// Analyzes strings, keeps the results in memory, and answers structured and
// natural-language filter queries over them.

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { StringAnalysisService } from './service.js';
import { createServer } from './server.js';
import {
  buildCrashReport, writeCrashReportSync, markServerStarted,
  type CrashContext, type CrashType,
} from './crash-journal.js';

const { config, origin: configOrigin } = loadConfig();

// One service for the life of the process; every tool call goes through it
const service = new StringAnalysisService(config);

/** Track the last tool call for crash context */
let lastToolCall: string | undefined;

function currentCrashContext(phase: CrashContext['phase']): CrashContext {
  return {
    phase,
    lastToolCall,
    configSource: configOrigin.source,
    storedStrings: service.health().stored_strings,
  };
}

/** Journal a fatal error to the crash dir and report where it went */
function journal(error: unknown, type: CrashType, context: CrashContext): void {
  const report = buildCrashReport(error, type, context);
  const filepath = writeCrashReportSync(report, config.crashDir);
  if (filepath) {
    process.stderr.write(`[string-analyzer-mcp] Crash report saved: ${filepath}\n`);
  }
}

// --- Process-level crash protection ---
// On uncaught exception: journal the crash to disk, then die.
// Never zombie — unknown state is worse than no state.

process.on('uncaughtException', (error) => {
  process.stderr.write(`[string-analyzer-mcp] FATAL: Uncaught exception — journaling and exiting.\n`);
  process.stderr.write(`[string-analyzer-mcp] Error: ${error.message}\n`);
  if (error.stack) process.stderr.write(`[string-analyzer-mcp] Stack: ${error.stack}\n`);
  journal(error, 'uncaught-exception', currentCrashContext('running'));
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  process.stderr.write(`[string-analyzer-mcp] FATAL: Unhandled rejection — journaling and exiting.\n`);
  process.stderr.write(`[string-analyzer-mcp] Error: ${error.message}\n`);
  if (error.stack) process.stderr.write(`[string-analyzer-mcp] Stack: ${error.stack}\n`);
  journal(error, 'unhandled-rejection', currentCrashContext('running'));
  process.exit(1);
});

async function main(): Promise<void> {
  markServerStarted();

  const server = createServer(service, config, {
    onToolCall: (name) => { lastToolCall = name; },
  });
  const transport = new StdioServerTransport();

  transport.onerror = (error) => {
    process.stderr.write(`[string-analyzer-mcp] Transport error: ${error.message}\n`);
    journal(error, 'transport-error', currentCrashContext('running'));
  };

  server.onerror = (error) => {
    process.stderr.write(`[string-analyzer-mcp] Server error: ${error.message}\n`);
  };

  // Handle stdin/stdout pipe breaks
  process.stdin.on('end', () => {
    process.stderr.write('[string-analyzer-mcp] stdin closed — host disconnected. Exiting.\n');
    process.exit(0);
  });
  process.stdout.on('error', (error) => {
    process.stderr.write(`[string-analyzer-mcp] stdout error (pipe broken?): ${error.message}\n`);
    process.exit(0);
  });

  await server.connect(transport);
  const configStr = configOrigin.source === 'file' ? configOrigin.path : configOrigin.source;
  process.stderr.write(`[string-analyzer-mcp] Server started (config: ${configStr}, max length: ${config.maxValueLength})\n`);

  const shutdown = () => {
    process.stderr.write('[string-analyzer-mcp] Shutting down gracefully.\n');
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  process.stderr.write(`[string-analyzer-mcp] Fatal startup error: ${String(error)}\n`);
  if (error instanceof Error && error.stack) {
    process.stderr.write(`[string-analyzer-mcp] Stack: ${error.stack}\n`);
  }
  journal(error, 'startup-failure', { phase: 'startup', configSource: configOrigin.source });
  process.exit(1);
});
