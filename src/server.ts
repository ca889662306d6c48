// MCP request layer: tool definitions and handlers over a StringAnalysisService.
//
// Handlers validate arguments at the boundary (normalize, then Zod), call the
// service, and turn its Result values into tool responses. Domain failures come
// back as isError responses; nothing here throws past the dispatcher.

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { AnalyzerConfig, ServiceError } from './types.js';
import type { StringAnalysisService } from './service.js';
import { normalizeArgs } from './normalize.js';
import { describeFilterConflicts } from './filter-engine.js';
import { QUERY_RULES } from './query-rules.js';
import {
  formatJson, formatServiceError, formatDeleted, formatNaturalLanguageList, formatHealth,
} from './formatters.js';
import { readLatestCrash, clearLatestCrash, formatCrashSummary } from './crash-journal.js';

export const SERVER_INFO = { name: 'string-analyzer-mcp', version: '1.0.0' } as const;

export interface ServerOptions {
  /** Called with each tool name before it is handled (crash context tracking) */
  readonly onToolCall?: (name: string) => void;
}

const singleCharacter = z.string().refine(
  s => Array.from(s).length === 1,
  { message: 'must be exactly one character' },
);

const filterSchema = z.object({
  is_palindrome: z.boolean().optional(),
  min_length: z.number().int().min(0).optional(),
  max_length: z.number().int().min(0).optional(),
  word_count: z.number().int().min(0).optional(),
  contains_character: singleCharacter.optional(),
});

function text(body: string): CallToolResult {
  return { content: [{ type: 'text' as const, text: body }] };
}

function errorText(body: string): CallToolResult {
  return { content: [{ type: 'text' as const, text: body }], isError: true };
}

function serviceError(error: ServiceError): CallToolResult {
  return errorText(formatServiceError(error));
}

/** Turn a Zod error into one line per issue */
function describeZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('\n');
}

const TOOL_HINTS: Record<string, string> = {
  string_create: 'string_create requires: value (non-empty string)',
  string_get: 'string_get requires: value (the exact string) or id (its SHA-256 hash)',
  string_list: 'string_list accepts: is_palindrome (boolean), min_length, max_length, word_count (integers >= 0), contains_character (one character)',
  string_filter_nl: 'string_filter_nl requires: query (a phrase such as "single word palindromic strings")',
  string_delete: 'string_delete requires: value (the exact string)',
};

export function createServer(
  service: StringAnalysisService,
  config: AnalyzerConfig,
  options: ServerOptions = {},
): Server {
  const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });
  const indent = config.jsonIndent;

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'string_create',
        description: 'Analyze a string and store its properties (length, palindrome, word count, character frequency, SHA-256). Fails if the string is already stored.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            value: { type: 'string', description: 'The string to analyze' },
          },
          required: ['value'],
        },
      },
      {
        name: 'string_get',
        description: 'Fetch a stored analysis by the exact string, or by its id (SHA-256 hash).',
        inputSchema: {
          type: 'object' as const,
          properties: {
            value: { type: 'string', description: 'The exact stored string' },
            id: { type: 'string', description: 'SHA-256 hex digest of the string' },
          },
        },
      },
      {
        name: 'string_list',
        description: 'List stored strings, optionally filtered. All given filters must hold. Example: string_list(is_palindrome: true, min_length: 5)',
        inputSchema: {
          type: 'object' as const,
          properties: {
            is_palindrome: { type: 'boolean', description: 'Palindrome status (case-insensitive)' },
            min_length: { type: 'integer', minimum: 0, description: 'Minimum length, inclusive' },
            max_length: { type: 'integer', minimum: 0, description: 'Maximum length, inclusive' },
            word_count: { type: 'integer', minimum: 0, description: 'Exact word count' },
            contains_character: { type: 'string', minLength: 1, description: 'One character that must appear (case-insensitive)' },
          },
        },
      },
      {
        name: 'string_filter_nl',
        description: `Filter stored strings with a plain-English phrase. Examples: ${QUERY_RULES.slice(0, 5).map(r => `"${r.example}"`).join(', ')}`,
        inputSchema: {
          type: 'object' as const,
          properties: {
            query: { type: 'string', description: 'Natural language filter phrase' },
          },
          required: ['query'],
        },
      },
      {
        name: 'string_delete',
        description: 'Delete a stored string by its exact value.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            value: { type: 'string', description: 'The exact stored string' },
          },
          required: ['value'],
        },
      },
      {
        name: 'string_health',
        description: 'Health check: status, number of stored strings, uptime, and the last crash if one happened.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: rawArgs } = request.params;
    options.onToolCall?.(name);
    const args = normalizeArgs(name, rawArgs);

    try {
      switch (name) {
        case 'string_create': {
          const { value } = z.object({ value: z.string() }).parse(args);
          const result = service.create(value);
          if (!result.ok) return serviceError(result.error);
          process.stderr.write(`[string-analyzer-mcp] Stored ${result.value.id.substring(0, 12)} (${result.value.properties.length} chars)\n`);
          return text(formatJson(result.value, indent));
        }

        case 'string_get': {
          const { value, id } = z.object({
            value: z.string().optional(),
            id: z.string().optional(),
          }).parse(args);

          if (value !== undefined) {
            const result = service.getByValue(value);
            return result.ok ? text(formatJson(result.value, indent)) : serviceError(result.error);
          }
          if (id !== undefined) {
            const result = service.getById(id.toLowerCase());
            return result.ok ? text(formatJson(result.value, indent)) : serviceError(result.error);
          }
          return errorText(`Error: provide value or id\n\nHint: ${TOOL_HINTS.string_get}`);
        }

        case 'string_list': {
          const filter = filterSchema.parse(args);
          const conflicts = describeFilterConflicts(filter);
          if (conflicts.length > 0) {
            return errorText(`Invalid filter: ${conflicts.join('; ')}`);
          }
          return text(formatJson(service.listFiltered(filter), indent));
        }

        case 'string_filter_nl': {
          const { query } = z.object({ query: z.string().min(1) }).parse(args);
          return text(formatNaturalLanguageList(service.listByNaturalLanguage(query), indent));
        }

        case 'string_delete': {
          const { value } = z.object({ value: z.string() }).parse(args);
          const result = service.delete(value);
          if (!result.ok) return serviceError(result.error);
          process.stderr.write(`[string-analyzer-mcp] Deleted ${result.value.id.substring(0, 12)}\n`);
          return text(formatDeleted(result.value));
        }

        case 'string_health': {
          // A crash is surfaced once, then cleared
          const crash = await readLatestCrash(config.crashDir);
          if (crash) await clearLatestCrash(config.crashDir);
          return text(formatHealth(service.health(), indent, crash ? formatCrashSummary(crash) : undefined));
        }

        default:
          return errorText(`Unknown tool: ${name}`);
      }
    } catch (error) {
      const message = error instanceof z.ZodError
        ? describeZodError(error)
        : error instanceof Error ? error.message : String(error);
      const hint = TOOL_HINTS[name] ? `\n\nHint: ${TOOL_HINTS[name]}` : '';
      return errorText(`Error: ${message}${hint}`);
    }
  });

  return server;
}
