// Argument normalization for MCP tool calls.
//
// Agents frequently guess wrong param names and send numbers or booleans as strings.
// This module resolves common aliases and coerces obvious scalars before Zod
// validation, to avoid wasted round-trips from validation errors.
// Pure functions — no side effects, no state.

/** Aliases for the string a tool operates on */
const VALUE_ALIASES = ['text', 'string', 'input', 'str', 'content'];

/** Aliases for the natural-language query */
const QUERY_ALIASES = ['q', 'search', 'filter', 'phrase', 'text', 'prompt'];

/** Aliases for the content hash lookup key */
const ID_ALIASES = ['hash', 'sha256', 'sha256_hash', 'identifier'];

/** Filter param aliases — camelCase and short forms map to the canonical snake_case name */
const FILTER_ALIASES: Record<string, string> = {
  isPalindrome: 'is_palindrome',
  palindrome: 'is_palindrome',
  minLength: 'min_length',
  min: 'min_length',
  maxLength: 'max_length',
  max: 'max_length',
  wordCount: 'word_count',
  words: 'word_count',
  containsCharacter: 'contains_character',
  contains: 'contains_character',
  character: 'contains_character',
  char: 'contains_character',
};

const BOOLEAN_PARAMS = new Set(['is_palindrome']);
const INTEGER_PARAMS = new Set(['min_length', 'max_length', 'word_count']);

/** Move the first present alias to the canonical key, unless the canonical key is set */
function resolveAliases(args: Record<string, unknown>, aliases: readonly string[], canonical: string): void {
  if (canonical in args) return;
  for (const alias of aliases) {
    if (alias in args) {
      args[canonical] = args[alias];
      delete args[alias];
      return;
    }
  }
}

/** "true"/"false" → boolean, "12" → 12. Anything else is left for Zod to reject. */
function coerceScalar(key: string, value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim().toLowerCase();
  if (BOOLEAN_PARAMS.has(key)) {
    if (trimmed === 'true') return true;
    if (trimmed === 'false') return false;
  }
  if (INTEGER_PARAMS.has(key) && /^-?\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  return value;
}

/** Normalize args before Zod validation: resolve aliases, coerce filter scalars */
export function normalizeArgs(
  toolName: string,
  raw: Record<string, unknown> | undefined,
): Record<string, unknown> {
  const args: Record<string, unknown> = { ...(raw ?? {}) };

  switch (toolName) {
    case 'string_create':
    case 'string_delete':
      resolveAliases(args, VALUE_ALIASES, 'value');
      break;

    case 'string_get':
      resolveAliases(args, VALUE_ALIASES, 'value');
      resolveAliases(args, ID_ALIASES, 'id');
      break;

    case 'string_filter_nl':
      resolveAliases(args, QUERY_ALIASES, 'query');
      break;

    case 'string_list':
      for (const [alias, canonical] of Object.entries(FILTER_ALIASES)) {
        resolveAliases(args, [alias], canonical);
      }
      for (const [key, value] of Object.entries(args)) {
        args[key] = coerceScalar(key, value);
      }
      break;
  }

  return args;
}
