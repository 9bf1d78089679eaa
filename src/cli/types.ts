import { z } from 'zod';
import { createLogger, serializeError } from '../core/log';
import { RouterError } from '../core/errors';

/**
 * Standard CLI result interface for successful operations
 *
 * Agent-readable output format:
 * - ok: boolean indicating success/failure
 * - command: the command that was executed
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 * - remaining keys: command-specific result data
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

/**
 * Standard CLI error interface
 *
 * Agent-readable error format:
 * - ok: always false
 * - reason: machine-readable error code
 * - message: human-readable error description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

/** A handler bound to the schema that validates its raw Commander input. */
export interface RegisteredHandler {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function defineHandler<TInput>(
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>
): RegisteredHandler {
  return {
    run: async (rawInput) => handler(schema.parse(rawInput)),
  };
}

export function isCLIError<T extends object>(value: T | CLIError): value is CLIError {
  return 'ok' in value && value.ok === false;
}

/**
 * Execute a CLI handler with validation and error handling
 *
 * @param commandKey - Unique command identifier (e.g., 'search', 'validate')
 * @param rawInput - Raw input from Commander.js (arguments + options)
 *
 * @example
 * ```typescript
 * .action(async (text, options) => {
 *   await executeHandler('search', { text, ...options });
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const { cliHandlers } = await import('./registry.js');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();

  const handler = cliHandlers[commandKey];
  if (!handler) {
    console.error(JSON.stringify(
      {
        ok: false,
        reason: 'unknown_command',
        command: commandKey,
        timestamp,
        hint: 'Run "realty-rag --help" to see available commands',
      },
      null,
      2
    ));
    process.exit(1);
    return;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await handler.run(rawInput);
    const duration_ms = Date.now() - startedAt;
    const out = { ...result, command: commandKey, timestamp, duration_ms };

    if (result.ok) {
      console.log(JSON.stringify(out, null, 2));
      process.exit(0);
    } else {
      process.stderr.write(JSON.stringify(out, null, 2) + '\n');
      process.exit(2);
    }
  } catch (e) {
    const duration_ms = Date.now() - startedAt;

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      }));
      console.error(JSON.stringify(
        {
          ok: false,
          reason: ErrorReasons.VALIDATION_ERROR,
          message: 'Invalid command arguments',
          command: commandKey,
          timestamp,
          duration_ms,
          errors,
          hint: ErrorHints.VALIDATION_ERROR,
        },
        null,
        2
      ));
      process.exit(1);
      return;
    }

    log.error(commandKey, { ok: false, err: serializeError(e) });

    console.error(JSON.stringify(
      {
        ok: false,
        reason: e instanceof RouterError ? e.code : ErrorReasons.INTERNAL_ERROR,
        message: e instanceof Error ? e.message : String(e),
        command: commandKey,
        timestamp,
        duration_ms,
        hint: 'An unexpected error occurred. Check logs for details.',
      },
      null,
      2
    ));
    process.exit(1);
  }
}

/**
 * Create a success result with agent-readable metadata
 */
export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

/**
 * Create an error result with agent-readable metadata
 */
export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

/**
 * Common error reasons for consistent agent handling
 */
export const ErrorReasons = {
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
  INVALID_CONFIG: 'invalid_config',
  STORE_UNAVAILABLE: 'store_unavailable',
  SEARCH_FAILED: 'search_failed',
  EVIDENCE_NOT_FOUND: 'evidence_not_found',
  EVIDENCE_INVALID: 'evidence_invalid',
  LOG_NOT_FOUND: 'analytics_log_not_found',
} as const;

/**
 * Common hints for error resolution
 */
export const ErrorHints = {
  VALIDATION_ERROR: 'Check command syntax with --help',
  INVALID_CONFIG: 'Check REALTY_RAG_*, LANCEDB_DIR, NEO4J_* and EMBEDDING_* environment variables',
  STORE_UNAVAILABLE: 'Ensure LANCEDB_DIR points at a populated LanceDB directory and NEO4J_URI is reachable',
  EVIDENCE_NOT_FOUND: 'Pass --evidence <file> pointing at a JSON array of { content } objects or a search result',
  EVIDENCE_INVALID: 'Evidence must be a JSON array of { content, metadata? } objects or an object with a results array',
  LOG_NOT_FOUND: 'Run "realty-rag search" first or pass --log <file>',
} as const;
