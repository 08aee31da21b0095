import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { config } from '../config.js';

export interface TickerParams {
  pair: string;
}

export type ErrorKind = 'usage' | 'exchange' | 'validation' | 'transport';

/**
 * Base class for every failure the ticker pipeline reports on purpose.
 * Anything else reaching the protocol boundary is treated as an internal fault.
 */
export abstract class KrakenServiceError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = new.target.name;
  }
}

/** Required argument absent or malformed; raised before any network call. */
export class UsageError extends KrakenServiceError {
  readonly kind = 'usage';
}

/** Kraken answered, but with its own error array or without a `result`. */
export class ExchangeError extends KrakenServiceError {
  readonly kind = 'exchange';
}

/** The ticker entry does not have the expected field layout. */
export class ValidationError extends KrakenServiceError {
  readonly kind = 'validation';

  constructor(public readonly field: string, detail: string) {
    super(`Error parsing Kraken API response: field '${field}' ${detail}`);
  }
}

/** Network failure or non-2xx HTTP status. */
export class TransportError extends KrakenServiceError {
  readonly kind = 'transport';

  constructor(message: string, public readonly status?: number, cause?: unknown) {
    super(message, cause);
  }
}

// Type guards
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isTickerParams(params: unknown): params is TickerParams {
  return (
    isRecord(params) &&
    typeof params.pair === 'string' &&
    params.pair.trim().length > 0
  );
}

/**
 * Checks the `pair` argument of a tool or prompt invocation.
 */
export function requireTickerParams(params: unknown): TickerParams {
  if (!isRecord(params) || params.pair === undefined) {
    throw new UsageError(config.ERRORS.MISSING_PAIR);
  }
  if (!isTickerParams(params)) {
    throw new UsageError(config.ERRORS.INVALID_PAIR);
  }
  return { pair: params.pair };
}

/**
 * Collapses any failure into the single error shape the protocol layer reports.
 */
export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }
  if (error instanceof KrakenServiceError) {
    const code = error.kind === 'usage' ? ErrorCode.InvalidParams : ErrorCode.InternalError;
    return new McpError(code, error.message, { kind: error.kind });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new McpError(ErrorCode.InternalError, `Internal fault: ${message}`, { kind: 'internal' });
}
