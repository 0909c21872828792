export class LootError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'LootError';
  }
}

export class ConfigError extends LootError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export type FetchFailureReason = 'rate_limited' | 'network_error' | 'not_found';

export class FetchError extends LootError {
  constructor(
    message: string,
    public readonly reason: FetchFailureReason,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export type ParseFailureReason = 'missing_data_block' | 'malformed_entry';

export class ParseError extends LootError {
  constructor(
    message: string,
    public readonly reason: ParseFailureReason,
    details?: Record<string, unknown>,
  ) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class CacheError extends LootError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CACHE_ERROR', details);
    this.name = 'CacheError';
  }
}

export type WarningCode =
  | 'ENRICHMENT_WARNING'
  | 'DUPLICATE_ITEM'
  | 'MALFORMED_ENTRY'
  | 'INVALID_EXCLUSION_TOKEN';

/**
 * Non-fatal condition collected alongside a result instead of thrown.
 */
export interface LootWarning {
  code: WarningCode;
  message: string;
  itemId?: number;
  token?: string;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
