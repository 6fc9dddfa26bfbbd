export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 mdsift domain 錯誤的基底類別 */
export abstract class MdSiftError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable ---

export class EmbeddingRateLimitError extends MdSiftError {
  readonly classification = 'retryable' as const;
  readonly code = 'EMBEDDING_RATE_LIMIT';

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// --- Degradable ---

export class EmbeddingUnavailableError extends MdSiftError {
  readonly classification = 'degradable' as const;
  readonly code = 'EMBEDDING_UNAVAILABLE';
}

export class ManifestCorruptError extends MdSiftError {
  readonly classification = 'degradable' as const;
  readonly code = 'MANIFEST_CORRUPT';
}

export class ChunkRecordInvalidError extends MdSiftError {
  readonly classification = 'degradable' as const;
  readonly code = 'CHUNK_RECORD_INVALID';

  constructor(
    public readonly key: string,
    public readonly reason: string,
    options?: ErrorOptions,
  ) {
    super(`Chunk record "${key}" is invalid: ${reason}`, options);
  }
}

export class CacheWriteError extends MdSiftError {
  readonly classification = 'degradable' as const;
  readonly code = 'CACHE_WRITE_FAILED';
}

// --- Manual ---

export class InvalidCacheKeyError extends MdSiftError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_CACHE_KEY';

  constructor(
    public readonly key: string,
    options?: ErrorOptions,
  ) {
    super(`Cache key "${key}" is not a safe file name`, options);
  }
}

export class QueryContextInvalidError extends MdSiftError {
  readonly classification = 'manual' as const;
  readonly code = 'QUERY_CONTEXT_INVALID';
}

export class ConfigInvalidError extends MdSiftError {
  readonly classification = 'manual' as const;
  readonly code = 'CONFIG_INVALID';
}
