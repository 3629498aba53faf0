/**
 * Indexer Error Classes
 *
 * Each failure mode of the ingestion pipeline has its own class. The `code`
 * field is what the batch processor and scheduler switch on.
 */

/**
 * Ledger query failed (network, timeout, rate limit). Retried by the scheduler.
 */
export class TransientFetchError extends Error {
  readonly code = 'TRANSIENT_FETCH' as const;

  constructor(
    public readonly operation: string,
    cause?: unknown
  ) {
    super(`Ledger query ${operation} failed`);
    this.name = 'TransientFetchError';
    this.cause = cause;
  }
}

/**
 * A resolved log whose payload could not be unpacked into its typed shape.
 */
export class DecodeSkipError extends Error {
  readonly code = 'DECODE_SKIP' as const;

  constructor(
    public readonly eventName: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Failed to decode ${eventName}: ${reason}`);
    this.name = 'DecodeSkipError';
    this.cause = cause;
  }
}

/**
 * A non-opening lifecycle event targets a pair with no position.
 */
export class PositionNotFoundError extends Error {
  readonly code = 'POSITION_NOT_FOUND' as const;

  constructor(
    public readonly walletAddress: string,
    public readonly asset: string
  ) {
    super(`No position found for wallet ${walletAddress || '<none>'} and asset ${asset || '<none>'}`);
    this.name = 'PositionNotFoundError';
  }
}

/**
 * A lifecycle event targets a pair whose latest position is closed or liquidated.
 */
export class PositionTerminatedError extends Error {
  readonly code = 'POSITION_TERMINATED' as const;

  constructor(
    public readonly positionId: number,
    public readonly status: string
  ) {
    super(`Position #${positionId} is ${status} and cannot be updated`);
    this.name = 'PositionTerminatedError';
  }
}

/**
 * An opening event for a pair that already has an active position.
 */
export class ActivePositionExistsError extends Error {
  readonly code = 'ACTIVE_POSITION_EXISTS' as const;

  constructor(public readonly positionId: number) {
    super(`Position #${positionId} is still active for this wallet and asset`);
    this.name = 'ActivePositionExistsError';
  }
}

/**
 * Identity assignment collided with an existing document. Fatal.
 */
export class DuplicateIdentityError extends Error {
  readonly code = 'DUPLICATE_IDENTITY' as const;

  constructor(
    public readonly positionId: number,
    cause?: unknown
  ) {
    super(`Position identity #${positionId} is already assigned`);
    this.name = 'DuplicateIdentityError';
    this.cause = cause;
  }
}

/**
 * updateLatest matched no document.
 */
export class NotFoundError extends Error {
  readonly code = 'NOT_FOUND' as const;

  constructor(public readonly filter: Record<string, unknown>) {
    super(`No document matches ${JSON.stringify(filter)}`);
    this.name = 'NotFoundError';
  }
}

/**
 * The document store rejected a read or write.
 */
export class PersistenceError extends Error {
  readonly code = 'PERSISTENCE' as const;

  constructor(
    public readonly operation: string,
    cause?: unknown
  ) {
    super(`Persistence operation ${operation} failed`);
    this.name = 'PersistenceError';
    this.cause = cause;
  }
}

/**
 * No live or cached oracle price could be read.
 */
export class PriceUnavailableError extends Error {
  readonly code = 'PRICE_UNAVAILABLE' as const;

  constructor(
    public readonly token: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Price unavailable for ${token}: ${reason}`);
    this.name = 'PriceUnavailableError';
    this.cause = cause;
  }
}

/**
 * Environment configuration failed validation.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG' as const;

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Errors a single lifecycle event can be rejected with. The batch logs them
 * and moves on.
 */
export type FoldRejection =
  | PositionNotFoundError
  | PositionTerminatedError
  | ActivePositionExistsError
  | NotFoundError;

export function isFoldRejection(error: unknown): error is FoldRejection {
  return (
    error instanceof PositionNotFoundError ||
    error instanceof PositionTerminatedError ||
    error instanceof ActivePositionExistsError ||
    error instanceof NotFoundError
  );
}

/**
 * Errors after which the scheduler retries the same block range.
 */
export function isRetryable(error: unknown): error is TransientFetchError | PersistenceError {
  return error instanceof TransientFetchError || error instanceof PersistenceError;
}
