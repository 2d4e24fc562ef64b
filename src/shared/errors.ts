/**
 * Error taxonomy.
 *
 * - ParseError: malformed hyperedge text supplied by the caller
 * - InvalidArgumentError: out-of-range or ill-typed argument, raised before
 *   any store access
 * - StoreError: failure inside the hypergraph store, propagated as-is
 *
 * Validation outcomes (DENY, UNKNOWN) are results, never errors.
 */

export class HyperlayerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HyperlayerError';
  }
}

/**
 * Thrown when a hyperedge string cannot be parsed.
 * `offset` is the character index where parsing failed.
 */
export class ParseError extends HyperlayerError {
  constructor(
    message: string,
    public readonly input: string,
    public readonly offset: number,
  ) {
    super(`${message} at offset ${offset} in '${input}'`);
    this.name = 'ParseError';
  }
}

export class InvalidArgumentError extends HyperlayerError {
  constructor(
    public readonly argument: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Invalid ${argument}: ${message}`, options);
    this.name = 'InvalidArgumentError';
  }
}

export class StoreError extends HyperlayerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

/**
 * Wraps a foreign error as a StoreError. HyperlayerErrors pass through
 * unchanged so that a ParseError raised inside a store call keeps its type.
 */
export function toStoreError(context: string, err: unknown): HyperlayerError {
  if (err instanceof HyperlayerError) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new StoreError(`${context}: ${detail}`, { cause: err });
}
