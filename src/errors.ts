/**
 * Base error class for bytesniff errors
 */
export class BytesniffError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BytesniffError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when attempting to read beyond buffer bounds
 */
export class BufferOverflowError extends BytesniffError {
  public readonly requested: number;
  public readonly available: number;

  constructor(requested: number, available: number) {
    super(`Buffer overflow: requested ${requested} bytes but only ${available} available`);
    this.name = 'BufferOverflowError';
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Thrown by the file and stream adapters when the subject bytes cannot be
 * opened or read. The original error is kept as `cause`.
 */
export class SourceUnavailableError extends BytesniffError {
  public readonly source: string;
  public readonly code: string | undefined;

  constructor(source: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read ${source}: ${reason}`, { cause });
    this.name = 'SourceUnavailableError';
    this.source = source;
    this.code = errorCode(cause);
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
