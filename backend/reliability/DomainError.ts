export const DOMAIN_ERROR_CODES = [
  'VALIDATION_ERROR',
  'NOT_FOUND',
  'DEPENDENCY_CONFLICT',
  'DUPLICATE',
  'STORAGE_FAILURE',
  'UNKNOWN_ERROR',
] as const;

export type DomainErrorCode = (typeof DOMAIN_ERROR_CODES)[number];

export type DomainErrorDetails = Record<string, unknown>;

/**
 * Error raised by repositories, the batch engine and the HTTP service.
 *
 * `itemScoped` errors fail one batch item and let the rest of the batch run;
 * anything else aborts the batch and rolls it back.
 */
export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly details?: DomainErrorDetails;
  readonly cause?: unknown;

  constructor(args: {
    code: DomainErrorCode;
    message: string;
    details?: DomainErrorDetails;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = 'DomainError';
    this.code = args.code;
    this.details = args.details;
    this.cause = args.cause;
  }

  get itemScoped(): boolean {
    return this.code !== 'STORAGE_FAILURE' && this.code !== 'UNKNOWN_ERROR';
  }

  get retryable(): boolean {
    return this.code === 'STORAGE_FAILURE';
  }
}

export const isDomainError = (err: unknown): err is DomainError =>
  err instanceof DomainError;

/** Wraps anything thrown into an `UNKNOWN_ERROR`, keeping the original as `cause`. */
export function asDomainError(err: unknown): DomainError {
  if (isDomainError(err)) return err;
  return new DomainError({
    code: 'UNKNOWN_ERROR',
    message: err instanceof Error ? err.message : String(err ?? 'Unexpected error.'),
    cause: err,
  });
}

export const validationError = (
  message: string,
  details?: DomainErrorDetails,
): DomainError => new DomainError({ code: 'VALIDATION_ERROR', message, details });
