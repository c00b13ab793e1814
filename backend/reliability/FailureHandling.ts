import crypto from 'crypto';

import { telemetry } from '../telemetry/Telemetry';
import { asDomainError, type DomainError, type DomainErrorCode } from './DomainError';

export type PublicApiError = {
  errorId: string;
  code: DomainErrorCode;
  message: string;
  retryable: boolean;
};

export type ApiErrorResponse = {
  success: false;
  errorMessage: string;
  error: PublicApiError;
};

type ErrorPolicy = {
  status: number;
  /** Used when the error's own message must not reach the client, or is empty. */
  fallback: string;
  exposeMessage: boolean;
};

const ERROR_POLICIES: Record<DomainErrorCode, ErrorPolicy> = {
  VALIDATION_ERROR: { status: 400, fallback: 'Invalid request.', exposeMessage: true },
  NOT_FOUND: { status: 404, fallback: 'Requested record not found.', exposeMessage: true },
  DEPENDENCY_CONFLICT: {
    status: 409,
    fallback: 'Record is still referenced by other records.',
    exposeMessage: true,
  },
  DUPLICATE: { status: 409, fallback: 'Record already exists.', exposeMessage: true },
  STORAGE_FAILURE: {
    status: 503,
    fallback: 'Readiness database unavailable. Please retry later.',
    exposeMessage: false,
  },
  UNKNOWN_ERROR: { status: 500, fallback: 'Unexpected error.', exposeMessage: false },
};

export const httpStatusFor = (code: DomainErrorCode): number =>
  ERROR_POLICIES[code].status;

const publicMessageFor = (err: DomainError): string => {
  const policy = ERROR_POLICIES[err.code];
  return policy.exposeMessage && err.message ? err.message : policy.fallback;
};

/**
 * Turns a thrown value into the `{ success: false }` envelope and its status.
 * The full error (with stack, for unknown errors) is logged as one JSON line
 * under a fresh error id, which is also returned to the client.
 */
export function mapErrorToApiResponse(
  err: unknown,
  context: { operation: string },
): {
  status: number;
  body: ApiErrorResponse;
} {
  const errorId = crypto.randomUUID();
  const domain = asDomainError(err);

  telemetry.record({
    name: 'api.error',
    tags: { operation: context.operation, code: domain.code, errorId },
  });

  // eslint-disable-next-line no-console
  console.error(
    JSON.stringify({
      type: 'trl.error',
      errorId,
      operation: context.operation,
      code: domain.code,
      message: domain.message,
      details: domain.details,
      stack: domain.code === 'UNKNOWN_ERROR' ? domain.stack : undefined,
    }),
  );

  const message = publicMessageFor(domain);
  return {
    status: httpStatusFor(domain.code),
    body: {
      success: false,
      errorMessage: message,
      error: { errorId, code: domain.code, message, retryable: domain.retryable },
    },
  };
}
