/**
 * Gate error taxonomy
 *
 * - UNAUTHORIZED: no matching access rule, bad bearer token, CSRF mismatch (401)
 * - FORBIDDEN: tier too low for a mutating method (403)
 * - MALFORMED_INPUT: unparsable webhook payload (400)
 * - UNVERIFIED: missing or wrong webhook signature; answered with no body
 * - BAD_REQUEST: request rejected by the HTTP layer before it reached the gate (4xx)
 * - INTERNAL_FAILURE: provider or session store failure (500)
 */

export type GateErrorCode =
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'MALFORMED_INPUT'
  | 'UNVERIFIED'
  | 'BAD_REQUEST'
  | 'INTERNAL_FAILURE'
  | 'CONFIGURATION_ERROR';

export class GateError extends Error {
  constructor(
    public code: GateErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GateError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GateError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createGateError(
  code: GateErrorCode,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): GateError {
  return new GateError(code, message, statusCode, details);
}

export const GateErrors = {
  UNAUTHORIZED: (reason: string, details?: Record<string, unknown>) =>
    createGateError('UNAUTHORIZED', `Unauthorized: ${reason}`, 401, details),

  FORBIDDEN: (method: string) =>
    createGateError('FORBIDDEN', `Read-only session cannot use method ${method}`, 403),

  MALFORMED_INPUT: (what: string, details?: Record<string, unknown>) =>
    createGateError('MALFORMED_INPUT', `Malformed ${what}`, 400, details),

  // 204: the sender gets no indication why the delivery was dropped
  UNVERIFIED: (reason: string) =>
    createGateError('UNVERIFIED', `Unverified webhook delivery: ${reason}`, 204),

  BAD_REQUEST: (statusCode: number, reason: string) =>
    createGateError('BAD_REQUEST', `Bad request: ${reason}`, statusCode),

  INTERNAL_FAILURE: (reason: string, details?: Record<string, unknown>) =>
    createGateError('INTERNAL_FAILURE', `Internal failure: ${reason}`, 500, details),

  CONFIGURATION_ERROR: (message: string) =>
    createGateError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

/**
 * Reduce an error to fields that are safe to log
 */
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof GateError) {
    return {
      type: 'GateError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

/**
 * Build the HTTP status and JSON body for an error response
 */
export function createErrorResponse(error: GateError): {
  statusCode: number;
  body: Record<string, unknown>;
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        ...(process.env.NODE_ENV === 'development' && error.details && { details: error.details }),
      },
    },
  };
}
