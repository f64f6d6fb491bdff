export interface APIErrorResponse {
  error: {
    code: string;
    message: string;
    details?: ErrorDetail[];
    timestamp: string;
  };
}

export interface ErrorDetail {
  field?: string;
  reason: string;
  value?: unknown;
}

export enum ErrorCode {
  // Auth errors
  UNAUTHORIZED = 'unauthorized',
  PERMISSION_DENIED = 'permission_denied',
  INVALID_SIGNATURE = 'invalid_signature',

  // Validation errors
  VALIDATION_ERROR = 'validation_error',
  INVALID_AMOUNT = 'invalid_amount',

  // Resource errors
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',

  // Business logic errors
  AMBIGUOUS_CUSTOMER = 'ambiguous_customer',
  INVALID_TRANSITION = 'invalid_transition',
  NOT_REVERSIBLE = 'not_reversible',
  INTEGRATION_NOT_CONFIGURED = 'integration_not_configured',

  // Provider errors
  PROVIDER_UNAVAILABLE = 'provider_unavailable',
  PROVIDER_REJECTED = 'provider_rejected',
  PROVIDER_CREDENTIALS = 'provider_credentials',

  // System errors
  INTERNAL_SERVER_ERROR = 'internal_server_error',
}
