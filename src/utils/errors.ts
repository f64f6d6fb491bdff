export type DomainErrorCode =
  | 'InvalidAmount'
  | 'InvalidSignature'
  | 'PaymentNotFound'
  | 'AlreadyTerminal'
  | 'ProviderUnavailable'
  | 'ProviderRejected'
  | 'InvalidCredentials'
  | 'OrganizationMismatch'
  | 'AmbiguousCustomer'
  | 'InvalidTransition'
  | 'NotReversible'
  | 'AlreadyReversed'
  | 'IntegrationNotConfigured'
  | 'OrganizationNotFound'
  | 'CustomerNotFound'
  | 'InvoiceNotFound'
  | 'NotPayable'
  | 'PaymentPlanNotFound'
  | 'NotificationNotFound'
  | 'ValidationFailed';

/**
 * Error raised by services. Controllers translate `code` into an HTTP status,
 * so the message is free-form and may be shown to API callers.
 */
export class DomainError extends Error {
  public readonly code: DomainErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: DomainErrorCode, message?: string, details?: Record<string, unknown>) {
    super(message ?? code);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
  }
}

export type ProviderErrorCode = Extract<DomainErrorCode, 'ProviderUnavailable' | 'ProviderRejected' | 'InvalidCredentials'>;

/** Failure reported by a money-movement provider. Only `ProviderUnavailable` is worth retrying. */
export class ProviderError extends DomainError {
  public readonly retryable: boolean;
  public readonly httpStatus?: number;
  public readonly responseBody?: unknown;

  constructor(
    code: ProviderErrorCode,
    message: string,
    options: { httpStatus?: number; responseBody?: unknown } = {}
  ) {
    super(code, message);
    this.name = 'ProviderError';
    this.retryable = code === 'ProviderUnavailable';
    this.httpStatus = options.httpStatus;
    this.responseBody = options.responseBody;
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
