import { Response } from 'express';
import { serializeDocument } from './serialize';
import { APIErrorResponse, ErrorCode, ErrorDetail } from '../types/error-dtos';
import { DomainErrorCode, isDomainError } from './errors';
import { logger } from './logger';

const DOMAIN_ERROR_HTTP: Record<DomainErrorCode, { status: number; code: ErrorCode }> = {
  InvalidAmount: { status: 422, code: ErrorCode.INVALID_AMOUNT },
  ValidationFailed: { status: 422, code: ErrorCode.VALIDATION_ERROR },
  InvalidSignature: { status: 401, code: ErrorCode.INVALID_SIGNATURE },
  OrganizationMismatch: { status: 403, code: ErrorCode.PERMISSION_DENIED },
  PaymentNotFound: { status: 404, code: ErrorCode.NOT_FOUND },
  OrganizationNotFound: { status: 404, code: ErrorCode.NOT_FOUND },
  CustomerNotFound: { status: 404, code: ErrorCode.NOT_FOUND },
  InvoiceNotFound: { status: 404, code: ErrorCode.NOT_FOUND },
  PaymentPlanNotFound: { status: 404, code: ErrorCode.NOT_FOUND },
  NotificationNotFound: { status: 404, code: ErrorCode.NOT_FOUND },
  AmbiguousCustomer: { status: 409, code: ErrorCode.AMBIGUOUS_CUSTOMER },
  AlreadyTerminal: { status: 409, code: ErrorCode.CONFLICT },
  InvalidTransition: { status: 409, code: ErrorCode.INVALID_TRANSITION },
  NotPayable: { status: 409, code: ErrorCode.CONFLICT },
  NotReversible: { status: 400, code: ErrorCode.NOT_REVERSIBLE },
  AlreadyReversed: { status: 400, code: ErrorCode.NOT_REVERSIBLE },
  IntegrationNotConfigured: { status: 422, code: ErrorCode.INTEGRATION_NOT_CONFIGURED },
  ProviderUnavailable: { status: 503, code: ErrorCode.PROVIDER_UNAVAILABLE },
  ProviderRejected: { status: 502, code: ErrorCode.PROVIDER_REJECTED },
  InvalidCredentials: { status: 500, code: ErrorCode.PROVIDER_CREDENTIALS },
};

export class ResponseBuilder {
  /**
   * Sends a success response with automatic serialization
   */
  static success<T>(res: Response, data: T, statusCode: number = 200): void {
    res.status(statusCode).json(serializeDocument(data));
  }

  /**
   * Sends an error response
   */
  static error(
    res: Response,
    code: ErrorCode,
    message: string,
    statusCode: number,
    details?: ErrorDetail[]
  ): void {
    const errorResponse: APIErrorResponse = {
      error: {
        code,
        message,
        details,
        timestamp: new Date().toISOString(),
      },
    };

    res.status(statusCode).json(errorResponse);
  }

  /**
   * Maps a thrown service error onto the error envelope. Anything that is not a
   * DomainError is logged and reported as a 500 with `fallbackMessage`.
   */
  static fromError(res: Response, error: unknown, fallbackMessage: string): void {
    if (isDomainError(error)) {
      const { status, code } = DOMAIN_ERROR_HTTP[error.code];
      const details = error.details
        ? Object.entries(error.details).map(([field, value]) => ({ field, reason: error.code, value }))
        : undefined;
      this.error(res, code, error.message, status, details);
      return;
    }

    logger.error(fallbackMessage, { error });
    this.error(res, ErrorCode.INTERNAL_SERVER_ERROR, fallbackMessage, 500);
  }

  /**
   * 401 Unauthorized shortcut
   */
  static unauthorized(res: Response, message: string = 'Authentication required'): void {
    this.error(res, ErrorCode.UNAUTHORIZED, message, 401);
  }

  /**
   * 403 Forbidden shortcut
   */
  static forbidden(res: Response, message: string = 'Permission denied'): void {
    this.error(res, ErrorCode.PERMISSION_DENIED, message, 403);
  }

  /**
   * 422 Validation Error
   */
  static validationError(res: Response, details: ErrorDetail[]): void {
    this.error(res, ErrorCode.VALIDATION_ERROR, 'Input validation failed', 422, details);
  }
}
