import { NextFunction, Request, Response } from 'express';
import { ResponseBuilder } from '../utils/response-builder';
import { ErrorCode } from '../types/error-dtos';

function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

/** Unmatched routes. */
export function notFoundHandler(req: Request, res: Response): void {
  ResponseBuilder.error(res, ErrorCode.NOT_FOUND, `Route ${req.method} ${req.path} not found`, 404);
}

/** Last-resort handler for errors raised outside controllers, mostly body parsing. */
export function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  switch (bodyParserErrorType(error)) {
    case 'entity.parse.failed':
      ResponseBuilder.error(res, ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON', 400);
      return;
    case 'entity.too.large':
      ResponseBuilder.error(res, ErrorCode.VALIDATION_ERROR, 'Request body is too large', 413);
      return;
    default:
      ResponseBuilder.fromError(res, error, 'Unexpected server error.');
  }
}
