import { Request, Response } from 'express';
import { validationResult } from 'express-validator';
import { ResponseBuilder } from './response-builder';
import { parseMoney } from './money';

/**
 * Sends the 422 envelope when the route's validation chain collected errors.
 * @returns true when a response was sent and the controller must stop.
 */
export function rejectInvalidRequest(req: Request, res: Response): boolean {
  const errors = validationResult(req);
  if (errors.isEmpty()) return false;

  ResponseBuilder.validationError(
    res,
    errors.array().map(err => ({
      field: err.type === 'field' ? err.path : undefined,
      reason: String(err.msg),
      value: err.type === 'field' ? err.value : undefined,
    }))
  );
  return true;
}

/** express-validator custom check for decimal money input ("500", "500.50", 500.5). */
export function isMoneyInput(value: unknown): boolean {
  parseMoney(value);
  return true;
}
