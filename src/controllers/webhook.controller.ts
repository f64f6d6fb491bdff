import { Request, Response } from 'express';
import { PaymentService } from '../services/payment.service';
import { rawBodyOf } from '../middleware/rawBody.middleware';
import { ResponseBuilder } from '../utils/response-builder';
import { logger } from '../utils/logger';

export const MPESA_SIGNATURE_HEADER = 'x-mpesa-signature';

export function createWebhookController(payments: PaymentService) {
  /**
   * Provider callback. POST /webhooks/mpesa/:integrationId
   * Duplicates, orphans and malformed payloads are acknowledged so the provider stops retrying.
   */
  const mpesaCallbackController = async (req: Request, res: Response): Promise<void> => {
    try {
      const result = await payments.reconcileCallback(
        req.params.integrationId,
        rawBodyOf(req),
        req.header(MPESA_SIGNATURE_HEADER)
      );
      logger.debug('M-Pesa callback handled', { integrationId: req.params.integrationId, result: result.status });

      res.status(200).json({ status: 'ok' });
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Internal error processing callback.');
    }
  };

  return { mpesaCallbackController };
}
