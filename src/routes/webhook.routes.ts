import { Router } from 'express';
import { createWebhookController } from '../controllers/webhook.controller';
import { PaymentService } from '../services/payment.service';
import { rawTextBody } from '../middleware/rawBody.middleware';

// Mounted before the JSON parser: the signature check needs the body exactly as sent.
export function createWebhookRouter(payments: PaymentService): Router {
  const router = Router();
  const controller = createWebhookController(payments);

  // POST /webhooks/mpesa/:integrationId - Provider callback, authenticated by HMAC signature
  router.post('/mpesa/:integrationId', rawTextBody, controller.mpesaCallbackController);

  return router;
}
