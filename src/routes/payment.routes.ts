import { Router } from 'express';
import {
  createPaymentController,
  initiatePaymentValidation,
  paymentIdParamValidation,
  reversePaymentValidation,
} from '../controllers/payment.controller';
import { PaymentService } from '../services/payment.service';
import { authenticate } from '../middleware/auth.middleware';
import { authorize } from '../middleware/rbac.middleware';
import { PERMISSIONS } from '../config/permissions';

export function createPaymentRouter(payments: PaymentService): Router {
  const router = Router();
  const controller = createPaymentController(payments);

  // POST /payments/mpesa - Create the payment and send the STK push
  router.post(
    '/mpesa',
    authenticate,
    authorize([PERMISSIONS.PAYMENT_INITIATE]),
    initiatePaymentValidation,
    controller.initiatePaymentController
  );

  // GET /payments/:paymentId
  router.get(
    '/:paymentId',
    authenticate,
    authorize([PERMISSIONS.PAYMENT_READ]),
    paymentIdParamValidation,
    controller.getPaymentController
  );

  // POST /payments/:paymentId/reverse - Ledger-only reversal of a completed payment
  router.post(
    '/:paymentId/reverse',
    authenticate,
    authorize([PERMISSIONS.PAYMENT_MANAGE]),
    reversePaymentValidation,
    controller.reversePaymentController
  );

  // POST /payments/:paymentId/cancel
  router.post(
    '/:paymentId/cancel',
    authenticate,
    authorize([PERMISSIONS.PAYMENT_MANAGE]),
    paymentIdParamValidation,
    controller.cancelPaymentController
  );

  return router;
}
