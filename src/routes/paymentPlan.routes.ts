import { Router } from 'express';
import {
  createLedgerController,
  createPaymentPlanValidation,
  recordInstallmentValidation,
} from '../controllers/ledger.controller';
import { LedgerService } from '../services/ledger.service';
import { authenticate } from '../middleware/auth.middleware';
import { authorize } from '../middleware/rbac.middleware';
import { PERMISSIONS } from '../config/permissions';

export function createPaymentPlanRouter(ledger: LedgerService): Router {
  const router = Router();
  const controller = createLedgerController(ledger);

  // POST /payment-plans
  router.post(
    '/',
    authenticate,
    authorize([PERMISSIONS.LEDGER_MANAGE]),
    createPaymentPlanValidation,
    controller.createPaymentPlanController
  );

  // POST /payment-plans/:planId/installments
  router.post(
    '/:planId/installments',
    authenticate,
    authorize([PERMISSIONS.LEDGER_MANAGE]),
    recordInstallmentValidation,
    controller.recordInstallmentController
  );

  return router;
}
