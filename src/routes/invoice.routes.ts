import { Router } from 'express';
import {
  createInvoiceValidation,
  createLedgerController,
  recordInvoicePaymentValidation,
  sendInvoiceValidation,
} from '../controllers/ledger.controller';
import { LedgerService } from '../services/ledger.service';
import { authenticate } from '../middleware/auth.middleware';
import { authorize } from '../middleware/rbac.middleware';
import { PERMISSIONS } from '../config/permissions';

export function createInvoiceRouter(ledger: LedgerService): Router {
  const router = Router();
  const controller = createLedgerController(ledger);

  // POST /invoices
  router.post('/', authenticate, authorize([PERMISSIONS.LEDGER_MANAGE]), createInvoiceValidation, controller.createInvoiceController);

  // POST /invoices/:invoiceId/send - draft to sent, queues the invoice notification
  router.post(
    '/:invoiceId/send',
    authenticate,
    authorize([PERMISSIONS.LEDGER_MANAGE]),
    sendInvoiceValidation,
    controller.sendInvoiceController
  );

  // POST /invoices/:invoiceId/payments - Money received outside M-Pesa
  router.post(
    '/:invoiceId/payments',
    authenticate,
    authorize([PERMISSIONS.LEDGER_MANAGE]),
    recordInvoicePaymentValidation,
    controller.recordInvoicePaymentController
  );

  return router;
}
