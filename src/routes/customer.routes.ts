import { Router } from 'express';
import { createCustomerController, createCustomerValidation } from '../controllers/customer.controller';
import { CustomerService } from '../services/customer.service';
import { authenticate } from '../middleware/auth.middleware';
import { authorize } from '../middleware/rbac.middleware';
import { PERMISSIONS } from '../config/permissions';

export function createCustomerRouter(customers: CustomerService): Router {
  const router = Router();
  const controller = createCustomerController(customers);

  // POST /customers - Register a customer and assign its customer code
  router.post(
    '/',
    authenticate,
    authorize([PERMISSIONS.LEDGER_MANAGE]),
    createCustomerValidation,
    controller.createCustomerController
  );

  return router;
}
