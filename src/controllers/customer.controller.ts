import { Request, Response } from 'express';
import { body } from 'express-validator';
import { CustomerService } from '../services/customer.service';
import { authUserOf } from '../middleware/auth.middleware';
import { ResponseBuilder } from '../utils/response-builder';
import { presentCustomer } from '../utils/presenters';
import { rejectInvalidRequest } from '../utils/validation';

export const createCustomerValidation = [
  body('firstName').isString().trim().isLength({ min: 1, max: 100 }).withMessage('First name is required (max 100 chars).'),
  body('lastName').isString().trim().isLength({ min: 1, max: 100 }).withMessage('Last name is required (max 100 chars).'),
  body('phoneNumber').optional().isString().trim().withMessage('Phone number must be a string.'),
  body('email').optional().isEmail().withMessage('Email must be valid.'),
  body('pushToken').optional().isString().withMessage('Push token must be a string.'),
  body(['receiveSms', 'receiveEmail', 'receiveWhatsapp']).optional().isBoolean({ strict: true }).withMessage('Channel flags must be booleans.'),
];

export function createCustomerController(customers: CustomerService) {
  /** Registers a customer. POST /customers */
  const createCustomerController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const customer = await customers.createCustomer(authUserOf(req).orgId, {
        firstName: req.body.firstName,
        lastName: req.body.lastName,
        phoneNumber: req.body.phoneNumber,
        email: req.body.email,
        pushToken: req.body.pushToken,
        receiveSms: req.body.receiveSms,
        receiveEmail: req.body.receiveEmail,
        receiveWhatsapp: req.body.receiveWhatsapp,
      });

      ResponseBuilder.success(res, presentCustomer(customer), 201);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to create customer.');
    }
  };

  return { createCustomerController };
}
