import { Request, Response } from 'express';
import { body, param } from 'express-validator';
import { PAYMENT_TYPES } from '../models/payment.model';
import { MAX_REVERSAL_REASON_LENGTH, PaymentService } from '../services/payment.service';
import { authUserOf } from '../middleware/auth.middleware';
import { ResponseBuilder } from '../utils/response-builder';
import { presentPayment } from '../utils/presenters';
import { parseMoney } from '../utils/money';
import { isMoneyInput, rejectInvalidRequest } from '../utils/validation';

// --- Validation Middleware ---

export const initiatePaymentValidation = [
  body('amount').custom(isMoneyInput).withMessage('Amount must be a decimal with at most 2 places.'),
  body('phone').isString().trim().notEmpty().withMessage('Payer phone number is required.'),
  body('description').optional().isString().isLength({ max: 255 }).withMessage('Description max 255 chars.'),
  body('paymentType').optional().isIn([...PAYMENT_TYPES]).withMessage('Invalid payment type.'),
  body('customerId').optional().isString().withMessage('Customer ID must be a string.'),
  body('email').optional().isEmail().withMessage('Email must be valid.'),
  body('invoiceId').optional().isString().withMessage('Invoice ID must be a string.'),
  body('paymentPlanId').optional().isString().withMessage('Payment plan ID must be a string.'),
];

export const paymentIdParamValidation = [
  param('paymentId').isString().notEmpty().withMessage('Payment ID is required.'),
];

export const reversePaymentValidation = [
  ...paymentIdParamValidation,
  body('reason')
    .isString()
    .trim()
    .isLength({ min: 1, max: MAX_REVERSAL_REASON_LENGTH })
    .withMessage(`Reason is required (max ${MAX_REVERSAL_REASON_LENGTH} chars).`),
];

export function createPaymentController(payments: PaymentService) {
  /** Creates the payment and sends the STK push. POST /payments/mpesa */
  const initiatePaymentController = async (req: Request, res: Response): Promise<void> => {
    // 1. Input Validation
    if (rejectInvalidRequest(req, res)) return;

    try {
      const user = authUserOf(req);

      // 2. Service Call
      const { payment, dispatch } = await payments.initiateAndDispatch(
        user.orgId,
        {
          amount: parseMoney(req.body.amount),
          phone: req.body.phone,
          description: req.body.description,
          paymentType: req.body.paymentType,
          customerId: req.body.customerId,
          email: req.body.email,
          invoiceId: req.body.invoiceId,
          paymentPlanId: req.body.paymentPlanId,
        },
        user.sub
      );

      // 3. Success (201 Created; the payer still has to confirm on the handset)
      ResponseBuilder.success(res, { payment: presentPayment(payment), dispatch }, 201);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to initiate payment.');
    }
  };

  /** GET /payments/:paymentId */
  const getPaymentController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const payment = await payments.getPayment(authUserOf(req).orgId, req.params.paymentId);
      ResponseBuilder.success(res, presentPayment(payment));
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to fetch payment.');
    }
  };

  /** POST /payments/:paymentId/reverse */
  const reversePaymentController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const user = authUserOf(req);
      const payment = await payments.reversePayment(user.orgId, req.params.paymentId, req.body.reason, user.sub);
      ResponseBuilder.success(res, presentPayment(payment));
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to reverse payment.');
    }
  };

  /** POST /payments/:paymentId/cancel */
  const cancelPaymentController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const payment = await payments.cancelPayment(authUserOf(req).orgId, req.params.paymentId);
      ResponseBuilder.success(res, presentPayment(payment));
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to cancel payment.');
    }
  };

  return {
    initiatePaymentController,
    getPaymentController,
    reversePaymentController,
    cancelPaymentController,
  };
}
