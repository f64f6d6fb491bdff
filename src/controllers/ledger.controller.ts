import { Request, Response } from 'express';
import { body, param } from 'express-validator';
import { PAYMENT_METHODS } from '../models/payment.model';
import { IInvoiceItemInput } from '../utils/ledgerCalculator';
import { IManualPaymentRequestDTO, LedgerService } from '../services/ledger.service';
import { authUserOf } from '../middleware/auth.middleware';
import { ResponseBuilder } from '../utils/response-builder';
import { presentInvoice, presentPayment, presentPaymentPlan } from '../utils/presenters';
import { parseMoney } from '../utils/money';
import { isMoneyInput, rejectInvalidRequest } from '../utils/validation';

interface IInvoiceItemBody {
  description: string;
  quantity: number;
  unitPrice: unknown;
}

// --- Validation Middleware ---

export const createInvoiceValidation = [
  body('customerId').isString().notEmpty().withMessage('Customer ID is required.'),
  body('issueDate').optional().isISO8601({ strict: true }).withMessage('Issue date must be YYYY-MM-DD.'),
  body('dueDate').isISO8601({ strict: true }).withMessage('Due date must be YYYY-MM-DD.'),
  body('items').optional().isArray({ min: 1 }).withMessage('Items must be a non-empty array.'),
  body('items.*.description').isString().trim().notEmpty().withMessage('Item description is required.'),
  body('items.*.quantity').isInt({ min: 1 }).toInt().withMessage('Item quantity must be a positive integer.'),
  body('items.*.unitPrice').custom(isMoneyInput).withMessage('Item unit price must be a decimal with at most 2 places.'),
  body(['subtotal', 'taxAmount', 'discountAmount']).optional().custom(isMoneyInput).withMessage('Amounts must be decimals with at most 2 places.'),
  body('notes').optional().isString().isLength({ max: 2000 }).withMessage('Notes max 2000 chars.'),
  body('status').optional().isIn(['draft', 'sent']).withMessage('Status must be draft or sent.'),
];

export const createPaymentPlanValidation = [
  body('customerId').isString().notEmpty().withMessage('Customer ID is required.'),
  body('name').isString().trim().isLength({ min: 1, max: 200 }).withMessage('Plan name is required (max 200 chars).'),
  body('description').optional().isString().withMessage('Description must be a string.'),
  body('totalAmount').custom(isMoneyInput).withMessage('Total amount must be a decimal with at most 2 places.'),
  body('numberOfInstallments').isInt({ min: 1 }).toInt().withMessage('Number of installments must be a positive integer.'),
  body('startDate').isISO8601({ strict: true }).withMessage('Start date must be YYYY-MM-DD.'),
  body('endDate').isISO8601({ strict: true }).withMessage('End date must be YYYY-MM-DD.'),
];

const manualPaymentValidation = [
  body('amount').custom(isMoneyInput).withMessage('Amount must be a decimal with at most 2 places.'),
  body('paymentMethod').isIn([...PAYMENT_METHODS]).withMessage('Invalid payment method.'),
  body('description').optional().isString().isLength({ max: 255 }).withMessage('Description max 255 chars.'),
  body('externalReference').optional().isString().withMessage('External reference must be a string.'),
  body('payerPhone').optional().isString().withMessage('Payer phone must be a string.'),
];

export const recordInvoicePaymentValidation = [
  param('invoiceId').isString().notEmpty().withMessage('Invoice ID is required.'),
  ...manualPaymentValidation,
];

export const sendInvoiceValidation = [
  param('invoiceId').isString().notEmpty().withMessage('Invoice ID is required.'),
];

export const recordInstallmentValidation = [
  param('planId').isString().notEmpty().withMessage('Payment plan ID is required.'),
  ...manualPaymentValidation,
];

function optionalMoney(value: unknown): number | undefined {
  return value === undefined ? undefined : parseMoney(value);
}

function manualPaymentFrom(req: Request): IManualPaymentRequestDTO {
  return {
    amount: parseMoney(req.body.amount),
    paymentMethod: req.body.paymentMethod,
    description: req.body.description,
    externalReference: req.body.externalReference,
    payerPhone: req.body.payerPhone,
  };
}

export function createLedgerController(ledger: LedgerService) {
  /** POST /invoices */
  const createInvoiceController = async (req: Request, res: Response): Promise<void> => {
    // 1. Input Validation
    if (rejectInvalidRequest(req, res)) return;

    try {
      const items: IInvoiceItemInput[] | undefined = Array.isArray(req.body.items)
        ? req.body.items.map((item: IInvoiceItemBody) => ({
            description: item.description,
            quantity: item.quantity,
            unitPrice: parseMoney(item.unitPrice),
          }))
        : undefined;

      // 2. Service Call
      const invoice = await ledger.createInvoice(authUserOf(req).orgId, {
        customerId: req.body.customerId,
        issueDate: req.body.issueDate,
        dueDate: req.body.dueDate,
        items,
        subtotal: optionalMoney(req.body.subtotal),
        taxAmount: optionalMoney(req.body.taxAmount),
        discountAmount: optionalMoney(req.body.discountAmount),
        notes: req.body.notes,
        status: req.body.status,
      });

      // 3. Success
      ResponseBuilder.success(res, presentInvoice(invoice), 201);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to create invoice.');
    }
  };

  /** Issues a draft to the customer. POST /invoices/:invoiceId/send */
  const sendInvoiceController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const invoice = await ledger.sendInvoice(authUserOf(req).orgId, req.params.invoiceId);
      ResponseBuilder.success(res, presentInvoice(invoice));
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to send invoice.');
    }
  };

  /** Records money received outside M-Pesa. POST /invoices/:invoiceId/payments */
  const recordInvoicePaymentController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const user = authUserOf(req);
      const { payment, invoice } = await ledger.recordInvoicePayment(
        user.orgId,
        req.params.invoiceId,
        manualPaymentFrom(req),
        user.sub
      );

      ResponseBuilder.success(res, { payment: presentPayment(payment), invoice: presentInvoice(invoice) }, 201);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to record invoice payment.');
    }
  };

  /** POST /payment-plans */
  const createPaymentPlanController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const plan = await ledger.createPaymentPlan(authUserOf(req).orgId, {
        customerId: req.body.customerId,
        name: req.body.name,
        description: req.body.description,
        totalAmount: parseMoney(req.body.totalAmount),
        numberOfInstallments: req.body.numberOfInstallments,
        startDate: req.body.startDate,
        endDate: req.body.endDate,
      });

      ResponseBuilder.success(res, presentPaymentPlan(plan), 201);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to create payment plan.');
    }
  };

  /** POST /payment-plans/:planId/installments */
  const recordInstallmentController = async (req: Request, res: Response): Promise<void> => {
    if (rejectInvalidRequest(req, res)) return;

    try {
      const user = authUserOf(req);
      const { payment, plan } = await ledger.recordInstallment(user.orgId, req.params.planId, manualPaymentFrom(req), user.sub);

      ResponseBuilder.success(res, { payment: presentPayment(payment), plan: presentPaymentPlan(plan) }, 201);
    } catch (error: unknown) {
      ResponseBuilder.fromError(res, error, 'Failed to record installment.');
    }
  };

  return {
    createInvoiceController,
    sendInvoiceController,
    recordInvoicePaymentController,
    createPaymentPlanController,
    recordInstallmentController,
  };
}
