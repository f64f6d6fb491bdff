// src/utils/ledgerCalculator.ts
// Pure invoice and installment arithmetic. All amounts are minor units; dates are YYYY-MM-DD.
import { IInvoice, IInvoiceItem, InvoiceStatus } from '../models/invoice.model';
import { IPaymentPlan, PaymentPlanStatus } from '../models/paymentPlan.model';
import { DomainError } from './errors';
import { assertPositiveAmount } from './money';

export interface IInvoiceItemInput {
  description: string;
  quantity: number;
  unitPrice: number;
}

interface IInvoiceTotalsInput {
  items?: IInvoiceItemInput[];
  subtotal?: number;
  taxAmount: number;
  discountAmount: number;
}

export interface IInvoiceTotals {
  items: IInvoiceItem[];
  subtotal: number;
  taxAmount: number;
  discountAmount: number;
  totalAmount: number;
}

type InvoiceLedgerState = Pick<IInvoice, 'status' | 'totalAmount' | 'amountPaid' | 'dueDate' | 'paidDate'>;
type InvoiceLedgerUpdate = Pick<IInvoice, 'amountPaid' | 'balanceDue' | 'status' | 'paidDate'>;
type PlanLedgerState = Pick<IPaymentPlan, 'status' | 'totalAmount' | 'amountPaid'>;
type PlanLedgerUpdate = Pick<IPaymentPlan, 'amountPaid' | 'balance' | 'status'>;

/**
 * Totals for a new invoice. When items are given the subtotal is their sum,
 * otherwise the caller's subtotal is used as-is.
 * @throws {DomainError} - 'InvalidAmount' when the resulting total is not positive.
 */
export function computeInvoiceTotals(input: IInvoiceTotalsInput): IInvoiceTotals {
  const items: IInvoiceItem[] = (input.items ?? []).map(item => ({
    ...item,
    amount: item.quantity * item.unitPrice,
  }));
  const subtotal = items.length > 0 ? items.reduce((sum, item) => sum + item.amount, 0) : input.subtotal ?? 0;
  const totalAmount = subtotal + input.taxAmount - input.discountAmount;

  if (totalAmount <= 0) {
    throw new DomainError('InvalidAmount', 'Invoice total must be greater than zero');
  }

  return { items, subtotal, taxAmount: input.taxAmount, discountAmount: input.discountAmount, totalAmount };
}

export function balanceDue(invoice: Pick<IInvoice, 'totalAmount' | 'amountPaid'>): number {
  return invoice.totalAmount - invoice.amountPaid;
}

export function isSettled(invoice: Pick<IInvoice, 'totalAmount' | 'amountPaid'>): boolean {
  return invoice.amountPaid >= invoice.totalAmount;
}

/** Status rule shared by payment recording and the overdue sweep. Cancelled invoices stay cancelled. */
export function deriveInvoiceStatus(
  invoice: Pick<IInvoice, 'status' | 'totalAmount' | 'amountPaid' | 'dueDate'>,
  today: string
): InvoiceStatus {
  if (invoice.status === 'cancelled') return 'cancelled';
  if (isSettled(invoice)) return 'paid';
  if (invoice.amountPaid > 0) return 'partially_paid';
  if (invoice.dueDate < today) return 'overdue';
  return invoice.status;
}

/**
 * Applies a payment to an invoice and re-derives balance and status.
 * @throws {DomainError} - 'InvalidAmount' | 'NotPayable'.
 */
export function applyInvoicePayment(invoice: InvoiceLedgerState, amount: number, today: string): InvoiceLedgerUpdate {
  assertPositiveAmount(amount);
  if (invoice.status === 'cancelled') {
    throw new DomainError('NotPayable', 'Cancelled invoices cannot receive payments');
  }

  const amountPaid = invoice.amountPaid + amount;
  const status = deriveInvoiceStatus({ ...invoice, amountPaid }, today);
  // paidDate is stamped only on the transition into paid
  const paidDate = status === 'paid' && invoice.status !== 'paid' ? today : invoice.paidDate ?? null;

  return { amountPaid, balanceDue: invoice.totalAmount - amountPaid, status, paidDate };
}

/** Per-installment amount, rounded half-up to the cent. Fixed once at plan creation. */
export function computeInstallmentAmount(totalAmount: number, numberOfInstallments: number): number {
  assertPositiveAmount(totalAmount);
  if (!Number.isInteger(numberOfInstallments) || numberOfInstallments < 1) {
    throw new DomainError('ValidationFailed', 'numberOfInstallments must be a positive integer');
  }
  return Math.round(totalAmount / numberOfInstallments);
}

/**
 * Applies an installment to a plan; the plan completes once nothing is owed.
 * @throws {DomainError} - 'InvalidAmount' | 'NotPayable'.
 */
export function applyInstallment(plan: PlanLedgerState, amount: number): PlanLedgerUpdate {
  assertPositiveAmount(amount);
  if (plan.status === 'cancelled') {
    throw new DomainError('NotPayable', 'Cancelled payment plans cannot receive installments');
  }

  const amountPaid = plan.amountPaid + amount;
  const balance = plan.totalAmount - amountPaid;
  const status: PaymentPlanStatus = balance <= 0 ? 'completed' : plan.status;
  return { amountPaid, balance, status };
}

/** Share of the plan paid so far, 0-100 with two decimals. */
export function progressPercentage(plan: Pick<IPaymentPlan, 'totalAmount' | 'amountPaid'>): number {
  if (plan.totalAmount <= 0) return 0;
  const percent = (plan.amountPaid / plan.totalAmount) * 100;
  return Math.min(100, Math.round(percent * 100) / 100);
}
