// API views. Amounts leave the service as 2-decimal strings; everything else is
// passed through serializeDocument by ResponseBuilder.
import { ICustomer } from '../models/customer.model';
import { IInvoice } from '../models/invoice.model';
import { IPayment } from '../models/payment.model';
import { IPaymentPlan } from '../models/paymentPlan.model';
import { formatMoney } from './money';
import { progressPercentage } from './ledgerCalculator';

export function presentPayment(payment: IPayment) {
  return {
    ...payment,
    amount: formatMoney(payment.amount),
    transactionFee: formatMoney(payment.transactionFee),
    netAmount: formatMoney(payment.netAmount),
  };
}

export function presentInvoice(invoice: IInvoice) {
  return {
    ...invoice,
    items: invoice.items.map(item => ({
      ...item,
      unitPrice: formatMoney(item.unitPrice),
      amount: formatMoney(item.amount),
    })),
    subtotal: formatMoney(invoice.subtotal),
    taxAmount: formatMoney(invoice.taxAmount),
    discountAmount: formatMoney(invoice.discountAmount),
    totalAmount: formatMoney(invoice.totalAmount),
    amountPaid: formatMoney(invoice.amountPaid),
    balanceDue: formatMoney(invoice.balanceDue),
  };
}

export function presentPaymentPlan(plan: IPaymentPlan) {
  return {
    ...plan,
    totalAmount: formatMoney(plan.totalAmount),
    installmentAmount: formatMoney(plan.installmentAmount),
    amountPaid: formatMoney(plan.amountPaid),
    balance: formatMoney(plan.balance),
    progressPercentage: progressPercentage(plan),
  };
}

export function presentCustomer(customer: ICustomer) {
  return { ...customer, fullName: `${customer.firstName} ${customer.lastName}` };
}
