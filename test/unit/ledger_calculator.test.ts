import {
  applyInstallment,
  applyInvoicePayment,
  computeInstallmentAmount,
  computeInvoiceTotals,
  deriveInvoiceStatus,
  progressPercentage,
} from '../../src/utils/ledgerCalculator';
import { DomainError } from '../../src/utils/errors';

describe('Ledger Calculator', () => {
  describe('computeInvoiceTotals', () => {
    it('should sum line items and apply tax and discount', () => {
      // Act
      const totals = computeInvoiceTotals({
        items: [
          { description: 'Consulting', quantity: 2, unitPrice: 25000 },
          { description: 'Setup', quantity: 1, unitPrice: 50000 },
        ],
        taxAmount: 16000,
        discountAmount: 6000,
      });

      // Assert
      expect(totals.items.map(item => item.amount)).toEqual([50000, 50000]);
      expect(totals.subtotal).toBe(100000);
      expect(totals.totalAmount).toBe(110000);
    });

    it('should use the given subtotal when there are no items', () => {
      const totals = computeInvoiceTotals({ subtotal: 100000, taxAmount: 0, discountAmount: 0 });

      expect(totals.items).toEqual([]);
      expect(totals.totalAmount).toBe(100000);
    });

    it('should reject a total that is not positive', () => {
      expect(() => computeInvoiceTotals({ subtotal: 5000, taxAmount: 0, discountAmount: 5000 })).toThrow(
        'Invoice total must be greater than zero'
      );
    });
  });

  describe('applyInvoicePayment', () => {
    const invoice = { status: 'sent' as const, totalAmount: 100000, amountPaid: 0, dueDate: '2024-04-01', paidDate: null };

    it('should move a partly paid invoice to partially_paid, then to paid', () => {
      // Act
      const first = applyInvoicePayment(invoice, 40000, '2024-03-15');
      const second = applyInvoicePayment({ ...invoice, ...first }, 60000, '2024-03-20');

      // Assert
      expect(first).toEqual({ amountPaid: 40000, balanceDue: 60000, status: 'partially_paid', paidDate: null });
      expect(second).toEqual({ amountPaid: 100000, balanceDue: 0, status: 'paid', paidDate: '2024-03-20' });
    });

    it('should allow overpayment and report a negative balance', () => {
      const update = applyInvoicePayment(invoice, 120000, '2024-03-15');

      expect(update.balanceDue).toBe(-20000);
      expect(update.status).toBe('paid');
    });

    it('should keep the original paid date on later payments', () => {
      const paid = { ...invoice, status: 'paid' as const, amountPaid: 100000, paidDate: '2024-03-10' };

      expect(applyInvoicePayment(paid, 500, '2024-03-15').paidDate).toBe('2024-03-10');
    });

    it('should refuse payments on cancelled invoices', () => {
      expect(() => applyInvoicePayment({ ...invoice, status: 'cancelled' }, 100, '2024-03-15')).toThrow(DomainError);
    });
  });

  describe('deriveInvoiceStatus', () => {
    it('should mark unpaid invoices past their due date as overdue', () => {
      const invoice = { status: 'sent' as const, totalAmount: 1000, amountPaid: 0, dueDate: '2024-03-01' };

      expect(deriveInvoiceStatus(invoice, '2024-03-15')).toBe('overdue');
      expect(deriveInvoiceStatus(invoice, '2024-03-01')).toBe('sent');
    });

    it('should leave cancelled invoices alone', () => {
      const invoice = { status: 'cancelled' as const, totalAmount: 1000, amountPaid: 1000, dueDate: '2024-03-01' };

      expect(deriveInvoiceStatus(invoice, '2024-03-15')).toBe('cancelled');
    });
  });

  describe('installments', () => {
    it('should round the installment amount half-up to the cent', () => {
      expect(computeInstallmentAmount(100000, 3)).toBe(33333);
      expect(computeInstallmentAmount(100001, 2)).toBe(50001);
    });

    it('should reject a non-positive installment count', () => {
      expect(() => computeInstallmentAmount(100000, 0)).toThrow('numberOfInstallments must be a positive integer');
    });

    it('should complete the plan once the balance reaches zero', () => {
      const plan = { status: 'active' as const, totalAmount: 100000, amountPaid: 66666 };

      expect(applyInstallment(plan, 33334)).toEqual({ amountPaid: 100000, balance: 0, status: 'completed' });
      expect(applyInstallment(plan, 1000)).toEqual({ amountPaid: 67666, balance: 32334, status: 'active' });
    });

    it('should report progress as a percentage with two decimals', () => {
      expect(progressPercentage({ totalAmount: 30000, amountPaid: 10000 })).toBe(33.33);
      expect(progressPercentage({ totalAmount: 30000, amountPaid: 45000 })).toBe(100);
    });
  });
});
