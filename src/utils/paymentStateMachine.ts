import { PAYMENT_STATUSES, PaymentStatus } from '../models/payment.model';

// Allowed payment transitions. `processing` is entered when the provider reports
// the push is still being handled; a callback may settle straight from `initiated`.
const TRANSITIONS: Record<PaymentStatus, readonly PaymentStatus[]> = {
  pending: ['initiated', 'cancelled'],
  initiated: ['processing', 'completed', 'failed', 'cancelled'],
  processing: ['completed', 'failed'],
  completed: ['reversed'],
  failed: [],
  cancelled: [],
  reversed: [],
};

export const TERMINAL_PAYMENT_STATUSES: readonly PaymentStatus[] = ['completed', 'failed', 'cancelled', 'reversed'];

export const OPEN_PAYMENT_STATUSES: readonly PaymentStatus[] = ['pending', 'initiated', 'processing'];

export function canTransition(from: PaymentStatus, to: PaymentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: PaymentStatus): boolean {
  return TERMINAL_PAYMENT_STATUSES.includes(status);
}

/** Source states from which `to` may be reached; used as the compare-and-set filter. */
export function sourcesFor(to: PaymentStatus): PaymentStatus[] {
  return PAYMENT_STATUSES.filter(from => TRANSITIONS[from].includes(to));
}
