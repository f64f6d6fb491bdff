// src/utils/feeCalculator.ts
import { IFeePolicy } from '../models/integration.model';

export const NO_FEE: IFeePolicy = { percentBps: 0, flatFee: 0 };

/**
 * Transaction fee in minor units: percentage (basis points, rounded half-up) plus
 * a flat component, never more than the amount itself so netAmount stays >= 0.
 */
export function calculateTransactionFee(amount: number, policy: IFeePolicy = NO_FEE): number {
  const percentage = Math.round((amount * policy.percentBps) / 10000);
  return Math.min(amount, percentage + policy.flatFee);
}
