import { Schema, model } from 'mongoose';
import { generateId } from '../utils/ids';

export const PAYMENT_STATUSES = [
  'pending',
  'initiated',
  'processing',
  'completed',
  'failed',
  'cancelled',
  'reversed',
] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const PAYMENT_METHODS = ['mpesa', 'card', 'bank', 'cash', 'wallet', 'cheque'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const PAYMENT_TYPES = ['invoice', 'subscription', 'fee', 'rent', 'donation', 'refund', 'other'] as const;
export type PaymentType = (typeof PAYMENT_TYPES)[number];

export interface IPayment {
  paymentId: string;
  paymentReference: string; // PAY-{ORG3}-{YYYYMMDD}-{seq}, immutable
  organizationId: string;
  customerId?: string | null;
  invoiceId?: string | null;
  paymentPlanId?: string | null;
  integrationId?: string | null;

  // Minor units. netAmount is written by the repository only.
  amount: number;
  transactionFee: number;
  netAmount: number;
  currency: string;

  paymentMethod: PaymentMethod;
  paymentType: PaymentType;
  description: string;
  payerPhone?: string | null;
  payerName?: string | null;
  payerEmail?: string | null;

  // Provider correlation
  checkoutRequestId?: string | null;
  merchantRequestId?: string | null;
  externalReference?: string | null;
  resultCode?: number | null;

  status: PaymentStatus;
  failureReason?: string | null;
  initiatedAt?: Date | null;
  completedAt?: Date | null;
  cancelledAt?: Date | null;

  isReversed: boolean;
  reversalReason?: string | null;
  reversedAt?: Date | null;
  reversedBy?: string | null;

  createdBy?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const PaymentSchema = new Schema<IPayment>(
  {
    paymentId: { type: String, required: true, unique: true, default: () => generateId('pay') },
    paymentReference: { type: String, required: true, immutable: true },
    organizationId: { type: String, required: true, index: true },
    customerId: { type: String, default: null, index: true },
    invoiceId: { type: String, default: null, index: true },
    paymentPlanId: { type: String, default: null, index: true },
    integrationId: { type: String, default: null },
    amount: { type: Number, required: true, min: 1 },
    transactionFee: { type: Number, required: true, default: 0, min: 0 },
    netAmount: { type: Number, required: true },
    currency: { type: String, required: true, default: 'KES' },
    paymentMethod: { type: String, enum: [...PAYMENT_METHODS], required: true },
    paymentType: { type: String, enum: [...PAYMENT_TYPES], required: true, default: 'other' },
    description: { type: String, default: '' },
    payerPhone: { type: String, default: null },
    payerName: { type: String, default: null },
    payerEmail: { type: String, default: null },
    checkoutRequestId: { type: String, default: null },
    merchantRequestId: { type: String, default: null },
    externalReference: { type: String, default: null, index: true },
    resultCode: { type: Number, default: null },
    status: { type: String, enum: [...PAYMENT_STATUSES], default: 'pending', index: true },
    failureReason: { type: String, default: null },
    initiatedAt: { type: Date, default: null },
    completedAt: { type: Date, default: null },
    cancelledAt: { type: Date, default: null },
    isReversed: { type: Boolean, default: false },
    reversalReason: { type: String, default: null, maxlength: 500 },
    reversedAt: { type: Date, default: null },
    reversedBy: { type: String, default: null },
    createdBy: { type: String, default: null },
  },
  { timestamps: true }
);

PaymentSchema.index({ organizationId: 1, paymentReference: 1 }, { unique: true });

// Correlation store: one open payment per provider checkout id (requires MongoDB 6+ for $in)
PaymentSchema.index(
  { checkoutRequestId: 1 },
  {
    unique: true,
    partialFilterExpression: {
      checkoutRequestId: { $type: 'string' },
      status: { $in: ['pending', 'initiated', 'processing'] },
    },
  }
);
PaymentSchema.index({ checkoutRequestId: 1, updatedAt: -1 });

export const PaymentModel = model<IPayment>('Payment', PaymentSchema);
