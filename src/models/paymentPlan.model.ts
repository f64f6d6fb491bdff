import { Schema, model } from 'mongoose';
import { generateId } from '../utils/ids';

export const PAYMENT_PLAN_STATUSES = ['active', 'completed', 'overdue', 'cancelled'] as const;
export type PaymentPlanStatus = (typeof PAYMENT_PLAN_STATUSES)[number];

export interface IPaymentPlan {
  paymentPlanId: string;
  organizationId: string;
  customerId: string;
  name: string;
  description?: string | null;
  totalAmount: number;
  numberOfInstallments: number;
  installmentAmount: number; // fixed at creation
  amountPaid: number;
  balance: number; // always totalAmount - amountPaid
  startDate: string; // YYYY-MM-DD
  endDate: string; // YYYY-MM-DD
  status: PaymentPlanStatus;
  createdAt: Date;
  updatedAt: Date;
}

const PaymentPlanSchema = new Schema<IPaymentPlan>(
  {
    paymentPlanId: { type: String, required: true, unique: true, default: () => generateId('plan') },
    organizationId: { type: String, required: true, index: true },
    customerId: { type: String, required: true, index: true },
    name: { type: String, required: true, maxlength: 200 },
    description: { type: String, default: null },
    totalAmount: { type: Number, required: true, min: 1 },
    numberOfInstallments: { type: Number, required: true, min: 1 },
    installmentAmount: { type: Number, required: true, immutable: true },
    amountPaid: { type: Number, default: 0, min: 0 },
    balance: { type: Number, required: true },
    startDate: { type: String, required: true },
    endDate: { type: String, required: true },
    status: { type: String, enum: [...PAYMENT_PLAN_STATUSES], default: 'active', index: true },
  },
  { timestamps: true }
);

export const PaymentPlanModel = model<IPaymentPlan>('PaymentPlan', PaymentPlanSchema);
