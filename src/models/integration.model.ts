import { Schema, model } from 'mongoose';
import crypto from 'crypto';
import { generateId } from '../utils/ids';

export type IntegrationEnvironment = 'sandbox' | 'production';

export interface IFeePolicy {
  percentBps: number; // basis points of the gross amount
  flatFee: number; // minor units
}

export interface IIntegration {
  integrationId: string;
  organizationId: string;
  provider: 'mpesa';
  environment: IntegrationEnvironment;
  consumerKey: string;
  consumerSecret: string;
  passkey: string;
  shortCode: string;
  webhookSecret: string;
  status: 'active' | 'inactive' | 'error';
  isDefault: boolean;
  feePolicy: IFeePolicy;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  lastUsedAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const IntegrationSchema = new Schema<IIntegration>(
  {
    integrationId: { type: String, required: true, unique: true, default: () => generateId('int') },
    organizationId: { type: String, required: true, index: true },
    provider: { type: String, enum: ['mpesa'], required: true, default: 'mpesa' },
    environment: { type: String, enum: ['sandbox', 'production'], default: 'sandbox' },
    consumerKey: { type: String, required: true },
    consumerSecret: { type: String, required: true },
    passkey: { type: String, required: true },
    shortCode: { type: String, required: true },
    webhookSecret: { type: String, required: true, default: () => crypto.randomBytes(32).toString('hex') },
    status: { type: String, enum: ['active', 'inactive', 'error'], default: 'active' },
    isDefault: { type: Boolean, default: false },
    feePolicy: {
      percentBps: { type: Number, default: 0, min: 0 },
      flatFee: { type: Number, default: 0, min: 0 },
    },
    totalRequests: { type: Number, default: 0 },
    successfulRequests: { type: Number, default: 0 },
    failedRequests: { type: Number, default: 0 },
    lastUsedAt: { type: Date, default: null },
  },
  { timestamps: true }
);

IntegrationSchema.index({ organizationId: 1, provider: 1, isDefault: -1 });

export const IntegrationModel = model<IIntegration>('Integration', IntegrationSchema);
