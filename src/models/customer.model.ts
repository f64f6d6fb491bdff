import { Schema, model } from 'mongoose';
import { generateId } from '../utils/ids';

export interface ICustomer {
  customerId: string;
  organizationId: string;
  customerCode: string; // CUS-{ORG3}-{YYYYMM}-{seq}, assigned once
  firstName: string;
  lastName: string;
  phoneNumber?: string | null;
  email?: string | null;
  pushToken?: string | null;
  // Default channel preferences when no explicit NotificationPreference exists
  receiveSms: boolean;
  receiveEmail: boolean;
  receiveWhatsapp: boolean;
  lastPaymentDate?: Date | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const CustomerSchema = new Schema<ICustomer>(
  {
    customerId: { type: String, required: true, unique: true, default: () => generateId('cus') },
    organizationId: { type: String, required: true, index: true },
    customerCode: { type: String, required: true },
    firstName: { type: String, required: true, trim: true },
    lastName: { type: String, required: true, trim: true },
    phoneNumber: { type: String, default: null },
    email: { type: String, default: null, lowercase: true, trim: true },
    pushToken: { type: String, default: null },
    receiveSms: { type: Boolean, default: true },
    receiveEmail: { type: Boolean, default: true },
    receiveWhatsapp: { type: Boolean, default: false },
    lastPaymentDate: { type: Date, default: null },
    isActive: { type: Boolean, default: true },
  },
  { timestamps: true }
);

CustomerSchema.index({ organizationId: 1, customerCode: 1 }, { unique: true });
CustomerSchema.index({ organizationId: 1, phoneNumber: 1 });
CustomerSchema.index({ organizationId: 1, email: 1 });

export const CustomerModel = model<ICustomer>('Customer', CustomerSchema);
