import { Schema, model } from 'mongoose';
import { generateId } from '../utils/ids';

export interface IOrganization {
  organizationId: string;
  name: string;
  currency: string;
  timezone: string; // IANA zone used for reference dates, due dates and quiet hours
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const OrganizationSchema = new Schema<IOrganization>(
  {
    organizationId: { type: String, required: true, unique: true, default: () => generateId('org') },
    name: { type: String, required: true, trim: true },
    currency: { type: String, required: true, default: 'KES' },
    timezone: { type: String, required: true, default: 'Africa/Nairobi' },
    isActive: { type: Boolean, default: true },
  },
  { timestamps: true }
);

export const OrganizationModel = model<IOrganization>('Organization', OrganizationSchema);
