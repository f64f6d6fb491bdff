import { Schema, model } from 'mongoose';
import { generateId } from '../utils/ids';
import { NotificationType, RecipientType } from './notification.model';

export interface ITypeOverride {
  notificationType: NotificationType;
  enabled: boolean;
}

export interface INotificationPreference {
  preferenceId: string;
  organizationId: string;
  recipientType: RecipientType;
  recipientId: string;
  receiveSms: boolean;
  receiveEmail: boolean;
  receiveWhatsapp: boolean;
  receivePush: boolean;
  receiveInApp: boolean;
  typeOverrides: ITypeOverride[];
  quietHoursStart?: string | null; // HH:mm, organization timezone
  quietHoursEnd?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const NotificationPreferenceSchema = new Schema<INotificationPreference>(
  {
    preferenceId: { type: String, required: true, unique: true, default: () => generateId('pref') },
    organizationId: { type: String, required: true },
    recipientType: { type: String, enum: ['customer', 'contact'], required: true },
    recipientId: { type: String, required: true },
    receiveSms: { type: Boolean, default: true },
    receiveEmail: { type: Boolean, default: true },
    receiveWhatsapp: { type: Boolean, default: true },
    receivePush: { type: Boolean, default: true },
    receiveInApp: { type: Boolean, default: true },
    typeOverrides: [
      {
        _id: false,
        notificationType: { type: String, required: true },
        enabled: { type: Boolean, required: true },
      },
    ],
    quietHoursStart: { type: String, default: null },
    quietHoursEnd: { type: String, default: null },
  },
  { timestamps: true }
);

NotificationPreferenceSchema.index({ organizationId: 1, recipientType: 1, recipientId: 1 }, { unique: true });

export const NotificationPreferenceModel = model<INotificationPreference>(
  'NotificationPreference',
  NotificationPreferenceSchema
);
