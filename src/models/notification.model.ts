import { Schema, model } from 'mongoose';
import { generateId } from '../utils/ids';

export const NOTIFICATION_CHANNELS = ['sms', 'email', 'whatsapp', 'push', 'in_app'] as const;
export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number];

export const NOTIFICATION_STATUSES = ['pending', 'processing', 'sent', 'delivered', 'failed', 'read'] as const;
export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number];

export const NOTIFICATION_TYPES = [
  'payment_received',
  'payment_failed',
  'payment_reversed',
  'invoice_created',
  'invoice_reminder',
  'installment_received',
  'general',
] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export type NotificationPriority = 'low' | 'normal' | 'high';

export type RecipientType = 'customer' | 'contact';

export interface INotification {
  notificationId: string;
  organizationId: string;
  recipientType: RecipientType;
  recipientId?: string | null; // customerId when recipientType = customer
  recipientEmail?: string | null;
  recipientPhone?: string | null;
  recipientPushToken?: string | null;
  notificationType: NotificationType;
  channel: NotificationChannel;
  subject?: string | null;
  message: string;
  priority: NotificationPriority;
  status: NotificationStatus;
  scheduledFor?: Date | null;
  sentAt?: Date | null;
  deliveredAt?: Date | null;
  readAt?: Date | null;
  providerMessageId?: string | null;
  deliveryAttempts: number;
  failureReason?: string | null;
  retryable: boolean; // false once a preference check rejected the channel
  nextRetryAt?: Date | null;
  paymentId?: string | null;
  invoiceId?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const NotificationSchema = new Schema<INotification>(
  {
    notificationId: { type: String, required: true, unique: true, default: () => generateId('notif') },
    organizationId: { type: String, required: true, index: true },
    recipientType: { type: String, enum: ['customer', 'contact'], required: true },
    recipientId: { type: String, default: null, index: true },
    recipientEmail: { type: String, default: null },
    recipientPhone: { type: String, default: null },
    recipientPushToken: { type: String, default: null },
    notificationType: { type: String, enum: [...NOTIFICATION_TYPES], required: true },
    channel: { type: String, enum: [...NOTIFICATION_CHANNELS], required: true },
    subject: { type: String, default: null },
    message: { type: String, required: true },
    priority: { type: String, enum: ['low', 'normal', 'high'], default: 'normal' },
    status: { type: String, enum: [...NOTIFICATION_STATUSES], default: 'pending', index: true },
    scheduledFor: { type: Date, default: null },
    sentAt: { type: Date, default: null },
    deliveredAt: { type: Date, default: null },
    readAt: { type: Date, default: null },
    providerMessageId: { type: String, default: null },
    deliveryAttempts: { type: Number, default: 0 },
    failureReason: { type: String, default: null },
    retryable: { type: Boolean, default: true },
    nextRetryAt: { type: Date, default: null },
    paymentId: { type: String, default: null, index: true },
    invoiceId: { type: String, default: null },
  },
  { timestamps: true }
);

export const NotificationModel = model<INotification>('Notification', NotificationSchema);
