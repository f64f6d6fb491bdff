// src/services/notification.service.ts
import * as handlebars from 'handlebars';
import { ICustomer } from '../models/customer.model';
import { IOrganization } from '../models/organization.model';
import {
  INotification,
  NotificationChannel,
  NotificationPriority,
  NotificationType,
  RecipientType,
} from '../models/notification.model';
import { INotificationPreference, ITypeOverride } from '../models/notificationPreference.model';
import { IRepositories, IUnitOfWork } from '../repositories/types';
import { IChannelAdapters, OutboundMessage, deliver } from '../notificationAdapters/channelSenders';
import { JOB_TYPES } from '../jobs/jobRegistry';
import { DomainError, errorMessage, isDomainError } from '../utils/errors';
import { DEFAULT_TIMEZONE, isTimeOfDay, quietHoursEnd } from '../utils/dates';
import { MAX_DELIVERY_ATTEMPTS, getDeliveryRetryDelay } from '../utils/retryPolicy';
import { normalizeMsisdn } from '../utils/phone';
import { logger } from '../utils/logger';
import { CustomerService } from './customer.service';
import { JobService } from './job.service';

// Plain-text bodies; SMS and WhatsApp must not receive HTML entities
const TEMPLATE_OPTIONS = { noEscape: true, strict: true };

const TEMPLATES: Record<NotificationType, { subject: string; body: handlebars.TemplateDelegate }> = {
  payment_received: {
    subject: 'Payment received',
    body: handlebars.compile('Payment of {{currency}} {{amount}} received successfully. Ref: {{reference}}', TEMPLATE_OPTIONS),
  },
  payment_failed: {
    subject: 'Payment not completed',
    body: handlebars.compile('Your payment of {{currency}} {{amount}} could not be completed: {{reason}}. Ref: {{reference}}', TEMPLATE_OPTIONS),
  },
  payment_reversed: {
    subject: 'Payment reversed',
    body: handlebars.compile('Payment {{reference}} of {{currency}} {{amount}} has been reversed.', TEMPLATE_OPTIONS),
  },
  installment_received: {
    subject: 'Installment received',
    body: handlebars.compile(
      'Installment of {{currency}} {{amount}} received for {{planName}}. Balance: {{currency}} {{balance}}. Ref: {{reference}}',
      TEMPLATE_OPTIONS
    ),
  },
  invoice_created: {
    subject: 'New invoice',
    body: handlebars.compile('Invoice {{invoiceNumber}} for {{currency}} {{amount}} is due on {{dueDate}}.', TEMPLATE_OPTIONS),
  },
  invoice_reminder: {
    subject: 'Invoice reminder',
    body: handlebars.compile('Reminder: invoice {{invoiceNumber}} has {{currency}} {{amount}} outstanding, due {{dueDate}}.', TEMPLATE_OPTIONS),
  },
  general: {
    subject: 'Notification',
    body: handlebars.compile('{{message}}', TEMPLATE_OPTIONS),
  },
};

type ChannelSwitch = 'receiveSms' | 'receiveEmail' | 'receiveWhatsapp' | 'receivePush' | 'receiveInApp';

const PREFERENCE_SWITCH: Record<NotificationChannel, ChannelSwitch> = {
  sms: 'receiveSms',
  email: 'receiveEmail',
  whatsapp: 'receiveWhatsapp',
  push: 'receivePush',
  in_app: 'receiveInApp',
};

// A worker that died mid-delivery leaves the claim behind; it may be taken over after this
const CLAIM_TIMEOUT_MS = 5 * 60 * 1000;

export interface ISendNotificationRequestDTO {
  channel: NotificationChannel;
  recipientType: RecipientType;
  recipientId?: string;
  recipientEmail?: string;
  recipientPhone?: string;
  recipientPushToken?: string;
  notificationType?: NotificationType;
  subject?: string;
  message: string;
  priority?: NotificationPriority;
  scheduledFor?: Date;
  paymentId?: string;
  invoiceId?: string;
}

export interface IBulkSendRequestDTO {
  customerIds: string[];
  channel: NotificationChannel;
  notificationType?: NotificationType;
  subject?: string;
  message: string;
  priority?: NotificationPriority;
  scheduledFor?: Date;
}

export interface IBulkSendResultDTO {
  created: number;
  failed: number;
  notificationIds: string[];
  failures: { customerId: string; reason: string }[];
}

export interface ICustomerNotificationRequest {
  organization: IOrganization;
  customer: ICustomer;
  notificationType: NotificationType;
  variables: Record<string, string>;
  paymentId?: string;
  invoiceId?: string;
}

export interface IPreferenceUpdateDTO {
  receiveSms?: boolean;
  receiveEmail?: boolean;
  receiveWhatsapp?: boolean;
  receivePush?: boolean;
  receiveInApp?: boolean;
  typeOverrides?: ITypeOverride[];
  quietHoursStart?: string | null;
  quietHoursEnd?: string | null;
}

export type DispatchOutcome =
  | { outcome: 'not_found' }
  | { outcome: 'skipped'; reason: 'already_final' | 'exhausted' }
  | { outcome: 'deferred'; reason: DeferReason; runAt: Date }
  | { outcome: 'disabled' }
  | { outcome: 'sent' | 'delivered'; providerMessageId: string }
  | { outcome: 'failed'; attempts: number; retryAt: Date | null; error: string };

type DeferReason = 'scheduled' | 'retry_pending' | 'quiet_hours' | 'claim_held';

type NotificationDraftInput = Omit<
  INotification,
  'notificationId' | 'status' | 'deliveryAttempts' | 'retryable' | 'createdAt' | 'updatedAt'
>;

/** Renders the stored template for a notification type. */
export function renderNotification(type: NotificationType, variables: Record<string, string>): { subject: string; message: string } {
  const template = TEMPLATES[type];
  return { subject: template.subject, message: template.body(variables) };
}

export class NotificationService {
  constructor(
    private readonly uow: IUnitOfWork,
    private readonly jobs: JobService,
    private readonly customers: CustomerService,
    private readonly adapters: IChannelAdapters
  ) {}

  /**
   * Persists a pending notification and queues its dispatch job at `scheduledFor` (or now).
   * Runs inside the caller's transaction so a rolled back settlement never notifies.
   */
  public async enqueue(repos: IRepositories, draft: NotificationDraftInput): Promise<INotification> {
    const notification = await repos.notifications.create({
      ...draft,
      status: 'pending',
      deliveryAttempts: 0,
      retryable: true,
    });

    await this.jobs.enqueueJob(
      {
        type: JOB_TYPES.NOTIFICATION_DISPATCH,
        payload: { notificationId: notification.notificationId },
        priority: notification.priority === 'high' ? 80 : 50,
        scheduleAt: notification.scheduledFor ?? undefined,
      },
      repos.jobs
    );

    return notification;
  }

  /**
   * Templated notification to a known customer on the first channel their flags allow:
   * SMS, then WhatsApp, then email, falling back to the in-app inbox.
   */
  public async notifyCustomer(repos: IRepositories, request: ICustomerNotificationRequest): Promise<INotification> {
    const { customer, organization, notificationType } = request;
    const { subject, message } = renderNotification(notificationType, request.variables);

    let channel: NotificationChannel = 'in_app';
    if (customer.phoneNumber && customer.receiveSms) channel = 'sms';
    else if (customer.phoneNumber && customer.receiveWhatsapp) channel = 'whatsapp';
    else if (customer.email && customer.receiveEmail) channel = 'email';

    return this.enqueue(repos, {
      organizationId: organization.organizationId,
      recipientType: 'customer',
      recipientId: customer.customerId,
      recipientEmail: customer.email ?? null,
      recipientPhone: customer.phoneNumber ?? null,
      recipientPushToken: customer.pushToken ?? null,
      notificationType,
      channel,
      subject,
      message,
      priority: 'normal',
      paymentId: request.paymentId ?? null,
      invoiceId: request.invoiceId ?? null,
    });
  }

  /**
   * Queues a single notification.
   * @throws {DomainError} - 'ValidationFailed' when the channel's address is missing | 'CustomerNotFound' | 'OrganizationMismatch'.
   */
  public async send(organizationId: string, data: ISendNotificationRequestDTO): Promise<INotification> {
    return this.uow.run(async repos => {
      const draft = await this.buildDraft(repos, organizationId, data);
      return this.enqueue(repos, draft);
    });
  }

  /**
   * One notification per customer. Recipients that cannot be resolved, addressed or
   * stored are counted in `failed`; the rest are still queued.
   */
  public async sendBulk(organizationId: string, data: IBulkSendRequestDTO): Promise<IBulkSendResultDTO> {
    const result: IBulkSendResultDTO = { created: 0, failed: 0, notificationIds: [], failures: [] };

    for (const customerId of data.customerIds) {
      try {
        const notification = await this.send(organizationId, {
          channel: data.channel,
          recipientType: 'customer',
          recipientId: customerId,
          notificationType: data.notificationType,
          subject: data.subject,
          message: data.message,
          priority: data.priority,
          scheduledFor: data.scheduledFor,
        });
        result.created += 1;
        result.notificationIds.push(notification.notificationId);
      } catch (error) {
        const reason = isDomainError(error) ? error.code : 'InternalError';
        if (!isDomainError(error)) {
          logger.error('Bulk notification failed for recipient', { organizationId, customerId, error: errorMessage(error) });
        }
        result.failed += 1;
        result.failures.push({ customerId, reason });
      }
    }

    logger.info('Bulk notification queued', { organizationId, created: result.created, failed: result.failed });
    return result;
  }

  /**
   * Delivers one notification. Safe to call any number of times: the claim is a
   * compare-and-set on status, and terminal notifications are left alone.
   * Follow-up dispatch jobs are queued for deferrals and retries.
   */
  public async process(notificationId: string, now: Date = new Date()): Promise<DispatchOutcome> {
    const repos = this.uow.repos;

    // 1. Load and short-circuit settled notifications
    const notification = await repos.notifications.findById(notificationId);
    if (!notification) {
      return { outcome: 'not_found' };
    }
    if (['sent', 'delivered', 'read'].includes(notification.status)) {
      return { outcome: 'skipped', reason: 'already_final' };
    }
    if (
      notification.status === 'failed' &&
      (!notification.retryable || notification.deliveryAttempts >= MAX_DELIVERY_ATTEMPTS)
    ) {
      return { outcome: 'skipped', reason: 'exhausted' };
    }
    // A live claim is rechecked once it could have gone stale, so a worker that died
    // mid-delivery does not strand the notification in processing
    const claimExpiry = new Date(notification.updatedAt.getTime() + CLAIM_TIMEOUT_MS + 1);
    const staleClaim = notification.status === 'processing' && claimExpiry <= now;
    if (notification.status === 'processing' && !staleClaim) {
      return this.defer(notificationId, 'claim_held', claimExpiry);
    }

    // 2. Not due yet
    if (notification.scheduledFor && notification.scheduledFor > now) {
      return this.defer(notificationId, 'scheduled', notification.scheduledFor);
    }
    if (notification.status === 'failed' && notification.nextRetryAt && notification.nextRetryAt > now) {
      return this.defer(notificationId, 'retry_pending', notification.nextRetryAt);
    }

    // 3. Recipient preferences
    const preference = notification.recipientId
      ? await repos.notificationPreferences.find(notification.organizationId, notification.recipientType, notification.recipientId)
      : null;

    if (!(await this.isChannelEnabled(repos, notification, preference))) {
      await repos.notifications.transition(notificationId, [notification.status], {
        status: 'failed',
        failureReason: 'channel_disabled_by_preference',
        retryable: false,
        nextRetryAt: null,
      });
      logger.info('Notification suppressed by recipient preference', { notificationId, channel: notification.channel });
      return { outcome: 'disabled' };
    }

    if (preference?.quietHoursStart && preference.quietHoursEnd) {
      const organization = await repos.organizations.findById(notification.organizationId);
      const windowEnd = quietHoursEnd(
        now,
        organization?.timezone ?? DEFAULT_TIMEZONE,
        preference.quietHoursStart,
        preference.quietHoursEnd
      );
      if (windowEnd) {
        await repos.notifications.transition(notificationId, [notification.status], { scheduledFor: windowEnd });
        return this.defer(notificationId, 'quiet_hours', windowEnd);
      }
    }

    // 4. Claim
    const claimed = await repos.notifications.transition(
      notificationId,
      staleClaim ? ['processing'] : ['pending', 'failed'],
      { status: 'processing' }
    );
    if (!claimed) {
      return this.defer(notificationId, 'claim_held', new Date(now.getTime() + CLAIM_TIMEOUT_MS + 1));
    }

    // 5. Deliver
    const attempts = claimed.deliveryAttempts + 1;
    try {
      const message = toOutboundMessage(claimed);
      const receipt = await deliver(this.adapters, message);

      await repos.notifications.transition(
        notificationId,
        ['processing'],
        {
          status: receipt.delivered ? 'delivered' : 'sent',
          sentAt: now,
          deliveredAt: receipt.delivered ? now : null,
          providerMessageId: receipt.providerMessageId,
          failureReason: null,
          nextRetryAt: null,
        },
        { deliveryAttempts: 1 }
      );
      return { outcome: receipt.delivered ? 'delivered' : 'sent', providerMessageId: receipt.providerMessageId };
    } catch (error) {
      const delay = getDeliveryRetryDelay(attempts);
      const retryAt = delay === -1 ? null : new Date(now.getTime() + delay);
      const reason = errorMessage(error);

      await repos.notifications.transition(
        notificationId,
        ['processing'],
        { status: 'failed', failureReason: reason, nextRetryAt: retryAt },
        { deliveryAttempts: 1 }
      );
      logger.warn('Notification delivery failed', { notificationId, channel: claimed.channel, attempts, retryAt, error: reason });

      if (retryAt) {
        await this.scheduleDispatch(notificationId, retryAt);
      }
      return { outcome: 'failed', attempts, retryAt, error: reason };
    }
  }

  /**
   * Marks an in-app notification as read. Reading twice is a no-op.
   * @throws {DomainError} - 'NotificationNotFound' | 'OrganizationMismatch' | 'InvalidTransition'.
   */
  public async markRead(organizationId: string, notificationId: string, now: Date = new Date()): Promise<INotification> {
    const repos = this.uow.repos;
    const notification = await this.requireNotification(repos, organizationId, notificationId);
    if (notification.status === 'read') {
      return notification;
    }
    if (notification.channel !== 'in_app') {
      throw new DomainError('InvalidTransition', 'Only in-app notifications can be marked as read');
    }

    const updated = await repos.notifications.transition(notificationId, ['sent', 'delivered'], { status: 'read', readAt: now });
    if (!updated) {
      throw new DomainError('InvalidTransition', `Notification in status ${notification.status} cannot be marked as read`);
    }
    return updated;
  }

  /**
   * Requeues a failed notification with a fresh attempt budget.
   * @throws {DomainError} - 'NotificationNotFound' | 'OrganizationMismatch' | 'InvalidTransition'.
   */
  public async resend(organizationId: string, notificationId: string): Promise<INotification> {
    return this.uow.run(async repos => {
      const notification = await this.requireNotification(repos, organizationId, notificationId);
      if (notification.status !== 'failed') {
        throw new DomainError('InvalidTransition', 'Only failed notifications can be resent');
      }

      const requeued = await repos.notifications.transition(
        notificationId,
        ['failed'],
        { status: 'pending', deliveryAttempts: 0, retryable: true, failureReason: null, nextRetryAt: null, scheduledFor: null }
      );
      if (!requeued) {
        throw new DomainError('InvalidTransition', 'Notification changed state before it could be resent');
      }
      await this.jobs.enqueueJob(
        { type: JOB_TYPES.NOTIFICATION_DISPATCH, payload: { notificationId }, priority: requeued.priority === 'high' ? 80 : 50 },
        repos.jobs
      );

      logger.info('Notification queued for resending', { notificationId, previousAttempts: notification.deliveryAttempts });
      return requeued;
    });
  }

  /**
   * Replaces a recipient's channel switches, type overrides and quiet hours.
   * @throws {DomainError} - 'ValidationFailed' for malformed quiet hours.
   */
  public async updatePreferences(
    organizationId: string,
    recipientType: RecipientType,
    recipientId: string,
    data: IPreferenceUpdateDTO
  ): Promise<INotificationPreference> {
    const start = data.quietHoursStart ?? null;
    const end = data.quietHoursEnd ?? null;
    if ((start === null) !== (end === null) || (start !== null && !isTimeOfDay(start)) || (end !== null && !isTimeOfDay(end))) {
      throw new DomainError('ValidationFailed', 'Quiet hours need both start and end as HH:mm', { field: 'quietHoursStart' });
    }

    return this.uow.run(async repos => {
      if (recipientType === 'customer') {
        await this.customers.requireCustomer(repos, organizationId, recipientId);
      }
      return repos.notificationPreferences.upsert({
        organizationId,
        recipientType,
        recipientId,
        receiveSms: data.receiveSms ?? true,
        receiveEmail: data.receiveEmail ?? true,
        receiveWhatsapp: data.receiveWhatsapp ?? true,
        receivePush: data.receivePush ?? true,
        receiveInApp: data.receiveInApp ?? true,
        typeOverrides: data.typeOverrides ?? [],
        quietHoursStart: start,
        quietHoursEnd: end,
      });
    });
  }

  /** @throws {DomainError} - 'NotificationNotFound' | 'OrganizationMismatch'. */
  private async requireNotification(repos: IRepositories, organizationId: string, notificationId: string): Promise<INotification> {
    const notification = await repos.notifications.findById(notificationId);
    if (!notification) {
      throw new DomainError('NotificationNotFound', `Notification ${notificationId} not found`);
    }
    if (notification.organizationId !== organizationId) {
      throw new DomainError('OrganizationMismatch', 'Notification belongs to another organization');
    }
    return notification;
  }

  private async defer(
    notificationId: string,
    reason: DeferReason,
    runAt: Date
  ): Promise<DispatchOutcome> {
    await this.scheduleDispatch(notificationId, runAt);
    return { outcome: 'deferred', reason, runAt };
  }

  private async scheduleDispatch(notificationId: string, runAt: Date): Promise<void> {
    await this.jobs.enqueueJob({
      type: JOB_TYPES.NOTIFICATION_DISPATCH,
      payload: { notificationId },
      scheduleAt: runAt,
    });
  }

  // Explicit preference first (type override, then channel switch); customers without one
  // fall back to the communication flags on their record
  private async isChannelEnabled(
    repos: IRepositories,
    notification: INotification,
    preference: INotificationPreference | null
  ): Promise<boolean> {
    if (preference) {
      const override = preference.typeOverrides.find(o => o.notificationType === notification.notificationType);
      if (override && !override.enabled) return false;
      return preference[PREFERENCE_SWITCH[notification.channel]];
    }

    if (notification.recipientType !== 'customer' || !notification.recipientId) return true;
    const customer = await repos.customers.findById(notification.recipientId);
    if (!customer) return true;

    switch (notification.channel) {
      case 'sms':
        return customer.receiveSms;
      case 'email':
        return customer.receiveEmail;
      case 'whatsapp':
        return customer.receiveWhatsapp;
      default:
        return true;
    }
  }

  private async buildDraft(
    repos: IRepositories,
    organizationId: string,
    data: ISendNotificationRequestDTO
  ): Promise<NotificationDraftInput> {
    let email = data.recipientEmail ?? null;
    let phone = data.recipientPhone ?? null;
    let pushToken = data.recipientPushToken ?? null;
    let recipientId: string | null = null;

    if (data.recipientType === 'customer') {
      if (!data.recipientId) {
        throw new DomainError('ValidationFailed', 'recipientId is required for customer notifications', { field: 'recipientId' });
      }
      const customer = await this.customers.requireCustomer(repos, organizationId, data.recipientId);
      recipientId = customer.customerId;
      email = email ?? customer.email ?? null;
      phone = phone ?? customer.phoneNumber ?? null;
      pushToken = pushToken ?? customer.pushToken ?? null;
    }

    const fail = (field: string, reason: string): never => {
      throw new DomainError('ValidationFailed', reason, { field, channel: data.channel });
    };

    switch (data.channel) {
      case 'email':
        if (!email) fail('recipientEmail', 'Email notifications need a recipient email');
        if (!data.subject) fail('subject', 'Email notifications need a subject');
        break;
      case 'sms':
      case 'whatsapp':
        if (!phone) fail('recipientPhone', `${data.channel} notifications need a recipient phone`);
        else {
          phone = normalizeMsisdn(phone);
          if (!phone) fail('recipientPhone', 'Recipient phone is not a valid Kenyan mobile number');
        }
        break;
      case 'push':
        if (!pushToken) fail('recipientPushToken', 'Push notifications need a device token');
        break;
      case 'in_app':
        if (!recipientId) fail('recipientId', 'In-app notifications need a customer recipient');
        break;
    }

    return {
      organizationId,
      recipientType: data.recipientType,
      recipientId,
      recipientEmail: email,
      recipientPhone: phone,
      recipientPushToken: pushToken,
      notificationType: data.notificationType ?? 'general',
      channel: data.channel,
      subject: data.subject ?? null,
      message: data.message,
      priority: data.priority ?? 'normal',
      scheduledFor: data.scheduledFor ?? null,
      paymentId: data.paymentId ?? null,
      invoiceId: data.invoiceId ?? null,
    };
  }
}

/** @throws {Error} - 'MissingRecipientAddress' when the stored record cannot be addressed on its channel. */
function toOutboundMessage(notification: INotification): OutboundMessage {
  const { notificationId, message: body } = notification;
  const title = notification.subject ?? TEMPLATES[notification.notificationType].subject;
  const missing = (): never => {
    throw new Error(`MissingRecipientAddress: ${notification.channel}`);
  };

  switch (notification.channel) {
    case 'sms':
    case 'whatsapp':
      return { channel: notification.channel, notificationId, to: notification.recipientPhone ?? missing(), body };
    case 'email':
      return { channel: 'email', notificationId, to: notification.recipientEmail ?? missing(), subject: title, body };
    case 'push':
      return { channel: 'push', notificationId, token: notification.recipientPushToken ?? missing(), title, body };
    case 'in_app':
      return { channel: 'in_app', notificationId, recipientId: notification.recipientId ?? missing(), title, body };
  }
}
