import { IOrganization } from '../models/organization.model';
import { ICustomer } from '../models/customer.model';
import { IIntegration } from '../models/integration.model';
import { IPayment, PaymentStatus } from '../models/payment.model';
import { IInvoice } from '../models/invoice.model';
import { IPaymentPlan } from '../models/paymentPlan.model';
import { INotification, NotificationStatus, RecipientType } from '../models/notification.model';
import { INotificationPreference } from '../models/notificationPreference.model';
import { IApiLog } from '../models/apiLog.model';
import { ReferenceKind } from '../models/counter.model';
import { IJob, JobStatus } from '../models/job.model';

type Timestamps = 'createdAt' | 'updatedAt';

export type OrganizationDraft = Omit<IOrganization, 'organizationId' | Timestamps>;
export type CustomerDraft = Omit<ICustomer, 'customerId' | Timestamps>;
export type IntegrationDraft = Omit<IIntegration, 'integrationId' | Timestamps>;
export type PaymentDraft = Omit<IPayment, 'paymentId' | 'netAmount' | Timestamps>;
export type PaymentPatch = Partial<
  Omit<IPayment, 'paymentId' | 'organizationId' | 'paymentReference' | 'netAmount' | Timestamps>
>;
export type InvoiceDraft = Omit<IInvoice, 'invoiceId' | Timestamps>;
export type InvoicePatch = Partial<Pick<IInvoice, 'amountPaid' | 'balanceDue' | 'status' | 'paidDate'>>;
export type PaymentPlanDraft = Omit<IPaymentPlan, 'paymentPlanId' | Timestamps>;
export type PaymentPlanPatch = Partial<Pick<IPaymentPlan, 'amountPaid' | 'balance' | 'status'>>;
export type NotificationDraft = Omit<INotification, 'notificationId' | Timestamps>;
export type NotificationPatch = Partial<Omit<INotification, 'notificationId' | 'organizationId' | Timestamps>>;
export type PreferenceDraft = Omit<INotificationPreference, 'preferenceId' | Timestamps>;
export type ApiLogDraft = Omit<IApiLog, 'logId' | 'createdAt'>;
export type JobDraft = Pick<IJob, 'type' | 'payload' | 'priority' | 'maxAttempts' | 'nextRunAt'>;

export interface IOrganizationRepository {
  create(draft: OrganizationDraft): Promise<IOrganization>;
  findById(organizationId: string): Promise<IOrganization | null>;
}

export interface ICustomerRepository {
  create(draft: CustomerDraft): Promise<ICustomer>;
  findById(customerId: string): Promise<ICustomer | null>;
  /** Exact phone-or-email match inside one organization, capped at `limit` rows. */
  findByContact(organizationId: string, contact: { phone?: string; email?: string }, limit: number): Promise<ICustomer[]>;
  touchLastPayment(customerId: string, at: Date): Promise<void>;
}

export interface IIntegrationRepository {
  create(draft: IntegrationDraft): Promise<IIntegration>;
  findById(integrationId: string): Promise<IIntegration | null>;
  findActiveForOrganization(organizationId: string): Promise<IIntegration | null>;
  recordUsage(integrationId: string, succeeded: boolean, at: Date): Promise<void>;
}

export interface IPaymentRepository {
  create(draft: PaymentDraft): Promise<IPayment>;
  findById(paymentId: string): Promise<IPayment | null>;
  /** Prefers the open holder of the id, else the most recently updated closed one. */
  findByCheckoutRequestId(checkoutRequestId: string): Promise<IPayment | null>;
  /**
   * Compare-and-set: applies `patch` only while the stored status is one of `from`.
   * @returns the updated payment, or null when the status had already moved on.
   */
  transition(paymentId: string, from: readonly PaymentStatus[], patch: PaymentPatch): Promise<IPayment | null>;
}

export interface IInvoiceRepository {
  create(draft: InvoiceDraft): Promise<IInvoice>;
  findById(invoiceId: string): Promise<IInvoice | null>;
  update(invoiceId: string, patch: InvoicePatch): Promise<IInvoice | null>;
  /** Unpaid, uncancelled invoices whose due date is before `today`. */
  findPastDue(today: string): Promise<IInvoice[]>;
}

export interface IPaymentPlanRepository {
  create(draft: PaymentPlanDraft): Promise<IPaymentPlan>;
  findById(paymentPlanId: string): Promise<IPaymentPlan | null>;
  update(paymentPlanId: string, patch: PaymentPlanPatch): Promise<IPaymentPlan | null>;
  /** Active plans with an outstanding balance whose end date is before `today`. */
  findPastDue(today: string): Promise<IPaymentPlan[]>;
}

export interface INotificationRepository {
  create(draft: NotificationDraft): Promise<INotification>;
  findById(notificationId: string): Promise<INotification | null>;
  /** Compare-and-set on status, same contract as payments. */
  transition(
    notificationId: string,
    from: readonly NotificationStatus[],
    patch: NotificationPatch,
    increments?: { deliveryAttempts?: number }
  ): Promise<INotification | null>;
}

export interface INotificationPreferenceRepository {
  find(organizationId: string, recipientType: RecipientType, recipientId: string): Promise<INotificationPreference | null>;
  upsert(draft: PreferenceDraft): Promise<INotificationPreference>;
}

export interface IApiLogRepository {
  create(draft: ApiLogDraft): Promise<IApiLog>;
  findByCorrelationId(correlationId: string): Promise<IApiLog[]>;
}

export interface IReferenceCounterRepository {
  /** Atomically increments and returns the counter for (organization, kind), starting at 1. */
  next(organizationId: string, kind: ReferenceKind): Promise<number>;
}

export interface IJobRepository {
  create(draft: JobDraft): Promise<IJob>;
  findById(jobId: string): Promise<IJob | null>;
  /** Claims one runnable job (queued, or leased with an expired lease) and bumps its attempt. */
  leaseNext(workerId: string, leaseExpiresAt: Date, now: Date, jobType?: string): Promise<IJob | null>;
  complete(jobId: string, workerId: string, result: unknown): Promise<IJob | null>;
  release(
    jobId: string,
    workerId: string,
    update: { status: Extract<JobStatus, 'queued' | 'dlq'>; nextRunAt?: Date; lastError: { code: string; message: string } }
  ): Promise<IJob | null>;
}

export interface IRepositories {
  organizations: IOrganizationRepository;
  customers: ICustomerRepository;
  integrations: IIntegrationRepository;
  payments: IPaymentRepository;
  invoices: IInvoiceRepository;
  paymentPlans: IPaymentPlanRepository;
  notifications: INotificationRepository;
  notificationPreferences: INotificationPreferenceRepository;
  apiLogs: IApiLogRepository;
  counters: IReferenceCounterRepository;
  jobs: IJobRepository;
}

/**
 * Runs work atomically. `repos` outside of `run` are unscoped and commit
 * each call on its own.
 */
export interface IUnitOfWork {
  readonly repos: IRepositories;
  run<T>(work: (repos: IRepositories) => Promise<T>): Promise<T>;
}
