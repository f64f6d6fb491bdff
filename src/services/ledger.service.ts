// src/services/ledger.service.ts
import { IOrganization } from '../models/organization.model';
import { ICustomer } from '../models/customer.model';
import { IInvoice } from '../models/invoice.model';
import { IPaymentPlan } from '../models/paymentPlan.model';
import { IPayment, PaymentMethod } from '../models/payment.model';
import { INotification } from '../models/notification.model';
import { IRepositories, IUnitOfWork } from '../repositories/types';
import { DomainError } from '../utils/errors';
import { localDate, isDateOnly } from '../utils/dates';
import { assertPositiveAmount, formatMoney } from '../utils/money';
import {
  IInvoiceItemInput,
  applyInstallment,
  applyInvoicePayment,
  computeInstallmentAmount,
  computeInvoiceTotals,
  deriveInvoiceStatus,
} from '../utils/ledgerCalculator';
import { logger } from '../utils/logger';
import { CustomerService } from './customer.service';
import { NotificationService } from './notification.service';
import { ReferenceService, requireOrganization } from './reference.service';

// Calendar date is furthest ahead at UTC+14; any due date before it there may be past due somewhere
const EARLIEST_TIMEZONE = 'Pacific/Kiritimati';

export interface ICreateInvoiceRequestDTO {
  customerId: string;
  issueDate?: string;
  dueDate: string;
  items?: IInvoiceItemInput[];
  subtotal?: number;
  taxAmount?: number;
  discountAmount?: number;
  notes?: string;
  status?: 'draft' | 'sent';
}

export interface ICreatePaymentPlanRequestDTO {
  customerId: string;
  name: string;
  description?: string;
  totalAmount: number;
  numberOfInstallments: number;
  startDate: string;
  endDate: string;
}

export interface IManualPaymentRequestDTO {
  amount: number;
  paymentMethod: PaymentMethod;
  description?: string;
  externalReference?: string;
  payerPhone?: string;
}

export interface ILedgerEffects {
  invoice: IInvoice | null;
  plan: IPaymentPlan | null;
  notification: INotification | null;
}

export interface IOverdueSweepResult {
  invoicesMarked: number;
  plansMarked: number;
}

export class LedgerService {
  constructor(
    private readonly uow: IUnitOfWork,
    private readonly references: ReferenceService,
    private readonly customers: CustomerService,
    private readonly notifications: NotificationService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Creates an invoice with its totals and invoice number.
   * @throws {DomainError} - 'InvalidAmount' | 'ValidationFailed' | 'CustomerNotFound' | 'OrganizationMismatch'.
   */
  public async createInvoice(organizationId: string, data: ICreateInvoiceRequestDTO): Promise<IInvoice> {
    const totals = computeInvoiceTotals({
      items: data.items,
      subtotal: data.subtotal,
      taxAmount: data.taxAmount ?? 0,
      discountAmount: data.discountAmount ?? 0,
    });

    return this.uow.run(async repos => {
      const organization = await requireOrganization(repos, organizationId);
      const customer = await this.customers.requireCustomer(repos, organizationId, data.customerId);

      const issueDate = data.issueDate ?? localDate(organization.timezone, this.now());
      if (!isDateOnly(data.dueDate) || !isDateOnly(issueDate) || data.dueDate < issueDate) {
        throw new DomainError('ValidationFailed', 'dueDate must be a calendar date on or after issueDate', { field: 'dueDate' });
      }

      const invoiceNumber = await this.references.generate(repos, organization, 'invoice');
      const invoice = await repos.invoices.create({
        invoiceNumber,
        organizationId,
        customerId: customer.customerId,
        issueDate,
        dueDate: data.dueDate,
        ...totals,
        amountPaid: 0,
        balanceDue: totals.totalAmount,
        status: data.status ?? 'draft',
        paidDate: null,
        notes: data.notes ?? null,
      });

      if (invoice.status === 'sent') {
        await this.notifyInvoiceIssued(repos, organization, customer, invoice);
      }
      return invoice;
    });
  }

  /**
   * Issues a draft invoice to its customer: the status leaves draft and the invoice
   * notification is queued in the same transaction.
   * @throws {DomainError} - 'InvoiceNotFound' | 'OrganizationMismatch' | 'NotPayable' | 'InvalidTransition' | 'CustomerNotFound'.
   */
  public async sendInvoice(organizationId: string, invoiceId: string): Promise<IInvoice> {
    return this.uow.run(async repos => {
      const organization = await requireOrganization(repos, organizationId);
      const invoice = await this.requireInvoice(repos, organizationId, invoiceId);
      if (invoice.status === 'cancelled') {
        throw new DomainError('NotPayable', `Invoice ${invoice.invoiceNumber} is cancelled`);
      }
      if (invoice.status !== 'draft') {
        throw new DomainError('InvalidTransition', `Invoice ${invoice.invoiceNumber} is ${invoice.status}; only drafts can be sent`);
      }
      const customer = await this.customers.requireCustomer(repos, organizationId, invoice.customerId);

      const today = localDate(organization.timezone, this.now());
      const status = deriveInvoiceStatus({ ...invoice, status: 'sent' }, today);
      const sent = await repos.invoices.update(invoice.invoiceId, { status });
      if (!sent) {
        throw new DomainError('InvoiceNotFound', `Invoice ${invoiceId} not found`);
      }

      await this.notifyInvoiceIssued(repos, organization, customer, sent);
      logger.info('Invoice sent', { invoiceId, status });
      return sent;
    });
  }

  /**
   * Records money received against an invoice outside M-Pesa: a completed Payment and
   * the invoice update commit together.
   * @throws {DomainError} - 'InvoiceNotFound' | 'OrganizationMismatch' | 'NotPayable' | 'InvalidAmount'.
   */
  public async recordInvoicePayment(
    organizationId: string,
    invoiceId: string,
    data: IManualPaymentRequestDTO,
    actorId: string
  ): Promise<{ payment: IPayment; invoice: IInvoice }> {
    assertPositiveAmount(data.amount);
    return this.uow.run(async repos => {
      const organization = await requireOrganization(repos, organizationId);
      const invoice = await this.requireInvoice(repos, organizationId, invoiceId);
      if (invoice.status === 'cancelled') {
        throw new DomainError('NotPayable', `Invoice ${invoice.invoiceNumber} is cancelled`);
      }

      const payment = await this.createManualPayment(repos, organization, data, actorId, {
        customerId: invoice.customerId,
        invoiceId: invoice.invoiceId,
        paymentType: 'invoice',
        description: data.description ?? `Payment for invoice ${invoice.invoiceNumber}`,
      });
      const effects = await this.recordSettlement(repos, organization, payment);

      return { payment, invoice: effects.invoice ?? invoice };
    });
  }

  /**
   * Creates an installment schedule; the installment amount is fixed here.
   * @throws {DomainError} - 'InvalidAmount' | 'ValidationFailed' | 'CustomerNotFound' | 'OrganizationMismatch'.
   */
  public async createPaymentPlan(organizationId: string, data: ICreatePaymentPlanRequestDTO): Promise<IPaymentPlan> {
    const installmentAmount = computeInstallmentAmount(data.totalAmount, data.numberOfInstallments);
    if (!isDateOnly(data.startDate) || !isDateOnly(data.endDate) || data.endDate < data.startDate) {
      throw new DomainError('ValidationFailed', 'endDate must be a calendar date on or after startDate', { field: 'endDate' });
    }

    return this.uow.run(async repos => {
      await requireOrganization(repos, organizationId);
      const customer = await this.customers.requireCustomer(repos, organizationId, data.customerId);

      return repos.paymentPlans.create({
        organizationId,
        customerId: customer.customerId,
        name: data.name,
        description: data.description ?? null,
        totalAmount: data.totalAmount,
        numberOfInstallments: data.numberOfInstallments,
        installmentAmount,
        amountPaid: 0,
        balance: data.totalAmount,
        startDate: data.startDate,
        endDate: data.endDate,
        status: 'active',
      });
    });
  }

  /**
   * Records an installment received outside M-Pesa.
   * @throws {DomainError} - 'PaymentPlanNotFound' | 'OrganizationMismatch' | 'NotPayable' | 'InvalidAmount'.
   */
  public async recordInstallment(
    organizationId: string,
    paymentPlanId: string,
    data: IManualPaymentRequestDTO,
    actorId: string
  ): Promise<{ payment: IPayment; plan: IPaymentPlan }> {
    assertPositiveAmount(data.amount);
    return this.uow.run(async repos => {
      const organization = await requireOrganization(repos, organizationId);
      const plan = await this.requirePlan(repos, organizationId, paymentPlanId);
      if (plan.status === 'cancelled' || plan.status === 'completed') {
        throw new DomainError('NotPayable', `Payment plan ${plan.name} is ${plan.status}`);
      }

      const payment = await this.createManualPayment(repos, organization, data, actorId, {
        customerId: plan.customerId,
        paymentPlanId: plan.paymentPlanId,
        paymentType: 'subscription',
        description: data.description ?? `Installment for ${plan.name}`,
      });
      const effects = await this.recordSettlement(repos, organization, payment);

      return { payment, plan: effects.plan ?? plan };
    });
  }

  /**
   * Everything that follows a completed payment: the invoice or plan ledger update,
   * the customer's last payment date and the confirmation notification.
   * Must run inside the transaction that completed the payment.
   */
  public async recordSettlement(repos: IRepositories, organization: IOrganization, payment: IPayment): Promise<ILedgerEffects> {
    const today = localDate(organization.timezone, payment.completedAt ?? this.now());
    let invoice: IInvoice | null = null;
    let plan: IPaymentPlan | null = null;

    // Money the provider already collected is never refused; a ledger cancelled
    // after initiation is left as is and flagged for the operator
    if (payment.invoiceId) {
      const current = await this.requireInvoice(repos, organization.organizationId, payment.invoiceId);
      if (current.status === 'cancelled') {
        logger.warn('Completed payment not applied to cancelled invoice', { paymentId: payment.paymentId, invoiceId: current.invoiceId });
      } else {
        invoice = await repos.invoices.update(current.invoiceId, applyInvoicePayment(current, payment.amount, today));
      }
    } else if (payment.paymentPlanId) {
      const current = await this.requirePlan(repos, organization.organizationId, payment.paymentPlanId);
      if (current.status === 'cancelled') {
        logger.warn('Completed payment not applied to cancelled plan', { paymentId: payment.paymentId, paymentPlanId: current.paymentPlanId });
      } else {
        plan = await repos.paymentPlans.update(current.paymentPlanId, applyInstallment(current, payment.amount));
      }
    }

    let notification: INotification | null = null;
    if (payment.customerId) {
      await repos.customers.touchLastPayment(payment.customerId, payment.completedAt ?? this.now());
      const customer = await repos.customers.findById(payment.customerId);
      if (customer) {
        const variables = {
          currency: payment.currency,
          amount: formatMoney(payment.amount),
          reference: payment.paymentReference,
        };
        notification = plan
          ? await this.notifications.notifyCustomer(repos, {
            organization,
            customer,
            notificationType: 'installment_received',
            variables: { ...variables, planName: plan.name, balance: formatMoney(Math.max(plan.balance, 0)) },
            paymentId: payment.paymentId,
          })
          : await this.notifications.notifyCustomer(repos, {
            organization,
            customer,
            notificationType: 'payment_received',
            variables,
            paymentId: payment.paymentId,
            invoiceId: payment.invoiceId ?? undefined,
          });
      }
    }

    return { invoice, plan, notification };
  }

  /**
   * Re-derives status for invoices and plans whose due date has passed in their
   * organization's timezone.
   */
  public async sweepOverdue(asOf: Date = this.now()): Promise<IOverdueSweepResult> {
    const repos = this.uow.repos;
    const horizon = localDate(EARLIEST_TIMEZONE, asOf);
    const timezones = new Map<string, string | null>();
    const todayFor = async (organizationId: string): Promise<string | null> => {
      if (!timezones.has(organizationId)) {
        const organization = await repos.organizations.findById(organizationId);
        timezones.set(organizationId, organization ? organization.timezone : null);
      }
      const timezone = timezones.get(organizationId);
      return timezone ? localDate(timezone, asOf) : null;
    };

    const result: IOverdueSweepResult = { invoicesMarked: 0, plansMarked: 0 };

    for (const invoice of await repos.invoices.findPastDue(horizon)) {
      const today = await todayFor(invoice.organizationId);
      if (!today) continue;
      const status = deriveInvoiceStatus(invoice, today);
      if (status === 'overdue' && invoice.status !== 'overdue') {
        await repos.invoices.update(invoice.invoiceId, { status });
        result.invoicesMarked += 1;
      }
    }

    for (const plan of await repos.paymentPlans.findPastDue(horizon)) {
      const today = await todayFor(plan.organizationId);
      if (!today || plan.endDate >= today) continue;
      await repos.paymentPlans.update(plan.paymentPlanId, { status: 'overdue' });
      result.plansMarked += 1;
    }

    logger.info('Overdue sweep finished', { asOf, ...result });
    return result;
  }

  /** @throws {DomainError} - 'InvoiceNotFound' | 'OrganizationMismatch'. */
  public async requireInvoice(repos: IRepositories, organizationId: string, invoiceId: string): Promise<IInvoice> {
    const invoice = await repos.invoices.findById(invoiceId);
    if (!invoice) {
      throw new DomainError('InvoiceNotFound', `Invoice ${invoiceId} not found`);
    }
    if (invoice.organizationId !== organizationId) {
      throw new DomainError('OrganizationMismatch', 'Invoice belongs to another organization');
    }
    return invoice;
  }

  /** @throws {DomainError} - 'PaymentPlanNotFound' | 'OrganizationMismatch'. */
  public async requirePlan(repos: IRepositories, organizationId: string, paymentPlanId: string): Promise<IPaymentPlan> {
    const plan = await repos.paymentPlans.findById(paymentPlanId);
    if (!plan) {
      throw new DomainError('PaymentPlanNotFound', `Payment plan ${paymentPlanId} not found`);
    }
    if (plan.organizationId !== organizationId) {
      throw new DomainError('OrganizationMismatch', 'Payment plan belongs to another organization');
    }
    return plan;
  }

  private async notifyInvoiceIssued(
    repos: IRepositories,
    organization: IOrganization,
    customer: ICustomer,
    invoice: IInvoice
  ): Promise<INotification> {
    return this.notifications.notifyCustomer(repos, {
      organization,
      customer,
      notificationType: 'invoice_created',
      variables: {
        invoiceNumber: invoice.invoiceNumber,
        currency: organization.currency,
        amount: formatMoney(invoice.totalAmount),
        dueDate: invoice.dueDate,
      },
      invoiceId: invoice.invoiceId,
    });
  }

  private async createManualPayment(
    repos: IRepositories,
    organization: IOrganization,
    data: IManualPaymentRequestDTO,
    actorId: string,
    link: Pick<IPayment, 'customerId' | 'paymentType' | 'description'> & { invoiceId?: string; paymentPlanId?: string }
  ): Promise<IPayment> {
    const customer = link.customerId ? await repos.customers.findById(link.customerId) : null;
    const paymentReference = await this.references.generate(repos, organization, 'payment');
    const completedAt = this.now();

    return repos.payments.create({
      paymentReference,
      organizationId: organization.organizationId,
      customerId: link.customerId ?? null,
      invoiceId: link.invoiceId ?? null,
      paymentPlanId: link.paymentPlanId ?? null,
      integrationId: null,
      amount: data.amount,
      transactionFee: 0,
      currency: organization.currency,
      paymentMethod: data.paymentMethod,
      paymentType: link.paymentType,
      description: link.description,
      payerPhone: data.payerPhone ?? customer?.phoneNumber ?? null,
      payerName: customer ? `${customer.firstName} ${customer.lastName}` : null,
      payerEmail: customer?.email ?? null,
      externalReference: data.externalReference ?? null,
      status: 'completed',
      initiatedAt: completedAt,
      completedAt,
      isReversed: false,
      createdBy: actorId,
    });
  }
}
