// src/services/payment.service.ts
import { IIntegration } from '../models/integration.model';
import { IPayment, PaymentStatus, PaymentType } from '../models/payment.model';
import { ApiLogStatus } from '../models/apiLog.model';
import { IRepositories, IUnitOfWork } from '../repositories/types';
import { ProviderResolver } from '../providerAdapters/adapter.factory';
import { ProviderCallbackDTO, PushPaymentResponseDTO } from '../providerAdapters/provider.interface';
import { MPESA_RESULT_PROCESSING, MPESA_STK_PUSH_PATH } from '../providerAdapters/mpesa.adapter';
import { DomainError, ProviderError, errorMessage } from '../utils/errors';
import { assertPositiveAmount, formatMoney } from '../utils/money';
import { normalizeMsisdn } from '../utils/phone';
import { calculateTransactionFee } from '../utils/feeCalculator';
import { canTransition, isTerminal, sourcesFor } from '../utils/paymentStateMachine';
import { logger } from '../utils/logger';
import { CustomerService } from './customer.service';
import { LedgerService } from './ledger.service';
import { NotificationService } from './notification.service';
import { ReferenceService, requireOrganization } from './reference.service';

export const MAX_REVERSAL_REASON_LENGTH = 500;

// Statuses that may take the provider's correlation ids once a push is accepted
const CORRELATABLE_STATUSES: readonly PaymentStatus[] = ['initiated', 'cancelled'];

export interface IInitiatePaymentRequestDTO {
  amount: number; // minor units
  phone: string;
  description?: string;
  paymentType?: PaymentType;
  customerId?: string;
  email?: string;
  invoiceId?: string;
  paymentPlanId?: string;
}

export interface IDispatchResultDTO {
  checkoutRequestId: string;
  merchantRequestId: string;
  responseDescription?: string;
}

export type ReconcileResult =
  | { status: 'ignored'; reason: 'malformed_payload' }
  | { status: 'payment_not_found'; checkoutRequestId: string }
  | { status: 'already_terminal'; paymentId: string; paymentStatus: PaymentStatus }
  | { status: 'unchanged'; paymentId: string; paymentStatus: PaymentStatus }
  | { status: 'applied'; paymentId: string; paymentStatus: PaymentStatus; notificationId: string | null };

export interface ISettlementDependencies {
  references: ReferenceService;
  customers: CustomerService;
  ledger: LedgerService;
  notifications: NotificationService;
  resolveProvider: ProviderResolver;
  publicBaseUrl: string;
  now?: () => Date;
}

/**
 * Payment lifecycle: initiation, provider dispatch, callback reconciliation,
 * reversal and cancellation. Every status change is a compare-and-set on the
 * payment's current status.
 */
export class PaymentService {
  private readonly now: () => Date;

  constructor(
    private readonly uow: IUnitOfWork,
    private readonly deps: ISettlementDependencies
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Creates a pending M-Pesa payment with its reference.
   * @throws {DomainError} - 'InvalidAmount' | 'ValidationFailed' | 'AmbiguousCustomer' | 'OrganizationMismatch' |
   * 'InvoiceNotFound' | 'PaymentPlanNotFound' | 'CustomerNotFound' | 'NotPayable'.
   */
  public async initiatePayment(organizationId: string, data: IInitiatePaymentRequestDTO, actorId: string): Promise<IPayment> {
    // 1. Input checks that need no data
    assertPositiveAmount(data.amount);
    if (data.amount % 100 !== 0) {
      throw new DomainError('InvalidAmount', 'M-Pesa only accepts whole shilling amounts');
    }
    const phone = normalizeMsisdn(data.phone);
    if (!phone) {
      throw new DomainError('ValidationFailed', 'Phone number is not a valid Kenyan mobile number', { field: 'phone' });
    }
    if (data.invoiceId && data.paymentPlanId) {
      throw new DomainError('ValidationFailed', 'A payment settles an invoice or a payment plan, not both', { field: 'paymentPlanId' });
    }

    return this.uow.run(async repos => {
      const organization = await requireOrganization(repos, organizationId);

      // 2. Ledger link must live in the same organization and still accept money
      let linkedCustomerId: string | undefined;
      if (data.invoiceId) {
        const invoice = await this.deps.ledger.requireInvoice(repos, organizationId, data.invoiceId);
        if (invoice.status === 'cancelled') {
          throw new DomainError('NotPayable', `Invoice ${invoice.invoiceNumber} is cancelled`);
        }
        linkedCustomerId = invoice.customerId;
      } else if (data.paymentPlanId) {
        const plan = await this.deps.ledger.requirePlan(repos, organizationId, data.paymentPlanId);
        if (plan.status === 'cancelled' || plan.status === 'completed') {
          throw new DomainError('NotPayable', `Payment plan ${plan.name} is ${plan.status}`);
        }
        linkedCustomerId = plan.customerId;
      }

      // 3. Customer: explicit id, else the ledger's owner, else a unique contact match
      const customer = await this.deps.customers.resolveCustomer(repos, organizationId, {
        customerId: data.customerId ?? linkedCustomerId,
        phone,
        email: data.email,
      });

      // 4. Persist as pending
      const paymentReference = await this.deps.references.generate(repos, organization, 'payment');
      const payment = await repos.payments.create({
        paymentReference,
        organizationId,
        customerId: customer?.customerId ?? null,
        invoiceId: data.invoiceId ?? null,
        paymentPlanId: data.paymentPlanId ?? null,
        integrationId: null,
        amount: data.amount,
        transactionFee: 0,
        currency: organization.currency,
        paymentMethod: 'mpesa',
        paymentType: data.paymentType ?? (data.invoiceId ? 'invoice' : data.paymentPlanId ? 'subscription' : 'other'),
        description: data.description ?? '',
        payerPhone: phone,
        payerName: customer ? `${customer.firstName} ${customer.lastName}` : null,
        payerEmail: customer?.email ?? data.email ?? null,
        status: 'pending',
        isReversed: false,
        createdBy: actorId,
      });

      logger.info('Payment initiated', { paymentId: payment.paymentId, paymentReference, organizationId });
      return payment;
    });
  }

  /**
   * Sends the STK push for a pending payment. Only a push the provider refuses or
   * never answers fails the payment; the ProviderError is re-raised and nothing is
   * retried here. Once the push is accepted the payment stays open for its callback.
   * @throws {DomainError} - 'PaymentNotFound' | 'OrganizationMismatch' | 'InvalidTransition' | 'IntegrationNotConfigured'.
   * @throws {ProviderError} - 'ProviderUnavailable' | 'ProviderRejected' | 'InvalidCredentials'.
   */
  public async dispatchToProvider(
    organizationId: string,
    paymentId: string
  ): Promise<{ payment: IPayment; dispatch: IDispatchResultDTO }> {
    const repos = this.uow.repos;
    const payment = await this.getPayment(organizationId, paymentId);
    if (!canTransition(payment.status, 'initiated')) {
      throw new DomainError('InvalidTransition', `Payment in status ${payment.status} cannot be dispatched`);
    }

    const integration = await this.requireIntegration(repos, organizationId);
    const provider = this.deps.resolveProvider(integration);

    // 1. Claim the payment for dispatch
    const initiated = await repos.payments.transition(paymentId, sourcesFor('initiated'), {
      status: 'initiated',
      integrationId: integration.integrationId,
      initiatedAt: this.now(),
    });
    if (!initiated || !initiated.payerPhone) {
      throw new DomainError('InvalidTransition', 'Payment was dispatched or cancelled concurrently');
    }

    // 2. Push; a failure here is terminal for this payment
    const startedAt = Date.now();
    let response: PushPaymentResponseDTO;
    try {
      response = await provider.pushPayment({
        phone: initiated.payerPhone,
        amount: initiated.amount,
        reference: initiated.paymentReference,
        description: initiated.description,
        callbackUrl: this.callbackUrl(integration),
      });
    } catch (error) {
      const reason = errorMessage(error);
      await repos.payments.transition(paymentId, sourcesFor('failed'), { status: 'failed', failureReason: reason });
      await this.recordProviderCall(repos, integration, initiated, {
        status: error instanceof ProviderError && error.code === 'ProviderRejected' ? 'rejected' : 'failed',
        responseBody: error instanceof ProviderError ? error.responseBody : undefined,
        httpStatus: error instanceof ProviderError ? error.httpStatus ?? null : null,
        errorMessage: reason,
        durationMs: Date.now() - startedAt,
      });

      logger.error('Payment dispatch failed', { paymentId, error: reason });
      throw error;
    }

    // 3. Correlate. A payment cancelled while the push was in flight keeps its
    // status but still records the ids, so the late callback finds it.
    const correlated = await repos.payments.transition(paymentId, CORRELATABLE_STATUSES, {
      checkoutRequestId: response.checkoutRequestId,
      merchantRequestId: response.merchantRequestId,
    });
    await this.recordProviderCall(repos, integration, initiated, {
      status: 'success',
      requestBody: response.requestLog,
      responseBody: response.responseLog,
      httpStatus: 200,
      correlationId: response.checkoutRequestId,
      externalId: response.merchantRequestId,
      durationMs: Date.now() - startedAt,
    });

    if (correlated && correlated.status === 'cancelled') {
      logger.warn('Push accepted for a payment cancelled in flight', { paymentId, checkoutRequestId: response.checkoutRequestId });
    } else {
      logger.info('Payment dispatched', { paymentId, checkoutRequestId: response.checkoutRequestId });
    }
    return {
      payment: correlated ?? (await this.getPayment(organizationId, paymentId)),
      dispatch: {
        checkoutRequestId: response.checkoutRequestId,
        merchantRequestId: response.merchantRequestId,
        responseDescription: response.responseDescription,
      },
    };
  }

  /** Initiate and dispatch in one call, as the payment API does. */
  public async initiateAndDispatch(
    organizationId: string,
    data: IInitiatePaymentRequestDTO,
    actorId: string
  ): Promise<{ payment: IPayment; dispatch: IDispatchResultDTO }> {
    // No payment is created for an organization that cannot dispatch it
    await this.requireIntegration(this.uow.repos, organizationId);
    const payment = await this.initiatePayment(organizationId, data, actorId);
    return this.dispatchToProvider(organizationId, payment.paymentId);
  }

  /**
   * Applies a provider callback. Authenticity is checked before anything is read;
   * duplicates and callbacks for unknown payments change nothing but the audit log.
   * @throws {DomainError} - 'InvalidSignature' for unknown integrations and bad signatures.
   */
  public async reconcileCallback(integrationId: string, rawBody: string, signature: string | undefined): Promise<ReconcileResult> {
    const repos = this.uow.repos;
    const endpoint = `/webhooks/mpesa/${integrationId}`;

    // 1. Authenticate
    const integration = await repos.integrations.findById(integrationId);
    const provider = integration ? this.deps.resolveProvider(integration) : null;
    if (!integration || !provider || !provider.verifyWebhookSignature(rawBody, signature, integration.webhookSecret)) {
      await repos.apiLogs.create({
        organizationId: integration?.organizationId ?? null,
        integrationId: integration ? integration.integrationId : null,
        requestType: 'webhook',
        endpoint,
        requestBody: rawBody,
        status: 'rejected',
        httpStatus: 401,
        errorMessage: integration ? 'invalid_signature' : 'unknown_integration',
      });
      logger.warn('Rejected webhook with invalid signature', { integrationId, known: Boolean(integration) });
      throw new DomainError('InvalidSignature', 'Webhook signature verification failed');
    }

    // 2. Parse
    const payload = parseJsonBody(rawBody);
    const callback = payload === undefined ? null : provider.parseCallback(payload);
    if (!callback) {
      await repos.apiLogs.create({
        organizationId: integration.organizationId,
        integrationId,
        requestType: 'webhook',
        endpoint,
        requestBody: rawBody,
        status: 'ignored',
        httpStatus: 200,
        errorMessage: 'malformed_payload',
      });
      logger.warn('Ignoring malformed webhook payload', { integrationId });
      return { status: 'ignored', reason: 'malformed_payload' };
    }

    // 3. Correlate and apply atomically
    return this.uow.run(async txRepos => {
      const result = await this.applyCallback(txRepos, integration, callback);
      const logStatus: ApiLogStatus =
        result.status === 'payment_not_found' ? 'orphan' : result.status === 'applied' ? 'success' : 'ignored';

      await txRepos.apiLogs.create({
        organizationId: integration.organizationId,
        integrationId,
        paymentId: 'paymentId' in result ? result.paymentId : null,
        requestType: 'webhook',
        endpoint,
        requestBody: logger.redact(payload),
        status: logStatus,
        httpStatus: 200,
        errorMessage: logStatus === 'success' ? null : result.status,
        correlationId: callback.checkoutRequestId,
        externalId: callback.receiptNumber ?? callback.merchantRequestId ?? null,
      });
      return result;
    });
  }

  /**
   * Ledger-only reversal of a completed payment. Invoice and plan balances are left
   * as they are; `completedAt` is cleared with the status change.
   * @throws {DomainError} - 'PaymentNotFound' | 'OrganizationMismatch' | 'AlreadyReversed' | 'NotReversible' | 'ValidationFailed'.
   */
  public async reversePayment(organizationId: string, paymentId: string, reason: string, actorId: string): Promise<IPayment> {
    const trimmed = reason.trim();
    if (!trimmed || trimmed.length > MAX_REVERSAL_REASON_LENGTH) {
      throw new DomainError('ValidationFailed', `reason is required and at most ${MAX_REVERSAL_REASON_LENGTH} characters`, {
        field: 'reason',
      });
    }

    return this.uow.run(async repos => {
      const payment = await this.requirePayment(repos, organizationId, paymentId);
      if (payment.isReversed || payment.status === 'reversed') {
        throw new DomainError('AlreadyReversed', `Payment ${payment.paymentReference} is already reversed`);
      }
      if (!canTransition(payment.status, 'reversed')) {
        throw new DomainError('NotReversible', `Payment in status ${payment.status} cannot be reversed`);
      }

      const reversed = await repos.payments.transition(paymentId, sourcesFor('reversed'), {
        status: 'reversed',
        isReversed: true,
        reversalReason: trimmed,
        reversedAt: this.now(),
        reversedBy: actorId,
        completedAt: null,
      });
      if (!reversed) {
        throw new DomainError('NotReversible', 'Payment changed state during reversal');
      }

      if (reversed.customerId) {
        const [organization, customer] = await Promise.all([
          requireOrganization(repos, organizationId),
          repos.customers.findById(reversed.customerId),
        ]);
        if (customer) {
          await this.deps.notifications.notifyCustomer(repos, {
            organization,
            customer,
            notificationType: 'payment_reversed',
            variables: { currency: reversed.currency, amount: formatMoney(reversed.amount), reference: reversed.paymentReference },
            paymentId,
          });
        }
      }

      logger.info('Payment reversed', { paymentId, actorId });
      return reversed;
    });
  }

  /**
   * Cancels a payment the payer has not yet acted on.
   * @throws {DomainError} - 'PaymentNotFound' | 'OrganizationMismatch' | 'AlreadyTerminal' | 'InvalidTransition'.
   */
  public async cancelPayment(organizationId: string, paymentId: string): Promise<IPayment> {
    const repos = this.uow.repos;
    const payment = await this.requirePayment(repos, organizationId, paymentId);
    assertCancellable(payment.status);

    const cancelled = await repos.payments.transition(paymentId, sourcesFor('cancelled'), {
      status: 'cancelled',
      cancelledAt: this.now(),
    });
    if (!cancelled) {
      // Lost a race with a callback; report against the state that won
      const current = await this.requirePayment(repos, organizationId, paymentId);
      assertCancellable(current.status);
      throw new DomainError('InvalidTransition', 'Payment changed state during cancellation');
    }

    logger.info('Payment cancelled', { paymentId });
    return cancelled;
  }

  /** @throws {DomainError} - 'PaymentNotFound' | 'OrganizationMismatch'. */
  public async getPayment(organizationId: string, paymentId: string): Promise<IPayment> {
    return this.requirePayment(this.uow.repos, organizationId, paymentId);
  }

  private async requirePayment(repos: IRepositories, organizationId: string, paymentId: string): Promise<IPayment> {
    const payment = await repos.payments.findById(paymentId);
    if (!payment) {
      throw new DomainError('PaymentNotFound', `Payment ${paymentId} not found`);
    }
    if (payment.organizationId !== organizationId) {
      throw new DomainError('OrganizationMismatch', 'Payment belongs to another organization');
    }
    return payment;
  }

  /** @throws {DomainError} - 'IntegrationNotConfigured'. */
  private async requireIntegration(repos: IRepositories, organizationId: string): Promise<IIntegration> {
    const integration = await repos.integrations.findActiveForOrganization(organizationId);
    if (!integration) {
      throw new DomainError('IntegrationNotConfigured', 'No active M-Pesa integration for this organization');
    }
    return integration;
  }

  private async applyCallback(
    repos: IRepositories,
    integration: IIntegration,
    callback: ProviderCallbackDTO
  ): Promise<ReconcileResult> {
    const { checkoutRequestId } = callback;
    const payment = await repos.payments.findByCheckoutRequestId(checkoutRequestId);

    // A callback may only touch payments of the integration's own organization
    if (!payment || payment.organizationId !== integration.organizationId) {
      logger.warn('Orphan callback', { integrationId: integration.integrationId, checkoutRequestId });
      return { status: 'payment_not_found', checkoutRequestId };
    }
    if (isTerminal(payment.status)) {
      return { status: 'already_terminal', paymentId: payment.paymentId, paymentStatus: payment.status };
    }

    const organization = await requireOrganization(repos, payment.organizationId);

    // Still waiting on the payer
    if (callback.resultCode === MPESA_RESULT_PROCESSING) {
      const processing = await repos.payments.transition(payment.paymentId, sourcesFor('processing'), {
        status: 'processing',
        resultCode: callback.resultCode,
      });
      return processing
        ? { status: 'applied', paymentId: payment.paymentId, paymentStatus: 'processing', notificationId: null }
        : { status: 'unchanged', paymentId: payment.paymentId, paymentStatus: payment.status };
    }

    if (callback.resultCode === 0) {
      const amount = callback.amount && callback.amount > 0 ? callback.amount : payment.amount;
      if (amount !== payment.amount) {
        logger.warn('Callback amount differs from requested amount', {
          paymentId: payment.paymentId,
          requested: payment.amount,
          settled: amount,
        });
      }

      const completed = await repos.payments.transition(payment.paymentId, sourcesFor('completed'), {
        status: 'completed',
        completedAt: this.now(),
        externalReference: callback.receiptNumber ?? null,
        amount,
        transactionFee: calculateTransactionFee(amount, integration.feePolicy),
        resultCode: 0,
        failureReason: null,
      });
      if (!completed) {
        return this.settledElsewhere(repos, payment.paymentId);
      }

      const effects = await this.deps.ledger.recordSettlement(repos, organization, completed);
      logger.info('Payment completed', { paymentId: completed.paymentId, receipt: completed.externalReference });
      return {
        status: 'applied',
        paymentId: completed.paymentId,
        paymentStatus: 'completed',
        notificationId: effects.notification ? effects.notification.notificationId : null,
      };
    }

    const failureReason = callback.resultDescription || `Result code ${callback.resultCode}`;
    const failed = await repos.payments.transition(payment.paymentId, sourcesFor('failed'), {
      status: 'failed',
      resultCode: callback.resultCode,
      failureReason,
    });
    if (!failed) {
      return this.settledElsewhere(repos, payment.paymentId);
    }

    let notificationId: string | null = null;
    if (failed.customerId) {
      const customer = await repos.customers.findById(failed.customerId);
      if (customer) {
        const notification = await this.deps.notifications.notifyCustomer(repos, {
          organization,
          customer,
          notificationType: 'payment_failed',
          variables: {
            currency: failed.currency,
            amount: formatMoney(failed.amount),
            reference: failed.paymentReference,
            reason: failureReason,
          },
          paymentId: failed.paymentId,
        });
        notificationId = notification.notificationId;
      }
    }

    logger.info('Payment failed', { paymentId: failed.paymentId, resultCode: callback.resultCode });
    return { status: 'applied', paymentId: failed.paymentId, paymentStatus: 'failed', notificationId };
  }

  private async settledElsewhere(repos: IRepositories, paymentId: string): Promise<ReconcileResult> {
    const current = await repos.payments.findById(paymentId);
    const paymentStatus = current ? current.status : 'failed';
    return { status: 'already_terminal', paymentId, paymentStatus };
  }

  private callbackUrl(integration: IIntegration): string {
    return `${this.deps.publicBaseUrl}/webhooks/mpesa/${integration.integrationId}`;
  }

  private async recordProviderCall(
    repos: IRepositories,
    integration: IIntegration,
    payment: IPayment,
    entry: {
      status: ApiLogStatus;
      requestBody?: unknown;
      responseBody?: unknown;
      httpStatus?: number | null;
      errorMessage?: string;
      correlationId?: string;
      externalId?: string;
      durationMs: number;
    }
  ): Promise<void> {
    // Audit and usage writes never decide the payment's fate
    try {
      await repos.apiLogs.create({
        organizationId: payment.organizationId,
        integrationId: integration.integrationId,
        paymentId: payment.paymentId,
        requestType: 'stk_push',
        endpoint: MPESA_STK_PUSH_PATH,
        requestBody: entry.requestBody,
        responseBody: logger.redact(entry.responseBody),
        status: entry.status,
        httpStatus: entry.httpStatus ?? null,
        errorMessage: entry.errorMessage ?? null,
        correlationId: entry.correlationId ?? null,
        externalId: entry.externalId ?? null,
        durationMs: entry.durationMs,
      });
    } catch (error) {
      logger.error('Could not write provider call log', { paymentId: payment.paymentId, error: errorMessage(error) });
    }
    try {
      await repos.integrations.recordUsage(integration.integrationId, entry.status === 'success', this.now());
    } catch (error) {
      logger.error('Could not record integration usage', { integrationId: integration.integrationId, error: errorMessage(error) });
    }
  }

}

/** @throws {DomainError} - 'AlreadyTerminal' | 'InvalidTransition'. */
function assertCancellable(status: PaymentStatus): void {
  if (isTerminal(status)) {
    throw new DomainError('AlreadyTerminal', `Payment is already ${status}`);
  }
  if (!canTransition(status, 'cancelled')) {
    throw new DomainError('InvalidTransition', `Payment in status ${status} can no longer be cancelled`);
  }
}

// JSON.parse never yields undefined, so undefined marks an unparseable body
function parseJsonBody(rawBody: string): unknown {
  try {
    const payload: unknown = JSON.parse(rawBody);
    return payload;
  } catch (error) {
    logger.warn('Webhook body is not JSON', { error: errorMessage(error) });
    return undefined;
  }
}
