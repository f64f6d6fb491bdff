import { computeWebhookSignature } from '../../src/utils/webhookSecurity';
import { ProviderError } from '../../src/utils/errors';
import {
  FIXED_NOW,
  ITestContext,
  TEST_WEBHOOK_SECRET,
  createTestContext,
  seedCustomer,
  seedOrganization,
  signedBody,
  stkCallback,
} from '../support/fixtures';

const ACTOR = 'user_test';

describe('Payment Settlement', () => {
  let context: ITestContext;
  let orgId: string;

  const callback = (checkoutRequestId: string, resultCode: number, metadata: Parameters<typeof stkCallback>[2] = {}) => {
    const { body, signature } = signedBody(stkCallback(checkoutRequestId, resultCode, metadata));
    return context.services.payments.reconcileCallback(context.integration.integrationId, body, signature);
  };

  const webhookLogs = () => context.uow.allApiLogs().filter(log => log.requestType === 'webhook');

  beforeEach(async () => {
    context = await createTestContext({ feePolicy: { percentBps: 150, flatFee: 0 } });
    orgId = context.organization.organizationId;
  });

  describe('initiation and dispatch', () => {
    it('should push a pending payment to M-Pesa and correlate it', async () => {
      // Arrange
      const customer = await seedCustomer(context);

      // Act
      const { payment, dispatch } = await context.services.payments.initiateAndDispatch(
        orgId,
        { amount: 50000, phone: '254712345678', description: 'Rent' },
        ACTOR
      );

      // Assert
      expect(payment).toMatchObject({
        paymentReference: 'PAY-ACM-20240315-00001',
        status: 'initiated',
        customerId: customer.customerId,
        integrationId: context.integration.integrationId,
        checkoutRequestId: 'ws_CO_1',
        merchantRequestId: 'mr_1',
        payerName: 'Jane Wanjiku',
        initiatedAt: FIXED_NOW,
      });
      expect(dispatch).toEqual({
        checkoutRequestId: 'ws_CO_1',
        merchantRequestId: 'mr_1',
        responseDescription: 'Success. Request accepted for processing',
      });
      expect(context.provider.pushes).toEqual([
        {
          phone: '254712345678',
          amount: 50000,
          reference: 'PAY-ACM-20240315-00001',
          description: 'Rent',
          callbackUrl: `https://collections.test/webhooks/mpesa/${context.integration.integrationId}`,
        },
      ]);
      expect(context.uow.allApiLogs()[0]).toMatchObject({ requestType: 'stk_push', status: 'success', correlationId: 'ws_CO_1' });
    });

    it('should reject amounts with cents', async () => {
      await expect(
        context.services.payments.initiatePayment(orgId, { amount: 50050, phone: '0712345678' }, ACTOR)
      ).rejects.toMatchObject({ code: 'InvalidAmount', message: 'M-Pesa only accepts whole shilling amounts' });
    });

    it('should reject phones outside the Kenyan mobile ranges', async () => {
      await expect(
        context.services.payments.initiatePayment(orgId, { amount: 50000, phone: '12345' }, ACTOR)
      ).rejects.toMatchObject({ code: 'ValidationFailed' });
    });

    it('should refuse to guess between customers sharing a phone number', async () => {
      await seedCustomer(context, { email: 'jane@example.com' });
      await seedCustomer(context, { firstName: 'John', email: 'john@example.com' });

      await expect(
        context.services.payments.initiatePayment(orgId, { amount: 50000, phone: '0712345678' }, ACTOR)
      ).rejects.toMatchObject({ code: 'AmbiguousCustomer' });
      expect(context.uow.allPayments()).toEqual([]);
    });

    it('should not create a payment for an organization without an integration', async () => {
      // Arrange
      const other = await seedOrganization(context.uow, 'Beta Stores');

      // Act
      const attempt = context.services.payments.initiateAndDispatch(
        other.organizationId,
        { amount: 50000, phone: '0712345678' },
        ACTOR
      );

      // Assert
      await expect(attempt).rejects.toMatchObject({ code: 'IntegrationNotConfigured' });
      expect(context.uow.allPayments()).toEqual([]);
      expect(context.provider.pushes).toEqual([]);
    });

    it('should leave a pending payment untouched when its integration is gone', async () => {
      // Arrange
      const other = await seedOrganization(context.uow, 'Beta Stores');
      const payment = await context.services.payments.initiatePayment(other.organizationId, { amount: 50000, phone: '0712345678' }, ACTOR);

      // Act
      const attempt = context.services.payments.dispatchToProvider(other.organizationId, payment.paymentId);

      // Assert
      await expect(attempt).rejects.toMatchObject({ code: 'IntegrationNotConfigured' });
      expect(context.uow.allPayments()[0]).toMatchObject({ paymentReference: 'PAY-BET-20240315-00001', status: 'pending' });
    });

    it('should keep an accepted push open when its call log cannot be written', async () => {
      // Arrange
      const createLog = jest.spyOn(context.uow.repos.apiLogs, 'create').mockRejectedValueOnce(new Error('log write timeout'));

      // Act
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);
      const result = await callback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1ABC2DE' });

      // Assert
      expect(createLog).toHaveBeenCalledTimes(2);
      expect(payment).toMatchObject({ status: 'initiated', checkoutRequestId: 'ws_CO_1' });
      expect(result).toMatchObject({ status: 'applied', paymentId: payment.paymentId, paymentStatus: 'completed' });
      expect(context.uow.allApiLogs().map(log => log.requestType)).toEqual(['webhook']);
      createLog.mockRestore();
    });

    it('should keep an accepted push open when usage counters cannot be written', async () => {
      const recordUsage = jest.spyOn(context.uow.repos.integrations, 'recordUsage').mockRejectedValueOnce(new Error('write conflict'));

      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);

      expect(payment).toMatchObject({ status: 'initiated', checkoutRequestId: 'ws_CO_1' });
      expect(context.uow.allApiLogs()[0]).toMatchObject({ requestType: 'stk_push', status: 'success' });
      recordUsage.mockRestore();
    });

    it('should not push a payment twice', async () => {
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);

      await expect(context.services.payments.dispatchToProvider(orgId, payment.paymentId)).rejects.toMatchObject({
        code: 'InvalidTransition',
        message: 'Payment in status initiated cannot be dispatched',
      });
      expect(context.provider.pushes).toHaveLength(1);
    });

    it('should fail the payment and record the call when the provider rejects the push', async () => {
      // Arrange
      context.provider.failWith = new ProviderError('ProviderRejected', 'Invalid PhoneNumber', { httpStatus: 400 });

      // Act
      const attempt = context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);

      // Assert
      await expect(attempt).rejects.toMatchObject({ code: 'ProviderRejected' });
      expect(context.uow.allPayments()[0]).toMatchObject({ status: 'failed', failureReason: 'Invalid PhoneNumber' });
      expect(context.uow.allApiLogs()[0]).toMatchObject({
        requestType: 'stk_push',
        status: 'rejected',
        httpStatus: 400,
        errorMessage: 'Invalid PhoneNumber',
      });
      const integration = await context.uow.repos.integrations.findById(context.integration.integrationId);
      expect(integration).toMatchObject({ totalRequests: 1, successfulRequests: 0, failedRequests: 1 });
    });

    it('should hand out distinct references to concurrent payments', async () => {
      const payments = await Promise.all(
        ['0711000001', '0711000002', '0711000003'].map(phone =>
          context.services.payments.initiatePayment(orgId, { amount: 10000, phone }, ACTOR)
        )
      );

      expect(payments.map(p => p.status)).toEqual(['pending', 'pending', 'pending']);
      expect(payments.map(p => p.paymentReference).sort()).toEqual([
        'PAY-ACM-20240315-00001',
        'PAY-ACM-20240315-00002',
        'PAY-ACM-20240315-00003',
      ]);
    });
  });

  describe('reconcileCallback', () => {
    it('should complete the payment, apply fees and notify the customer', async () => {
      // Arrange
      const customer = await seedCustomer(context);
      const { payment } = await context.services.payments.initiateAndDispatch(
        orgId,
        { amount: 50000, phone: '254712345678', description: 'Rent' },
        ACTOR
      );

      // Act
      const result = await callback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1ABC2DE' });

      // Assert
      expect(result).toMatchObject({ status: 'applied', paymentId: payment.paymentId, paymentStatus: 'completed' });
      const settled = await context.services.payments.getPayment(orgId, payment.paymentId);
      expect(settled).toMatchObject({
        status: 'completed',
        externalReference: 'QKT1ABC2DE',
        amount: 50000,
        transactionFee: 750,
        netAmount: 49250,
        resultCode: 0,
        completedAt: FIXED_NOW,
      });

      const [notification] = context.uow.allNotifications();
      expect(result).toMatchObject({ notificationId: notification.notificationId });
      expect(notification).toMatchObject({
        notificationType: 'payment_received',
        channel: 'sms',
        recipientPhone: '254712345678',
        message: 'Payment of KES 500.00 received successfully. Ref: PAY-ACM-20240315-00001',
      });
      expect((await context.uow.repos.customers.findById(customer.customerId))?.lastPaymentDate).toEqual(FIXED_NOW);
      expect(webhookLogs()).toEqual([
        expect.objectContaining({ status: 'success', errorMessage: null, correlationId: 'ws_CO_1', externalId: 'QKT1ABC2DE' }),
      ]);
    });

    it('should apply a replayed callback only once', async () => {
      // Arrange
      await seedCustomer(context);
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);
      await callback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1ABC2DE' });

      // Act
      const replay = await callback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1ABC2DE' });

      // Assert
      expect(replay).toEqual({ status: 'already_terminal', paymentId: payment.paymentId, paymentStatus: 'completed' });
      expect(context.uow.allNotifications()).toHaveLength(1);
      expect(webhookLogs().map(log => log.status)).toEqual(['success', 'ignored']);
      expect(webhookLogs()[1].errorMessage).toBe('already_terminal');
    });

    it('should settle the amount the provider reports', async () => {
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);

      await callback('ws_CO_1', 0, { amount: 450, receipt: 'QKT1ABC2DE' });

      expect(await context.services.payments.getPayment(orgId, payment.paymentId)).toMatchObject({
        amount: 45000,
        transactionFee: 675,
        netAmount: 44325,
      });
    });

    it('should keep the requested amount when the callback carries none', async () => {
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);

      await callback('ws_CO_1', 0, { receipt: 'QKT1ABC2DE' });

      expect(await context.services.payments.getPayment(orgId, payment.paymentId)).toMatchObject({ status: 'completed', amount: 50000 });
    });

    it('should move to processing and complete on the final callback', async () => {
      // Arrange
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);

      // Act
      const interim = await callback('ws_CO_1', 4999, { resultDesc: 'The transaction is being processed' });
      const final = await callback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1ABC2DE' });

      // Assert
      expect(interim).toEqual({ status: 'applied', paymentId: payment.paymentId, paymentStatus: 'processing', notificationId: null });
      expect(final).toMatchObject({ status: 'applied', paymentStatus: 'completed' });
    });

    it('should fail the payment and tell the customer why', async () => {
      // Arrange
      await seedCustomer(context);
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);

      // Act
      const result = await callback('ws_CO_1', 1032);

      // Assert
      expect(result).toMatchObject({ status: 'applied', paymentStatus: 'failed' });
      expect(await context.services.payments.getPayment(orgId, payment.paymentId)).toMatchObject({
        status: 'failed',
        resultCode: 1032,
        failureReason: 'Request cancelled by user',
        transactionFee: 0,
      });
      expect(context.uow.allNotifications()[0].message).toBe(
        'Your payment of KES 500.00 could not be completed: Request cancelled by user. Ref: PAY-ACM-20240315-00001'
      );
    });

    it('should record callbacks for unknown checkout ids as orphans', async () => {
      const result = await callback('ws_CO_unknown', 0, { amount: 500, receipt: 'QKT1ABC2DE' });

      expect(result).toEqual({ status: 'payment_not_found', checkoutRequestId: 'ws_CO_unknown' });
      expect(webhookLogs()[0]).toMatchObject({ status: 'orphan', errorMessage: 'payment_not_found', paymentId: null });
    });

    it('should not let an integration settle another organization\'s payment', async () => {
      // Arrange
      await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);
      const other = await seedOrganization(context.uow, 'Beta Stores');
      const otherIntegration = await context.uow.repos.integrations.create({
        ...context.integration,
        organizationId: other.organizationId,
      });
      const { body, signature } = signedBody(stkCallback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1ABC2DE' }));

      // Act
      const result = await context.services.payments.reconcileCallback(otherIntegration.integrationId, body, signature);

      // Assert
      expect(result).toEqual({ status: 'payment_not_found', checkoutRequestId: 'ws_CO_1' });
      expect(context.uow.allPayments()[0].status).toBe('initiated');
    });

    it('should reject callbacks with a bad signature before reading them', async () => {
      // Arrange
      await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);
      const { body } = signedBody(stkCallback('ws_CO_1', 0, { amount: 500 }));

      // Act
      const attempt = context.services.payments.reconcileCallback(
        context.integration.integrationId,
        body,
        computeWebhookSignature(body, 'wrong-secret')
      );

      // Assert
      await expect(attempt).rejects.toMatchObject({ code: 'InvalidSignature' });
      expect(context.uow.allPayments()[0].status).toBe('initiated');
      expect(webhookLogs()[0]).toMatchObject({ status: 'rejected', httpStatus: 401, errorMessage: 'invalid_signature' });
    });

    it('should reject callbacks for unknown integrations', async () => {
      const { body, signature } = signedBody(stkCallback('ws_CO_1', 0));

      await expect(context.services.payments.reconcileCallback('int_missing', body, signature)).rejects.toMatchObject({
        code: 'InvalidSignature',
      });
      expect(webhookLogs()[0]).toMatchObject({ organizationId: null, integrationId: null, errorMessage: 'unknown_integration' });
    });

    it.each([
      ['a body that is not JSON', 'not json'],
      ['JSON without an STK callback', JSON.stringify({ hello: 'world' })],
    ])('should acknowledge and ignore %s', async (_label, body) => {
      const result = await context.services.payments.reconcileCallback(
        context.integration.integrationId,
        body,
        computeWebhookSignature(body, TEST_WEBHOOK_SECRET)
      );

      expect(result).toEqual({ status: 'ignored', reason: 'malformed_payload' });
      expect(webhookLogs()[0]).toMatchObject({ status: 'ignored', errorMessage: 'malformed_payload' });
    });
  });

  describe('cancelPayment', () => {
    it('should cancel before the payer acts and ignore a late callback', async () => {
      // Arrange
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);

      // Act
      const cancelled = await context.services.payments.cancelPayment(orgId, payment.paymentId);
      const late = await callback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1ABC2DE' });

      // Assert
      expect(cancelled).toMatchObject({ status: 'cancelled', cancelledAt: FIXED_NOW });
      expect(late).toEqual({ status: 'already_terminal', paymentId: payment.paymentId, paymentStatus: 'cancelled' });
    });

    it('should correlate a payment cancelled while its push was in flight', async () => {
      // Arrange
      const payment = await context.services.payments.initiatePayment(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);
      context.provider.whilePushing = () => context.services.payments.cancelPayment(orgId, payment.paymentId);

      // Act
      const { payment: dispatched } = await context.services.payments.dispatchToProvider(orgId, payment.paymentId);
      const late = await callback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1ABC2DE' });

      // Assert
      expect(dispatched).toMatchObject({ status: 'cancelled', checkoutRequestId: 'ws_CO_1', merchantRequestId: 'mr_1' });
      expect(late).toEqual({ status: 'already_terminal', paymentId: payment.paymentId, paymentStatus: 'cancelled' });
      expect(webhookLogs()[0]).toMatchObject({ status: 'ignored', errorMessage: 'already_terminal', paymentId: payment.paymentId });
    });

    it('should refuse once the provider is processing', async () => {
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);
      await callback('ws_CO_1', 4999, { resultDesc: 'The transaction is being processed' });

      await expect(context.services.payments.cancelPayment(orgId, payment.paymentId)).rejects.toMatchObject({
        code: 'InvalidTransition',
        message: 'Payment in status processing can no longer be cancelled',
      });
    });

    it('should refuse terminal payments', async () => {
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);
      await callback('ws_CO_1', 1032);

      await expect(context.services.payments.cancelPayment(orgId, payment.paymentId)).rejects.toMatchObject({
        code: 'AlreadyTerminal',
      });
    });
  });

  describe('reversePayment', () => {
    it('should reverse a completed payment once', async () => {
      // Arrange
      const { payment } = await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);
      await callback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1ABC2DE' });

      // Act
      const reversed = await context.services.payments.reversePayment(orgId, payment.paymentId, '  Duplicate charge ', 'user_admin');

      // Assert
      expect(reversed).toMatchObject({
        status: 'reversed',
        isReversed: true,
        reversalReason: 'Duplicate charge',
        reversedBy: 'user_admin',
        reversedAt: FIXED_NOW,
        completedAt: null,
      });
      await expect(
        context.services.payments.reversePayment(orgId, payment.paymentId, 'Again', 'user_admin')
      ).rejects.toMatchObject({ code: 'AlreadyReversed' });
    });

    it('should only reverse completed payments', async () => {
      const payment = await context.services.payments.initiatePayment(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);

      await expect(
        context.services.payments.reversePayment(orgId, payment.paymentId, 'Mistake', 'user_admin')
      ).rejects.toMatchObject({ code: 'NotReversible' });
    });

    it('should require a reason', async () => {
      await expect(context.services.payments.reversePayment(orgId, 'pay_any', '   ', 'user_admin')).rejects.toMatchObject({
        code: 'ValidationFailed',
      });
    });
  });

  describe('ledger-linked payments', () => {
    it('should apply M-Pesa payments to an invoice until it is paid', async () => {
      // Arrange
      const customer = await seedCustomer(context);
      const invoice = await context.services.ledger.createInvoice(orgId, {
        customerId: customer.customerId,
        dueDate: '2024-04-15',
        subtotal: 100000,
      });

      // Act
      await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678', invoiceId: invoice.invoiceId }, ACTOR);
      await callback('ws_CO_1', 0, { amount: 500, receipt: 'QKT1AAA111' });
      const halfway = await context.uow.repos.invoices.findById(invoice.invoiceId);
      await context.services.payments.initiateAndDispatch(orgId, { amount: 50000, phone: '0712345678', invoiceId: invoice.invoiceId }, ACTOR);
      await callback('ws_CO_2', 0, { amount: 500, receipt: 'QKT1BBB222' });
      const settled = await context.uow.repos.invoices.findById(invoice.invoiceId);

      // Assert
      expect(halfway).toMatchObject({ status: 'partially_paid', amountPaid: 50000, balanceDue: 50000, paidDate: null });
      expect(settled).toMatchObject({ status: 'paid', amountPaid: 100000, balanceDue: 0, paidDate: '2024-03-15' });
      expect(context.uow.allPayments().map(p => p.paymentType)).toEqual(['invoice', 'invoice']);
    });

    it('should refuse to start payments on cancelled invoices', async () => {
      const customer = await seedCustomer(context);
      const invoice = await context.services.ledger.createInvoice(orgId, {
        customerId: customer.customerId,
        dueDate: '2024-04-15',
        subtotal: 100000,
      });
      await context.uow.repos.invoices.update(invoice.invoiceId, { status: 'cancelled' });

      await expect(
        context.services.payments.initiatePayment(orgId, { amount: 50000, phone: '0712345678', invoiceId: invoice.invoiceId }, ACTOR)
      ).rejects.toMatchObject({ code: 'NotPayable' });
    });

    it('should credit installments to a payment plan', async () => {
      // Arrange
      const customer = await seedCustomer(context);
      const plan = await context.services.ledger.createPaymentPlan(orgId, {
        customerId: customer.customerId,
        name: 'Laptop',
        totalAmount: 300000,
        numberOfInstallments: 3,
        startDate: '2024-03-01',
        endDate: '2024-05-31',
      });

      // Act
      await context.services.payments.initiateAndDispatch(
        orgId,
        { amount: 100000, phone: '0712345678', paymentPlanId: plan.paymentPlanId },
        ACTOR
      );
      await callback('ws_CO_1', 0, { amount: 1000, receipt: 'QKT1AAA111' });

      // Assert
      expect(await context.uow.repos.paymentPlans.findById(plan.paymentPlanId)).toMatchObject({
        amountPaid: 100000,
        balance: 200000,
        status: 'active',
      });
      expect(context.uow.allNotifications()[0].message).toBe(
        'Installment of KES 1000.00 received for Laptop. Balance: KES 2000.00. Ref: PAY-ACM-20240315-00001'
      );
      expect(context.uow.allPayments()[0].paymentType).toBe('subscription');
    });

    it('should keep payments inside their organization', async () => {
      const payment = await context.services.payments.initiatePayment(orgId, { amount: 50000, phone: '0712345678' }, ACTOR);
      const other = await seedOrganization(context.uow, 'Beta Stores');

      await expect(context.services.payments.getPayment(other.organizationId, payment.paymentId)).rejects.toMatchObject({
        code: 'OrganizationMismatch',
      });
    });
  });
});
