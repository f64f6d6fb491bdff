import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { MPESA_OAUTH_PATH, MPESA_STK_PUSH_PATH, MpesaAdapter } from '../../src/providerAdapters/mpesa.adapter';
import { ProviderAdapterFactory } from '../../src/providerAdapters/adapter.factory';
import { IIntegration } from '../../src/models/integration.model';
import { ProviderError } from '../../src/utils/errors';
import { stkCallback } from '../support/fixtures';

interface Reply {
  status: number;
  data: unknown;
}

type Route = (config: InternalAxiosRequestConfig) => Reply | 'network_error';

const credentials = {
  environment: 'sandbox' as const,
  consumerKey: 'test-key',
  consumerSecret: 'test-secret',
  passkey: 'test-passkey',
  shortCode: '174379',
};
const now = () => new Date('2024-03-15T09:00:00.000Z');
const tokenReply: Reply = { status: 200, data: { access_token: 'test-token', expires_in: '3599' } };
const acceptedReply: Reply = {
  status: 200,
  data: {
    MerchantRequestID: 'mr_1',
    CheckoutRequestID: 'ws_CO_1',
    ResponseCode: '0',
    ResponseDescription: 'Success. Request accepted for processing',
  },
};

/** Axios instance answered in-process by `routes`, keyed on the request path. */
function fakeDaraja(routes: { oauth: Route; push: Route }) {
  const calls: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    baseURL: 'https://sandbox.safaricom.co.ke',
    adapter: async config => {
      calls.push(config);
      const route = config.url === MPESA_OAUTH_PATH ? routes.oauth : routes.push;
      const reply = route(config);
      if (reply === 'network_error') {
        throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
      }

      const response: AxiosResponse = { data: reply.data, status: reply.status, statusText: '', headers: {}, config };
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });
  return { client, calls };
}

const pushRequest = {
  phone: '254712345678',
  amount: 50000,
  reference: 'PAY-ACM-20240315-00001',
  description: 'Rent',
  callbackUrl: 'https://collections.test/webhooks/mpesa/int_1',
};

describe('MpesaAdapter', () => {
  describe('pushPayment', () => {
    it('should send an STK push in whole shillings with the Daraja password', async () => {
      // Arrange
      const { client, calls } = fakeDaraja({ oauth: () => tokenReply, push: () => acceptedReply });
      const adapter = new MpesaAdapter(credentials, { timeoutMs: 1000, httpClient: client, now });

      // Act
      const response = await adapter.pushPayment(pushRequest);

      // Assert
      expect(response.checkoutRequestId).toBe('ws_CO_1');
      expect(response.merchantRequestId).toBe('mr_1');
      expect(response.requestLog.Password).toBe('[REDACTED]');
      expect(response.requestLog.Amount).toBe('500.00');

      const push = calls[1];
      expect(push.url).toBe(MPESA_STK_PUSH_PATH);
      expect(push.headers.get('Authorization')).toBe('Bearer test-token');
      expect(JSON.parse(String(push.data))).toEqual({
        BusinessShortCode: '174379',
        Password: Buffer.from('174379test-passkey20240315120000').toString('base64'),
        Timestamp: '20240315120000',
        TransactionType: 'CustomerPayBillOnline',
        Amount: 500,
        PartyA: '254712345678',
        PartyB: '174379',
        PhoneNumber: '254712345678',
        CallBackURL: 'https://collections.test/webhooks/mpesa/int_1',
        AccountReference: 'PAY-ACM-20240315-00001',
        TransactionDesc: 'Rent',
      });
    });

    it('should reuse the OAuth token until it expires', async () => {
      const { client, calls } = fakeDaraja({ oauth: () => tokenReply, push: () => acceptedReply });
      const adapter = new MpesaAdapter(credentials, { timeoutMs: 1000, httpClient: client, now });

      await adapter.pushPayment(pushRequest);
      await adapter.pushPayment(pushRequest);

      expect(calls.filter(call => call.url === MPESA_OAUTH_PATH)).toHaveLength(1);
    });

    it('should report a non-zero ResponseCode as ProviderRejected', async () => {
      const { client } = fakeDaraja({
        oauth: () => tokenReply,
        push: () => ({ status: 200, data: { ResponseCode: '1', ResponseDescription: 'Invalid PhoneNumber' } }),
      });
      const adapter = new MpesaAdapter(credentials, { timeoutMs: 1000, httpClient: client, now });

      await expect(adapter.pushPayment(pushRequest)).rejects.toMatchObject({
        code: 'ProviderRejected',
        message: 'Invalid PhoneNumber',
        retryable: false,
      });
    });

    it('should report 5xx responses as a retryable ProviderUnavailable', async () => {
      const { client } = fakeDaraja({ oauth: () => tokenReply, push: () => ({ status: 503, data: {} }) });
      const adapter = new MpesaAdapter(credentials, { timeoutMs: 1000, httpClient: client, now });

      await expect(adapter.pushPayment(pushRequest)).rejects.toMatchObject({
        code: 'ProviderUnavailable',
        httpStatus: 503,
        retryable: true,
      });
    });

    it('should report 4xx responses as ProviderRejected', async () => {
      const { client } = fakeDaraja({ oauth: () => tokenReply, push: () => ({ status: 400, data: { errorMessage: 'Bad Request' } }) });
      const adapter = new MpesaAdapter(credentials, { timeoutMs: 1000, httpClient: client, now });

      await expect(adapter.pushPayment(pushRequest)).rejects.toMatchObject({
        code: 'ProviderRejected',
        message: 'M-Pesa rejected the request (HTTP 400)',
      });
    });

    it('should report unreachable hosts as ProviderUnavailable', async () => {
      const { client } = fakeDaraja({ oauth: () => 'network_error', push: () => acceptedReply });
      const adapter = new MpesaAdapter(credentials, { timeoutMs: 1000, httpClient: client, now });

      await expect(adapter.pushPayment(pushRequest)).rejects.toMatchObject({
        code: 'ProviderUnavailable',
        message: 'M-Pesa unreachable: connect ECONNREFUSED',
      });
    });
  });

  describe('authenticate', () => {
    it('should report rejected credentials as InvalidCredentials', async () => {
      const { client } = fakeDaraja({ oauth: () => ({ status: 400, data: {} }), push: () => acceptedReply });
      const adapter = new MpesaAdapter(credentials, { timeoutMs: 1000, httpClient: client, now });

      const error: unknown = await adapter.authenticate().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ code: 'InvalidCredentials', httpStatus: 400 });
    });

    it('should report a response without a token as InvalidCredentials', async () => {
      const { client } = fakeDaraja({ oauth: () => ({ status: 200, data: { error: 'none' } }), push: () => acceptedReply });
      const adapter = new MpesaAdapter(credentials, { timeoutMs: 1000, httpClient: client, now });

      await expect(adapter.authenticate()).rejects.toMatchObject({
        code: 'InvalidCredentials',
        message: 'M-Pesa OAuth response did not contain an access token',
      });
    });
  });

  describe('parseCallback', () => {
    const adapter = new MpesaAdapter(credentials, { timeoutMs: 1000, now });

    it('should read the settlement metadata of a successful callback', () => {
      const callback = adapter.parseCallback(stkCallback('ws_CO_1', 0, { amount: 500, receipt: 'QK12ABC' }));

      expect(callback).toEqual({
        checkoutRequestId: 'ws_CO_1',
        merchantRequestId: 'mr_1',
        resultCode: 0,
        resultDescription: 'The service request is processed successfully.',
        receiptNumber: 'QK12ABC',
        amount: 50000,
        payerPhone: '254712345678',
      });
    });

    it('should coerce string result codes', () => {
      const payload = { Body: { stkCallback: { CheckoutRequestID: 'ws_CO_2', ResultCode: '1032', ResultDesc: 'Cancelled' } } };

      expect(adapter.parseCallback(payload)).toMatchObject({ checkoutRequestId: 'ws_CO_2', resultCode: 1032, amount: undefined });
    });

    it('should return null for payloads that are not STK callbacks', () => {
      expect(adapter.parseCallback({ hello: 'world' })).toBeNull();
      expect(adapter.parseCallback({ Body: { stkCallback: { ResultCode: 0 } } })).toBeNull();
      expect(adapter.parseCallback('not json')).toBeNull();
    });
  });
});

describe('ProviderAdapterFactory', () => {
  const integration: IIntegration = {
    integrationId: 'int_1',
    organizationId: 'org_1',
    provider: 'mpesa',
    ...credentials,
    webhookSecret: 'test-webhook-secret',
    status: 'active',
    isDefault: true,
    feePolicy: { percentBps: 0, flatFee: 0 },
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    lastUsedAt: null,
    createdAt: new Date('2024-03-01T00:00:00.000Z'),
    updatedAt: new Date('2024-03-01T00:00:00.000Z'),
  };

  it('should reuse the adapter and its token while usage counters move', async () => {
    // Arrange
    const { client, calls } = fakeDaraja({ oauth: () => tokenReply, push: () => acceptedReply });
    const factory = new ProviderAdapterFactory({ timeoutMs: 1000, httpClient: client, now });
    const afterFirstPush: IIntegration = {
      ...integration,
      totalRequests: 1,
      successfulRequests: 1,
      lastUsedAt: now(),
      updatedAt: now(),
    };

    // Act
    const first = factory.getAdapter(integration);
    await first.pushPayment(pushRequest);
    const second = factory.getAdapter(afterFirstPush);
    await second.pushPayment(pushRequest);

    // Assert
    expect(second).toBe(first);
    expect(calls.map(call => call.url)).toEqual([MPESA_OAUTH_PATH, MPESA_STK_PUSH_PATH, MPESA_STK_PUSH_PATH]);
  });

  it('should build a new adapter once the credentials change', () => {
    const factory = new ProviderAdapterFactory({ timeoutMs: 1000, now });

    const before = factory.getAdapter(integration);
    const after = factory.getAdapter({ ...integration, consumerSecret: 'test-secret-rotated' });

    expect(after).not.toBe(before);
    expect(factory.getAdapter({ ...integration, consumerSecret: 'test-secret-rotated' })).toBe(after);
  });
});
