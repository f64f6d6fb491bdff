// src/providerAdapters/mpesa.adapter.ts
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { IntegrationEnvironment } from '../models/integration.model';
import { ProviderError, errorMessage } from '../utils/errors';
import { formatInZone } from '../utils/dates';
import { formatMoney, parseMoney } from '../utils/money';
import { verifyWebhookSignature } from '../utils/webhookSecurity';
import { logger } from '../utils/logger';
import {
  IMoneyMovementProvider,
  ProviderCallbackDTO,
  PushPaymentRequestDTO,
  PushPaymentResponseDTO,
} from './provider.interface';

export const MPESA_BASE_URLS: Record<IntegrationEnvironment, string> = {
  sandbox: 'https://sandbox.safaricom.co.ke',
  production: 'https://api.safaricom.co.ke',
};

export const MPESA_OAUTH_PATH = '/oauth/v1/generate?grant_type=client_credentials';
export const MPESA_STK_PUSH_PATH = '/mpesa/stkpush/v1/processrequest';

// Result code Daraja sends while the payer has not yet answered the prompt
export const MPESA_RESULT_PROCESSING = 4999;

export interface MpesaCredentials {
  environment: IntegrationEnvironment;
  consumerKey: string;
  consumerSecret: string;
  passkey: string;
  shortCode: string;
}

interface MpesaAdapterOptions {
  timeoutMs: number;
  httpClient?: AxiosInstance;
  now?: () => Date;
}

const OAuthResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.union([z.string(), z.number()]).optional(),
});

const StkPushResponseSchema = z.object({
  MerchantRequestID: z.string().optional(),
  CheckoutRequestID: z.string().optional(),
  ResponseCode: z.string(),
  ResponseDescription: z.string().optional(),
  CustomerMessage: z.string().optional(),
});

const StkCallbackSchema = z.object({
  Body: z.object({
    stkCallback: z.object({
      MerchantRequestID: z.string().optional(),
      CheckoutRequestID: z.string().min(1),
      ResultCode: z.coerce.number().int(),
      ResultDesc: z.string().default(''),
      CallbackMetadata: z
        .object({
          Item: z.array(z.object({ Name: z.string(), Value: z.union([z.string(), z.number()]).optional() })),
        })
        .optional(),
    }),
  }),
});

/**
 * Safaricom Daraja (M-Pesa Express / STK push) client for one integration.
 */
export class MpesaAdapter implements IMoneyMovementProvider {
  public providerName = 'mpesa';
  private client: AxiosInstance;
  private now: () => Date;
  private cachedToken?: { value: string; expiresAt: number };

  constructor(private readonly credentials: MpesaCredentials, options: MpesaAdapterOptions) {
    this.now = options.now ?? (() => new Date());
    this.client =
      options.httpClient ??
      axios.create({
        baseURL: MPESA_BASE_URLS[credentials.environment],
        headers: { 'Content-Type': 'application/json' },
        timeout: options.timeoutMs,
      });
  }

  public async authenticate(): Promise<string> {
    if (this.cachedToken && this.cachedToken.expiresAt > this.now().getTime()) {
      return this.cachedToken.value;
    }

    try {
      const response = await this.client.get(MPESA_OAUTH_PATH, {
        auth: { username: this.credentials.consumerKey, password: this.credentials.consumerSecret },
      });
      const parsed = OAuthResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ProviderError('InvalidCredentials', 'M-Pesa OAuth response did not contain an access token', {
          httpStatus: response.status,
        });
      }

      // Refresh a minute early; Daraja tokens live for an hour
      const ttlSeconds = Number(parsed.data.expires_in ?? 3599);
      this.cachedToken = {
        value: parsed.data.access_token,
        expiresAt: this.now().getTime() + Math.max(0, ttlSeconds - 60) * 1000,
      };
      return parsed.data.access_token;
    } catch (error) {
      throw this.toProviderError(error, 'oauth');
    }
  }

  public async pushPayment(data: PushPaymentRequestDTO): Promise<PushPaymentResponseDTO> {
    const token = await this.authenticate();
    const timestamp = formatInZone(this.now(), 'Africa/Nairobi', 'YYYYMMDDHHmmss');
    const password = Buffer.from(`${this.credentials.shortCode}${this.credentials.passkey}${timestamp}`).toString('base64');

    const requestBody = {
      BusinessShortCode: this.credentials.shortCode,
      Password: password,
      Timestamp: timestamp,
      TransactionType: 'CustomerPayBillOnline',
      Amount: Math.round(data.amount / 100),
      PartyA: data.phone,
      PartyB: this.credentials.shortCode,
      PhoneNumber: data.phone,
      CallBackURL: data.callbackUrl,
      AccountReference: data.reference,
      TransactionDesc: data.description || data.reference,
    };
    const requestLog = { ...requestBody, Password: '[REDACTED]', Amount: formatMoney(data.amount) };

    try {
      const response = await this.client.post(MPESA_STK_PUSH_PATH, requestBody, {
        headers: { Authorization: `Bearer ${token}` },
      });
      const parsed = StkPushResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ProviderError('ProviderRejected', 'Unrecognised STK push response', {
          httpStatus: response.status,
          responseBody: response.data,
        });
      }

      const { ResponseCode, ResponseDescription, CheckoutRequestID, MerchantRequestID } = parsed.data;
      if (ResponseCode !== '0' || !CheckoutRequestID || !MerchantRequestID) {
        throw new ProviderError('ProviderRejected', ResponseDescription || `STK push rejected with code ${ResponseCode}`, {
          httpStatus: response.status,
          responseBody: response.data,
        });
      }

      return {
        checkoutRequestId: CheckoutRequestID,
        merchantRequestId: MerchantRequestID,
        responseDescription: ResponseDescription,
        requestLog,
        responseLog: response.data,
      };
    } catch (error) {
      throw this.toProviderError(error, 'push');
    }
  }

  public verifyWebhookSignature(payload: string, signature: string | undefined, secret: string): boolean {
    return verifyWebhookSignature(payload, signature, secret);
  }

  public parseCallback(payload: unknown): ProviderCallbackDTO | null {
    const parsed = StkCallbackSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }

    const callback = parsed.data.Body.stkCallback;
    const metadata = new Map((callback.CallbackMetadata?.Item ?? []).map(item => [item.Name, item.Value]));
    const receipt = metadata.get('MpesaReceiptNumber');
    const phone = metadata.get('PhoneNumber');

    return {
      checkoutRequestId: callback.CheckoutRequestID,
      merchantRequestId: callback.MerchantRequestID,
      resultCode: callback.ResultCode,
      resultDescription: callback.ResultDesc,
      receiptNumber: receipt === undefined ? undefined : String(receipt),
      amount: this.metadataAmount(metadata.get('Amount'), callback.CheckoutRequestID),
      payerPhone: phone === undefined ? undefined : String(phone),
    };
  }

  private metadataAmount(value: string | number | undefined, checkoutRequestId: string): number | undefined {
    if (value === undefined) return undefined;
    try {
      return parseMoney(value);
    } catch (error) {
      logger.warn('Ignoring unparseable callback amount', { checkoutRequestId, value, error: errorMessage(error) });
      return undefined;
    }
  }

  private toProviderError(error: unknown, stage: 'oauth' | 'push'): ProviderError {
    if (error instanceof ProviderError) return error;

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === undefined) {
        return new ProviderError('ProviderUnavailable', `M-Pesa unreachable: ${error.message}`);
      }
      if (status >= 500 || status === 429) {
        return new ProviderError('ProviderUnavailable', `M-Pesa responded with HTTP ${status}`, {
          httpStatus: status,
          responseBody: error.response?.data,
        });
      }
      if (stage === 'oauth' || status === 401 || status === 403) {
        return new ProviderError('InvalidCredentials', `M-Pesa rejected the integration credentials (HTTP ${status})`, {
          httpStatus: status,
        });
      }
      return new ProviderError('ProviderRejected', `M-Pesa rejected the request (HTTP ${status})`, {
        httpStatus: status,
        responseBody: error.response?.data,
      });
    }

    return new ProviderError('ProviderUnavailable', errorMessage(error));
  }
}
