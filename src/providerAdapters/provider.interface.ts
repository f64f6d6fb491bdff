// src/providerAdapters/provider.interface.ts

export interface PushPaymentRequestDTO {
  phone: string; // normalised MSISDN, e.g. 254712345678
  amount: number; // minor units
  reference: string; // our payment reference
  description: string;
  callbackUrl: string;
}

export interface PushPaymentResponseDTO {
  checkoutRequestId: string;
  merchantRequestId: string;
  responseDescription?: string;
  // Secret-free copies for the audit log
  requestLog: Record<string, unknown>;
  responseLog: unknown;
}

/** Provider-neutral view of a settlement callback. */
export interface ProviderCallbackDTO {
  checkoutRequestId: string;
  merchantRequestId?: string;
  resultCode: number;
  resultDescription: string;
  receiptNumber?: string;
  amount?: number; // minor units, when the provider reports one
  payerPhone?: string;
}

/**
 * The standard interface for mobile-money providers.
 * Failures are raised as ProviderError (ProviderUnavailable | ProviderRejected | InvalidCredentials).
 */
export interface IMoneyMovementProvider {
  providerName: string;

  /** Obtains an API access token. */
  authenticate(): Promise<string>;

  /** Sends a payment prompt to the payer's handset. Settlement arrives later through the callback. */
  pushPayment(data: PushPaymentRequestDTO): Promise<PushPaymentResponseDTO>;

  verifyWebhookSignature(payload: string, signature: string | undefined, secret: string): boolean;

  /** @returns null when the payload is not a recognisable callback. */
  parseCallback(payload: unknown): ProviderCallbackDTO | null;
}
