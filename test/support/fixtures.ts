import { sign } from 'jsonwebtoken';
import { createServices, IServices } from '../../src/container';
import { IOrganization } from '../../src/models/organization.model';
import { IIntegration } from '../../src/models/integration.model';
import { ICustomer } from '../../src/models/customer.model';
import { NotificationChannel } from '../../src/models/notification.model';
import { Role } from '../../src/config/permissions';
import { IChannelAdapters } from '../../src/notificationAdapters/channelSenders';
import { MpesaAdapter } from '../../src/providerAdapters/mpesa.adapter';
import {
  IMoneyMovementProvider,
  ProviderCallbackDTO,
  PushPaymentRequestDTO,
  PushPaymentResponseDTO,
} from '../../src/providerAdapters/provider.interface';
import { ProviderError } from '../../src/utils/errors';
import { computeWebhookSignature } from '../../src/utils/webhookSecurity';
import { InMemoryUnitOfWork } from './inMemoryStore';

export const TEST_WEBHOOK_SECRET = 'test-secret';
// 12:00 in Nairobi
export const FIXED_NOW = new Date('2024-03-15T09:00:00.000Z');

/** STK push stand-in; callbacks are verified and parsed by the real Daraja adapter. */
export class FakeMpesaProvider implements IMoneyMovementProvider {
  public providerName = 'mpesa';
  public pushes: PushPaymentRequestDTO[] = [];
  public failWith: ProviderError | null = null;
  /** Runs while the push is in flight, before the provider answers. */
  public whilePushing: (() => Promise<unknown>) | null = null;
  private sequence = 0;
  private readonly daraja = new MpesaAdapter(
    { environment: 'sandbox', consumerKey: 'test-key', consumerSecret: 'test-secret', passkey: 'test-passkey', shortCode: '174379' },
    { timeoutMs: 1000 }
  );

  public async authenticate(): Promise<string> {
    return 'test-token';
  }

  public async pushPayment(data: PushPaymentRequestDTO): Promise<PushPaymentResponseDTO> {
    this.pushes.push(data);
    if (this.whilePushing) await this.whilePushing();
    if (this.failWith) throw this.failWith;

    this.sequence += 1;
    return {
      checkoutRequestId: `ws_CO_${this.sequence}`,
      merchantRequestId: `mr_${this.sequence}`,
      responseDescription: 'Success. Request accepted for processing',
      requestLog: { PhoneNumber: data.phone, AccountReference: data.reference },
      responseLog: { ResponseCode: '0' },
    };
  }

  public verifyWebhookSignature(payload: string, signature: string | undefined, secret: string): boolean {
    return this.daraja.verifyWebhookSignature(payload, signature, secret);
  }

  public parseCallback(payload: unknown): ProviderCallbackDTO | null {
    return this.daraja.parseCallback(payload);
  }
}

export interface ISentMessage {
  channel: NotificationChannel;
  to: string;
  body: string;
}

/** Channel adapters that record what they send. Channels in `failing` throw instead. */
export function createRecordingChannels(): { adapters: IChannelAdapters; sent: ISentMessage[]; failing: Set<NotificationChannel> } {
  const sent: ISentMessage[] = [];
  const failing = new Set<NotificationChannel>();
  const record = (channel: NotificationChannel, to: string, body: string): string => {
    if (failing.has(channel)) {
      throw new Error(`${channel} gateway unavailable`);
    }
    sent.push({ channel, to, body });
    return `${channel}-msg-${sent.length}`;
  };

  const adapters: IChannelAdapters = {
    sms: { providerName: 'test-sms', sendSms: async m => ({ providerMessageId: record('sms', m.to, m.body) }) },
    email: { providerName: 'test-email', sendEmail: async m => ({ providerMessageId: record('email', m.to, m.body) }) },
    whatsapp: { providerName: 'test-whatsapp', sendWhatsApp: async m => ({ providerMessageId: record('whatsapp', m.to, m.body) }) },
    push: { providerName: 'test-push', sendPush: async m => ({ providerMessageId: record('push', m.token, m.body) }) },
    in_app: { providerName: 'test-inbox', deliver: async m => ({ providerMessageId: record('in_app', m.recipientId, m.body) }) },
  };

  return { adapters, sent, failing };
}

export interface ITestContext {
  uow: InMemoryUnitOfWork;
  services: IServices;
  provider: FakeMpesaProvider;
  channels: ReturnType<typeof createRecordingChannels>;
  organization: IOrganization;
  integration: IIntegration;
}

export async function createTestContext(
  options: { organizationName?: string; timezone?: string; feePolicy?: IIntegration['feePolicy'] } = {}
): Promise<ITestContext> {
  const uow = new InMemoryUnitOfWork();
  const provider = new FakeMpesaProvider();
  const channels = createRecordingChannels();
  const services = createServices(uow, {
    resolveProvider: () => provider,
    channelAdapters: channels.adapters,
    publicBaseUrl: 'https://collections.test',
    now: () => FIXED_NOW,
  });

  const organization = await seedOrganization(uow, options.organizationName ?? 'Acme Traders', options.timezone);
  const integration = await uow.repos.integrations.create({
    organizationId: organization.organizationId,
    provider: 'mpesa',
    environment: 'sandbox',
    consumerKey: 'test-key',
    consumerSecret: 'test-secret',
    passkey: 'test-passkey',
    shortCode: '174379',
    webhookSecret: TEST_WEBHOOK_SECRET,
    status: 'active',
    isDefault: true,
    feePolicy: options.feePolicy ?? { percentBps: 0, flatFee: 0 },
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    lastUsedAt: null,
  });

  return { uow, services, provider, channels, organization, integration };
}

export function seedOrganization(uow: InMemoryUnitOfWork, name: string, timezone = 'Africa/Nairobi'): Promise<IOrganization> {
  return uow.repos.organizations.create({ name, currency: 'KES', timezone, isActive: true });
}

export function seedCustomer(
  context: ITestContext,
  overrides: { firstName?: string; phoneNumber?: string; email?: string; receiveSms?: boolean } = {}
): Promise<ICustomer> {
  return context.services.customers.createCustomer(context.organization.organizationId, {
    firstName: overrides.firstName ?? 'Jane',
    lastName: 'Wanjiku',
    phoneNumber: overrides.phoneNumber ?? '0712345678',
    email: overrides.email ?? 'jane@example.com',
    receiveSms: overrides.receiveSms,
  });
}

/** Daraja STK callback body. `amount` is in shillings, as Daraja reports it. */
export function stkCallback(
  checkoutRequestId: string,
  resultCode: number,
  metadata: { amount?: number; receipt?: string; resultDesc?: string } = {}
): Record<string, unknown> {
  const items: { Name: string; Value: string | number }[] = [];
  if (metadata.amount !== undefined) items.push({ Name: 'Amount', Value: metadata.amount });
  if (metadata.receipt !== undefined) items.push({ Name: 'MpesaReceiptNumber', Value: metadata.receipt });
  items.push({ Name: 'PhoneNumber', Value: 254712345678 });

  return {
    Body: {
      stkCallback: {
        MerchantRequestID: 'mr_1',
        CheckoutRequestID: checkoutRequestId,
        ResultCode: resultCode,
        ResultDesc: metadata.resultDesc ?? (resultCode === 0 ? 'The service request is processed successfully.' : 'Request cancelled by user'),
        ...(resultCode === 0 ? { CallbackMetadata: { Item: items } } : {}),
      },
    },
  };
}

export function signedBody(payload: unknown, secret: string = TEST_WEBHOOK_SECRET): { body: string; signature: string } {
  const body = JSON.stringify(payload);
  return { body, signature: computeWebhookSignature(body, secret) };
}

export function accessToken(organizationId: string, role: Role = 'business_owner', sub = 'user_test'): string {
  return sign({ sub, orgId: organizationId, role }, 'test-secret', { expiresIn: '1h' });
}
