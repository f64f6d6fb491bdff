// src/providerAdapters/adapter.factory.ts
import crypto from 'crypto';
import { AxiosInstance } from 'axios';
import { IIntegration } from '../models/integration.model';
import { DomainError } from '../utils/errors';
import { IMoneyMovementProvider } from './provider.interface';
import { MpesaAdapter } from './mpesa.adapter';

export type ProviderResolver = (integration: IIntegration) => IMoneyMovementProvider;

export interface IProviderFactoryOptions {
  timeoutMs: number;
  /** Shared HTTP client; each adapter builds its own when absent. */
  httpClient?: AxiosInstance;
  now?: () => Date;
}

/** Identifies the credentials an adapter was built from. Usage counters do not change it. */
export function credentialFingerprint(integration: IIntegration): string {
  return crypto
    .createHash('sha256')
    .update(
      [integration.provider, integration.environment, integration.consumerKey, integration.consumerSecret, integration.passkey, integration.shortCode].join('\n')
    )
    .digest('hex');
}

/**
 * Builds and caches one adapter per integration so OAuth tokens are reused.
 * A credential change produces a fresh adapter.
 */
export class ProviderAdapterFactory {
  private cache = new Map<string, { version: string; adapter: IMoneyMovementProvider }>();

  constructor(private readonly options: IProviderFactoryOptions) {}

  public getAdapter(integration: IIntegration): IMoneyMovementProvider {
    const version = credentialFingerprint(integration);
    const cached = this.cache.get(integration.integrationId);
    if (cached && cached.version === version) {
      return cached.adapter;
    }

    const adapter = this.createAdapter(integration);
    this.cache.set(integration.integrationId, { version, adapter });
    return adapter;
  }

  public resolver(): ProviderResolver {
    return integration => this.getAdapter(integration);
  }

  private createAdapter(integration: IIntegration): IMoneyMovementProvider {
    switch (integration.provider) {
      case 'mpesa':
        return new MpesaAdapter(
          {
            environment: integration.environment,
            consumerKey: integration.consumerKey,
            consumerSecret: integration.consumerSecret,
            passkey: integration.passkey,
            shortCode: integration.shortCode,
          },
          { timeoutMs: this.options.timeoutMs, httpClient: this.options.httpClient, now: this.options.now }
        );
      default:
        throw new DomainError('IntegrationNotConfigured', `Unsupported provider: ${String(integration.provider)}`);
    }
  }
}
