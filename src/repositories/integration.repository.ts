import { IntegrationModel, IIntegration } from '../models/integration.model';
import { IIntegrationRepository, IntegrationDraft } from './types';
import { SessionRef } from './mongoSupport';

export class MongoIntegrationRepository implements IIntegrationRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async create(draft: IntegrationDraft): Promise<IIntegration> {
    const [created] = await IntegrationModel.create([draft], { session: this.session });
    return created.toObject();
  }

  public async findById(integrationId: string): Promise<IIntegration | null> {
    return IntegrationModel.findOne({ integrationId }).session(this.session).lean<IIntegration>();
  }

  public async findActiveForOrganization(organizationId: string): Promise<IIntegration | null> {
    return IntegrationModel.findOne({ organizationId, provider: 'mpesa', status: 'active' })
      .sort({ isDefault: -1, createdAt: 1 })
      .session(this.session)
      .lean<IIntegration>();
  }

  public async recordUsage(integrationId: string, succeeded: boolean, at: Date): Promise<void> {
    await IntegrationModel.updateOne(
      { integrationId },
      {
        $inc: { totalRequests: 1, successfulRequests: succeeded ? 1 : 0, failedRequests: succeeded ? 0 : 1 },
        $set: { lastUsedAt: at },
      },
      // Usage counters are not a configuration change; leave updatedAt alone
      { session: this.session ?? undefined, timestamps: false }
    );
  }
}
