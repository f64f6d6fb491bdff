import { OrganizationModel, IOrganization } from '../models/organization.model';
import { IOrganizationRepository, OrganizationDraft } from './types';
import { SessionRef } from './mongoSupport';

export class MongoOrganizationRepository implements IOrganizationRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async create(draft: OrganizationDraft): Promise<IOrganization> {
    const [created] = await OrganizationModel.create([draft], { session: this.session });
    return created.toObject();
  }

  public async findById(organizationId: string): Promise<IOrganization | null> {
    return OrganizationModel.findOne({ organizationId }).session(this.session).lean<IOrganization>();
  }
}
