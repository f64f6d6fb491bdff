// src/services/reference.service.ts
import { IOrganization } from '../models/organization.model';
import { ReferenceKind } from '../models/counter.model';
import { IRepositories } from '../repositories/types';
import { DomainError } from '../utils/errors';
import { formatReference } from '../utils/referenceFormat';

/**
 * Loads an organization inside the caller's unit of work.
 * @throws {DomainError} - 'OrganizationNotFound' for unknown or deactivated organizations.
 */
export async function requireOrganization(repos: IRepositories, organizationId: string): Promise<IOrganization> {
  const organization = await repos.organizations.findById(organizationId);
  if (!organization || !organization.isActive) {
    throw new DomainError('OrganizationNotFound', `Organization ${organizationId} not found`);
  }
  return organization;
}

export class ReferenceService {
  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Issues the next reference for an entity kind. The sequence is drawn from the
   * per-(organization, kind) counter, so concurrent callers never share one.
   * Call inside the transaction that creates the entity.
   */
  public async generate(repos: IRepositories, organization: IOrganization, kind: ReferenceKind): Promise<string> {
    const sequence = await repos.counters.next(organization.organizationId, kind);
    return formatReference(kind, organization.name, sequence, this.now(), organization.timezone);
  }
}
