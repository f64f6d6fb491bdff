// src/services/customer.service.ts
import { ICustomer } from '../models/customer.model';
import { IRepositories, IUnitOfWork } from '../repositories/types';
import { DomainError } from '../utils/errors';
import { normalizeMsisdn } from '../utils/phone';
import { ReferenceService, requireOrganization } from './reference.service';

export interface ICreateCustomerRequestDTO {
  firstName: string;
  lastName: string;
  phoneNumber?: string;
  email?: string;
  pushToken?: string;
  receiveSms?: boolean;
  receiveEmail?: boolean;
  receiveWhatsapp?: boolean;
}

export interface ICustomerLookup {
  customerId?: string;
  phone?: string;
  email?: string;
}

export class CustomerService {
  constructor(
    private readonly uow: IUnitOfWork,
    private readonly references: ReferenceService
  ) {}

  /**
   * Registers a customer and assigns its customer code.
   * @throws {DomainError} - 'OrganizationNotFound' | 'ValidationFailed'.
   */
  public async createCustomer(organizationId: string, data: ICreateCustomerRequestDTO): Promise<ICustomer> {
    let phoneNumber: string | null = null;
    if (data.phoneNumber) {
      phoneNumber = normalizeMsisdn(data.phoneNumber);
      if (!phoneNumber) {
        throw new DomainError('ValidationFailed', 'Phone number is not a valid Kenyan mobile number', { field: 'phoneNumber' });
      }
    }

    return this.uow.run(async repos => {
      const organization = await requireOrganization(repos, organizationId);
      const customerCode = await this.references.generate(repos, organization, 'customer');

      return repos.customers.create({
        organizationId,
        customerCode,
        firstName: data.firstName,
        lastName: data.lastName,
        phoneNumber,
        email: data.email ? data.email.toLowerCase() : null,
        pushToken: data.pushToken ?? null,
        receiveSms: data.receiveSms ?? true,
        receiveEmail: data.receiveEmail ?? true,
        receiveWhatsapp: data.receiveWhatsapp ?? false,
        lastPaymentDate: null,
        isActive: true,
      });
    });
  }

  /**
   * Finds the customer a payment belongs to. An explicit id wins; otherwise an exact
   * phone-or-email match inside the organization, which must be unique.
   * @returns null when no contact matches.
   * @throws {DomainError} - 'CustomerNotFound' | 'OrganizationMismatch' | 'AmbiguousCustomer'.
   */
  public async resolveCustomer(repos: IRepositories, organizationId: string, lookup: ICustomerLookup): Promise<ICustomer | null> {
    if (lookup.customerId) {
      return this.requireCustomer(repos, organizationId, lookup.customerId);
    }

    const phone = lookup.phone ? normalizeMsisdn(lookup.phone) ?? undefined : undefined;
    const email = lookup.email ? lookup.email.toLowerCase() : undefined;
    if (!phone && !email) return null;

    const matches = await repos.customers.findByContact(organizationId, { phone, email }, 2);
    if (matches.length > 1) {
      throw new DomainError('AmbiguousCustomer', 'More than one customer matches the payer contact details', {
        phone,
        email,
      });
    }
    return matches[0] ?? null;
  }

  /** @throws {DomainError} - 'CustomerNotFound' | 'OrganizationMismatch'. */
  public async requireCustomer(repos: IRepositories, organizationId: string, customerId: string): Promise<ICustomer> {
    const customer = await repos.customers.findById(customerId);
    if (!customer) {
      throw new DomainError('CustomerNotFound', `Customer ${customerId} not found`);
    }
    if (customer.organizationId !== organizationId) {
      throw new DomainError('OrganizationMismatch', 'Customer belongs to another organization');
    }
    return customer;
  }
}
