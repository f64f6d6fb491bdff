import { CustomerModel, ICustomer } from '../models/customer.model';
import { CustomerDraft, ICustomerRepository } from './types';
import { SessionRef } from './mongoSupport';

export class MongoCustomerRepository implements ICustomerRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async create(draft: CustomerDraft): Promise<ICustomer> {
    const [created] = await CustomerModel.create([draft], { session: this.session });
    return created.toObject();
  }

  public async findById(customerId: string): Promise<ICustomer | null> {
    return CustomerModel.findOne({ customerId }).session(this.session).lean<ICustomer>();
  }

  public async findByContact(
    organizationId: string,
    contact: { phone?: string; email?: string },
    limit: number
  ): Promise<ICustomer[]> {
    const matchers: Array<{ phoneNumber: string } | { email: string }> = [];
    if (contact.phone) matchers.push({ phoneNumber: contact.phone });
    if (contact.email) matchers.push({ email: contact.email.toLowerCase() });
    if (matchers.length === 0) return [];

    return CustomerModel.find({ organizationId, isActive: true, $or: matchers })
      .sort({ createdAt: 1 })
      .limit(limit)
      .session(this.session)
      .lean<ICustomer[]>();
  }

  public async touchLastPayment(customerId: string, at: Date): Promise<void> {
    await CustomerModel.updateOne({ customerId }, { $set: { lastPaymentDate: at } }, { session: this.session ?? undefined });
  }
}
