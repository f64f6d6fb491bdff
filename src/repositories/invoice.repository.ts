import { InvoiceModel, IInvoice } from '../models/invoice.model';
import { IInvoiceRepository, InvoiceDraft, InvoicePatch } from './types';
import { SessionRef } from './mongoSupport';

export class MongoInvoiceRepository implements IInvoiceRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async create(draft: InvoiceDraft): Promise<IInvoice> {
    const [created] = await InvoiceModel.create([draft], { session: this.session });
    return created.toObject();
  }

  public async findById(invoiceId: string): Promise<IInvoice | null> {
    return InvoiceModel.findOne({ invoiceId }).session(this.session).lean<IInvoice>();
  }

  public async update(invoiceId: string, patch: InvoicePatch): Promise<IInvoice | null> {
    return InvoiceModel.findOneAndUpdate({ invoiceId }, { $set: patch }, { new: true, session: this.session }).lean<IInvoice>();
  }

  public async findPastDue(today: string): Promise<IInvoice[]> {
    return InvoiceModel.find({
      dueDate: { $lt: today },
      status: { $in: ['draft', 'sent', 'viewed'] },
      amountPaid: 0,
    })
      .session(this.session)
      .lean<IInvoice[]>();
  }
}
