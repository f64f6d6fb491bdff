import { PaymentPlanModel, IPaymentPlan } from '../models/paymentPlan.model';
import { IPaymentPlanRepository, PaymentPlanDraft, PaymentPlanPatch } from './types';
import { SessionRef } from './mongoSupport';

export class MongoPaymentPlanRepository implements IPaymentPlanRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async create(draft: PaymentPlanDraft): Promise<IPaymentPlan> {
    const [created] = await PaymentPlanModel.create([draft], { session: this.session });
    return created.toObject();
  }

  public async findById(paymentPlanId: string): Promise<IPaymentPlan | null> {
    return PaymentPlanModel.findOne({ paymentPlanId }).session(this.session).lean<IPaymentPlan>();
  }

  public async update(paymentPlanId: string, patch: PaymentPlanPatch): Promise<IPaymentPlan | null> {
    return PaymentPlanModel.findOneAndUpdate(
      { paymentPlanId },
      { $set: patch },
      { new: true, session: this.session }
    ).lean<IPaymentPlan>();
  }

  public async findPastDue(today: string): Promise<IPaymentPlan[]> {
    return PaymentPlanModel.find({ status: 'active', endDate: { $lt: today }, balance: { $gt: 0 } })
      .session(this.session)
      .lean<IPaymentPlan[]>();
  }
}
