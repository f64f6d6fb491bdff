import { PaymentModel, IPayment, PaymentStatus } from '../models/payment.model';
import { OPEN_PAYMENT_STATUSES } from '../utils/paymentStateMachine';
import { IPaymentRepository, PaymentDraft, PaymentPatch } from './types';
import { SessionRef, literalSet } from './mongoSupport';

export class MongoPaymentRepository implements IPaymentRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async create(draft: PaymentDraft): Promise<IPayment> {
    const [created] = await PaymentModel.create(
      [{ ...draft, netAmount: draft.amount - draft.transactionFee }],
      { session: this.session }
    );
    return created.toObject();
  }

  public async findById(paymentId: string): Promise<IPayment | null> {
    return PaymentModel.findOne({ paymentId }).session(this.session).lean<IPayment>();
  }

  public async findByCheckoutRequestId(checkoutRequestId: string): Promise<IPayment | null> {
    const open = await PaymentModel.findOne({ checkoutRequestId, status: { $in: [...OPEN_PAYMENT_STATUSES] } })
      .session(this.session)
      .lean<IPayment>();
    if (open) return open;

    return PaymentModel.findOne({ checkoutRequestId })
      .sort({ updatedAt: -1 })
      .session(this.session)
      .lean<IPayment>();
  }

  public async transition(
    paymentId: string,
    from: readonly PaymentStatus[],
    patch: PaymentPatch
  ): Promise<IPayment | null> {
    // Pipeline update so netAmount is derived from the values written in the same operation
    return PaymentModel.findOneAndUpdate(
      { paymentId, status: { $in: [...from] } },
      [
        { $set: { ...literalSet(patch), updatedAt: '$$NOW' } },
        { $set: { netAmount: { $subtract: ['$amount', '$transactionFee'] } } },
      ],
      { new: true, session: this.session }
    ).lean<IPayment>();
  }
}
