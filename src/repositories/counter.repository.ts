import { ReferenceCounterModel, IReferenceCounter, ReferenceKind } from '../models/counter.model';
import { IReferenceCounterRepository } from './types';
import { SessionRef, isDuplicateKeyError } from './mongoSupport';

export class MongoReferenceCounterRepository implements IReferenceCounterRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async next(organizationId: string, kind: ReferenceKind): Promise<number> {
    try {
      return await this.increment(organizationId, kind);
    } catch (error) {
      // Two first-time upserts can race on the unique index; the loser retries as a plain $inc
      if (isDuplicateKeyError(error)) {
        return this.increment(organizationId, kind);
      }
      throw error;
    }
  }

  private async increment(organizationId: string, kind: ReferenceKind): Promise<number> {
    const counter = await ReferenceCounterModel.findOneAndUpdate(
      { organizationId, kind },
      { $inc: { seq: 1 } },
      { new: true, upsert: true, session: this.session }
    ).lean<IReferenceCounter>();

    if (!counter) {
      throw new Error(`CounterUpsertFailed: ${organizationId}/${kind}`);
    }
    return counter.seq;
  }
}
