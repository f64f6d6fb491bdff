import { ApiLogModel, IApiLog } from '../models/apiLog.model';
import { ApiLogDraft, IApiLogRepository } from './types';
import { SessionRef } from './mongoSupport';

export class MongoApiLogRepository implements IApiLogRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async create(draft: ApiLogDraft): Promise<IApiLog> {
    const [created] = await ApiLogModel.create([draft], { session: this.session });
    return created.toObject();
  }

  public async findByCorrelationId(correlationId: string): Promise<IApiLog[]> {
    return ApiLogModel.find({ correlationId }).sort({ createdAt: 1 }).session(this.session).lean<IApiLog[]>();
  }
}
