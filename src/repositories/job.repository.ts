import { JobModel, IJob, JobStatus } from '../models/job.model';
import { IJobRepository, JobDraft } from './types';
import { SessionRef } from './mongoSupport';

export class MongoJobRepository implements IJobRepository {
  constructor(private readonly session: SessionRef = null) {}

  public async create(draft: JobDraft): Promise<IJob> {
    const [created] = await JobModel.create([{ ...draft, status: 'queued' }], { session: this.session });
    return created.toObject();
  }

  public async findById(jobId: string): Promise<IJob | null> {
    return JobModel.findOne({ jobId }).session(this.session).lean<IJob>();
  }

  public async leaseNext(workerId: string, leaseExpiresAt: Date, now: Date, jobType?: string): Promise<IJob | null> {
    // Runnable: queued, or leased by a worker whose lease lapsed (crashed worker)
    return JobModel.findOneAndUpdate(
      {
        $or: [{ status: 'queued' }, { status: 'leased', leaseExpiresAt: { $lte: now } }],
        nextRunAt: { $lte: now },
        ...(jobType ? { type: jobType } : {}),
      },
      {
        $set: { status: 'leased', workerId, leaseExpiresAt },
        $inc: { attempt: 1 },
      },
      { new: true, sort: { priority: -1, nextRunAt: 1 }, session: this.session }
    ).lean<IJob>();
  }

  public async complete(jobId: string, workerId: string, result: unknown): Promise<IJob | null> {
    return JobModel.findOneAndUpdate(
      { jobId, workerId, status: 'leased' },
      { $set: { status: 'succeeded', result, leaseExpiresAt: null } },
      { new: true, session: this.session }
    ).lean<IJob>();
  }

  public async release(
    jobId: string,
    workerId: string,
    update: { status: Extract<JobStatus, 'queued' | 'dlq'>; nextRunAt?: Date; lastError: { code: string; message: string } }
  ): Promise<IJob | null> {
    return JobModel.findOneAndUpdate(
      { jobId, workerId, status: 'leased' },
      { $set: { ...update, workerId: null, leaseExpiresAt: null } },
      { new: true, session: this.session }
    ).lean<IJob>();
  }
}
