// src/services/job.service.ts
import { IJob } from '../models/job.model';
import { IJobRepository, IRepositories } from '../repositories/types';
import { validateJobPayload, getJobPolicy } from '../jobs/jobRegistry';
import { getExponentialBackoffDelay, isRetryAllowed } from '../utils/retryPolicy';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const DEFAULT_LEASE_TIME_S = 300; // 5 minutes

export interface IEnqueueRequestDTO {
    type: string;
    payload: Record<string, unknown>;
    priority?: number;
    scheduleAt?: Date;
    maxAttempts?: number;
}

interface ILeaseRequestDTO {
    workerId: string;
    jobType?: string;
    limit?: number;
    maxLeaseSeconds?: number;
}

export class JobService {
    constructor(private readonly repos: IRepositories) {}

    /**
     * Enqueues a new job with schema validation and policy application.
     * Pass `jobs` to enqueue inside a caller's transaction.
     */
    public async enqueueJob(data: IEnqueueRequestDTO, jobs: IJobRepository = this.repos.jobs): Promise<IJob> {
        const { type, payload, priority, scheduleAt, maxAttempts } = data;

        validateJobPayload(type, payload);
        const policy = getJobPolicy(type);

        const job = await jobs.create({
            type,
            payload,
            priority: priority ?? 50,
            maxAttempts: maxAttempts ?? policy.maxAttempts,
            nextRunAt: scheduleAt ?? new Date(),
        });

        logger.debug('Job enqueued', { jobId: job.jobId, type, nextRunAt: job.nextRunAt });
        return job;
    }

    /** Atomically leases available jobs for a worker (pull model). */
    public async leaseJob(data: ILeaseRequestDTO): Promise<IJob[]> {
        const { workerId, jobType, limit = 1, maxLeaseSeconds = DEFAULT_LEASE_TIME_S } = data;
        const now = new Date();
        const expirationTime = new Date(now.getTime() + maxLeaseSeconds * 1000);

        // Claim one-by-one up to the limit; each claim is a single atomic update
        const leasedJobs: IJob[] = [];
        for (let i = 0; i < limit; i++) {
            const job = await this.repos.jobs.leaseNext(workerId, expirationTime, now, jobType);
            if (!job) break;
            leasedJobs.push(job);
        }

        if (leasedJobs.length > 0) {
            logger.debug('Jobs leased', { workerId, count: leasedJobs.length });
        }
        return leasedJobs;
    }

    /** Reports job success and releases the lease. */
    public async reportJobSuccess(jobId: string, workerId: string, result: unknown): Promise<IJob> {
        const updatedJob = await this.repos.jobs.complete(jobId, workerId, result);
        if (!updatedJob) { throw new Error('JobNotLeasedOrNotFound'); }

        logger.debug('Job succeeded', { jobId, type: updatedJob.type });
        return updatedJob;
    }

    /** Reports job failure: requeues with backoff, or moves the job to the DLQ once attempts run out. */
    public async reportJobFailure(jobId: string, workerId: string, error: unknown): Promise<IJob> {
        const currentJob = await this.repos.jobs.findById(jobId);
        if (!currentJob || currentJob.status !== 'leased' || currentJob.workerId !== workerId) {
            throw new Error('JobNotLeasedOrNotFound');
        }

        const lastError = { code: 'worker_fail', message: errorMessage(error) };
        // attempt was incremented when the job was leased
        const delay = isRetryAllowed(currentJob.attempt, currentJob.maxAttempts) ? getExponentialBackoffDelay(currentJob.attempt) : -1;

        const updatedJob = delay === -1
            ? await this.repos.jobs.release(jobId, workerId, { status: 'dlq', lastError })
            : await this.repos.jobs.release(jobId, workerId, {
                status: 'queued',
                nextRunAt: new Date(Date.now() + delay),
                lastError,
            });

        if (!updatedJob) {
            // Lease was lost to another worker in between
            throw new Error('JobNotLeasedOrNotFound');
        }

        if (updatedJob.status === 'dlq') {
            logger.error('Job moved to DLQ', { jobId, type: updatedJob.type, attempts: updatedJob.attempt, error: lastError.message });
        } else {
            logger.warn('Job failed, retry scheduled', { jobId, type: updatedJob.type, nextRunAt: updatedJob.nextRunAt });
        }
        return updatedJob;
    }
}
