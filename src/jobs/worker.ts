// src/jobs/worker.ts
import crypto from 'crypto';
import { IJob } from '../models/job.model';
import { JobService } from '../services/job.service';
import { JOB_TYPES, JobType, getJobPolicy, isJobType } from './jobRegistry';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type JobHandler = (job: IJob) => Promise<unknown>;

export interface IWorkerOptions {
    workerId?: string;
    concurrency: number;
    pollIntervalMs: number;
}

/**
 * Pull-model worker: leases runnable jobs, runs their handlers concurrently and
 * reports each outcome back to the JobService.
 */
export class JobWorker {
    public readonly workerId: string;
    private running = false;
    private loop: Promise<void> | null = null;
    private timer: NodeJS.Timeout | null = null;
    private wake: (() => void) | null = null;

    constructor(
        private readonly jobs: JobService,
        private readonly handlers: Record<JobType, JobHandler>,
        private readonly options: IWorkerOptions
    ) {
        this.workerId = options.workerId ?? `worker_${crypto.randomBytes(4).toString('hex')}`;
    }

    /** Leases up to `concurrency` jobs and runs them. Resolves with the number of jobs handled. */
    public async runOnce(): Promise<number> {
        const leased: IJob[] = [];
        // Lease per type so each job gets the lease length of its own policy
        for (const type of Object.values(JOB_TYPES)) {
            const remaining = this.options.concurrency - leased.length;
            if (remaining <= 0) break;
            leased.push(
                ...(await this.jobs.leaseJob({
                    workerId: this.workerId,
                    jobType: type,
                    limit: remaining,
                    maxLeaseSeconds: getJobPolicy(type).timeoutSeconds,
                }))
            );
        }

        await Promise.all(leased.map(job => this.execute(job)));
        return leased.length;
    }

    public start(): void {
        if (this.running) return;
        this.running = true;
        this.loop = this.poll();
        logger.info('Job worker started', { workerId: this.workerId, concurrency: this.options.concurrency });
    }

    /** Stops polling and waits for the jobs in hand to finish. */
    public async stop(): Promise<void> {
        this.running = false;
        if (this.wake) this.wake();
        if (this.loop) await this.loop;
        this.loop = null;
        logger.info('Job worker stopped', { workerId: this.workerId });
    }

    private async poll(): Promise<void> {
        while (this.running) {
            try {
                const handled = await this.runOnce();
                if (handled === 0) await this.sleep();
            } catch (error) {
                logger.error('Job poll failed', { workerId: this.workerId, error: errorMessage(error) });
                await this.sleep();
            }
        }
    }

    private sleep(): Promise<void> {
        return new Promise(resolve => {
            this.timer = setTimeout(resolve, this.options.pollIntervalMs);
            this.wake = () => {
                if (this.timer) clearTimeout(this.timer);
                resolve();
            };
        });
    }

    private async execute(job: IJob): Promise<void> {
        try {
            if (!isJobType(job.type)) {
                throw new Error(`JobTypeNotFound: ${job.type}`);
            }
            const result = await this.handlers[job.type](job);
            await this.jobs.reportJobSuccess(job.jobId, this.workerId, result);
        } catch (error) {
            await this.reportFailure(job, error);
        }
    }

    private async reportFailure(job: IJob, error: unknown): Promise<void> {
        try {
            await this.jobs.reportJobFailure(job.jobId, this.workerId, error);
        } catch (reportError) {
            // Lease expired and another worker owns the job now
            logger.error('Could not report job failure', {
                jobId: job.jobId,
                workerId: this.workerId,
                error: errorMessage(reportError),
                cause: errorMessage(error),
            });
        }
    }
}

/**
 * Enqueues a job of `type` every `intervalMs`.
 * @returns a function that cancels the schedule.
 */
export function scheduleRecurringJob(jobs: JobService, type: JobType, intervalMs: number): () => void {
    const timer = setInterval(() => {
        jobs.enqueueJob({ type, payload: {} }).catch((error: unknown) => {
            logger.error('Failed to schedule recurring job', { type, error: errorMessage(error) });
        });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
}
