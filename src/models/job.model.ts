// src/models/job.model.ts
import { Schema, model } from 'mongoose';
import { generateId } from '../utils/ids';

export type JobStatus = 'queued' | 'leased' | 'succeeded' | 'dlq';

export interface IJob {
  jobId: string;
  type: string;
  priority: number; // 0-100 (higher = sooner)
  status: JobStatus;
  payload: Record<string, unknown>;
  attempt: number;
  maxAttempts: number;
  nextRunAt: Date; // When job is available for processing (used for scheduling/retry)
  leaseExpiresAt?: Date | null; // Time worker must finish or renew
  workerId?: string | null;
  lastError?: { code?: string; message?: string } | null;
  result?: unknown;
  createdAt: Date;
  updatedAt: Date;
}

const JobSchema = new Schema<IJob>({
  jobId: { type: String, required: true, unique: true, default: () => generateId('job') },
  type: { type: String, required: true, index: true },
  priority: { type: Number, default: 50, index: true },
  status: { type: String, enum: ['queued', 'leased', 'succeeded', 'dlq'], default: 'queued', index: true },
  payload: { type: Schema.Types.Mixed, required: true },
  attempt: { type: Number, default: 0 },
  maxAttempts: { type: Number, default: 5 },
  nextRunAt: { type: Date, default: Date.now, index: true },
  leaseExpiresAt: { type: Date, default: null, index: true },
  workerId: { type: String, default: null },
  lastError: { type: Schema.Types.Mixed, default: null },
  result: { type: Schema.Types.Mixed },
}, { timestamps: true });

// Compound index for finding the next job efficiently
JobSchema.index({ status: 1, nextRunAt: 1, priority: -1 });

export const JobModel = model<IJob>('Job', JobSchema);
