import { Schema, model } from 'mongoose';
import { generateId } from '../utils/ids';

export type ApiLogRequestType = 'stk_push' | 'oauth' | 'webhook';
export type ApiLogStatus = 'success' | 'failed' | 'rejected' | 'orphan' | 'ignored';

/** Audit record of one provider exchange (outbound call or inbound webhook). */
export interface IApiLog {
  logId: string;
  organizationId?: string | null;
  integrationId?: string | null;
  paymentId?: string | null;
  requestType: ApiLogRequestType;
  endpoint: string;
  requestBody?: unknown;
  responseBody?: unknown;
  status: ApiLogStatus;
  httpStatus?: number | null;
  errorMessage?: string | null;
  correlationId?: string | null; // checkoutRequestId
  externalId?: string | null; // provider receipt / merchant request id
  durationMs?: number | null;
  createdAt: Date;
}

const ApiLogSchema = new Schema<IApiLog>(
  {
    logId: { type: String, required: true, unique: true, default: () => generateId('log') },
    organizationId: { type: String, default: null, index: true },
    integrationId: { type: String, default: null },
    paymentId: { type: String, default: null },
    requestType: { type: String, enum: ['stk_push', 'oauth', 'webhook'], required: true },
    endpoint: { type: String, required: true },
    requestBody: { type: Schema.Types.Mixed },
    responseBody: { type: Schema.Types.Mixed },
    status: { type: String, enum: ['success', 'failed', 'rejected', 'orphan', 'ignored'], required: true },
    httpStatus: { type: Number, default: null },
    errorMessage: { type: String, default: null },
    correlationId: { type: String, default: null, index: true },
    externalId: { type: String, default: null },
    durationMs: { type: Number, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

export const ApiLogModel = model<IApiLog>('ApiLog', ApiLogSchema);
