import { Schema, model } from 'mongoose';

export type ReferenceKind = 'payment' | 'invoice' | 'customer';

export interface IReferenceCounter {
  organizationId: string;
  kind: ReferenceKind;
  seq: number;
}

const ReferenceCounterSchema = new Schema<IReferenceCounter>({
  organizationId: { type: String, required: true },
  kind: { type: String, enum: ['payment', 'invoice', 'customer'], required: true },
  seq: { type: Number, required: true, default: 0 },
});

ReferenceCounterSchema.index({ organizationId: 1, kind: 1 }, { unique: true });

export const ReferenceCounterModel = model<IReferenceCounter>('ReferenceCounter', ReferenceCounterSchema);
