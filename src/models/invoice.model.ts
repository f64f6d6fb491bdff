import { Schema, model } from 'mongoose';
import { generateId } from '../utils/ids';

export const INVOICE_STATUSES = ['draft', 'sent', 'viewed', 'paid', 'partially_paid', 'overdue', 'cancelled'] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export interface IInvoiceItem {
  description: string;
  quantity: number;
  unitPrice: number; // minor units
  amount: number; // quantity * unitPrice
}

export interface IInvoice {
  invoiceId: string;
  invoiceNumber: string; // INV-{ORG3}-{YYYYMM}-{seq}
  organizationId: string;
  customerId: string;
  issueDate: string; // YYYY-MM-DD
  dueDate: string; // YYYY-MM-DD
  items: IInvoiceItem[];
  subtotal: number;
  taxAmount: number;
  discountAmount: number;
  totalAmount: number;
  amountPaid: number;
  balanceDue: number; // always totalAmount - amountPaid
  status: InvoiceStatus;
  paidDate?: string | null;
  notes?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const InvoiceItemSchema = new Schema<IInvoiceItem>(
  {
    description: { type: String, required: true },
    quantity: { type: Number, required: true, min: 1 },
    unitPrice: { type: Number, required: true, min: 0 },
    amount: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const InvoiceSchema = new Schema<IInvoice>(
  {
    invoiceId: { type: String, required: true, unique: true, default: () => generateId('inv') },
    invoiceNumber: { type: String, required: true, immutable: true },
    organizationId: { type: String, required: true, index: true },
    customerId: { type: String, required: true, index: true },
    issueDate: { type: String, required: true },
    dueDate: { type: String, required: true, index: true },
    items: { type: [InvoiceItemSchema], default: [] },
    subtotal: { type: Number, required: true, min: 0 },
    taxAmount: { type: Number, default: 0, min: 0 },
    discountAmount: { type: Number, default: 0, min: 0 },
    totalAmount: { type: Number, required: true, min: 1 },
    amountPaid: { type: Number, default: 0, min: 0 },
    balanceDue: { type: Number, required: true },
    status: { type: String, enum: [...INVOICE_STATUSES], default: 'draft', index: true },
    paidDate: { type: String, default: null },
    notes: { type: String, default: null },
  },
  { timestamps: true }
);

InvoiceSchema.index({ organizationId: 1, invoiceNumber: 1 }, { unique: true });

export const InvoiceModel = model<IInvoice>('Invoice', InvoiceSchema);
