import { ReferenceKind } from '../models/counter.model';
import { formatInZone } from './dates';

const REFERENCE_LAYOUT: Record<ReferenceKind, { prefix: string; datePattern: string }> = {
  payment: { prefix: 'PAY', datePattern: 'YYYYMMDD' },
  invoice: { prefix: 'INV', datePattern: 'YYYYMM' },
  customer: { prefix: 'CUS', datePattern: 'YYYYMM' },
};

export const SEQUENCE_WIDTH = 5;

/** First three alphanumerics of the organization name, upper-cased and padded with X. */
export function organizationCode(name: string): string {
  return name.replace(/[^A-Za-z0-9]/g, '').slice(0, 3).toUpperCase().padEnd(3, 'X');
}

/**
 * `{PREFIX}-{ORG3}-{DATE}-{SEQ}`, e.g. `PAY-ACM-20240315-00042`. The date is taken
 * in the organization's timezone; sequences beyond 99999 simply grow wider.
 */
export function formatReference(
  kind: ReferenceKind,
  organizationName: string,
  sequence: number,
  at: Date,
  timezone: string
): string {
  const { prefix, datePattern } = REFERENCE_LAYOUT[kind];
  const date = formatInZone(at, timezone, datePattern);
  return `${prefix}-${organizationCode(organizationName)}-${date}-${String(sequence).padStart(SEQUENCE_WIDTH, '0')}`;
}
