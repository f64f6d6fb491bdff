// All amounts are integer minor units (cents). Conversion goes through the
// decimal string so 0.1 + 0.2 style drift never reaches the ledger.

import { DomainError } from './errors';

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parses a decimal amount ("500", "500.5", 500.25) into minor units.
 * @throws {DomainError} - 'InvalidAmount' for negative, malformed or over-precise input.
 */
export function parseMoney(value: unknown): number {
  const raw = typeof value === 'number' ? String(value) : typeof value === 'string' ? value.trim() : '';
  const match = DECIMAL_PATTERN.exec(raw);
  if (!match) {
    throw new DomainError('InvalidAmount', `Amount must be a non-negative decimal with at most 2 places, got "${String(value)}"`);
  }

  const whole = Number(match[1]);
  const fraction = Number((match[2] ?? '').padEnd(2, '0'));
  const cents = whole * 100 + fraction;

  if (!Number.isSafeInteger(cents)) {
    throw new DomainError('InvalidAmount', 'Amount is too large');
  }
  return cents;
}

/** Renders minor units as a 2-decimal string, e.g. 50000 -> "500.00". */
export function formatMoney(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/** @throws {DomainError} - 'InvalidAmount' unless `cents` is a positive integer. */
export function assertPositiveAmount(cents: number): void {
  if (!Number.isSafeInteger(cents) || cents <= 0) {
    throw new DomainError('InvalidAmount', 'Amount must be greater than zero');
  }
}
