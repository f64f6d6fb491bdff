import crypto from 'crypto';

export type IdPrefix = 'org' | 'cus' | 'int' | 'pay' | 'inv' | 'plan' | 'notif' | 'pref' | 'log' | 'job';

/** Opaque record id, e.g. `pay_3f9a0c1e7b2d4a61`. */
export function generateId(prefix: IdPrefix): string {
  return `${prefix}_${crypto.randomBytes(8).toString('hex')}`;
}
