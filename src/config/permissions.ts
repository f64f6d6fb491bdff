/** Global permission constants (UPPER_SNAKE_CASE). */
export const PERMISSIONS = {
  PAYMENT_READ: 'payment:read',
  PAYMENT_INITIATE: 'payment:initiate',
  PAYMENT_MANAGE: 'payment:manage', // reverse and cancel
  LEDGER_MANAGE: 'ledger:manage', // customers, invoices, payment plans, manual payments
  NOTIFICATION_SEND: 'notification:send',
} as const;

export type Permission = (typeof PERMISSIONS)[keyof typeof PERMISSIONS];

export const ROLES = ['business_owner', 'business_staff', 'system_admin'] as const;
export type Role = (typeof ROLES)[number];

/** Defines permissions granted to each role. */
export const ROLE_PERMISSIONS: Record<Role, Permission[]> = {
  system_admin: [
    PERMISSIONS.PAYMENT_READ,
    PERMISSIONS.PAYMENT_INITIATE,
    PERMISSIONS.PAYMENT_MANAGE,
    PERMISSIONS.LEDGER_MANAGE,
    PERMISSIONS.NOTIFICATION_SEND,
  ],
  business_owner: [
    PERMISSIONS.PAYMENT_READ,
    PERMISSIONS.PAYMENT_INITIATE,
    PERMISSIONS.PAYMENT_MANAGE,
    PERMISSIONS.LEDGER_MANAGE,
    PERMISSIONS.NOTIFICATION_SEND,
  ],
  business_staff: [PERMISSIONS.PAYMENT_READ, PERMISSIONS.PAYMENT_INITIATE, PERMISSIONS.NOTIFICATION_SEND],
};

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some(role => role === value);
}

/**
 * Checks if a role has all the required permissions.
 * @returns true if all permissions are present.
 */
export const checkPermissions = (role: Role, requiredPermissions: Permission[]): boolean => {
  const granted = ROLE_PERMISSIONS[role];
  // Every required permission must be included in the role's granted permissions
  return requiredPermissions.every(perm => granted.includes(perm));
};
