export const CALLER_ROLES = ["tenant", "manager", "admin"] as const;

export type CallerRole = (typeof CALLER_ROLES)[number];

/**
 * Authenticated identity handed to the billing engine by the access layer.
 * Managers carry the properties they manage; tenants carry their own tenant id.
 */
export type CallerIdentity = {
  userId: string;
  role: CallerRole;
  tenantId?: string;
  managedPropertyIds?: string[];
};
