import type { CallerIdentity } from "@rentledger/shared";
import { forbiddenTenantAccess } from "./billing.errors";
import type { TenantRecord } from "./billing.types";

/**
 * Tenants may only act for themselves. This is checked before anything is
 * read so that a tenant cannot probe for other tenants' ids.
 */
export const assertTenantSelfAccess = (caller: CallerIdentity, tenantId: string) => {
  if (caller.role === "tenant" && caller.tenantId !== tenantId) {
    throw forbiddenTenantAccess("You can only make payments for yourself");
  }
};

export const canAccessTenant = (caller: CallerIdentity, tenant: Pick<TenantRecord, "id" | "propertyId">) => {
  switch (caller.role) {
    case "admin":
      return true;
    case "manager":
      return caller.managedPropertyIds?.includes(tenant.propertyId) ?? false;
    case "tenant":
      return caller.tenantId === tenant.id;
  }
};

export const assertCanAccessTenant = (caller: CallerIdentity, tenant: Pick<TenantRecord, "id" | "propertyId">) => {
  if (!canAccessTenant(caller, tenant)) {
    throw forbiddenTenantAccess(
      caller.role === "manager" ? "Tenant is not in a property you manage" : "You do not have access to this tenant",
    );
  }
};
