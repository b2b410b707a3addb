import { z } from "zod";
import { CALLER_ROLES, type CallerIdentity } from "@rentledger/shared";

/** Claims issued by the surrounding access layer; this service only verifies them. */
export const authTokenPayloadSchema = z.object({
  sub: z.string().min(1).max(100),
  role: z.enum(CALLER_ROLES),
  tenantId: z.string().uuid().optional(),
  managedPropertyIds: z.array(z.string().uuid()).optional(),
});

export type AuthTokenPayload = z.infer<typeof authTokenPayloadSchema>;

export const toCallerIdentity = (payload: AuthTokenPayload): CallerIdentity => ({
  userId: payload.sub,
  role: payload.role,
  tenantId: payload.tenantId,
  managedPropertyIds: payload.managedPropertyIds,
});
