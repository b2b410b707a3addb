import { z } from "zod";

export const accountBalanceParamsSchema = z.object({
  tenantId: z.string().uuid(),
});

export type AccountBalanceParams = z.infer<typeof accountBalanceParamsSchema>;
