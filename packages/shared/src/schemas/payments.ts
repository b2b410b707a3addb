import { z } from "zod";
import { optionalAmountSchema } from "./money";

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

export const PAYMENT_METHODS = ["cash", "bank_transfer", "card", "mobile_money", "check", "other"] as const;
export const PAYMENT_STATUSES = ["pending", "completed", "failed", "refunded"] as const;
export const INVOICE_STATUSES = ["pending", "partial", "paid", "overdue", "cancelled"] as const;
export const TRANSACTION_TYPES = ["payment", "refund", "adjustment"] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

const requiredUuid = z.string().uuid();
const optionalUuid = z.preprocess(emptyToUndefined, z.string().uuid().optional());

export const paymentMethodSchema = z.enum(PAYMENT_METHODS);

export const paymentSubmitSchema = z.object({
  tenantId: requiredUuid,
  invoiceId: optionalUuid,
  amount: optionalAmountSchema,
  method: paymentMethodSchema,
  referenceNumber: z.preprocess(emptyToUndefined, z.string().trim().max(100).optional()),
  notes: z.preprocess(emptyToUndefined, z.string().max(2000).optional()),
});

export const entityIdParamSchema = requiredUuid;

export type PaymentSubmitInput = z.infer<typeof paymentSubmitSchema>;
