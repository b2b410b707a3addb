import { z } from "zod";

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const decimalRegex = /^-?\d+(\.\d+)?$/;

const decimalStringSchema = z.string().trim().regex(decimalRegex, "Must be a valid decimal number");
const decimalNumberSchema = z.number().finite();
const decimalSchema = z.union([decimalNumberSchema, decimalStringSchema]);

/**
 * Any decimal amount. Sign and precision are left to the ledger so that it can
 * answer with its own error codes.
 */
export const amountSchema = decimalSchema;
export const optionalAmountSchema = z.preprocess(emptyToUndefined, amountSchema.optional());

export type AmountInput = z.infer<typeof amountSchema>;
