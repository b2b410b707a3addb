import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  ServiceUnavailableException,
} from "@nestjs/common";
import { ErrorCodes } from "@rentledger/shared";
import type { MoneyValue } from "../../common/money";
import { MONEY_COLUMN_LIMIT, toString2 } from "../../common/money";

export const forbiddenTenantAccess = (message = "You can only act on your own tenant account") =>
  new ForbiddenException({
    code: ErrorCodes.FORBIDDEN,
    message,
    hint: "Use the tenant id of the signed-in tenant.",
  });

export const notFound = (entity: "Tenant" | "Account" | "Invoice" | "Payment" | "Receipt", id: string) =>
  new NotFoundException({
    code: ErrorCodes.NOT_FOUND,
    message: `${entity} not found`,
    details: { id },
  });

export const invoiceTenantMismatch = (invoiceId: string, tenantId: string) =>
  new BadRequestException({
    code: ErrorCodes.INVOICE_TENANT_MISMATCH,
    message: "Invoice does not belong to this tenant",
    details: { invoiceId, tenantId },
  });

export const amountRequired = () =>
  new BadRequestException({
    code: ErrorCodes.AMOUNT_REQUIRED,
    message: "Amount is required when no invoice is specified",
    hint: "Send an amount or an invoice id.",
  });

export const invalidAmount = (message: string, details?: Record<string, string>) =>
  new BadRequestException({
    code: ErrorCodes.INVALID_AMOUNT,
    message,
    hint: "Use a positive amount with at most two decimal places.",
    details,
  });

export const amountOutOfRange = () =>
  invalidAmount("Amount is outside the range the ledger can store", { maximum: toString2(MONEY_COLUMN_LIMIT) });

export const amountExceedsBalance = (amount: MoneyValue, balanceDue: MoneyValue) =>
  new BadRequestException({
    code: ErrorCodes.AMOUNT_EXCEEDS_BALANCE,
    message: `Payment amount (${toString2(amount)}) exceeds invoice balance (${toString2(balanceDue)})`,
    hint: "Pay at most the balance due, or submit the remainder as an account credit.",
    details: { amount: toString2(amount), balanceDue: toString2(balanceDue) },
  });

export const invoiceNotPayable = (invoiceId: string) =>
  new ConflictException({
    code: ErrorCodes.INVOICE_NOT_PAYABLE,
    message: "Cancelled invoices cannot receive payments",
    details: { invoiceId },
  });

export const duplicateReference = (referenceNumber: string, paymentId?: string) =>
  new ConflictException({
    code: ErrorCodes.DUPLICATE_REFERENCE,
    message: `Reference number ${referenceNumber} has already been used`,
    hint: "This payment may already have been recorded. Fetch it before retrying.",
    details: { referenceNumber, paymentId },
  });

export const retryableFailure = (reason: string) =>
  new ServiceUnavailableException({
    code: ErrorCodes.RETRYABLE_FAILURE,
    message: "The payment could not be recorded because of concurrent activity",
    hint: "Nothing was recorded. Retry the request.",
    details: { reason },
  });

/**
 * Failures that leave nothing committed and may succeed when the whole unit
 * of work is run again.
 */
export abstract class TransientBillingError extends Error {
  abstract readonly reason: "numbering-conflict" | "persistence-conflict" | "reference-collision";
}

export class NumberingConflictError extends TransientBillingError {
  readonly reason = "numbering-conflict";

  constructor(readonly receiptNumber?: string) {
    super(receiptNumber ? `Receipt number ${receiptNumber} is already taken` : "Numbering sequence conflict");
    this.name = "NumberingConflictError";
  }
}

export class PersistenceConflictError extends TransientBillingError {
  readonly reason = "persistence-conflict";

  constructor(readonly sqlState?: string) {
    super(sqlState ? `Transaction conflict (${sqlState})` : "Transaction conflict");
    this.name = "PersistenceConflictError";
  }
}

/** A payment reference number hit the unique constraint when the row was written. */
export class ReferenceCollisionError extends TransientBillingError {
  readonly reason = "reference-collision";

  constructor(readonly referenceNumber: string) {
    super(`Reference number ${referenceNumber} collided on insert`);
    this.name = "ReferenceCollisionError";
  }
}
