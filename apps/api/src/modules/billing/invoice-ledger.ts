import type Decimal from "decimal.js";
import type { InvoiceStatus } from "@rentledger/shared";
import { add, dec, eq, gt, round2, sub, sum, type MoneyValue } from "../../common/money";
import { amountExceedsBalance, invalidAmount, invoiceNotPayable } from "./billing.errors";
import { toIsoDate } from "./billing.clock";
import type { InvoiceLineRecord, InvoiceRecord } from "./billing.types";

type StatusInputs = Pick<InvoiceRecord, "amountPaid" | "totalAmount" | "dueDate" | "isCancelled">;

export type InvoiceAllocation = {
  amountPaid: Decimal;
  status: InvoiceStatus;
  allocated: Decimal;
};

export function totalOf(lines: Pick<InvoiceLineRecord, "amount">[]) {
  return round2(sum(lines.map((line) => line.amount)));
}

export function balanceDue(invoice: Pick<InvoiceRecord, "totalAmount" | "amountPaid">) {
  return round2(sub(invoice.totalAmount, invoice.amountPaid));
}

/**
 * Status as of `asOf`. An invoice is overdue only while nothing has been paid
 * and the due date has passed; a zero-total invoice is always paid.
 */
export function resolveInvoiceStatus(invoice: StatusInputs, asOf: Date): InvoiceStatus {
  if (invoice.isCancelled) {
    return "cancelled";
  }
  if (eq(invoice.amountPaid, invoice.totalAmount)) {
    return "paid";
  }
  if (gt(invoice.amountPaid, 0)) {
    return "partial";
  }
  return toIsoDate(asOf) > invoice.dueDate ? "overdue" : "pending";
}

export function allocatePayment(invoice: InvoiceRecord, amount: MoneyValue, asOf: Date): InvoiceAllocation {
  const allocated = dec(amount);
  if (!gt(allocated, 0)) {
    throw invalidAmount("Amount must be greater than zero");
  }
  if (invoice.isCancelled) {
    throw invoiceNotPayable(invoice.id);
  }
  const due = balanceDue(invoice);
  if (gt(allocated, due)) {
    throw amountExceedsBalance(allocated, due);
  }

  const amountPaid = add(invoice.amountPaid, allocated);
  return {
    amountPaid,
    status: resolveInvoiceStatus({ ...invoice, amountPaid }, asOf),
    allocated,
  };
}
