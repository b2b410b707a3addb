import type Decimal from "decimal.js";
import type { SequentialNumberingKind } from "../../common/numbering";
import type {
  AccountRecord,
  InvoicePaymentUpdate,
  InvoiceRecord,
  LedgerTransactionRecord,
  NewLedgerTransaction,
  NewPayment,
  NewReceipt,
  PaymentRecord,
  ReceiptRecord,
  TenantRecord,
} from "./billing.types";

export const BILLING_STORE = Symbol("BILLING_STORE");

export interface BillingReader {
  findTenant(tenantId: string): Promise<TenantRecord | null>;
  findAccountByTenant(tenantId: string): Promise<AccountRecord | null>;
  findInvoice(invoiceId: string): Promise<InvoiceRecord | null>;
  findPayment(paymentId: string): Promise<PaymentRecord | null>;
  findPaymentByReference(referenceNumber: string): Promise<PaymentRecord | null>;
  findReceipt(receiptId: string): Promise<ReceiptRecord | null>;
  listInvoicePayments(invoiceId: string): Promise<{ payments: PaymentRecord[]; receipts: ReceiptRecord[] }>;
  listAccountTransactions(accountId: string): Promise<LedgerTransactionRecord[]>;
}

/**
 * Writes available inside one store transaction. Nothing written through a
 * unit of work is visible to other callers until the transaction commits, and
 * all of it is discarded when the work throws.
 */
export interface BillingUnitOfWork extends BillingReader {
  /** Reads the account row and holds it until commit. */
  lockAccountByTenant(tenantId: string): Promise<AccountRecord | null>;
  /** Reads the invoice row and holds it until commit. */
  lockInvoice(invoiceId: string): Promise<InvoiceRecord | null>;
  insertPayment(payment: NewPayment): Promise<PaymentRecord>;
  appendTransaction(entry: NewLedgerTransaction): Promise<LedgerTransactionRecord>;
  adjustAccountBalance(accountId: string, delta: Decimal): Promise<AccountRecord>;
  updateInvoicePayment(invoiceId: string, update: InvoicePaymentUpdate): Promise<InvoiceRecord>;
  insertReceipt(receipt: NewReceipt): Promise<ReceiptRecord>;
  /** Atomically increments the `(kind, periodKey)` counter and returns the new value. */
  nextSequence(kind: SequentialNumberingKind, periodKey: string): Promise<number>;
}

export interface BillingStore extends BillingReader {
  transaction<T>(work: (uow: BillingUnitOfWork) => Promise<T>): Promise<T>;
}
