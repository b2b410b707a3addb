import type {
  AccountBalanceDto,
  InvoiceDto,
  InvoicePaymentHistoryDto,
  LedgerTransactionDto,
  PaymentDto,
  PaymentSubmissionDto,
  ReceiptDto,
} from "@rentledger/shared";
import { toString2 } from "../../common/money";
import type {
  InvoicePaymentHistory,
  InvoiceRecord,
  LedgerTransactionRecord,
  PaymentRecord,
  PaymentSubmissionResult,
  ReceiptRecord,
} from "./billing.types";
import { balanceDue, resolveInvoiceStatus } from "./invoice-ledger";
import type { AccountBalance } from "./payments.service";

export const serializePayment = (payment: PaymentRecord): PaymentDto => ({
  id: payment.id,
  tenantId: payment.tenantId,
  invoiceId: payment.invoiceId,
  amount: toString2(payment.amount),
  method: payment.method,
  referenceNumber: payment.referenceNumber,
  status: payment.status,
  paymentDate: payment.paymentDate,
  notes: payment.notes,
  processedById: payment.processedById,
  createdAt: payment.createdAt.toISOString(),
});

export const serializeReceipt = (receipt: ReceiptRecord): ReceiptDto => ({
  id: receipt.id,
  receiptNumber: receipt.receiptNumber,
  paymentId: receipt.paymentId,
  transactionId: receipt.transactionId,
  tenantId: receipt.tenantId,
  invoiceId: receipt.invoiceId,
  amount: toString2(receipt.amount),
  amountAllocatedToInvoice: toString2(receipt.amountAllocatedToInvoice),
  amountToAccount: toString2(receipt.amountToAccount),
  paymentDate: receipt.paymentDate,
  method: receipt.method,
  notes: receipt.notes,
  issuedById: receipt.issuedById,
  createdAt: receipt.createdAt.toISOString(),
});

/** Status is re-evaluated at `asOf` so an unpaid invoice reads as overdue once its due date passes. */
export const serializeInvoice = (invoice: InvoiceRecord, asOf: Date): InvoiceDto => ({
  id: invoice.id,
  invoiceNumber: invoice.invoiceNumber,
  tenantId: invoice.tenantId,
  billingPeriodId: invoice.billingPeriodId,
  issueDate: invoice.issueDate,
  dueDate: invoice.dueDate,
  lines: invoice.lines.map((line) => ({ description: line.description, amount: toString2(line.amount) })),
  totalAmount: toString2(invoice.totalAmount),
  amountPaid: toString2(invoice.amountPaid),
  balanceDue: toString2(balanceDue(invoice)),
  status: resolveInvoiceStatus(invoice, asOf),
});

export const serializeTransaction = (transaction: LedgerTransactionRecord): LedgerTransactionDto => ({
  id: transaction.id,
  accountId: transaction.accountId,
  type: transaction.type,
  amount: toString2(transaction.amount),
  method: transaction.method,
  invoiceId: transaction.invoiceId,
  referenceNumber: transaction.referenceNumber,
  description: transaction.description,
  actorId: transaction.actorId,
  createdAt: transaction.createdAt.toISOString(),
});

export const serializeSubmission = (result: PaymentSubmissionResult, asOf: Date): PaymentSubmissionDto => ({
  payment: serializePayment(result.payment),
  receipt: serializeReceipt(result.receipt),
  invoice: result.invoice ? serializeInvoice(result.invoice, asOf) : null,
});

export const serializeInvoiceHistory = (history: InvoicePaymentHistory, asOf: Date): InvoicePaymentHistoryDto => ({
  invoice: serializeInvoice(history.invoice, asOf),
  payments: history.payments.map(serializePayment),
  receipts: history.receipts.map(serializeReceipt),
});

export const serializeAccountBalance = (balance: AccountBalance): AccountBalanceDto => ({
  tenantId: balance.tenantId,
  accountId: balance.accountId,
  balance: toString2(balance.balance),
  creditLimit: toString2(balance.creditLimit),
  debtAmount: toString2(balance.debtAmount),
  availableCredit: toString2(balance.availableCredit),
  isInDebt: balance.isInDebt,
  transactions: balance.transactions.map(serializeTransaction),
});
