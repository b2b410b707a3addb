import type { ErrorCode } from "./errors";
import type { InvoiceStatus, PaymentMethod, PaymentStatus, TransactionType } from "./schemas/payments";

export type ApiSuccess<T> = {
  ok: true;
  data: T;
  requestId?: string;
};

export type ApiError = {
  ok: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    hint?: string;
  };
  requestId?: string;
};

export type ApiEnvelope<T> = ApiSuccess<T> | ApiError;

/** Monetary values travel as fixed-point strings with two decimals, e.g. "1500.00". */
export type MoneyString = string;

export type PaymentDto = {
  id: string;
  tenantId: string;
  invoiceId: string | null;
  amount: MoneyString;
  method: PaymentMethod;
  referenceNumber: string;
  status: PaymentStatus;
  paymentDate: string;
  notes: string | null;
  processedById: string | null;
  createdAt: string;
};

export type ReceiptDto = {
  id: string;
  receiptNumber: string;
  paymentId: string;
  transactionId: string;
  tenantId: string;
  invoiceId: string | null;
  amount: MoneyString;
  amountAllocatedToInvoice: MoneyString;
  amountToAccount: MoneyString;
  paymentDate: string;
  method: PaymentMethod;
  notes: string | null;
  issuedById: string | null;
  createdAt: string;
};

export type InvoiceLineDto = {
  description: string;
  amount: MoneyString;
};

export type InvoiceDto = {
  id: string;
  invoiceNumber: string;
  tenantId: string;
  billingPeriodId: string | null;
  issueDate: string;
  dueDate: string;
  lines: InvoiceLineDto[];
  totalAmount: MoneyString;
  amountPaid: MoneyString;
  balanceDue: MoneyString;
  status: InvoiceStatus;
};

export type LedgerTransactionDto = {
  id: string;
  accountId: string;
  type: TransactionType;
  amount: MoneyString;
  method: PaymentMethod | null;
  invoiceId: string | null;
  referenceNumber: string | null;
  description: string;
  actorId: string | null;
  createdAt: string;
};

export type PaymentSubmissionDto = {
  payment: PaymentDto;
  receipt: ReceiptDto;
  invoice: InvoiceDto | null;
};

export type InvoicePaymentHistoryDto = {
  invoice: InvoiceDto;
  payments: PaymentDto[];
  receipts: ReceiptDto[];
};

export type AccountBalanceDto = {
  tenantId: string;
  accountId: string;
  balance: MoneyString;
  creditLimit: MoneyString;
  debtAmount: MoneyString;
  availableCredit: MoneyString;
  isInDebt: boolean;
  transactions: LedgerTransactionDto[];
};
