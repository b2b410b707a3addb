import type Decimal from "decimal.js";
import type {
  InvoiceStatus,
  PaymentMethod,
  PaymentStatus,
  TransactionType,
} from "@rentledger/shared";
import type { MoneyValue } from "../../common/money";

export type TenantRecord = {
  id: string;
  propertyId: string;
  displayName: string;
};

export type AccountRecord = {
  id: string;
  tenantId: string;
  balance: Decimal;
  creditLimit: Decimal;
  updatedAt: Date;
};

export type InvoiceLineRecord = {
  position: number;
  description: string;
  amount: Decimal;
};

export type InvoiceRecord = {
  id: string;
  invoiceNumber: string;
  tenantId: string;
  billingPeriodId: string | null;
  issueDate: string;
  dueDate: string;
  lines: InvoiceLineRecord[];
  totalAmount: Decimal;
  amountPaid: Decimal;
  status: InvoiceStatus;
  isCancelled: boolean;
};

export type PaymentRecord = {
  id: string;
  tenantId: string;
  invoiceId: string | null;
  amount: Decimal;
  method: PaymentMethod;
  referenceNumber: string;
  status: PaymentStatus;
  paymentDate: string;
  notes: string | null;
  processedById: string | null;
  createdAt: Date;
};

export type LedgerTransactionRecord = {
  id: string;
  accountId: string;
  type: TransactionType;
  amount: Decimal;
  method: PaymentMethod | null;
  invoiceId: string | null;
  referenceNumber: string | null;
  description: string;
  actorId: string | null;
  createdAt: Date;
};

export type ReceiptRecord = {
  id: string;
  receiptNumber: string;
  transactionId: string;
  paymentId: string;
  tenantId: string;
  invoiceId: string | null;
  amount: Decimal;
  amountAllocatedToInvoice: Decimal;
  amountToAccount: Decimal;
  paymentDate: string;
  method: PaymentMethod;
  notes: string | null;
  issuedById: string | null;
  createdAt: Date;
};

export type NewPayment = Omit<PaymentRecord, "id" | "createdAt">;
export type NewLedgerTransaction = Omit<LedgerTransactionRecord, "id" | "createdAt">;
export type NewReceipt = Omit<ReceiptRecord, "id" | "createdAt">;

export type InvoicePaymentUpdate = {
  amountPaid: Decimal;
  status: InvoiceStatus;
};

export type PaymentIntent = {
  tenantId: string;
  invoiceId?: string;
  amount?: MoneyValue;
  method: PaymentMethod;
  referenceNumber?: string;
  notes?: string;
};

export type PaymentSubmissionResult = {
  payment: PaymentRecord;
  receipt: ReceiptRecord;
  invoice: InvoiceRecord | null;
};

export type InvoicePaymentHistory = {
  invoice: InvoiceRecord;
  payments: PaymentRecord[];
  receipts: ReceiptRecord[];
};

export type AccountSummary = {
  tenantId: string;
  accountId: string;
  balance: Decimal;
  creditLimit: Decimal;
  debtAmount: Decimal;
  availableCredit: Decimal;
  isInDebt: boolean;
};
