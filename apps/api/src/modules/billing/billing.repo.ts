import { Injectable } from "@nestjs/common";
import { and, asc, desc, eq, sql } from "drizzle-orm";
import Decimal from "decimal.js";
import { DatabaseService, type DbClient } from "../../db/database.service";
import {
  accounts,
  invoiceLines,
  invoices,
  ledgerTransactions,
  numberingCounters,
  PAYMENT_REFERENCE_KEY,
  payments,
  RECEIPT_NUMBER_KEY,
  receipts,
  tenants,
  type AccountRow,
  type InvoiceLineRow,
  type InvoiceRow,
  type LedgerTransactionRow,
  type PaymentRow,
  type ReceiptRow,
  type TenantRow,
} from "../../db/schema";
import type { SequentialNumberingKind } from "../../common/numbering";
import {
  amountOutOfRange,
  notFound,
  NumberingConflictError,
  PersistenceConflictError,
  ReferenceCollisionError,
} from "./billing.errors";
import type { BillingReader, BillingStore, BillingUnitOfWork } from "./billing.store";
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

const RETRYABLE_SQL_STATES = new Set(["40001", "40P01", "55P03"]);
const UNIQUE_VIOLATION = "23505";
const NUMERIC_VALUE_OUT_OF_RANGE = "22003";

type PgErrorShape = { code: string; constraint?: string };

/** node-postgres errors may arrive wrapped by the query builder; look one level down too. */
export function pgErrorOf(err: unknown): PgErrorShape | null {
  let current: unknown = err;
  for (let depth = 0; depth < 3; depth += 1) {
    if (typeof current !== "object" || current === null) {
      return null;
    }
    if ("code" in current && typeof current.code === "string") {
      const constraint = "constraint" in current && typeof current.constraint === "string" ? current.constraint : undefined;
      return { code: current.code, constraint };
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return null;
}

const isUniqueViolation = (err: unknown, constraint: string) => {
  const pgError = pgErrorOf(err);
  return pgError?.code === UNIQUE_VIOLATION && pgError.constraint === constraint;
};

const toTenant = (row: TenantRow): TenantRecord => ({
  id: row.id,
  propertyId: row.propertyId,
  displayName: row.displayName,
});

const toAccount = (row: AccountRow): AccountRecord => ({
  id: row.id,
  tenantId: row.tenantId,
  balance: new Decimal(row.balance),
  creditLimit: new Decimal(row.creditLimit),
  updatedAt: row.updatedAt,
});

const toInvoice = (row: InvoiceRow, lines: InvoiceLineRow[]): InvoiceRecord => ({
  id: row.id,
  invoiceNumber: row.invoiceNumber,
  tenantId: row.tenantId,
  billingPeriodId: row.billingPeriodId,
  issueDate: row.issueDate,
  dueDate: row.dueDate,
  lines: lines.map((line) => ({
    position: line.position,
    description: line.description,
    amount: new Decimal(line.amount),
  })),
  totalAmount: new Decimal(row.totalAmount),
  amountPaid: new Decimal(row.amountPaid),
  status: row.status,
  isCancelled: row.isCancelled,
});

const toPayment = (row: PaymentRow): PaymentRecord => ({
  id: row.id,
  tenantId: row.tenantId,
  invoiceId: row.invoiceId,
  amount: new Decimal(row.amount),
  method: row.method,
  referenceNumber: row.referenceNumber,
  status: row.status,
  paymentDate: row.paymentDate,
  notes: row.notes,
  processedById: row.processedById,
  createdAt: row.createdAt,
});

const toLedgerTransaction = (row: LedgerTransactionRow): LedgerTransactionRecord => ({
  id: row.id,
  accountId: row.accountId,
  type: row.type,
  amount: new Decimal(row.amount),
  method: row.method,
  invoiceId: row.invoiceId,
  referenceNumber: row.referenceNumber,
  description: row.description,
  actorId: row.actorId,
  createdAt: row.createdAt,
});

const toReceipt = (row: ReceiptRow): ReceiptRecord => ({
  id: row.id,
  receiptNumber: row.receiptNumber,
  transactionId: row.transactionId,
  paymentId: row.paymentId,
  tenantId: row.tenantId,
  invoiceId: row.invoiceId,
  amount: new Decimal(row.amount),
  amountAllocatedToInvoice: new Decimal(row.amountAllocatedToInvoice),
  amountToAccount: new Decimal(row.amountToAccount),
  paymentDate: row.paymentDate,
  method: row.method,
  notes: row.notes,
  issuedById: row.issuedById,
  createdAt: row.createdAt,
});

class DrizzleBillingReader implements BillingReader {
  constructor(protected readonly client: DbClient) {}

  async findTenant(tenantId: string) {
    const [row] = await this.client.select().from(tenants).where(eq(tenants.id, tenantId)).limit(1);
    return row ? toTenant(row) : null;
  }

  async findAccountByTenant(tenantId: string) {
    const [row] = await this.client.select().from(accounts).where(eq(accounts.tenantId, tenantId)).limit(1);
    return row ? toAccount(row) : null;
  }

  async findInvoice(invoiceId: string) {
    const [row] = await this.client.select().from(invoices).where(eq(invoices.id, invoiceId)).limit(1);
    return row ? toInvoice(row, await this.loadLines(row.id)) : null;
  }

  async findPayment(paymentId: string) {
    const [row] = await this.client.select().from(payments).where(eq(payments.id, paymentId)).limit(1);
    return row ? toPayment(row) : null;
  }

  async findPaymentByReference(referenceNumber: string) {
    const [row] = await this.client
      .select()
      .from(payments)
      .where(eq(payments.referenceNumber, referenceNumber))
      .limit(1);
    return row ? toPayment(row) : null;
  }

  async findReceipt(receiptId: string) {
    const [row] = await this.client.select().from(receipts).where(eq(receipts.id, receiptId)).limit(1);
    return row ? toReceipt(row) : null;
  }

  async listInvoicePayments(invoiceId: string) {
    const [paymentRows, receiptRows] = await Promise.all([
      this.client
        .select()
        .from(payments)
        .where(eq(payments.invoiceId, invoiceId))
        .orderBy(desc(payments.paymentDate), desc(payments.createdAt)),
      this.client
        .select()
        .from(receipts)
        .where(eq(receipts.invoiceId, invoiceId))
        .orderBy(desc(receipts.paymentDate), desc(receipts.createdAt)),
    ]);
    return { payments: paymentRows.map(toPayment), receipts: receiptRows.map(toReceipt) };
  }

  async listAccountTransactions(accountId: string) {
    const rows = await this.client
      .select()
      .from(ledgerTransactions)
      .where(eq(ledgerTransactions.accountId, accountId))
      .orderBy(asc(ledgerTransactions.createdAt));
    return rows.map(toLedgerTransaction);
  }

  protected loadLines(invoiceId: string) {
    return this.client
      .select()
      .from(invoiceLines)
      .where(eq(invoiceLines.invoiceId, invoiceId))
      .orderBy(asc(invoiceLines.position));
  }
}

class DrizzleBillingUnitOfWork extends DrizzleBillingReader implements BillingUnitOfWork {
  async lockAccountByTenant(tenantId: string) {
    const [row] = await this.client
      .select()
      .from(accounts)
      .where(eq(accounts.tenantId, tenantId))
      .limit(1)
      .for("update");
    return row ? toAccount(row) : null;
  }

  async lockInvoice(invoiceId: string) {
    const [row] = await this.client.select().from(invoices).where(eq(invoices.id, invoiceId)).limit(1).for("update");
    return row ? toInvoice(row, await this.loadLines(row.id)) : null;
  }

  async insertPayment(payment: NewPayment) {
    try {
      const [row] = await this.client
        .insert(payments)
        .values({ ...payment, amount: payment.amount.toFixed(2) })
        .returning();
      return toPayment(row);
    } catch (err) {
      if (isUniqueViolation(err, PAYMENT_REFERENCE_KEY)) {
        throw new ReferenceCollisionError(payment.referenceNumber);
      }
      throw err;
    }
  }

  async appendTransaction(entry: NewLedgerTransaction) {
    const [row] = await this.client
      .insert(ledgerTransactions)
      .values({ ...entry, amount: entry.amount.toFixed(2) })
      .returning();
    return toLedgerTransaction(row);
  }

  async adjustAccountBalance(accountId: string, delta: Decimal) {
    const [row] = await this.client
      .update(accounts)
      .set({
        balance: sql`${accounts.balance} + ${delta.toFixed(2)}::numeric`,
        updatedAt: new Date(),
      })
      .where(eq(accounts.id, accountId))
      .returning();
    if (!row) {
      throw notFound("Account", accountId);
    }
    return toAccount(row);
  }

  async updateInvoicePayment(invoiceId: string, update: InvoicePaymentUpdate) {
    const [row] = await this.client
      .update(invoices)
      .set({
        amountPaid: update.amountPaid.toFixed(2),
        status: update.status,
        updatedAt: new Date(),
      })
      .where(and(eq(invoices.id, invoiceId), eq(invoices.isCancelled, false)))
      .returning();
    if (!row) {
      throw notFound("Invoice", invoiceId);
    }
    return toInvoice(row, await this.loadLines(row.id));
  }

  async insertReceipt(receipt: NewReceipt) {
    try {
      const [row] = await this.client
        .insert(receipts)
        .values({
          ...receipt,
          amount: receipt.amount.toFixed(2),
          amountAllocatedToInvoice: receipt.amountAllocatedToInvoice.toFixed(2),
          amountToAccount: receipt.amountToAccount.toFixed(2),
        })
        .returning();
      return toReceipt(row);
    } catch (err) {
      if (isUniqueViolation(err, RECEIPT_NUMBER_KEY)) {
        throw new NumberingConflictError(receipt.receiptNumber);
      }
      throw err;
    }
  }

  async nextSequence(kind: SequentialNumberingKind, periodKey: string) {
    const [row] = await this.client
      .insert(numberingCounters)
      .values({ kind, periodKey, lastValue: 1 })
      .onConflictDoUpdate({
        target: [numberingCounters.kind, numberingCounters.periodKey],
        set: { lastValue: sql`${numberingCounters.lastValue} + 1`, updatedAt: new Date() },
      })
      .returning({ value: numberingCounters.lastValue });
    if (!row) {
      throw new NumberingConflictError();
    }
    return row.value;
  }
}

@Injectable()
export class DrizzleBillingStore extends DrizzleBillingReader implements BillingStore {
  constructor(private readonly database: DatabaseService) {
    super(database.db);
  }

  async transaction<T>(work: (uow: BillingUnitOfWork) => Promise<T>): Promise<T> {
    try {
      return await this.database.db.transaction((tx) => work(new DrizzleBillingUnitOfWork(tx)), {
        isolationLevel: "read committed",
      });
    } catch (err) {
      const pgError = pgErrorOf(err);
      if (pgError && RETRYABLE_SQL_STATES.has(pgError.code)) {
        throw new PersistenceConflictError(pgError.code);
      }
      if (pgError?.code === NUMERIC_VALUE_OUT_OF_RANGE) {
        throw amountOutOfRange();
      }
      throw err;
    }
  }
}
