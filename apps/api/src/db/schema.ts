import {
  boolean,
  date,
  index,
  integer,
  numeric,
  pgEnum,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { INVOICE_STATUSES, PAYMENT_METHODS, PAYMENT_STATUSES, TRANSACTION_TYPES } from "@rentledger/shared";

/** Unique indexes whose violations the billing store maps onto domain errors. */
export const PAYMENT_REFERENCE_KEY = "payments_reference_number_key";
export const RECEIPT_NUMBER_KEY = "receipts_receipt_number_key";

const money = (name: string) => numeric(name, { precision: 12, scale: 2 });
const createdAt = () => timestamp("created_at", { withTimezone: true }).notNull().defaultNow();

export const invoiceStatusEnum = pgEnum("invoice_status", INVOICE_STATUSES);
export const paymentMethodEnum = pgEnum("payment_method", PAYMENT_METHODS);
export const paymentStatusEnum = pgEnum("payment_status", PAYMENT_STATUSES);
export const transactionTypeEnum = pgEnum("transaction_type", TRANSACTION_TYPES);

/** Read-only mirror of the tenant directory kept by the property-management side. */
export const tenants = pgTable("tenants", {
  id: uuid("id").primaryKey().defaultRandom(),
  propertyId: uuid("property_id").notNull(),
  displayName: varchar("display_name", { length: 200 }).notNull(),
  createdAt: createdAt(),
});

export const accounts = pgTable(
  "accounts",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.id),
    balance: money("balance").notNull().default("0.00"),
    creditLimit: money("credit_limit").notNull().default("0.00"),
    createdAt: createdAt(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    tenantKey: uniqueIndex("accounts_tenant_id_key").on(table.tenantId),
  }),
);

export const invoices = pgTable(
  "invoices",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    invoiceNumber: varchar("invoice_number", { length: 50 }).notNull(),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.id),
    billingPeriodId: uuid("billing_period_id"),
    issueDate: date("issue_date", { mode: "string" }).notNull(),
    dueDate: date("due_date", { mode: "string" }).notNull(),
    totalAmount: money("total_amount").notNull().default("0.00"),
    amountPaid: money("amount_paid").notNull().default("0.00"),
    status: invoiceStatusEnum("status").notNull().default("pending"),
    isCancelled: boolean("is_cancelled").notNull().default(false),
    createdAt: createdAt(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    numberKey: uniqueIndex("invoices_invoice_number_key").on(table.invoiceNumber),
    tenantStatusIdx: index("invoices_tenant_id_status_idx").on(table.tenantId, table.status),
    dueDateIdx: index("invoices_due_date_idx").on(table.dueDate),
  }),
);

export const invoiceLines = pgTable(
  "invoice_lines",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    invoiceId: uuid("invoice_id")
      .notNull()
      .references(() => invoices.id, { onDelete: "cascade" }),
    position: integer("position").notNull(),
    description: varchar("description", { length: 255 }).notNull(),
    amount: money("amount").notNull(),
  },
  (table) => ({
    positionKey: uniqueIndex("invoice_lines_invoice_id_position_key").on(table.invoiceId, table.position),
  }),
);

export const payments = pgTable(
  "payments",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.id),
    invoiceId: uuid("invoice_id").references(() => invoices.id),
    amount: money("amount").notNull(),
    method: paymentMethodEnum("method").notNull(),
    referenceNumber: varchar("reference_number", { length: 100 }).notNull(),
    status: paymentStatusEnum("status").notNull().default("pending"),
    paymentDate: date("payment_date", { mode: "string" }).notNull(),
    notes: text("notes"),
    processedById: varchar("processed_by_id", { length: 100 }),
    createdAt: createdAt(),
  },
  (table) => ({
    referenceKey: uniqueIndex(PAYMENT_REFERENCE_KEY).on(table.referenceNumber),
    tenantDateIdx: index("payments_tenant_id_payment_date_idx").on(table.tenantId, table.paymentDate),
    invoiceIdx: index("payments_invoice_id_idx").on(table.invoiceId),
  }),
);

export const ledgerTransactions = pgTable(
  "ledger_transactions",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    accountId: uuid("account_id")
      .notNull()
      .references(() => accounts.id),
    type: transactionTypeEnum("type").notNull(),
    amount: money("amount").notNull(),
    method: paymentMethodEnum("method"),
    invoiceId: uuid("invoice_id").references(() => invoices.id),
    referenceNumber: varchar("reference_number", { length: 100 }),
    description: text("description").notNull(),
    actorId: varchar("actor_id", { length: 100 }),
    createdAt: createdAt(),
  },
  (table) => ({
    accountCreatedIdx: index("ledger_transactions_account_id_created_at_idx").on(table.accountId, table.createdAt),
  }),
);

export const receipts = pgTable(
  "receipts",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    receiptNumber: varchar("receipt_number", { length: 50 }).notNull(),
    transactionId: uuid("transaction_id")
      .notNull()
      .references(() => ledgerTransactions.id),
    paymentId: uuid("payment_id")
      .notNull()
      .references(() => payments.id),
    tenantId: uuid("tenant_id")
      .notNull()
      .references(() => tenants.id),
    invoiceId: uuid("invoice_id").references(() => invoices.id),
    amount: money("amount").notNull(),
    amountAllocatedToInvoice: money("amount_allocated_to_invoice").notNull(),
    amountToAccount: money("amount_to_account").notNull(),
    paymentDate: date("payment_date", { mode: "string" }).notNull(),
    method: paymentMethodEnum("method").notNull(),
    notes: text("notes"),
    issuedById: varchar("issued_by_id", { length: 100 }),
    createdAt: createdAt(),
  },
  (table) => ({
    numberKey: uniqueIndex(RECEIPT_NUMBER_KEY).on(table.receiptNumber),
    transactionKey: uniqueIndex("receipts_transaction_id_key").on(table.transactionId),
    paymentKey: uniqueIndex("receipts_payment_id_key").on(table.paymentId),
    invoiceIdx: index("receipts_invoice_id_idx").on(table.invoiceId),
  }),
);

export const numberingCounters = pgTable(
  "numbering_counters",
  {
    kind: varchar("kind", { length: 20 }).notNull(),
    periodKey: varchar("period_key", { length: 20 }).notNull(),
    lastValue: integer("last_value").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.kind, table.periodKey] }),
  }),
);

export type TenantRow = typeof tenants.$inferSelect;
export type AccountRow = typeof accounts.$inferSelect;
export type InvoiceRow = typeof invoices.$inferSelect;
export type InvoiceLineRow = typeof invoiceLines.$inferSelect;
export type PaymentRow = typeof payments.$inferSelect;
export type LedgerTransactionRow = typeof ledgerTransactions.$inferSelect;
export type ReceiptRow = typeof receipts.$inferSelect;
