import { Inject, Injectable } from "@nestjs/common";
import type Decimal from "decimal.js";
import type { CallerIdentity } from "@rentledger/shared";
import { fitsMoneyColumn, hasMoneyPrecision, parseMoney, toString2, zero } from "../../common/money";
import { periodKeyFor } from "../../common/numbering";
import { createLogger } from "../../logging/logger";
import { AccountLedgerService } from "./account-ledger.service";
import { assertCanAccessTenant, assertTenantSelfAccess } from "./access-guard";
import { BillingClock, toIsoDate } from "./billing.clock";
import {
  amountOutOfRange,
  amountRequired,
  duplicateReference,
  invalidAmount,
  invoiceNotPayable,
  invoiceTenantMismatch,
  notFound,
  ReferenceCollisionError,
  retryableFailure,
  TransientBillingError,
} from "./billing.errors";
import { BILLING_OPTIONS, type BillingOptions } from "./billing.options";
import { BILLING_STORE, type BillingReader, type BillingStore, type BillingUnitOfWork } from "./billing.store";
import type {
  AccountSummary,
  InvoicePaymentHistory,
  InvoiceRecord,
  LedgerTransactionRecord,
  PaymentIntent,
  PaymentRecord,
  PaymentSubmissionResult,
  ReceiptRecord,
  TenantRecord,
} from "./billing.types";
import { allocatePayment, balanceDue, type InvoiceAllocation } from "./invoice-ledger";
import { NumberingService } from "./numbering.service";

export type AccountBalance = AccountSummary & { transactions: LedgerTransactionRecord[] };

const logger = createLogger("payments");

@Injectable()
export class PaymentsService {
  constructor(
    @Inject(BILLING_STORE) private readonly store: BillingStore,
    @Inject(BILLING_OPTIONS) private readonly options: BillingOptions,
    private readonly accountLedger: AccountLedgerService,
    private readonly numbering: NumberingService,
    private readonly clock: BillingClock,
  ) {}

  async submitPayment(caller: CallerIdentity, intent: PaymentIntent): Promise<PaymentSubmissionResult> {
    assertTenantSelfAccess(caller, intent.tenantId);

    const maxAttempts = this.options.transientRetryLimit + 1;
    for (let attempt = 1; ; attempt += 1) {
      try {
        const result = await this.store.transaction((uow) => this.recordPayment(uow, caller, intent));
        logger.info(
          {
            paymentId: result.payment.id,
            receiptNumber: result.receipt.receiptNumber,
            tenantId: result.payment.tenantId,
            invoiceId: result.payment.invoiceId,
            amount: toString2(result.payment.amount),
            attempt,
          },
          "Payment recorded",
        );
        return result;
      } catch (err) {
        if (err instanceof ReferenceCollisionError && intent.referenceNumber) {
          const existing = await this.store.findPaymentByReference(err.referenceNumber);
          throw duplicateReference(err.referenceNumber, existing?.id);
        }
        if (!(err instanceof TransientBillingError)) {
          throw err;
        }
        if (attempt >= maxAttempts) {
          logger.warn({ reason: err.reason, attempt, err }, "Payment failed after transient retries");
          throw retryableFailure(err.reason);
        }
        logger.warn({ reason: err.reason, attempt, err }, "Retrying payment after transient failure");
      }
    }
  }

  async getPayment(caller: CallerIdentity, paymentId: string): Promise<PaymentRecord> {
    const payment = await this.store.findPayment(paymentId);
    if (!payment) {
      throw notFound("Payment", paymentId);
    }
    await this.requireTenantAccess(this.store, caller, payment.tenantId);
    return payment;
  }

  async getReceipt(caller: CallerIdentity, receiptId: string): Promise<ReceiptRecord> {
    const receipt = await this.store.findReceipt(receiptId);
    if (!receipt) {
      throw notFound("Receipt", receiptId);
    }
    await this.requireTenantAccess(this.store, caller, receipt.tenantId);
    return receipt;
  }

  async getInvoicePaymentHistory(caller: CallerIdentity, invoiceId: string): Promise<InvoicePaymentHistory> {
    const invoice = await this.store.findInvoice(invoiceId);
    if (!invoice) {
      throw notFound("Invoice", invoiceId);
    }
    await this.requireTenantAccess(this.store, caller, invoice.tenantId);
    const { payments, receipts } = await this.store.listInvoicePayments(invoice.id);
    return { invoice, payments, receipts };
  }

  async getAccountBalance(caller: CallerIdentity, tenantId: string): Promise<AccountBalance> {
    assertTenantSelfAccess(caller, tenantId);
    await this.requireTenantAccess(this.store, caller, tenantId);
    const account = await this.store.findAccountByTenant(tenantId);
    if (!account) {
      throw notFound("Account", tenantId);
    }
    const transactions = await this.store.listAccountTransactions(account.id);
    return { ...this.accountLedger.summarize(account), transactions };
  }

  private async recordPayment(
    uow: BillingUnitOfWork,
    caller: CallerIdentity,
    intent: PaymentIntent,
  ): Promise<PaymentSubmissionResult> {
    const now = this.clock.now();

    await this.requireTenantAccess(uow, caller, intent.tenantId);
    const account = await uow.lockAccountByTenant(intent.tenantId);
    if (!account) {
      throw notFound("Account", intent.tenantId);
    }

    const invoice = intent.invoiceId ? await this.lockTenantInvoice(uow, intent.invoiceId, intent.tenantId) : null;
    const amount = this.resolveAmount(intent, invoice);
    const allocation = invoice ? allocatePayment(invoice, amount, now) : null;
    const referenceNumber = await this.resolveReference(uow, intent, now);

    const payment = await uow.insertPayment({
      tenantId: intent.tenantId,
      invoiceId: invoice?.id ?? null,
      amount,
      method: intent.method,
      referenceNumber,
      status: "completed",
      paymentDate: toIsoDate(now),
      notes: intent.notes ?? null,
      processedById: caller.userId,
    });

    const { transaction } = await this.accountLedger.credit(uow, account, amount, {
      description: invoice ? `Payment for invoice ${invoice.invoiceNumber}` : "Account credit payment",
      actorId: caller.userId,
      method: intent.method,
      invoiceId: invoice?.id ?? null,
      referenceNumber,
    });

    const updatedInvoice = invoice && allocation ? await this.applyAllocation(uow, invoice, allocation) : null;
    const allocated = allocation?.allocated ?? zero();

    const receipt = await uow.insertReceipt({
      receiptNumber: await this.numbering.nextSequentialNumber(uow, "receipt", periodKeyFor(now)),
      transactionId: transaction.id,
      paymentId: payment.id,
      tenantId: intent.tenantId,
      invoiceId: invoice?.id ?? null,
      amount,
      amountAllocatedToInvoice: allocated,
      amountToAccount: amount.sub(allocated),
      paymentDate: payment.paymentDate,
      method: intent.method,
      notes: intent.notes ?? null,
      issuedById: caller.userId,
    });

    return { payment, receipt, invoice: updatedInvoice };
  }

  private async lockTenantInvoice(uow: BillingUnitOfWork, invoiceId: string, tenantId: string) {
    const invoice = await uow.lockInvoice(invoiceId);
    if (!invoice) {
      throw notFound("Invoice", invoiceId);
    }
    if (invoice.tenantId !== tenantId) {
      throw invoiceTenantMismatch(invoiceId, tenantId);
    }
    if (invoice.isCancelled) {
      throw invoiceNotPayable(invoiceId);
    }
    return invoice;
  }

  private resolveAmount(intent: PaymentIntent, invoice: InvoiceRecord | null): Decimal {
    let amount: Decimal | null = null;
    const defaulted = intent.amount === undefined;
    if (!defaulted) {
      amount = parseMoney(intent.amount);
      if (!amount) {
        throw invalidAmount("Amount must be a decimal number");
      }
    } else if (invoice) {
      amount = balanceDue(invoice);
    }

    if (!amount) {
      throw amountRequired();
    }
    if (!amount.greaterThan(0)) {
      throw invalidAmount(
        defaulted ? "Invoice has no balance due" : "Amount must be greater than zero",
        defaulted ? { balanceDue: toString2(amount) } : undefined,
      );
    }
    if (!hasMoneyPrecision(amount)) {
      throw invalidAmount("Amount must have at most two decimal places");
    }
    if (!fitsMoneyColumn(amount)) {
      throw amountOutOfRange();
    }
    return amount;
  }

  private async resolveReference(uow: BillingUnitOfWork, intent: PaymentIntent, now: Date) {
    if (!intent.referenceNumber) {
      return this.numbering.generateReferenceNumber(now);
    }
    const existing = await uow.findPaymentByReference(intent.referenceNumber);
    if (existing) {
      throw duplicateReference(intent.referenceNumber, existing.id);
    }
    return intent.referenceNumber;
  }

  private applyAllocation(uow: BillingUnitOfWork, invoice: InvoiceRecord, allocation: InvoiceAllocation) {
    return uow.updateInvoicePayment(invoice.id, {
      amountPaid: allocation.amountPaid,
      status: allocation.status,
    });
  }

  private async requireTenantAccess(reader: BillingReader, caller: CallerIdentity, tenantId: string): Promise<TenantRecord> {
    const tenant = await reader.findTenant(tenantId);
    if (!tenant) {
      throw notFound("Tenant", tenantId);
    }
    assertCanAccessTenant(caller, tenant);
    return tenant;
  }
}
