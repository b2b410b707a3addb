import { Injectable } from "@nestjs/common";
import type Decimal from "decimal.js";
import type { PaymentMethod } from "@rentledger/shared";
import { dec, lte, max, zero, type MoneyValue } from "../../common/money";
import { invalidAmount } from "./billing.errors";
import type { BillingUnitOfWork } from "./billing.store";
import type { AccountRecord, AccountSummary, LedgerTransactionRecord } from "./billing.types";

export type LedgerEntryInput = {
  description: string;
  actorId: string | null;
  method?: PaymentMethod | null;
  invoiceId?: string | null;
  referenceNumber?: string | null;
};

export type LedgerPosting = {
  transaction: LedgerTransactionRecord;
  account: AccountRecord;
};

@Injectable()
export class AccountLedgerService {
  /** Appends a credit entry and raises the balance inside the caller's unit of work. */
  async credit(
    uow: BillingUnitOfWork,
    account: AccountRecord,
    amount: MoneyValue,
    entry: LedgerEntryInput,
    type: "payment" | "adjustment" = "payment",
  ): Promise<LedgerPosting> {
    const value = this.requirePositive(amount);
    const transaction = await uow.appendTransaction(this.buildEntry(account, type, value, entry));
    const updated = await uow.adjustAccountBalance(account.id, value);
    return { transaction, account: updated };
  }

  async debit(
    uow: BillingUnitOfWork,
    account: AccountRecord,
    amount: MoneyValue,
    entry: LedgerEntryInput,
    type: "refund" | "adjustment" = "refund",
  ): Promise<LedgerPosting> {
    const value = this.requirePositive(amount);
    const transaction = await uow.appendTransaction(this.buildEntry(account, type, value, entry));
    const updated = await uow.adjustAccountBalance(account.id, value.negated());
    return { transaction, account: updated };
  }

  summarize(account: AccountRecord): AccountSummary {
    const inDebt = account.balance.lessThan(0);
    return {
      tenantId: account.tenantId,
      accountId: account.id,
      balance: account.balance,
      creditLimit: account.creditLimit,
      debtAmount: inDebt ? account.balance.abs() : zero(),
      availableCredit: inDebt ? max(0, account.creditLimit.add(account.balance)) : account.creditLimit,
      isInDebt: inDebt,
    };
  }

  private requirePositive(amount: MoneyValue) {
    const value = dec(amount);
    if (lte(value, 0)) {
      throw invalidAmount("Ledger amounts must be greater than zero");
    }
    return value;
  }

  private buildEntry(account: AccountRecord, type: LedgerTransactionRecord["type"], amount: Decimal, entry: LedgerEntryInput) {
    return {
      accountId: account.id,
      type,
      amount,
      method: entry.method ?? null,
      invoiceId: entry.invoiceId ?? null,
      referenceNumber: entry.referenceNumber ?? null,
      description: entry.description,
      actorId: entry.actorId,
    };
  }
}
