import { HttpException } from "@nestjs/common";
import type { CallerIdentity } from "@rentledger/shared";
import { InMemoryBillingStore, InMemoryBillingUnitOfWork } from "../../../test/support/in-memory-billing.store";
import { AccountLedgerService } from "./account-ledger.service";
import type { BillingClock } from "./billing.clock";
import { PersistenceConflictError } from "./billing.errors";
import { balanceDue } from "./invoice-ledger";
import { NumberingService } from "./numbering.service";
import { PaymentsService } from "./payments.service";

type ErrorBody = { code: string; message: string; details?: Record<string, unknown> };

const rejectionOf = async (promise: Promise<unknown>) => {
  try {
    await promise;
  } catch (err) {
    if (err instanceof HttpException) {
      return { status: err.getStatus(), body: err.getResponse() as ErrorBody };
    }
    throw err;
  }
  throw new Error("Expected the call to be rejected");
};

const fixedClock: BillingClock = { now: () => new Date("2026-10-19T08:30:05.042Z") };

describe("PaymentsService", () => {
  let store: InMemoryBillingStore;
  let numbering: NumberingService;
  let service: PaymentsService;

  const createService = (transientRetryLimit = 1) =>
    new PaymentsService(store, { transientRetryLimit }, new AccountLedgerService(), numbering, fixedClock);

  const tenantCaller = (tenantId: string): CallerIdentity => ({ userId: "user-tenant", role: "tenant", tenantId });
  const admin: CallerIdentity = { userId: "user-admin", role: "admin" };

  beforeEach(() => {
    store = new InMemoryBillingStore();
    numbering = new NumberingService();
    service = createService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("submitPayment", () => {
    it("settles an invoice paid in full", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id);

      const result = await service.submitPayment(tenantCaller(tenant.id), {
        tenantId: tenant.id,
        invoiceId: invoice.id,
        amount: "1500.00",
        method: "bank_transfer",
      });

      expect(result.invoice?.status).toBe("paid");
      expect(result.invoice && balanceDue(result.invoice).toFixed(2)).toBe("0.00");
      expect(result.receipt.amountAllocatedToInvoice.toFixed(2)).toBe("1500.00");
      expect(result.receipt.amountToAccount.toFixed(2)).toBe("0.00");
      expect(result.receipt.receiptNumber).toBe("RCP-202610-0001");
      expect(result.receipt.paymentId).toBe(result.payment.id);
      expect(result.payment.status).toBe("completed");
      expect(result.payment.paymentDate).toBe("2026-10-19");
      expect(result.payment.processedById).toBe("user-tenant");
      expect(result.payment.referenceNumber).toMatch(/^AUTO-20261019083005042-[A-Z0-9]{6}$/);
      expect(store.committed.transactions).toHaveLength(1);
      expect(store.committed.transactions[0].type).toBe("payment");
      expect(store.committed.transactions[0].id).toBe(result.receipt.transactionId);
      expect(store.accountOf(tenant.id).balance.toFixed(2)).toBe("1500.00");
    });

    it("records a partial payment", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id);

      const result = await service.submitPayment(tenantCaller(tenant.id), {
        tenantId: tenant.id,
        invoiceId: invoice.id,
        amount: "750.00",
        method: "cash",
      });

      expect(result.invoice?.status).toBe("partial");
      expect(result.invoice && balanceDue(result.invoice).toFixed(2)).toBe("750.00");
    });

    it("rejects an over-payment and leaves every balance untouched", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id);

      const rejection = await rejectionOf(
        service.submitPayment(tenantCaller(tenant.id), {
          tenantId: tenant.id,
          invoiceId: invoice.id,
          amount: "2000.00",
          method: "card",
        }),
      );

      expect(rejection.status).toBe(400);
      expect(rejection.body.code).toBe("AMOUNT_EXCEEDS_BALANCE");
      expect(rejection.body.details?.balanceDue).toBe("1500.00");
      expect(store.committed.payments).toHaveLength(0);
      expect(store.committed.receipts).toHaveLength(0);
      expect(store.committed.transactions).toHaveLength(0);
      expect(store.committed.invoices.get(invoice.id)?.amountPaid.toFixed(2)).toBe("0.00");
      expect(store.accountOf(tenant.id).balance.toFixed(2)).toBe("0.00");
    });

    it("forbids a tenant from paying for another tenant before reading anything", async () => {
      const { tenant: tenantA } = store.seedTenant();
      const { tenant: tenantB } = store.seedTenant();
      const findTenant = jest.spyOn(store, "findTenant");
      const transaction = jest.spyOn(store, "transaction");

      const rejection = await rejectionOf(
        service.submitPayment(tenantCaller(tenantA.id), { tenantId: tenantB.id, amount: "100.00", method: "cash" }),
      );

      expect(rejection.status).toBe(403);
      expect(rejection.body.code).toBe("FORBIDDEN");
      expect(findTenant).not.toHaveBeenCalled();
      expect(transaction).not.toHaveBeenCalled();
      expect(store.committed.payments).toHaveLength(0);
    });

    it("credits the account when no invoice is given", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id);

      const result = await service.submitPayment(tenantCaller(tenant.id), {
        tenantId: tenant.id,
        amount: "500.00",
        method: "mobile_money",
      });

      expect(result.invoice).toBeNull();
      expect(result.payment.invoiceId).toBeNull();
      expect(result.receipt.amountToAccount.toFixed(2)).toBe("500.00");
      expect(result.receipt.amountAllocatedToInvoice.toFixed(2)).toBe("0.00");
      expect(store.accountOf(tenant.id).balance.toFixed(2)).toBe("500.00");
      expect(store.committed.invoices.get(invoice.id)).toBe(invoice);
    });

    it("defaults the amount to the invoice balance due", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id, { amountPaid: "400.00" });

      const result = await service.submitPayment(tenantCaller(tenant.id), {
        tenantId: tenant.id,
        invoiceId: invoice.id,
        method: "check",
      });

      expect(result.payment.amount.toFixed(2)).toBe("1100.00");
      expect(result.invoice?.status).toBe("paid");
    });

    it("requires an amount when there is no invoice", async () => {
      const { tenant } = store.seedTenant();

      const rejection = await rejectionOf(
        service.submitPayment(tenantCaller(tenant.id), { tenantId: tenant.id, method: "cash" }),
      );

      expect(rejection.body.code).toBe("AMOUNT_REQUIRED");
    });

    it.each([["0"], ["-10.00"], ["10.005"], ["ten"]])("rejects the amount %s", async (amount) => {
      const { tenant } = store.seedTenant();

      const rejection = await rejectionOf(
        service.submitPayment(tenantCaller(tenant.id), { tenantId: tenant.id, amount, method: "cash" }),
      );

      expect(rejection.status).toBe(400);
      expect(rejection.body.code).toBe("INVALID_AMOUNT");
    });

    it("reports a zero balance when the amount is omitted on a settled invoice", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id, { amountPaid: "1500.00" });

      const rejection = await rejectionOf(
        service.submitPayment(tenantCaller(tenant.id), { tenantId: tenant.id, invoiceId: invoice.id, method: "cash" }),
      );

      expect(rejection.body.code).toBe("INVALID_AMOUNT");
      expect(rejection.body.details).toEqual({ balanceDue: "0.00" });
    });

    it("rejects an unknown invoice and another tenant's invoice", async () => {
      const { tenant } = store.seedTenant();
      const { tenant: other } = store.seedTenant();
      const foreignInvoice = store.seedInvoice(other.id);

      const missing = await rejectionOf(
        service.submitPayment(tenantCaller(tenant.id), {
          tenantId: tenant.id,
          invoiceId: "9f1c2d3e-4b5a-4c6d-8e7f-001122334455",
          amount: "10.00",
          method: "cash",
        }),
      );
      const mismatch = await rejectionOf(
        service.submitPayment(tenantCaller(tenant.id), {
          tenantId: tenant.id,
          invoiceId: foreignInvoice.id,
          amount: "10.00",
          method: "cash",
        }),
      );

      expect(missing.status).toBe(404);
      expect(missing.body.code).toBe("NOT_FOUND");
      expect(mismatch.status).toBe(400);
      expect(mismatch.body.code).toBe("INVOICE_TENANT_MISMATCH");
    });

    it("refuses payments against cancelled invoices", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id, { isCancelled: true });

      const rejection = await rejectionOf(
        service.submitPayment(admin, { tenantId: tenant.id, invoiceId: invoice.id, amount: "100.00", method: "cash" }),
      );

      expect(rejection.status).toBe(409);
      expect(rejection.body.code).toBe("INVOICE_NOT_PAYABLE");
    });

    it("refuses a cancelled invoice before defaulting the amount", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id, { isCancelled: true, amountPaid: "1500.00" });

      const rejection = await rejectionOf(
        service.submitPayment(admin, { tenantId: tenant.id, invoiceId: invoice.id, method: "cash" }),
      );

      expect(rejection.status).toBe(409);
      expect(rejection.body.code).toBe("INVOICE_NOT_PAYABLE");
      expect(rejection.body.details).toEqual({ invoiceId: invoice.id });
    });

    it("rejects an amount larger than a ledger column holds", async () => {
      const { tenant } = store.seedTenant();

      const rejection = await rejectionOf(
        service.submitPayment(admin, { tenantId: tenant.id, amount: "10000000000.00", method: "cash" }),
      );

      expect(rejection.status).toBe(400);
      expect(rejection.body.code).toBe("INVALID_AMOUNT");
      expect(rejection.body.details).toEqual({ maximum: "9999999999.99" });
      expect(store.committed.payments).toHaveLength(0);
    });

    it("accepts the largest storable amount", async () => {
      const { tenant } = store.seedTenant();

      const result = await service.submitPayment(admin, { tenantId: tenant.id, amount: "9999999999.99", method: "cash" });

      expect(result.receipt.amountToAccount.toFixed(2)).toBe("9999999999.99");
      expect(store.accountOf(tenant.id).balance.toFixed(2)).toBe("9999999999.99");
    });

    it("rejects a credit that would push the balance past the column limit", async () => {
      const { tenant } = store.seedTenant({ balance: "9999999999.00" });

      const rejection = await rejectionOf(
        service.submitPayment(admin, { tenantId: tenant.id, amount: "5.00", method: "cash" }),
      );

      expect(rejection.status).toBe(400);
      expect(rejection.body.code).toBe("INVALID_AMOUNT");
      expect(store.committed.payments).toHaveLength(0);
      expect(store.committed.transactions).toHaveLength(0);
      expect(store.accountOf(tenant.id).balance.toFixed(2)).toBe("9999999999.00");
    });

    it("rejects a reused reference number with the existing payment id", async () => {
      const { tenant } = store.seedTenant();
      const first = await service.submitPayment(admin, {
        tenantId: tenant.id,
        amount: "50.00",
        method: "bank_transfer",
        referenceNumber: "BANK-REF-001",
      });

      const rejection = await rejectionOf(
        service.submitPayment(admin, {
          tenantId: tenant.id,
          amount: "50.00",
          method: "bank_transfer",
          referenceNumber: "BANK-REF-001",
        }),
      );

      expect(first.payment.referenceNumber).toBe("BANK-REF-001");
      expect(rejection.status).toBe(409);
      expect(rejection.body.code).toBe("DUPLICATE_REFERENCE");
      expect(rejection.body.details?.paymentId).toBe(first.payment.id);
      expect(store.committed.payments).toHaveLength(1);
    });

    it("scopes managers to their properties and lets admins act anywhere", async () => {
      const { tenant } = store.seedTenant({ propertyId: "5d4c3b2a-1f0e-4d9c-8b7a-665544332211" });
      const manager: CallerIdentity = {
        userId: "user-manager",
        role: "manager",
        managedPropertyIds: ["5d4c3b2a-1f0e-4d9c-8b7a-665544332211"],
      };
      const outsider: CallerIdentity = { userId: "user-outsider", role: "manager", managedPropertyIds: [] };

      await expect(
        service.submitPayment(manager, { tenantId: tenant.id, amount: "20.00", method: "cash" }),
      ).resolves.toMatchObject({ invoice: null });
      await expect(
        service.submitPayment(admin, { tenantId: tenant.id, amount: "20.00", method: "cash" }),
      ).resolves.toMatchObject({ invoice: null });
      const rejection = await rejectionOf(
        service.submitPayment(outsider, { tenantId: tenant.id, amount: "20.00", method: "cash" }),
      );

      expect(rejection.body.code).toBe("FORBIDDEN");
      expect(store.committed.payments).toHaveLength(2);
    });

    it("reports an unknown tenant as not found", async () => {
      const rejection = await rejectionOf(
        service.submitPayment(admin, {
          tenantId: "0a0b0c0d-0e0f-4a1b-8c2d-3e4f5a6b7c8d",
          amount: "20.00",
          method: "cash",
        }),
      );

      expect(rejection.status).toBe(404);
    });

    it("rolls back every write when the invoice update fails", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id);
      jest
        .spyOn(InMemoryBillingUnitOfWork.prototype, "updateInvoicePayment")
        .mockRejectedValueOnce(new Error("invoice write failed"));

      await expect(
        service.submitPayment(tenantCaller(tenant.id), {
          tenantId: tenant.id,
          invoiceId: invoice.id,
          amount: "1500.00",
          method: "cash",
        }),
      ).rejects.toThrow("invoice write failed");

      expect(store.committed.payments).toHaveLength(0);
      expect(store.committed.transactions).toHaveLength(0);
      expect(store.committed.receipts).toHaveLength(0);
      expect(store.committed.counters.size).toBe(0);
      expect(store.accountOf(tenant.id).balance.toFixed(2)).toBe("0.00");
      expect(store.committed.invoices.get(invoice.id)?.amountPaid.toFixed(2)).toBe("0.00");
    });

    it("lets only one of two concurrent full payments through", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id);
      const intent = { tenantId: tenant.id, invoiceId: invoice.id, amount: "1500.00", method: "cash" as const };

      const outcomes = await Promise.allSettled([
        service.submitPayment(admin, intent),
        service.submitPayment(admin, intent),
      ]);

      const fulfilled = outcomes.filter((outcome) => outcome.status === "fulfilled");
      const rejected = outcomes.filter(
        (outcome): outcome is PromiseRejectedResult => outcome.status === "rejected",
      );
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      const [failure] = rejected;
      expect(failure.reason).toBeInstanceOf(HttpException);
      expect((failure.reason as HttpException).getResponse()).toMatchObject({
        code: "AMOUNT_EXCEEDS_BALANCE",
        details: { balanceDue: "0.00" },
      });
      expect(store.committed.invoices.get(invoice.id)?.amountPaid.toFixed(2)).toBe("1500.00");
      expect(store.committed.payments).toHaveLength(1);
    });

    it("keeps receipt allocations summing to the payment amount", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id);

      await service.submitPayment(admin, { tenantId: tenant.id, invoiceId: invoice.id, amount: "0.10", method: "cash" });
      await service.submitPayment(admin, { tenantId: tenant.id, invoiceId: invoice.id, amount: "0.20", method: "cash" });
      await service.submitPayment(admin, { tenantId: tenant.id, amount: "99.99", method: "card" });

      for (const receipt of store.committed.receipts) {
        expect(receipt.amountAllocatedToInvoice.add(receipt.amountToAccount).equals(receipt.amount)).toBe(true);
      }
      expect(store.committed.invoices.get(invoice.id)?.amountPaid.toFixed(2)).toBe("0.30");
      expect(store.committed.receipts.map((receipt) => receipt.receiptNumber)).toEqual([
        "RCP-202610-0001",
        "RCP-202610-0002",
        "RCP-202610-0003",
      ]);
    });
  });

  describe("transient failures", () => {
    it("retries once after a receipt number collision", async () => {
      const { tenant } = store.seedTenant();
      await service.submitPayment(admin, { tenantId: tenant.id, amount: "10.00", method: "cash" });
      jest.spyOn(numbering, "nextSequentialNumber").mockResolvedValueOnce("RCP-202610-0001");
      const transaction = jest.spyOn(store, "transaction");

      const result = await service.submitPayment(admin, { tenantId: tenant.id, amount: "15.00", method: "cash" });

      expect(transaction).toHaveBeenCalledTimes(2);
      expect(result.receipt.receiptNumber).toBe("RCP-202610-0002");
      expect(store.committed.payments).toHaveLength(2);
    });

    it("gives up with a retryable failure when the collision persists", async () => {
      const { tenant } = store.seedTenant();
      await service.submitPayment(admin, { tenantId: tenant.id, amount: "10.00", method: "cash" });
      jest.spyOn(numbering, "nextSequentialNumber").mockResolvedValue("RCP-202610-0001");
      const transaction = jest.spyOn(store, "transaction");

      const rejection = await rejectionOf(
        service.submitPayment(admin, { tenantId: tenant.id, amount: "15.00", method: "cash" }),
      );

      expect(transaction).toHaveBeenCalledTimes(2);
      expect(rejection.status).toBe(503);
      expect(rejection.body.code).toBe("RETRYABLE_FAILURE");
      expect(rejection.body.details).toEqual({ reason: "numbering-conflict" });
      expect(store.committed.payments).toHaveLength(1);
      expect(store.accountOf(tenant.id).balance.toFixed(2)).toBe("10.00");
    });

    it("does not retry when the retry limit is zero", async () => {
      service = createService(0);
      const { tenant } = store.seedTenant();
      jest
        .spyOn(InMemoryBillingUnitOfWork.prototype, "lockAccountByTenant")
        .mockRejectedValueOnce(new PersistenceConflictError("40P01"));
      const transaction = jest.spyOn(store, "transaction");

      const rejection = await rejectionOf(
        service.submitPayment(admin, { tenantId: tenant.id, amount: "15.00", method: "cash" }),
      );

      expect(transaction).toHaveBeenCalledTimes(1);
      expect(rejection.body.details).toEqual({ reason: "persistence-conflict" });
    });

    it("re-runs the transaction after a deadlock", async () => {
      const { tenant } = store.seedTenant();
      jest
        .spyOn(InMemoryBillingUnitOfWork.prototype, "lockAccountByTenant")
        .mockRejectedValueOnce(new PersistenceConflictError("40P01"));

      const result = await service.submitPayment(admin, { tenantId: tenant.id, amount: "15.00", method: "cash" });

      expect(result.payment.amount.toFixed(2)).toBe("15.00");
      expect(store.committed.payments).toHaveLength(1);
    });

    it("regenerates an auto reference that collides", async () => {
      const { tenant } = store.seedTenant();
      const first = await service.submitPayment(admin, { tenantId: tenant.id, amount: "10.00", method: "cash" });
      const generate = jest
        .spyOn(numbering, "generateReferenceNumber")
        .mockReturnValueOnce(first.payment.referenceNumber);

      const second = await service.submitPayment(admin, { tenantId: tenant.id, amount: "20.00", method: "cash" });

      expect(generate).toHaveBeenCalledTimes(2);
      expect(second.payment.referenceNumber).not.toBe(first.payment.referenceNumber);
      expect(store.committed.payments).toHaveLength(2);
    });

    it("turns a supplied reference that collides on insert into a duplicate", async () => {
      const { tenant } = store.seedTenant();
      const first = await service.submitPayment(admin, {
        tenantId: tenant.id,
        amount: "10.00",
        method: "cash",
        referenceNumber: "TELLER-42",
      });
      jest.spyOn(InMemoryBillingUnitOfWork.prototype, "findPaymentByReference").mockResolvedValueOnce(null);

      const rejection = await rejectionOf(
        service.submitPayment(admin, {
          tenantId: tenant.id,
          amount: "10.00",
          method: "cash",
          referenceNumber: "TELLER-42",
        }),
      );

      expect(rejection.body.code).toBe("DUPLICATE_REFERENCE");
      expect(rejection.body.details).toEqual({ referenceNumber: "TELLER-42", paymentId: first.payment.id });
    });
  });

  describe("reads", () => {
    it("returns a payment and its receipt to the paying tenant only", async () => {
      const { tenant } = store.seedTenant();
      const { tenant: other } = store.seedTenant();
      const result = await service.submitPayment(admin, { tenantId: tenant.id, amount: "10.00", method: "cash" });

      await expect(service.getPayment(tenantCaller(tenant.id), result.payment.id)).resolves.toBe(result.payment);
      await expect(service.getReceipt(tenantCaller(tenant.id), result.receipt.id)).resolves.toBe(result.receipt);
      const forbidden = await rejectionOf(service.getPayment(tenantCaller(other.id), result.payment.id));
      const missing = await rejectionOf(service.getReceipt(admin, "6e5d4c3b-2a19-4f08-9e7d-6c5b4a392817"));

      expect(forbidden.body.code).toBe("FORBIDDEN");
      expect(missing.body.code).toBe("NOT_FOUND");
    });

    it("lists an invoice's payments newest first", async () => {
      const { tenant } = store.seedTenant();
      const invoice = store.seedInvoice(tenant.id);
      const first = await service.submitPayment(admin, { tenantId: tenant.id, invoiceId: invoice.id, amount: "100.00", method: "cash" });
      const second = await service.submitPayment(admin, { tenantId: tenant.id, invoiceId: invoice.id, amount: "200.00", method: "card" });

      const history = await service.getInvoicePaymentHistory(tenantCaller(tenant.id), invoice.id);

      expect(history.payments.map((payment) => payment.id)).toEqual([second.payment.id, first.payment.id]);
      expect(history.receipts.map((receipt) => receipt.id)).toEqual([second.receipt.id, first.receipt.id]);
      expect(history.invoice.amountPaid.toFixed(2)).toBe("300.00");
    });

    it("summarizes an account in debt", async () => {
      const { tenant } = store.seedTenant({ balance: "-200.00", creditLimit: "500.00" });

      const balance = await service.getAccountBalance(tenantCaller(tenant.id), tenant.id);

      expect(balance.balance.toFixed(2)).toBe("-200.00");
      expect(balance.debtAmount.toFixed(2)).toBe("200.00");
      expect(balance.availableCredit.toFixed(2)).toBe("300.00");
      expect(balance.isInDebt).toBe(true);
      expect(balance.transactions).toEqual([]);
    });

    it("forbids reading another tenant's balance", async () => {
      const { tenant } = store.seedTenant();
      const { tenant: other } = store.seedTenant();

      const rejection = await rejectionOf(service.getAccountBalance(tenantCaller(tenant.id), other.id));

      expect(rejection.status).toBe(403);
    });
  });
});
