import { Module } from "@nestjs/common";
import { AuthModule } from "../../auth/auth.module";
import { AccountLedgerService } from "./account-ledger.service";
import { AccountsController } from "./accounts.controller";
import { BillingClock } from "./billing.clock";
import { BILLING_OPTIONS, billingOptionsFromEnv } from "./billing.options";
import { DrizzleBillingStore } from "./billing.repo";
import { BILLING_STORE } from "./billing.store";
import { InvoicesController } from "./invoices.controller";
import { NumberingService } from "./numbering.service";
import { PaymentsController } from "./payments.controller";
import { PaymentsService } from "./payments.service";
import { ReceiptsController } from "./receipts.controller";

@Module({
  imports: [AuthModule],
  controllers: [PaymentsController, ReceiptsController, InvoicesController, AccountsController],
  providers: [
    PaymentsService,
    AccountLedgerService,
    NumberingService,
    BillingClock,
    { provide: BILLING_STORE, useClass: DrizzleBillingStore },
    { provide: BILLING_OPTIONS, useFactory: billingOptionsFromEnv },
  ],
  exports: [PaymentsService],
})
export class BillingModule {}
