import { Controller, Get, Param, UseGuards } from "@nestjs/common";
import { entityIdParamSchema, type CallerIdentity } from "@rentledger/shared";
import { CurrentCaller } from "../../auth/current-caller.decorator";
import { JwtAuthGuard } from "../../auth/jwt-auth.guard";
import { ZodValidationPipe } from "../../common/zod-validation.pipe";
import { BillingClock } from "./billing.clock";
import { serializeInvoiceHistory } from "./billing.serializers";
import { PaymentsService } from "./payments.service";

@Controller("invoices")
@UseGuards(JwtAuthGuard)
export class InvoicesController {
  constructor(
    private readonly payments: PaymentsService,
    private readonly clock: BillingClock,
  ) {}

  @Get(":id/payments")
  async getInvoicePayments(
    @CurrentCaller() caller: CallerIdentity,
    @Param("id", new ZodValidationPipe(entityIdParamSchema)) id: string,
  ) {
    const history = await this.payments.getInvoicePaymentHistory(caller, id);
    return serializeInvoiceHistory(history, this.clock.now());
  }
}
