import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, UseGuards } from "@nestjs/common";
import {
  entityIdParamSchema,
  paymentSubmitSchema,
  type CallerIdentity,
  type PaymentSubmitInput,
} from "@rentledger/shared";
import { CurrentCaller } from "../../auth/current-caller.decorator";
import { JwtAuthGuard } from "../../auth/jwt-auth.guard";
import { ZodValidationPipe } from "../../common/zod-validation.pipe";
import { BillingClock } from "./billing.clock";
import { serializePayment, serializeSubmission } from "./billing.serializers";
import { PaymentsService } from "./payments.service";

@Controller("payments")
@UseGuards(JwtAuthGuard)
export class PaymentsController {
  constructor(
    private readonly payments: PaymentsService,
    private readonly clock: BillingClock,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async submitPayment(
    @CurrentCaller() caller: CallerIdentity,
    @Body(new ZodValidationPipe(paymentSubmitSchema)) body: PaymentSubmitInput,
  ) {
    const result = await this.payments.submitPayment(caller, body);
    return serializeSubmission(result, this.clock.now());
  }

  @Get(":id")
  async getPayment(
    @CurrentCaller() caller: CallerIdentity,
    @Param("id", new ZodValidationPipe(entityIdParamSchema)) id: string,
  ) {
    return serializePayment(await this.payments.getPayment(caller, id));
  }
}
