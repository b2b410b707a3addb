import { Controller, Get, Param, UseGuards } from "@nestjs/common";
import { entityIdParamSchema, type CallerIdentity } from "@rentledger/shared";
import { CurrentCaller } from "../../auth/current-caller.decorator";
import { JwtAuthGuard } from "../../auth/jwt-auth.guard";
import { ZodValidationPipe } from "../../common/zod-validation.pipe";
import { serializeReceipt } from "./billing.serializers";
import { PaymentsService } from "./payments.service";

@Controller("receipts")
@UseGuards(JwtAuthGuard)
export class ReceiptsController {
  constructor(private readonly payments: PaymentsService) {}

  @Get(":id")
  async getReceipt(
    @CurrentCaller() caller: CallerIdentity,
    @Param("id", new ZodValidationPipe(entityIdParamSchema)) id: string,
  ) {
    return serializeReceipt(await this.payments.getReceipt(caller, id));
  }
}
