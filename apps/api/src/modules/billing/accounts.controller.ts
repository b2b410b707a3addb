import { Controller, Get, Param, UseGuards } from "@nestjs/common";
import { accountBalanceParamsSchema, type AccountBalanceParams, type CallerIdentity } from "@rentledger/shared";
import { CurrentCaller } from "../../auth/current-caller.decorator";
import { JwtAuthGuard } from "../../auth/jwt-auth.guard";
import { ZodValidationPipe } from "../../common/zod-validation.pipe";
import { serializeAccountBalance } from "./billing.serializers";
import { PaymentsService } from "./payments.service";

@Controller("accounts")
@UseGuards(JwtAuthGuard)
export class AccountsController {
  constructor(private readonly payments: PaymentsService) {}

  @Get(":tenantId/balance")
  async getBalance(
    @CurrentCaller() caller: CallerIdentity,
    @Param(new ZodValidationPipe(accountBalanceParamsSchema)) params: AccountBalanceParams,
  ) {
    return serializeAccountBalance(await this.payments.getAccountBalance(caller, params.tenantId));
  }
}
