import { createParamDecorator, ExecutionContext, UnauthorizedException } from "@nestjs/common";
import type { CallerIdentity } from "@rentledger/shared";
import type { AuthenticatedRequest } from "./jwt-auth.guard";

export const CurrentCaller = createParamDecorator((_data: unknown, context: ExecutionContext): CallerIdentity => {
  const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!request.caller) {
    throw new UnauthorizedException("Missing auth context");
  }
  return request.caller;
});
